import type { ReportFormat } from "./types.js";
import { isReportFormat } from "./report.js";
import { parseDateKey } from "./dates.js";

export type CliCommand =
  | { name: "run" }
  | { name: "check"; sinceMinutes: number }
  | { name: "dry-run"; messageId: string }
  | { name: "report"; date: Date | null; format: ReportFormat; send: boolean }
  | { name: "prune"; days: number | null }
  | { name: "help" };

export interface CliOptions {
  command: CliCommand;
  readOnly: boolean;
  verbose: boolean;
}

const READ_ONLY_FLAGS = ["--read-only", "--preview", "--dry-run-actions", "-p"];

function takeValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new Error(`Missing value for ${flag}`);
  }
  args.splice(index, 2);
  return value;
}

function parseCount(flag: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const args = [...argv];
  const readOnly = args.some((arg) => READ_ONLY_FLAGS.includes(arg));
  const verbose = args.includes("--verbose") || args.includes("-v");
  const help = args.includes("--help") || args.includes("-h");

  const withValues = [...args];
  const sinceMinutes = takeValue(withValues, "--since-minutes");
  const date = takeValue(withValues, "--date");
  const format = takeValue(withValues, "--format");
  const days = takeValue(withValues, "--days");
  const positional = withValues.filter((arg) => !arg.startsWith("-"));

  if (help) {
    return { command: { name: "help" }, readOnly, verbose };
  }

  const name = positional[0] ?? "run";
  switch (name) {
    case "run":
      return { command: { name: "run" }, readOnly, verbose };
    case "check":
      return {
        command: {
          name: "check",
          sinceMinutes: sinceMinutes === undefined ? 60 : parseCount("--since-minutes", sinceMinutes),
        },
        readOnly,
        verbose,
      };
    case "dry-run": {
      const messageId = positional[1];
      if (!messageId) {
        throw new Error("dry-run requires a message id");
      }
      return { command: { name: "dry-run", messageId }, readOnly, verbose };
    }
    case "report": {
      const reportFormat = format ?? "text";
      if (!isReportFormat(reportFormat)) {
        throw new Error(`Unknown report format "${reportFormat}"`);
      }
      return {
        command: {
          name: "report",
          date: date === undefined ? null : parseDateKey(date),
          format: reportFormat,
          send: args.includes("--send"),
        },
        readOnly,
        verbose,
      };
    }
    case "prune":
      return {
        command: { name: "prune", days: days === undefined ? null : parseCount("--days", days) },
        readOnly,
        verbose,
      };
    default:
      throw new Error(`Unknown command "${name}"`);
  }
}

export const HELP_TEXT = `
Mailwarden

USAGE:
  mailwarden [command] [options]

COMMANDS:
  run                         Monitor the mailbox until interrupted (default)
  check [--since-minutes N]   Run a single check over the last N minutes (default: 60)
  dry-run <messageId>         Evaluate the rules against one message, execute nothing
  report [--date YYYY-MM-DD] [--format text|html|markdown] [--send]
                              Print (or email) the daily report, yesterday by default
  prune [--days N]            Delete action records older than N days

OPTIONS:
  --read-only, --preview, --dry-run-actions, -p
                              Log the actions that would be taken without executing them
  --verbose, -v               Enable debug logging
  --help, -h                  Show this help message

ENVIRONMENT VARIABLES:
  OPENAI_API_KEY           OpenAI API key (rules never match without it)
  OPENAI_MODEL             OpenAI model to use (default: gpt-4.1-mini)
  GMAIL_CREDENTIALS_FILE   Path to Gmail credentials (default: credentials.json)
  GMAIL_TOKEN_FILE         Path to Gmail token (default: token.json)
  RULES_FILE               Path to the YAML rules file (default: rules.yaml)
  ACTIONS_FILE             Path to the action log (default: actions.json)
  CHECK_INTERVAL           Seconds between checks (default: 60)
  MONITORED_ADDRESSES      Comma-separated sender addresses to watch
  READ_ONLY                Only log actions (default: false)
  REPORTS_ENABLED          Send a daily report (default: true)
  REPORT_TIME              Earliest time of day for the report (default: 09:00)
  REPORT_RECIPIENT         Report address (default: first monitored address)
  ACTIONS_RETENTION_DAYS   Days of action history to keep (default: 30)
  LOG_LEVEL                Logging level (default: info)
`;
