import dotenv from "dotenv";
import type { AppConfig, LogLevel, ReportTime } from "./types.js";

// Load environment variables
dotenv.config();

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a "HH:MM" time of day
 */
export function parseReportTime(value: string): ReportTime {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid report time "${value}", expected HH:MM`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid report time "${value}", expected HH:MM`);
  }

  return { hours, minutes };
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item: string) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Application configuration loaded from environment variables.
 * A missing OPENAI_API_KEY is not an error: rule evaluation is disabled instead.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const monitoredAddresses = parseList(env.MONITORED_ADDRESSES);
  const logLevel = (env.LOG_LEVEL || "info").toLowerCase();

  return {
    openaiApiKey: env.OPENAI_API_KEY || null,
    openaiModel: env.OPENAI_MODEL || "gpt-4.1-mini",
    gmailCredentialsFile: env.GMAIL_CREDENTIALS_FILE || "credentials.json",
    gmailTokenFile: env.GMAIL_TOKEN_FILE || "token.json",
    rulesFile: env.RULES_FILE || "rules.yaml",
    actionsFile: env.ACTIONS_FILE || "actions.json",
    checkIntervalSeconds: parsePositiveInt("CHECK_INTERVAL", env.CHECK_INTERVAL, 60),
    monitoredAddresses,
    readOnly: env.READ_ONLY === "true",
    reportsEnabled: env.REPORTS_ENABLED !== "false",
    reportTime: parseReportTime(env.REPORT_TIME || "09:00"),
    reportRecipient: env.REPORT_RECIPIENT || null,
    actionsRetentionDays: parsePositiveInt(
      "ACTIONS_RETENTION_DAYS",
      env.ACTIONS_RETENTION_DAYS,
      30
    ),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
}

/**
 * Logger utility
 */
export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LOG_LEVELS.indexOf(messageLevel) >= LOG_LEVELS.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message), ...args);
    }
  }
}

const envLevel = (process.env.LOG_LEVEL || "info").toLowerCase();

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");
