/**
 * Type definitions for the mailwarden rule monitor
 */

export interface EmailMessage {
  messageId: string;
  threadId: string;
  sender: string;
  recipients: string[];
  subject: string;
  bodyText: string;
  bodyHtml?: string;
  date?: Date;
  /** Folder/tag the message lives in, e.g. "INBOX" or "SPAM" */
  location?: string;
  labels?: string[];
  /** RFC 5322 Message-ID header, used to thread replies */
  internetMessageId?: string;
}

export type KnownActionType = "reply" | "archive" | "label";

export interface RuleAction {
  readonly type: KnownActionType | (string & {});
  readonly parameters: Readonly<Record<string, string>>;
}

interface RuleBase {
  name: string;
  description: string;
  enabled: boolean;
  actions: readonly RuleAction[];
  location?: string;
}

export interface NaturalLanguageRule extends RuleBase {
  type: "NaturalLanguageRule";
  prompt: string;
}

export type Rule = NaturalLanguageRule;

export type RuleType = Rule["type"];

export interface RuleConfig {
  rules: Rule[];
}

export interface RuleResult {
  rule: Rule;
  matched: true;
  actions: readonly RuleAction[];
}

export type ActionStatus = "succeeded" | "failed" | "skipped" | "simulated";

export interface ActionRecord {
  id: string;
  timestamp: string;
  actionType: string;
  messageId: string;
  messageSubject: string;
  sender: string;
  ruleName: string;
  details: Record<string, string>;
}

export interface ActionStore {
  actions: ActionRecord[];
  /** Local calendar date (YYYY-MM-DD) of the last delivered report */
  lastReportDate: string | null;
}

export type ReportFormat = "text" | "html" | "markdown";

export interface ReportTime {
  hours: number;
  minutes: number;
}

export interface CheckStats {
  fetched: number;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  simulated: number;
  errors: number;
}

export type MonitorState = "stopped" | "connecting" | "running" | "stopping";

export interface GmailCredentials {
  installed?: {
    client_id: string;
    client_secret: string;
    redirect_uris: string[];
  };
  web?: {
    client_id: string;
    client_secret: string;
    redirect_uris: string[];
  };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  openaiApiKey: string | null;
  openaiModel: string;
  gmailCredentialsFile: string;
  gmailTokenFile: string;
  rulesFile: string;
  actionsFile: string;
  checkIntervalSeconds: number;
  monitoredAddresses: string[];
  readOnly: boolean;
  reportsEnabled: boolean;
  reportTime: ReportTime;
  reportRecipient: string | null;
  actionsRetentionDays: number;
  logLevel: LogLevel;
}
