import { v4 as uuidv4 } from "uuid";
import type {
  ActionRecord,
  EmailMessage,
  ReportFormat,
  ReportTime,
  RuleAction,
} from "./types.js";
import type { EmailProvider } from "./emailProvider.js";
import type { ActionStorage } from "./actionStorage.js";
import { REPORT_TITLE, renderReport, summarizeActions } from "./report.js";
import { addDays, endOfDay, formatLongDate, startOfDay, toDateKey, today, yesterday } from "./dates.js";
import { logger } from "./config.js";

const DEFAULT_REPORT_TIME: ReportTime = { hours: 9, minutes: 0 };

/**
 * Records executed actions and delivers a daily digest of them.
 * The store is read-modify-written as a whole; one writer per store.
 */
export class ActionTracker {
  private storage: ActionStorage;
  private reportTime: ReportTime;

  constructor(storage: ActionStorage, reportTime: ReportTime = DEFAULT_REPORT_TIME) {
    this.storage = storage;
    this.reportTime = reportTime;
  }

  /**
   * Append a record for an action whose mailbox effect succeeded
   */
  async recordAction(
    message: EmailMessage,
    action: RuleAction,
    ruleName: string
  ): Promise<ActionRecord> {
    const record: ActionRecord = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      actionType: action.type,
      messageId: message.messageId,
      messageSubject: message.subject,
      sender: message.sender,
      ruleName,
      details: { ...action.parameters },
    };

    const store = await this.storage.load();
    store.actions.push(record);
    await this.storage.save(store);

    logger.debug(`Recorded ${action.type} action for message: ${message.subject}`);
    return record;
  }

  /**
   * Records with a timestamp inside the given local calendar day, inclusive
   */
  async getActionsForDay(day: Date = today()): Promise<ActionRecord[]> {
    const start = startOfDay(day).getTime();
    const end = endOfDay(day).getTime();

    const store = await this.storage.load();
    return store.actions.filter((record) => {
      const at = Date.parse(record.timestamp);
      return at >= start && at <= end;
    });
  }

  /**
   * Drop records older than now minus the retention window
   */
  async clearOldActions(daysToKeep: number = 30): Promise<number> {
    const cutoff = Date.now() - daysToKeep * 24 * 60 * 60 * 1000;

    const store = await this.storage.load();
    const kept = store.actions.filter((record) => Date.parse(record.timestamp) >= cutoff);
    const removed = store.actions.length - kept.length;

    store.actions = kept;
    await this.storage.save(store);

    logger.info(`Cleared ${removed} old actions`);
    return removed;
  }

  async generateDailyReport(
    day: Date = yesterday(),
    format: ReportFormat = "html"
  ): Promise<string> {
    const actions = await this.getActionsForDay(day);
    return renderReport(summarizeActions(day, actions), format);
  }

  async getLastReportDate(): Promise<string | null> {
    const store = await this.storage.load();
    return store.lastReportDate;
  }

  /**
   * Send the digest for a day (yesterday by default). Resolves false on any failure.
   */
  async sendDailyReport(
    provider: EmailProvider,
    recipient: string,
    day: Date = yesterday()
  ): Promise<boolean> {
    const dateLabel = formatLongDate(day);

    try {
      const html = await this.generateDailyReport(day, "html");
      const text = await this.generateDailyReport(day, "text");

      if (!provider.isConnected() && !(await provider.connect())) {
        logger.error("Failed to connect to email provider");
        return false;
      }

      const sent = await provider.sendEmail(
        recipient,
        `${REPORT_TITLE}: ${dateLabel}`,
        text,
        html
      );
      if (!sent) {
        logger.error(`Failed to send daily report for ${dateLabel}`);
        return false;
      }

      logger.info(`Sent daily report for ${dateLabel} to ${recipient}`);

      const store = await this.storage.load();
      store.lastReportDate = toDateKey(today());
      await this.storage.save(store);
      return true;
    } catch (error) {
      logger.error("Error sending daily report:", error);
      return false;
    }
  }

  /**
   * Whether a report is due: at or after the report time, and none sent today
   */
  async isReportDue(now: Date = new Date()): Promise<boolean> {
    const reportAt = new Date(
      now.getFullYear(),
      now.getMonth(),
      now.getDate(),
      this.reportTime.hours,
      this.reportTime.minutes
    );
    if (now < reportAt) {
      return false;
    }

    const lastReportDate = await this.getLastReportDate();
    return lastReportDate === null || lastReportDate < toDateKey(now);
  }

  /**
   * Send yesterday's report when one is due. Cheap to call every poll cycle.
   */
  async checkAndSendDailyReport(provider: EmailProvider, recipient: string): Promise<boolean> {
    const now = new Date();
    if (!(await this.isReportDue(now))) {
      return false;
    }

    logger.info("Daily report is due");
    return this.sendDailyReport(provider, recipient, addDays(startOfDay(now), -1));
  }
}
