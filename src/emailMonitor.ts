import type {
  ActionStatus,
  CheckStats,
  EmailMessage,
  MonitorState,
  RuleAction,
  RuleResult,
} from "./types.js";
import type { EmailProvider } from "./emailProvider.js";
import type { RuleEngine } from "./ruleEngine.js";
import type { ActionTracker } from "./actionTracker.js";
import { logger } from "./config.js";

export interface EmailMonitorOptions {
  provider: EmailProvider;
  ruleEngine?: RuleEngine | null;
  actionTracker?: ActionTracker | null;
  checkIntervalSeconds?: number;
  monitoredAddresses?: string[];
  readOnly?: boolean;
  reportsEnabled?: boolean;
  /** Defaults to the first monitored address */
  reportRecipient?: string | null;
  /** Sleep after a failed loop iteration */
  errorBackoffSeconds?: number;
  /** Upper bound on how long stop() waits for the loop */
  stopTimeoutMs?: number;
  /** Most messages fetched per check */
  maxMessagesPerCheck?: number;
}

export const DEFAULT_MAX_MESSAGES_PER_CHECK = 50;

export function emptyCheckStats(): CheckStats {
  return {
    fetched: 0,
    processed: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    simulated: 0,
    errors: 0,
  };
}

function tally(stats: CheckStats, statuses: ActionStatus[]): void {
  for (const status of statuses) {
    stats[status]++;
  }
}

/**
 * Resolves after `ms`, or as soon as the signal aborts
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Resolves true if the promise settles within `ms`, false otherwise
 */
function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const finish = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(finish, finish);
  });
}

/**
 * Polls the mailbox, evaluates new messages against the rules and
 * executes (or, in read-only mode, describes) the matched actions
 */
export class EmailMonitor {
  private provider: EmailProvider;
  private ruleEngine: RuleEngine | null;
  private actionTracker: ActionTracker | null;
  private checkIntervalSeconds: number;
  private monitoredAddresses: string[];
  private readOnly: boolean;
  private reportsEnabled: boolean;
  private reportRecipient: string | null;
  private errorBackoffSeconds: number;
  private stopTimeoutMs: number;
  private maxMessagesPerCheck: number;

  private state: MonitorState = "stopped";
  private lastCheckTime: Date | null = null;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: EmailMonitorOptions) {
    this.provider = options.provider;
    this.ruleEngine = options.ruleEngine ?? null;
    this.actionTracker = options.actionTracker ?? null;
    this.checkIntervalSeconds = options.checkIntervalSeconds ?? 60;
    this.monitoredAddresses = options.monitoredAddresses ?? [];
    this.readOnly = options.readOnly ?? false;
    this.reportsEnabled = options.reportsEnabled ?? false;
    this.reportRecipient = options.reportRecipient ?? null;
    this.errorBackoffSeconds = options.errorBackoffSeconds ?? 5;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.maxMessagesPerCheck = options.maxMessagesPerCheck ?? DEFAULT_MAX_MESSAGES_PER_CHECK;

    if (this.readOnly) {
      logger.info("Email monitor is in read-only mode: actions will only be logged");
    }
  }

  getState(): MonitorState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  getLastCheckTime(): Date | null {
    return this.lastCheckTime;
  }

  private async ensureConnected(): Promise<boolean> {
    if (this.provider.isConnected()) {
      return true;
    }
    try {
      return await this.provider.connect();
    } catch (error) {
      logger.error("Error connecting to email provider:", error);
      return false;
    }
  }

  /**
   * Connect if needed and launch the polling loop in the background.
   * Resolves false when the mailbox connection cannot be established
   * or a previous loop has not settled yet.
   */
  async start(): Promise<boolean> {
    if (this.state !== "stopped") {
      logger.warn("Email monitor is already running");
      return this.state === "running";
    }
    if (this.loop) {
      logger.warn("Previous monitoring loop is still finishing, not starting");
      return false;
    }

    logger.info("Starting email monitor");
    this.state = "connecting";

    if (!(await this.ensureConnected())) {
      logger.error("Failed to connect to email provider");
      this.state = "stopped";
      return false;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.state = "running";
    const loop: Promise<void> = this.runLoop(controller.signal)
      .catch((error: unknown) => {
        logger.error("Monitoring loop terminated unexpectedly:", error);
      })
      .finally(() => {
        if (this.loop === loop) {
          this.loop = null;
        }
      });
    this.loop = loop;

    logger.info("Email monitor started");
    return true;
  }

  /**
   * Signal the loop to exit, wait for it (bounded), then disconnect.
   * A loop that outlives the wait stays tracked and blocks start() until it settles.
   */
  async stop(): Promise<void> {
    if (this.state !== "running") {
      logger.warn("Email monitor is not running");
      return;
    }

    logger.info("Stopping email monitor");
    this.state = "stopping";
    this.abortController?.abort();

    if (this.loop) {
      const finished = await settlesWithin(this.loop, this.stopTimeoutMs);
      if (!finished) {
        logger.warn(`Monitoring loop did not finish within ${this.stopTimeoutMs}ms`);
      }
    }
    this.abortController = null;

    try {
      if (this.provider.isConnected()) {
        await this.provider.disconnect();
      }
    } catch (error) {
      logger.error("Error disconnecting from email provider:", error);
    }

    this.state = "stopped";
    logger.info("Email monitor stopped");
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    logger.debug("Starting monitoring loop");

    while (!signal.aborted) {
      let sleepSeconds = this.checkIntervalSeconds;
      try {
        await this.checkForNewMessages(signal);
        if (!signal.aborted) {
          await this.checkDailyReport();
        }
      } catch (error) {
        logger.error("Error in monitoring loop:", error);
        sleepSeconds = this.errorBackoffSeconds;
      }
      await delay(sleepSeconds * 1000, signal);
    }

    logger.debug("Monitoring loop stopped");
  }

  private resolveReportRecipient(): string | null {
    return this.reportRecipient ?? this.monitoredAddresses[0] ?? null;
  }

  /**
   * Let the tracker send yesterday's digest when one is due
   */
  async checkDailyReport(): Promise<boolean> {
    if (!this.reportsEnabled || !this.actionTracker) {
      return false;
    }
    const recipient = this.resolveReportRecipient();
    if (!recipient) {
      return false;
    }
    return this.actionTracker.checkAndSendDailyReport(this.provider, recipient);
  }

  /**
   * Fetch and process messages that arrived since the last check.
   * The first call only records the watermark, so existing mail is never processed.
   * Once `signal` aborts, no further actions run and the watermark is left alone.
   */
  async checkForNewMessages(signal?: AbortSignal): Promise<CheckStats> {
    logger.debug("Checking for new messages");

    const stats = emptyCheckStats();
    const now = new Date();

    if (this.lastCheckTime === null) {
      logger.info("First run, setting last check time");
      this.lastCheckTime = now;
      return stats;
    }

    try {
      const limit = this.maxMessagesPerCheck;
      const messages = await this.provider.getMessages({
        fromAddresses: this.monitoredAddresses,
        since: this.lastCheckTime,
        limit,
      });
      if (signal?.aborted) {
        logger.debug("Monitor stopped during fetch, discarding results");
        return stats;
      }
      stats.fetched = messages.length;
      logger.info(`Found ${messages.length} new messages`);
      if (messages.length >= limit) {
        logger.warn(`Fetched the maximum of ${limit} messages, older ones in this window are skipped`);
      }

      for (const message of messages) {
        if (signal?.aborted) {
          break;
        }
        try {
          tally(stats, await this.processMessage(message, signal));
          stats.processed++;
        } catch (error) {
          logger.error(`Error processing message ${message.messageId}:`, error);
          stats.errors++;
        }
      }
    } catch (error) {
      logger.error("Error checking for new messages:", error);
      stats.errors++;
    }

    if (signal?.aborted) {
      return stats;
    }
    // Advance even after a failure so the same window is not retried in a tight loop
    this.lastCheckTime = now;
    return stats;
  }

  /**
   * One synchronous pass for tooling: connect if needed, check once, keep the connection.
   * `since` seeds the watermark so the pass actually fetches.
   */
  async runOnce(since?: Date): Promise<boolean> {
    if (!(await this.ensureConnected())) {
      logger.error("Failed to connect to email provider");
      return false;
    }

    if (since) {
      this.lastCheckTime = since;
    }

    const stats = await this.checkForNewMessages();
    logger.info(
      `Check complete: ${stats.processed}/${stats.fetched} messages processed, ` +
        `${stats.succeeded} actions succeeded, ${stats.failed} failed, ` +
        `${stats.skipped} skipped, ${stats.simulated} simulated`
    );
    return stats.errors === 0;
  }

  /**
   * Evaluate one message against the rules and act on every match
   */
  async processMessage(message: EmailMessage, signal?: AbortSignal): Promise<ActionStatus[]> {
    logger.info(`Processing message: ${message.subject} from ${message.sender}`);
    logger.debug(`Message ID: ${message.messageId}, thread: ${message.threadId}`);

    if (!this.ruleEngine) {
      logger.debug("No rule engine configured, skipping rule evaluation");
      return [];
    }

    const statuses: ActionStatus[] = [];
    const results = await this.ruleEngine.evaluateEmail(message);
    for (const result of results) {
      statuses.push(...(await this.executeActions(message, result, signal)));
    }
    return statuses;
  }

  /**
   * Run every action of a matched rule. One action failing never stops its siblings.
   */
  async executeActions(
    message: EmailMessage,
    result: RuleResult,
    signal?: AbortSignal
  ): Promise<ActionStatus[]> {
    const ruleName = result.rule.name;

    if (this.readOnly) {
      logger.info(`[READ-ONLY] Rule matched: ${ruleName}`);
      return result.actions.map((action) => this.simulateAction(message, action));
    }

    logger.info(`Executing actions for rule: ${ruleName}`);
    const statuses: ActionStatus[] = [];

    for (const action of result.actions) {
      if (signal?.aborted) {
        logger.debug(`Monitor stopped, not executing remaining actions for rule: ${ruleName}`);
        break;
      }
      logger.debug(`Executing action: ${action.type}`);

      let status: ActionStatus;
      try {
        status = await this.dispatchAction(message, action);
      } catch (error) {
        logger.error(`Error executing action ${action.type}:`, error);
        status = "failed";
      }

      if (status === "succeeded" && this.actionTracker) {
        await this.actionTracker.recordAction(message, action, ruleName);
      }
      statuses.push(status);
    }

    return statuses;
  }

  private simulateAction(message: EmailMessage, action: RuleAction): ActionStatus {
    switch (action.type) {
      case "reply":
        logger.info(`[READ-ONLY] Would reply to message: ${message.subject}`);
        logger.debug(`[READ-ONLY] Reply text: ${action.parameters.text ?? ""}`);
        break;
      case "archive":
        logger.info(`[READ-ONLY] Would archive message: ${message.subject}`);
        break;
      case "label": {
        const label = action.parameters.label ?? "";
        if (!label) {
          logger.warn("[READ-ONLY] No label specified in label action");
          return "skipped";
        }
        logger.info(`[READ-ONLY] Would apply label '${label}' to message: ${message.subject}`);
        break;
      }
      default:
        logger.warn(`[READ-ONLY] Unknown action type: ${action.type}`);
        return "skipped";
    }
    return "simulated";
  }

  private async dispatchAction(message: EmailMessage, action: RuleAction): Promise<ActionStatus> {
    switch (action.type) {
      case "reply": {
        const text = action.parameters.text ?? "";
        logger.info(`Replying to message: ${message.subject}`);
        logger.debug(`Reply text: ${text}`);
        const sent = await this.provider.sendReply(message, text, action.parameters.html);
        return this.report(sent, "Reply sent successfully", "Failed to send reply");
      }
      case "archive": {
        logger.info(`Archiving message: ${message.subject}`);
        const archived = await this.provider.archiveMessage(message);
        return this.report(archived, "Message archived successfully", "Failed to archive message");
      }
      case "label": {
        const label = action.parameters.label ?? "";
        if (!label) {
          logger.warn("No label specified in label action");
          return "skipped";
        }
        logger.info(`Applying label '${label}' to message: ${message.subject}`);
        const applied = await this.provider.applyLabel(message, label);
        return this.report(applied, "Label applied successfully", "Failed to apply label");
      }
      default:
        logger.warn(`Unknown action type: ${action.type}`);
        return "skipped";
    }
  }

  private report(success: boolean, ok: string, failed: string): ActionStatus {
    if (success) {
      logger.info(ok);
      return "succeeded";
    }
    logger.error(failed);
    return "failed";
  }
}
