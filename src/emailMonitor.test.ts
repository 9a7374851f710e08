import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { EmailMessage, NaturalLanguageRule, RuleAction, RuleResult } from "./types.js";
import type { CompletionBackend } from "./aiProcessor.js";

vi.mock("./config.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from "./config.js";
import { EmailMonitor } from "./emailMonitor.js";
import { RuleEngine } from "./ruleEngine.js";
import { ActionTracker } from "./actionTracker.js";
import { InMemoryActionStorage } from "./actionStorage.js";
import { InMemoryEmailProvider } from "./memoryProvider.js";

const REPLY_TEXT = "Thanks for reaching out, but I am not looking right now.";

const recruiterRule: NaturalLanguageRule = {
  type: "NaturalLanguageRule",
  name: "Recruiters",
  description: "Reply to and label recruiter emails",
  enabled: true,
  prompt: "The email is from a recruiter offering a job",
  actions: [
    { type: "reply", parameters: { text: REPLY_TEXT } },
    { type: "label", parameters: { label: "Recruiters" } },
  ],
};

function makeMessage(overrides: Partial<EmailMessage> = {}): EmailMessage {
  return {
    messageId: "msg-1",
    threadId: "thread-1",
    sender: "recruiter@x.com",
    recipients: ["me@example.com"],
    subject: "Job opportunity",
    bodyText: "We have an exciting role for you.",
    date: new Date(),
    location: "INBOX",
    ...overrides,
  };
}

function yesBackend(): CompletionBackend & { complete: ReturnType<typeof vi.fn> } {
  return { complete: vi.fn().mockResolvedValue("Yes, this is a recruiter.") };
}

function matchOf(actions: readonly RuleAction[]): RuleResult {
  return { rule: { ...recruiterRule, actions }, matched: true, actions };
}

describe("EmailMonitor", () => {
  let provider: InMemoryEmailProvider;
  let storage: InMemoryActionStorage;
  let tracker: ActionTracker;
  let backend: ReturnType<typeof yesBackend>;

  function createMonitor(
    overrides: Partial<ConstructorParameters<typeof EmailMonitor>[0]> = {}
  ): EmailMonitor {
    return new EmailMonitor({
      provider,
      ruleEngine: new RuleEngine({ rules: [recruiterRule] }, backend),
      actionTracker: tracker,
      monitoredAddresses: ["recruiter@x.com"],
      ...overrides,
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    provider = new InMemoryEmailProvider();
    storage = new InMemoryActionStorage();
    tracker = new ActionTracker(storage);
    backend = yesBackend();
  });

  describe("processing a matched message", () => {
    it("should reply, label and record both actions", async () => {
      const message = makeMessage();
      provider.addMessage(message);
      const monitor = createMonitor();

      const ok = await monitor.runOnce(new Date(Date.now() - 60_000));

      expect(ok).toBe(true);
      expect(provider.replies).toEqual([{ original: message, text: REPLY_TEXT }]);
      expect(provider.labeled).toEqual([{ message, label: "Recruiters" }]);
      expect(provider.archived).toEqual([]);

      const { actions } = await storage.load();
      expect(actions).toHaveLength(2);
      expect(actions.map((record) => record.actionType)).toEqual(["reply", "label"]);
      expect(actions[0]).toMatchObject({
        messageId: "msg-1",
        messageSubject: "Job opportunity",
        sender: "recruiter@x.com",
        ruleName: "Recruiters",
        details: { text: REPLY_TEXT },
      });
      expect(actions[1].details).toEqual({ label: "Recruiters" });
    });

    it("should only log intended actions in read-only mode", async () => {
      const message = makeMessage();
      provider.addMessage(message);
      const monitor = createMonitor({ readOnly: true });

      const ok = await monitor.runOnce(new Date(Date.now() - 60_000));

      expect(ok).toBe(true);
      expect(provider.mutationCount()).toBe(0);
      expect((await storage.load()).actions).toEqual([]);
      expect(logger.info).toHaveBeenCalledWith(
        "[READ-ONLY] Would reply to message: Job opportunity"
      );
      expect(logger.info).toHaveBeenCalledWith(
        "[READ-ONLY] Would apply label 'Recruiters' to message: Job opportunity"
      );
    });

    it("should skip a label without a name in read-only mode", async () => {
      const monitor = createMonitor({ readOnly: true });

      const statuses = await monitor.executeActions(
        makeMessage(),
        matchOf([{ type: "label", parameters: {} }])
      );

      expect(statuses).toEqual(["skipped"]);
      expect(logger.warn).toHaveBeenCalledWith("[READ-ONLY] No label specified in label action");
      expect(logger.info).not.toHaveBeenCalledWith(
        "[READ-ONLY] Would apply label '' to message: Job opportunity"
      );
    });

    it("should describe archive actions in read-only mode", async () => {
      const monitor = createMonitor({ readOnly: true });
      const archive = vi.spyOn(provider, "archiveMessage");

      const statuses = await monitor.executeActions(
        makeMessage(),
        matchOf([{ type: "archive", parameters: {} }])
      );

      expect(statuses).toEqual(["simulated"]);
      expect(archive).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith(
        "[READ-ONLY] Would archive message: Job opportunity"
      );
    });
  });

  describe("executeActions", () => {
    beforeEach(async () => {
      await provider.connect();
    });

    it("should pass reply html through to the provider", async () => {
      const monitor = createMonitor();
      const message = makeMessage();

      await monitor.executeActions(
        message,
        matchOf([{ type: "reply", parameters: { text: "plain", html: "<p>rich</p>" } }])
      );

      expect(provider.replies).toEqual([{ original: message, text: "plain", html: "<p>rich</p>" }]);
    });

    it("should not record an action the provider reports as failed", async () => {
      vi.spyOn(provider, "applyLabel").mockResolvedValue(false);
      const monitor = createMonitor();

      const statuses = await monitor.executeActions(makeMessage(), matchOf(recruiterRule.actions));

      expect(statuses).toEqual(["succeeded", "failed"]);
      const { actions } = await storage.load();
      expect(actions.map((record) => record.actionType)).toEqual(["reply"]);
    });

    it("should continue with sibling actions after one throws", async () => {
      const failure = new Error("SMTP unavailable");
      vi.spyOn(provider, "sendReply").mockRejectedValue(failure);
      const monitor = createMonitor();

      const statuses = await monitor.executeActions(makeMessage(), matchOf(recruiterRule.actions));

      expect(statuses).toEqual(["failed", "succeeded"]);
      expect(provider.labeled).toHaveLength(1);
      expect(logger.error).toHaveBeenCalledWith("Error executing action reply:", failure);
      const { actions } = await storage.load();
      expect(actions.map((record) => record.actionType)).toEqual(["label"]);
    });

    it("should skip unknown action types and labels without a name", async () => {
      const applyLabel = vi.spyOn(provider, "applyLabel");
      const monitor = createMonitor();

      const statuses = await monitor.executeActions(
        makeMessage(),
        matchOf([
          { type: "forward", parameters: { to: "someone@example.com" } },
          { type: "label", parameters: {} },
          { type: "archive", parameters: {} },
        ])
      );

      expect(statuses).toEqual(["skipped", "skipped", "succeeded"]);
      expect(applyLabel).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith("Unknown action type: forward");
      expect(logger.warn).toHaveBeenCalledWith("No label specified in label action");
      const { actions } = await storage.load();
      expect(actions.map((record) => record.actionType)).toEqual(["archive"]);
    });

    it("should not execute actions once the signal has aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const monitor = createMonitor();

      const statuses = await monitor.executeActions(
        makeMessage(),
        matchOf(recruiterRule.actions),
        controller.signal
      );

      expect(statuses).toEqual([]);
      expect(provider.mutationCount()).toBe(0);
      expect((await storage.load()).actions).toEqual([]);
    });

    it("should count a disconnected provider as a failed action", async () => {
      await provider.disconnect();
      const monitor = createMonitor();

      const statuses = await monitor.executeActions(
        makeMessage(),
        matchOf([{ type: "archive", parameters: {} }])
      );

      expect(statuses).toEqual(["failed"]);
      expect((await storage.load()).actions).toEqual([]);
    });
  });

  describe("checkForNewMessages", () => {
    it("should only set the watermark on the first call", async () => {
      provider.addMessage(makeMessage({ date: new Date(Date.now() - 60_000) }));
      provider.addMessage(makeMessage({ messageId: "msg-2", date: new Date(Date.now() + 60_000) }));
      await provider.connect();
      const getMessages = vi.spyOn(provider, "getMessages");
      const monitor = createMonitor();
      const before = Date.now();

      const stats = await monitor.checkForNewMessages();

      expect(stats.fetched).toBe(0);
      expect(stats.processed).toBe(0);
      expect(getMessages).not.toHaveBeenCalled();
      expect(backend.complete).not.toHaveBeenCalled();
      expect(monitor.getLastCheckTime()?.getTime()).toBeGreaterThanOrEqual(before);
    });

    it("should fetch from monitored senders since the watermark", async () => {
      await provider.connect();
      const getMessages = vi.spyOn(provider, "getMessages");
      const monitor = createMonitor();
      await monitor.checkForNewMessages();
      const watermark = monitor.getLastCheckTime();

      provider.addMessage(makeMessage({ date: new Date(Date.now() + 1000) }));
      const stats = await monitor.checkForNewMessages();

      expect(getMessages).toHaveBeenCalledWith({
        fromAddresses: ["recruiter@x.com"],
        since: watermark,
        limit: 50,
      });
      expect(stats).toEqual({
        fetched: 1,
        processed: 1,
        succeeded: 2,
        failed: 0,
        skipped: 0,
        simulated: 0,
        errors: 0,
      });
    });

    it("should warn when a check hits the fetch limit", async () => {
      await provider.connect();
      const getMessages = vi.spyOn(provider, "getMessages");
      const monitor = createMonitor({ maxMessagesPerCheck: 2 });
      await monitor.checkForNewMessages();

      for (const id of ["m1", "m2", "m3"]) {
        provider.addMessage(makeMessage({ messageId: id, date: new Date(Date.now() + 1000) }));
      }
      const stats = await monitor.checkForNewMessages();

      expect(getMessages).toHaveBeenCalledWith(expect.objectContaining({ limit: 2 }));
      expect(stats.fetched).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith(
        "Fetched the maximum of 2 messages, older ones in this window are skipped"
      );
    });

    it("should advance the watermark even when fetching fails", async () => {
      const monitor = createMonitor();
      await monitor.checkForNewMessages();
      const watermark = monitor.getLastCheckTime();

      // provider never connected: getMessages rejects with ConnectionError
      const stats = await monitor.checkForNewMessages();

      expect(stats.errors).toBe(1);
      expect(monitor.getLastCheckTime()).not.toBe(watermark);
      expect(logger.error).toHaveBeenCalledWith(
        "Error checking for new messages:",
        expect.objectContaining({ name: "ConnectionError" })
      );
    });

    it("should keep processing the batch when one message fails", async () => {
      await provider.connect();
      const engine = new RuleEngine({ rules: [recruiterRule] }, backend);
      vi.spyOn(engine, "evaluateEmail").mockRejectedValueOnce(new Error("boom"));
      const monitor = createMonitor({ ruleEngine: engine });
      await monitor.checkForNewMessages();

      provider.addMessage(makeMessage({ messageId: "bad", date: new Date(Date.now() + 1000) }));
      provider.addMessage(makeMessage({ messageId: "good", date: new Date(Date.now() + 1000) }));
      const stats = await monitor.checkForNewMessages();

      expect(stats.fetched).toBe(2);
      expect(stats.processed).toBe(1);
      expect(stats.errors).toBe(1);
      expect(provider.replies.map((reply) => reply.original.messageId)).toEqual(["good"]);
    });
  });

  describe("location filtering end to end", () => {
    it("should evaluate each rule only against messages in its location", async () => {
      const rules: NaturalLanguageRule[] = [
        { ...recruiterRule, name: "Inbox only", location: "INBOX", actions: [] },
        { ...recruiterRule, name: "Spam only", location: "SPAM", actions: [] },
        { ...recruiterRule, name: "Anywhere", actions: [] },
      ];
      const complete = vi.fn().mockResolvedValue("No");
      const monitor = createMonitor({
        ruleEngine: new RuleEngine({ rules }, { complete }),
        monitoredAddresses: [],
      });
      provider.addMessage(makeMessage({ messageId: "inbox-msg", location: "INBOX" }));
      provider.addMessage(makeMessage({ messageId: "spam-msg", location: "SPAM" }));

      await monitor.runOnce(new Date(Date.now() - 60_000));

      const evaluated = complete.mock.calls.map((call) => {
        const system: string = call[0].system;
        return /Rule: (.*)\n/.exec(system)?.[1];
      });
      expect(evaluated).toEqual(["Inbox only", "Anywhere", "Spam only", "Anywhere"]);
    });
  });

  describe("runOnce", () => {
    it("should fail without touching the mailbox when it cannot connect", async () => {
      vi.spyOn(provider, "connect").mockResolvedValue(false);
      const getMessages = vi.spyOn(provider, "getMessages");
      const monitor = createMonitor();

      await expect(monitor.runOnce()).resolves.toBe(false);
      expect(getMessages).not.toHaveBeenCalled();
    });

    it("should leave the connection open", async () => {
      const monitor = createMonitor();

      await monitor.runOnce(new Date(Date.now() - 60_000));

      expect(provider.isConnected()).toBe(true);
    });
  });

  describe("start / stop", () => {
    it("should connect, run and disconnect", async () => {
      const monitor = createMonitor();

      await expect(monitor.start()).resolves.toBe(true);
      expect(monitor.getState()).toBe("running");
      expect(monitor.isRunning()).toBe(true);
      expect(provider.isConnected()).toBe(true);

      await monitor.stop();

      expect(monitor.getState()).toBe("stopped");
      expect(provider.isConnected()).toBe(false);
    });

    it("should warn and do nothing when started twice", async () => {
      const monitor = createMonitor();
      const connect = vi.spyOn(provider, "connect");

      await monitor.start();
      await expect(monitor.start()).resolves.toBe(true);

      expect(connect).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith("Email monitor is already running");
      await monitor.stop();
    });

    it("should not enter running when the connection fails", async () => {
      vi.spyOn(provider, "connect").mockRejectedValue(new Error("bad credentials"));
      const monitor = createMonitor();

      await expect(monitor.start()).resolves.toBe(false);
      expect(monitor.getState()).toBe("stopped");
    });

    it("should warn when stopping a monitor that is not running", async () => {
      const monitor = createMonitor();

      await monitor.stop();

      expect(logger.warn).toHaveBeenCalledWith("Email monitor is not running");
    });
  });

  describe("polling loop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should poll once per check interval", async () => {
      const getMessages = vi.spyOn(provider, "getMessages");
      const monitor = createMonitor({ checkIntervalSeconds: 30 });

      await monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(getMessages).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(30_000);
      expect(getMessages).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(30_000);
      expect(getMessages).toHaveBeenCalledTimes(2);

      await monitor.stop();
      expect(monitor.getState()).toBe("stopped");
    });

    it("should check the daily report for the first monitored address", async () => {
      const check = vi.spyOn(tracker, "checkAndSendDailyReport").mockResolvedValue(false);
      const monitor = createMonitor({
        reportsEnabled: true,
        monitoredAddresses: ["boss@example.com", "other@example.com"],
      });

      await monitor.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(check).toHaveBeenCalledWith(provider, "boss@example.com");
      await monitor.stop();
    });

    it("should prefer an explicit report recipient", async () => {
      const check = vi.spyOn(tracker, "checkAndSendDailyReport").mockResolvedValue(false);
      const monitor = createMonitor({
        reportsEnabled: true,
        reportRecipient: "me@example.com",
      });

      await monitor.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(check).toHaveBeenCalledWith(provider, "me@example.com");
      await monitor.stop();
    });

    it("should skip reports when disabled or without a recipient", async () => {
      const check = vi.spyOn(tracker, "checkAndSendDailyReport");

      await expect(createMonitor({ reportsEnabled: false }).checkDailyReport()).resolves.toBe(false);
      await expect(
        createMonitor({ reportsEnabled: true, monitoredAddresses: [] }).checkDailyReport()
      ).resolves.toBe(false);
      expect(check).not.toHaveBeenCalled();
    });

    it("should retry after the short backoff when an iteration fails", async () => {
      vi.spyOn(tracker, "checkAndSendDailyReport").mockRejectedValue(new Error("disk full"));
      const getMessages = vi.spyOn(provider, "getMessages");
      const monitor = createMonitor({
        reportsEnabled: true,
        checkIntervalSeconds: 60,
        errorBackoffSeconds: 5,
      });

      await monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(logger.error).toHaveBeenCalledWith(
        "Error in monitoring loop:",
        expect.objectContaining({ message: "disk full" })
      );

      await vi.advanceTimersByTimeAsync(5_000);
      expect(getMessages).toHaveBeenCalledTimes(1);
      await monitor.stop();
    });

    it("should give up waiting for a stuck loop after the stop timeout", async () => {
      await provider.connect();
      const monitor = createMonitor({ checkIntervalSeconds: 1, stopTimeoutMs: 2_000 });
      await monitor.checkForNewMessages();
      vi.spyOn(provider, "getMessages").mockReturnValue(new Promise(() => {}));

      await monitor.start();
      await vi.advanceTimersByTimeAsync(0);

      const stopping = monitor.stop();
      await vi.advanceTimersByTimeAsync(2_000);
      await stopping;

      expect(logger.warn).toHaveBeenCalledWith("Monitoring loop did not finish within 2000ms");
      expect(monitor.getState()).toBe("stopped");
      expect(provider.isConnected()).toBe(false);
    });

    it("should keep a loop that outlived stop() from acting or moving the watermark", async () => {
      await provider.connect();
      const monitor = createMonitor({ checkIntervalSeconds: 30, stopTimeoutMs: 100 });
      await monitor.checkForNewMessages();
      const watermark = monitor.getLastCheckTime();
      let release: (messages: EmailMessage[]) => void = () => {};
      vi.spyOn(provider, "getMessages").mockReturnValueOnce(
        new Promise<EmailMessage[]>((resolve) => {
          release = resolve;
        })
      );

      await monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      const stopping = monitor.stop();
      await vi.advanceTimersByTimeAsync(100);
      await stopping;

      await expect(monitor.start()).resolves.toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        "Previous monitoring loop is still finishing, not starting"
      );

      await provider.connect();
      release([makeMessage({ date: new Date(Date.now() + 1000) })]);
      await vi.advanceTimersByTimeAsync(0);

      expect(provider.mutationCount()).toBe(0);
      expect(backend.complete).not.toHaveBeenCalled();
      expect(monitor.getLastCheckTime()).toBe(watermark);

      await expect(monitor.start()).resolves.toBe(true);
      await monitor.stop();
      expect(monitor.getState()).toBe("stopped");
    });
  });
});
