import { describe, it, expect, vi, beforeEach } from "vitest";
import type { EmailMessage, NaturalLanguageRule, RuleConfig } from "./types.js";
import type { CompletionBackend, CompletionRequest } from "./aiProcessor.js";

vi.mock("./config.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from "./config.js";
import {
  RuleEngine,
  buildSystemPrompt,
  buildUserPrompt,
  createRuleEngine,
  parseDecision,
} from "./ruleEngine.js";

function makeRule(overrides: Partial<NaturalLanguageRule> = {}): NaturalLanguageRule {
  return {
    type: "NaturalLanguageRule",
    name: "Recruiters",
    description: "Recruiter outreach",
    enabled: true,
    prompt: "The email is from a recruiter",
    actions: [{ type: "label", parameters: { label: "Recruiters" } }],
    ...overrides,
  };
}

const email: EmailMessage = {
  messageId: "msg-1",
  threadId: "thread-1",
  sender: "recruiter@example.com",
  recipients: ["me@example.com", "team@example.com"],
  subject: "Exciting opportunity",
  bodyText: "We have a role for you.",
  date: new Date("2026-10-17T08:30:00.000Z"),
  location: "INBOX",
};

/**
 * Fake backend answering per rule name found in the system prompt
 */
function fakeBackend(answers: Record<string, string | Error>): {
  backend: CompletionBackend;
  complete: ReturnType<typeof vi.fn>;
} {
  const complete = vi.fn(async (request: CompletionRequest): Promise<string> => {
    const name = /Rule: (.*)\n/.exec(request.system)?.[1] ?? "";
    const answer = answers[name] ?? "No";
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  });
  return { backend: { complete }, complete };
}

function evaluatedRuleNames(complete: ReturnType<typeof vi.fn>): string[] {
  return complete.mock.calls.map((call) => {
    const request: CompletionRequest = call[0];
    return /Rule: (.*)\n/.exec(request.system)?.[1] ?? "";
  });
}

describe("parseDecision", () => {
  it.each([
    ["Yes", true],
    ["yes, this is a recruiter", true],
    ["  YES.\nIt matches.", true],
    ["Yesterday's newsletter does not match", true],
    ["No", false],
    ["no - not a recruiter", false],
    ["Maybe", false],
    ["", false],
    ["The answer is yes", false],
  ])("should parse %j as %s", (text, expected) => {
    expect(parseDecision(text)).toBe(expected);
  });
});

describe("prompts", () => {
  it("should embed the rule in the system prompt", () => {
    const prompt = buildSystemPrompt(makeRule());

    expect(prompt).toContain(
      "Rule: Recruiters\nDescription: Recruiter outreach\nCriteria: The email is from a recruiter"
    );
    expect(prompt).toContain('Respond with a clear "Yes" or "No" at the beginning of your response');
  });

  it("should embed the email in the user prompt", () => {
    const prompt = buildUserPrompt(email);

    expect(prompt).toContain("From: recruiter@example.com\n");
    expect(prompt).toContain("To: me@example.com, team@example.com\n");
    expect(prompt).toContain("Subject: Exciting opportunity\n");
    expect(prompt).toContain("Date: 2026-10-17T08:30:00.000Z\n");
    expect(prompt).toContain("Body:\nWe have a role for you.\n");
  });

  it("should mark a missing date as unknown", () => {
    const { date: _date, ...undated } = email;

    expect(buildUserPrompt(undated)).toContain("Date: unknown\n");
  });
});

describe("RuleEngine", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("evaluateRule", () => {
    it("should call the backend with deterministic sampling", async () => {
      const { backend, complete } = fakeBackend({ Recruiters: "Yes" });
      const rule = makeRule();
      const engine = new RuleEngine({ rules: [rule] }, backend);

      const matched = await engine.evaluateRule(rule, email);

      expect(matched).toBe(true);
      expect(complete).toHaveBeenCalledWith({
        system: buildSystemPrompt(rule),
        user: buildUserPrompt(email),
        temperature: 0,
        maxTokens: 100,
      });
    });

    it("should treat a backend failure as no match and log it", async () => {
      const failure = new Error("401 Unauthorized");
      const { backend } = fakeBackend({ Recruiters: failure });
      const engine = new RuleEngine({ rules: [makeRule()] }, backend);

      await expect(engine.evaluateRule(makeRule(), email)).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith(
        "Error evaluating rule Recruiters with AI:",
        failure
      );
    });
  });

  describe("evaluateEmail", () => {
    it("should never evaluate disabled rules", async () => {
      const { backend, complete } = fakeBackend({ Active: "Yes", Disabled: "Yes" });
      const config: RuleConfig = {
        rules: [makeRule({ name: "Disabled", enabled: false }), makeRule({ name: "Active" })],
      };
      const engine = new RuleEngine(config, backend);

      const results = await engine.evaluateEmail(email);

      expect(evaluatedRuleNames(complete)).toEqual(["Active"]);
      expect(results.map((result) => result.rule.name)).toEqual(["Active"]);
    });

    it("should honour rule locations", async () => {
      const { backend, complete } = fakeBackend({});
      const config: RuleConfig = {
        rules: [
          makeRule({ name: "Inbox only", location: "INBOX" }),
          makeRule({ name: "Spam only", location: "SPAM" }),
          makeRule({ name: "Anywhere" }),
        ],
      };
      const engine = new RuleEngine(config, backend);

      await engine.evaluateEmail({ ...email, location: "SPAM" });
      expect(evaluatedRuleNames(complete)).toEqual(["Spam only", "Anywhere"]);

      complete.mockClear();
      await engine.evaluateEmail({ ...email, location: "INBOX" });
      expect(evaluatedRuleNames(complete)).toEqual(["Inbox only", "Anywhere"]);
    });

    it("should return every match in configuration order with its actions", async () => {
      const { backend } = fakeBackend({
        First: "Yes, matches",
        Second: "No, it does not",
        Third: "yes",
      });
      const third = makeRule({
        name: "Third",
        actions: [{ type: "archive", parameters: {} }],
      });
      const engine = new RuleEngine(
        { rules: [makeRule({ name: "First" }), makeRule({ name: "Second" }), third] },
        backend
      );

      const results = await engine.evaluateEmail(email);

      expect(results).toHaveLength(2);
      expect(results[0].rule.name).toBe("First");
      expect(results[0].matched).toBe(true);
      expect(results[1]).toEqual({ rule: third, matched: true, actions: third.actions });
    });

    it("should keep evaluating after one rule's backend call fails", async () => {
      const { backend } = fakeBackend({ Broken: new Error("timeout"), Working: "Yes" });
      const engine = new RuleEngine(
        { rules: [makeRule({ name: "Broken" }), makeRule({ name: "Working" })] },
        backend
      );

      const results = await engine.evaluateEmail(email);

      expect(results.map((result) => result.rule.name)).toEqual(["Working"]);
    });
  });

  describe("without an AI backend", () => {
    it("should report the missing key once and never match", async () => {
      const engine = new RuleEngine({ rules: [makeRule(), makeRule({ name: "Other" })] }, null);

      const first = await engine.evaluateEmail(email);
      const second = await engine.evaluateEmail(email);

      expect(first).toEqual([]);
      expect(second).toEqual([]);
      expect(engine.isEnabled()).toBe(false);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        "No AI API key configured. Rules will never match."
      );
    });

    it("should be built inert by createRuleEngine when no key is given", () => {
      const engine = createRuleEngine({ rules: [makeRule()] }, null);

      expect(engine.isEnabled()).toBe(false);
      expect(engine.getRules()).toHaveLength(1);
    });
  });
});
