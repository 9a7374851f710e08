import type { EmailMessage, Rule, RuleConfig, RuleResult } from "./types.js";
import type { CompletionBackend } from "./aiProcessor.js";
import { OpenAICompletionBackend } from "./aiProcessor.js";
import { appliesToLocation, getPromptSection } from "./rules.js";
import { logger } from "./config.js";

export const RULE_TEMPERATURE = 0;
export const RULE_MAX_TOKENS = 100;

/**
 * A rule matches iff the reply, trimmed and lowercased, starts with "yes"
 */
export function parseDecision(responseText: string): boolean {
  return responseText.trim().toLowerCase().startsWith("yes");
}

/**
 * Build the system prompt for evaluating one rule
 */
export function buildSystemPrompt(rule: Rule): string {
  return `You are an email processing assistant that determines if an email matches a specific rule.

${getPromptSection(rule)}

Respond with a clear "Yes" or "No" at the beginning of your response, followed by a brief explanation.
Only say "Yes" if the email clearly matches the criteria above.`;
}

/**
 * Build the user prompt carrying the email under evaluation
 */
export function buildUserPrompt(email: EmailMessage): string {
  const date = email.date ? email.date.toISOString() : "unknown";

  return `Please evaluate if the following email matches the rule:

From: ${email.sender}
To: ${email.recipients.join(", ")}
Subject: ${email.subject}
Date: ${date}

Body:
${email.bodyText}

Does this email match the rule criteria? Answer with Yes or No.`;
}

/**
 * Evaluates emails against natural-language rules, one AI call per applicable rule
 */
export class RuleEngine {
  private ruleConfig: RuleConfig;
  private completion: CompletionBackend | null;

  constructor(ruleConfig: RuleConfig, completion: CompletionBackend | null) {
    this.ruleConfig = ruleConfig;
    this.completion = completion;

    if (!this.completion) {
      logger.error("No AI API key configured. Rules will never match.");
    }
    logger.info(`Rule engine initialized with ${ruleConfig.rules.length} rules`);
  }

  getRules(): Rule[] {
    return [...this.ruleConfig.rules];
  }

  isEnabled(): boolean {
    return this.completion !== null;
  }

  /**
   * Evaluate an email against every enabled rule whose location admits it.
   * Results keep rule configuration order; non-matching rules produce nothing.
   */
  async evaluateEmail(email: EmailMessage): Promise<RuleResult[]> {
    logger.debug(`Evaluating email: ${email.subject} from ${email.sender}`);

    const results: RuleResult[] = [];

    for (const rule of this.ruleConfig.rules) {
      if (!rule.enabled) {
        logger.debug(`Skipping disabled rule: ${rule.name}`);
        continue;
      }

      if (!appliesToLocation(rule, email.location)) {
        logger.debug(
          `Skipping rule ${rule.name}: location ${rule.location} does not match ${email.location ?? "none"}`
        );
        continue;
      }

      logger.debug(`Evaluating rule: ${rule.name}`);

      if (await this.evaluateRule(rule, email)) {
        logger.info(`Rule matched: ${rule.name}`);
        results.push({ rule, matched: true, actions: rule.actions });
      } else {
        logger.debug(`Rule did not match: ${rule.name}`);
      }
    }

    logger.info(`Evaluation complete. ${results.length} rules matched.`);
    return results;
  }

  /**
   * Ask the AI backend whether a single rule matches. Never rejects:
   * any backend failure counts as no match.
   */
  async evaluateRule(rule: Rule, email: EmailMessage): Promise<boolean> {
    if (!this.completion) {
      return false;
    }

    try {
      const response = await this.completion.complete({
        system: buildSystemPrompt(rule),
        user: buildUserPrompt(email),
        temperature: RULE_TEMPERATURE,
        maxTokens: RULE_MAX_TOKENS,
      });
      logger.debug(`AI response for rule ${rule.name}: ${response}`);
      return parseDecision(response);
    } catch (error) {
      logger.error(`Error evaluating rule ${rule.name} with AI:`, error);
      return false;
    }
  }
}

/**
 * Build a rule engine on the OpenAI backend, inert when no key is given
 */
export function createRuleEngine(
  ruleConfig: RuleConfig,
  apiKey: string | null,
  modelName?: string
): RuleEngine {
  const completion = apiKey ? new OpenAICompletionBackend(apiKey, modelName) : null;
  return new RuleEngine(ruleConfig, completion);
}
