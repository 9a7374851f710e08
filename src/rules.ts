import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import type { Rule, RuleAction, RuleConfig, RuleType } from "./types.js";
import { logger } from "./config.js";

const DEFAULT_RULE_TYPE: RuleType = "NaturalLanguageRule";

/**
 * Schema for a persisted rule action. Scalar parameter values are stored as strings.
 */
const RuleActionSchema = z.object({
  type: z.string().min(1),
  parameters: z
    .record(z.union([z.string(), z.number(), z.boolean()]).transform(String))
    .default({}),
});

const NaturalLanguageRuleSchema = z.object({
  type: z.literal("NaturalLanguageRule"),
  name: z.string().min(1),
  description: z.string().default(""),
  enabled: z.boolean().default(true),
  prompt: z.string().min(1),
  location: z.string().min(1).optional(),
  actions: z.array(RuleActionSchema).default([]),
});

const RuleConfigFileSchema = z.object({
  rules: z.array(z.unknown()).default([]),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a rule from its persisted object form, dispatching on the `type` tag
 */
export function ruleFromObject(data: unknown): Rule {
  if (!isRecord(data)) {
    throw new Error("Rule entry must be a mapping");
  }

  const type = data.type ?? DEFAULT_RULE_TYPE;
  switch (type) {
    case "NaturalLanguageRule": {
      const parsed = NaturalLanguageRuleSchema.safeParse({ ...data, type });
      if (!parsed.success) {
        const where = typeof data.name === "string" ? ` "${data.name}"` : "";
        throw new Error(`Invalid rule${where}: ${parsed.error.message}`);
      }
      const { location, ...rest } = parsed.data;
      return location === undefined ? rest : { ...rest, location };
    }
    default:
      throw new Error(`Unknown rule type: ${String(type)}`);
  }
}

/**
 * Convert a rule to the object form written to the rules file
 */
export function ruleToObject(rule: Rule): Record<string, unknown> {
  const base: Record<string, unknown> = {
    name: rule.name,
    description: rule.description,
    enabled: rule.enabled,
    type: rule.type,
  };

  switch (rule.type) {
    case "NaturalLanguageRule":
      base.prompt = rule.prompt;
      break;
  }

  if (rule.location !== undefined) {
    base.location = rule.location;
  }

  base.actions = rule.actions.map((action: RuleAction) => ({
    type: action.type,
    parameters: { ...action.parameters },
  }));

  return base;
}

/**
 * The rule-specific part of the AI system prompt
 */
export function getPromptSection(rule: Rule): string {
  switch (rule.type) {
    case "NaturalLanguageRule":
      return `Rule: ${rule.name}\nDescription: ${rule.description}\nCriteria: ${rule.prompt}`;
  }
}

/**
 * Check whether a rule's location filter admits a message location.
 * Rules without a location apply everywhere.
 */
export function appliesToLocation(rule: Rule, location: string | undefined): boolean {
  return rule.location === undefined || rule.location === location;
}

export function ruleConfigFromObject(data: unknown): RuleConfig {
  const parsed = RuleConfigFileSchema.parse(data ?? {});
  return { rules: parsed.rules.map((entry) => ruleFromObject(entry)) };
}

export function ruleConfigToObject(config: RuleConfig): { rules: Record<string, unknown>[] } {
  return { rules: config.rules.map((rule) => ruleToObject(rule)) };
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

/**
 * Load rules from a YAML file. A missing file yields an empty configuration.
 */
export async function loadRules(configPath: string): Promise<RuleConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.warn(`Rules file not found: ${configPath}, no rules loaded`);
      return { rules: [] };
    }
    throw error;
  }

  const parsed: unknown = parseYaml(content);
  const config = ruleConfigFromObject(parsed);
  logger.info(`Loaded ${config.rules.length} rules from ${configPath}`);
  return config;
}

/**
 * Save rules to a YAML file, creating the parent directory if needed
 */
export async function saveRules(config: RuleConfig, configPath: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(configPath)), { recursive: true });
  await fs.writeFile(configPath, stringifyYaml(ruleConfigToObject(config)), "utf-8");
  logger.debug(`Saved ${config.rules.length} rules to ${configPath}`);
}
