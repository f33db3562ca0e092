/**
 * JSON configuration: the rule set to search for, and the naming and
 * symbol tables used to classify what comes back.
 *
 * Defaults live in the repo's `configs/` directory; either file can be
 * replaced by passing an explicit path.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { Condition, Rule } from "@route-pois/types";
import type { ClassificationConfig } from "../classify/classifier.js";
import { ConditionValidationError, ConfigError } from "../errors.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/**
 * On disk a condition names its mode by which field it sets:
 * `oneOf` (match), `noneOf` (exclude) or `exists`.
 */
const fileConditionSchema = z
  .object({
    key: z.string().min(1),
    oneOf: z.array(z.string()).min(1).optional(),
    noneOf: z.array(z.string()).min(1).optional(),
    exists: z.boolean().optional(),
  })
  .strict();

type FileCondition = z.infer<typeof fileConditionSchema>;

const ruleSetSchema = z.object({
  rules: z
    .array(
      z.object({
        name: z.string().optional(),
        radius: z.number().finite().positive().optional(),
        conditions: z.array(fileConditionSchema).min(1),
      })
    )
    .min(1),
});

const classificationSchema = z.object({
  nameKeys: z.array(z.string().min(1)).min(1),
  symbols: z.array(
    z.object({
      match: z
        .record(z.string())
        .refine((m) => Object.keys(m).length > 0, "match needs at least one tag"),
      symbol: z.string().min(1),
    })
  ),
});

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid";
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/`.
 * Works from both source (packages/finder/src/) and compiled (packages/finder/dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs");
    if (existsSync(join(candidate, "rules.json"))) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to known package structure
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs");
}

function readJson(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`reading config ${path}`, { cause: err });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`parsing config ${path}: invalid JSON`, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

/**
 * Turn an on-disk condition into its tagged form.
 *
 * @throws ConditionValidationError unless exactly one mode is set
 */
export function toCondition(
  condition: FileCondition,
  location: string
): Condition {
  const modes: Condition[] = [];
  if (condition.oneOf !== undefined) {
    modes.push({ kind: "match", key: condition.key, values: condition.oneOf });
  }
  if (condition.noneOf !== undefined) {
    modes.push({ kind: "exclude", key: condition.key, values: condition.noneOf });
  }
  if (condition.exists !== undefined) {
    modes.push({ kind: "exists", key: condition.key, present: condition.exists });
  }

  const [only, ...rest] = modes;
  if (!only || rest.length > 0) {
    throw new ConditionValidationError(
      `${location} ("${condition.key}") must set exactly one of oneOf, noneOf, exists; found ${modes.length}`
    );
  }
  return only;
}

/**
 * Validate a parsed rule set document.
 *
 * @throws ConditionValidationError naming the offending rule or condition
 */
export function parseRuleSet(json: unknown): Rule[] {
  const parsed = ruleSetSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConditionValidationError(`invalid rule set: ${describeIssue(parsed.error)}`);
  }

  return parsed.data.rules.map((rule, r) => {
    const conditions = rule.conditions.map((c, i) =>
      toCondition(c, `rule ${r} condition ${i}`)
    );
    const result: Rule = { conditions };
    if (rule.name !== undefined) result.name = rule.name;
    if (rule.radius !== undefined) result.radius = rule.radius;
    return result;
  });
}

/** Load a rule set, by default configs/rules.json */
export function loadRuleSet(path?: string): Rule[] {
  return parseRuleSet(readJson(path ?? join(findConfigsRoot(), "rules.json")));
}

/** Give rules without an explicit radius the given one */
export function withDefaultRadius(rules: readonly Rule[], radius: number): Rule[] {
  return rules.map((rule) => ({ ...rule, radius: rule.radius ?? radius }));
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/**
 * Validate a parsed classification document.
 */
export function parseClassificationConfig(json: unknown): ClassificationConfig {
  const parsed = classificationSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`invalid classification config: ${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

/** Load the classification tables, by default configs/classification.json */
export function loadClassificationConfig(path?: string): ClassificationConfig {
  return parseClassificationConfig(
    readJson(path ?? join(findConfigsRoot(), "classification.json"))
  );
}
