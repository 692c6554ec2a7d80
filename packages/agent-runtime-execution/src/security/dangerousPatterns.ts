/**
 * Dangerous Patterns
 *
 * Regex matchers for destructive or privilege-escalating commands. The
 * default list lives in dangerousPatterns.json; a policy may replace it.
 */

import { type DangerousPatternDefinition, dangerousPatternSchema } from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";
import { z } from "zod";

import defaultPatternData from "./dangerousPatterns.json";

const logger = getLogger("dangerous-patterns");

export interface DangerousPattern {
  label: string;
  regex: RegExp;
}

export interface PatternMatch {
  label: string;
  /** The string leaf that matched */
  value: string;
}

export const DEFAULT_DANGEROUS_PATTERNS: readonly DangerousPatternDefinition[] = z
  .array(dangerousPatternSchema)
  .parse(defaultPatternData);

/**
 * Compile pattern definitions. Invalid expressions are skipped with a warning.
 */
export function compileDangerousPatterns(
  definitions: readonly DangerousPatternDefinition[]
): DangerousPattern[] {
  const compiled: DangerousPattern[] = [];
  for (const definition of definitions) {
    try {
      // Stateful flags would make test() depend on the previous call
      const flags = (definition.flags ?? "").replace(/[gy]/g, "");
      compiled.push({ label: definition.label, regex: new RegExp(definition.pattern, flags) });
    } catch (error) {
      logger.warn("Skipping invalid dangerous pattern", {
        label: definition.label,
        pattern: definition.pattern,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return compiled;
}

/** Every string value reachable through nested arrays and objects. */
export function collectStringLeaves(value: unknown, leaves: string[] = []): string[] {
  if (typeof value === "string") {
    leaves.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      collectStringLeaves(item, leaves);
    }
  } else if (typeof value === "object" && value !== null) {
    for (const item of Object.values(value)) {
      collectStringLeaves(item, leaves);
    }
  }
  return leaves;
}

export function findDangerousPattern(
  args: unknown,
  patterns: readonly DangerousPattern[]
): PatternMatch | undefined {
  for (const value of collectStringLeaves(args)) {
    for (const pattern of patterns) {
      if (pattern.regex.test(value)) {
        return { label: pattern.label, value };
      }
    }
  }
  return undefined;
}

/**
 * Union of pattern lists, keeping the first occurrence of each definition.
 */
export function mergePatternDefinitions(
  ...lists: ReadonlyArray<readonly DangerousPatternDefinition[]>
): DangerousPatternDefinition[] {
  const seen = new Set<string>();
  const merged: DangerousPatternDefinition[] = [];
  for (const list of lists) {
    for (const definition of list) {
      const key = `${definition.label}\u0000${definition.pattern}\u0000${definition.flags ?? ""}`;
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(definition);
      }
    }
  }
  return merged;
}
