/**
 * Security tiers
 *
 * Ordinal risk classification of a tool call, from T0 (safe) to T4 (critical).
 */

import { z } from "zod";

export const SECURITY_TIERS = ["T0", "T1", "T2", "T3", "T4"] as const;

export type SecurityTier = (typeof SECURITY_TIERS)[number];

export function tierRank(tier: SecurityTier): number {
  return SECURITY_TIERS.indexOf(tier);
}

/** Negative when `a` is less risky than `b`, zero when equal. */
export function compareTiers(a: SecurityTier, b: SecurityTier): number {
  return tierRank(a) - tierRank(b);
}

export function maxTier(a: SecurityTier, b: SecurityTier): SecurityTier {
  return compareTiers(a, b) >= 0 ? a : b;
}

export function minTier(a: SecurityTier, b: SecurityTier): SecurityTier {
  return compareTiers(a, b) <= 0 ? a : b;
}

export function isSecurityTier(value: unknown): value is SecurityTier {
  return typeof value === "string" && SECURITY_TIERS.some((tier) => tier === value);
}

/** Parses `"t2"`, `"T2"` or `" T2 "`; returns undefined for anything else. */
export function parseSecurityTier(value: string): SecurityTier | undefined {
  const normalized = value.trim().toUpperCase();
  return isSecurityTier(normalized) ? normalized : undefined;
}

export const securityTierSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.trim().toUpperCase() : value),
  z.enum(SECURITY_TIERS)
);
