/**
 * Sub-agent policy overlay.
 *
 * A spawned sub-agent runs under its parent's policy narrowed by the
 * configured overlay. The overlay can only tighten: thresholds and the
 * approval timeout take the stricter value, tool overrides never fall below
 * the parent's, and dangerous patterns accumulate.
 */

import {
  type DangerousPatternDefinition,
  maxTier,
  minTier,
  type SecurityPolicy,
  type SecurityTier,
  type SubAgentOverlay,
} from "@warden/agent-runtime-core";

import { DEFAULT_DANGEROUS_PATTERNS, mergePatternDefinitions } from "./dangerousPatterns";

export function overlayPolicy(
  parent: SecurityPolicy,
  overlay: SubAgentOverlay,
  defaultPatterns: readonly DangerousPatternDefinition[] = DEFAULT_DANGEROUS_PATTERNS
): SecurityPolicy {
  const toolOverrides: Record<string, SecurityTier> = { ...parent.toolOverrides };
  for (const [toolName, tier] of Object.entries(overlay.toolOverrides)) {
    const inherited = parent.toolOverrides[toolName];
    toolOverrides[toolName] = inherited ? maxTier(inherited, tier) : tier;
  }

  return {
    autoApproveUpTo: overlay.autoApproveUpTo
      ? minTier(parent.autoApproveUpTo, overlay.autoApproveUpTo)
      : parent.autoApproveUpTo,
    denyAbove: overlay.denyAbove ? minTier(parent.denyAbove, overlay.denyAbove) : parent.denyAbove,
    approvalTimeoutSecs:
      overlay.approvalTimeoutSecs !== undefined
        ? Math.min(parent.approvalTimeoutSecs, overlay.approvalTimeoutSecs)
        : parent.approvalTimeoutSecs,
    toolOverrides,
    dangerousPatterns: mergePatternDefinitions(
      parent.dangerousPatterns ?? defaultPatterns,
      overlay.dangerousPatterns
    ),
  };
}

/**
 * The tier a tool runs at under a policy, before argument-based escalation.
 */
export function resolveToolTier(
  toolName: string,
  baseTier: SecurityTier,
  policy: SecurityPolicy
): SecurityTier {
  return policy.toolOverrides[toolName] ?? baseTier;
}
