/**
 * Analysis policy: scoring weights, tier thresholds and classification sets.
 *
 * A JSON policy file (--policy, or SKILL_GRAPH_POLICY for the server) may
 * override any field; it is validated against AnalysisPolicyOverrides before
 * merging over the defaults.
 */

import { readFileSync } from "node:fs";
import { Value } from "@sinclair/typebox/value";
import {
  AnalysisPolicyOverrides,
  type AnalysisPolicy,
} from "../../src/analysis/index.js";

export const DEFAULT_POLICY: AnalysisPolicy = {
  lessonPenalty: 2,
  usageBonus: 3,
  priorityThresholds: { critical: 50, high: 25, medium: 10 },
  minClusterSize: 4,
  bugfixCategories: ["bugfix", "bug", "fix", "hotfix", "regression", "security-fix"],
  actionableCategories: ["pattern", "feature", "feature-gap", "enhancement", "integration", "performance"],
  actionableTitleMarkers: ["pattern", "missing", "gap", "workaround", "should"],
  suggestionThreshold: 0.5,
};

export const DEFAULT_PORT = 3100;

export function resolvePolicy(overrides: AnalysisPolicyOverrides = {}): AnalysisPolicy {
  const policy: AnalysisPolicy = {
    ...DEFAULT_POLICY,
    ...overrides,
    priorityThresholds: { ...DEFAULT_POLICY.priorityThresholds, ...overrides.priorityThresholds },
  };

  const { critical, high, medium } = policy.priorityThresholds;
  if (!(critical >= high && high >= medium)) {
    throw new Error(
      `Invalid priority thresholds: expected critical >= high >= medium, got ${critical}/${high}/${medium}`
    );
  }
  return policy;
}

export function readPolicyFile(path: string): AnalysisPolicy {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Value.Check(AnalysisPolicyOverrides, raw)) {
    const first = Value.Errors(AnalysisPolicyOverrides, raw).First();
    throw new Error(`Invalid policy file ${path}: ${first ? `${first.path || "/"} ${first.message}` : "schema mismatch"}`);
  }
  return resolvePolicy(raw);
}

/** Registry location: explicit argument, then SKILL_GRAPH_REGISTRY, then ./registry.json */
export function resolveRegistryPath(explicit?: string): string {
  return explicit ?? process.env.SKILL_GRAPH_REGISTRY ?? "registry.json";
}

/** Policy from the file named by SKILL_GRAPH_POLICY, or the defaults when unset */
export function policyFromEnv(): AnalysisPolicy {
  const path = process.env.SKILL_GRAPH_POLICY;
  return path ? readPolicyFile(path) : DEFAULT_POLICY;
}
