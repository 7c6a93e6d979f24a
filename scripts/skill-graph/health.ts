/**
 * Health Scorer
 *
 * healthScore is a continuous ranking signal over lesson volume and usage;
 * upgradePriority is a coarse tier over lesson volume alone, so a module
 * nobody uses yet still surfaces when lessons pile up against it.
 */

import type { AnalysisPolicy, LessonMapping, ModuleHealth, PriorityThresholds } from "../../src/analysis/index.js";
import type { UpgradePriority } from "../../src/registry/index.js";
import { DEFAULT_POLICY } from "./config.js";
import { compareNames } from "./order.js";
import { skillRefCount } from "./usage.js";
import type { Snapshot, UsageIndex } from "./types.js";

export function computeHealthScore(
  lessonCount: number,
  skillRefs: number,
  weights: Pick<AnalysisPolicy, "lessonPenalty" | "usageBonus"> = DEFAULT_POLICY
): number {
  const raw = 100 - lessonCount * weights.lessonPenalty + skillRefs * weights.usageBonus;
  return Math.round(Math.max(0, Math.min(100, raw)));
}

export function computeUpgradePriority(
  lessonCount: number,
  thresholds: PriorityThresholds = DEFAULT_POLICY.priorityThresholds
): UpgradePriority {
  if (lessonCount > thresholds.critical) return "Critical";
  if (lessonCount > thresholds.high) return "High";
  if (lessonCount > thresholds.medium) return "Medium";
  return "Low";
}

export function countModuleLessons(mappings: readonly LessonMapping[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const m of mappings) {
    if (m.targetKind !== "module") continue;
    counts.set(m.targetName, (counts.get(m.targetName) ?? 0) + 1);
  }
  return counts;
}

/** Worst first: lowest score, then the more heavily used module, then name */
export function compareHealth(a: ModuleHealth, b: ModuleHealth): number {
  return a.healthScore - b.healthScore || b.skillRefCount - a.skillRefCount || compareNames(a.moduleName, b.moduleName);
}

export function scoreModuleHealth(
  snapshot: Snapshot,
  usage: UsageIndex,
  mappings: readonly LessonMapping[],
  policy: AnalysisPolicy
): ModuleHealth[] {
  const lessonCounts = countModuleLessons(mappings);

  return [...snapshot.modules.values()]
    .map((m) => {
      const lessonCount = lessonCounts.get(m.name) ?? 0;
      const refs = skillRefCount(usage, m.name);
      return {
        moduleName: m.name,
        category: m.category,
        status: m.status,
        lessonCount,
        skillRefCount: refs,
        healthScore: computeHealthScore(lessonCount, refs, policy),
        upgradePriority: computeUpgradePriority(lessonCount, policy.priorityThresholds),
      };
    })
    .sort(compareHealth);
}
