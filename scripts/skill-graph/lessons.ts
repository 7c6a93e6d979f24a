/**
 * Lesson Mapper
 *
 * Routes each lesson to the modules/skills it was tagged with and classifies
 * how urgently each target needs attention. Depends only on the snapshot.
 */

import type { AnalysisPolicy, Finding, LessonMapping, UnmappedLesson } from "../../src/analysis/index.js";
import {
  RELEVANCE_RANK,
  type DependencyKind,
  type LessonTarget,
  type LoadedLesson,
  type Relevance,
} from "../../src/registry/index.js";
import { ambiguousLessonTarget } from "./findings.js";
import type { Snapshot } from "./types.js";

export interface LessonMappingResult {
  mappings: LessonMapping[];
  unmapped: UnmappedLesson[];
  /** ResolvesToBoth warnings for targets that are both a module and a skill */
  findings: Finding[];
}

type ClassificationPolicy = Pick<AnalysisPolicy, "bugfixCategories" | "actionableCategories" | "actionableTitleMarkers">;

/** Module namespace wins when a name is both a module and a skill; mapLessons flags those */
export function resolveLessonTarget(name: string, snapshot: Snapshot): DependencyKind | undefined {
  if (snapshot.modules.has(name)) return "module";
  if (snapshot.skills.has(name)) return "skill";
  return undefined;
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

function inCategorySet(category: string, set: readonly string[]): boolean {
  const c = normalize(category);
  return set.some((entry) => normalize(entry) === c);
}

export function classifyRelevance(
  lesson: Pick<LoadedLesson, "category" | "title">,
  targetKind: DependencyKind,
  policy: ClassificationPolicy
): Relevance {
  const isBugfix = inCategorySet(lesson.category, policy.bugfixCategories);
  if (isBugfix && targetKind === "module") return "Critical";
  if (isBugfix) return "Actionable";
  if (inCategorySet(lesson.category, policy.actionableCategories)) return "Actionable";

  const title = lesson.title.toLowerCase();
  if (policy.actionableTitleMarkers.some((m) => m && title.includes(m.toLowerCase()))) return "Actionable";
  return "Informational";
}

export function higherRelevance(a: Relevance, b: Relevance): Relevance {
  return RELEVANCE_RANK[b] > RELEVANCE_RANK[a] ? b : a;
}

export function isActionNeeded(relevance: Relevance): boolean {
  return relevance === "Critical" || relevance === "Actionable";
}

/** Critical is reserved for module targets, whatever the source claims */
export function capSuppliedRelevance(supplied: Relevance, targetKind: DependencyKind): Relevance {
  return targetKind === "skill" && supplied === "Critical" ? "Actionable" : supplied;
}

function targetParts(target: LessonTarget): { name: string; supplied?: Relevance } {
  return typeof target === "string" ? { name: target } : { name: target.name, supplied: target.relevance };
}

export function mapLessons(snapshot: Snapshot, policy: ClassificationPolicy): LessonMappingResult {
  const mappings: LessonMapping[] = [];
  const unmapped: UnmappedLesson[] = [];
  const findings: Finding[] = [];

  for (const lesson of snapshot.lessons) {
    // keyed by target name; Map keeps first-seen order, later duplicates only raise relevance
    const rows = new Map<string, LessonMapping>();
    const unresolved: string[] = [];
    const ambiguous = new Set<string>();

    for (const target of lesson.targets) {
      const { name, supplied } = targetParts(target);
      const targetKind = resolveLessonTarget(name, snapshot);
      if (!targetKind) {
        if (!unresolved.includes(name)) unresolved.push(name);
        continue;
      }

      if (targetKind === "module" && snapshot.skills.has(name) && !ambiguous.has(name)) {
        ambiguous.add(name);
        findings.push(ambiguousLessonTarget(lesson.id, name));
      }

      const computed = classifyRelevance(lesson, targetKind, policy);
      const candidate = supplied ? higherRelevance(computed, capSuppliedRelevance(supplied, targetKind)) : computed;
      const existing = rows.get(name);
      const relevance = existing ? higherRelevance(existing.relevance, candidate) : candidate;
      rows.set(name, {
        lessonId: lesson.id,
        targetName: name,
        targetKind,
        relevance,
        actionNeeded: isActionNeeded(relevance),
      });
    }

    if (rows.size === 0) {
      unmapped.push({ lessonId: lesson.id, title: lesson.title, unresolvedTargets: unresolved });
    } else {
      mappings.push(...rows.values());
    }
  }

  return { mappings, unmapped, findings };
}
