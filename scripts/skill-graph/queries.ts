/**
 * Read-only views over a finished run, shaped for MCP tool and REST responses.
 */

import type { ModuleHealth, ReportSummary, ResolutionVerdict } from "../../src/analysis/index.js";
import type { DependencyKind } from "../../src/registry/index.js";
import { resolveTarget } from "./consistency.js";
import { suggestReference } from "./gaps.js";
import { compareNames } from "./order.js";
import type { AnalysisRun } from "./pipeline.js";

export interface ResolutionView {
  name: string;
  declaredKind: DependencyKind;
  verdict: ResolutionVerdict;
  existsAsModule: boolean;
  existsAsSkill: boolean;
  existsAsCodeBlock: boolean;
  suggestion?: { name: string; kind: DependencyKind; similarity: number };
}

export function resolveReference(run: AnalysisRun, name: string, declaredKind: DependencyKind): ResolutionView {
  const { snapshot, report } = run;
  const verdict = resolveTarget(name, declaredKind, snapshot);
  const suggestion =
    verdict === "Missing"
      ? suggestReference(name, declaredKind, snapshot, report.policy.suggestionThreshold)
      : undefined;
  return {
    name,
    declaredKind,
    verdict,
    existsAsModule: snapshot.modules.has(name),
    existsAsSkill: snapshot.skills.has(name),
    existsAsCodeBlock: snapshot.codeBlocks.has(name),
    ...(suggestion && { suggestion }),
  };
}

export interface ModuleView {
  health: ModuleHealth;
  description: string;
  referringSkills: string[];
  lessons: { lessonId: string; relevance: string; actionNeeded: boolean }[];
  wiring?: { skillName: string | null; score: number };
}

export function moduleDetail(run: AnalysisRun, name: string): ModuleView | { error: string; suggestions: string[] } {
  const mod = run.snapshot.modules.get(name);
  const health = run.health.find((h) => h.moduleName === name);
  if (!mod || !health) {
    const q = name.toLowerCase();
    const suggestions = [...run.snapshot.modules.keys()].filter((n) => n.toLowerCase().includes(q)).slice(0, 5);
    return { error: `Module "${name}" not found`, suggestions };
  }

  const referringIds = run.usage.modules.get(name)?.referringSkillIds ?? new Set<string>();
  const referringSkills = [...referringIds]
    .map((id) => run.snapshot.skillsById.get(id)?.name ?? id)
    .sort(compareNames);
  const lessons = run.lessons.mappings
    .filter((m) => m.targetKind === "module" && m.targetName === name)
    .map((m) => ({ lessonId: m.lessonId, relevance: m.relevance, actionNeeded: m.actionNeeded }));
  const wiring = run.gaps.wiring.find((w) => w.moduleName === name);

  return {
    health,
    description: mod.description,
    referringSkills,
    lessons,
    ...(wiring && { wiring: { skillName: wiring.skillName, score: wiring.score } }),
  };
}

export function summaryView(run: AnalysisRun): ReportSummary & { generated: string; topUsed: { name: string; count: number }[] } {
  return {
    generated: run.report.generated,
    ...run.report.summary,
    topUsed: run.report.usageRanking.slice(0, 10).map((u) => ({ name: u.name, count: u.count })),
  };
}

export function orphanView(run: AnalysisRun, category?: string) {
  const clusters = category ? run.report.orphans.filter((c) => c.category === category) : run.report.orphans;
  return {
    orphanCount: clusters.reduce((n, c) => n + c.modules.length, 0),
    clusters,
  };
}

export function recommendationView(run: AnalysisRun) {
  return {
    proposedSkills: run.report.proposedSkills,
    wiring: run.report.wiring,
    missingReferences: run.report.missingReferences.filter((m) => m.suggestion !== undefined),
  };
}
