/**
 * Skill Graph — analysis pipeline
 *
 * Fork-join over one frozen snapshot:
 *   [graph → consistency → usage] ‖ [lesson mapping]
 *   → health → gaps → report
 * Stages return results and findings; nothing is mutated across stages.
 */

import type { AnalysisPolicy, Finding, ModuleHealth, ReportSummary, SkillGraphReport } from "../../src/analysis/index.js";
import { checkConsistency, isResolved } from "./consistency.js";
import { DEFAULT_POLICY } from "./config.js";
import { countFindings, mergeFindings } from "./findings.js";
import { analyzeGaps, type GapAnalysis } from "./gaps.js";
import { buildDependencyGraph } from "./graph.js";
import { scoreModuleHealth } from "./health.js";
import { mapLessons, type LessonMappingResult } from "./lessons.js";
import { buildReport } from "./report.js";
import { aggregateUsage } from "./usage.js";
import type { DependencyGraph, ResolvedEdge, Snapshot, UsageIndex } from "./types.js";

export interface AnalysisRun {
  snapshot: Snapshot;
  graph: DependencyGraph;
  resolved: ResolvedEdge[];
  usage: UsageIndex;
  lessons: LessonMappingResult;
  health: ModuleHealth[];
  gaps: GapAnalysis;
  findings: Finding[];
  report: SkillGraphReport;
}

export interface RunOptions {
  policy?: AnalysisPolicy;
  generatedAt?: Date;
}

export function summarize(
  snapshot: Snapshot,
  resolved: readonly ResolvedEdge[],
  lessons: LessonMappingResult,
  gaps: GapAnalysis,
  findings: readonly Finding[]
): ReportSummary {
  const totalModules = snapshot.modules.size;
  const orphanCount = gaps.orphans.reduce((n, c) => n + c.modules.length, 0);
  return {
    totalSkills: snapshot.skills.size,
    totalModules,
    totalCodeBlocks: snapshot.codeBlocks.size,
    totalLessons: snapshot.lessons.length,
    totalEdges: resolved.length,
    resolvedCount: resolved.filter((e) => isResolved(e.verdict)).length,
    orphanCount,
    orphanPercent: totalModules === 0 ? 0 : Math.round((orphanCount / totalModules) * 1000) / 10,
    missingReferenceCount: countFindings(findings, "Missing"),
    kindMismatchCount: countFindings(findings, "KindMismatch"),
    ambiguousCount: countFindings(findings, "ResolvesToBoth"),
    selfDependencyCount: countFindings(findings, "SelfDependency"),
    cycleCount: countFindings(findings, "CyclicSkillDependency"),
    lessonMappingCount: lessons.mappings.length,
    actionNeededCount: lessons.mappings.filter((m) => m.actionNeeded).length,
    unmappedLessonCount: lessons.unmapped.length,
    errorCount: findings.filter((f) => f.severity === "error").length,
    warningCount: findings.filter((f) => f.severity === "warning").length,
  };
}

export async function runAnalysis(snapshot: Snapshot, options: RunOptions = {}): Promise<AnalysisRun> {
  const policy = options.policy ?? DEFAULT_POLICY;

  const [structure, lessons] = await Promise.all([
    Promise.resolve().then(() => {
      const graph = buildDependencyGraph(snapshot);
      const consistency = checkConsistency(snapshot, graph.result);
      const usage = aggregateUsage(snapshot, consistency.result);
      return {
        graph: graph.result,
        resolved: consistency.result,
        usage,
        findings: mergeFindings(graph.findings, consistency.findings),
      };
    }),
    Promise.resolve().then(() => mapLessons(snapshot, policy)),
  ]);

  const findings = mergeFindings(structure.findings, lessons.findings);
  const health = scoreModuleHealth(snapshot, structure.usage, lessons.mappings, policy);
  const gaps = analyzeGaps(snapshot, health, structure.resolved, policy);
  const summary = summarize(snapshot, structure.resolved, lessons, gaps, findings);

  const report = buildReport({
    generated: (options.generatedAt ?? new Date()).toISOString(),
    policy,
    snapshot,
    resolved: structure.resolved,
    usage: structure.usage,
    health,
    gaps,
    mappings: lessons.mappings,
    unmapped: lessons.unmapped,
    findings,
    summary,
  });

  return {
    snapshot,
    graph: structure.graph,
    resolved: structure.resolved,
    usage: structure.usage,
    lessons,
    health,
    gaps,
    findings,
    report,
  };
}

export function hasErrorFindings(run: Pick<AnalysisRun, "findings">): boolean {
  return run.findings.some((f) => f.severity === "error");
}
