/**
 * Report Generator
 *
 * Assembles stage outputs into the SkillGraphReport sections and renders
 * them as structured JSON or markdown text. Ordering and counting happen
 * upstream; this module only arranges and formats.
 */

import type {
  AnalysisPolicy,
  AmbiguousReference,
  DependencyMatrix,
  Finding,
  KindMismatchEntry,
  LessonMapping,
  MatrixCell,
  MissingReference,
  ModuleHealth,
  ReportFormat,
  ReportSummary,
  ResolutionVerdict,
  SkillGraphReport,
  UnmappedLesson,
} from "../../src/analysis/index.js";
import type { GapAnalysis } from "./gaps.js";
import { compareNames } from "./order.js";
import { rankModuleUsage, rankSkillUsage } from "./usage.js";
import type { ResolvedEdge, Snapshot, UsageIndex } from "./types.js";

export interface ReportInputs {
  generated: string;
  policy: AnalysisPolicy;
  snapshot: Snapshot;
  resolved: readonly ResolvedEdge[];
  usage: UsageIndex;
  health: readonly ModuleHealth[];
  gaps: GapAnalysis;
  mappings: readonly LessonMapping[];
  unmapped: readonly UnmappedLesson[];
  findings: readonly Finding[];
  summary: ReportSummary;
}

// ─── Assembly ────────────────────────────────────────────────────

function buildMatrix(snapshot: Snapshot, resolved: readonly ResolvedEdge[]): DependencyMatrix {
  const bySkill = new Map<string, MatrixCell[]>();
  for (const e of resolved) {
    const cell: MatrixCell = { target: e.targetName, declaredKind: e.declaredKind, strength: e.strength, verdict: e.verdict };
    const cells = bySkill.get(e.fromSkillId);
    if (cells) cells.push(cell);
    else bySkill.set(e.fromSkillId, [cell]);
  }
  return {
    columns: [...new Set(resolved.map((e) => e.targetName))].sort(compareNames),
    rows: [...snapshot.skills.values()].map((s) => ({
      skillId: s.id,
      skillName: s.name,
      dependencies: bySkill.get(s.id) ?? [],
    })),
  };
}

export function buildReport(inputs: ReportInputs): SkillGraphReport {
  const { resolved, gaps } = inputs;

  const missingReferences: MissingReference[] = resolved
    .filter((e) => e.verdict === "Missing")
    .map((e): MissingReference => {
      const suggestion = gaps.referenceSuggestions.get(e.targetName);
      return {
        skillId: e.fromSkillId,
        skillName: e.fromSkillName,
        targetName: e.targetName,
        declaredKind: e.declaredKind,
        strength: e.strength,
        ...(e.alternate && { alternate: e.alternate }),
        ...(suggestion && { suggestion }),
      };
    });

  const kindMismatches: KindMismatchEntry[] = resolved
    .filter((e) => e.verdict === "KindMismatch")
    .map((e): KindMismatchEntry => ({
      skillName: e.fromSkillName,
      targetName: e.targetName,
      declaredKind: e.declaredKind,
      actualKind: e.declaredKind === "module" ? "skill" : "module",
    }));

  const ambiguousReferences: AmbiguousReference[] = [
    ...resolved
      .filter((e) => e.verdict === "ResolvesToBoth")
      .map((e): AmbiguousReference => ({
        source: "skill",
        referrer: e.fromSkillName,
        targetName: e.targetName,
        declaredKind: e.declaredKind,
      })),
    ...inputs.findings.flatMap((f): AmbiguousReference[] =>
      f.type === "ResolvesToBoth" && f.lessonId !== undefined && f.targetName !== undefined
        ? [{ source: "lesson", referrer: f.lessonId, targetName: f.targetName }]
        : []
    ),
  ];

  return {
    generated: inputs.generated,
    policy: inputs.policy,
    matrix: buildMatrix(inputs.snapshot, resolved),
    usageRanking: rankModuleUsage(inputs.usage),
    skillUsageRanking: rankSkillUsage(inputs.usage),
    missingReferences,
    kindMismatches,
    ambiguousReferences,
    orphans: gaps.orphans,
    proposedSkills: gaps.proposedSkills,
    wiring: gaps.wiring,
    summary: inputs.summary,
    moduleHealth: [...inputs.health],
    structuralWarnings: inputs.findings.filter((f) => f.type === "SelfDependency" || f.type === "CyclicSkillDependency"),
    lessonMappings: [...inputs.mappings],
    unmappedLessons: [...inputs.unmapped],
  };
}

// ─── Text rendering ──────────────────────────────────────────────

const VERDICT_MARK: Record<ResolutionVerdict, string> = {
  ResolvesToModule: "",
  ResolvesToSkill: "",
  KindMismatch: "~",
  ResolvesToBoth: "?",
  Missing: "!",
};

function cell(value: string | number): string {
  return String(value).replace(/\|/g, "\\|").replace(/\n/g, " ");
}

function table(headers: string[], rows: (string | number)[][]): string[] {
  if (rows.length === 0) return ["_None._"];
  return [
    `| ${headers.join(" | ")} |`,
    `|${headers.map(() => "---").join("|")}|`,
    ...rows.map((r) => `| ${r.map(cell).join(" | ")} |`),
  ];
}

function matrixCell(cells: MatrixCell[]): string {
  return cells.map((c) => `${c.strength === "required" ? "R" : "O"}${VERDICT_MARK[c.verdict]}`).join(",");
}

function renderMatrix(matrix: DependencyMatrix): string[] {
  if (matrix.columns.length === 0) return ["_No dependencies declared._"];
  const rows = matrix.rows.map((r) => [
    r.skillName,
    ...matrix.columns.map((col) => matrixCell(r.dependencies.filter((d) => d.target === col))),
  ]);
  return [
    "Legend: R = required, O = optional; `!` missing, `~` kind mismatch, `?` both module and skill",
    "",
    ...table(["Skill", ...matrix.columns.map(cell)], rows),
  ];
}

export function renderText(report: SkillGraphReport): string {
  const s = report.summary;
  const lines: string[] = [
    "# Skill Graph Health Report",
    "",
    `Generated: ${report.generated}`,
    "",
    "## Dependency Matrix",
    "",
    ...renderMatrix(report.matrix),
    "",
    "## Usage Ranking",
    "",
    ...table(["#", "Module", "Skills"], report.usageRanking.map((u, i) => [i + 1, u.name, u.count])),
    "",
    "### Skills Used as Dependencies",
    "",
    ...table(["#", "Skill", "Skills"], report.skillUsageRanking.map((u, i) => [i + 1, u.name, u.count])),
    "",
    "## Missing References",
    "",
    ...table(
      ["Skill", "Target", "Declared", "Strength", "Hint"],
      report.missingReferences.map((m) => [
        m.skillName,
        m.targetName,
        m.declaredKind,
        m.strength,
        [
          m.alternate === "code-block" ? "matches a code block" : "",
          m.suggestion ? `did you mean ${m.suggestion.kind} "${m.suggestion.name}"?` : "",
        ].filter(Boolean).join("; "),
      ])
    ),
    "",
    "## Kind Mismatches",
    "",
    ...table(
      ["Skill", "Target", "Declared", "Actual"],
      report.kindMismatches.map((k) => [k.skillName, k.targetName, k.declaredKind, k.actualKind])
    ),
    "",
    "### Ambiguous References (module and skill)",
    "",
    ...table(
      ["Referrer", "Target", "Declared"],
      report.ambiguousReferences.map((a) => [
        a.source === "lesson" ? `lesson ${a.referrer}` : a.referrer,
        a.targetName,
        a.declaredKind ?? "-",
      ])
    ),
    "",
    "## Orphan Modules",
    "",
  ];

  if (report.orphans.length === 0) lines.push("_None._", "");
  for (const cluster of report.orphans) {
    lines.push(
      `### ${cluster.category} (${cluster.modules.length})`,
      "",
      ...table(
        ["Module", "Health", "Priority", "Lessons", "Status"],
        cluster.modules.map((m) => [m.moduleName, m.healthScore, m.upgradePriority, m.lessonCount, m.status])
      ),
      ""
    );
  }

  lines.push("## Recommendations", "", "### Proposed Skills", "");
  if (report.proposedSkills.length === 0) lines.push("_None._");
  for (const p of report.proposedSkills) {
    lines.push(`- **${p.category}**: ${p.modules.join(", ")} — ${p.rationale}`);
  }
  lines.push(
    "",
    "### Wiring",
    "",
    ...table(
      ["Orphan", "Category", "Suggested Skill", "Shared Modules"],
      report.wiring.map((w) => [w.moduleName, w.category, w.skillName ?? "(no wiring candidate)", w.score])
    ),
    "",
    "## Summary",
    "",
    ...table(["Metric", "Value"], [
      ["Total skills", s.totalSkills],
      ["Total modules", s.totalModules],
      ["Total code blocks", s.totalCodeBlocks],
      ["Total lessons", s.totalLessons],
      ["Dependency edges", s.totalEdges],
      ["Resolved edges", s.resolvedCount],
      ["Orphan modules", `${s.orphanCount} (${s.orphanPercent}%)`],
      ["Missing references", s.missingReferenceCount],
      ["Kind mismatches", s.kindMismatchCount],
      ["Ambiguous references", s.ambiguousCount],
      ["Self dependencies", s.selfDependencyCount],
      ["Skill cycles", s.cycleCount],
      ["Lesson mappings", s.lessonMappingCount],
      ["Mappings needing action", s.actionNeededCount],
      ["Unmapped lessons", s.unmappedLessonCount],
      ["Errors", s.errorCount],
      ["Warnings", s.warningCount],
    ]),
    "",
    "## Module Health",
    "",
    ...table(
      ["Module", "Category", "Lessons", "Skills", "Health", "Priority"],
      report.moduleHealth.map((h) => [h.moduleName, h.category, h.lessonCount, h.skillRefCount, h.healthScore, h.upgradePriority])
    ),
    "",
    "## Structural Warnings",
    "",
    ...(report.structuralWarnings.length === 0
      ? ["_None._"]
      : report.structuralWarnings.map((f) => `- [${f.type}] ${f.message}`)),
    "",
    "## Unmapped Lessons",
    "",
    ...table(
      ["Lesson", "Title", "Unresolved Targets"],
      report.unmappedLessons.map((u) => [u.lessonId, u.title, u.unresolvedTargets.join(", ") || "(none tagged)"])
    ),
    ""
  );

  return lines.join("\n");
}

export function renderReport(report: SkillGraphReport, format: ReportFormat): string {
  return format === "structured" ? JSON.stringify(report, null, 2) + "\n" : renderText(report);
}
