import { Type, Static } from '@sinclair/typebox'
import { DependencyKind, DependencyStrength, ModuleStatus, Relevance, UpgradePriority } from '../registry/enums.js'
import { Finding, ResolutionVerdict } from './finding.js'
import { AnalysisPolicy } from './policy.js'

export const ReportFormat = Type.Union([
  Type.Literal('text'),
  Type.Literal('structured'),
], { $id: 'ReportFormat' })

export type ReportFormat = Static<typeof ReportFormat>

// ─── (a) Dependency matrix ───────────────────────────────────────

export const MatrixCell = Type.Object({
  target: Type.String(),
  declaredKind: DependencyKind,
  strength: DependencyStrength,
  verdict: ResolutionVerdict,
})

export type MatrixCell = Static<typeof MatrixCell>

export const MatrixRow = Type.Object({
  skillId: Type.String(),
  skillName: Type.String(),
  dependencies: Type.Array(MatrixCell),
})

export type MatrixRow = Static<typeof MatrixRow>

export const DependencyMatrix = Type.Object({
  columns: Type.Array(Type.String(), { description: 'Distinct target names, sorted' }),
  rows: Type.Array(MatrixRow),
}, { $id: 'DependencyMatrix' })

export type DependencyMatrix = Static<typeof DependencyMatrix>

// ─── (b) Usage ranking ───────────────────────────────────────────

export const UsageEntry = Type.Object({
  name: Type.String(),
  count: Type.Integer({ minimum: 0 }),
  referringSkillIds: Type.Array(Type.String()),
}, { $id: 'UsageEntry' })

export type UsageEntry = Static<typeof UsageEntry>

// ─── (c) / (d) Reference defects ─────────────────────────────────

export const ReferenceSuggestion = Type.Object({
  name: Type.String(),
  kind: DependencyKind,
  similarity: Type.Number({ minimum: 0, maximum: 1 }),
})

export type ReferenceSuggestion = Static<typeof ReferenceSuggestion>

export const MissingReference = Type.Object({
  skillId: Type.String(),
  skillName: Type.String(),
  targetName: Type.String(),
  declaredKind: DependencyKind,
  strength: DependencyStrength,
  alternate: Type.Optional(Type.Literal('code-block')),
  suggestion: Type.Optional(ReferenceSuggestion),
}, { $id: 'MissingReference' })

export type MissingReference = Static<typeof MissingReference>

export const KindMismatchEntry = Type.Object({
  skillName: Type.String(),
  targetName: Type.String(),
  declaredKind: DependencyKind,
  actualKind: DependencyKind,
}, { $id: 'KindMismatchEntry' })

export type KindMismatchEntry = Static<typeof KindMismatchEntry>

/** A name that exists both as a module and as a skill, reached from a skill declaration or a lesson target */
export const AmbiguousReference = Type.Object({
  source: Type.Union([Type.Literal('skill'), Type.Literal('lesson')]),
  referrer: Type.String({ description: 'Declaring skill name, or lesson id' }),
  targetName: Type.String(),
  declaredKind: Type.Optional(DependencyKind),
}, { $id: 'AmbiguousReference' })

export type AmbiguousReference = Static<typeof AmbiguousReference>

// ─── (e) Orphans / health ────────────────────────────────────────

export const ModuleHealth = Type.Object({
  moduleName: Type.String(),
  category: Type.String(),
  status: ModuleStatus,
  lessonCount: Type.Integer({ minimum: 0 }),
  skillRefCount: Type.Integer({ minimum: 0 }),
  healthScore: Type.Number({ minimum: 0, maximum: 100 }),
  upgradePriority: UpgradePriority,
}, { $id: 'ModuleHealth', description: 'Fully derived per run from lesson mappings and usage.' })

export type ModuleHealth = Static<typeof ModuleHealth>

export const OrphanCluster = Type.Object({
  category: Type.String(),
  modules: Type.Array(ModuleHealth),
}, { $id: 'OrphanCluster' })

export type OrphanCluster = Static<typeof OrphanCluster>

// ─── (f) Recommendations ─────────────────────────────────────────

export const ProposedSkill = Type.Object({
  category: Type.String(),
  modules: Type.Array(Type.String()),
  rationale: Type.String(),
}, { $id: 'ProposedSkill' })

export type ProposedSkill = Static<typeof ProposedSkill>

export const WiringSuggestion = Type.Object({
  moduleName: Type.String(),
  category: Type.String(),
  skillName: Type.Union([Type.String(), Type.Null()], { description: 'null = no wiring candidate' }),
  score: Type.Integer({ minimum: 0 }),
}, { $id: 'WiringSuggestion' })

export type WiringSuggestion = Static<typeof WiringSuggestion>

// ─── (g) Summary ─────────────────────────────────────────────────

export const ReportSummary = Type.Object({
  totalSkills: Type.Integer({ minimum: 0 }),
  totalModules: Type.Integer({ minimum: 0 }),
  totalCodeBlocks: Type.Integer({ minimum: 0 }),
  totalLessons: Type.Integer({ minimum: 0 }),
  totalEdges: Type.Integer({ minimum: 0 }),
  resolvedCount: Type.Integer({ minimum: 0 }),
  orphanCount: Type.Integer({ minimum: 0 }),
  orphanPercent: Type.Number({ minimum: 0, maximum: 100 }),
  missingReferenceCount: Type.Integer({ minimum: 0 }),
  kindMismatchCount: Type.Integer({ minimum: 0 }),
  ambiguousCount: Type.Integer({ minimum: 0 }),
  selfDependencyCount: Type.Integer({ minimum: 0 }),
  cycleCount: Type.Integer({ minimum: 0 }),
  lessonMappingCount: Type.Integer({ minimum: 0 }),
  actionNeededCount: Type.Integer({ minimum: 0 }),
  unmappedLessonCount: Type.Integer({ minimum: 0 }),
  errorCount: Type.Integer({ minimum: 0 }),
  warningCount: Type.Integer({ minimum: 0 }),
}, { $id: 'ReportSummary' })

export type ReportSummary = Static<typeof ReportSummary>

// ─── Appendices ──────────────────────────────────────────────────

export const LessonMapping = Type.Object({
  lessonId: Type.String(),
  targetName: Type.String(),
  targetKind: DependencyKind,
  relevance: Relevance,
  actionNeeded: Type.Boolean(),
}, { $id: 'LessonMapping' })

export type LessonMapping = Static<typeof LessonMapping>

export const UnmappedLesson = Type.Object({
  lessonId: Type.String(),
  title: Type.String(),
  unresolvedTargets: Type.Array(Type.String()),
}, { $id: 'UnmappedLesson' })

export type UnmappedLesson = Static<typeof UnmappedLesson>

/**
 * Single output artifact of a run. Section order matches the text rendering:
 * matrix, usage, missing, kind mismatches, orphans, recommendations, summary,
 * then the health / structural / lesson appendices.
 */
export const SkillGraphReport = Type.Object({
  generated: Type.String({ format: 'date-time' }),
  policy: AnalysisPolicy,
  matrix: DependencyMatrix,
  usageRanking: Type.Array(UsageEntry),
  skillUsageRanking: Type.Array(UsageEntry),
  missingReferences: Type.Array(MissingReference),
  kindMismatches: Type.Array(KindMismatchEntry),
  ambiguousReferences: Type.Array(AmbiguousReference),
  orphans: Type.Array(OrphanCluster),
  proposedSkills: Type.Array(ProposedSkill),
  wiring: Type.Array(WiringSuggestion),
  summary: ReportSummary,
  moduleHealth: Type.Array(ModuleHealth),
  structuralWarnings: Type.Array(Finding),
  lessonMappings: Type.Array(LessonMapping),
  unmappedLessons: Type.Array(UnmappedLesson),
}, { $id: 'SkillGraphReport', description: 'Dependency-graph consistency and health report.' })

export type SkillGraphReport = Static<typeof SkillGraphReport>
