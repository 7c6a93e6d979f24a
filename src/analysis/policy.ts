import { Type, Static } from '@sinclair/typebox'

export const PriorityThresholds = Type.Object({
  critical: Type.Integer({ minimum: 0, description: 'lessonCount above this is Critical' }),
  high: Type.Integer({ minimum: 0, description: 'lessonCount above this is High' }),
  medium: Type.Integer({ minimum: 0, description: 'lessonCount above this is Medium' }),
}, { $id: 'PriorityThresholds' })

export type PriorityThresholds = Static<typeof PriorityThresholds>

/** Tunable constants of a run. Defaults live in scripts/skill-graph/config.ts */
export const AnalysisPolicy = Type.Object({
  lessonPenalty: Type.Number({ minimum: 0 }),
  usageBonus: Type.Number({ minimum: 0 }),
  priorityThresholds: PriorityThresholds,
  minClusterSize: Type.Integer({ minimum: 2 }),
  bugfixCategories: Type.Array(Type.String()),
  actionableCategories: Type.Array(Type.String()),
  actionableTitleMarkers: Type.Array(Type.String()),
  suggestionThreshold: Type.Number({ minimum: 0, maximum: 1 }),
}, { $id: 'AnalysisPolicy', description: 'Scoring weights, tier thresholds and classification sets.' })

export type AnalysisPolicy = Static<typeof AnalysisPolicy>

export const AnalysisPolicyOverrides = Type.Object({
  lessonPenalty: Type.Optional(Type.Number({ minimum: 0 })),
  usageBonus: Type.Optional(Type.Number({ minimum: 0 })),
  priorityThresholds: Type.Optional(Type.Partial(PriorityThresholds)),
  minClusterSize: Type.Optional(Type.Integer({ minimum: 2 })),
  bugfixCategories: Type.Optional(Type.Array(Type.String())),
  actionableCategories: Type.Optional(Type.Array(Type.String())),
  actionableTitleMarkers: Type.Optional(Type.Array(Type.String())),
  suggestionThreshold: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
}, { $id: 'AnalysisPolicyOverrides', additionalProperties: false, description: 'Policy file contents (--policy). Unset fields keep their defaults.' })

export type AnalysisPolicyOverrides = Static<typeof AnalysisPolicyOverrides>
