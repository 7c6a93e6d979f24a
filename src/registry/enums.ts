import { Type, Static } from '@sinclair/typebox'

/** Entity kind a dependency declaration claims to point at */
export const DependencyKind = Type.Union([
  Type.Literal('module'),
  Type.Literal('skill'),
], { $id: 'DependencyKind', description: 'Declared kind of a dependency target' })

export type DependencyKind = Static<typeof DependencyKind>

/**
 * Strength as written in the registry export.
 * Legacy letter codes: R = required, D = direct (required), O = optional.
 */
export const DeclaredStrength = Type.Union([
  Type.Literal('required'),
  Type.Literal('optional'),
  Type.Literal('R'),
  Type.Literal('D'),
  Type.Literal('O'),
], { $id: 'DeclaredStrength', description: 'Dependency strength as declared (long form or legacy letter code)' })

export type DeclaredStrength = Static<typeof DeclaredStrength>

/** Normalized strength. Display only; never used for scoring */
export const DependencyStrength = Type.Union([
  Type.Literal('required'),
  Type.Literal('optional'),
], { $id: 'DependencyStrength', description: 'Normalized dependency strength' })

export type DependencyStrength = Static<typeof DependencyStrength>

/**
 * Lifecycle status as exported. Known values are active, beta, deprecated and
 * planned; any other string passes through unchanged.
 */
export const ModuleStatus = Type.String({
  $id: 'ModuleStatus',
  description: 'Module lifecycle status',
  examples: ['active', 'beta', 'deprecated', 'planned'],
})

export type ModuleStatus = Static<typeof ModuleStatus>

/** Lesson relevance, ascending: Informational < Actionable < Critical */
export const Relevance = Type.Union([
  Type.Literal('Critical'),
  Type.Literal('Actionable'),
  Type.Literal('Informational'),
], { $id: 'Relevance', description: 'Relevance of a lesson to one target' })

export type Relevance = Static<typeof Relevance>

export const UpgradePriority = Type.Union([
  Type.Literal('Critical'),
  Type.Literal('High'),
  Type.Literal('Medium'),
  Type.Literal('Low'),
], { $id: 'UpgradePriority', description: 'Usage-independent triage tier derived from lesson volume' })

export type UpgradePriority = Static<typeof UpgradePriority>

export const RELEVANCE_RANK: Record<Relevance, number> = {
  Informational: 0,
  Actionable: 1,
  Critical: 2,
}

export const PRIORITY_RANK: Record<UpgradePriority, number> = {
  Low: 0,
  Medium: 1,
  High: 2,
  Critical: 3,
}
