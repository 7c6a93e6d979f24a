import { Type, Static } from '@sinclair/typebox'
import { DependencyKind, DependencyStrength } from '../registry/enums.js'

/**
 * Resolution verdict for one dependency edge. ResolvesToModule and
 * ResolvesToSkill are the happy path (target exists only as the declared kind).
 */
export const ResolutionVerdict = Type.Union([
  Type.Literal('ResolvesToModule'),
  Type.Literal('ResolvesToSkill'),
  Type.Literal('ResolvesToBoth'),
  Type.Literal('KindMismatch'),
  Type.Literal('Missing'),
], { $id: 'ResolutionVerdict', description: 'Outcome of resolving a declared dependency against the registry' })

export type ResolutionVerdict = Static<typeof ResolutionVerdict>

export const FindingType = Type.Union([
  Type.Literal('Missing'),
  Type.Literal('KindMismatch'),
  Type.Literal('ResolvesToBoth'),
  Type.Literal('SelfDependency'),
  Type.Literal('CyclicSkillDependency'),
], { $id: 'FindingType' })

export type FindingType = Static<typeof FindingType>

/** error-level findings can fail a run via --fail-on-missing; warnings never affect exit status */
export const FindingSeverity = Type.Union([
  Type.Literal('error'),
  Type.Literal('warning'),
], { $id: 'FindingSeverity' })

export type FindingSeverity = Static<typeof FindingSeverity>

export const Finding = Type.Object({
  type: FindingType,
  severity: FindingSeverity,
  message: Type.String(),
  skillId: Type.Optional(Type.String()),
  lessonId: Type.Optional(Type.String({ description: 'Set when the finding comes from a lesson target' })),
  skillName: Type.Optional(Type.String()),
  targetName: Type.Optional(Type.String()),
  declaredKind: Type.Optional(DependencyKind),
  strength: Type.Optional(DependencyStrength),
  members: Type.Optional(Type.Array(Type.String(), { description: 'Skills forming a dependency cycle' })),
  cyclePath: Type.Optional(Type.Array(Type.String(), { description: 'Declared edges walked around the cycle, first member repeated at the end' })),
  alternate: Type.Optional(Type.Literal('code-block', { description: 'Target name matched the code-block namespace' })),
}, { $id: 'Finding', description: 'Structural defect found during a run. Findings are data, never thrown.' })

export type Finding = Static<typeof Finding>
