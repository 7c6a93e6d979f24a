import { Type, Static } from '@sinclair/typebox'

export const LoadErrorCode = Type.Union([
  Type.Literal('MALFORMED_RECORD'),
  Type.Literal('DUPLICATE_RECORD'),
], { $id: 'LoadErrorCode', description: 'Fatal registry load error code' })

export type LoadErrorCode = Static<typeof LoadErrorCode>

export const RegistryCollection = Type.Union([
  Type.Literal('registry'),
  Type.Literal('skills'),
  Type.Literal('modules'),
  Type.Literal('codeBlocks'),
  Type.Literal('lessons'),
  Type.Literal('skillModuleDependencies'),
  Type.Literal('skillSkillDependencies'),
], { $id: 'RegistryCollection' })

export type RegistryCollection = Static<typeof RegistryCollection>

export const LoadFailure = Type.Object({
  code: LoadErrorCode,
  message: Type.String(),
  collection: RegistryCollection,
  index: Type.Optional(Type.Integer({ minimum: 0 })),
  recordId: Type.Optional(Type.String()),
  path: Type.Optional(Type.String({ description: 'JSON pointer of the failing field inside the record' })),
}, { $id: 'LoadFailure', description: 'Structured form of a fatal load error. No report is produced.' })

export type LoadFailure = Static<typeof LoadFailure>
