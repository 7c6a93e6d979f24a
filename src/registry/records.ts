import { Type, Static } from '@sinclair/typebox'
import { DeclaredStrength, ModuleStatus, Relevance } from './enums.js'

const RecordId = Type.String({ minLength: 1, description: 'Stable record identifier' })
const RecordName = Type.String({ minLength: 1, description: 'Unique display name' })

export const Skill = Type.Object({
  id: RecordId,
  name: RecordName,
  description: Type.Optional(Type.String()),
  kind: Type.Optional(Type.String({ description: 'Free-form kind tag (e.g. guide, integration, template)' })),
}, { $id: 'Skill', description: 'Declared unit of instructional content.' })

export type Skill = Static<typeof Skill>

export const Module = Type.Object({
  id: RecordId,
  name: RecordName,
  description: Type.Optional(Type.String()),
  category: Type.Optional(Type.String({ description: 'Clustering key for orphan analysis' })),
  status: Type.Optional(ModuleStatus),
}, { $id: 'Module', description: 'Reusable code/pattern unit referenced by skills. Declares no dependencies.' })

export type Module = Static<typeof Module>

export const CodeBlock = Type.Object({
  id: RecordId,
  name: RecordName,
  language: Type.Optional(Type.String()),
  tags: Type.Optional(Type.Array(Type.String())),
}, { $id: 'CodeBlock', description: 'Fine-grained reusable snippet. Resolution hint only, never scored.' })

export type CodeBlock = Static<typeof CodeBlock>

/** A lesson target is a bare name, or a name with a relevance the source already assigned */
export const LessonTarget = Type.Union([
  Type.String({ minLength: 1 }),
  Type.Object({
    name: Type.String({ minLength: 1 }),
    relevance: Relevance,
  }),
], { $id: 'LessonTarget' })

export type LessonTarget = Static<typeof LessonTarget>

export const Lesson = Type.Object({
  id: RecordId,
  title: Type.Optional(Type.String()),
  content: Type.Optional(Type.String()),
  category: Type.Optional(Type.String()),
  sourceProject: Type.Optional(Type.String()),
  targets: Type.Optional(Type.Array(LessonTarget)),
}, { $id: 'Lesson', description: 'Immutable field observation, pre-tagged with candidate targets.' })

export type Lesson = Static<typeof Lesson>

export const SkillModuleDeclaration = Type.Object({
  skillId: RecordId,
  target: Type.String({ minLength: 1, description: 'Module name as written by the skill author' }),
  strength: DeclaredStrength,
}, { $id: 'SkillModuleDeclaration', description: 'Skill→Module dependency as declared.' })

export type SkillModuleDeclaration = Static<typeof SkillModuleDeclaration>

export const SkillSkillDeclaration = Type.Object({
  skillId: RecordId,
  target: Type.String({ minLength: 1, description: 'Skill name as written by the skill author' }),
  strength: DeclaredStrength,
}, { $id: 'SkillSkillDeclaration', description: 'Skill→Skill dependency as declared.' })

export type SkillSkillDeclaration = Static<typeof SkillSkillDeclaration>

/**
 * Registry export envelope. Collections are validated record-by-record by the
 * loader so that a failure can name the offending record; the envelope itself
 * only asserts the collections are arrays.
 */
export const RegistryExport = Type.Object({
  skills: Type.Optional(Type.Array(Type.Unknown())),
  modules: Type.Optional(Type.Array(Type.Unknown())),
  codeBlocks: Type.Optional(Type.Array(Type.Unknown())),
  lessons: Type.Optional(Type.Array(Type.Unknown())),
  skillModuleDependencies: Type.Optional(Type.Array(Type.Unknown())),
  skillSkillDependencies: Type.Optional(Type.Array(Type.Unknown())),
}, { $id: 'RegistryExport', description: 'Raw registry export consumed by the loader.' })

export type RegistryExport = Static<typeof RegistryExport>

/**
 * Records as held in a loaded snapshot. The loader fills every optional
 * field: prose fields become empty strings, a module without a category is
 * `uncategorized`, a module without a status is `unspecified`.
 */
export type LoadedSkill = Required<Skill>
export type LoadedModule = Required<Module>
export type LoadedCodeBlock = Required<CodeBlock>
export type LoadedLesson = Required<Lesson>

export const DEFAULT_MODULE_CATEGORY = 'uncategorized'
export const DEFAULT_MODULE_STATUS = 'unspecified'
