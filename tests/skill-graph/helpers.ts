import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { loadRegistry, readRegistryFile } from '../../scripts/skill-graph/loader.js'
import type { Snapshot } from '../../scripts/skill-graph/types.js'

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures')

export function fixturePath(name: string): string {
  return join(FIXTURES, name)
}

export function loadFixture(): Snapshot {
  return readRegistryFile(fixturePath('registry.json'))
}

export const skill = (id: string, name: string) => ({ id, name, description: '', kind: 'guide' })

export const mod = (id: string, name: string, category = 'general') => ({
  id,
  name,
  description: '',
  category,
  status: 'active',
})

export const dep = (skillId: string, target: string, strength = 'required') => ({ skillId, target, strength })

export const lesson = (id: string, category: string, targets: unknown[], title = `Lesson ${id}`) => ({
  id,
  title,
  content: '',
  category,
  sourceProject: 'test-project',
  targets,
})

interface RegistryParts {
  skills?: unknown[]
  modules?: unknown[]
  codeBlocks?: unknown[]
  lessons?: unknown[]
  skillModuleDependencies?: unknown[]
  skillSkillDependencies?: unknown[]
}

export function snapshotOf(parts: RegistryParts): Snapshot {
  return loadRegistry(parts)
}
