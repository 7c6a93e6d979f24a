import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ENTRY_POINTS, exportSchemas } from '../scripts/export-schemas.js'

describe('exportSchemas', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'skill-graph-schemas-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function readJson(path: string): unknown {
    return JSON.parse(readFileSync(join(dir, path), 'utf-8'))
  }

  it('writes every entry point', () => {
    exportSchemas(dir)
    for (const path of Object.values(ENTRY_POINTS)) {
      expect(existsSync(join(dir, path))).toBe(true)
    }
  })

  it('groups schema ids by contract', () => {
    const { schemas } = exportSchemas(dir)
    expect(Object.keys(schemas)).toEqual(['registry', 'analysis'])
    expect(schemas.registry).toContain('RegistryExport')
    expect(schemas.registry).toContain('ModuleStatus')
    expect(schemas.analysis).toContain('SkillGraphReport')
    expect(schemas.analysis).not.toContain('Skill')
  })

  it('writes the manifest beside the schemas', () => {
    const manifest = exportSchemas(dir)
    expect(readJson('index.json')).toEqual(manifest)
  })

  it('requires only id and name on a skill record', () => {
    exportSchemas(dir)
    expect(readJson('registry/Skill.json')).toMatchObject({
      $id: 'Skill',
      type: 'object',
      required: ['id', 'name'],
    })
  })
})
