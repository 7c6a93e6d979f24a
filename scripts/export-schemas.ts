/**
 * Publishes the registry and analysis contracts as JSON Schema.
 *
 * schemas/registry/ describes what the loader accepts (RegistryExport and its
 * records), schemas/analysis/ what a run produces (SkillGraphReport, Finding)
 * and the policy file format. schemas/index.json names the entry points and
 * lists every schema id per group.
 *
 *   npm run schemas [-- <outDir>]
 */
import { writeFileSync, mkdirSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath, pathToFileURL } from 'node:url'
import { KindGuard } from '@sinclair/typebox'

import * as registry from '../src/registry/index.js'
import * as analysis from '../src/analysis/index.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
export const DEFAULT_SCHEMAS_DIR = join(__dirname, '..', 'schemas')

const contracts: Record<string, Record<string, unknown>> = {
  registry,
  analysis,
}

export const ENTRY_POINTS = {
  registryExport: 'registry/RegistryExport.json',
  report: 'analysis/SkillGraphReport.json',
  policyFile: 'analysis/AnalysisPolicyOverrides.json',
} as const

export interface SchemaManifest {
  entryPoints: typeof ENTRY_POINTS
  schemas: Record<string, string[]>
}

function writeJson(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, JSON.stringify(value, null, 2) + '\n')
}

export function exportSchemas(outDir: string = DEFAULT_SCHEMAS_DIR): SchemaManifest {
  const schemas: Record<string, string[]> = {}

  for (const [group, exports] of Object.entries(contracts)) {
    const ids = new Set<string>()
    for (const [exportName, schema] of Object.entries(exports)) {
      // rank tables and record defaults share the barrels
      if (!KindGuard.IsSchema(schema)) continue

      const id = typeof schema.$id === 'string' ? schema.$id : exportName
      if (ids.has(id)) continue
      writeJson(join(outDir, group, `${id}.json`), { ...schema, $id: id })
      ids.add(id)
    }
    schemas[group] = [...ids].sort()
  }

  const manifest: SchemaManifest = { entryPoints: ENTRY_POINTS, schemas }
  writeJson(join(outDir, 'index.json'), manifest)
  return manifest
}

if (process.argv[1] && import.meta.url === pathToFileURL(resolve(process.argv[1])).href) {
  const outDir = resolve(process.argv[2] ?? DEFAULT_SCHEMAS_DIR)
  const manifest = exportSchemas(outDir)
  const count = Object.values(manifest.schemas).reduce((n, ids) => n + ids.length, 0)
  console.log(`Exported ${count} schemas to ${outDir}`)
}
