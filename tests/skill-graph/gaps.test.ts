import { describe, it, expect } from 'vitest'
import { DEFAULT_POLICY } from '../../scripts/skill-graph/config.js'
import { checkConsistency } from '../../scripts/skill-graph/consistency.js'
import { analyzeGaps, groupOrphans, jaccardSimilarity, suggestReference, suggestWiring } from '../../scripts/skill-graph/gaps.js'
import { buildDependencyGraph } from '../../scripts/skill-graph/graph.js'
import { scoreModuleHealth } from '../../scripts/skill-graph/health.js'
import { mapLessons } from '../../scripts/skill-graph/lessons.js'
import { aggregateUsage } from '../../scripts/skill-graph/usage.js'
import type { AnalysisPolicy } from '../../src/index.js'
import type { Snapshot } from '../../scripts/skill-graph/types.js'
import { dep, loadFixture, mod, skill, snapshotOf } from './helpers.js'

function gapsOf(snapshot: Snapshot, policy: AnalysisPolicy = DEFAULT_POLICY) {
  const resolved = checkConsistency(snapshot, buildDependencyGraph(snapshot).result).result
  const usage = aggregateUsage(snapshot, resolved)
  const health = scoreModuleHealth(snapshot, usage, mapLessons(snapshot, policy).mappings, policy)
  return { health, gaps: analyzeGaps(snapshot, health, resolved, policy) }
}

describe('groupOrphans', () => {
  it('groups unused modules by category', () => {
    const { health } = gapsOf(loadFixture())
    const clusters = groupOrphans(health)
    expect(clusters.map((c) => [c.category, c.modules.map((m) => m.moduleName)])).toEqual([
      ['cms', ['cms-sync']],
      ['deployment', ['legacy-ftp']],
      ['forms', ['form-spam-guard']],
      ['mobile-ux', ['mobile-gestures', 'mobile-nav', 'mobile-offline', 'mobile-push', 'mobile-viewport']],
    ])
  })

  it('contains exactly the modules with no referring skill', () => {
    const { health } = gapsOf(loadFixture())
    const orphanNames = groupOrphans(health).flatMap((c) => c.modules.map((m) => m.moduleName)).sort()
    const unused = health.filter((h) => h.skillRefCount === 0).map((h) => h.moduleName).sort()
    expect(orphanNames).toEqual(unused)
  })

  it('carries health scores', () => {
    const { gaps } = gapsOf(loadFixture())
    const viewport = gaps.orphans[3].modules.find((m) => m.moduleName === 'mobile-viewport')
    expect(viewport?.healthScore).toBe(98)
  })
})

describe('analyzeGaps', () => {
  it('proposes one skill for the five mobile-ux orphans', () => {
    const { gaps } = gapsOf(loadFixture())
    expect(gaps.proposedSkills).toEqual([
      {
        category: 'mobile-ux',
        modules: ['mobile-gestures', 'mobile-nav', 'mobile-offline', 'mobile-push', 'mobile-viewport'],
        rationale: '5 orphan modules share category "mobile-ux" and no existing skill declares more than one of them.',
      },
    ])
  })

  it('suggests wiring for the remaining orphans', () => {
    const { gaps } = gapsOf(loadFixture())
    expect(gaps.wiring).toEqual([
      { moduleName: 'cms-sync', category: 'cms', skillName: null, score: 0 },
      { moduleName: 'legacy-ftp', category: 'deployment', skillName: null, score: 0 },
      { moduleName: 'form-spam-guard', category: 'forms', skillName: 'email-campaigns', score: 1 },
    ])
  })

  it('wires a small cluster instead of proposing a skill', () => {
    const { gaps } = gapsOf(loadFixture(), { ...DEFAULT_POLICY, minClusterSize: 6 })
    expect(gaps.proposedSkills).toEqual([])
    expect(gaps.wiring.map((w) => w.moduleName)).toEqual([
      'cms-sync',
      'legacy-ftp',
      'form-spam-guard',
      'mobile-gestures',
      'mobile-nav',
      'mobile-offline',
      'mobile-push',
      'mobile-viewport',
    ])
  })

  it('does not propose a cluster that one skill already declares two members of', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-1', 'ui-kit')],
      modules: [mod('m-1', 'ui-a', 'ui'), mod('m-2', 'ui-b', 'ui'), mod('m-3', 'ui-c', 'ui'), mod('m-4', 'ui-d', 'ui')],
      skillSkillDependencies: [dep('s-1', 'ui-a'), dep('s-1', 'ui-b')],
    })
    const { gaps } = gapsOf(snapshot)
    expect(gaps.orphans[0].modules).toHaveLength(4)
    expect(gaps.proposedSkills).toEqual([])
    expect(gaps.wiring).toHaveLength(4)
  })

  it('proposes a cluster whose members are each declared by different skills', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-1', 'one'), skill('s-2', 'two')],
      modules: [mod('m-1', 'ui-a', 'ui'), mod('m-2', 'ui-b', 'ui'), mod('m-3', 'ui-c', 'ui'), mod('m-4', 'ui-d', 'ui')],
      skillSkillDependencies: [dep('s-1', 'ui-a'), dep('s-2', 'ui-b')],
    })
    expect(gapsOf(snapshot).gaps.proposedSkills.map((p) => p.modules)).toEqual([['ui-a', 'ui-b', 'ui-c', 'ui-d']])
  })

  it('offers a did-you-mean hint for missing references', () => {
    const { gaps } = gapsOf(loadFixture())
    expect([...gaps.referenceSuggestions]).toEqual([
      ['analytics-tracking-v2', { name: 'analytics-tracking', kind: 'module', similarity: 0.67 }],
    ])
  })
})

describe('suggestWiring', () => {
  const orphan = {
    moduleName: 'orphan',
    category: 'forms',
    status: 'active' as const,
    lessonCount: 0,
    skillRefCount: 0,
    healthScore: 100,
    upgradePriority: 'Low' as const,
  }

  it('picks the skill covering the most modules of the category', () => {
    const coverage = new Map([
      ['alpha', new Map([['forms', new Set(['f1'])]])],
      ['beta', new Map([['forms', new Set(['f1', 'f2'])]])],
    ])
    expect(suggestWiring(orphan, coverage)).toEqual({ moduleName: 'orphan', category: 'forms', skillName: 'beta', score: 2 })
  })

  it('breaks ties by the smallest skill name', () => {
    const coverage = new Map([
      ['zeta', new Map([['forms', new Set(['f1'])]])],
      ['eta', new Map([['forms', new Set(['f2'])]])],
    ])
    expect(suggestWiring(orphan, coverage).skillName).toBe('eta')
  })

  it('reports no candidate when nothing covers the category', () => {
    const coverage = new Map([['alpha', new Map([['cms', new Set(['c1'])]])]])
    expect(suggestWiring(orphan, coverage)).toEqual({ moduleName: 'orphan', category: 'forms', skillName: null, score: 0 })
  })
})

describe('jaccardSimilarity', () => {
  it('divides shared tokens by all tokens', () => {
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3)
    expect(jaccardSimilarity(new Set(['a']), new Set(['a']))).toBe(1)
    expect(jaccardSimilarity(new Set(), new Set())).toBe(1)
    expect(jaccardSimilarity(new Set(['a']), new Set())).toBe(0)
  })
})

describe('suggestReference', () => {
  const snapshot = snapshotOf({
    skills: [skill('s-1', 'export-report')],
    modules: [mod('m-1', 'report-export'), mod('m-2', 'report-archive')],
  })

  it('prefers the declared kind on a tie', () => {
    expect(suggestReference('report_export', 'skill', snapshot, 0.5)).toEqual({
      name: 'export-report',
      kind: 'skill',
      similarity: 1,
    })
    expect(suggestReference('report_export', 'module', snapshot, 0.5)).toEqual({
      name: 'report-export',
      kind: 'module',
      similarity: 1,
    })
  })

  it('ignores case when tokenizing', () => {
    expect(suggestReference('Report-Archive', 'module', snapshot, 0.5)?.name).toBe('report-archive')
  })

  it('returns nothing below the threshold', () => {
    expect(suggestReference('report-pdf', 'module', snapshot, 0.5)).toBeUndefined()
  })
})
