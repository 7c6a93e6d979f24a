import { describe, it, expect } from 'vitest'
import { buildDependencyGraph, detectSkillCycles } from '../../scripts/skill-graph/graph.js'
import { dep, loadFixture, mod, skill, snapshotOf } from './helpers.js'

describe('buildDependencyGraph', () => {
  it('adds every name as a node with its kinds', () => {
    const { result } = buildDependencyGraph(loadFixture())
    expect(result.nodes.get('cms-sync')?.kinds).toEqual(['skill', 'module'])
    expect(result.nodes.get('webhook-signature')?.kinds).toEqual(['code-block'])
    expect(result.nodes.get('webhook-universal')?.kinds).toEqual(['unknown'])
    expect(result.nodes.get('analytics-tracking-v2')?.kinds).toEqual(['unknown'])
  })

  it('indexes edges in both directions', () => {
    const { result } = buildDependencyGraph(loadFixture())
    expect(result.edges).toHaveLength(15)
    expect(result.outgoing.get('S1')?.map((e) => e.targetName)).toEqual(['M1', 'M1', 'seo-audit'])
    expect(result.incoming.get('form-validation')?.map((e) => e.fromSkillName)).toEqual(['seo-audit', 'email-campaigns'])
  })

  it('reports self dependencies and cycles as warnings', () => {
    const { findings } = buildDependencyGraph(loadFixture())
    expect(findings.map((f) => [f.type, f.severity, f.skillName])).toEqual([
      ['SelfDependency', 'warning', 'S3'],
      ['CyclicSkillDependency', 'warning', 'loop-a'],
    ])
    expect(findings[0].message).toBe('Skill "S3" declares a dependency on itself.')
    expect(findings[1].message).toBe('Skills loop-a, loop-b depend on each other in a cycle: loop-a → loop-b → loop-a')
    expect(findings[1].members).toEqual(['loop-a', 'loop-b'])
    expect(findings[1].cyclePath).toEqual(['loop-a', 'loop-b', 'loop-a'])
  })

  it('keeps edges that take part in a cycle', () => {
    const { result } = buildDependencyGraph(loadFixture())
    expect(result.outgoing.get('loop-a')?.map((e) => e.targetName)).toEqual(['loop-b'])
  })
})

describe('detectSkillCycles', () => {
  it('finds a three-skill cycle including a skill declared as a module', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-a', 'a'), skill('s-b', 'b'), skill('s-c', 'c')],
      skillSkillDependencies: [dep('s-a', 'b'), dep('s-c', 'a')],
      skillModuleDependencies: [dep('s-b', 'c')],
    })
    expect(detectSkillCycles(snapshot)).toEqual([{ members: ['a', 'b', 'c'], path: ['a', 'b', 'c', 'a'] }])
  })

  it('walks declared edges when they run against name order', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-a', 'a'), skill('s-b', 'b'), skill('s-c', 'c')],
      skillSkillDependencies: [dep('s-a', 'c'), dep('s-c', 'b'), dep('s-b', 'a')],
    })
    expect(detectSkillCycles(snapshot)).toEqual([{ members: ['a', 'b', 'c'], path: ['a', 'c', 'b', 'a'] }])
    const cycle = buildDependencyGraph(snapshot).findings[0]
    expect(cycle.message).toBe('Skills a, b, c depend on each other in a cycle: a → c → b → a')
  })

  it('walks the shortest cycle through the first member of a larger component', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-a', 'a'), skill('s-b', 'b'), skill('s-c', 'c'), skill('s-d', 'd')],
      skillSkillDependencies: [dep('s-a', 'b'), dep('s-b', 'c'), dep('s-c', 'd'), dep('s-d', 'a'), dep('s-b', 'a')],
    })
    expect(detectSkillCycles(snapshot)).toEqual([{ members: ['a', 'b', 'c', 'd'], path: ['a', 'b', 'a'] }])
  })

  it('ignores self-edges and edges to unknown skills', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-a', 'a'), skill('s-b', 'b')],
      skillSkillDependencies: [dep('s-a', 'a'), dep('s-a', 'ghost'), dep('s-b', 'a')],
    })
    expect(detectSkillCycles(snapshot)).toEqual([])
  })

  it('ignores edges whose target is only a module', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-a', 'a')],
      modules: [mod('m-b', 'b')],
      skillModuleDependencies: [dep('s-a', 'b')],
    })
    expect(detectSkillCycles(snapshot)).toEqual([])
  })

  it('returns disjoint cycles sorted by first member', () => {
    const snapshot = snapshotOf({
      skills: [skill('1', 'z'), skill('2', 'y'), skill('3', 'b'), skill('4', 'a')],
      skillSkillDependencies: [dep('1', 'y'), dep('2', 'z'), dep('3', 'a'), dep('4', 'b')],
    })
    expect(detectSkillCycles(snapshot).map((c) => c.members)).toEqual([['a', 'b'], ['y', 'z']])
  })
})
