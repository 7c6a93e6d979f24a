import { describe, it, expect } from 'vitest'
import { DEFAULT_POLICY } from '../../scripts/skill-graph/config.js'
import {
  capSuppliedRelevance,
  classifyRelevance,
  higherRelevance,
  isActionNeeded,
  mapLessons,
  resolveLessonTarget,
} from '../../scripts/skill-graph/lessons.js'
import { lesson, loadFixture, mod, skill, snapshotOf } from './helpers.js'

describe('resolveLessonTarget', () => {
  const snapshot = loadFixture()

  it('prefers the module namespace', () => {
    expect(resolveLessonTarget('cms-sync', snapshot)).toBe('module')
  })

  it('falls back to skills', () => {
    expect(resolveLessonTarget('S1', snapshot)).toBe('skill')
  })

  it('leaves unknown names unresolved', () => {
    expect(resolveLessonTarget('ghost', snapshot)).toBeUndefined()
  })
})

describe('classifyRelevance', () => {
  const titled = (category: string, title = 'Plain title') => ({ category, title })

  it('marks bugfix lessons on modules as Critical', () => {
    expect(classifyRelevance(titled('bugfix'), 'module', DEFAULT_POLICY)).toBe('Critical')
  })

  it('marks bugfix lessons on skills as Actionable', () => {
    expect(classifyRelevance(titled('bugfix'), 'skill', DEFAULT_POLICY)).toBe('Actionable')
  })

  it('compares categories trimmed and case-insensitively', () => {
    expect(classifyRelevance(titled(' HotFix '), 'module', DEFAULT_POLICY)).toBe('Critical')
  })

  it('marks actionable categories', () => {
    expect(classifyRelevance(titled('performance'), 'module', DEFAULT_POLICY)).toBe('Actionable')
  })

  it('marks titles carrying a marker', () => {
    expect(classifyRelevance(titled('note', 'Workaround for flaky uploads'), 'module', DEFAULT_POLICY)).toBe('Actionable')
  })

  it('defaults to Informational', () => {
    expect(classifyRelevance(titled('note', 'Weekly retro'), 'module', DEFAULT_POLICY)).toBe('Informational')
  })

  it('follows a custom policy', () => {
    const policy = { ...DEFAULT_POLICY, bugfixCategories: ['incident'], actionableTitleMarkers: [] }
    expect(classifyRelevance(titled('incident'), 'module', policy)).toBe('Critical')
    expect(classifyRelevance(titled('bugfix', 'missing check'), 'module', policy)).toBe('Informational')
  })
})

describe('relevance helpers', () => {
  it('picks the higher relevance', () => {
    expect(higherRelevance('Informational', 'Critical')).toBe('Critical')
    expect(higherRelevance('Critical', 'Actionable')).toBe('Critical')
    expect(higherRelevance('Actionable', 'Actionable')).toBe('Actionable')
  })

  it('caps a supplied Critical at Actionable on skills', () => {
    expect(capSuppliedRelevance('Critical', 'skill')).toBe('Actionable')
    expect(capSuppliedRelevance('Critical', 'module')).toBe('Critical')
    expect(capSuppliedRelevance('Informational', 'skill')).toBe('Informational')
  })

  it('needs action for Critical and Actionable only', () => {
    expect(isActionNeeded('Critical')).toBe(true)
    expect(isActionNeeded('Actionable')).toBe(true)
    expect(isActionNeeded('Informational')).toBe(false)
  })
})

describe('mapLessons', () => {
  it('maps the fixture lessons', () => {
    const { mappings, unmapped, findings } = mapLessons(loadFixture(), DEFAULT_POLICY)
    expect(mappings).toEqual([
      { lessonId: 'les-1', targetName: 'M1', targetKind: 'module', relevance: 'Critical', actionNeeded: true },
      { lessonId: 'les-1', targetName: 'S1', targetKind: 'skill', relevance: 'Actionable', actionNeeded: true },
      { lessonId: 'les-2', targetName: 'M1', targetKind: 'module', relevance: 'Critical', actionNeeded: true },
      { lessonId: 'les-5', targetName: 'form-validation', targetKind: 'module', relevance: 'Actionable', actionNeeded: true },
      { lessonId: 'les-6', targetName: 'mobile-viewport', targetKind: 'module', relevance: 'Critical', actionNeeded: true },
    ])
    expect(unmapped).toEqual([
      { lessonId: 'les-3', title: 'Weekly retro', unresolvedTargets: [] },
      { lessonId: 'les-4', title: 'Notes from onboarding', unresolvedTargets: ['nope'] },
    ])
    expect(findings).toEqual([])
  })

  it('raises computed relevance to a supplied one', () => {
    const snapshot = snapshotOf({
      modules: [mod('m-1', 'M1')],
      lessons: [lesson('les-1', 'note', [{ name: 'M1', relevance: 'Actionable' }], 'Retro')],
    })
    expect(mapLessons(snapshot, DEFAULT_POLICY).mappings[0].relevance).toBe('Actionable')
  })

  it('does not let a supplied Critical exceed Actionable on a skill', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-1', 'S1')],
      lessons: [lesson('les-1', 'note', [{ name: 'S1', relevance: 'Critical' }], 'Retro')],
    })
    expect(mapLessons(snapshot, DEFAULT_POLICY).mappings).toEqual([
      { lessonId: 'les-1', targetName: 'S1', targetKind: 'skill', relevance: 'Actionable', actionNeeded: true },
    ])
  })

  it('flags a target that names both a module and a skill', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-1', 'dual')],
      modules: [mod('m-1', 'dual')],
      lessons: [lesson('les-1', 'note', ['dual', { name: 'dual', relevance: 'Actionable' }], 'Retro')],
    })
    const { mappings, findings } = mapLessons(snapshot, DEFAULT_POLICY)
    expect(mappings).toEqual([
      { lessonId: 'les-1', targetName: 'dual', targetKind: 'module', relevance: 'Actionable', actionNeeded: true },
    ])
    expect(findings).toEqual([
      {
        type: 'ResolvesToBoth',
        severity: 'warning',
        message: 'Lesson "les-1" targets "dual", which exists both as a module and as a skill; mapped to the module.',
        lessonId: 'les-1',
        targetName: 'dual',
      },
    ])
  })

  it('never lowers computed relevance to a supplied one', () => {
    const snapshot = snapshotOf({
      modules: [mod('m-1', 'M1')],
      lessons: [lesson('les-1', 'bugfix', [{ name: 'M1', relevance: 'Informational' }])],
    })
    expect(mapLessons(snapshot, DEFAULT_POLICY).mappings[0].relevance).toBe('Critical')
  })

  it('folds duplicate targets into one row', () => {
    const snapshot = snapshotOf({
      skills: [skill('s-1', 'S1')],
      lessons: [lesson('les-1', 'note', ['S1', 'S1', { name: 'S1', relevance: 'Actionable' }, 'S1'], 'Retro')],
    })
    const { mappings } = mapLessons(snapshot, DEFAULT_POLICY)
    expect(mappings).toEqual([
      { lessonId: 'les-1', targetName: 'S1', targetKind: 'skill', relevance: 'Actionable', actionNeeded: true },
    ])
  })

  it('lists each unresolved name once', () => {
    const snapshot = snapshotOf({ lessons: [lesson('les-1', 'note', ['a', 'b', 'a'])] })
    expect(mapLessons(snapshot, DEFAULT_POLICY).unmapped).toEqual([
      { lessonId: 'les-1', title: 'Lesson les-1', unresolvedTargets: ['a', 'b'] },
    ])
  })
})
