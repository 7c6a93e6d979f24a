/**
 * skill-graph-health — contracts for registry exports and health reports
 *
 * Wire format: camelCase JSON. Every schema is exported as JSON Schema by
 * `npm run schemas`.
 *
 * Subpath imports available:
 *   import { Skill, Module } from 'skill-graph-health/registry'
 *   import { SkillGraphReport } from 'skill-graph-health/analysis'
 */

export * from './registry/index.js'
export * from './analysis/index.js'
