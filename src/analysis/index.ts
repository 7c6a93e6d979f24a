export * from './finding.js'
export * from './policy.js'
export * from './report.js'
