export * from './enums.js'
export * from './records.js'
export * from './error.js'
