export * from './lib/words'
export * from './lib/phonetics'
export * from './lib/performance'
export * from './lib/mistakes'
export * from './lib/textComparison'
export * from './lib/errors'
export * from './lib/scoringConfig'
export * from './lib/validation'
export * from './lib/scoring'
export * from './lib/trend'
export * from './lib/levels'
export * from './lib/streaks'
export * from './lib/logger'
export * from './store'
