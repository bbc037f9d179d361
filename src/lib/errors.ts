import type { Locale } from './performance'

export type ScoringErrorCode =
  | 'InvalidAccuracy'
  | 'InvalidAttempts'
  | 'InvalidCompletionTime'
  | 'InvalidDifficulty'

const MESSAGES: Record<Locale, Record<ScoringErrorCode, string>> = {
  vi: {
    InvalidAccuracy: 'Độ chính xác phải từ 0.0 đến 1.0',
    InvalidAttempts: 'Số lần thử phải lớn hơn 0',
    InvalidCompletionTime: 'Thời gian hoàn thành không được âm',
    InvalidDifficulty: 'Mức độ khó không hợp lệ',
  },
  en: {
    InvalidAccuracy: 'Accuracy must be between 0.0 and 1.0',
    InvalidAttempts: 'Attempts must be a whole number of at least 1',
    InvalidCompletionTime: 'Completion time cannot be negative',
    InvalidDifficulty: 'Unknown difficulty level',
  },
}

export class ScoringError extends Error {
  readonly code: ScoringErrorCode

  constructor(code: ScoringErrorCode, locale: Locale = 'vi') {
    super(MESSAGES[locale][code])
    this.name = 'ScoringError'
    this.code = code
  }
}

/** Thrown when a scoring engine is built from an invalid config override. */
export class ScoringConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid scoring config: ${issues.join('; ')}`)
    this.name = 'ScoringConfigError'
    this.issues = issues
  }
}
