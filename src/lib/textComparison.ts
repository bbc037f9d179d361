/**
 * Reading accuracy checker for young readers.
 * Aligns the expected text against what the child read (speech transcript,
 * typed or handwritten) and classifies every divergence.
 */

import type { Logger } from './logger'
import type { MistakeSeverity, MistakeType, TextMistake } from './mistakes'
import {
  categorizeAccuracy,
  categoryEmoji,
  encouragementFor,
  type Locale,
  type PerformanceCategory,
} from './performance'
import { arePhoneticallyClose, defaultPhoneticRules, type PhoneticRule } from './phonetics'
import { tokenize, type NormalizedWord } from './words'

// ============================================================================
// TYPES
// ============================================================================

export interface ComparisonResult {
  readonly originalText: string
  readonly spokenText: string
  /** 0 to 1 */
  readonly accuracy: number
  /** Ascending by position */
  readonly mistakes: readonly TextMistake[]
  /** Expected words read exactly, in text order */
  readonly matchedWords: readonly string[]
  readonly feedback: string
  readonly totalWords: number
  readonly correctWords: number
  readonly isPerfect: boolean
  readonly performanceCategory: PerformanceCategory
}

export type AlignedWord =
  | { status: 'correct'; position: number; expected: string; actual: string }
  | { status: 'substituted'; position: number; expected: string; actual: string }
  | { status: 'mispronounced'; position: number; expected: string; actual: string }
  | { status: 'missing'; position: number; expected: string }
  | { status: 'extra'; position: number; actual: string }

export interface TextComparisonOptions {
  phoneticRules?: readonly PhoneticRule[]
  locale?: Locale
  logger?: Logger
}

export interface TextComparisonEngine {
  compareTexts(original: string, spoken: string): ComparisonResult
  calculateAccuracy(original: string, spoken: string): number
  identifyMistakes(original: string, spoken: string): TextMistake[]
  alignWords(original: string, spoken: string): AlignedWord[]
  generateFeedback(result: Pick<ComparisonResult, 'accuracy'>): string
}

// ============================================================================
// ALIGNMENT
// ============================================================================

/**
 * Word-level edit-distance alignment (unit costs, exact match only).
 * Back-tracking prefers match/substitution, then a skipped word, then an
 * extra word, so ties resolve the same way on every call.
 */
function align(
  expected: NormalizedWord[],
  spoken: NormalizedWord[],
  rules: readonly PhoneticRule[]
): AlignedWord[] {
  const m = expected.length, n = spoken.length
  const dp: number[][] = Array.from({ length: m + 1 }, (_, i) =>
    Array.from({ length: n + 1 }, (_, j) => (i === 0 ? j : j === 0 ? i : 0))
  )

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      const cost = expected[i - 1] === spoken[j - 1] ? 0 : 1
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost)
    }
  }

  const out: AlignedWord[] = []
  let i = m, j = n
  while (i > 0 || j > 0) {
    if (i > 0 && j > 0) {
      const exp = expected[i - 1]
      const act = spoken[j - 1]
      const cost = exp === act ? 0 : 1
      if (dp[i][j] === dp[i - 1][j - 1] + cost) {
        const position = i - 1
        if (cost === 0) {
          out.push({ status: 'correct', position, expected: exp, actual: act })
        } else if (arePhoneticallyClose(exp, act, rules)) {
          out.push({ status: 'mispronounced', position, expected: exp, actual: act })
        } else {
          out.push({ status: 'substituted', position, expected: exp, actual: act })
        }
        i--
        j--
        continue
      }
    }

    if (i > 0 && (j === 0 || dp[i][j] === dp[i - 1][j] + 1)) {
      out.push({ status: 'missing', position: i - 1, expected: expected[i - 1] })
      i--
    } else {
      // Extra word sits before expected word i
      out.push({ status: 'extra', position: i, actual: spoken[j - 1] })
      j--
    }
  }

  return out.reverse()
}

const MISTAKE_KIND: Record<
  Exclude<AlignedWord['status'], 'correct'>,
  { mistakeType: MistakeType; severity: MistakeSeverity }
> = {
  substituted: { mistakeType: 'substitution', severity: 'moderate' },
  mispronounced: { mistakeType: 'mispronunciation', severity: 'minor' },
  missing: { mistakeType: 'omission', severity: 'moderate' },
  extra: { mistakeType: 'insertion', severity: 'minor' },
}

function toMistakes(alignment: AlignedWord[]): TextMistake[] {
  const mistakes: TextMistake[] = []
  for (const step of alignment) {
    if (step.status === 'correct') continue
    mistakes.push({
      position: step.position,
      expectedWord: step.status === 'extra' ? '' : step.expected,
      actualWord: step.status === 'missing' ? '' : step.actual,
      ...MISTAKE_KIND[step.status],
    })
  }
  return mistakes
}

function accuracyOf(totalWords: number, mistakes: readonly TextMistake[]): number {
  if (totalWords === 0) return 1
  // Extra words are recorded but don't cost accuracy
  const wrong = mistakes.filter(m => m.mistakeType !== 'insertion').length
  return Math.max(0, totalWords - wrong) / totalWords
}

// ============================================================================
// RESULTS
// ============================================================================

export function generateFeedback(
  result: Pick<ComparisonResult, 'accuracy'>,
  locale: Locale = 'vi'
): string {
  const category = categorizeAccuracy(result.accuracy)
  return `${encouragementFor(category, locale)} ${categoryEmoji(category)}`
}

export interface ComparisonParts {
  originalText: string
  spokenText: string
  accuracy: number
  mistakes: readonly TextMistake[]
  matchedWords: readonly string[]
  feedback?: string
}

/**
 * Build a result from its parts, deriving word counts and category.
 * Feedback is generated when not supplied.
 */
export function createComparisonResult(parts: ComparisonParts, locale: Locale = 'vi'): ComparisonResult {
  const totalWords = tokenize(parts.originalText).length
  const wrong = parts.mistakes.filter(m => m.mistakeType !== 'insertion').length
  return {
    originalText: parts.originalText,
    spokenText: parts.spokenText,
    accuracy: parts.accuracy,
    mistakes: parts.mistakes,
    matchedWords: parts.matchedWords,
    feedback: parts.feedback ?? generateFeedback(parts, locale),
    totalWords,
    correctWords: Math.max(0, totalWords - wrong),
    isPerfect: parts.accuracy === 1 && parts.mistakes.length === 0,
    performanceCategory: categorizeAccuracy(parts.accuracy),
  }
}

// ============================================================================
// ENGINE
// ============================================================================

export function createTextComparisonEngine(options: TextComparisonOptions = {}): TextComparisonEngine {
  const rules = options.phoneticRules ?? defaultPhoneticRules
  const locale = options.locale ?? 'vi'
  const logger = options.logger

  const alignWords = (original: string, spoken: string) =>
    align(tokenize(original), tokenize(spoken), rules)

  const identifyMistakes = (original: string, spoken: string) =>
    toMistakes(alignWords(original, spoken))

  return {
    alignWords,
    identifyMistakes,

    calculateAccuracy(original, spoken) {
      return accuracyOf(tokenize(original).length, identifyMistakes(original, spoken))
    },

    compareTexts(original, spoken) {
      const alignment = alignWords(original, spoken)
      const mistakes = toMistakes(alignment)
      const matchedWords: string[] = []
      for (const step of alignment) {
        if (step.status === 'correct') matchedWords.push(step.expected)
      }

      const result = createComparisonResult(
        {
          originalText: original,
          spokenText: spoken,
          accuracy: accuracyOf(tokenize(original).length, mistakes),
          mistakes,
          matchedWords,
        },
        locale
      )

      logger?.debug(
        `[TextComparison] ${result.correctWords}/${result.totalWords} words, ` +
          `${mistakes.length} mistakes, accuracy ${result.accuracy.toFixed(2)}`
      )
      return result
    },

    generateFeedback(result) {
      return generateFeedback(result, locale)
    },
  }
}

const defaultEngine = createTextComparisonEngine()

export function compareTexts(original: string, spoken: string): ComparisonResult {
  return defaultEngine.compareTexts(original, spoken)
}

export function calculateAccuracy(original: string, spoken: string): number {
  return defaultEngine.calculateAccuracy(original, spoken)
}

export function identifyMistakes(original: string, spoken: string): TextMistake[] {
  return defaultEngine.identifyMistakes(original, spoken)
}

export function alignWords(original: string, spoken: string): AlignedWord[] {
  return defaultEngine.alignWords(original, spoken)
}
