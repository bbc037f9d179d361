/**
 * Score calculator for reading sessions.
 * Turns an accuracy value (trusted as given, never re-derived here) plus
 * attempts, difficulty, time, streak and mistakes into points.
 */

import type { Logger } from './logger'
import type { TextMistake } from './mistakes'
import { categorizeAccuracy, type Locale, type PerformanceCategory } from './performance'
import {
  defaultScoringConfig,
  resolveScoringConfig,
  type DifficultyLevel,
  type ScoringConfig,
} from './scoringConfig'

// ============================================================================
// TYPES
// ============================================================================

export interface TimeBonus {
  readonly bonusPoints: number
  /** Seconds */
  readonly completionTime: number
  /** Seconds */
  readonly targetTime: number
  /** Fraction of the target time saved, 0 to 1 */
  readonly bonusPercentage: number
}

export interface StreakBonus {
  readonly streakCount: number
  readonly bonusPoints: number
}

export interface ScoreBreakdown {
  /** Point ceiling for the difficulty tier */
  readonly baseScore: number
  readonly accuracyScore: number
  readonly difficultyBonus: number
  readonly timeBonus?: TimeBonus
  /** Absent (not zero) until the streak qualifies */
  readonly streakBonus?: StreakBonus
  readonly perfectScoreBonus: number
  readonly attemptPenalty: number
  readonly mistakeSeverityPenalty: number
  readonly totalBonus: number
  readonly finalScore: number
  readonly category: PerformanceCategory
  readonly experience: number
}

export interface ComprehensiveScoreInput {
  accuracy: number
  attempts: number
  difficulty: DifficultyLevel
  /** Seconds */
  completionTime: number
  streak: number
  mistakes: readonly TextMistake[]
  /** Seconds; defaults to the tier's target time */
  targetTime?: number
}

export interface ScoringEngineOptions {
  config?: Partial<ScoringConfig>
  logger?: Logger
}

export interface ScoringEngine {
  readonly config: ScoringConfig
  calculateScore(accuracy: number, attempts: number, difficulty: DifficultyLevel): number
  getBasePoints(difficulty: DifficultyLevel): number
  getDifficultyMultiplier(difficulty: DifficultyLevel): number
  getTargetTime(difficulty: DifficultyLevel): number
  calculateBonusPoints(streak: number, perfectScore: boolean, timeBonus?: TimeBonus): number
  calculateTimeBonus(completionTime: number, targetTime: number): TimeBonus | undefined
  calculateComprehensiveScore(input: ComprehensiveScoreInput): ScoreBreakdown
  severityPenalty(mistake: TextMistake): number
  calculateMistakeSeverityPenalty(mistakes: readonly TextMistake[]): number
  calculateScoreWithMistakeSeverity(
    accuracy: number,
    mistakes: readonly TextMistake[],
    difficulty: DifficultyLevel,
    attempts: number
  ): number
  calculateAdaptiveScore(
    accuracy: number,
    attempts: number,
    difficulty: DifficultyLevel,
    userAverageAccuracy: number
  ): number
  isValidScore(score: number): boolean
}

// ============================================================================
// ENGINE
// ============================================================================

export function createScoringEngine(options: ScoringEngineOptions = {}): ScoringEngine {
  const config = options.config ? resolveScoringConfig(options.config) : defaultScoringConfig
  const logger = options.logger

  // 15% of the score per retry; attempt 2 loses 15%, attempt 3 loses 30%, ...
  const attemptPenaltyFor = (score: number, attempts: number) =>
    attempts > 1 ? Math.min(score, Math.round(score * config.attemptPenaltyRate * (attempts - 1))) : 0

  const qualifiesForStreakBonus = (streak: number) => streak >= config.minStreakForBonus

  const engine: ScoringEngine = {
    config,

    getBasePoints: (difficulty) => config.basePoints[difficulty],
    getDifficultyMultiplier: (difficulty) => config.multipliers[difficulty],
    getTargetTime: (difficulty) => config.targetTimes[difficulty],

    calculateScore(accuracy, attempts, difficulty) {
      const baseScore = Math.round(accuracy * config.basePoints[difficulty])
      return Math.max(0, baseScore - attemptPenaltyFor(baseScore, attempts))
    },

    calculateBonusPoints(streak, perfectScore, timeBonus) {
      let bonusPoints = 0
      if (perfectScore) bonusPoints += config.perfectScoreBonus
      if (qualifiesForStreakBonus(streak)) bonusPoints += streak * config.streakPointsPerSession
      if (timeBonus) bonusPoints += timeBonus.bonusPoints
      return bonusPoints
    },

    calculateTimeBonus(completionTime, targetTime) {
      if (targetTime <= 0 || completionTime >= targetTime) return undefined

      const bonusPercentage = Math.min(1, (targetTime - completionTime) / targetTime)
      const bonusPoints = Math.round(bonusPercentage * config.maxTimeBonus)
      // A sliver of saved time that rounds to nothing is no bonus
      if (bonusPoints <= 0) return undefined

      return { bonusPoints, completionTime, targetTime, bonusPercentage }
    },

    calculateComprehensiveScore(input) {
      const { accuracy, attempts, difficulty, completionTime, streak, mistakes } = input

      const baseScore = config.basePoints[difficulty]
      const accuracyScore = Math.round(accuracy * baseScore)
      const difficultyBonus = Math.round(baseScore * (config.multipliers[difficulty] - 1))
      const timeBonus = engine.calculateTimeBonus(
        completionTime,
        input.targetTime ?? config.targetTimes[difficulty]
      )
      const streakBonus: StreakBonus | undefined = qualifiesForStreakBonus(streak)
        ? { streakCount: streak, bonusPoints: streak * config.streakPointsPerSession }
        : undefined
      const perfectScoreBonus = accuracy === 1 ? config.perfectScoreBonus : 0
      const attemptPenalty = attemptPenaltyFor(accuracyScore, attempts)
      const mistakeSeverityPenalty = engine.calculateMistakeSeverityPenalty(mistakes)

      const totalBonus =
        difficultyBonus + (timeBonus?.bonusPoints ?? 0) + (streakBonus?.bonusPoints ?? 0) + perfectScoreBonus
      const finalScore = Math.max(0, accuracyScore + totalBonus - attemptPenalty - mistakeSeverityPenalty)

      logger?.debug(
        `[Scoring] ${difficulty}: ${accuracyScore} +${totalBonus} ` +
          `-${attemptPenalty + mistakeSeverityPenalty} = ${finalScore}`
      )

      return {
        baseScore,
        accuracyScore,
        difficultyBonus,
        timeBonus,
        streakBonus,
        perfectScoreBonus,
        attemptPenalty,
        mistakeSeverityPenalty,
        totalBonus,
        finalScore,
        category: categorizeAccuracy(accuracy),
        experience: Math.round(finalScore * config.experienceRate),
      }
    },

    severityPenalty: (mistake) => config.severityPenalties[mistake.severity],

    calculateMistakeSeverityPenalty(mistakes) {
      return mistakes.reduce((sum, m) => sum + engine.severityPenalty(m), 0)
    },

    calculateScoreWithMistakeSeverity(accuracy, mistakes, difficulty, attempts) {
      const score = engine.calculateScore(accuracy, attempts, difficulty)
      return Math.max(0, score - engine.calculateMistakeSeverityPenalty(mistakes))
    },

    calculateAdaptiveScore(accuracy, attempts, difficulty, userAverageAccuracy) {
      const score = engine.calculateScore(accuracy, attempts, difficulty)
      if (accuracy <= userAverageAccuracy) return score
      // Any improvement over the reader's own average earns at least a point
      const improvementBonus = Math.max(
        1,
        Math.round((accuracy - userAverageAccuracy) * config.improvementBonusRate)
      )
      return score + improvementBonus
    },

    isValidScore: (score) => Number.isInteger(score) && score >= 0 && score <= config.maxScore,
  }

  return engine
}

// ============================================================================
// DISPLAY
// ============================================================================

const LABELS: Record<Locale, {
  base: string
  accuracy: string
  difficulty: string
  time: (b: TimeBonus) => string
  streak: (b: StreakBonus) => string
  perfect: string
  attempts: string
  mistakes: string
}> = {
  vi: {
    base: 'Điểm cơ bản',
    accuracy: 'Độ chính xác',
    difficulty: 'Độ khó',
    time: (b) => `Hoàn thành nhanh hơn ${Math.round(b.targetTime - b.completionTime)}s: +${b.bonusPoints} điểm`,
    streak: (b) => `Chuỗi ${b.streakCount} lần đúng: +${b.bonusPoints} điểm`,
    perfect: 'Hoàn hảo',
    attempts: 'Thử lại',
    mistakes: 'Lỗi',
  },
  en: {
    base: 'Base score',
    accuracy: 'Accuracy',
    difficulty: 'Difficulty',
    time: (b) => `Finished ${Math.round(b.targetTime - b.completionTime)}s early: +${b.bonusPoints} points`,
    streak: (b) => `${b.streakCount} in a row: +${b.bonusPoints} points`,
    perfect: 'Perfect',
    attempts: 'Retries',
    mistakes: 'Mistakes',
  },
}

/** One display line per non-empty component, in breakdown order. */
export function describeBreakdown(breakdown: ScoreBreakdown, locale: Locale = 'vi'): string[] {
  const l = LABELS[locale]
  const lines = [`${l.base}: ${breakdown.baseScore}`, `${l.accuracy}: ${breakdown.accuracyScore}`]

  if (breakdown.difficultyBonus > 0) lines.push(`${l.difficulty}: +${breakdown.difficultyBonus}`)
  if (breakdown.timeBonus) lines.push(l.time(breakdown.timeBonus))
  if (breakdown.streakBonus) lines.push(l.streak(breakdown.streakBonus))
  if (breakdown.perfectScoreBonus > 0) lines.push(`${l.perfect}: +${breakdown.perfectScoreBonus}`)
  if (breakdown.attemptPenalty > 0) lines.push(`${l.attempts}: -${breakdown.attemptPenalty}`)
  if (breakdown.mistakeSeverityPenalty > 0) lines.push(`${l.mistakes}: -${breakdown.mistakeSeverityPenalty}`)

  return lines
}

// ============================================================================
// DEFAULT ENGINE
// ============================================================================

const defaultEngine = createScoringEngine()

export const calculateScore = defaultEngine.calculateScore
export const getDifficultyMultiplier = defaultEngine.getDifficultyMultiplier
export const calculateBonusPoints = defaultEngine.calculateBonusPoints
export const calculateTimeBonus = defaultEngine.calculateTimeBonus
export const calculateComprehensiveScore = defaultEngine.calculateComprehensiveScore
export const severityPenalty = defaultEngine.severityPenalty
export const calculateMistakeSeverityPenalty = defaultEngine.calculateMistakeSeverityPenalty
export const calculateScoreWithMistakeSeverity = defaultEngine.calculateScoreWithMistakeSeverity
export const calculateAdaptiveScore = defaultEngine.calculateAdaptiveScore
export const isValidScore = defaultEngine.isValidScore
