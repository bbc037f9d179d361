import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Logger } from '@/lib/logger'
import { createScoringEngine, type ScoreBreakdown } from '@/lib/scoring'
import type { DifficultyLevel, ScoringConfig } from '@/lib/scoringConfig'
import { advanceStreak, createStreakState, qualifiesForStreak, type StreakState } from '@/lib/streaks'
import {
  createTextComparisonEngine,
  type ComparisonResult,
  type TextComparisonOptions,
} from '@/lib/textComparison'
import { averageAccuracy, calculatePerformanceTrend, type PerformanceTrend } from '@/lib/trend'

// === PRACTICE SESSION ===
export interface PracticeSession {
  id: string
  originalText: string
  spokenText: string
  difficulty: DifficultyLevel
  attempts: number
  /** Seconds from startAttempt to submitAttempt */
  completionTime: number
  completedAt: Date
  accuracy: number
  comparison: ComparisonResult
  score: ScoreBreakdown
  /** Streak after this session */
  streak: number
}

export type SessionListener = (session: PracticeSession) => void

export interface PracticeStoreOptions {
  difficulty?: DifficultyLevel
  scoring?: Partial<ScoringConfig>
  comparison?: Omit<TextComparisonOptions, 'logger'>
  logger?: Logger
  now?: () => Date
}

// === STORE ===
export interface PracticeState {
  difficulty: DifficultyLevel
  currentText: string | null
  attempts: number
  /** Whether the last submission of currentText passed */
  passed: boolean
  startedAt: Date | null
  streak: StreakState
  sessions: PracticeSession[]

  setDifficulty: (difficulty: DifficultyLevel) => void
  startAttempt: (originalText: string) => void
  submitAttempt: (spokenText: string) => PracticeSession
  averageAccuracy: () => number
  trend: () => PerformanceTrend
  totalScore: () => number
  subscribeToSessions: (listener: SessionListener) => () => void
  reset: () => void
}

export type PracticeStore = StoreApi<PracticeState>

export function createPracticeStore(options: PracticeStoreOptions = {}): PracticeStore {
  const logger = options.logger ?? console
  const now = options.now ?? (() => new Date())
  const comparison = createTextComparisonEngine({ ...options.comparison, logger })
  const scoring = createScoringEngine({ config: options.scoring, logger })
  const initialDifficulty = options.difficulty ?? 'grade1'

  return createStore<PracticeState>((set, get, api) => ({
    difficulty: initialDifficulty,
    currentText: null,
    attempts: 0,
    passed: false,
    startedAt: null,
    streak: createStreakState(),
    sessions: [],

    setDifficulty: (difficulty) => set({ difficulty }),

    startAttempt: (originalText) => {
      const { currentText, attempts, passed, startedAt } = get()
      const sameText = currentText === originalText && attempts > 0
      // Restarting an unsubmitted read keeps its count; only a failed submit adds a retry
      const restarting = sameText && startedAt !== null
      const isRetry = sameText && startedAt === null && !passed
      set({
        currentText: originalText,
        attempts: restarting ? attempts : isRetry ? attempts + 1 : 1,
        passed: false,
        startedAt: now(),
      })
    },

    submitAttempt: (spokenText) => {
      const { currentText, startedAt, attempts, difficulty, sessions } = get()
      if (currentText === null || startedAt === null) {
        throw new Error('[PracticeSession] submitAttempt called before startAttempt')
      }

      const completedAt = now()
      const completionTime = Math.max(0, (completedAt.getTime() - startedAt.getTime()) / 1000)
      const result = comparison.compareTexts(currentText, spokenText)
      const streak = advanceStreak(get().streak, result.accuracy, completedAt)
      const score = scoring.calculateComprehensiveScore({
        accuracy: result.accuracy,
        attempts,
        difficulty,
        completionTime,
        streak: streak.current,
        mistakes: result.mistakes,
      })

      const session: PracticeSession = {
        id: `session-${sessions.length + 1}`,
        originalText: currentText,
        spokenText,
        difficulty,
        attempts,
        completionTime,
        completedAt,
        accuracy: result.accuracy,
        comparison: result,
        score,
        streak: streak.current,
      }

      set({
        sessions: [...sessions, session],
        streak,
        passed: qualifiesForStreak(result.accuracy),
        startedAt: null,
      })
      logger.info(
        `[PracticeSession] Saved ${session.id}: accuracy ${result.accuracy.toFixed(2)}, score ${score.finalScore}`
      )
      return session
    },

    averageAccuracy: () => averageAccuracy(get().sessions),

    trend: () => calculatePerformanceTrend(get().sessions),

    totalScore: () => get().sessions.reduce((sum, s) => sum + s.score.finalScore, 0),

    subscribeToSessions: (listener) =>
      api.subscribe((state, prev) => {
        if (state.sessions.length <= prev.sessions.length) return
        const latest = state.sessions[state.sessions.length - 1]
        try {
          listener(latest)
        } catch (err) {
          logger.error('[PracticeSession] Failed to notify listener:', err)
        }
      }),

    reset: () =>
      set({
        difficulty: initialDifficulty,
        currentText: null,
        attempts: 0,
        passed: false,
        startedAt: null,
        streak: createStreakState(),
        sessions: [],
      }),
  }))
}
