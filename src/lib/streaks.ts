// ============================================
// Streaks
// Consecutive successful readings, reset by a miss or a long break
// ============================================

export const STREAK_SUCCESS_THRESHOLD = 0.8
export const STREAK_INACTIVITY_DAYS = 7
export const STREAK_MILESTONES = [3, 5, 10, 20, 50, 100] as const

const DAY_MS = 24 * 60 * 60 * 1000

export interface StreakState {
  current: number
  best: number
  lastActivityAt?: Date
}

export function createStreakState(): StreakState {
  return { current: 0, best: 0 }
}

export function qualifiesForStreak(accuracy: number): boolean {
  return accuracy >= STREAK_SUCCESS_THRESHOLD
}

export function daysSince(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS)
}

export function advanceStreak(state: StreakState, accuracy: number, at: Date): StreakState {
  const lapsed =
    state.lastActivityAt !== undefined &&
    daysSince(state.lastActivityAt, at) > STREAK_INACTIVITY_DAYS
  const carried = lapsed ? 0 : state.current
  const current = qualifiesForStreak(accuracy) ? carried + 1 : 0

  return {
    current,
    best: Math.max(state.best, current),
    lastActivityAt: at,
  }
}

export function streakMilestone(streak: number): number | undefined {
  return STREAK_MILESTONES.find(m => m === streak)
}
