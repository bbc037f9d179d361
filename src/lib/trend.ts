export interface SessionLike {
  accuracy: number
  completedAt: Date
}

export type TrendDirection = 'improving' | 'declining' | 'stable'

export interface PerformanceTrend {
  trend: TrendDirection
  /** Signed change in percentage points between the early and late halves */
  changePercentage: number
}

export interface TrendOptions {
  /** Percentage points of change treated as noise */
  stableBand?: number
}

const DEFAULT_STABLE_BAND = 3

export function averageAccuracy(sessions: readonly SessionLike[]): number {
  if (sessions.length === 0) return 0
  return sessions.reduce((sum, s) => sum + s.accuracy, 0) / sessions.length
}

/**
 * Split-half comparison: mean accuracy of the older half against the newer
 * half. With an odd count the middle session belongs to neither.
 */
export function calculatePerformanceTrend(
  sessions: readonly SessionLike[],
  options: TrendOptions = {}
): PerformanceTrend {
  if (sessions.length < 2) return { trend: 'stable', changePercentage: 0 }

  const band = options.stableBand ?? DEFAULT_STABLE_BAND
  const sorted = [...sessions].sort((a, b) => a.completedAt.getTime() - b.completedAt.getTime())
  const half = Math.floor(sorted.length / 2)

  const early = averageAccuracy(sorted.slice(0, half))
  const late = averageAccuracy(sorted.slice(sorted.length - half))
  const changePercentage = (late - early) * 100

  if (changePercentage > band) return { trend: 'improving', changePercentage }
  if (changePercentage < -band) return { trend: 'declining', changePercentage }
  return { trend: 'stable', changePercentage }
}
