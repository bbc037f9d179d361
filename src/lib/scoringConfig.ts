import { z } from 'zod'
import { ScoringConfigError } from './errors'

// ============================================
// Difficulty tiers
// ============================================

export const DIFFICULTY_LEVELS = ['grade1', 'grade2', 'grade3', 'grade4', 'grade5'] as const

export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number]

export const DifficultyLevelSchema = z.enum(DIFFICULTY_LEVELS)

const perLevel = (schema: z.ZodNumber) =>
  z.object({
    grade1: schema,
    grade2: schema,
    grade3: schema,
    grade4: schema,
    grade5: schema,
  })

function isStrictlyIncreasing(table: Record<DifficultyLevel, number>): boolean {
  return DIFFICULTY_LEVELS.every(
    (level, i) => i === 0 || table[level] > table[DIFFICULTY_LEVELS[i - 1]]
  )
}

// ============================================
// Config schema
// ============================================

export const ScoringConfigSchema = z.object({
  /** Point ceiling per tier, scaled by accuracy */
  basePoints: perLevel(z.number().int().positive()).refine(isStrictlyIncreasing, {
    message: 'basePoints must increase with difficulty',
  }),
  /** Scales the difficulty bonus in the detailed breakdown */
  multipliers: perLevel(z.number().min(1)).refine(isStrictlyIncreasing, {
    message: 'multipliers must increase with difficulty',
  }),
  /** Seconds; finishing faster earns a time bonus */
  targetTimes: perLevel(z.number().positive()),
  perfectScoreBonus: z.number().int().nonnegative(),
  streakPointsPerSession: z.number().int().nonnegative(),
  minStreakForBonus: z.number().int().min(1),
  /** Fraction of the score lost per retry */
  attemptPenaltyRate: z.number().min(0).max(1),
  maxTimeBonus: z.number().int().nonnegative(),
  severityPenalties: z.object({
    minor: z.number().int().nonnegative(),
    moderate: z.number().int().nonnegative(),
    major: z.number().int().nonnegative(),
  }),
  /** Points per unit of accuracy above the reader's own average */
  improvementBonusRate: z.number().nonnegative(),
  experienceRate: z.number().nonnegative(),
  /** Upper bound for isValidScore; breakdowns are not clamped to it */
  maxScore: z.number().int().positive(),
})

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>

export const defaultScoringConfig: ScoringConfig = {
  basePoints: { grade1: 100, grade2: 150, grade3: 200, grade4: 250, grade5: 300 },
  multipliers: { grade1: 1.0, grade2: 1.2, grade3: 1.4, grade4: 1.6, grade5: 1.8 },
  targetTimes: { grade1: 60, grade2: 90, grade3: 120, grade4: 150, grade5: 180 },
  perfectScoreBonus: 100,
  streakPointsPerSession: 10,
  minStreakForBonus: 2,
  attemptPenaltyRate: 0.15,
  maxTimeBonus: 20,
  severityPenalties: { minor: 5, moderate: 15, major: 30 },
  improvementBonusRate: 200,
  experienceRate: 1.5,
  maxScore: 1000,
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Tables are replaced whole, not merged key by key.
 */
export function resolveScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  const parsed = ScoringConfigSchema.safeParse({ ...defaultScoringConfig, ...overrides })
  if (!parsed.success) {
    throw new ScoringConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    )
  }
  return parsed.data
}
