import { z } from 'zod'
import { ScoringError, type ScoringErrorCode } from './errors'
import type { Locale } from './performance'
import { DifficultyLevelSchema, type DifficultyLevel } from './scoringConfig'

// Checked before any scoring call when values come from outside (UI, API, storage)
const ScoringParametersSchema = z.object({
  accuracy: z.number().min(0).max(1),
  attempts: z.number().int().min(1),
  difficulty: DifficultyLevelSchema,
  completionTime: z.number().min(0),
})

export type ScoringParameters = z.infer<typeof ScoringParametersSchema>

export interface ScoringParameterInput {
  accuracy: number
  attempts: number
  difficulty: DifficultyLevel | string
  completionTime: number
}

export type ValidationResult =
  | { ok: true; value: ScoringParameters }
  | { ok: false; error: ScoringError }

// Reported in this order when several fields are wrong
const FIELD_ERRORS: ReadonlyArray<[keyof ScoringParameters, ScoringErrorCode]> = [
  ['accuracy', 'InvalidAccuracy'],
  ['attempts', 'InvalidAttempts'],
  ['completionTime', 'InvalidCompletionTime'],
  ['difficulty', 'InvalidDifficulty'],
]

export function validateScoringParameters(
  input: ScoringParameterInput,
  locale: Locale = 'vi'
): ValidationResult {
  const parsed = ScoringParametersSchema.safeParse(input)
  if (parsed.success) return { ok: true, value: parsed.data }

  const failed = new Set(parsed.error.issues.map(issue => issue.path[0]))
  const match = FIELD_ERRORS.find(([field]) => failed.has(field))
  return { ok: false, error: new ScoringError(match ? match[1] : 'InvalidAccuracy', locale) }
}
