import type { Locale } from './performance'

export type MistakeType = 'substitution' | 'omission' | 'insertion' | 'mispronunciation'

export type MistakeSeverity = 'minor' | 'moderate' | 'major'

export const MISTAKE_TYPES: readonly MistakeType[] = [
  'substitution',
  'omission',
  'insertion',
  'mispronunciation',
]

const SEVERITY_RANK: Record<MistakeSeverity, number> = {
  minor: 1,
  moderate: 2,
  major: 3,
}

export function severityRank(severity: MistakeSeverity): number {
  return SEVERITY_RANK[severity]
}

export interface TextMistake {
  /** Index into the expected words; for insertions, the next expected word. */
  readonly position: number
  /** Empty for insertions */
  readonly expectedWord: string
  /** Empty for omissions */
  readonly actualWord: string
  readonly mistakeType: MistakeType
  readonly severity: MistakeSeverity
}

// ============================================
// Templates
// ============================================

type Template = (m: TextMistake) => string

const DESCRIPTIONS: Record<Locale, Record<MistakeType, Template>> = {
  vi: {
    mispronunciation: (m) => `Phát âm '${m.expectedWord}' thành '${m.actualWord}'`,
    omission: (m) => `Bỏ sót từ '${m.expectedWord}'`,
    insertion: (m) => `Thêm từ '${m.actualWord}'`,
    substitution: (m) => `Đọc '${m.expectedWord}' thành '${m.actualWord}'`,
  },
  en: {
    mispronunciation: (m) => `Pronounced '${m.expectedWord}' as '${m.actualWord}'`,
    omission: (m) => `Skipped the word '${m.expectedWord}'`,
    insertion: (m) => `Added the word '${m.actualWord}'`,
    substitution: (m) => `Read '${m.expectedWord}' as '${m.actualWord}'`,
  },
}

const SUGGESTIONS: Record<Locale, Record<MistakeType, Template>> = {
  vi: {
    mispronunciation: (m) => `Hãy phát âm rõ ràng từ '${m.expectedWord}'`,
    omission: (m) => `Đừng quên đọc từ '${m.expectedWord}'`,
    insertion: (m) => `Không cần đọc thêm từ '${m.actualWord}'`,
    substitution: (m) => `Từ đúng là '${m.expectedWord}', không phải '${m.actualWord}'`,
  },
  en: {
    mispronunciation: (m) => `Say '${m.expectedWord}' slowly and clearly`,
    omission: (m) => `Don't forget to read '${m.expectedWord}'`,
    insertion: (m) => `There's no '${m.actualWord}' in the text`,
    substitution: (m) => `The word is '${m.expectedWord}', not '${m.actualWord}'`,
  },
}

export function describeMistake(mistake: TextMistake, locale: Locale = 'vi'): string {
  return DESCRIPTIONS[locale][mistake.mistakeType](mistake)
}

export function suggestFix(mistake: TextMistake, locale: Locale = 'vi'): string {
  return SUGGESTIONS[locale][mistake.mistakeType](mistake)
}

// ============================================
// Summaries
// ============================================

export interface MistakeSummary {
  total: number
  byType: Record<MistakeType, number>
  bySeverity: Record<MistakeSeverity, number>
  /** Most severe mistake present, if any */
  worstSeverity?: MistakeSeverity
}

export function summarizeMistakes(mistakes: readonly TextMistake[]): MistakeSummary {
  const byType: Record<MistakeType, number> = {
    substitution: 0,
    omission: 0,
    insertion: 0,
    mispronunciation: 0,
  }
  const bySeverity: Record<MistakeSeverity, number> = { minor: 0, moderate: 0, major: 0 }
  let worstSeverity: MistakeSeverity | undefined

  for (const m of mistakes) {
    byType[m.mistakeType]++
    bySeverity[m.severity]++
    if (!worstSeverity || severityRank(m.severity) > severityRank(worstSeverity)) {
      worstSeverity = m.severity
    }
  }

  return { total: mistakes.length, byType, bySeverity, worstSeverity }
}
