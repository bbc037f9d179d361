// ============================================
// Performance tiers
// One threshold table for both comparison and scoring
// ============================================

export type Locale = 'vi' | 'en'

export type PerformanceCategory = 'excellent' | 'good' | 'fair' | 'needsImprovement'

// Inclusive lower bounds, checked top-down
export const PERFORMANCE_THRESHOLDS = {
  excellent: 0.95,
  good: 0.85,
  fair: 0.6,
} as const

export const PERFORMANCE_CATEGORIES: readonly PerformanceCategory[] = [
  'excellent',
  'good',
  'fair',
  'needsImprovement',
]

export function categorizeAccuracy(accuracy: number): PerformanceCategory {
  if (accuracy >= PERFORMANCE_THRESHOLDS.excellent) return 'excellent'
  if (accuracy >= PERFORMANCE_THRESHOLDS.good) return 'good'
  if (accuracy >= PERFORMANCE_THRESHOLDS.fair) return 'fair'
  return 'needsImprovement'
}

// ============================================
// Presentation
// ============================================

interface CategoryCopy {
  name: string
  encouragement: string
}

const CATEGORY_COPY: Record<Locale, Record<PerformanceCategory, CategoryCopy>> = {
  vi: {
    excellent: { name: 'Xuất sắc', encouragement: 'Tuyệt vời! Bé đọc hoàn hảo!' },
    good: { name: 'Tốt', encouragement: 'Rất tốt! Chỉ có vài lỗi nhỏ thôi!' },
    fair: { name: 'Khá', encouragement: 'Khá tốt! Hãy cố gắng đọc chậm và rõ hơn nhé!' },
    needsImprovement: {
      name: 'Cần cải thiện',
      encouragement: 'Hãy thử đọc lại nhé! Đọc chậm và rõ ràng sẽ giúp bé đọc tốt hơn!',
    },
  },
  en: {
    excellent: { name: 'Excellent', encouragement: 'Amazing! You read it perfectly!' },
    good: { name: 'Good', encouragement: 'Great job! Just a few small slips!' },
    fair: { name: 'Fair', encouragement: 'Nice try! Read a little slower and clearer!' },
    needsImprovement: {
      name: 'Needs improvement',
      encouragement: "Let's read it again! Slow and clear helps you read better!",
    },
  },
}

const CATEGORY_EMOJI: Record<PerformanceCategory, string> = {
  excellent: '🌟',
  good: '👏',
  fair: '😊',
  needsImprovement: '💪',
}

export function categoryName(category: PerformanceCategory, locale: Locale = 'vi'): string {
  return CATEGORY_COPY[locale][category].name
}

export function categoryEmoji(category: PerformanceCategory): string {
  return CATEGORY_EMOJI[category]
}

export function encouragementFor(category: PerformanceCategory, locale: Locale = 'vi'): string {
  return CATEGORY_COPY[locale][category].encouragement
}
