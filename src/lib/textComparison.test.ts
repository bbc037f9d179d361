import { describe, it, expect, vi } from 'vitest'
import type { Logger } from './logger'
import {
  alignWords,
  calculateAccuracy,
  compareTexts,
  createComparisonResult,
  createTextComparisonEngine,
  generateFeedback,
  identifyMistakes,
} from './textComparison'

const SENTENCE = 'Con mèo ngồi trên thảm'

// ============================================================================
// compareTexts — exact matches
// ============================================================================

describe('compareTexts', () => {
  it('identical text is a perfect read', () => {
    const r = compareTexts(SENTENCE, SENTENCE)
    expect(r.accuracy).toBe(1)
    expect(r.mistakes).toEqual([])
    expect(r.isPerfect).toBe(true)
    expect(r.performanceCategory).toBe('excellent')
    expect(r.totalWords).toBe(5)
    expect(r.correctWords).toBe(5)
    expect(r.matchedWords).toEqual(['con', 'mèo', 'ngồi', 'trên', 'thảm'])
  })

  it('keeps both input strings verbatim', () => {
    const r = compareTexts('  Con mèo! ', 'con MÈO')
    expect(r.originalText).toBe('  Con mèo! ')
    expect(r.spokenText).toBe('con MÈO')
  })

  it('ignores case differences', () => {
    const r = compareTexts('CON MÈO NGỒI', 'con mèo ngồi')
    expect(r.accuracy).toBe(1)
    expect(r.mistakes).toEqual([])
  })

  it('ignores punctuation at word edges', () => {
    const r = compareTexts('Con mèo ngồi trên thảm.', '“Con mèo, ngồi trên thảm!”')
    expect(r.accuracy).toBe(1)
    expect(r.mistakes).toEqual([])
  })

  it('collapses extra whitespace and newlines', () => {
    const r = compareTexts('  Con   mèo\nngồi\ttrên thảm ', SENTENCE)
    expect(r.accuracy).toBe(1)
    expect(r.totalWords).toBe(5)
  })

  it('every text compared with itself is perfect', () => {
    const texts = ['Một', 'Bé đi học, bé vui!', 'The cat sat on the mat.', 'a  b   c']
    for (const text of texts) {
      const r = compareTexts(text, text)
      expect(r.accuracy).toBe(1)
      expect(r.mistakes).toEqual([])
    }
  })

  // ---- substitutions ----
  it('detects a substituted word', () => {
    const r = compareTexts(SENTENCE, 'Con mèo ngồi trên ghế')
    expect(r.accuracy).toBe(0.8)
    expect(r.mistakes).toEqual([
      { position: 4, expectedWord: 'thảm', actualWord: 'ghế', mistakeType: 'substitution', severity: 'moderate' },
    ])
    expect(r.matchedWords).toEqual(['con', 'mèo', 'ngồi', 'trên'])
    expect(r.correctWords).toBe(4)
  })

  // ---- omissions ----
  it('detects a skipped word without shifting the rest', () => {
    const r = compareTexts(SENTENCE, 'Con mèo trên thảm')
    expect(r.accuracy).toBe(0.8)
    expect(r.mistakes).toEqual([
      { position: 2, expectedWord: 'ngồi', actualWord: '', mistakeType: 'omission', severity: 'moderate' },
    ])
  })

  it('detects several skipped words in order', () => {
    const r = compareTexts(SENTENCE, 'Con mèo thảm')
    expect(r.accuracy).toBe(0.6)
    expect(r.mistakes.map(m => [m.position, m.expectedWord, m.mistakeType])).toEqual([
      [2, 'ngồi', 'omission'],
      [3, 'trên', 'omission'],
    ])
  })

  it('nothing read means every word is omitted', () => {
    const r = compareTexts('Con mèo ngồi', '')
    expect(r.accuracy).toBe(0)
    expect(r.mistakes).toHaveLength(3)
    expect(r.mistakes.every(m => m.mistakeType === 'omission')).toBe(true)
    expect(r.mistakes.map(m => m.position)).toEqual([0, 1, 2])
    expect(r.performanceCategory).toBe('needsImprovement')
  })

  // ---- insertions ----
  it('detects an extra word without lowering accuracy', () => {
    const r = compareTexts(SENTENCE, 'Con mèo nhỏ ngồi trên thảm')
    expect(r.mistakes).toEqual([
      { position: 2, expectedWord: '', actualWord: 'nhỏ', mistakeType: 'insertion', severity: 'minor' },
    ])
    expect(r.accuracy).toBe(1)
    expect(r.correctWords).toBe(5)
    expect(r.isPerfect).toBe(false)
  })

  it('reading with no expected text is all insertions', () => {
    const r = compareTexts('', 'xin chào')
    expect(r.totalWords).toBe(0)
    expect(r.accuracy).toBe(1)
    expect(r.mistakes.map(m => [m.position, m.actualWord, m.mistakeType])).toEqual([
      [0, 'xin', 'insertion'],
      [0, 'chào', 'insertion'],
    ])
  })

  // ---- mispronunciations ----
  it('classifies th → t as a mispronunciation', () => {
    const r = compareTexts(SENTENCE, 'Con mèo ngồi trên tảm')
    expect(r.mistakes).toEqual([
      { position: 4, expectedWord: 'thảm', actualWord: 'tảm', mistakeType: 'mispronunciation', severity: 'minor' },
    ])
    expect(r.accuracy).toBe(0.8)
  })

  it.each([
    ['d', 'gi'],
    ['tr', 'ch'],
    ['s', 'x'],
    ['c', 'k'],
  ])('treats %s / %s as a confusable pair', (a, b) => {
    const r = compareTexts(`Con ${a}ây là gì`, `Con ${b}ây là gì`)
    expect(r.mistakes).toHaveLength(1)
    expect(r.mistakes[0].position).toBe(1)
    expect(r.mistakes[0].mistakeType).toBe('mispronunciation')
    expect(r.accuracy).toBe(0.75)
  })

  it('keeps different consonant clusters apart', () => {
    expect(compareTexts('con chó', 'con khó').mistakes).toEqual([
      { position: 1, expectedWord: 'chó', actualWord: 'khó', mistakeType: 'substitution', severity: 'moderate' },
    ])
    expect(compareTexts('con nhà', 'con nà').mistakes[0].mistakeType).toBe('substitution')
  })

  // ---- empty input ----
  it('two empty strings are a perfect match', () => {
    const r = compareTexts('', '')
    expect(r.accuracy).toBe(1)
    expect(r.totalWords).toBe(0)
    expect(r.mistakes).toEqual([])
    expect(r.isPerfect).toBe(true)
  })

  it('punctuation-only text has no words', () => {
    const r = compareTexts('... !', '')
    expect(r.totalWords).toBe(0)
    expect(r.accuracy).toBe(1)
  })

  it('handles long passages without a length limit', () => {
    const passage = Array.from({ length: 400 }, (_, i) => `từ${i}`).join(' ')
    const r = compareTexts(passage, passage)
    expect(r.totalWords).toBe(400)
    expect(r.accuracy).toBe(1)
  })

  it('orders mistakes by position', () => {
    const r = compareTexts('một hai ba bốn năm sáu', 'một hay ba năm sáu bảy')
    const positions = r.mistakes.map(m => m.position)
    expect(positions).toEqual([...positions].sort((a, b) => a - b))
  })
})

// ============================================================================
// calculateAccuracy
// ============================================================================

describe('calculateAccuracy', () => {
  it.each([
    ['Con mèo', 'Con mèo', 1],
    ['Con mèo', 'Con chó', 0.5],
    ['Con mèo ngồi trên', 'Con chó', 0.25],
    ['', '', 1],
    ['Con', '', 0],
  ])('"%s" read as "%s" → %s', (original, spoken, expected) => {
    expect(calculateAccuracy(original, spoken)).toBe(expected)
  })

  it('two of three words right', () => {
    expect(calculateAccuracy('Con mèo ngồi', 'Con chó ngồi')).toBeCloseTo(2 / 3, 5)
  })

  it('never disagrees with compareTexts', () => {
    const pairs: Array<[string, string]> = [
      [SENTENCE, 'Con mèo trên thảm'],
      [SENTENCE, 'Con chó nhỏ ngồi dưới thảm đỏ'],
      ['Bé đi học', 'Bé đi chơi rồi về'],
      ['', 'xin chào'],
      ['Con dây là gì', 'Con giây'],
    ]
    for (const [original, spoken] of pairs) {
      expect(calculateAccuracy(original, spoken)).toBe(compareTexts(original, spoken).accuracy)
    }
  })
})

// ============================================================================
// identifyMistakes / alignWords
// ============================================================================

describe('identifyMistakes', () => {
  it('returns the same mistakes as compareTexts', () => {
    expect(identifyMistakes(SENTENCE, 'Con mèo trên ghế')).toEqual(
      compareTexts(SENTENCE, 'Con mèo trên ghế').mistakes
    )
  })
})

describe('alignWords', () => {
  it('labels each word for highlighting', () => {
    expect(alignWords('The cat sat', 'the cap sat down')).toEqual([
      { status: 'correct', position: 0, expected: 'the', actual: 'the' },
      { status: 'mispronounced', position: 1, expected: 'cat', actual: 'cap' },
      { status: 'correct', position: 2, expected: 'sat', actual: 'sat' },
      { status: 'extra', position: 3, actual: 'down' },
    ])
  })

  it('marks trailing unread words as missing', () => {
    expect(alignWords('Bé đi học', 'Bé')).toEqual([
      { status: 'correct', position: 0, expected: 'bé', actual: 'bé' },
      { status: 'missing', position: 1, expected: 'đi' },
      { status: 'missing', position: 2, expected: 'học' },
    ])
  })
})

// ============================================================================
// Categories and feedback
// ============================================================================

describe('createComparisonResult', () => {
  const withAccuracy = (accuracy: number) =>
    createComparisonResult({
      originalText: 'Test',
      spokenText: 'Test',
      accuracy,
      mistakes: [],
      matchedWords: [],
    })

  it.each([
    [1, 'excellent'],
    [0.95, 'excellent'],
    [0.9, 'good'],
    [0.85, 'good'],
    [0.8, 'fair'],
    [0.6, 'fair'],
    [0.59, 'needsImprovement'],
    [0.3, 'needsImprovement'],
  ])('accuracy %s is %s', (accuracy, category) => {
    expect(withAccuracy(accuracy).performanceCategory).toBe(category)
  })

  it('derives counts from the original text', () => {
    const r = createComparisonResult({
      originalText: 'một hai ba',
      spokenText: 'một ba bốn',
      accuracy: 2 / 3,
      mistakes: [
        { position: 1, expectedWord: 'hai', actualWord: '', mistakeType: 'omission', severity: 'moderate' },
        { position: 3, expectedWord: '', actualWord: 'bốn', mistakeType: 'insertion', severity: 'minor' },
      ],
      matchedWords: ['một', 'ba'],
    })
    expect(r.totalWords).toBe(3)
    expect(r.correctWords).toBe(2)
    expect(r.isPerfect).toBe(false)
  })

  it('keeps supplied feedback', () => {
    const r = createComparisonResult({
      originalText: 'a',
      spokenText: 'a',
      accuracy: 1,
      mistakes: [],
      matchedWords: ['a'],
      feedback: 'custom',
    })
    expect(r.feedback).toBe('custom')
  })
})

describe('generateFeedback', () => {
  it.each([
    [1, 'Tuyệt vời! Bé đọc hoàn hảo! 🌟'],
    [0.9, 'Rất tốt! Chỉ có vài lỗi nhỏ thôi! 👏'],
    [0.7, 'Khá tốt! Hãy cố gắng đọc chậm và rõ hơn nhé! 😊'],
    [0.5, 'Hãy thử đọc lại nhé! Đọc chậm và rõ ràng sẽ giúp bé đọc tốt hơn! 💪'],
  ])('accuracy %s → tier message', (accuracy, message) => {
    expect(generateFeedback({ accuracy })).toBe(message)
  })

  it('compareTexts attaches the tier message', () => {
    expect(compareTexts(SENTENCE, SENTENCE).feedback).toBe('Tuyệt vời! Bé đọc hoàn hảo! 🌟')
  })

  it('supports English copy', () => {
    expect(generateFeedback({ accuracy: 0.9 }, 'en')).toBe('Great job! Just a few small slips! 👏')
  })
})

// ============================================================================
// Engine options
// ============================================================================

describe('createTextComparisonEngine', () => {
  it('uses the configured confusable sounds', () => {
    const strict = createTextComparisonEngine({ phoneticRules: [] })
    expect(strict.compareTexts('Con dây', 'Con giây').mistakes[0].mistakeType).toBe('substitution')
    expect(compareTexts('Con dây', 'Con giây').mistakes[0].mistakeType).toBe('mispronunciation')
  })

  it('uses the configured locale for feedback', () => {
    const engine = createTextComparisonEngine({ locale: 'en' })
    expect(engine.compareTexts('cat', 'cat').feedback).toBe('Amazing! You read it perfectly! 🌟')
    expect(engine.generateFeedback({ accuracy: 0.1 })).toBe(
      "Let's read it again! Slow and clear helps you read better! 💪"
    )
  })

  it('reports each comparison to the logger', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const engine = createTextComparisonEngine({ logger })
    engine.compareTexts(SENTENCE, 'Con mèo ngồi trên ghế')
    expect(logger.debug).toHaveBeenCalledWith('[TextComparison] 4/5 words, 1 mistakes, accuracy 0.80')
  })
})
