// ============================================================================
// LEVENSHTEIN DISTANCE
// ============================================================================

/**
 * Character-level edit distance. Works on code points so that
 * precomposed Vietnamese vowels count as one character.
 */
export function levenshtein(a: string, b: string): number {
  const s = Array.from(a)
  const t = Array.from(b)
  const m = s.length, n = t.length
  const dp: number[] = Array.from({ length: n + 1 }, (_, i) => i)
  for (let i = 1; i <= m; i++) {
    let prev = dp[0]
    dp[0] = i
    for (let j = 1; j <= n; j++) {
      const tmp = dp[j]
      dp[j] = s[i - 1] === t[j - 1] ? prev : 1 + Math.min(prev, dp[j], dp[j - 1])
      prev = tmp
    }
  }
  return dp[n]
}

// ============================================================================
// CONFUSABLE SOUNDS
// ============================================================================

/** Two initial consonants a young reader commonly swaps when reading aloud. */
export type PhoneticRule = readonly [string, string]

// Northern/Southern accent merges and the usual early-reader slips
export const defaultPhoneticRules: readonly PhoneticRule[] = [
  ['d', 'gi'],
  ['tr', 'ch'],
  ['s', 'x'],
  ['c', 'k'],
  ['th', 't'],
  ['ph', 'f'],
  ['qu', 'kw'],
  ['n', 'l'],
  ['v', 'd'],
]

const MIN_FUZZY_LENGTH = 3

// Longest first: "ngh" before "ng"
const ONSET_CLUSTERS = ['ngh', 'ng', 'nh', 'ch', 'kh', 'gh', 'gi', 'ph', 'th', 'tr', 'qu']
const SINGLE_CONSONANT = /^[bcdđfghjklmnpqrstvwxz]/u

/**
 * The word's initial consonant, read as the longest cluster ("chó" → "ch",
 * "nghe" → "ngh"). Empty for words that start with a vowel.
 */
export function initialConsonant(word: string): string {
  const cluster = ONSET_CLUSTERS.find(c => word.startsWith(c))
  if (cluster) return cluster
  const single = SINGLE_CONSONANT.exec(word)
  return single ? single[0] : ''
}

function swapsInto(from: string, to: string, [x, y]: PhoneticRule): boolean {
  const onset = initialConsonant(from)
  const rest = from.slice(onset.length)
  const replacement = onset === x ? y : onset === y ? x : undefined
  if (replacement === undefined || replacement + rest !== to) return false
  // The swapped-in consonant must not fuse with the rest into a longer cluster ("l" + "hà")
  return initialConsonant(to).length <= replacement.length
}

/**
 * Whether two different words sound close enough to count as a
 * mispronunciation rather than a different word.
 *
 * Close when swapping the initial consonant by one rule turns one word into
 * the other ("dây" / "giây"), or when both words have at least 3 letters,
 * share their initial consonant and differ by a single edit ("thảm" / "tham").
 * A cluster is never split, so "chó" / "khó" stay different words.
 */
export function arePhoneticallyClose(
  a: string,
  b: string,
  rules: readonly PhoneticRule[] = defaultPhoneticRules
): boolean {
  if (a === b) return false

  for (const rule of rules) {
    if (swapsInto(a, b, rule) || swapsInto(b, a, rule)) return true
  }

  return (
    Array.from(a).length >= MIN_FUZZY_LENGTH &&
    Array.from(b).length >= MIN_FUZZY_LENGTH &&
    initialConsonant(a) === initialConsonant(b) &&
    levenshtein(a, b) <= 1
  )
}
