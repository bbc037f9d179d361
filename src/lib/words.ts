/**
 * Word normalization shared by the comparison engine.
 * Case-folds, strips boundary punctuation, keeps diacritics intact.
 */

export type NormalizedWord = string & { readonly __brand: 'NormalizedWord' }

const BOUNDARY_PUNCTUATION = /^\p{P}+|\p{P}+$/gu

function isNormalizedWord(word: string): word is NormalizedWord {
  return word.length > 0
}

/**
 * Normalize a single raw token.
 * Returns null when nothing lexical is left ("...", "—").
 */
export function normalizeWord(raw: string): NormalizedWord | null {
  const word = raw
    .normalize('NFC')
    .toLowerCase()
    .replace(BOUNDARY_PUNCTUATION, '')
  return isNormalizedWord(word) ? word : null
}

export function tokenize(text: string): NormalizedWord[] {
  const words: NormalizedWord[] = []
  for (const raw of text.trim().split(/\s+/)) {
    if (!raw) continue
    const word = normalizeWord(raw)
    if (word) words.push(word)
  }
  return words
}

export function wordCount(text: string): number {
  return tokenize(text).length
}
