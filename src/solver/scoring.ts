import { RankerError } from './errors'

export const EXACT_MATCH_SCORE = 5
export const PRESENT_SCORE = 3
export const BASELINE_SCORE = 1
export const DUPLICATE_PENALTY = 1

export interface Suggestion {
  guess: string
  score: number
}

export interface RankOpts {
  topK?: number // default 1
  onProgress?: (fraction: number) => void // called once per scored guess (0..1]
}

/**
 * Compatibility of guess `g` with candidate answer `a`, scanned left to right.
 * An exact positional match is worth 5 outright; otherwise a letter present
 * elsewhere in `a` earns 3 and an absent one 1, less 1 when `g` already used
 * that letter at an earlier position.
 */
export function pairwiseScore(answer: string, guess: string): number {
  const seen = new Array<boolean>(26).fill(false)
  let total = 0
  for (let i = 0; i < guess.length; i++) {
    const ch = guess[i]!
    const c = guess.charCodeAt(i) - 97
    const inRange = c >= 0 && c < 26
    if (answer[i] === ch) {
      total += EXACT_MATCH_SCORE
    } else {
      let pos = answer.includes(ch) ? PRESENT_SCORE : BASELINE_SCORE
      if (inRange && seen[c]) pos -= DUPLICATE_PENALTY
      total += pos
    }
    if (inRange) seen[c] = true
  }
  return total
}

/** Sum of pairwise scores of `guess` against every word in the pool. */
export function totalPairwiseScore(pool: readonly string[], guess: string): number {
  let total = 0
  for (const answer of pool) total += pairwiseScore(answer, guess)
  return total
}

/** Stable descending order by score; equal scores keep enumeration order. */
export function topSuggestions(scored: Suggestion[], topK: number): Suggestion[] {
  const idx = scored.map((s, i) => ({ s, i }))
  idx.sort((a, b) => b.s.score - a.s.score || a.i - b.i)
  return idx.slice(0, Math.max(1, topK)).map(({ s }) => s)
}

export function rankGuesses(
  pool: readonly string[],
  guessSpace: readonly string[],
  opts: RankOpts = {},
): Suggestion[] {
  if (pool.length === 0) throw new RankerError()
  if (pool.length === 1) return [{ guess: pool[0]!, score: 0 }]
  const space = guessSpace.length > 0 ? guessSpace : pool
  const scored: Suggestion[] = []
  for (let i = 0; i < space.length; i++) {
    const guess = space[i]!
    scored.push({ guess, score: totalPairwiseScore(pool, guess) })
    opts.onProgress?.((i + 1) / space.length)
  }
  return topSuggestions(scored, opts.topK ?? 1)
}

export function bestGuess(pool: readonly string[], guessSpace: readonly string[]): string {
  // rankGuesses always yields at least one entry for a non-empty pool
  const [top] = rankGuesses(pool, guessSpace)
  if (!top) throw new RankerError()
  return top.guess
}

export function uniqueLetterCount(word: string): number {
  return new Set(word).size
}

/** Simple mode: the pool word with the most distinct letters, first one on ties. */
export function rankUniqueLetters(pool: readonly string[], topK = 1): Suggestion[] {
  if (pool.length === 0) throw new RankerError()
  return topSuggestions(
    pool.map((guess) => ({ guess, score: uniqueLetterCount(guess) })),
    topK,
  )
}

/**
 * For each letter, how many pool words contain it; a guess scores the sum over
 * its distinct letters.
 */
export function rankLetterCoverage(
  pool: readonly string[],
  guessSpace: readonly string[],
  topK = 1,
): Suggestion[] {
  if (pool.length === 0) throw new RankerError()
  if (pool.length === 1) return [{ guess: pool[0]!, score: 0 }]
  const coverage =new Array<number>(26).fill(0)
  for (const w of pool) {
    for (const ch of new Set(w)) {
      const c = ch.charCodeAt(0) - 97
      if (c >= 0 && c < 26) coverage[c]!++
    }
  }
  const space = guessSpace.length > 0 ? guessSpace : pool
  const scored = space.map((guess) => {
    let score = 0
    for (const ch of new Set(guess)) {
      const c = ch.charCodeAt(0) - 97
      if (c >= 0 && c < 26) score += coverage[c]!
    }
    return { guess, score }
  })
  return topSuggestions(scored, topK)
}
