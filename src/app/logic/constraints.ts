import { CandidateSet } from '@/solver/filter'
import type { Feedback } from '@/solver/feedback'
import type { GuessEntry } from '@/app/state/session'

/** Build a CandidateSet from an initial word list and prior guess history. */
export function buildCandidates(words: readonly string[], history: readonly GuessEntry[]): CandidateSet {
  const cs = new CandidateSet(words)
  for (const { guess, feedback } of history) {
    if (guess.length !== feedback.length) continue // malformed rows carry no constraint
    cs.applyFeedback(guess, feedback)
  }
  return cs
}

/**
 * Return true if applying (nextGuess, nextFeedback) would eliminate all candidates.
 * Lets the prompt warn that a feedback string contradicts what is still possible.
 */
export function wouldEliminateAll(
  words: readonly string[],
  history: readonly GuessEntry[],
  nextGuess: string,
  nextFeedback: Feedback,
): boolean {
  if (nextGuess.length !== nextFeedback.length) return false
  const cs = buildCandidates(words, history)
  cs.applyFeedback(nextGuess, nextFeedback)
  return cs.aliveCount() === 0
}
