import type { SessionState } from '@/app/state/session'
import { suggestByPolicy, type PolicyId } from '@/policy/policies'
import { chooseOpener, type OpenerPolicy } from '@/policy/openers'
import type { Suggestion } from '@/solver/scoring'

export interface SuggestOptions {
  policy: PolicyId
  opener: OpenerPolicy
  topK?: number
  onProgress?: (fraction: number) => void
}

/**
 * Words the ranker may propose. Hard mode keeps to the live pool; otherwise
 * the whole dictionary, less words already played (they can't be recorded again).
 */
export function guessSpaceFor(state: SessionState): readonly string[] {
  if (state.settings.hardMode) return state.pool
  if (state.history.length === 0) return state.dictionary
  const played = new Set(state.history.map((h) => h.guess))
  return state.dictionary.filter((w) => !played.has(w))
}

export function rankForSession(
  state: SessionState,
  policy: PolicyId,
  topK = 1,
  onProgress?: (fraction: number) => void,
): Suggestion[] {
  return suggestByPolicy(policy, {
    pool: state.pool,
    guessSpace: guessSpaceFor(state),
    topK,
    onProgress,
  })
}

/** The word to play next, or null when a manual opener wants the caller to choose. */
export function nextGuess(state: SessionState, opts: SuggestOptions): string | null {
  if (state.history.length === 0) {
    const choice = chooseOpener(opts.opener, state.pool)
    if (choice.kind === 'prompt') return null
    if (choice.kind === 'word') return choice.word
  }
  const [top] = rankForSession(state, opts.policy, 1, opts.onProgress)
  return top ? top.guess : null
}
