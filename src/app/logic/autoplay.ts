import { recordGuess, type SessionState } from '@/app/state/session'
import { nextGuess, rankForSession, type SuggestOptions } from '@/app/logic/suggest'
import { scoreGuess } from '@/solver/feedback'

/**
 * Play a session to completion against a known answer, scoring every guess the
 * way the game would. A manual opener falls back to the ranker since nobody is
 * there to type the first word.
 */
export function playAuto(
  start: SessionState,
  answer: string,
  opts: SuggestOptions,
  onTurn?: (state: SessionState) => void,
): SessionState {
  let state = start
  while (state.status === 'InProgress') {
    const guess = nextGuess(state, opts) ?? rankForSession(state, opts.policy)[0]?.guess
    if (guess === undefined) break
    state = recordGuess(state, guess, scoreGuess(guess, answer))
    onTurn?.(state)
  }
  return state
}
