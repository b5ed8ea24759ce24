// Session state & reducer for a solver game.
// A strict state machine: every transition returns a fresh state, and a
// rejected guess throws before anything is built, so the caller's state is
// never half-updated.
import { DEFAULT_LENGTH, isAllCorrect, type Feedback } from '@/solver/feedback'
import { filterCandidates } from '@/solver/filter'
import { GuessError } from '@/solver/errors'

export type SessionStatus = 'InProgress' | 'Solved' | 'Exhausted'

export interface GuessEntry {
  guess: string
  feedback: Feedback
}

export interface Settings {
  length: number
  attemptsMax: number
  hardMode: boolean
}

export interface SessionState {
  settings: Settings
  dictionary: readonly string[]
  pool: readonly string[] // words still consistent with every entry in history
  history: readonly GuessEntry[]
  status: SessionStatus
}

export type Action = { type: 'record'; payload: GuessEntry } | { type: 'reset' }

export const DEFAULT_ATTEMPTS = 6

export const DEFAULT_SETTINGS: Settings = {
  length: DEFAULT_LENGTH,
  attemptsMax: DEFAULT_ATTEMPTS,
  hardMode: false,
}

const lookup = new WeakMap<readonly string[], ReadonlySet<string>>()

function dictionarySet(dictionary: readonly string[]): ReadonlySet<string> {
  let set = lookup.get(dictionary)
  if (!set) {
    set = new Set(dictionary)
    lookup.set(dictionary, set)
  }
  return set
}

export function initialState(
  dictionary: readonly string[],
  settings: Partial<Settings> = {},
): SessionState {
  return {
    settings: { ...DEFAULT_SETTINGS, ...settings },
    dictionary,
    pool: dictionary,
    history: [],
    status: 'InProgress',
  }
}

/** Reason `guess` would be rejected right now, or null when it may be recorded. */
export function validateGuess(state: SessionState, guess: string): GuessError | null {
  const { length, hardMode } = state.settings
  if (state.status !== 'InProgress') {
    return new GuessError('GameAlreadyComplete', guess, `The game is already ${state.status.toLowerCase()}`)
  }
  if (guess.length !== length) {
    return new GuessError('InvalidGuessLength', guess, `Guesses must be ${length} letters long`)
  }
  if (state.history.some((h) => h.guess === guess)) {
    return new GuessError('DuplicateGuess', guess, `'${guess}' has already been guessed`)
  }
  if (!dictionarySet(state.dictionary).has(guess)) {
    return new GuessError('GuessNotInDictionary', guess, `'${guess}' is not a valid word`)
  }
  if (hardMode && !state.pool.includes(guess)) {
    return new GuessError(
      'HardModeViolation',
      guess,
      `'${guess}' does not use every letter revealed so far (hard mode)`,
    )
  }
  return null
}

export function recordGuess(state: SessionState, guess: string, feedback: Feedback): SessionState {
  const err = validateGuess(state, guess)
  if (err) throw err
  if (feedback.length !== state.settings.length) {
    throw new GuessError(
      'InvalidFeedbackLength',
      guess,
      `Feedback for '${guess}' must have ${state.settings.length} judgements`,
    )
  }
  const history = [...state.history, { guess, feedback }]
  const pool = filterCandidates(state.pool, guess, feedback)
  let status: SessionStatus = 'InProgress'
  if (isAllCorrect(feedback)) status = 'Solved'
  else if (history.length >= state.settings.attemptsMax) status = 'Exhausted'
  return { ...state, history, pool, status }
}

export function reducer(state: SessionState, action: Action): SessionState {
  switch (action.type) {
    case 'record':
      return recordGuess(state, action.payload.guess, action.payload.feedback)
    case 'reset':
      return initialState(state.dictionary, state.settings)
  }
}

/** Replay a partially played game; the first invalid entry aborts construction. */
export function createSession(
  dictionary: readonly string[],
  settings: Partial<Settings> = {},
  history: readonly GuessEntry[] = [],
): SessionState {
  let state = initialState(dictionary, settings)
  for (const entry of history) state = reducer(state, { type: 'record', payload: entry })
  return state
}

/**
 * Terminal status, or a pool of at most one word: nothing is left to
 * discriminate, so the interactive loop stops there too.
 */
export function isComplete(state: SessionState): boolean {
  return state.status !== 'InProgress' || state.pool.length <= 1
}
