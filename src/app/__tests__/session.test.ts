import { describe, it, expect } from 'vitest'
import {
  createSession,
  initialState,
  isComplete,
  recordGuess,
  reducer,
  validateGuess,
  type SessionState,
} from '@/app/state/session'
import { parseFeedback } from '@/solver/feedback'
import { GuessError, type GuessErrorCode } from '@/solver/errors'

const DICT = ['crane', 'slate', 'trace', 'crate', 'react']

function codeOf(fn: () => unknown): GuessErrorCode {
  try {
    fn()
  } catch (err) {
    if (err instanceof GuessError) return err.code
    throw err
  }
  throw new Error('expected a GuessError')
}

describe('initialState', () => {
  it('starts in progress with the whole dictionary in the pool', () => {
    const s = initialState(DICT)
    expect(s.status).toBe('InProgress')
    expect(s.pool).toEqual(DICT)
    expect(s.history).toEqual([])
    expect(s.settings).toEqual({ length: 5, attemptsMax: 6, hardMode: false })
  })
})

describe('recordGuess', () => {
  it('appends to the history and narrows the pool', () => {
    const s = recordGuess(initialState(DICT), 'trace', parseFeedback('NYYIY'))
    expect(s.history).toEqual([{ guess: 'trace', feedback: [0, 2, 2, 1, 2] }])
    expect(s.pool).toEqual(['crane'])
    expect(s.status).toBe('InProgress')
    expect(isComplete(s)).toBe(true)
  })

  it('rejects guesses of the wrong length or outside the dictionary', () => {
    const s = initialState(DICT)
    expect(codeOf(() => recordGuess(s, 'cran', parseFeedback('NNNN', 4)))).toBe('InvalidGuessLength')
    expect(codeOf(() => recordGuess(s, 'zzzzz', parseFeedback('NNNNN')))).toBe('GuessNotInDictionary')
  })

  it('rejects feedback of the wrong length', () => {
    expect(codeOf(() => recordGuess(initialState(DICT), 'crane', [0, 0, 0]))).toBe('InvalidFeedbackLength')
  })

  it('rejects a word already played', () => {
    const s = recordGuess(initialState(DICT), 'slate', parseFeedback('NNNNN'))
    expect(codeOf(() => recordGuess(s, 'slate', parseFeedback('NNNNN')))).toBe('DuplicateGuess')
  })

  it('leaves the caller state untouched on rejection', () => {
    const s = initialState(DICT)
    const before = JSON.stringify(s)
    expect(() => recordGuess(s, 'zzzzz', parseFeedback('NNNNN'))).toThrow(GuessError)
    expect(JSON.stringify(s)).toBe(before)
  })

  it('allows words outside the pool in normal mode', () => {
    const s = recordGuess(initialState(DICT), 'trace', parseFeedback('NYYIY'))
    const next = recordGuess(s, 'slate', parseFeedback('NNYNY'))
    expect(next.history).toHaveLength(2)
  })

  it('enforces hard mode against the live pool', () => {
    const s = recordGuess(initialState(DICT, { hardMode: true }), 'trace', parseFeedback('NYYIY'))
    expect(s.pool).toEqual(['crane'])
    const err = validateGuess(s, 'slate')
    expect(err?.code).toBe('HardModeViolation')
    expect(err?.message).toBe("'slate' does not use every letter revealed so far (hard mode)")
    expect(validateGuess(s, 'crane')).toBeNull()
  })

  it('ends Solved on an all-correct result and refuses more guesses', () => {
    const s = recordGuess(initialState(DICT), 'crane', parseFeedback('YYYYY'))
    expect(s.status).toBe('Solved')
    expect(s.pool).toEqual(['crane'])
    expect(codeOf(() => recordGuess(s, 'slate', parseFeedback('NNNNN')))).toBe('GameAlreadyComplete')
  })

  it('ends Exhausted when the attempts run out', () => {
    const dict = ['crane', 'slate', 'pilot', 'bloom', 'dough']
    let s = initialState(dict, { attemptsMax: 2 })
    s = recordGuess(s, 'pilot', parseFeedback('NNNNN'))
    expect(s.pool).toEqual(['crane'])
    s = recordGuess(s, 'dough', parseFeedback('NNNNN'))
    expect(s.status).toBe('Exhausted')
    expect(codeOf(() => recordGuess(s, 'crane', parseFeedback('YYYYY')))).toBe('GameAlreadyComplete')
  })
})

describe('reducer', () => {
  it('records and resets', () => {
    let s: SessionState = initialState(DICT, { hardMode: true })
    s = reducer(s, { type: 'record', payload: { guess: 'slate', feedback: parseFeedback('NNYNY') } })
    expect(s.history).toHaveLength(1)
    s = reducer(s, { type: 'reset' })
    expect(s.history).toEqual([])
    expect(s.pool).toEqual(DICT)
    expect(s.settings.hardMode).toBe(true)
  })
})

describe('createSession', () => {
  it('replays a history', () => {
    const s = createSession(DICT, { hardMode: true }, [{ guess: 'trace', feedback: parseFeedback('NYYIY') }])
    expect(s.pool).toEqual(['crane'])
  })

  it('stops at the first invalid entry', () => {
    const entry = { guess: 'slate', feedback: parseFeedback('NNNNN') }
    expect(codeOf(() => createSession(DICT, {}, [entry, entry]))).toBe('DuplicateGuess')
  })
})
