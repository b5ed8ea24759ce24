import { describe, it, expect } from 'vitest'
import { guessSpaceFor, nextGuess, rankForSession } from '@/app/logic/suggest'
import { playAuto } from '@/app/logic/autoplay'
import { initialState, recordGuess, type SessionState } from '@/app/state/session'
import { parseFeedback } from '@/solver/feedback'
import { POLICY_IDS } from '@/policy/policies'

const DICT = ['crane', 'slate', 'trace', 'crate', 'react', 'brace', 'grace']

const WORDS = [
  'crane', 'slate', 'trace', 'crate', 'react', 'brace', 'grace', 'apple', 'ample', 'amble',
  'glass', 'class', 'brass', 'sassy', 'pilot', 'bloom', 'dough', 'stoic', 'music', 'cloud',
  'raise', 'arise', 'stare', 'tears', 'rates', 'eagle', 'geese', 'eerie', 'llama', 'mamma',
]

describe('guessSpaceFor', () => {
  it('uses the dictionary on round one', () => {
    const s = initialState(DICT)
    expect(guessSpaceFor(s)).toBe(DICT)
  })

  it('drops played words in normal mode', () => {
    const s = recordGuess(initialState(DICT), 'slate', parseFeedback('NNYNY'))
    expect(guessSpaceFor(s)).toEqual(['crane', 'trace', 'crate', 'react', 'brace', 'grace'])
  })

  it('keeps to the pool in hard mode', () => {
    const s = recordGuess(initialState(DICT, { hardMode: true }), 'slate', parseFeedback('NNYNY'))
    expect(guessSpaceFor(s)).toEqual(['crane', 'brace', 'grace'])
  })
})

describe('nextGuess', () => {
  it('follows the opener on round one only', () => {
    const s = initialState(DICT)
    expect(nextGuess(s, { policy: 'pairwise', opener: { kind: 'fixed', word: 'trace' } })).toBe('trace')
    expect(nextGuess(s, { policy: 'pairwise', opener: { kind: 'manual' } })).toBeNull()
    const later = recordGuess(s, 'slate', parseFeedback('NNYNY'))
    expect(nextGuess(later, { policy: 'pairwise', opener: { kind: 'manual' } })).toBe('brace')
  })

  it('ranks round one when the opener says so', () => {
    const s = initialState(DICT)
    expect(nextGuess(s, { policy: 'pairwise', opener: { kind: 'ranked' } })).toBe(rankForSession(s, 'pairwise')[0]?.guess)
  })
})

describe('playAuto', () => {
  it('solves a short game', () => {
    const turns: SessionState[] = []
    const end = playAuto(
      initialState(DICT),
      'crane',
      { policy: 'pairwise', opener: { kind: 'fixed', word: 'trace' } },
      (s) => turns.push(s),
    )
    expect(end.status).toBe('Solved')
    expect(end.history.map((h) => h.guess)).toEqual(['trace', 'crane'])
    expect(turns).toHaveLength(2)
  })

  for (const policy of POLICY_IDS) {
    for (const hardMode of [false, true]) {
      it(`${policy}${hardMode ? ' (hard)' : ''} ends every game and never loses the answer`, () => {
        const start = initialState(WORDS, { hardMode })
        for (const answer of WORDS) {
          const end = playAuto(start, answer, { policy, opener: { kind: 'ranked' } }, (s) => {
            if (s.status === 'InProgress') expect(s.pool).toContain(answer)
          })
          expect(end.history.length).toBeLessThanOrEqual(6)
          expect(['Solved', 'Exhausted']).toContain(end.status)
          if (end.status === 'Solved') expect(end.history.at(-1)?.guess).toBe(answer)
        }
      })
    }
  }
})
