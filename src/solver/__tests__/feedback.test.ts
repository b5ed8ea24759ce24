import { describe, it, expect } from 'vitest'
import {
  FeedbackError,
  feedbackEmoji,
  feedbackOf,
  isAllCorrect,
  LEGACY_ALPHABET,
  parseFeedback,
  renderFeedback,
  scoreGuess,
  TRIT_ALPHABET,
} from '@/solver'

function parseError(fn: () => unknown): FeedbackError {
  try {
    fn()
  } catch (err) {
    if (err instanceof FeedbackError) return err
    throw err
  }
  throw new Error('expected a FeedbackError')
}

describe('parseFeedback', () => {
  it('maps Y/I/N to correct/present/absent', () => {
    expect(parseFeedback('YYNIN')).toEqual([2, 2, 0, 1, 0])
  })

  it('ignores case and surrounding whitespace', () => {
    expect(parseFeedback('  yynin ')).toEqual([2, 2, 0, 1, 0])
  })

  it('rejects the wrong length', () => {
    const err = parseError(() => parseFeedback('YYNI'))
    expect(err.code).toBe('InvalidLength')
    expect(err.message).toBe('Feedback can only be created from a string of length 5, got 4')
  })

  it('rejects an unknown symbol and reports where it is', () => {
    const err = parseError(() => parseFeedback('YYNIX'))
    expect(err.code).toBe('InvalidSymbol')
    expect(err.index).toBe(4)
    expect(err.message).toBe("'X' is not a valid letter in feedback")
  })

  it('accepts other alphabets and lengths', () => {
    expect(parseFeedback('YY?N?', 5, LEGACY_ALPHABET)).toEqual([2, 2, 1, 0, 1])
    expect(parseFeedback('2100', 4, TRIT_ALPHABET)).toEqual([2, 1, 0, 0])
  })
})

describe('renderFeedback / feedbackEmoji', () => {
  it('renders each judgement as one symbol', () => {
    expect(renderFeedback([2, 1, 0, 0, 2])).toBe('YINNY')
    expect(renderFeedback([2, 1, 0], TRIT_ALPHABET)).toBe('210')
    expect(feedbackEmoji([2, 1, 0])).toBe('🟩🟨⬜')
  })
})

describe('feedbackOf', () => {
  it('accepts trits of the requested length', () => {
    expect(feedbackOf([2, 2, 2], 3)).toEqual([2, 2, 2])
  })

  it('rejects values outside 0..2 and wrong lengths', () => {
    expect(parseError(() => feedbackOf([3, 0, 0, 0, 0])).code).toBe('InvalidSymbol')
    expect(parseError(() => feedbackOf([0, 0])).code).toBe('InvalidLength')
  })
})

describe('isAllCorrect', () => {
  it('is true only for non-empty all-green feedback', () => {
    expect(isAllCorrect([2, 2, 2, 2, 2])).toBe(true)
    expect(isAllCorrect([2, 2, 1, 2, 2])).toBe(false)
    expect(isAllCorrect([])).toBe(false)
  })
})

describe('scoreGuess', () => {
  it('scores a solved word as all green', () => {
    expect(scoreGuess('crane', 'crane')).toEqual([2, 2, 2, 2, 2])
  })

  it('gives greens first and lets yellows consume what is left', () => {
    expect(scoreGuess('sassy', 'glass')).toEqual([1, 1, 0, 2, 0])
    expect(renderFeedback(scoreGuess('sassy', 'glass'))).toBe('IINYN')
  })

  it('does not mark more copies of a letter than the answer holds', () => {
    expect(scoreGuess('abba', 'babb')).toEqual([1, 1, 2, 0])
    expect(scoreGuess('civic', 'cigar')).toEqual([2, 2, 0, 0, 0])
    expect(scoreGuess('eagle', 'allee')).toEqual([1, 1, 0, 1, 2])
  })

  it('throws on mismatched lengths', () => {
    expect(() => scoreGuess('abc', 'abcd')).toThrow('Guess and answer must have same length')
  })
})
