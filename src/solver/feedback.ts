import { FeedbackError } from './errors'

// Trit meanings: 0=absent (gray), 1=present (yellow), 2=correct (green)
export const Judgement = {
  Absent: 0,
  Present: 1,
  Correct: 2,
} as const

export type Judgement = (typeof Judgement)[keyof typeof Judgement]

export type Feedback = readonly Judgement[]

export const DEFAULT_LENGTH = 5

/** One input symbol per judgement. Symbols are matched after upper-casing. */
export interface FeedbackAlphabet {
  correct: string
  present: string
  absent: string
}

export const DEFAULT_ALPHABET: FeedbackAlphabet = { correct: 'Y', present: 'I', absent: 'N' }
export const LEGACY_ALPHABET: FeedbackAlphabet = { correct: 'Y', present: '?', absent: 'N' }
export const TRIT_ALPHABET: FeedbackAlphabet = { correct: '2', present: '1', absent: '0' }

const EMOJI: Record<Judgement, string> = {
  [Judgement.Absent]: '⬜',
  [Judgement.Present]: '🟨',
  [Judgement.Correct]: '🟩',
}

function symbolFor(j: Judgement, alphabet: FeedbackAlphabet): string {
  switch (j) {
    case Judgement.Correct:
      return alphabet.correct
    case Judgement.Present:
      return alphabet.present
    case Judgement.Absent:
      return alphabet.absent
  }
}

function judgementFor(symbol: string, alphabet: FeedbackAlphabet): Judgement | null {
  if (symbol === alphabet.correct.toUpperCase()) return Judgement.Correct
  if (symbol === alphabet.present.toUpperCase()) return Judgement.Present
  if (symbol === alphabet.absent.toUpperCase()) return Judgement.Absent
  return null
}

export function isJudgement(v: unknown): v is Judgement {
  return v === 0 || v === 1 || v === 2
}

/** Build feedback from raw trits, checking every value and the length. */
export function feedbackOf(trits: readonly number[], length = DEFAULT_LENGTH): Feedback {
  if (trits.length !== length) {
    throw new FeedbackError(
      'InvalidLength',
      trits.join(''),
      `Feedback must have exactly ${length} judgements, got ${trits.length}`,
    )
  }
  const out: Judgement[] = []
  for (let i = 0; i < trits.length; i++) {
    const t = trits[i]
    if (!isJudgement(t)) {
      throw new FeedbackError('InvalidSymbol', trits.join(''), `'${String(t)}' is not a judgement`, i)
    }
    out.push(t)
  }
  return out
}

export function parseFeedback(
  text: string,
  length = DEFAULT_LENGTH,
  alphabet: FeedbackAlphabet = DEFAULT_ALPHABET,
): Feedback {
  const input = text.trim().toUpperCase()
  if (input.length !== length) {
    throw new FeedbackError(
      'InvalidLength',
      text,
      `Feedback can only be created from a string of length ${length}, got ${input.length}`,
    )
  }
  const out: Judgement[] = []
  for (let i = 0; i < input.length; i++) {
    const ch = input[i]!
    const j = judgementFor(ch, alphabet)
    if (j === null) {
      throw new FeedbackError('InvalidSymbol', text, `'${ch}' is not a valid letter in feedback`, i)
    }
    out.push(j)
  }
  return out
}

export function renderFeedback(
  feedback: Feedback,
  alphabet: FeedbackAlphabet = DEFAULT_ALPHABET,
): string {
  return feedback.map((j) => symbolFor(j, alphabet)).join('')
}

export function feedbackEmoji(feedback: Feedback): string {
  return feedback.map((j) => EMOJI[j]).join('')
}

export function isAllCorrect(feedback: Feedback): boolean {
  return feedback.length > 0 && feedback.every((j) => j === Judgement.Correct)
}

/** Feedback the game shows when `guess` is played against the hidden `answer`. */
export function scoreGuess(guess: string, answer: string): Feedback {
  if (guess.length !== answer.length) {
    throw new Error('Guess and answer must have same length')
  }
  const L = guess.length
  const result = new Array<Judgement>(L).fill(Judgement.Absent)

  // Letter counts for the answer (lowercase a-z)
  const counts = new Array<number>(26).fill(0)
  for (let i = 0; i < L; i++) {
    const c = answer.charCodeAt(i) - 97
    if (c >= 0 && c < 26) counts[c]!++
  }

  // First pass: greens
  for (let i = 0; i < L; i++) {
    if (guess[i] === answer[i]) {
      result[i] = Judgement.Correct
      const c = guess.charCodeAt(i) - 97
      if (c >= 0 && c < 26) counts[c]!--
    }
  }

  // Second pass: yellows consume what the greens left
  for (let i = 0; i < L; i++) {
    if (result[i] === Judgement.Correct) continue
    const c = guess.charCodeAt(i) - 97
    if (c >= 0 && c < 26 && counts[c]! > 0) {
      result[i] = Judgement.Present
      counts[c]!--
    }
  }

  return result
}
