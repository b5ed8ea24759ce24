// Resume format: "v1;<L>;<T>;<g1>:<f1>,<g2>:<f2>,..."
// where f_k is the feedback for g_k in the default Y/I/N alphabet.
// Example: v1;5;6;raise:NNNNY,crane:NYNNY
// The bare history list ("raise:NNNNY,crane:NYNNY") is accepted as well.
import { parseFeedback, renderFeedback, DEFAULT_ALPHABET, type FeedbackAlphabet } from '@/solver/feedback'
import type { GuessEntry } from '@/app/state/session'

export interface SeedV1 {
  length: number
  attemptsMax: number
  history: GuessEntry[]
}

const PREFIX = 'v1;'

export function formatHistory(
  history: readonly GuessEntry[],
  alphabet: FeedbackAlphabet = DEFAULT_ALPHABET,
): string {
  return history.map((h) => `${h.guess}:${renderFeedback(h.feedback, alphabet)}`).join(',')
}

/** Parse "guess:feedback" pairs; a malformed feedback throws FeedbackError. */
export function parseHistory(
  text: string,
  length: number,
  alphabet: FeedbackAlphabet = DEFAULT_ALPHABET,
): GuessEntry[] | null {
  const history: GuessEntry[] = []
  if (!text.trim().length) return history
  for (const chunk of text.split(',')) {
    const [g, f, extra] = chunk.trim().split(':')
    if (!g || f === undefined || extra !== undefined) return null
    history.push({ guess: g.toLowerCase(), feedback: parseFeedback(f, length, alphabet) })
  }
  return history
}

export function toSeedV1(s: SeedV1): string {
  return `${PREFIX}${s.length | 0};${s.attemptsMax | 0};${formatHistory(s.history)}`
}

export function fromSeed(text: string): SeedV1 | null {
  const trimmed = text.trim()
  if (!trimmed.startsWith(PREFIX)) return null
  const [lengthPart, attemptsPart, ...rest] = trimmed.slice(PREFIX.length).split(';')
  if (lengthPart === undefined || attemptsPart === undefined || rest.length !== 1) return null
  const length = Number(lengthPart)
  const attemptsMax = Number(attemptsPart)
  if (!Number.isInteger(length) || !Number.isInteger(attemptsMax) || length <= 0 || attemptsMax <= 0) {
    return null
  }
  const history = parseHistory(rest[0]!, length)
  if (!history) return null
  return { length, attemptsMax, history }
}
