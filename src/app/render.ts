// Plain-text rendering of the game state for the terminal.
import { DEFAULT_ALPHABET, Judgement, feedbackEmoji, type FeedbackAlphabet } from '@/solver/feedback'
import type { SessionState } from '@/app/state/session'

export interface MenuAction {
  symbol: string
  label: string
}

export function renderLegend(alphabet: FeedbackAlphabet = DEFAULT_ALPHABET): string {
  const pairs: Array<[string, string]> = [
    [feedbackEmoji([Judgement.Correct]), alphabet.correct],
    [feedbackEmoji([Judgement.Present]), alphabet.present],
    [feedbackEmoji([Judgement.Absent]), alphabet.absent],
  ]
  return `| ${pairs.map(([e, s]) => `${e} -> ${s}`).join(' | ')} |`
}

export function renderMenu(actions: readonly MenuAction[]): string {
  return `| ${actions.map((a) => `${a.symbol}: ${a.label}`).join(' | ')} |`
}

/** One line per guess: tiles, then the word. Empty when nothing was played. */
export function renderBoard(state: SessionState): string[] {
  return state.history.map((h) => `${feedbackEmoji(h.feedback)} | ${h.guess}`)
}

export function renderRemainingCount(state: SessionState): string {
  const n = state.pool.length
  return `${n} remaining`
}

/** Remaining words, `perLine` to a line, tab separated. */
export function renderWordGrid(words: readonly string[], perLine = 20): string {
  const lines: string[] = []
  for (let i = 0; i < words.length; i += perLine) {
    lines.push(words.slice(i, i + perLine).join('\t'))
  }
  return lines.join('\n')
}

export function renderEndgame(state: SessionState): string[] {
  const out: string[] = []
  if (state.status === 'Solved') {
    const last = state.history[state.history.length - 1]
    if (last) out.push(`Solved in ${state.history.length}: '${last.guess}'`)
    return out
  }
  if (state.status === 'Exhausted') out.push('Maximum guesses exceeded')
  if (state.pool.length === 1) out.push(`The answer is '${state.pool[0]!}'`)
  if (state.pool.length === 0) out.push('No valid words remain, check your guesses and results')
  return out
}
