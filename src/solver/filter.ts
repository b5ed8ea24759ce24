import { Judgement, isAllCorrect, type Feedback } from './feedback'

interface GuessConstraint {
  guess: string
  feedback: Feedback
  confirmed: number[]
  solved: boolean // all-Correct: the guess itself is the answer
}

/**
 * Per-letter count of Correct + Present judgements across the whole guess.
 * An Absent judgement for a letter caps the answer's count of it at this budget.
 */
export function confirmedLetterCounts(guess: string, feedback: Feedback): number[] {
  const counts = new Array<number>(26).fill(0)
  for (let i = 0; i < guess.length; i++) {
    const j = feedback[i]
    if (j === Judgement.Correct || j === Judgement.Present) {
      const c = guess.charCodeAt(i) - 97
      if (c >= 0 && c < 26) counts[c]!++
    }
  }
  return counts
}

function countLetter(word: string, code: number): number {
  let n = 0
  for (let i = 0; i < word.length; i++) if (word.charCodeAt(i) === code) n++
  return n
}

function constraintOf(guess: string, feedback: Feedback): GuessConstraint {
  return {
    guess,
    feedback,
    confirmed: confirmedLetterCounts(guess, feedback),
    solved: isAllCorrect(feedback),
  }
}

function matches(word: string, { guess, feedback, confirmed, solved }: GuessConstraint): boolean {
  // a guess that did not win cannot be the answer
  if (word === guess) return solved && feedback.length === guess.length
  if (word.length !== guess.length) return false
  for (let i = 0; i < guess.length; i++) {
    const letter = guess[i]!
    switch (feedback[i]) {
      case Judgement.Correct:
        if (word[i] !== letter) return false
        break
      case Judgement.Present:
        if (word[i] === letter || !word.includes(letter)) return false
        break
      case Judgement.Absent: {
        const code = letter.charCodeAt(0)
        const c = code - 97
        const budget = c >= 0 && c < 26 ? confirmed[c]! : 0
        if (countLetter(word, code) > budget) return false
        break
      }
      default:
        return false
    }
  }
  return true
}

/** True when `word` could still be the answer after `guess` scored `feedback`. */
export function isConsistent(word: string, guess: string, feedback: Feedback): boolean {
  return matches(word, constraintOf(guess, feedback))
}

export function filterCandidates(
  words: readonly string[],
  guess: string,
  feedback: Feedback,
): string[] {
  const constraint = constraintOf(guess, feedback)
  return words.filter((w) => matches(w, constraint))
}

/** Dictionary plus an alive mask; applying feedback only ever clears entries. */
export class CandidateSet {
  private readonly words: readonly string[]
  private readonly alive: Uint8Array
  private remaining: number

  constructor(words: readonly string[]) {
    this.words = words.slice()
    this.alive = new Uint8Array(this.words.length).fill(1)
    this.remaining = this.words.length
  }

  size(): number {
    return this.words.length
  }

  aliveCount(): number {
    return this.remaining
  }

  has(word: string): boolean {
    const i = this.words.indexOf(word)
    return i >= 0 && this.alive[i] === 1
  }

  applyFeedback(guess: string, feedback: Feedback): void {
    const constraint = constraintOf(guess, feedback)
    for (let i = 0; i < this.words.length; i++) {
      if (this.alive[i] !== 1) continue
      if (!matches(this.words[i]!, constraint)) {
        this.alive[i] = 0
        this.remaining--
      }
    }
  }

  getAliveWords(): string[] {
    return this.words.filter((_, i) => this.alive[i] === 1)
  }
}
