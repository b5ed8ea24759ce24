import { isComplete, recordGuess, validateGuess, type SessionState } from '@/app/state/session'
import { wouldEliminateAll } from '@/app/logic/constraints'
import { nextGuess, rankForSession, type SuggestOptions } from '@/app/logic/suggest'
import { toSeedV1 } from '@/app/seed'
import {
  renderBoard,
  renderEndgame,
  renderLegend,
  renderMenu,
  renderRemainingCount,
  renderWordGrid,
  type MenuAction,
} from '@/app/render'
import { parseFeedback, type Feedback } from '@/solver/feedback'
import { isWordleError } from '@/solver/errors'
import { track } from '@/telemetry'
import type { Output, Prompter } from './io'

export interface InteractiveOptions extends SuggestOptions {
  title: string
}

type ActionId = 'suggest' | 'remaining' | 'guess' | 'quit'

const ACTIONS: ReadonlyArray<MenuAction & { id: ActionId }> = [
  { id: 'suggest', symbol: 'S', label: 'Suggestion' },
  { id: 'remaining', symbol: 'R', label: 'Remaining Words' },
  { id: 'guess', symbol: 'G', label: 'Add Guess' },
  { id: 'quit', symbol: 'Q', label: 'Quit' },
]

const QUIT = Symbol('quit')

export class InteractiveSession {
  private state: SessionState

  constructor(
    initial: SessionState,
    private readonly opts: InteractiveOptions,
    private readonly prompter: Prompter,
    private readonly io: Output,
  ) {
    this.state = initial
  }

  get current(): SessionState {
    return this.state
  }

  /** Run until the game completes or the user quits; resolves to the last state. */
  async run(): Promise<SessionState> {
    this.renderHeader()
    let dirty = true
    while (!isComplete(this.state)) {
      if (dirty) this.renderGamestate()
      const answer = await this.prompter.ask('> ')
      if (answer === null) return this.quit()
      const action = ACTIONS.find((a) => a.symbol === answer.trim().toUpperCase())
      if (!action) continue
      const result = await this.perform(action.id)
      if (result === QUIT) return this.quit()
      dirty = result
      this.io.out('')
    }
    this.renderGamestate()
    for (const line of renderEndgame(this.state)) this.io.out(line)
    track({
      name: 'session_end',
      props: { status: this.state.status, turns: this.state.history.length, S: this.state.pool.length },
    })
    return this.state
  }

  private async perform(id: ActionId): Promise<boolean | typeof QUIT> {
    switch (id) {
      case 'suggest':
        return this.actionSuggestion()
      case 'remaining':
        this.io.out(renderWordGrid(this.state.pool))
        return false
      case 'guess':
        return this.actionGuess()
      case 'quit':
        return QUIT
    }
  }

  private quit(): SessionState {
    if (this.state.history.length > 0) {
      const { length, attemptsMax, hardMode } = this.state.settings
      const seed = toSeedV1({ length, attemptsMax, history: [...this.state.history] })
      this.io.out(`Resume with: --resume "${seed}"${hardMode ? ' --hard-mode' : ''}`)
    }
    return this.state
  }

  private renderHeader(): void {
    this.io.out(this.opts.title)
    this.io.out(renderLegend())
    this.io.out(renderMenu(ACTIONS))
    this.io.out('')
  }

  private renderGamestate(): void {
    if (this.state.history.length === 0) return
    for (const line of renderBoard(this.state)) this.io.out(line)
    this.io.out(renderRemainingCount(this.state))
    this.io.out('')
  }

  private suggestion(): string | null {
    const started = Date.now()
    const guess = nextGuess(this.state, this.opts)
    track({
      name: 'suggest_requested',
      props: { policy: this.opts.policy, S: this.state.pool.length, ms: Date.now() - started },
    })
    return guess
  }

  private async actionSuggestion(): Promise<boolean> {
    const guess = this.suggestion()
    if (guess === null) {
      // manual opener: the first word is the user's call
      return this.actionGuess()
    }
    const topK = this.opts.topK ?? 1
    const alternatives =
      topK > 1
        ? rankForSession(this.state, this.opts.policy, topK)
            .map((s) => s.guess)
            .filter((g) => g !== guess)
            .slice(0, topK - 1)
        : []
    this.io.out(`Try '${guess}'`)
    if (alternatives.length > 0) this.io.out(`  or: ${alternatives.join(', ')}`)
    const feedback = await this.promptFeedback()
    if (!feedback) return false
    return this.record(guess, feedback)
  }

  private async actionGuess(): Promise<boolean> {
    const raw = await this.prompter.ask('guess: ')
    if (raw === null) return false
    const guess = raw.trim().toLowerCase()
    const invalid = validateGuess(this.state, guess)
    if (invalid) {
      track({ name: 'guess_rejected', props: { code: invalid.code } })
      this.io.out(`'${guess}' is not a valid guess: ${invalid.message}`)
      return false
    }
    const feedback = await this.promptFeedback()
    if (!feedback) return false
    return this.record(guess, feedback)
  }

  private async promptFeedback(): Promise<Feedback | null> {
    const raw = await this.prompter.ask('result: ')
    if (raw === null) return null
    try {
      return parseFeedback(raw, this.state.settings.length)
    } catch (err) {
      if (!isWordleError(err)) throw err
      track({ name: 'guess_rejected', props: { code: err.code } })
      this.io.out(`'${raw.trim()}' is not a valid result: ${err.message}`)
      return null
    }
  }

  private record(guess: string, feedback: Feedback): boolean {
    const { dictionary, history } = this.state
    if (wouldEliminateAll(dictionary, history, guess, feedback)) {
      this.io.err('Warning: no word in the list fits that result; check the guesses and results')
    }
    try {
      this.state = recordGuess(this.state, guess, feedback)
    } catch (err) {
      if (!isWordleError(err)) throw err
      track({ name: 'guess_rejected', props: { code: err.code } })
      this.io.out(err.message)
      return false
    }
    track({ name: 'guess_recorded', props: { turn: this.state.history.length, S: this.state.pool.length } })
    return true
  }
}
