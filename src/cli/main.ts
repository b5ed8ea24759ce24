/* eslint-env node */
/**
 * wordle-solver CLI
 * Suggests guesses for a Wordle game, either interactively or one shot
 * (--suggest / --remain), and can auto-play against a known answer (--answer).
 */

import { Command, CommanderError } from 'commander'
import { resolveConfig, type RawOptions, type SolverConfig } from '@/app/config'
import { createSession, type SessionState } from '@/app/state/session'
import { nextGuess, rankForSession } from '@/app/logic/suggest'
import { playAuto } from '@/app/logic/autoplay'
import { renderBoard, renderEndgame } from '@/app/render'
import { loadWordlistSetById, loadWordsFile } from '@/solver/data/loader'
import { ConfigError, isWordleError } from '@/solver/errors'
import { DEFAULT_POLICY, POLICY_IDS } from '@/policy/policies'
import { assertOpenerUsable, DEFAULT_OPENER_WORD, OPENER_KINDS } from '@/policy/openers'
import { setTelemetryEnabled, track } from '@/telemetry'
import { consoleOutput, terminalPrompter, type Output, type Prompter } from './io'
import { InteractiveSession } from './interactive'

export const PROGRAM = 'wordle-solver'
export const VERSION = '0.1.0'

export interface RunDeps {
  io?: Output
  prompter?: Prompter
  wordlistDir?: string
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function toInt(value: string): number {
  return Number(value)
}

export function buildProgram(io: Output): Command {
  const program = new Command(PROGRAM)
  program
    .version(VERSION)
    .description('Suggest guesses for a game of Wordle and narrow down the answer')
    .option('-g, --guess <word>', 'Word already guessed in an in-progress game (repeatable)', collect, [])
    .option(
      '-f, --result <feedback>',
      "Result for the matching --guess: 'Y' green, 'I' yellow, 'N' grey (repeatable)",
      collect,
      [],
    )
    .option('--resume <history>', 'Resume from a saved history, e.g. "v1;5;6;raise:NNNNY"')
    .option('--hard-mode', 'Enable hard mode compatibility', false)
    .option('-s, --suggest', 'Print a single suggested word and exit', false)
    .option('-r, --remain', 'List the remaining valid words and exit', false)
    .option('-a, --answer <word>', 'Auto-play against a known answer')
    .option('--policy <id>', `Ranking policy (${POLICY_IDS.join(', ')})`, DEFAULT_POLICY)
    .option('--opener <kind>', `First-guess policy (${OPENER_KINDS.join(', ')})`, 'ranked')
    .option('--opener-word <word>', `Word for --opener fixed (default ${DEFAULT_OPENER_WORD})`)
    .option('--seed <n>', 'RNG seed for --opener random', toInt)
    .option('--length <n>', 'Word length', toInt, 5)
    .option('--attempts <n>', 'Maximum number of guesses (default 6, or the limit saved in --resume)', toInt)
    .option('--top <n>', 'Number of suggestions to show', toInt, 1)
    .option('--wordlist <id>', 'Word list id from the manifest (default en-<length>)')
    .option('--words <path>', 'Load words from a file, one per line')
    .option('-v, --verbose', 'Write debug events to stderr', false)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s.trimEnd()),
      writeErr: (s) => io.err(s.trimEnd()),
    })
  return program
}

async function loadDictionary(config: SolverConfig, dir?: string): Promise<string[]> {
  const { length } = config.settings
  if (config.wordsFile) return loadWordsFile(config.wordsFile, length)
  const set = await loadWordlistSetById(config.wordlistId, dir)
  if (set.length !== length) {
    throw new ConfigError('wordlist', `Word list ${set.id} holds ${set.length}-letter words, not ${length}`)
  }
  return set.words
}

function printSuggestion(state: SessionState, config: SolverConfig, io: Output): number {
  if (state.status !== 'InProgress') {
    io.err(`The game is already ${state.status.toLowerCase()}`)
    return 1
  }
  const first = nextGuess(state, config) ?? rankForSession(state, config.policy)[0]?.guess
  if (first === undefined) return 1
  io.out(first)
  if (config.topK > 1) {
    const rest = rankForSession(state, config.policy, config.topK)
      .map((s) => s.guess)
      .filter((g) => g !== first)
    for (const g of rest.slice(0, config.topK - 1)) io.out(g)
  }
  return 0
}

function runAuto(state: SessionState, config: SolverConfig, io: Output): number {
  const answer = config.answer
  if (answer === null) throw new ConfigError('answer', '--answer is required for auto-play')
  if (!state.dictionary.includes(answer)) {
    throw new ConfigError('answer', `'${answer}' is not in the word list`)
  }
  const end = playAuto(state, answer, config, (s) => {
    const line = renderBoard(s).at(-1)
    if (line) io.out(`${line}  (${s.pool.length} remaining)`)
  })
  for (const line of renderEndgame(end)) io.out(line)
  return 0
}

export async function run(argv: readonly string[], deps: RunDeps = {}): Promise<number> {
  const io = deps.io ?? consoleOutput
  const program = buildProgram(io)
  try {
    program.parse([...argv])
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
  try {
    const config = resolveConfig(program.opts<RawOptions>())
    if (config.verbose) setTelemetryEnabled(true)
    const dictionary = await loadDictionary(config, deps.wordlistDir)
    assertOpenerUsable(config.opener, dictionary)
    const state = createSession(dictionary, config.settings, config.history)
    track({
      name: 'session_start',
      props: { ...config.settings, words: dictionary.length },
    })
    switch (config.mode) {
      case 'remain':
        for (const w of state.pool) io.out(w)
        return 0
      case 'suggest':
        return printSuggestion(state, config, io)
      case 'auto':
        return runAuto(state, config, io)
      case 'interactive': {
        const prompter = deps.prompter ?? terminalPrompter()
        try {
          const session = new InteractiveSession(
            state,
            { ...config, title: `${PROGRAM} (v${VERSION}), ${dictionary.length} words loaded` },
            prompter,
            io,
          )
          await session.run()
        } finally {
          prompter.close()
        }
        return 0
      }
    }
  } catch (err) {
    if (!isWordleError(err)) throw err
    io.err(err.message)
    return 1
  }
}
