// Turns raw command-line values into a validated solver configuration.
import { DEFAULT_ATTEMPTS, DEFAULT_SETTINGS, type GuessEntry, type Settings } from '@/app/state/session'
import { fromSeed, parseHistory } from '@/app/seed'
import { parseFeedback } from '@/solver/feedback'
import { ConfigError } from '@/solver/errors'
import { mulberry32 } from '@/solver/random'
import { DEFAULT_POLICY, parsePolicyId, type PolicyId } from '@/policy/policies'
import { DEFAULT_OPENER_WORD, isOpenerKind, OPENER_KINDS, type OpenerPolicy } from '@/policy/openers'

export type RunMode = 'interactive' | 'suggest' | 'remain' | 'auto'

export interface RawOptions {
  guess: string[]
  result: string[]
  resume?: string
  hardMode: boolean
  suggest: boolean
  remain: boolean
  answer?: string
  policy: string
  opener: string
  openerWord?: string
  seed?: number
  length: number
  attempts?: number // unset: the saved limit from --resume, else the default
  wordlist?: string
  words?: string
  top: number
  verbose: boolean
}

export interface SolverConfig {
  mode: RunMode
  settings: Settings
  history: GuessEntry[]
  policy: PolicyId
  opener: OpenerPolicy
  wordlistId: string
  wordsFile: string | null
  answer: string | null // known answer for auto mode
  topK: number
  verbose: boolean
}

export const MAX_LENGTH = 15
export const MAX_ATTEMPTS = 20

function intInRange(option: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(option, `--${option} must be an integer between ${min} and ${max}`)
  }
  return value
}

function resolveMode(raw: RawOptions): RunMode {
  const picked = [
    raw.suggest ? 'suggest' : null,
    raw.remain ? 'remain' : null,
    raw.answer !== undefined ? 'answer' : null,
  ].filter((m): m is string => m !== null)
  const [, second] = picked
  if (second !== undefined) {
    throw new ConfigError(second, `--${picked.join(' and --')} are mutually exclusive`)
  }
  if (raw.suggest) return 'suggest'
  if (raw.remain) return 'remain'
  if (raw.answer !== undefined) return 'auto'
  return 'interactive'
}

function resolveOpener(raw: RawOptions): OpenerPolicy {
  if (!isOpenerKind(raw.opener)) {
    throw new ConfigError('opener', `Unknown opener '${raw.opener}' (expected one of ${OPENER_KINDS.join(', ')})`)
  }
  switch (raw.opener) {
    case 'ranked':
      return { kind: 'ranked' }
    case 'manual':
      return { kind: 'manual' }
    case 'fixed':
      return { kind: 'fixed', word: (raw.openerWord ?? DEFAULT_OPENER_WORD).toLowerCase() }
    case 'random':
      return { kind: 'random', rng: mulberry32(raw.seed ?? Date.now()) }
  }
}

interface ResolvedHistory {
  history: GuessEntry[]
  attemptsMax?: number // carried by a v1 seed
}

function resolveHistory(raw: RawOptions, length: number): ResolvedHistory {
  if (raw.resume !== undefined && raw.guess.length > 0) {
    throw new ConfigError('resume', '--resume cannot be combined with --guess/--result')
  }
  if (raw.resume !== undefined) {
    const seed = fromSeed(raw.resume)
    if (seed) {
      if (seed.length !== length) {
        throw new ConfigError('resume', `--resume was saved for ${seed.length}-letter words, not ${length}`)
      }
      return { history: seed.history, attemptsMax: seed.attemptsMax }
    }
    const history = parseHistory(raw.resume, length)
    if (!history) throw new ConfigError('resume', `Cannot read --resume value '${raw.resume}'`)
    return { history }
  }
  if (raw.guess.length !== raw.result.length) {
    throw new ConfigError(
      'result',
      `Number of guesses (${raw.guess.length}) must match number of results (${raw.result.length})`,
    )
  }
  return {
    history: raw.guess.map((g, i) => ({
      guess: g.trim().toLowerCase(),
      feedback: parseFeedback(raw.result[i]!, length),
    })),
  }
}

function resolveAttempts(given: number | undefined, saved: number | undefined): number {
  if (given === undefined) return intInRange('attempts', saved ?? DEFAULT_ATTEMPTS, 1, MAX_ATTEMPTS)
  const attemptsMax = intInRange('attempts', given, 1, MAX_ATTEMPTS)
  if (saved !== undefined && saved !== attemptsMax) {
    throw new ConfigError('attempts', `--attempts ${attemptsMax} does not match the ${saved} saved in --resume`)
  }
  return attemptsMax
}

export function resolveConfig(raw: RawOptions): SolverConfig {
  const mode = resolveMode(raw)
  const length = intInRange('length', raw.length, 1, MAX_LENGTH)
  const topK = intInRange('top', raw.top, 1, 100)
  if (raw.seed !== undefined && !Number.isInteger(raw.seed)) {
    throw new ConfigError('seed', '--seed must be an integer')
  }
  const answer = raw.answer !== undefined ? raw.answer.trim().toLowerCase() : null
  if (answer !== null && answer.length !== length) {
    throw new ConfigError('answer', `--answer must be ${length} letters long`)
  }
  const { history, attemptsMax: saved } = resolveHistory(raw, length)
  const attemptsMax = resolveAttempts(raw.attempts, saved)
  return {
    mode,
    settings: { ...DEFAULT_SETTINGS, length, attemptsMax, hardMode: raw.hardMode },
    history,
    policy: raw.policy ? parsePolicyId(raw.policy) : DEFAULT_POLICY,
    opener: resolveOpener(raw),
    wordlistId: raw.wordlist ?? `en-${length}`,
    wordsFile: raw.words ?? null,
    answer,
    topK,
    verbose: raw.verbose,
  }
}
