import { pickIndex, type Rng } from '@/solver/random'
import { ConfigError } from '@/solver/errors'

export type OpenerKind = 'ranked' | 'fixed' | 'random' | 'manual'

export const OPENER_KINDS: readonly OpenerKind[] = ['ranked', 'fixed', 'random', 'manual']

// Strong opener from a brute-force search over the answer list.
export const DEFAULT_OPENER_WORD = 'raise'

export type OpenerPolicy =
  | { kind: 'ranked' } // run the ranking policy on round one like any other round
  | { kind: 'fixed'; word: string }
  | { kind: 'random'; rng: Rng }
  | { kind: 'manual' } // the caller supplies the first word itself

export type OpenerChoice = { kind: 'word'; word: string } | { kind: 'rank' } | { kind: 'prompt' }

export function isOpenerKind(v: string): v is OpenerKind {
  return OPENER_KINDS.some((k) => k === v)
}

export function chooseOpener(policy: OpenerPolicy, pool: readonly string[]): OpenerChoice {
  switch (policy.kind) {
    case 'ranked':
      return { kind: 'rank' }
    case 'manual':
      return { kind: 'prompt' }
    case 'fixed':
      return { kind: 'word', word: policy.word }
    case 'random':
      if (pool.length === 0) return { kind: 'rank' } // ranker reports the empty pool
      return { kind: 'word', word: pool[pickIndex(pool.length, policy.rng)]! }
  }
}

/** Fail fast when a fixed opener could never be recorded against this dictionary. */
export function assertOpenerUsable(policy: OpenerPolicy, dictionary: readonly string[]): void {
  if (policy.kind === 'fixed' && !dictionary.includes(policy.word)) {
    throw new ConfigError('opener-word', `Opener '${policy.word}' is not in the word list`)
  }
}
