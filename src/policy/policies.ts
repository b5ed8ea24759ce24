import {
  rankGuesses,
  rankLetterCoverage,
  rankUniqueLetters,
  type Suggestion,
} from '@/solver/scoring'
import { ConfigError } from '@/solver/errors'

export type PolicyId = 'pairwise' | 'unique-letters' | 'letter-coverage'

export const POLICY_IDS: readonly PolicyId[] = ['pairwise', 'unique-letters', 'letter-coverage']

export const DEFAULT_POLICY: PolicyId = 'pairwise'

export interface PolicyInput {
  pool: readonly string[] // live candidates
  guessSpace: readonly string[] // dictionary in normal mode, pool in hard mode
  topK: number
  onProgress?: (fraction: number) => void
}

export function isPolicyId(v: string): v is PolicyId {
  return POLICY_IDS.some((id) => id === v)
}

export function parsePolicyId(v: string): PolicyId {
  if (!isPolicyId(v)) {
    throw new ConfigError('policy', `Unknown policy '${v}' (expected one of ${POLICY_IDS.join(', ')})`)
  }
  return v
}

export function suggestByPolicy(id: PolicyId, input: PolicyInput): Suggestion[] {
  const { pool, guessSpace, topK, onProgress } = input
  switch (id) {
    case 'pairwise':
      return rankGuesses(pool, guessSpace, { topK, onProgress })
    case 'unique-letters':
      // only ever draws from the pool, in either mode
      return rankUniqueLetters(pool, topK)
    case 'letter-coverage':
      return rankLetterCoverage(pool, guessSpace, topK)
  }
}
