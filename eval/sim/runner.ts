// Sequential game simulator: plays each chosen answer to completion with one
// policy and aggregates how many guesses it took.
import { initialState, type Settings } from '../../src/app/state/session.ts'
import { nextGuess, type SuggestOptions } from '../../src/app/logic/suggest.ts'
import { playAuto } from '../../src/app/logic/autoplay.ts'
import type { PolicyId } from '../../src/policy/policies.ts'
import type { OpenerPolicy } from '../../src/policy/openers.ts'
import { pickIndex, type Rng } from '../../src/solver/random.ts'

export interface Job {
  datasetId: string
  policy: PolicyId
  opener: OpenerPolicy
  settings: Settings
  answers: string[]
}

export interface ShardResult {
  datasetId: string
  policy: PolicyId
  trials: number
  successes: number
  failCount: number
  attemptHist: number[] // index k = solved in k+1 guesses; last index = fails
  totalAttemptsSuccess: number
  totalTimeMs: number
  remainingOnFailAccum: number
}

export interface RowSummary {
  datasetId: string
  policy: PolicyId
  trials: number
  solved: number
  failRate: number
  avgAttempts: number
  avgTimeMs: number
  avgRemainingWhenFailed: number
}

/** First `count` words of a seeded Fisher-Yates shuffle; every word when count covers the list. */
export function sampleAnswers(words: readonly string[], count: number, rng: Rng): string[] {
  if (count >= words.length) return words.slice()
  const pool = words.slice()
  for (let i = pool.length - 1; i > 0; i--) {
    const j = pickIndex(i + 1, rng)
    const tmp = pool[i]!
    pool[i] = pool[j]!
    pool[j] = tmp
  }
  return pool.slice(0, count)
}

export function runTrials(dictionary: readonly string[], job: Job): ShardResult {
  const attemptsMax = job.settings.attemptsMax
  const attemptHist = new Array<number>(attemptsMax + 1).fill(0)
  let successes = 0
  let failCount = 0
  let totalAttemptsSuccess = 0
  let totalTimeMs = 0
  let remainingOnFailAccum = 0

  const start = initialState(dictionary, job.settings)
  // Round one looks the same in every game; rank it once and replay it as a fixed opener.
  let opener = job.opener
  if (opener.kind === 'ranked' || opener.kind === 'manual') {
    const word = nextGuess(start, { policy: job.policy, opener: { kind: 'ranked' } })
    if (word !== null) opener = { kind: 'fixed', word }
  }
  const opts: SuggestOptions = { policy: job.policy, opener }

  for (const answer of job.answers) {
    const t0 = Date.now()
    const end = playAuto(start, answer, opts)
    totalTimeMs += Date.now() - t0
    if (end.status === 'Solved') {
      successes++
      totalAttemptsSuccess += end.history.length
      attemptHist[end.history.length - 1]!++
    } else {
      failCount++
      attemptHist[attemptsMax]!++
      remainingOnFailAccum += end.pool.length
    }
  }

  return {
    datasetId: job.datasetId,
    policy: job.policy,
    trials: job.answers.length,
    successes,
    failCount,
    attemptHist,
    totalAttemptsSuccess,
    totalTimeMs,
    remainingOnFailAccum,
  }
}

export function aggregate(shards: ShardResult[]): RowSummary[] {
  const rows = shards.map((s) => ({
    datasetId: s.datasetId,
    policy: s.policy,
    trials: s.trials,
    solved: s.successes,
    failRate: s.trials > 0 ? s.failCount / s.trials : 0,
    avgAttempts: s.successes > 0 ? s.totalAttemptsSuccess / s.successes : 0,
    avgTimeMs: s.trials > 0 ? s.totalTimeMs / s.trials : 0,
    avgRemainingWhenFailed: s.failCount > 0 ? s.remainingOnFailAccum / s.failCount : 0,
  }))
  // Deterministic sort
  rows.sort((a, b) => a.policy.localeCompare(b.policy) || a.datasetId.localeCompare(b.datasetId))
  return rows
}

export function formatCsv(rows: RowSummary[]): string {
  const header = 'datasetId,policy,trials,solved,failRate,avgAttempts,avgTimeMs,avgRemainingWhenFailed'
  const lines = rows.map((r) =>
    [
      r.datasetId,
      r.policy,
      r.trials,
      r.solved,
      r.failRate.toFixed(6),
      r.avgAttempts.toFixed(4),
      r.avgTimeMs.toFixed(2),
      r.avgRemainingWhenFailed.toFixed(2),
    ].join(','),
  )
  return [header, ...lines].join('\n') + '\n'
}

export function formatTable(rows: RowSummary[]): string {
  const cols = ['DATASET', 'POLICY', 'TRIALS', 'SOLVED', 'FAIL%', 'AVG_ATT', 'AVG_MS', 'AVG_REM_FAIL']
  const widths = [10, 16, 8, 8, 8, 9, 8, 12]
  const pad = (s: string, w: number) => s.padEnd(w)
  const out: string[] = [cols.map((c, i) => pad(c, widths[i]!)).join(' ').trimEnd()]
  for (const r of rows) {
    out.push(
      [
        pad(r.datasetId, widths[0]!),
        pad(r.policy, widths[1]!),
        pad(String(r.trials), widths[2]!),
        pad(String(r.solved), widths[3]!),
        pad((r.failRate * 100).toFixed(2), widths[4]!),
        pad(r.avgAttempts.toFixed(2), widths[5]!),
        pad(r.avgTimeMs.toFixed(1), widths[6]!),
        pad(r.avgRemainingWhenFailed.toFixed(1), widths[7]!),
      ]
        .join(' ')
        .trimEnd(),
    )
  }
  return out.join('\n')
}
