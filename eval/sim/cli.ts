#!/usr/bin/env tsx
/* eslint-env node */
/* eslint-disable no-console */
/**
 * Solver simulator CLI
 * Plays every (or a seeded sample of) word in a list as the hidden answer, once
 * per policy, and reports solve rate and average guesses.
 */

import { Command } from 'commander'
import fs from 'node:fs'
import path from 'node:path'
import { loadWordlistSetById, loadWordsFile } from '../../src/solver/data/loader.ts'
import { mulberry32 } from '../../src/solver/random.ts'
import { DEFAULT_SETTINGS } from '../../src/app/state/session.ts'
import { parsePolicyId, type PolicyId } from '../../src/policy/policies.ts'
import { assertOpenerUsable, type OpenerPolicy } from '../../src/policy/openers.ts'
import { aggregate, formatCsv, formatTable, runTrials, sampleAnswers, type ShardResult } from './runner.ts'

function parsePolicies(csv: string): PolicyId[] {
  return csv
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map(parsePolicyId)
}

async function main() {
  const program = new Command()
  program
    .option('--wordlist <id>', 'Dataset id from the manifest', 'en-5')
    .option('--words <path>', 'Load words from a file instead of the manifest')
    .option('--length <n>', 'Word length when --words is used', (v) => Number(v), 5)
    .option('--trials <n>', 'Answers to play per policy (0 = every word)', (v) => Number(v), 0)
    .option('--attempts <n>', 'Max attempts per game', (v) => Number(v), DEFAULT_SETTINGS.attemptsMax)
    .option('--policies <csv>', 'Policies CSV', 'pairwise,unique-letters,letter-coverage')
    .option('--opener <word>', 'Fixed first guess (default: ranked by each policy)')
    .option('--hard-mode', 'Play in hard mode', false)
    .option('--seed <n>', 'RNG seed for sampling answers (default: timestamp)', (v) => Number(v))
    .option('--out <dir>', 'Also write CSV + JSON results into this directory')
  program.parse(process.argv)
  const opts = program.opts<{
    wordlist: string
    words?: string
    length: number
    trials: number
    attempts: number
    policies: string
    opener?: string
    hardMode: boolean
    seed?: number
    out?: string
  }>()

  const datasetId = opts.words ? path.basename(opts.words, path.extname(opts.words)) : opts.wordlist
  const words = opts.words
    ? await loadWordsFile(opts.words, opts.length)
    : (await loadWordlistSetById(opts.wordlist)).words
  const length = words[0]?.length ?? opts.length

  const policies = parsePolicies(opts.policies)
  if (policies.length === 0) {
    console.error('No policies specified')
    process.exit(1)
  }
  const opener: OpenerPolicy = opts.opener ? { kind: 'fixed', word: opts.opener.toLowerCase() } : { kind: 'ranked' }
  assertOpenerUsable(opener, words)

  const baseSeed = opts.seed ?? Date.now()
  const trials = opts.trials > 0 ? opts.trials : words.length
  const answers = sampleAnswers(words, trials, mulberry32(baseSeed))
  const settings = { length, attemptsMax: opts.attempts, hardMode: opts.hardMode }

  console.log(`Running ${policies.length} polic${policies.length === 1 ? 'y' : 'ies'} over ${answers.length} answer(s) from ${datasetId}`)
  const shards: ShardResult[] = []
  for (const policy of policies) {
    const startTs = Date.now()
    process.stdout.write(`Start ${policy}@${datasetId}\n`)
    shards.push(runTrials(words, { datasetId, policy, opener, settings, answers }))
    process.stdout.write(`Done  ${policy}@${datasetId} in ${Date.now() - startTs}ms\n`)
  }
  const rows = aggregate(shards)
  console.log('\n' + formatTable(rows) + '\n')

  if (opts.out) {
    const outDir = path.resolve(opts.out)
    fs.mkdirSync(outDir, { recursive: true })
    const ts = new Date().toISOString().replace(/[-:]/g, '').replace(/\..+/, '').replace('T', '-')
    const baseName = `run-${ts}`
    const csvPath = path.join(outDir, `${baseName}.csv`)
    const jsonPath = path.join(outDir, `${baseName}.json`)
    fs.writeFileSync(csvPath, formatCsv(rows), 'utf8')
    const summary = {
      meta: { timestamp: new Date().toISOString(), datasetId, policies, trials: answers.length, baseSeed, settings },
      rows,
    }
    fs.writeFileSync(jsonPath, JSON.stringify(summary, null, 2) + '\n', 'utf8')
    console.log('Results written to:')
    console.log('  ' + csvPath)
    console.log('  ' + jsonPath)
  }
}

main().catch((err) => {
  console.error('[fatal]', err)
  process.exit(1)
})
