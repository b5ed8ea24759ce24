import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import {
  __clearWordlistCache,
  cleanWords,
  loadWordlistSetById,
  loadWordsFile,
} from '@/solver/data/loader'
import { WordlistError } from '@/solver/errors'

let dir: string

beforeEach(() => {
  __clearWordlistCache()
  dir = mkdtempSync(path.join(tmpdir(), 'wordlists-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function writeManifest(sets: unknown[]) {
  writeFileSync(path.join(dir, 'manifest.json'), JSON.stringify({ version: 1, sets }))
}

describe('cleanWords', () => {
  it('trims, lower-cases, filters by length and letters, and drops repeats', () => {
    const text = ' Crane\nslate\r\nSLATE\nab\nhello!\nworld\n\n'
    expect(cleanWords(text, 5)).toEqual(['crane', 'slate', 'world'])
  })
})

describe('loadWordsFile', () => {
  it('reads a plain word file', async () => {
    const file = path.join(dir, 'words.txt')
    writeFileSync(file, 'cat\ndog\nmouse\n')
    await expect(loadWordsFile(file, 3)).resolves.toEqual(['cat', 'dog'])
  })

  it('fails when nothing usable is left', async () => {
    const file = path.join(dir, 'words.txt')
    writeFileSync(file, 'mouse\n')
    await expect(loadWordsFile(file, 3)).rejects.toBeInstanceOf(WordlistError)
  })

  it('fails on a missing file', async () => {
    await expect(loadWordsFile(path.join(dir, 'nope.txt'), 5)).rejects.toBeInstanceOf(WordlistError)
  })
})

describe('manifest sets', () => {
  it('loads a set by id and caches it', async () => {
    writeManifest([
      { id: 't-3', length: 3, wordsFile: 't-3.txt', displayName: 'Test' },
      { id: 'broken', length: 'x', wordsFile: 'b.txt' },
    ])
    writeFileSync(path.join(dir, 't-3.txt'), 'CAT\ndog\ncat\n')
    const set = await loadWordlistSetById('t-3', dir)
    expect(set).toEqual({ id: 't-3', length: 3, words: ['cat', 'dog'], displayName: 'Test', source: undefined })
    expect(loadWordlistSetById('t-3', dir)).toBe(loadWordlistSetById('t-3', dir))
  })

  it('rejects unknown ids', async () => {
    writeManifest([])
    await expect(loadWordlistSetById('t-9', dir)).rejects.toThrow('Unknown wordlist id: t-9')
  })

  it('rejects a missing or malformed manifest', async () => {
    await expect(loadWordlistSetById('t-3', dir)).rejects.toBeInstanceOf(WordlistError)
    __clearWordlistCache()
    writeFileSync(path.join(dir, 'manifest.json'), '{ not json')
    await expect(loadWordlistSetById('t-3', dir)).rejects.toThrow('is not valid JSON')
  })
})

describe('bundled list', () => {
  it('ships five-letter words', async () => {
    const set = await loadWordlistSetById('en-5')
    expect(set.id).toBe('en-5')
    expect(set.words.length).toBeGreaterThan(700)
    expect(set.words).toContain('raise')
    expect(set.words.every((w) => /^[a-z]{5}$/.test(w))).toBe(true)
  })
})
