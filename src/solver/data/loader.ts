// Wordlist loader for length-specific word lists.
// Reads the manifest and word files from public/wordlists/en; caches by id so
// repeated callers share the same promise.
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { WordlistError } from '@/solver/errors'

export interface WordlistSet {
  id: string // unique id e.g. "en-5"
  length: number // word length
  words: string[] // vocabulary, file order, de-duplicated
  displayName?: string
  source?: string
}

export interface WordlistDescriptor {
  id: string // stable id (filename stem)
  length: number
  wordsFile: string // filename relative to the manifest
  displayName?: string
  source?: string
}

interface Manifest {
  version: 1
  sets: WordlistDescriptor[]
}

export const DEFAULT_WORDLIST_DIR = fileURLToPath(
  new URL('../../../public/wordlists/en', import.meta.url),
)

const manifestCache = new Map<string, Promise<Manifest>>()
const setCache = new Map<string, Promise<WordlistSet>>()

function isDescriptor(v: unknown): v is WordlistDescriptor {
  if (!v || typeof v !== 'object') return false
  if (!('id' in v) || !('length' in v) || !('wordsFile' in v)) return false
  return (
    typeof v.id === 'string' &&
    typeof v.length === 'number' &&
    Number.isInteger(v.length) &&
    v.length > 0 &&
    typeof v.wordsFile === 'string'
  )
}

/**
 * Normalize raw word-file text: trim, lower-case, keep only words of exactly
 * `length` ascii letters, drop repeats (first occurrence wins).
 */
export function cleanWords(text: string, length: number): string[] {
  const re = new RegExp(`^[a-z]{${length}}$`)
  const seen = new Set<string>()
  const out: string[] = []
  for (const raw of text.split(/\r?\n/)) {
    const w = raw.trim().toLowerCase()
    if (!re.test(w) || seen.has(w)) continue
    seen.add(w)
    out.push(w)
  }
  return out
}

async function readText(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8')
  } catch (err) {
    throw new WordlistError(file, `Failed to read ${file}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

export function loadManifest(dir = DEFAULT_WORDLIST_DIR): Promise<Manifest> {
  let p = manifestCache.get(dir)
  if (!p) {
    const file = path.join(dir, 'manifest.json')
    p = readText(file).then((text): Manifest => {
      let raw: unknown
      try {
        raw = JSON.parse(text)
      } catch {
        throw new WordlistError(file, `Manifest ${file} is not valid JSON`)
      }
      const sets = raw && typeof raw === 'object' && 'sets' in raw ? raw.sets : undefined
      if (!Array.isArray(sets)) throw new WordlistError(file, `Manifest ${file} has no sets`)
      return { version: 1, sets: sets.filter(isDescriptor) }
    })
    manifestCache.set(dir, p)
  }
  return p
}

export async function loadWordsFile(file: string, length: number): Promise<string[]> {
  const words = cleanWords(await readText(file), length)
  if (words.length === 0) {
    throw new WordlistError(file, `No ${length}-letter words found in ${file}`)
  }
  return words
}

export function loadWordlistSetById(id: string, dir = DEFAULT_WORDLIST_DIR): Promise<WordlistSet> {
  const key = `${dir}\u0000${id}`
  const cached = setCache.get(key)
  if (cached) return cached
  const p = (async () => {
    const manifest = await loadManifest(dir)
    const desc = manifest.sets.find((s) => s.id === id)
    if (!desc) throw new WordlistError(id, `Unknown wordlist id: ${id}`)
    const words = await loadWordsFile(path.join(dir, desc.wordsFile), desc.length)
    return {
      id: desc.id,
      length: desc.length,
      words,
      displayName: desc.displayName,
      source: desc.source,
    }
  })()
  setCache.set(key, p)
  return p
}

// Simple helper to clear caches (used in tests)
export function __clearWordlistCache() {
  setCache.clear()
  manifestCache.clear()
}
