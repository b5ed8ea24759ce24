export type TelemetryEvent =
  | { name: 'session_start'; props: { length: number; attemptsMax: number; hardMode: boolean; words: number } }
  | { name: 'suggest_requested'; props: { policy: string; S: number; ms: number } }
  | { name: 'guess_recorded'; props: { turn: number; S: number } }
  | { name: 'guess_rejected'; props: { code: string } }
  | { name: 'session_end'; props: { status: string; turns: number; S: number } }

export type Sink = (line: string) => void

export interface TelemetryConfig {
  enabled: boolean // off unless --verbose or WORDLE_SOLVER_DEBUG=1
  sink: Sink // where formatted event lines go
}

export function scrubProps<T extends Record<string, unknown>>(p: T): Record<string, string | number | boolean> {
  // Keep primitives only; cap strings at 64 chars.
  const out: Record<string, string | number | boolean> = {}
  for (const k of Object.keys(p)) {
    const v = p[k]
    if (v == null) continue
    if (typeof v === 'string') {
      out[k] = v.slice(0, 64)
    } else if (typeof v === 'number' || typeof v === 'boolean') out[k] = v
  }
  return out
}
