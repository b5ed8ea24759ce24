/* eslint-disable no-console */
// Debug event log. Events are formatted as one JSON line each and written to
// stderr, so stdout stays clean for --suggest / --remain output.
import type { Sink, TelemetryConfig, TelemetryEvent } from './schema'
import { scrubProps } from './schema'

export const DEBUG_ENV = 'WORDLE_SOLVER_DEBUG'

const stderrSink: Sink = (line) => console.error(line)

let cfg: TelemetryConfig = { enabled: false, sink: stderrSink }
let ready = false

function envEnabled(): boolean {
  const v = process.env[DEBUG_ENV]
  return v === '1' || v === 'true'
}

export function initTelemetry(initial?: Partial<TelemetryConfig>) {
  cfg = {
    enabled: envEnabled(),
    sink: stderrSink,
    ...initial,
  }
  ready = true
}

export function setTelemetryEnabled(on: boolean) {
  if (!ready) initTelemetry()
  cfg.enabled = on
}

export function track(e: TelemetryEvent) {
  if (!ready) initTelemetry()
  if (!cfg.enabled) return
  const payload = {
    t: new Date().toISOString(),
    name: e.name,
    props: scrubProps(e.props),
  }
  cfg.sink(`[debug] ${JSON.stringify(payload)}`)
}
