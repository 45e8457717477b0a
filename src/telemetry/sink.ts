/**
 * Telemetry sink: one structured line per event on stderr.
 */

import type { TelemetryData, TelemetryEvent } from './types.js'

/** Wraps a payload in a timestamped event. */
export function createEvent(data: TelemetryData, now: Date = new Date()): TelemetryEvent {
  return { stage: data.stage, timestamp: now.toISOString(), data }
}

/**
 * Writes an event to stderr via console.warn with a `[drift:metrics]` prefix.
 * Callers decide whether to emit; nothing here is gated.
 */
export function emitMetric(event: TelemetryEvent): void {
  console.warn(`[drift:metrics] ${JSON.stringify(event)}`)
}
