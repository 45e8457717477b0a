/**
 * Structured telemetry events emitted by the CLI around a drift run.
 * All types are immutable and serializable to JSON.
 */

import type { MetricName, Severity } from '../types.js'

/** Emitted once per table read from disk. */
export interface IngestMetrics {
  readonly stage: 'ingest'
  readonly role: 'reference' | 'current' | 'combined'
  readonly path: string
  readonly rows: number
  readonly columns: number
}

/** Emitted once per windowed split of a single table. */
export interface WindowMetrics {
  readonly stage: 'window'
  readonly rows: number
  readonly referenceSize: number
  readonly currentSize: number
}

/** Emitted at the end of a pipeline run. */
export interface PipelineRunMetrics {
  readonly stage: 'pipeline'
  readonly metric: MetricName
  readonly feature: string | null
  readonly threshold: number
  readonly referenceSize: number
  readonly currentSize: number
  readonly driftDetected: boolean
  readonly severity: Severity | null
  readonly durationMs: number
}

/** Union of all telemetry payload types. */
export type TelemetryData = IngestMetrics | WindowMetrics | PipelineRunMetrics

/** A timestamped telemetry event carrying one of the payloads. */
export interface TelemetryEvent {
  readonly stage: TelemetryData['stage']
  readonly timestamp: string
  readonly data: TelemetryData
}
