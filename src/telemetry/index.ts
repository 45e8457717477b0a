export type {
  IngestMetrics,
  WindowMetrics,
  PipelineRunMetrics,
  TelemetryData,
  TelemetryEvent,
} from './types.js'
export { createEvent, emitMetric } from './sink.js'
