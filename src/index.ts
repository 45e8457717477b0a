export {
  METRIC_NAMES,
  FEATURE_TYPES,
  isMetricName,
  isFeatureType,
} from './types.js'
export type {
  SampleValue,
  ValueKind,
  NumericSample,
  CategoricalSample,
  Sample,
  SampleInput,
  MetricName,
  FeatureType,
  TestResult,
  MetricOutcome,
  PsiDetection,
  KsDetection,
  ChiSquareDetection,
  DetectionRecord,
  Severity,
  Alert,
  PipelineMetrics,
  WindowSizes,
  PipelineReport,
} from './types.js'

export { DriftValidationError, DriftTypeError, isDriftError } from './errors.js'

export { createTable, fromColumns, sliceRows, getColumn, inferSample, toSample, asCategorical } from './table.js'
export type { Table, Column } from './table.js'

export { getWindows } from './windows.js'

export {
  calculatePsi,
  computePsiBins,
  calculateKs,
  calculateChiSquare,
  buildContingencyTable,
  computeMetric,
  PSI_BIN_COUNT,
  PSI_EPSILON,
} from './metrics/index.js'
export type { PsiBin } from './metrics/index.js'

export { detectPsiDrift, detectKsDrift, detectChiSquareDrift, detectDrift } from './detectors.js'

export { generateAlert, classifySeverity, resolveSeveritySource } from './alerts.js'
export type { SeveritySource } from './alerts.js'

export { runDriftPipeline } from './pipeline.js'
export type { DriftPipelineOptions } from './pipeline.js'

export { parseConfig, loadConfigFile, getThreshold, driftConfigSchema, ConfigValidationError } from './config.js'
export type { DriftConfig, ParseConfigOptions } from './config.js'

export { parseCsv, readTable, inferColumnSample } from './io/csv.js'
export type { CsvOptions } from './io/csv.js'

export { main, parseCliArgs, exitCodeFor, EXIT_NO_DRIFT, EXIT_ERROR, EXIT_DRIFT } from './cli.js'
export type { CliArgs, CliIo } from './cli.js'
