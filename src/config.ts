import { parse as yamlParse } from 'yaml'
import { z } from 'zod'
import { formatZodErrors } from './error-utils.js'
import { DriftValidationError } from './errors.js'
import { readInputFile } from './utils/fs.js'

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const thresholdField = z
  .number()
  .positive('threshold must be greater than 0')
  .finite('threshold must be finite')

/**
 * Thresholds for one metric. A per-feature override wins over the metric's
 * default.
 */
const metricConfigSchema = z
  .object({
    /** Threshold used for every feature without an override. */
    default_threshold: thresholdField.optional(),
    /**
     * Per-feature overrides keyed by column name.
     * Example: { age: 0.1, income: 0.25 }
     */
    feature_thresholds: z.record(z.string(), thresholdField).default({}),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for a drift threshold configuration file.
 *
 * - Unknown keys are stripped, not rejected.
 * - `metrics` is optional so that an empty file parses; `getThreshold`
 *   reports its absence at lookup time.
 * - Metric keys are not restricted here; lookups for unsupported metrics
 *   fail in `getThreshold` or in the pipeline.
 */
export const driftConfigSchema = z
  .object({
    metrics: z.record(z.string(), metricConfigSchema).optional(),
  })
  .strip()

// ---------------------------------------------------------------------------
// Unknown-key helpers for parseConfig
// ---------------------------------------------------------------------------

const METRIC_CONFIG_KEYS: ReadonlySet<string> = new Set(Object.keys(metricConfigSchema.shape))

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

/**
 * Returns unknown key paths at the top level and inside each metric block
 * (e.g. `"metrics.psi.defualt_threshold"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(driftConfigSchema.shape))
  const result: string[] = []
  for (const key of Object.keys(raw)) {
    if (!topLevelKnown.has(key)) result.push(key)
  }
  const metrics = raw['metrics']
  if (isRecord(metrics)) {
    for (const [metric, block] of Object.entries(metrics)) {
      if (!isRecord(block)) continue
      for (const subKey of Object.keys(block)) {
        if (!METRIC_CONFIG_KEYS.has(subKey)) result.push(`metrics.${metric}.${subKey}`)
      }
    }
  }
  return result
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths when the raw input contains keys not
   * recognised by the schema.
   * @example
   *   parseConfig(raw, {
   *     onUnknownKeys: (keys) => console.warn(`Unknown keys: ${keys.join(', ')}`)
   *   })
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Utility: recursively marks all fields and nested arrays readonly. */
type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Validated drift configuration. Immutable. */
export type DriftConfig = DeepReadonly<z.infer<typeof driftConfigSchema>>

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 *
 * The message lists every failing field path; the original `ZodError` is
 * kept as `Error.cause`.
 */
export class ConfigValidationError extends DriftValidationError {
  /** Structured list of validation failures, one per invalid field. */
  readonly issues: readonly z.ZodIssue[]

  /**
   * Guards against a ZodError with no issues. Throws a plain `Error` so an
   * internal bug is not mistaken for a user configuration problem.
   */
  static assertNonEmpty(zodError: z.ZodError): void {
    if (zodError.errors.length === 0) {
      throw new Error(
        '[drift] Internal bug: ConfigValidationError constructed with a ZodError that has no issues.'
      )
    }
  }

  constructor(zodError: z.ZodError) {
    ConfigValidationError.assertNonEmpty(zodError)
    super(`drift configuration is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse / load
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw (unknown) config input.
 *
 * `null` and `undefined` (an empty YAML document) are treated as `{}`.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): DriftConfig {
  const input = raw ?? {}
  const result = driftConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (options.onUnknownKeys !== undefined && isRecord(input)) {
    const unknownKeys = collectUnknownConfigKeys(input)
    if (unknownKeys.length > 0) options.onUnknownKeys(unknownKeys)
  }

  return result.data
}

/**
 * Reads a YAML or JSON threshold file and validates it.
 *
 * @throws {DriftValidationError} if the file does not exist or is not valid YAML.
 * @throws {ConfigValidationError} if its content fails validation.
 */
export async function loadConfigFile(filePath: string, options: ParseConfigOptions = {}): Promise<DriftConfig> {
  const text = await readInputFile(filePath, 'config file')

  let raw: unknown
  try {
    raw = yamlParse(text)
  } catch (err) {
    throw new DriftValidationError(
      `config file ${filePath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    )
  }
  return parseConfig(raw, options)
}

// ---------------------------------------------------------------------------
// Threshold lookup
// ---------------------------------------------------------------------------

/**
 * Resolves the threshold for `metric` on `feature`: the feature override if
 * one exists, otherwise the metric's `default_threshold`.
 *
 * @throws {DriftValidationError} if no `metrics` block exists, the metric is
 *   not configured, or it has neither an override nor a default.
 */
export function getThreshold(config: DriftConfig, metric: string, feature: string): number {
  const metrics = config.metrics
  if (metrics === undefined) {
    throw new DriftValidationError('metrics configuration is required')
  }
  const metricConfig = Object.hasOwn(metrics, metric) ? metrics[metric] : undefined
  if (metricConfig === undefined) {
    throw new DriftValidationError(`metric '${metric}' is not configured`)
  }

  const override = Object.hasOwn(metricConfig.feature_thresholds, feature)
    ? metricConfig.feature_thresholds[feature]
    : undefined
  if (override !== undefined) return override

  if (metricConfig.default_threshold === undefined) {
    throw new DriftValidationError(`default_threshold is required for metric '${metric}'`)
  }
  return metricConfig.default_threshold
}
