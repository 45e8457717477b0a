import { parseArgs } from 'node:util'
import { getThreshold, loadConfigFile } from './config.js'
import { describeError } from './error-utils.js'
import { DriftValidationError } from './errors.js'
import { readTable } from './io/csv.js'
import { runDriftPipeline } from './pipeline.js'
import { getColumn } from './table.js'
import type { Table } from './table.js'
import { createEvent, emitMetric } from './telemetry/index.js'
import { isFeatureType, isMetricName } from './types.js'
import type { FeatureType, PipelineReport } from './types.js'
import { atomicWrite } from './utils/fs.js'
import { getWindows } from './windows.js'

// ---------------------------------------------------------------------------
// Exit statuses
// ---------------------------------------------------------------------------

export const EXIT_NO_DRIFT = 0
export const EXIT_ERROR = 1
export const EXIT_DRIFT = 2

/** Maps a finished report to the process exit status. */
export function exitCodeFor(report: PipelineReport): number {
  return report.drift_detected ? EXIT_DRIFT : EXIT_NO_DRIFT
}

export const USAGE = `Usage:
  drift-monitor <reference.csv> <current.csv> --metric <name> --threshold <value> [options]
  drift-monitor <data.csv> --reference-size <n> --current-size <m> --metric <name> --threshold <value> [options]

Options:
  --metric <name>          psi | ks | chi_square (required)
  --threshold <value>      drift threshold (> 0); required unless --config is given
  --config <path>          YAML/JSON threshold file, used when --threshold is absent
  --feature-type <type>    numerical (default) | categorical
  --feature <column>       column to compare (default: first column)
  --delimiter <char>       CSV field delimiter (default: ",")
  --reference-size <n>     with one data file: rows in the reference window (first n)
  --current-size <m>       with one data file: rows in the current window (last m)
  --output <path>          write the JSON report to a file instead of stdout
  --verbose                emit [drift:metrics] telemetry on stderr
  -h, --help               show this help

Exit status: 0 no drift, 2 drift detected, 1 error.
`

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Validated command-line arguments. */
export interface CliArgs {
  readonly help: boolean
  readonly paths: readonly string[]
  readonly metric: string
  readonly threshold: number | undefined
  readonly configPath: string | undefined
  readonly featureType: FeatureType
  readonly feature: string | undefined
  readonly delimiter: string | undefined
  readonly referenceSize: number | undefined
  readonly currentSize: number | undefined
  readonly output: string | undefined
  readonly verbose: boolean
}

function parseNumberFlag(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const n = Number(raw)
  if (raw.trim() === '' || Number.isNaN(n)) {
    throw new DriftValidationError(`${flag} must be a number (got "${raw}")`)
  }
  return n
}

/**
 * Parses and validates `argv` (without the node and script entries).
 *
 * @throws {DriftValidationError} for a missing or malformed flag, a wrong
 *   number of files, or window sizes combined with two files.
 * @throws {TypeError} from `parseArgs` for unknown flags.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      metric: { type: 'string' },
      threshold: { type: 'string' },
      config: { type: 'string' },
      'feature-type': { type: 'string', default: 'numerical' },
      feature: { type: 'string' },
      delimiter: { type: 'string' },
      'reference-size': { type: 'string' },
      'current-size': { type: 'string' },
      output: { type: 'string' },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })

  const help = values.help ?? false
  const featureType = values['feature-type'] ?? 'numerical'
  if (!isFeatureType(featureType)) {
    throw new DriftValidationError(`unsupported feature type: ${featureType}`)
  }
  const referenceSize = parseNumberFlag('--reference-size', values['reference-size'])
  const currentSize = parseNumberFlag('--current-size', values['current-size'])
  const windowed = referenceSize !== undefined || currentSize !== undefined

  if (!help) {
    if (values.metric === undefined) {
      throw new DriftValidationError('--metric is required')
    }
    if (windowed) {
      if (positionals.length !== 1 || referenceSize === undefined || currentSize === undefined) {
        throw new DriftValidationError(
          '--reference-size and --current-size must be given together with exactly one data file'
        )
      }
    } else if (positionals.length !== 2) {
      throw new DriftValidationError(
        `expected a reference file and a current file (got ${positionals.length} paths)`
      )
    }
    if (values.threshold === undefined && values.config === undefined) {
      throw new DriftValidationError('--threshold is required unless --config is given')
    }
  }

  return {
    help,
    paths: positionals,
    metric: values.metric ?? '',
    threshold: parseNumberFlag('--threshold', values.threshold),
    configPath: values.config,
    featureType,
    feature: values.feature,
    delimiter: values.delimiter,
    referenceSize,
    currentSize,
    output: values.output,
    verbose: values.verbose ?? false,
  }
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

async function loadTables(args: CliArgs): Promise<readonly [Table, Table]> {
  const csvOptions = args.delimiter === undefined ? {} : { delimiter: args.delimiter }
  const [first, second] = args.paths
  if (first === undefined) throw new DriftValidationError('no data file given')

  if (second !== undefined) {
    const reference = await readTable(first, csvOptions)
    const current = await readTable(second, csvOptions)
    if (args.verbose) {
      emitMetric(createEvent({ stage: 'ingest', role: 'reference', path: first, rows: reference.rowCount, columns: reference.columns.length }))
      emitMetric(createEvent({ stage: 'ingest', role: 'current', path: second, rows: current.rowCount, columns: current.columns.length }))
    }
    return [reference, current]
  }

  const table = await readTable(first, csvOptions)
  const referenceSize = args.referenceSize ?? 0
  const currentSize = args.currentSize ?? 0
  const windows = getWindows(table, referenceSize, currentSize)
  if (args.verbose) {
    emitMetric(createEvent({ stage: 'ingest', role: 'combined', path: first, rows: table.rowCount, columns: table.columns.length }))
    emitMetric(createEvent({ stage: 'window', rows: table.rowCount, referenceSize, currentSize }))
  }
  return windows
}

async function resolveThreshold(args: CliArgs, reference: Table): Promise<number> {
  if (args.threshold !== undefined) return args.threshold
  if (args.configPath === undefined) {
    throw new DriftValidationError('--threshold is required unless --config is given')
  }
  const config = await loadConfigFile(args.configPath, {
    onUnknownKeys: (keys) => console.warn(`[drift] config: ignoring unknown keys: ${keys.join(', ')}`),
  })
  const feature = args.feature ?? getColumn(reference).name
  return getThreshold(config, args.metric, feature)
}

/**
 * Loads the tables named by `args`, resolves the threshold and runs the
 * pipeline.
 */
export async function runFromArgs(args: CliArgs): Promise<PipelineReport> {
  const [reference, current] = await loadTables(args)
  const threshold = await resolveThreshold(args, reference)

  const started = performance.now()
  const report = runDriftPipeline(reference, current, {
    metric: args.metric,
    threshold,
    featureType: args.featureType,
    feature: args.feature,
  })

  if (args.verbose && isMetricName(args.metric)) {
    emitMetric(createEvent({
      stage: 'pipeline',
      metric: args.metric,
      feature: args.feature ?? null,
      threshold,
      referenceSize: report.window.reference_size,
      currentSize: report.window.current_size,
      driftDetected: report.drift_detected,
      severity: report.alerts[0]?.severity ?? null,
      durationMs: Math.round((performance.now() - started) * 1000) / 1000,
    }))
  }
  return report
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/** Where the CLI writes its report. Swappable for tests. */
export interface CliIo {
  readonly writeStdout: (text: string) => void
}

const processIo: CliIo = {
  writeStdout: (text) => {
    process.stdout.write(text)
  },
}

/**
 * Runs the CLI and returns its exit status: 0 no drift, 2 drift, 1 any error.
 * Errors are reported as a single `[drift] error:` line on stderr.
 */
export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  try {
    const args = parseCliArgs(argv)
    if (args.help) {
      io.writeStdout(USAGE)
      return EXIT_NO_DRIFT
    }

    const report = await runFromArgs(args)
    const json = `${JSON.stringify(report, null, 2)}\n`
    if (args.output !== undefined) {
      await atomicWrite(args.output, json)
    } else {
      io.writeStdout(json)
    }
    return exitCodeFor(report)
  } catch (err) {
    console.error(`[drift] error: ${describeError(err)}`)
    return EXIT_ERROR
  }
}
