import { z } from 'zod'

/**
 * Formats a Zod issue path as a human-readable dot/bracket string.
 *
 * Examples:
 *   []                                         → "(root)"
 *   ["metrics", "psi", "default_threshold"]    → "metrics.psi.default_threshold"
 *   ["metrics", "ks", "feature_thresholds", 0] → "metrics.ks.feature_thresholds[0]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/**
 * Formats Zod issues into a multi-line indented string, one line per issue.
 */
export function formatZodErrors(errors: readonly z.ZodIssue[]): string {
  return errors
    .map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`)
    .join('\n')
}

/**
 * Collapses any thrown value into a single line for terminal output.
 * Multi-line messages (config errors) are joined with "; ".
 */
export function describeError(err: unknown): string {
  const raw = err instanceof Error ? err.message : String(err)
  return raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('; ')
}
