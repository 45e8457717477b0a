/**
 * Typed error classes for drift detection.
 *
 * Two kinds cover every failure raised by the core: a bad argument value
 * (`DriftValidationError`) and a wrong kind of data (`DriftTypeError`).
 * Neither is caught inside the core; the CLI is the only place that turns
 * them into an exit status.
 */

export class DriftValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DriftValidationError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class DriftTypeError extends TypeError {
  constructor(message: string) {
    super(message)
    this.name = 'DriftTypeError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** Returns true if `err` was raised by drift detection itself. */
export function isDriftError(err: unknown): err is DriftValidationError | DriftTypeError {
  return err instanceof DriftValidationError || err instanceof DriftTypeError
}
