/**
 * Error types raised by the stress runner.
 *
 * Only {@link ConfigurationError}, {@link SinkError} and {@link ConcurrentRunError} ever reach the
 * caller of a run. {@link TransportError} and {@link ProtocolError} are recovered inside the executor
 * and turned into result records.
 */

/**
 * Category of a transport-level failure, used as the prefix of a record's `error` field.
 */
export type TransportErrorCategory = 'timeout' | 'connection' | 'dns' | 'tls' | 'transport'

/**
 * Error thrown when run options are invalid. Raised before any file or network activity.
 */
export class ConfigurationError extends Error {
  /**
   * One human readable line per invalid option.
   */
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

/**
 * Error describing a failed HTTP attempt that produced no response.
 */
export class TransportError extends Error {
  readonly category: TransportErrorCategory

  constructor(category: TransportErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
    this.category = category
  }

  /**
   * Value written to the `error` field of a result record.
   */
  toRecordString(): string {
    return `${this.category}: ${this.message}`
  }
}

/**
 * Error raised when a response declares a JSON body that cannot be parsed.
 */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProtocolError'
  }
}

/**
 * Error thrown when the result log cannot be opened or written. Fatal for the run.
 */
export class SinkError extends Error {
  /**
   * Path of the log file that failed.
   */
  readonly path: string

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SinkError'
    this.path = path
  }
}

/**
 * Error thrown when a stress tester is started while a previous run is still in progress.
 */
export class ConcurrentRunError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConcurrentRunError'
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 *
 * @param error - Value caught from a try/catch
 * @returns The value itself when it is an Error, otherwise an Error wrapping its string form
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
