import type { HttpMethod, QueryValue } from './descriptor.js'
import type { JSONValue } from './json.js'

/**
 * Outcome of one HTTP attempt, as written to the result log.
 *
 * Keys are snake_case because the record is serialized as-is, one JSON object per line.
 */
export interface ResultRecord {
  /**
   * Position of the request in the run, starting at 1.
   */
  readonly request_id: number

  /**
   * ISO-8601 instant the attempt started.
   */
  readonly timestamp: string

  readonly url: string
  readonly method: HttpMethod
  readonly headers: Readonly<Record<string, string>>
  readonly params: Readonly<Record<string, QueryValue>>

  /**
   * HTTP status code. Absent when no response was received.
   */
  readonly status_code?: number

  /**
   * Wall-clock duration of the attempt, rounded to two decimals.
   */
  readonly response_time_ms: number

  /**
   * True iff a response arrived with a status in [200, 400).
   */
  readonly success: boolean

  readonly response_headers: Readonly<Record<string, string>>

  /**
   * Size of the response body in bytes. Absent when no response was received.
   */
  readonly content_length?: number

  /**
   * Parsed body of a JSON response. Absent for other content types, empty or unparsable bodies.
   */
  readonly response_body?: JSONValue

  /**
   * `<category>: <message>` of the transport failure. Present only when no response was received.
   */
  readonly error?: string
}

/**
 * Success rule for a completed exchange: 200 <= status < 400.
 *
 * Redirects therefore count as successes.
 */
export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400
}

/**
 * Rounds a duration to two decimals.
 */
export function roundMs(value: number): number {
  return Math.round(value * 100) / 100
}
