import { roundMs, type ResultRecord } from '../types/record.js'

/**
 * Aggregate tallies of one run, derived from its result records.
 */
export interface RunSummary {
  totalCount: number
  successCount: number
  failureCount: number

  /**
   * successCount / totalCount, 0 when nothing ran.
   */
  successRate: number

  /**
   * Records that failed before any response arrived.
   */
  errorCount: number

  /**
   * Number of records per received status code.
   */
  statusCodes: Record<number, number>

  /**
   * Response time statistics in milliseconds. Null when nothing ran.
   */
  minResponseTimeMs: number | null
  maxResponseTimeMs: number | null
  meanResponseTimeMs: number | null

  /**
   * Wall-clock duration of the run. Zero when not measured.
   */
  elapsedMs: number

  /**
   * totalCount per second of elapsedMs. Zero when not measured.
   */
  requestsPerSecond: number
}

/**
 * Folds records into a {@link RunSummary} one at a time, without keeping them.
 */
export class SummaryBuilder {
  private _total = 0
  private _successes = 0
  private _errors = 0
  private _timeSum = 0
  private _min: number | null = null
  private _max: number | null = null
  private readonly _statusCodes: Record<number, number> = {}

  /**
   * Adds one record to the tallies.
   */
  add(record: ResultRecord): this {
    this._total += 1
    if (record.success) {
      this._successes += 1
    }
    if (record.error !== undefined) {
      this._errors += 1
    }
    if (record.status_code !== undefined) {
      this._statusCodes[record.status_code] = (this._statusCodes[record.status_code] ?? 0) + 1
    }

    const time = record.response_time_ms
    this._timeSum += time
    this._min = this._min === null ? time : Math.min(this._min, time)
    this._max = this._max === null ? time : Math.max(this._max, time)
    return this
  }

  /**
   * Number of records added so far.
   */
  get count(): number {
    return this._total
  }

  /**
   * Produces the summary of everything added so far.
   *
   * @param elapsedMs - Wall-clock duration of the run, when known
   */
  build(elapsedMs = 0): RunSummary {
    const total = this._total
    return {
      totalCount: total,
      successCount: this._successes,
      failureCount: total - this._successes,
      successRate: total === 0 ? 0 : this._successes / total,
      errorCount: this._errors,
      statusCodes: { ...this._statusCodes },
      minResponseTimeMs: this._min,
      maxResponseTimeMs: this._max,
      meanResponseTimeMs: total === 0 ? null : roundMs(this._timeSum / total),
      elapsedMs: roundMs(elapsedMs),
      requestsPerSecond: elapsedMs > 0 ? roundMs(total / (elapsedMs / 1000)) : 0,
    }
  }
}

/**
 * Summarizes a complete set of records.
 */
export function summarize(records: Iterable<ResultRecord>, elapsedMs = 0): RunSummary {
  const builder = new SummaryBuilder()
  for (const record of records) {
    builder.add(record)
  }
  return builder.build(elapsedMs)
}
