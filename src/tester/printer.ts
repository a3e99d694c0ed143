/* eslint-env node */
import type { ResultRecord } from '../types/record.js'
import type { RunSummary } from '../summary/summary.js'

/**
 * Function that receives printed text. Lines include their trailing newline.
 */
export type Appender = (text: string) => void

/**
 * Receives run output as it happens.
 */
export interface Printer {
  processRecord(record: ResultRecord): void
  printSummary(summary: RunSummary): void
}

/**
 * Appender writing to standard output.
 */
export function getDefaultAppender(): Appender {
  return (text) => {
    process.stdout.write(text)
  }
}

/**
 * Prints one line per record and a summary block at the end of a run.
 *
 * Example output:
 *   [3] 200 12.5ms
 *   [4] ERR 3.21ms connection: connect ECONNREFUSED 127.0.0.1:9
 */
export class RunPrinter implements Printer {
  private readonly _appender: Appender
  private readonly _showRecords: boolean

  /**
   * @param appender - Destination of printed text
   * @param showRecords - Print a line for every record, defaults to true
   */
  constructor(appender: Appender, showRecords = true) {
    this._appender = appender
    this._showRecords = showRecords
  }

  processRecord(record: ResultRecord): void {
    if (!this._showRecords) {
      return
    }
    this._appender(formatRecordLine(record))
  }

  printSummary(summary: RunSummary): void {
    this._appender(formatSummary(summary))
  }
}

export function formatRecordLine(record: ResultRecord): string {
  const status = record.status_code === undefined ? 'ERR' : String(record.status_code)
  const suffix = record.error === undefined ? '' : ` ${record.error}`
  return `[${record.request_id}] ${status} ${record.response_time_ms}ms${suffix}\n`
}

export function formatSummary(summary: RunSummary): string {
  const rate = (summary.successRate * 100).toFixed(2)
  const ms = (value: number | null): string => (value === null ? 'n/a' : String(value))
  const codes = Object.entries(summary.statusCodes)
    .map(([code, count]) => `${code}=${count}`)
    .join(' ')

  return [
    '--- Summary ---',
    `Requests: ${summary.totalCount} (success ${summary.successCount}, failure ${summary.failureCount}, success rate ${rate}%)`,
    `Transport errors: ${summary.errorCount}`,
    `Status codes: ${codes === '' ? 'none' : codes}`,
    `Response time (ms): min ${ms(summary.minResponseTimeMs)} / mean ${ms(summary.meanResponseTimeMs)} / max ${ms(summary.maxResponseTimeMs)}`,
    `Elapsed: ${summary.elapsedMs}ms (${summary.requestsPerSecond} req/s)`,
    '',
  ].join('\n')
}
