import { describe, expect, it } from 'vitest'
import { summarize, SummaryBuilder } from '../summary.js'
import type { ResultRecord } from '../../types/record.js'

const base = {
  timestamp: '2026-01-01T00:00:00.000Z',
  url: 'http://stress.test/items',
  method: 'GET',
  headers: {},
  params: {},
  response_headers: {},
} as const

const records: ResultRecord[] = [
  { ...base, request_id: 1, status_code: 200, success: true, response_time_ms: 10, content_length: 2 },
  { ...base, request_id: 2, status_code: 404, success: false, response_time_ms: 20, content_length: 0 },
  { ...base, request_id: 3, success: false, response_time_ms: 30.25, error: 'timeout: Request timed out after 1 seconds' },
]

describe('summarize', () => {
  it('counts successes, failures and transport errors', () => {
    const summary = summarize(records)

    expect(summary.totalCount).toBe(3)
    expect(summary.successCount).toBe(1)
    expect(summary.failureCount).toBe(2)
    expect(summary.successRate).toBeCloseTo(1 / 3)
    expect(summary.errorCount).toBe(1)
    expect(summary.statusCodes).toEqual({ 200: 1, 404: 1 })
  })

  it('computes response time statistics', () => {
    const summary = summarize(records)

    expect(summary.minResponseTimeMs).toBe(10)
    expect(summary.maxResponseTimeMs).toBe(30.25)
    expect(summary.meanResponseTimeMs).toBe(20.08)
  })

  it('derives throughput from the elapsed time', () => {
    const summary = summarize(records, 1500)

    expect(summary.elapsedMs).toBe(1500)
    expect(summary.requestsPerSecond).toBe(2)
  })

  it('reports zero throughput when elapsed time is unknown', () => {
    const summary = summarize(records)

    expect(summary.elapsedMs).toBe(0)
    expect(summary.requestsPerSecond).toBe(0)
  })

  it('returns empty statistics for no records', () => {
    expect(summarize([])).toEqual({
      totalCount: 0,
      successCount: 0,
      failureCount: 0,
      successRate: 0,
      errorCount: 0,
      statusCodes: {},
      minResponseTimeMs: null,
      maxResponseTimeMs: null,
      meanResponseTimeMs: null,
      elapsedMs: 0,
      requestsPerSecond: 0,
    })
  })
})

describe('SummaryBuilder', () => {
  it('matches summarize when fed one record at a time', () => {
    const builder = new SummaryBuilder()
    for (const record of records) {
      builder.add(record)
    }

    expect(builder.count).toBe(3)
    expect(builder.build(1500)).toEqual(summarize(records, 1500))
  })

  it('returns a copy of the status code tallies', () => {
    const builder = new SummaryBuilder().add(records[0]!)
    const first = builder.build()
    first.statusCodes[200] = 99

    expect(builder.build().statusCodes).toEqual({ 200: 1 })
  })
})
