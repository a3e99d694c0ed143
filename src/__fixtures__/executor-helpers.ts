/**
 * Test fixtures and helpers for Coordinator and StressTester testing.
 */

import { MockAgent } from 'undici'
import type { Executor } from '../executor/http-executor.js'
import { createDescriptor, type RequestDescriptor } from '../types/descriptor.js'
import { isSuccessStatus, type ResultRecord } from '../types/record.js'

/**
 * Creates a descriptor with test defaults, overridable per field.
 */
export function createTestDescriptor(overrides?: Partial<RequestDescriptor>): RequestDescriptor {
  return createDescriptor({
    method: 'GET',
    url: 'http://stress.test/items',
    headers: {},
    params: {},
    timeoutSeconds: 5,
    ...overrides,
  })
}

/**
 * Creates a MockAgent that refuses real network connections.
 */
export function createMockAgent(): MockAgent {
  const agent = new MockAgent()
  agent.disableNetConnect()
  return agent
}

/**
 * Outcome a {@link FakeExecutor} returns for one request id.
 */
export type FakeOutcome = { statusCode: number } | { error: string }

/**
 * Executor that answers after a delay without any network and records how many
 * calls overlap.
 */
export class FakeExecutor implements Executor {
  readonly calls: number[] = []
  inFlight = 0
  peakInFlight = 0

  private readonly _outcome: (requestId: number) => FakeOutcome
  private readonly _delayMs: (requestId: number) => number

  /**
   * @param outcome - Result for a request id, defaults to status 200
   * @param delayMs - Delay for a request id, defaults to 1ms
   */
  constructor(outcome?: (requestId: number) => FakeOutcome, delayMs?: (requestId: number) => number) {
    this._outcome = outcome ?? (() => ({ statusCode: 200 }))
    this._delayMs = delayMs ?? (() => 1)
  }

  async execute(descriptor: RequestDescriptor, requestId: number): Promise<ResultRecord> {
    this.calls.push(requestId)
    this.inFlight += 1
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight)

    await new Promise((resolve) => globalThis.setTimeout(resolve, this._delayMs(requestId)))

    this.inFlight -= 1
    const outcome = this._outcome(requestId)
    const base = {
      request_id: requestId,
      timestamp: new Date(0).toISOString(),
      url: descriptor.url,
      method: descriptor.method,
      headers: descriptor.headers,
      params: descriptor.params,
      response_time_ms: this._delayMs(requestId),
    }

    if ('error' in outcome) {
      return { ...base, success: false, response_headers: {}, error: outcome.error }
    }
    return {
      ...base,
      status_code: outcome.statusCode,
      success: isSuccessStatus(outcome.statusCode),
      response_headers: {},
      content_length: 0,
    }
  }
}

/**
 * Drains an async generator, returning the yielded items and its return value.
 */
export async function collectGenerator<T, R>(generator: AsyncGenerator<T, R, undefined>): Promise<{ items: T[]; result: R }> {
  const items: T[] = []
  let next = await generator.next()
  while (!next.done) {
    items.push(next.value)
    next = await generator.next()
  }
  return { items, result: next.value }
}
