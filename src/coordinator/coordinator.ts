import { ConfigurationError, normalizeError } from '../errors.js'
import type { Executor } from '../executor/http-executor.js'
import type { RequestDescriptor } from '../types/descriptor.js'
import type { ResultRecord } from '../types/record.js'
import { Channel } from './channel.js'

/**
 * Dispatches a fixed number of requests through a bounded pool of concurrent executions.
 *
 * Request ids 1..N are handed out in order from a shared counter. Each of the
 * `min(concurrency, N)` workers takes the next id as soon as its previous attempt completes,
 * so the pool stays full until the ids run out. Records are yielded in completion order.
 *
 * A failed attempt is just another record: it never stops the run, cancels siblings
 * or shrinks the pool.
 *
 * @example
 * ```typescript
 * const coordinator = new Coordinator(new HttpExecutor({ connections: 10 }))
 * for await (const record of coordinator.run(descriptor, 100, 10)) {
 *   console.log(record.request_id, record.success)
 * }
 * ```
 */
export class Coordinator {
  private readonly _executor: Executor
  private _inFlight = 0
  private _peakInFlight = 0

  constructor(executor: Executor) {
    this._executor = executor
  }

  /**
   * Number of attempts currently awaiting the executor.
   */
  get inFlight(): number {
    return this._inFlight
  }

  /**
   * Highest value {@link inFlight} reached during the last run.
   */
  get peakInFlight(): number {
    return this._peakInFlight
  }

  /**
   * Runs `totalRequests` attempts of `descriptor` with at most `concurrency` in flight.
   *
   * Breaking out of the iteration stops further dispatch; attempts already in flight are
   * awaited before the generator finishes.
   *
   * @param descriptor - Parameters shared by every attempt
   * @param totalRequests - Number of attempts, at least 1
   * @param concurrency - Maximum simultaneous attempts, at least 1
   * @returns Async generator yielding one record per attempt
   */
  public async *run(
    descriptor: RequestDescriptor,
    totalRequests: number,
    concurrency: number
  ): AsyncGenerator<ResultRecord, void, undefined> {
    assertPositiveInteger('totalRequests', totalRequests)
    assertPositiveInteger('concurrency', concurrency)

    const results = new Channel<ResultRecord>()
    let nextId = 1
    let stopped = false
    this._peakInFlight = 0

    const worker = async (): Promise<void> => {
      while (!stopped && nextId <= totalRequests) {
        const requestId = nextId
        nextId += 1

        this._inFlight += 1
        this._peakInFlight = Math.max(this._peakInFlight, this._inFlight)
        let record: ResultRecord
        try {
          record = await this._executor.execute(descriptor, requestId)
        } finally {
          this._inFlight -= 1
        }

        if (!stopped && !results.closed) {
          results.push(record)
        }
      }
    }

    const workerCount = Math.min(concurrency, totalRequests)
    const workers = Promise.all(Array.from({ length: workerCount }, () => worker())).then(
      () => results.close(),
      (error: unknown) => {
        stopped = true
        results.fail(normalizeError(error))
      }
    )

    try {
      for (let produced = 0; produced < totalRequests; produced++) {
        const result = await results.next()
        if (result.done) {
          break
        }
        yield result.value
      }
    } finally {
      stopped = true
      await workers
    }
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be an integer >= 1, got ${value}`, [`${name}: must be >= 1`])
  }
}
