import type { Dispatcher } from 'undici'
import { Coordinator } from '../coordinator/coordinator.js'
import { ConcurrentRunError } from '../errors.js'
import { HttpExecutor } from '../executor/http-executor.js'
import { JsonlSink } from '../sink/jsonl-sink.js'
import { SummaryBuilder, type RunSummary } from '../summary/summary.js'
import { createDescriptor, type RequestDescriptor } from '../types/descriptor.js'
import type { ResultRecord } from '../types/record.js'
import { parseRunConfig, type RunConfig, type StressTestOptionsInput } from './options.js'
import { getDefaultAppender, RunPrinter, type Printer } from './printer.js'

/**
 * Options for creating a {@link StressTester}.
 */
export type StressTestOptions = StressTestOptionsInput & {
  /**
   * Dispatcher used instead of a connection pool owned by the run.
   * The run never closes it.
   */
  dispatcher?: Dispatcher

  /**
   * Custom printer. Takes precedence over the `printer` flag.
   */
  reporter?: Printer
}

/**
 * Runs a stress test against one endpoint and writes every result to a JSONL log.
 *
 * Configuration is validated in the constructor, so an invalid setup throws
 * a ConfigurationError before any file or network activity.
 *
 * @example
 * ```typescript
 * const tester = new StressTester('https://api.example.com/items', {
 *   totalRequests: 500,
 *   concurrentRequests: 25,
 *   logFile: 'logs/items.jsonl',
 * })
 * const summary = await tester.run()
 * console.log(`${summary.successCount}/${summary.totalCount} succeeded`)
 * ```
 */
export class StressTester {
  /**
   * Validated configuration with defaults applied.
   */
  public readonly config: RunConfig

  /**
   * Request parameters replayed for every request of the run.
   */
  public readonly descriptor: RequestDescriptor

  private readonly _dispatcher: Dispatcher | undefined
  private readonly _printer: Printer | undefined
  private _isRunning = false

  /**
   * Creates a stress tester.
   * @param url - Target endpoint
   * @param options - Run options, defaults apply to anything left out
   */
  constructor(url: string, options?: StressTestOptions) {
    const { dispatcher, reporter, ...rest }: StressTestOptions = options ?? {}
    this.config = parseRunConfig({ ...rest, url })
    this.descriptor = createDescriptor({
      method: this.config.method,
      url: this.config.url,
      headers: this.config.headers,
      params: this.config.params,
      timeoutSeconds: this.config.timeout,
      ...(this.config.body !== undefined ? { body: this.config.body } : {}),
    })
    this._dispatcher = dispatcher

    if (reporter !== undefined) {
      this._printer = reporter
    } else if (this.config.printer) {
      this._printer = new RunPrinter(getDefaultAppender())
    }
  }

  /**
   * Whether a run is currently in progress.
   */
  get isRunning(): boolean {
    return this._isRunning
  }

  /**
   * Streams the run, yielding each record once it has been appended to the log,
   * and returns the summary.
   *
   * Every summarized record is already on disk. A SinkError ends the run and propagates;
   * the log keeps every line written before it.
   *
   * @returns Async generator that yields records in completion order and returns the RunSummary
   */
  public async *stream(): AsyncGenerator<ResultRecord, RunSummary, undefined> {
    if (this._isRunning) {
      throw new ConcurrentRunError(
        'Stress test is already running. Wait for the current run() or stream() call to complete before starting again.'
      )
    }
    this._isRunning = true

    try {
      const sink = await JsonlSink.open(this.config.logFile, { mode: this.config.logMode })
      const executor = new HttpExecutor(
        this._dispatcher !== undefined ? { dispatcher: this._dispatcher } : { connections: this.config.concurrentRequests }
      )
      const coordinator = new Coordinator(executor)
      const builder = new SummaryBuilder()
      const start = performance.now()

      try {
        for await (const record of coordinator.run(
          this.descriptor,
          this.config.totalRequests,
          this.config.concurrentRequests
        )) {
          await sink.append(record)
          builder.add(record)
          this._printer?.processRecord(record)
          yield record
        }
      } finally {
        try {
          await executor.close()
        } finally {
          await sink.close()
        }
      }

      const summary = builder.build(performance.now() - start)
      this._printer?.printSummary(summary)
      return summary
    } finally {
      this._isRunning = false
    }
  }

  /**
   * Runs the whole test and returns the summary.
   *
   * Convenience wrapper consuming {@link stream}.
   */
  public async run(): Promise<RunSummary> {
    const gen = this.stream()
    let result = await gen.next()
    while (!result.done) {
      result = await gen.next()
    }
    return result.value
  }
}

/**
 * Validates the configuration, runs the stress test and returns its summary.
 *
 * @param url - Target endpoint
 * @param options - Run options
 * @throws ConfigurationError before any request when the options are invalid
 * @throws SinkError when the log cannot be written
 */
export async function runStressTest(url: string, options?: StressTestOptions): Promise<RunSummary> {
  return new StressTester(url, options).run()
}
