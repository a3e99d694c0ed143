/**
 * Main entry point for the API stress testing library.
 *
 * This is the primary export module, providing access to all
 * public APIs and functionality.
 */

// Run controller
export { StressTester, runStressTest } from './tester/stress-tester.js'
export type { StressTestOptions } from './tester/stress-tester.js'

// Options and validation
export { DEFAULT_OPTIONS, stressTestOptionsSchema, runConfigSchema, parseRunConfig } from './tester/options.js'
export type { StressTestOptionsInput, RunConfig } from './tester/options.js'

// Printing
export { RunPrinter, getDefaultAppender, formatRecordLine, formatSummary } from './tester/printer.js'
export type { Appender, Printer } from './tester/printer.js'

// Error types
export {
  ConfigurationError,
  TransportError,
  ProtocolError,
  SinkError,
  ConcurrentRunError,
  normalizeError,
} from './errors.js'
export type { TransportErrorCategory } from './errors.js'

// Data model
export { HTTP_METHODS, MAX_TIMEOUT_SECONDS, createDescriptor } from './types/descriptor.js'
export type { HttpMethod, QueryValue, RequestDescriptor } from './types/descriptor.js'
export { isSuccessStatus } from './types/record.js'
export type { ResultRecord } from './types/record.js'
export type { JSONValue } from './types/json.js'

// Engine components
export { HttpExecutor, buildUrl, isJsonContentType } from './executor/http-executor.js'
export type { Executor, HttpExecutorConfig } from './executor/http-executor.js'
export { Coordinator } from './coordinator/coordinator.js'
export { Channel } from './coordinator/channel.js'
export { JsonlSink, serializeRecord } from './sink/jsonl-sink.js'
export type { JsonlSinkOptions, SinkMode } from './sink/jsonl-sink.js'

// Summary
export { SummaryBuilder, summarize } from './summary/summary.js'
export type { RunSummary } from './summary/summary.js'
