import { Buffer } from 'buffer'
import { Agent, request, type Dispatcher } from 'undici'
import { normalizeError, ProtocolError, TransportError, type TransportErrorCategory } from '../errors.js'
import { MAX_TIMEOUT_SECONDS, type RequestDescriptor } from '../types/descriptor.js'
import type { JSONValue } from '../types/json.js'
import { isSuccessStatus, roundMs, type ResultRecord } from '../types/record.js'

/**
 * Anything that can turn a descriptor into a result record.
 * The coordinator depends on this rather than on {@link HttpExecutor} directly.
 */
export interface Executor {
  /**
   * Performs one attempt. Implementations must never reject.
   */
  execute(descriptor: RequestDescriptor, requestId: number): Promise<ResultRecord>
}

/**
 * Configuration for {@link HttpExecutor}.
 */
export type HttpExecutorConfig = {
  /**
   * Maximum number of sockets per origin in the shared pool.
   * Ignored when a dispatcher is supplied. Defaults to 10.
   */
  connections?: number

  /**
   * Dispatcher to send requests through instead of a pool owned by the executor.
   * The executor never closes a dispatcher it did not create.
   */
  dispatcher?: Dispatcher
}

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
])

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'])

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NONAME'])

/**
 * Executes single HTTP attempts over a shared connection pool.
 *
 * Every outcome, including refused connections and timeouts, is returned as a
 * {@link ResultRecord}; `execute` never rejects.
 *
 * @example
 * ```typescript
 * const executor = new HttpExecutor({ connections: 4 })
 * const record = await executor.execute(descriptor, 1)
 * console.log(record.status_code, record.response_time_ms)
 * await executor.close()
 * ```
 */
export class HttpExecutor implements Executor {
  private readonly _dispatcher: Dispatcher
  private readonly _ownsDispatcher: boolean

  constructor(config?: HttpExecutorConfig) {
    if (config?.dispatcher !== undefined) {
      this._dispatcher = config.dispatcher
      this._ownsDispatcher = false
    } else {
      this._dispatcher = new Agent({ connections: config?.connections ?? 10 })
      this._ownsDispatcher = true
    }
  }

  /**
   * Performs one attempt and converts the outcome into a result record.
   *
   * @param descriptor - Parameters of the call
   * @param requestId - Identifier assigned by the coordinator
   * @returns The record for this attempt
   */
  async execute(descriptor: RequestDescriptor, requestId: number): Promise<ResultRecord> {
    const base = {
      request_id: requestId,
      timestamp: new Date().toISOString(),
      url: descriptor.url,
      method: descriptor.method,
      headers: descriptor.headers,
      params: descriptor.params,
    }

    // Create AbortController for timeout
    const controller = new AbortController()
    let timedOut = false
    // A delay past the timer limit would fire at once, so such attempts run unbounded
    const timeoutId =
      descriptor.timeoutSeconds <= MAX_TIMEOUT_SECONDS
        ? globalThis.setTimeout(() => {
            timedOut = true
            controller.abort()
          }, descriptor.timeoutSeconds * 1000)
        : undefined

    const start = performance.now()

    try {
      const response = await request(buildUrl(descriptor), {
        method: descriptor.method,
        headers: { ...descriptor.headers },
        signal: controller.signal,
        dispatcher: this._dispatcher,
        ...(descriptor.body !== undefined && descriptor.method !== 'GET' && descriptor.method !== 'HEAD'
          ? { body: descriptor.body }
          : {}),
      })

      // Read the whole body so the timing covers the complete exchange
      const bytes = Buffer.from(await response.body.arrayBuffer())
      const elapsed = performance.now() - start

      const responseHeaders = flattenHeaders(response.headers)
      const responseBody = parseJsonBody(responseHeaders['content-type'], bytes, requestId)

      return Object.freeze({
        ...base,
        status_code: response.statusCode,
        response_time_ms: roundMs(elapsed),
        success: isSuccessStatus(response.statusCode),
        response_headers: responseHeaders,
        content_length: bytes.byteLength,
        ...(responseBody !== undefined ? { response_body: responseBody } : {}),
      })
    } catch (error) {
      const elapsed = performance.now() - start
      const transportError = toTransportError(error, timedOut, descriptor.timeoutSeconds)

      return Object.freeze({
        ...base,
        response_time_ms: roundMs(elapsed),
        success: false,
        response_headers: {},
        error: transportError.toRecordString(),
      })
    } finally {
      globalThis.clearTimeout(timeoutId)
    }
  }

  /**
   * Closes the connection pool if this executor created it.
   */
  async close(): Promise<void> {
    if (this._ownsDispatcher) {
      await this._dispatcher.close()
    }
  }
}

/**
 * Appends the descriptor's query parameters to its URL.
 */
export function buildUrl(descriptor: RequestDescriptor): string {
  const entries = Object.entries(descriptor.params)
  if (entries.length === 0) {
    return descriptor.url
  }
  const url = new URL(descriptor.url)
  for (const [key, value] of entries) {
    url.searchParams.append(key, String(value))
  }
  return url.toString()
}

/**
 * Converts response headers to a plain object, joining repeated headers with `, `.
 */
function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue
    }
    result[key] = Array.isArray(value) ? value.join(', ') : value
  }
  return result
}

/**
 * Tells whether a content-type header names a JSON media type.
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) {
    return false
  }
  const mediaType = (contentType.split(';')[0] ?? '').trim().toLowerCase()
  return mediaType === 'application/json' || mediaType.endsWith('+json')
}

function parseJsonBody(contentType: string | undefined, bytes: Buffer, requestId: number): JSONValue | undefined {
  if (!isJsonContentType(contentType) || bytes.byteLength === 0) {
    return undefined
  }
  try {
    const parsed: JSONValue = JSON.parse(bytes.toString('utf-8'))
    return parsed
  } catch (error) {
    const protocolError = new ProtocolError('Response declared JSON but could not be parsed', { cause: error })
    console.debug(`Omitting body of request ${requestId}: ${protocolError.message}`)
    return undefined
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

function categorize(error: Error): TransportErrorCategory {
  // Node wraps the socket error as the cause of some undici errors
  const codes = [errorCode(error), errorCode(error.cause)].filter((code): code is string => code !== undefined)

  for (const code of codes) {
    if (TIMEOUT_CODES.has(code)) {
      return 'timeout'
    }
    if (DNS_CODES.has(code)) {
      return 'dns'
    }
    if (code.startsWith('ERR_TLS') || code.includes('CERT') || code.includes('SSL')) {
      return 'tls'
    }
    if (CONNECTION_CODES.has(code)) {
      return 'connection'
    }
  }
  return 'transport'
}

function toTransportError(error: unknown, timedOut: boolean, timeoutSeconds: number): TransportError {
  const cause = normalizeError(error)
  if (timedOut) {
    return new TransportError('timeout', `Request timed out after ${timeoutSeconds} seconds`, { cause })
  }
  return new TransportError(categorize(cause), cause.message, { cause })
}
