/**
 * HTTP methods a stress run can issue.
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'] as const

export type HttpMethod = (typeof HTTP_METHODS)[number]

/**
 * Longest per-request timeout a Node timer can hold, in whole seconds.
 */
export const MAX_TIMEOUT_SECONDS = 2_147_483

/**
 * Scalar accepted as a query parameter value.
 */
export type QueryValue = string | number | boolean

/**
 * Immutable parameters of one HTTP call.
 *
 * A run builds a single descriptor and replays it for every request, so executors
 * only ever read it.
 */
export interface RequestDescriptor {
  /**
   * HTTP method to use for the request.
   */
  readonly method: HttpMethod

  /**
   * Absolute URL to send the request to.
   */
  readonly url: string

  /**
   * HTTP headers as key-value pairs. May be empty.
   */
  readonly headers: Readonly<Record<string, string>>

  /**
   * Query parameters appended to the URL. May be empty.
   */
  readonly params: Readonly<Record<string, QueryValue>>

  /**
   * Upper bound for a single attempt, in seconds.
   */
  readonly timeoutSeconds: number

  /**
   * Optional request body. Never sent with GET or HEAD.
   */
  readonly body?: string
}

/**
 * Creates a frozen descriptor, copying the header and parameter maps.
 */
export function createDescriptor(data: RequestDescriptor): RequestDescriptor {
  const descriptor: RequestDescriptor = {
    method: data.method,
    url: data.url,
    headers: Object.freeze({ ...data.headers }),
    params: Object.freeze({ ...data.params }),
    timeoutSeconds: data.timeoutSeconds,
    ...(data.body !== undefined ? { body: data.body } : {}),
  }
  return Object.freeze(descriptor)
}
