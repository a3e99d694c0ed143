import { z } from 'zod'
import { ConfigurationError } from '../errors.js'
import { HTTP_METHODS, MAX_TIMEOUT_SECONDS } from '../types/descriptor.js'

/**
 * Defaults applied to every option left out by the caller.
 */
export const DEFAULT_OPTIONS = {
  totalRequests: 100,
  concurrentRequests: 10,
  method: 'GET',
  logFile: 'api_stress_test.jsonl',
  timeout: 60,
  logMode: 'truncate',
} as const

/**
 * Zod schema for stress test options.
 *
 * Accepts the method in any case and upper-cases it.
 */
export const stressTestOptionsSchema = z.object({
  totalRequests: z.number().int().min(1).default(DEFAULT_OPTIONS.totalRequests).describe('Total number of requests'),
  concurrentRequests: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_OPTIONS.concurrentRequests)
    .describe('Maximum number of requests in flight'),
  headers: z.record(z.string(), z.string()).default({}).describe('HTTP headers sent with every request'),
  params: z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
    .default({})
    .describe('Query parameters appended to the URL'),
  method: z
    .string()
    .transform((method) => method.toUpperCase())
    .pipe(z.enum(HTTP_METHODS))
    .default(DEFAULT_OPTIONS.method)
    .describe('HTTP method'),
  logFile: z.string().min(1).default(DEFAULT_OPTIONS.logFile).describe('Path of the JSONL result log'),
  timeout: z
    .number()
    .positive()
    .finite()
    .max(MAX_TIMEOUT_SECONDS)
    .default(DEFAULT_OPTIONS.timeout)
    .describe('Per-request timeout in seconds'),
  body: z.string().optional().describe('Request body, not sent with GET or HEAD'),
  logMode: z.enum(['truncate', 'append']).default(DEFAULT_OPTIONS.logMode).describe('Whether to keep an existing log'),
  printer: z.boolean().default(false).describe('Print each record and the summary while running'),
})

const urlSchema = z
  .string()
  .url()
  .refine((value) => URL.canParse(value) && /^https?:$/.test(new URL(value).protocol), {
    message: 'URL must use http or https',
  })

/**
 * Schema of a complete run configuration: options plus the target URL.
 * Also the shape of CLI config files.
 */
export const runConfigSchema = stressTestOptionsSchema.extend({
  url: urlSchema,
})

export type StressTestOptionsInput = z.input<typeof stressTestOptionsSchema>

export type RunConfig = z.output<typeof runConfigSchema>

/**
 * Validates a URL and options, applying defaults.
 *
 * @throws ConfigurationError listing every invalid option
 */
export function parseRunConfig(input: unknown): RunConfig {
  const result = runConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid stress test configuration: ${issues.join('; ')}`, issues)
  }
  return result.data
}
