/* eslint-env node */
import { readFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import type { Dispatcher } from 'undici'
import { ConfigurationError, normalizeError, SinkError } from '../errors.js'
import { DEFAULT_OPTIONS, parseRunConfig, type RunConfig } from '../tester/options.js'
import { getDefaultAppender, RunPrinter, type Appender } from '../tester/printer.js'
import { StressTester } from '../tester/stress-tester.js'

export const USAGE = `Usage: api-stress <url> [options]
       api-stress --config <file.json> [options]

Options:
  -n, --requests <N>          Total number of requests (default ${DEFAULT_OPTIONS.totalRequests})
  -c, --concurrency <C>       Maximum requests in flight (default ${DEFAULT_OPTIONS.concurrentRequests})
  -X, --method <METHOD>       HTTP method (default ${DEFAULT_OPTIONS.method})
  -H, --header <'Name: v'>    Request header, repeatable
  -q, --param <key=value>     Query parameter, repeatable
  -d, --data <BODY>           Request body
  -t, --timeout <SECONDS>     Per-request timeout (default ${DEFAULT_OPTIONS.timeout})
  -o, --log-file <PATH>       JSONL result log (default ${DEFAULT_OPTIONS.logFile})
      --append                Keep an existing log instead of truncating it
      --config <PATH>         JSON file with the same keys as the library options plus "url"
      --quiet                 Print only the summary
  -h, --help                  Show this help
`

/**
 * Exit codes of the command.
 */
export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_CONFIGURATION = 2

/**
 * Output streams used by {@link main}.
 */
export interface CliIO {
  out: Appender
  err: Appender
}

/**
 * Result of parsing the command line.
 */
export type CliCommand = { kind: 'help' } | { kind: 'run'; config: RunConfig; quiet: boolean }

/**
 * Parses a `Name: value` header flag.
 */
export function parseHeader(value: string): [string, string] {
  const separator = value.indexOf(':')
  if (separator <= 0) {
    throw new ConfigurationError(`Invalid header '${value}', expected 'Name: value'`, [`header: ${value}`])
  }
  return [value.slice(0, separator).trim(), value.slice(separator + 1).trim()]
}

/**
 * Parses a `key=value` query parameter flag.
 */
export function parseParam(value: string): [string, string] {
  const separator = value.indexOf('=')
  if (separator <= 0) {
    throw new ConfigurationError(`Invalid parameter '${value}', expected 'key=value'`, [`param: ${value}`])
  }
  return [value.slice(0, separator), value.slice(separator + 1)]
}

async function loadConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${normalizeError(error).message}`, [`config: ${path}`])
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${normalizeError(error).message}`, [
      `config: ${path}`,
    ])
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`, [`config: ${path}`])
  }
  return { ...parsed }
}

/**
 * Turns command-line arguments into a validated run configuration.
 *
 * Flags override values read from `--config`.
 *
 * @param argv - Arguments without the node executable and script path
 * @throws ConfigurationError on unknown flags or invalid values
 */
export async function parseCommand(argv: string[]): Promise<CliCommand> {
  let parsed: ReturnType<typeof parseCliFlags>
  try {
    parsed = parseCliFlags(argv)
  } catch (error) {
    const message = normalizeError(error).message
    throw new ConfigurationError(message, [message])
  }
  const { values, positionals } = parsed

  if (values.help) {
    return { kind: 'help' }
  }
  if (positionals.length > 1) {
    throw new ConfigurationError(`Expected a single URL, got ${positionals.length}`, ['url: too many values'])
  }

  const input: Record<string, unknown> = values.config !== undefined ? await loadConfigFile(values.config) : {}

  const url = positionals[0]
  if (url !== undefined) {
    input.url = url
  }
  if (values.requests !== undefined) {
    input.totalRequests = Number(values.requests)
  }
  if (values.concurrency !== undefined) {
    input.concurrentRequests = Number(values.concurrency)
  }
  if (values.method !== undefined) {
    input.method = values.method
  }
  if (values.header !== undefined) {
    input.headers = Object.fromEntries(values.header.map(parseHeader))
  }
  if (values.param !== undefined) {
    input.params = Object.fromEntries(values.param.map(parseParam))
  }
  if (values.data !== undefined) {
    input.body = values.data
  }
  if (values.timeout !== undefined) {
    input.timeout = Number(values.timeout)
  }
  if (values['log-file'] !== undefined) {
    input.logFile = values['log-file']
  }
  if (values.append) {
    input.logMode = 'append'
  }

  return { kind: 'run', config: parseRunConfig(input), quiet: values.quiet ?? false }
}

function parseCliFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      requests: { type: 'string', short: 'n' },
      concurrency: { type: 'string', short: 'c' },
      method: { type: 'string', short: 'X' },
      header: { type: 'string', short: 'H', multiple: true },
      param: { type: 'string', short: 'q', multiple: true },
      data: { type: 'string', short: 'd' },
      timeout: { type: 'string', short: 't' },
      'log-file': { type: 'string', short: 'o' },
      append: { type: 'boolean' },
      config: { type: 'string' },
      quiet: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

/**
 * Runs the command and returns its exit code.
 *
 * A completed run exits with 0 whatever its success rate.
 *
 * @param argv - Arguments without the node executable and script path
 * @param io - Destinations of standard and error output
 * @param dispatcher - Dispatcher to send requests through instead of a fresh connection pool
 */
export async function main(
  argv: string[],
  io: CliIO = {
    out: getDefaultAppender(),
    err: (text) => {
      process.stderr.write(text)
    },
  },
  dispatcher?: Dispatcher
): Promise<number> {
  try {
    const command = await parseCommand(argv)
    if (command.kind === 'help') {
      io.out(USAGE)
      return EXIT_OK
    }

    const { url, ...options } = command.config
    const tester = new StressTester(url, {
      ...options,
      reporter: new RunPrinter(io.out, !command.quiet),
      ...(dispatcher !== undefined ? { dispatcher } : {}),
    })
    await tester.run()
    io.out(`Results written to ${command.config.logFile}\n`)
    return EXIT_OK
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.err(`Configuration error: ${error.message}\n`)
      io.err(USAGE)
      return EXIT_CONFIGURATION
    }
    if (error instanceof SinkError) {
      io.err(`Log error: ${error.message}\n`)
      return EXIT_FAILURE
    }
    io.err(`Unexpected error: ${normalizeError(error).message}\n`)
    return EXIT_FAILURE
  }
}
