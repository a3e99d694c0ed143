import { runStressTest, StressTester, type StressTestOptions } from '../../../src/index.js'

const target = process.argv[2] ?? 'https://jsonplaceholder.typicode.com/todos/1'

/**
 * Runs a test with run() and prints the summary it returns.
 * @param title The title of the scenario to be logged.
 * @param options Options for the run.
 */
async function runOnce(title: string, options: StressTestOptions) {
  console.log(`--- ${title} ---`)

  const summary = await runStressTest(target, options)

  console.log(`${summary.successCount}/${summary.totalCount} succeeded, mean ${summary.meanResponseTimeMs}ms\n`)
}

/**
 * Consumes stream() to react to each record as it is logged.
 * @param title The title of the scenario to be logged.
 * @param options Options for the run.
 */
async function runStreaming(title: string, options: StressTestOptions) {
  console.log(`--- ${title} ---`)

  const tester = new StressTester(target, options)
  for await (const record of tester.stream()) {
    if (!record.success) {
      console.log(`[Failed] request ${record.request_id}: ${record.error ?? record.status_code}`)
    }
  }
  console.log('Stream complete\n')
}

await runOnce('Small run with the built-in printer', {
  totalRequests: 20,
  concurrentRequests: 5,
  logFile: 'logs/first-run.jsonl',
  printer: true,
})

await runStreaming('Streaming run appended to the same log', {
  totalRequests: 50,
  concurrentRequests: 10,
  params: { userId: 1 },
  logFile: 'logs/first-run.jsonl',
  logMode: 'append',
  timeout: 10,
})
