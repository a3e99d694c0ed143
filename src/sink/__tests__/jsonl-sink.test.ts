import { mkdtemp, open, readFile, rm, writeFile, type FileHandle } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { JsonlSink, serializeRecord } from '../jsonl-sink.js'
import { SinkError } from '../../errors.js'
import type { ResultRecord } from '../../types/record.js'

function createRecord(requestId: number, overrides?: Partial<ResultRecord>): ResultRecord {
  return {
    request_id: requestId,
    timestamp: '2026-01-01T00:00:00.000Z',
    url: 'http://stress.test/items',
    method: 'GET',
    headers: {},
    params: {},
    status_code: 200,
    response_time_ms: 1.5,
    success: true,
    response_headers: { 'content-type': 'application/json' },
    content_length: 11,
    response_body: { ok: true },
    ...overrides,
  }
}

async function readLines(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf-8')
  return text.split('\n').filter((line) => line.length > 0)
}

describe('JsonlSink', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'api-stress-sink-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates missing parent directories and writes one JSON object per line', async () => {
    const path = join(dir, 'nested', 'logs', 'run.jsonl')
    const sink = await JsonlSink.open(path)

    await sink.append(createRecord(1))
    await sink.append(createRecord(2, { status_code: 404, success: false }))
    await sink.close()

    const lines = await readLines(path)
    expect(lines).toHaveLength(2)
    expect(JSON.parse(lines[0]!)).toEqual(createRecord(1))
    expect(JSON.parse(lines[1]!)).toMatchObject({ request_id: 2, status_code: 404, success: false })
    expect(sink.written).toBe(2)
    expect(sink.path).toBe(path)
  })

  it('truncates an existing log by default', async () => {
    const path = join(dir, 'run.jsonl')
    await writeFile(path, '{"old":true}\n')

    const sink = await JsonlSink.open(path)
    await sink.append(createRecord(1))
    await sink.close()

    const lines = await readLines(path)
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({ request_id: 1 })
  })

  it('keeps existing lines in append mode', async () => {
    const path = join(dir, 'run.jsonl')
    await writeFile(path, '{"old":true}\n')

    const sink = await JsonlSink.open(path, { mode: 'append' })
    await sink.append(createRecord(1))
    await sink.close()

    const lines = await readLines(path)
    expect(lines).toEqual(['{"old":true}', JSON.stringify(createRecord(1))])
  })

  it('never interleaves concurrent appends', async () => {
    const path = join(dir, 'run.jsonl')
    const sink = await JsonlSink.open(path)
    const padding = 'x'.repeat(20_000)

    await Promise.all(
      Array.from({ length: 200 }, (_, index) =>
        sink.append(createRecord(index + 1, { response_headers: { 'x-padding': padding } }))
      )
    )
    await sink.close()

    const lines = await readLines(path)
    expect(lines).toHaveLength(200)
    const ids = lines.map((line) => {
      const record: ResultRecord = JSON.parse(line)
      return record.request_id
    })
    expect(new Set(ids).size).toBe(200)
    expect(ids).toEqual(Array.from({ length: 200 }, (_, index) => index + 1))
  })

  it('rejects appends after close', async () => {
    const sink = await JsonlSink.open(join(dir, 'run.jsonl'))
    await sink.close()

    await expect(sink.append(createRecord(1))).rejects.toThrow(SinkError)
  })

  it('allows close to be called twice', async () => {
    const sink = await JsonlSink.open(join(dir, 'run.jsonl'))

    await sink.close()
    await expect(sink.close()).resolves.toBeUndefined()
  })

  it('throws SinkError when the log cannot be created', async () => {
    const blocker = join(dir, 'blocker')
    await writeFile(blocker, '')

    await expect(JsonlSink.open(join(blocker, 'run.jsonl'))).rejects.toThrow(SinkError)
  })

  it('keeps failing with the first write error', async () => {
    const path = join(dir, 'run.jsonl')
    const sink = await JsonlSink.open(path)
    await sink.append(createRecord(1))
    const scratch = await open(join(dir, 'scratch.txt'), 'w')
    const fileHandlePrototype: FileHandle = Object.getPrototypeOf(scratch)
    await scratch.close()
    const appendFile = vi.spyOn(fileHandlePrototype, 'appendFile').mockRejectedValue(new Error('disk full'))

    try {
      const first = await sink.append(createRecord(2)).catch((error: unknown) => error)
      const second = await sink.append(createRecord(3)).catch((error: unknown) => error)

      expect(first).toBeInstanceOf(SinkError)
      expect(first instanceof SinkError && first.message).toBe(`Failed to write log file ${path}: disk full`)
      expect(second).toBe(first)
      expect(appendFile).toHaveBeenCalledTimes(1)
      expect(sink.written).toBe(1)
    } finally {
      appendFile.mockRestore()
    }
    await sink.close()
    expect(await readFile(path, 'utf-8')).toBe(serializeRecord(createRecord(1)))
  })
})

describe('serializeRecord', () => {
  it('writes a single line terminated by one newline', () => {
    const line = serializeRecord(createRecord(1, { response_body: 'multi\nline' }))

    expect(line.endsWith('\n')).toBe(true)
    expect(line.indexOf('\n')).toBe(line.length - 1)
  })

  it('omits absent fields of a transport failure', () => {
    const record: ResultRecord = {
      request_id: 9,
      timestamp: '2026-01-01T00:00:00.000Z',
      url: 'http://stress.test/items',
      method: 'GET',
      headers: {},
      params: {},
      response_time_ms: 0.42,
      success: false,
      response_headers: {},
      error: 'connection: connect ECONNREFUSED 127.0.0.1:9',
    }

    expect(serializeRecord(record)).toBe(
      '{"request_id":9,"timestamp":"2026-01-01T00:00:00.000Z","url":"http://stress.test/items","method":"GET",' +
        '"headers":{},"params":{},"response_time_ms":0.42,"success":false,"response_headers":{},' +
        '"error":"connection: connect ECONNREFUSED 127.0.0.1:9"}\n'
    )
  })
})
