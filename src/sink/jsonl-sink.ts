/* eslint-env node */
import { mkdir, open, type FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { SinkError } from '../errors.js'
import type { ResultRecord } from '../types/record.js'

/**
 * How an existing log file is treated when the sink opens it.
 * - truncate: start a fresh file for the run
 * - append: keep existing lines and add after them
 */
export type SinkMode = 'truncate' | 'append'

/**
 * Options for {@link JsonlSink.open}.
 */
export type JsonlSinkOptions = {
  /**
   * Defaults to 'truncate'.
   */
  mode?: SinkMode
}

/**
 * Serializes a record as one JSON line terminated by a newline.
 */
export function serializeRecord(record: ResultRecord): string {
  return `${JSON.stringify(record)}\n`
}

/**
 * Append-only JSONL log of result records.
 *
 * Appends go through a single-writer queue: each record becomes exactly one write of one
 * complete line, so concurrent callers never interleave bytes. The first failed write is
 * remembered and every later append rejects with the same {@link SinkError}.
 */
export class JsonlSink {
  private readonly _handle: FileHandle
  private readonly _path: string
  private _queue: Promise<void> = Promise.resolve()
  private _failure: SinkError | null = null
  private _written = 0
  private _closed = false

  private constructor(handle: FileHandle, path: string) {
    this._handle = handle
    this._path = path
  }

  /**
   * Opens the log, creating its parent directory when missing.
   *
   * @param path - Location of the JSONL file
   * @param options - Open mode
   * @returns The opened sink
   * @throws SinkError when the directory or file cannot be created
   */
  static async open(path: string, options?: JsonlSinkOptions): Promise<JsonlSink> {
    const mode = options?.mode ?? 'truncate'
    try {
      await mkdir(dirname(path), { recursive: true })
      const handle = await open(path, mode === 'truncate' ? 'w' : 'a')
      return new JsonlSink(handle, path)
    } catch (error) {
      throw new SinkError(`Failed to open log file ${path}: ${describe(error)}`, path, { cause: error })
    }
  }

  /**
   * Path of the log file.
   */
  get path(): string {
    return this._path
  }

  /**
   * Number of records durably handed to the file so far.
   */
  get written(): number {
    return this._written
  }

  /**
   * Appends one record as a single line.
   *
   * @throws SinkError when the write fails or the sink is closed
   */
  append(record: ResultRecord): Promise<void> {
    const line = serializeRecord(record)
    const task = this._queue.then(async () => {
      if (this._failure) {
        throw this._failure
      }
      if (this._closed) {
        throw new SinkError(`Log file ${this._path} is closed`, this._path)
      }
      try {
        await this._handle.appendFile(line, 'utf-8')
      } catch (error) {
        this._failure = new SinkError(`Failed to write log file ${this._path}: ${describe(error)}`, this._path, {
          cause: error,
        })
        throw this._failure
      }
      this._written += 1
    })

    // The caller observes the failure through `task`; the queue itself keeps going
    this._queue = task.then(
      () => undefined,
      () => undefined
    )
    return task
  }

  /**
   * Waits for queued appends and closes the file. Safe to call more than once.
   */
  async close(): Promise<void> {
    await this._queue
    if (this._closed) {
      return
    }
    this._closed = true
    try {
      await this._handle.close()
    } catch (error) {
      throw new SinkError(`Failed to close log file ${this._path}: ${describe(error)}`, this._path, { cause: error })
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
