import { describe, expect, it } from 'vitest'
import { DEFAULT_OPTIONS, parseRunConfig } from '../options.js'
import { ConfigurationError } from '../../errors.js'
import { MAX_TIMEOUT_SECONDS } from '../../types/descriptor.js'

describe('parseRunConfig', () => {
  it('fills defaults for everything but the url', () => {
    const config = parseRunConfig({ url: 'https://api.example.com/todos' })

    expect(config.totalRequests).toBe(DEFAULT_OPTIONS.totalRequests)
    expect(config.concurrentRequests).toBe(DEFAULT_OPTIONS.concurrentRequests)
    expect(config.method).toBe('GET')
    expect(config.logFile).toBe('api_stress_test.jsonl')
    expect(config.timeout).toBe(60)
    expect(config.logMode).toBe('truncate')
    expect(config.body).toBeUndefined()
  })

  it('accepts string, number and boolean query parameters', () => {
    const config = parseRunConfig({
      url: 'https://api.example.com/todos',
      params: { page: 1, q: 'x', completed: false },
    })

    expect(config.params).toEqual({ page: 1, q: 'x', completed: false })
  })

  it('upper-cases the method', () => {
    expect(parseRunConfig({ url: 'http://localhost:3000/', method: 'patch' }).method).toBe('PATCH')
  })

  it('lists every invalid option', () => {
    let caught: unknown
    try {
      parseRunConfig({ url: 'http://localhost:3000/', totalRequests: 0, concurrentRequests: -2, timeout: 0 })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    const issues = caught instanceof ConfigurationError ? caught.issues.map((issue) => issue.split(':')[0]) : []
    expect(issues).toEqual(['totalRequests', 'concurrentRequests', 'timeout'])
  })

  it('accepts the longest timeout a timer can hold', () => {
    expect(parseRunConfig({ url: 'http://localhost:3000/', timeout: MAX_TIMEOUT_SECONDS }).timeout).toBe(2_147_483)
    expect(() => parseRunConfig({ url: 'http://localhost:3000/', timeout: MAX_TIMEOUT_SECONDS + 1 })).toThrow(
      ConfigurationError
    )
  })

  it('requires a url', () => {
    expect(() => parseRunConfig({})).toThrow(ConfigurationError)
  })

  it('rejects an unknown log mode', () => {
    expect(() => parseRunConfig({ url: 'http://localhost:3000/', logMode: 'rotate' })).toThrow(ConfigurationError)
  })
})
