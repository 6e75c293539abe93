/**
 * Unit tests for src/utils/logger.ts - Pino configuration.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import type { Logger } from 'pino'
import { createLogger, childLogger } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const savedEnv = {
  LOG_LEVEL: process.env.LOG_LEVEL,
  NODE_ENV: process.env.NODE_ENV,
}

function restore(key: keyof typeof savedEnv): void {
  const value = savedEnv[key]
  if (value === undefined) {
    delete process.env[key]
  } else {
    process.env[key] = value
  }
}

afterEach(() => {
  restore('LOG_LEVEL')
  restore('NODE_ENV')
})

/** In-memory stream that collects one JSON line per log call */
function createCapturingStream(): { stream: Writable; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })
  return { stream, getLines: () => lines }
}

function createCapturingLogger(): { logger: Logger; getLines: () => string[] } {
  const { stream, getLines } = createCapturingStream()
  return { logger: createLogger('capture', { level: 'trace', pretty: false, stream }), getLines }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.error).toBe('function')
  })

  it('uses LOG_LEVEL environment variable to override default log level', () => {
    process.env.LOG_LEVEL = 'error'
    expect(createLogger('test-level', { pretty: false }).level).toBe('error')
  })

  it('prefers an explicit level over LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error'
    expect(createLogger('test-explicit', { level: 'trace', pretty: false }).level).toBe('trace')
  })

  it('uses info level when NODE_ENV = production', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'production'
    expect(createLogger('test-prod', { pretty: false }).level).toBe('info')
  })

  it('uses debug level when NODE_ENV = test', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'test'
    expect(createLogger('test-env', { pretty: false }).level).toBe('debug')
  })

  it('falls back to warn when neither variable is set', () => {
    delete process.env.LOG_LEVEL
    delete process.env.NODE_ENV
    expect(createLogger('test-cli', { pretty: false }).level).toBe('warn')
  })
})

describe('createLogger stream option', () => {
  it('writes JSON lines with the module name and a textual level', () => {
    const { stream, getLines } = createCapturingStream()
    const logger = createLogger('dep-tree', { level: 'info', pretty: false, stream })

    logger.debug('hidden')
    logger.warn({ removed: 2 }, 'Dependency graph reduced')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>
    expect(parsed.name).toBe('dep-tree')
    expect(parsed.level).toBe('warn')
    expect(parsed.removed).toBe(2)
    expect(parsed.msg).toBe('Dependency graph reduced')
    expect(typeof parsed.time).toBe('string')
  })

  it('honours an explicit name over the module name', () => {
    const { stream, getLines } = createCapturingStream()
    createLogger('module', { name: 'deptrack', level: 'info', pretty: false, stream }).info('hi')
    const parsed = JSON.parse(getLines()[0] ?? '{}') as Record<string, unknown>
    expect(parsed.name).toBe('deptrack')
  })
})

describe('childLogger', () => {
  it('adds its bindings to every line', () => {
    const { logger, getLines } = createCapturingLogger()
    const child = childLogger(logger, { file: 'graph.yaml' })

    child.info('loaded')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed = JSON.parse(lines[0] ?? '{}') as { file?: string; msg?: string }
    expect(parsed.file).toBe('graph.yaml')
    expect(parsed.msg).toBe('loaded')
  })

  it('returns a different object from the parent', () => {
    const parent = createLogger('parent-module', { pretty: false })
    expect(childLogger(parent, { file: 'x' })).not.toBe(parent)
  })
})
