import { afterEach, describe, expect, it } from 'vitest'
import { LoggerFactory, analysisLogger, formatLogger, parserLogger } from './logger.js'

describe('LoggerFactory', () => {
  afterEach(() => {
    LoggerFactory.clear()
  })

  it('should prefix namespaces', () => {
    expect(LoggerFactory.create('parser').namespace).toBe('benchmark-comparator:parser')
  })

  it('should reuse loggers per namespace', () => {
    expect(parserLogger()).toBe(LoggerFactory.create('parser'))
    expect(analysisLogger()).not.toBe(formatLogger())
  })

  it('should create fresh loggers after clear', () => {
    const before = analysisLogger()
    LoggerFactory.clear()

    expect(analysisLogger()).not.toBe(before)
    expect(analysisLogger().namespace).toBe('benchmark-comparator:analysis')
  })
})
