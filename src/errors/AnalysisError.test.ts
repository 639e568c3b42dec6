import { describe, expect, it } from 'vitest'
import {
  AnalysisError,
  AnalysisErrorKind,
  DivisionByZeroError,
  IncompleteRecordError,
  MalformedValueError,
  SourceUnavailableError,
  isAnalysisError
} from './AnalysisError.js'

describe('AnalysisError', () => {
  it('should name errors after their class', () => {
    const error = new DivisionByZeroError('A')

    expect(error).toBeInstanceOf(AnalysisError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('DivisionByZeroError')
  })

  it('should keep the underlying cause of an unavailable source', () => {
    const cause = new Error('EACCES: permission denied')
    const error = new SourceUnavailableError('results.txt', cause)

    expect(error.cause).toBe(cause)
    expect(error.message).toBe(
      'results.txt: Expected readable measurement source, got EACCES: permission denied'
    )
  })

  it('should describe non-Error causes', () => {
    const error = new SourceUnavailableError('results.txt', 'locked')

    expect(error.message).toBe('results.txt: Expected readable measurement source, got locked')
  })
})

describe('isAnalysisError', () => {
  it('should accept any package error without a kind', () => {
    expect(isAnalysisError(new IncompleteRecordError('x', ['max']))).toBe(true)
  })

  it('should narrow by kind', () => {
    const error: unknown = new MalformedValueError('x', 'mean', 'mean=abc')

    expect(isAnalysisError(error, AnalysisErrorKind.MALFORMED_VALUE)).toBe(true)
    expect(isAnalysisError(error, AnalysisErrorKind.INCOMPLETE_RECORD)).toBe(false)
    if (isAnalysisError(error, AnalysisErrorKind.MALFORMED_VALUE)) {
      expect(error.line).toBe('mean=abc')
    }
  })

  it('should reject plain errors and other values', () => {
    expect(isAnalysisError(new Error('boom'))).toBe(false)
    expect(isAnalysisError({ kind: AnalysisErrorKind.DIVISION_BY_ZERO })).toBe(false)
    expect(isAnalysisError(undefined)).toBe(false)
  })
})
