/**
 * Error taxonomy for parsing and comparison failures
 *
 * Every failure carries a `kind` so the calling layer can pick its own
 * message or exit code without matching on text.
 *
 * @module errors
 */

import type { CandidateLabel, MeasurementKey, MeasurementSet } from '../types/measurement.js'
import { ErrorMessages } from './messages.js'

/**
 * Failure kinds surfaced by the parser and the analyzer
 */
export enum AnalysisErrorKind {
  /** The named source could not be opened or read */
  SOURCE_UNAVAILABLE = 'source_unavailable',
  /** A recognized key had a non-numeric or non-finite value */
  MALFORMED_VALUE = 'malformed_value',
  /** One or more of mean/min/max never appeared */
  INCOMPLETE_RECORD = 'incomplete_record',
  /** 0 <= min <= mean <= max < Infinity does not hold */
  INVALID_MEASUREMENT_SET = 'invalid_measurement_set',
  /** Baseline mean is zero, so speedup is undefined */
  DIVISION_BY_ZERO = 'division_by_zero',
  /** A derived metric overflowed to Infinity */
  NON_FINITE_RESULT = 'non_finite_result'
}

/**
 * Ordering constraints a measurement set must satisfy, checked in this order
 */
export type MeasurementInequality = '0 <= min' | 'min <= mean' | 'mean <= max' | 'max < Infinity'

/**
 * Base class for all failures raised by this package
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class SourceUnavailableError extends AnalysisError {
  readonly kind = AnalysisErrorKind.SOURCE_UNAVAILABLE

  constructor(
    readonly source: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(ErrorMessages.SOURCE_UNAVAILABLE(source, reason), { cause })
  }
}

export class MalformedValueError extends AnalysisError {
  readonly kind = AnalysisErrorKind.MALFORMED_VALUE

  constructor(
    readonly source: string,
    readonly key: MeasurementKey,
    readonly line: string
  ) {
    super(ErrorMessages.MALFORMED_VALUE(source, line))
  }
}

export class IncompleteRecordError extends AnalysisError {
  readonly kind = AnalysisErrorKind.INCOMPLETE_RECORD

  constructor(
    readonly source: string,
    readonly missingKeys: readonly MeasurementKey[]
  ) {
    super(ErrorMessages.INCOMPLETE_RECORD(source, missingKeys))
  }
}

export class InvalidMeasurementSetError extends AnalysisError {
  readonly kind = AnalysisErrorKind.INVALID_MEASUREMENT_SET

  constructor(
    readonly set: CandidateLabel,
    readonly inequality: MeasurementInequality,
    readonly measurements: MeasurementSet
  ) {
    super(ErrorMessages.INVALID_MEASUREMENT_SET(set, inequality, measurements))
  }
}

export class DivisionByZeroError extends AnalysisError {
  readonly kind = AnalysisErrorKind.DIVISION_BY_ZERO

  constructor(readonly set: CandidateLabel) {
    super(ErrorMessages.DIVISION_BY_ZERO(set))
  }
}

/**
 * Derived metrics that can overflow for extreme but ordered inputs
 */
export type DerivedMetric = 'speedup' | 'relativeOverheadPct'

export class NonFiniteResultError extends AnalysisError {
  readonly kind = AnalysisErrorKind.NON_FINITE_RESULT

  constructor(
    readonly metric: DerivedMetric,
    readonly value: number
  ) {
    super(ErrorMessages.NON_FINITE_RESULT(metric, value))
  }
}

interface AnalysisErrorByKind {
  [AnalysisErrorKind.SOURCE_UNAVAILABLE]: SourceUnavailableError
  [AnalysisErrorKind.MALFORMED_VALUE]: MalformedValueError
  [AnalysisErrorKind.INCOMPLETE_RECORD]: IncompleteRecordError
  [AnalysisErrorKind.INVALID_MEASUREMENT_SET]: InvalidMeasurementSetError
  [AnalysisErrorKind.DIVISION_BY_ZERO]: DivisionByZeroError
  [AnalysisErrorKind.NON_FINITE_RESULT]: NonFiniteResultError
}

/**
 * Type guard for package errors, optionally narrowed to one kind
 *
 * @example
 * ```typescript
 * try {
 *   readMeasurementFile('results.txt')
 * } catch (error) {
 *   if (isAnalysisError(error, AnalysisErrorKind.INCOMPLETE_RECORD)) {
 *     // error.missingKeys
 *   }
 * }
 * ```
 */
export function isAnalysisError(value: unknown): value is AnalysisError
export function isAnalysisError<K extends AnalysisErrorKind>(
  value: unknown,
  kind: K
): value is AnalysisErrorByKind[K]
export function isAnalysisError(value: unknown, kind?: AnalysisErrorKind): boolean {
  if (!(value instanceof AnalysisError)) {
    return false
  }
  return kind === undefined || value.kind === kind
}
