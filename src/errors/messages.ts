/**
 * Error message module
 *
 * Centralized message definitions for consistent failure feedback
 */

import type { CandidateLabel, MeasurementSet } from '../types/measurement.js'

const describeSet = (set: MeasurementSet): string =>
  `mean=${set.mean}, min=${set.min}, max=${set.max}`

/**
 * Standardized error messages with consistent format
 * Format: ${path}: Expected ${expectation}, got ${actual}
 */
export const ErrorMessages = {
  SOURCE_UNAVAILABLE: (source: string, reason: string): string =>
    `${source}: Expected readable measurement source, got ${reason}`,
  MALFORMED_VALUE: (source: string, line: string): string =>
    `${source}: Expected finite decimal number, got "${line}"`,
  INCOMPLETE_RECORD: (source: string, missingKeys: readonly string[]): string =>
    `${source}: Expected keys mean, min, max, got missing ${missingKeys.join(', ')}`,
  INVALID_MEASUREMENT_SET: (label: CandidateLabel, inequality: string, set: MeasurementSet): string =>
    `set ${label}: Expected ${inequality}, got ${describeSet(set)}`,
  DIVISION_BY_ZERO: (label: CandidateLabel): string =>
    `set ${label}: Expected non-zero mean for speedup, got 0`,
  NON_FINITE_RESULT: (metric: string, value: number): string =>
    `${metric}: Expected finite value, got ${value}`
}
