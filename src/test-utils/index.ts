/**
 * Shared test helpers
 */

import type { MeasurementSet } from '../types/measurement.js'

/**
 * Runs fn and returns what it threw; fails the test when nothing was thrown
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected function to throw')
}

/**
 * Builds a measurement set, defaulting min and max to the mean
 */
export function createMeasurementSet(overrides: Partial<MeasurementSet> = {}): MeasurementSet {
  const mean = overrides.mean ?? 100
  return {
    mean,
    min: overrides.min ?? mean,
    max: overrides.max ?? mean
  }
}
