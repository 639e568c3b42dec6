import type { ComparisonReport } from '../types/measurement.js'
import { readMeasurementFile } from '../parsing/MeasurementParser.js'
import { compareMeasurements } from './ComparativeAnalyzer.js'

/**
 * Reads both record files, then compares them
 *
 * A is read first; the first failure (from either read or the comparison) is thrown.
 */
export function compareMeasurementFiles(pathA: string, pathB: string): ComparisonReport {
  const a = readMeasurementFile(pathA)
  const b = readMeasurementFile(pathB)
  return compareMeasurements(a, b)
}
