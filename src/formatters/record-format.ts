/**
 * Key/value encodings
 *
 * Numbers are written in their shortest round-trip form, so full double
 * precision survives a write/parse cycle.
 *
 * @module formatters/record-format
 */

import {
  MEASUREMENT_KEYS,
  type ComparisonReport,
  type MeasurementSet
} from '../types/measurement.js'

/**
 * Report fields written by serializeReport, in output order
 */
export const REPORT_KEYS = [
  'rangeA',
  'rangeB',
  'speedup',
  'absoluteOverhead',
  'relativeOverheadPct',
  'interpretationTier'
] as const

/**
 * Writes a measurement set in the record format the parser reads
 *
 * @example
 * ```typescript
 * formatMeasurementSet({ mean: 45, min: 40, max: 52 })
 * // 'mean=45\nmin=40\nmax=52\n'
 * ```
 */
export function formatMeasurementSet(set: MeasurementSet): string {
  return MEASUREMENT_KEYS.map((key) => `${key}=${String(set[key])}\n`).join('')
}

/**
 * Writes the derived fields of a report as key/value lines
 */
export function serializeReport(report: ComparisonReport): string {
  return REPORT_KEYS.map((key) => `${key}=${String(report[key])}\n`).join('')
}
