/**
 * Measurement and Comparison Types
 *
 * Plain data handed from the parser to the analyzer, and from the analyzer
 * to downstream collaborators (renderers, report printers).
 *
 * @module types/measurement
 */

/**
 * Field names a measurement record must supply, in canonical order
 */
export const MEASUREMENT_KEYS = ['mean', 'min', 'max'] as const

export type MeasurementKey = (typeof MEASUREMENT_KEYS)[number]

/**
 * One candidate's benchmark outcome. All durations are in nanoseconds.
 *
 * Expected to satisfy `0 <= min <= mean <= max`; the analyzer checks this.
 */
export interface MeasurementSet {
  readonly mean: number
  readonly min: number
  readonly max: number
}

/**
 * Which side of a comparison a set belongs to
 */
export type CandidateLabel = 'A' | 'B'

/**
 * Qualitative label for the magnitude of a speedup
 */
export enum InterpretationTier {
  /** speedup > 2.0 */
  SIGNIFICANT_ADVANTAGE = 'SIGNIFICANT_ADVANTAGE',
  /** 1.0 < speedup <= 2.0 */
  MODERATE_ADVANTAGE = 'MODERATE_ADVANTAGE',
  /** speedup == 1.0 */
  NO_DIFFERENCE = 'NO_DIFFERENCE',
  /** speedup < 1.0, candidate A is the slower one */
  A_SLOWER = 'A_SLOWER'
}

/**
 * Result of comparing candidate A (presumed faster) with candidate B
 */
export interface ComparisonReport {
  /** Baseline set */
  readonly a: MeasurementSet
  /** Comparison set */
  readonly b: MeasurementSet
  /** max - min of A */
  readonly rangeA: number
  /** max - min of B */
  readonly rangeB: number
  /** meanB / meanA */
  readonly speedup: number
  /** meanB - meanA, in nanoseconds */
  readonly absoluteOverhead: number
  /** (speedup - 1) * 100 */
  readonly relativeOverheadPct: number
  readonly interpretationTier: InterpretationTier
}
