/**
 * Comparative Analyzer
 *
 * Derives ranges, overhead and speedup from two measurement sets and
 * classifies the speedup into an interpretation tier. Pure computation:
 * no rounding, no output.
 *
 * @module analysis
 */

import {
  DivisionByZeroError,
  InvalidMeasurementSetError,
  NonFiniteResultError,
  type DerivedMetric,
  type MeasurementInequality
} from '../errors/AnalysisError.js'
import {
  InterpretationTier,
  type CandidateLabel,
  type ComparisonReport,
  type MeasurementSet
} from '../types/measurement.js'
import { analysisLogger } from '../utils/logger.js'

/**
 * Speedup above which the advantage counts as significant
 */
export const SIGNIFICANT_SPEEDUP_THRESHOLD = 2.0

/**
 * Speedup at which both candidates perform the same
 */
export const PARITY_SPEEDUP = 1.0

interface TierRule {
  tier: InterpretationTier
  matches: (speedup: number) => boolean
}

/**
 * Evaluated top to bottom, first match wins
 */
const TIER_RULES: readonly TierRule[] = [
  {
    tier: InterpretationTier.SIGNIFICANT_ADVANTAGE,
    matches: (speedup) => speedup > SIGNIFICANT_SPEEDUP_THRESHOLD
  },
  {
    tier: InterpretationTier.MODERATE_ADVANTAGE,
    matches: (speedup) => speedup > PARITY_SPEEDUP
  },
  {
    tier: InterpretationTier.NO_DIFFERENCE,
    matches: (speedup) => speedup === PARITY_SPEEDUP
  }
]

/**
 * Maps a speedup ratio to its interpretation tier
 *
 * Exactly 2.0 is moderate, exactly 1.0 is no difference, anything below 1.0
 * means candidate A is the slower one.
 */
export function classifySpeedup(speedup: number): InterpretationTier {
  for (const rule of TIER_RULES) {
    if (rule.matches(speedup)) {
      return rule.tier
    }
  }
  return InterpretationTier.A_SLOWER
}

/**
 * Returns the first ordering constraint the set breaks, if any
 *
 * Comparisons are negated so that NaN fields also fail. Once the set is
 * ordered, a finite max bounds the other two fields.
 */
export function findViolatedInequality(set: MeasurementSet): MeasurementInequality | undefined {
  if (!(0 <= set.min)) {
    return '0 <= min'
  }
  if (!(set.min <= set.mean)) {
    return 'min <= mean'
  }
  if (!(set.mean <= set.max)) {
    return 'mean <= max'
  }
  if (!Number.isFinite(set.max)) {
    return 'max < Infinity'
  }
  return undefined
}

/**
 * Throws when the set breaks `0 <= min <= mean <= max < Infinity`
 *
 * @param set - Measurement set to check
 * @param label - Side of the comparison, reported in the error
 * @throws InvalidMeasurementSetError
 */
export function assertValidMeasurementSet(set: MeasurementSet, label: CandidateLabel): void {
  const inequality = findViolatedInequality(set)
  if (inequality !== undefined) {
    analysisLogger()('set %s violates %s', label, inequality)
    throw new InvalidMeasurementSetError(label, inequality, set)
  }
}

function assertFinite(metric: DerivedMetric, value: number): void {
  if (!Number.isFinite(value)) {
    analysisLogger()('%s overflowed to %d', metric, value)
    throw new NonFiniteResultError(metric, value)
  }
}

/**
 * Compares candidate A (presumed faster) with candidate B
 *
 * Makes no assumption about which candidate actually wins: when B is faster
 * the report is still produced, with tier A_SLOWER. The report holds frozen
 * copies of both sets.
 *
 * @example
 * ```typescript
 * const report = compareMeasurements(
 *   { mean: 45, min: 40, max: 52 },
 *   { mean: 180, min: 170, max: 195 }
 * )
 * // report.speedup === 4, report.interpretationTier === 'SIGNIFICANT_ADVANTAGE'
 * ```
 *
 * @throws InvalidMeasurementSetError when either set is out of order, before anything is derived
 * @throws DivisionByZeroError when A's mean is zero
 * @throws NonFiniteResultError when speedup or relative overhead overflows
 */
export function compareMeasurements(a: MeasurementSet, b: MeasurementSet): ComparisonReport {
  assertValidMeasurementSet(a, 'A')
  assertValidMeasurementSet(b, 'B')

  if (a.mean === 0) {
    analysisLogger()('set A has zero mean, speedup undefined')
    throw new DivisionByZeroError('A')
  }

  const speedup = b.mean / a.mean
  assertFinite('speedup', speedup)
  const relativeOverheadPct = (speedup - 1) * 100
  assertFinite('relativeOverheadPct', relativeOverheadPct)

  const interpretationTier = classifySpeedup(speedup)
  analysisLogger()('speedup %d classified as %s', speedup, interpretationTier)

  return Object.freeze({
    a: Object.freeze({ mean: a.mean, min: a.min, max: a.max }),
    b: Object.freeze({ mean: b.mean, min: b.min, max: b.max }),
    rangeA: a.max - a.min,
    rangeB: b.max - b.min,
    speedup,
    absoluteOverhead: b.mean - a.mean,
    relativeOverheadPct,
    interpretationTier
  })
}
