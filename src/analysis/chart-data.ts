/**
 * Chart data for rendering backends
 *
 * Shapes a ComparisonReport into the series a renderer needs for a grouped
 * statistics bar chart and a mean-with-range error bar chart. Values are
 * passed through unrounded; labels and styling belong to the renderer.
 *
 * @module analysis/chart-data
 */

import type { CandidateLabel, ComparisonReport, MeasurementSet } from '../types/measurement.js'

export type StatisticName = 'Mean' | 'Min' | 'Max'

/**
 * One group of the statistics bar chart
 */
export interface StatisticGroup {
  statistic: StatisticName
  a: number
  b: number
}

/**
 * One bar of the error bar chart
 */
export interface CandidateRangeBar {
  candidate: CandidateLabel
  mean: number
  /** mean - min */
  lowerError: number
  /** max - mean */
  upperError: number
  /** max - min */
  range: number
}

export interface ChartData {
  statistics: StatisticGroup[]
  ranges: [CandidateRangeBar, CandidateRangeBar]
  speedup: number
}

function toRangeBar(candidate: CandidateLabel, set: MeasurementSet, range: number): CandidateRangeBar {
  return {
    candidate,
    mean: set.mean,
    lowerError: set.mean - set.min,
    upperError: set.max - set.mean,
    range
  }
}

/**
 * Builds renderer input from a finished comparison
 */
export function buildChartData(report: ComparisonReport): ChartData {
  const { a, b } = report

  return {
    statistics: [
      { statistic: 'Mean', a: a.mean, b: b.mean },
      { statistic: 'Min', a: a.min, b: b.min },
      { statistic: 'Max', a: a.max, b: b.max }
    ],
    ranges: [toRangeBar('A', a, report.rangeA), toRangeBar('B', b, report.rangeB)],
    speedup: report.speedup
  }
}
