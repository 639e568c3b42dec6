/**
 * Benchmark Comparator
 *
 * Parses two benchmark measurement records and compares them: ranges,
 * absolute and relative overhead, speedup, and an interpretation tier.
 */

// Export data types
export {
  InterpretationTier,
  MEASUREMENT_KEYS,
  type MeasurementKey,
  type MeasurementSet,
  type CandidateLabel,
  type ComparisonReport
} from './types/measurement.js'

// Export error taxonomy
export {
  AnalysisError,
  AnalysisErrorKind,
  SourceUnavailableError,
  MalformedValueError,
  IncompleteRecordError,
  InvalidMeasurementSetError,
  DivisionByZeroError,
  NonFiniteResultError,
  isAnalysisError,
  type MeasurementInequality,
  type DerivedMetric
} from './errors/AnalysisError.js'

// Export parser
export {
  DEFAULT_SOURCE,
  parseDecimal,
  parseMeasurementLines,
  parseMeasurementText,
  readMeasurementFile
} from './parsing/MeasurementParser.js'

// Export analyzer
export {
  SIGNIFICANT_SPEEDUP_THRESHOLD,
  PARITY_SPEEDUP,
  classifySpeedup,
  findViolatedInequality,
  assertValidMeasurementSet,
  compareMeasurements
} from './analysis/ComparativeAnalyzer.js'
export { compareMeasurementFiles } from './analysis/compare-files.js'
export {
  buildChartData,
  type ChartData,
  type StatisticGroup,
  type StatisticName,
  type CandidateRangeBar
} from './analysis/chart-data.js'

// Export formatters
export { REPORT_KEYS, formatMeasurementSet, serializeReport } from './formatters/record-format.js'
export {
  SummaryFormatter,
  formatSummary,
  DEFAULT_SUMMARY_CONFIG,
  type SummaryFormatterConfig
} from './formatters/SummaryFormatter.js'
