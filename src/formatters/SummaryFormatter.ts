/**
 * Summary Formatter
 *
 * Renders a ComparisonReport as a plain-text analysis block for consoles
 * and logs. Returns the text; printing is left to the caller.
 *
 * @module formatters
 */

import {
  InterpretationTier,
  type ComparisonReport,
  type MeasurementSet
} from '../types/measurement.js'
import { formatLogger } from '../utils/logger.js'

/**
 * Summary formatter configuration
 */
export interface SummaryFormatterConfig {
  /** Display name of candidate A */
  labelA?: string
  /** Display name of candidate B */
  labelB?: string
  /** Time unit suffix */
  unit?: string
  /** Digits after the decimal point */
  precision?: number
  /** Width of the horizontal rules */
  width?: number
}

/**
 * Default formatter configuration
 */
export const DEFAULT_SUMMARY_CONFIG: Required<SummaryFormatterConfig> = {
  labelA: 'Candidate A',
  labelB: 'Candidate B',
  unit: 'ns',
  precision: 2,
  width: 60
}

const MAX_PRECISION = 10
const MIN_WIDTH = 10
const INDENT = '   '

/**
 * Formats comparison reports as text
 *
 * @example
 * ```typescript
 * const formatter = new SummaryFormatter({ labelA: 'Stackless', labelB: 'Ucontext' })
 * const text = formatter.format(report)
 * ```
 */
export class SummaryFormatter {
  private config: Required<SummaryFormatterConfig>

  constructor(config: SummaryFormatterConfig = {}) {
    this.validateConfig(config)
    this.config = { ...DEFAULT_SUMMARY_CONFIG, ...config }
  }

  private validateConfig(config: SummaryFormatterConfig): void {
    if (config.labelA !== undefined && config.labelA.trim() === '') {
      throw new Error('labelA must not be empty')
    }
    if (config.labelB !== undefined && config.labelB.trim() === '') {
      throw new Error('labelB must not be empty')
    }
    if (
      config.precision !== undefined &&
      (!Number.isInteger(config.precision) ||
        config.precision < 0 ||
        config.precision > MAX_PRECISION)
    ) {
      throw new Error(`precision must be an integer between 0 and ${MAX_PRECISION}`)
    }
    if (config.width !== undefined && (!Number.isInteger(config.width) || config.width < MIN_WIDTH)) {
      throw new Error(`width must be an integer >= ${MIN_WIDTH}`)
    }
  }

  /**
   * Formats the full analysis block, one line per entry, joined with '\n'
   */
  public format(report: ComparisonReport): string {
    const { labelA, labelB, width } = this.config
    const rule = '='.repeat(width)

    const lines: string[] = [
      rule,
      ' BENCHMARK ANALYSIS SUMMARY',
      rule,
      '',
      ...this.formatCandidate(labelA, report.a, report.rangeA),
      '',
      ...this.formatCandidate(labelB, report.b, report.rangeB),
      '',
      'PERFORMANCE COMPARISON:',
      `${INDENT}Speedup:           ${this.number(report.speedup)}x`,
      `${INDENT}Absolute overhead: ${this.time(report.absoluteOverhead)}`,
      `${INDENT}Relative overhead: ${this.number(report.relativeOverheadPct)}%`,
      '',
      'INTERPRETATION:',
      `${INDENT}- ${this.interpret(report.interpretationTier)}`,
      rule
    ]

    formatLogger()('formatted summary for tier %s', report.interpretationTier)
    return lines.join('\n')
  }

  /**
   * One-sentence reading of a tier using the configured labels
   */
  public interpret(tier: InterpretationTier): string {
    const { labelA, labelB } = this.config

    switch (tier) {
      case InterpretationTier.SIGNIFICANT_ADVANTAGE:
        return `${labelA} shows a SIGNIFICANT performance advantage over ${labelB}`
      case InterpretationTier.MODERATE_ADVANTAGE:
        return `${labelA} shows a moderate performance advantage over ${labelB}`
      case InterpretationTier.NO_DIFFERENCE:
        return `${labelA} and ${labelB} perform the same`
      case InterpretationTier.A_SLOWER:
        return `${labelA} is slower than ${labelB}`
    }
  }

  private formatCandidate(label: string, set: MeasurementSet, range: number): string[] {
    return [
      `${label}:`,
      `${INDENT}Mean:  ${this.time(set.mean)}`,
      `${INDENT}Min:   ${this.time(set.min)}`,
      `${INDENT}Max:   ${this.time(set.max)}`,
      `${INDENT}Range: ${this.time(range)}`
    ]
  }

  private number(value: number): string {
    return value.toFixed(this.config.precision)
  }

  private time(value: number): string {
    return `${this.number(value)} ${this.config.unit}`
  }
}

/**
 * Formats a report with a one-off formatter
 */
export function formatSummary(report: ComparisonReport, config: SummaryFormatterConfig = {}): string {
  return new SummaryFormatter(config).format(report)
}
