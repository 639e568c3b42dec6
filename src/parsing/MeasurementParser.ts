/**
 * Measurement Record Parser
 *
 * Reads flat `key=value` records (one measurement set per source) into a
 * MeasurementSet. Unknown keys and lines without `=` are skipped; the three
 * recognized keys must all be present with finite decimal values.
 *
 * @module parsing
 */

import { readFileSync } from 'node:fs'
import {
  IncompleteRecordError,
  MalformedValueError,
  SourceUnavailableError
} from '../errors/AnalysisError.js'
import {
  MEASUREMENT_KEYS,
  type MeasurementKey,
  type MeasurementSet
} from '../types/measurement.js'
import { parserLogger } from '../utils/logger.js'

/**
 * Identifier used in errors when the caller names no source
 */
export const DEFAULT_SOURCE = '<input>'

/**
 * Optional sign, digits with optional fraction (or a bare fraction), optional exponent
 */
const DECIMAL_REGEX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

const LINE_BREAK_REGEX = /\r?\n/

const RECOGNIZED_KEYS: ReadonlySet<string> = new Set<string>(MEASUREMENT_KEYS)

function isMeasurementKey(key: string): key is MeasurementKey {
  return RECOGNIZED_KEYS.has(key)
}

/**
 * Parses a decimal literal, returning undefined for anything else
 * (empty text, `inf`, `nan`, hex, values overflowing to Infinity)
 */
export function parseDecimal(text: string): number | undefined {
  if (!DECIMAL_REGEX.test(text)) {
    return undefined
  }
  const value = Number(text)
  return Number.isFinite(value) ? value : undefined
}

/**
 * Builds a MeasurementSet from record lines, top to bottom
 *
 * A repeated key overwrites the earlier value.
 *
 * @param lines - Raw record lines, with or without surrounding whitespace
 * @param source - Identifier reported in errors
 * @throws MalformedValueError on the first recognized key with a bad value
 * @throws IncompleteRecordError when mean, min or max never appeared
 */
export function parseMeasurementLines(
  lines: Iterable<string>,
  source: string = DEFAULT_SOURCE
): MeasurementSet {
  const log = parserLogger()
  const found: Partial<Record<MeasurementKey, number>> = {}

  for (const rawLine of lines) {
    const line = rawLine.trim()
    const separator = line.indexOf('=')
    if (separator === -1) {
      continue
    }

    const key = line.slice(0, separator).trim()
    if (!isMeasurementKey(key)) {
      log('%s: ignoring unrecognized key "%s"', source, key)
      continue
    }

    const value = parseDecimal(line.slice(separator + 1).trim())
    if (value === undefined) {
      throw new MalformedValueError(source, key, line)
    }
    found[key] = value
  }

  const { mean, min, max } = found
  if (mean === undefined || min === undefined || max === undefined) {
    const missingKeys = MEASUREMENT_KEYS.filter((key) => found[key] === undefined)
    throw new IncompleteRecordError(source, missingKeys)
  }

  log('%s: parsed measurement set', source)
  return Object.freeze({ mean, min, max })
}

/**
 * Splits text on LF or CRLF and parses the resulting lines
 */
export function parseMeasurementText(text: string, source: string = DEFAULT_SOURCE): MeasurementSet {
  return parseMeasurementLines(text.split(LINE_BREAK_REGEX), source)
}

/**
 * Reads one measurement file and parses it
 *
 * @param filePath - Path of the record file; also used as the source identifier
 * @throws SourceUnavailableError when the file is missing or unreadable
 */
export function readMeasurementFile(filePath: string): MeasurementSet {
  let text: string
  try {
    text = readFileSync(filePath, 'utf-8')
  } catch (error) {
    parserLogger()('%s: read failed', filePath)
    throw new SourceUnavailableError(filePath, error)
  }
  return parseMeasurementText(text, filePath)
}
