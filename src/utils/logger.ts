import createDebug from 'debug'

/**
 * Debug loggers, one per area of the comparator (parser, analysis, format).
 *
 * Output appears only when the namespace is enabled, e.g.
 * DEBUG=benchmark-comparator:analysis. Messages name sources, keys and
 * tiers; record contents are not written.
 */

export class LoggerFactory {
  private static debuggers = new Map<string, ReturnType<typeof createDebug>>()

  /**
   * Returns the logger for `benchmark-comparator:<area>`, creating it on first use
   */
  static create(area: string): ReturnType<typeof createDebug> {
    const namespace = `benchmark-comparator:${area}`

    const existing = this.debuggers.get(namespace)
    if (existing) {
      return existing
    }

    const logger = createDebug(namespace)
    this.debuggers.set(namespace, logger)
    return logger
  }

  /**
   * Forgets created loggers; the next create() builds a new instance
   */
  static clear(): void {
    this.debuggers.clear()
  }
}

export const parserLogger = (): ReturnType<typeof createDebug> => LoggerFactory.create('parser')
export const analysisLogger = (): ReturnType<typeof createDebug> => LoggerFactory.create('analysis')
export const formatLogger = (): ReturnType<typeof createDebug> => LoggerFactory.create('format')
