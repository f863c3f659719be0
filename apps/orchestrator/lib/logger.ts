/**
 * Structured Logger
 *
 * Creates a pino-based logger shared across all components. Components
 * derive a child logger tagged with their name.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level })
}
