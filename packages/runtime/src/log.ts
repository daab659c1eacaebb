// @latchkey/runtime — Structured log sink (winston-backed by default)

import * as winston from 'winston'
import type { UserId } from './types.js'

/** Lowest level written; false disables logging */
export type LogLevel = 'info' | 'warn' | false

/** A structured log entry. Latchkey only produces these. */
export interface LogEntry {
  readonly level: 'info' | 'warn'
  readonly user: UserId | null
  readonly message: string
  readonly meta: Readonly<Record<string, unknown>>
}

export interface LogSink {
  log(entry: LogEntry): void
}

const LEVEL_RANK: Readonly<Record<LogEntry['level'], number>> = {
  warn: 1,
  info: 2,
}

/**
 * Creates the default winston logger: timestamped JSON lines on the
 * console, silent when logging is disabled.
 */
export function createDefaultLogger(level: LogLevel): winston.Logger {
  return winston.createLogger({
    level: level === false ? 'info' : level,
    silent: level === false,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console()],
  })
}

/**
 * Forwards entries to a winston logger. The user id and the entry's
 * metadata become fields of the JSON record.
 */
export function createWinstonLogSink(logger: winston.Logger): LogSink {
  return {
    log(entry: LogEntry): void {
      logger.log(entry.level, entry.message, { ...entry.meta, user: entry.user })
    },
  }
}

/** Drops entries below `level` before they reach `sink`. */
export function createLevelFilter(sink: LogSink, level: LogLevel): LogSink {
  return {
    log(entry: LogEntry): void {
      if (level === false) return
      if (LEVEL_RANK[entry.level] > LEVEL_RANK[level]) return
      sink.log(entry)
    },
  }
}
