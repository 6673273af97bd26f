/**
 * Structured JSON-line logger.
 *
 * Emits one JSON object per line: ts, level, component, msg, plus any extra
 * fields. debug/info go to stdout, warn/error to stderr. Compatible with any
 * log aggregator that reads JSON lines.
 */

import type { LogLevel } from './sync-config'

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export type LogFields = Record<string, unknown>

export interface LogEntry extends LogFields {
  ts: string
  level: LogLevel
  component: string
  msg: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Logger for a sub-component sharing level and sink. */
  child(component: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
}

/** Default sink: stdout for debug/info, stderr for warn/error. */
export const stdioSink: LogSink = (entry) => {
  const line = JSON.stringify(entry, jsonReplacer) + '\n'
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(line)
  } else {
    process.stdout.write(line)
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message }
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`
  return value
}

function envLevel(): LogLevel {
  const raw = process.env['LOG_LEVEL']
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info'
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? envLevel()
  const sink = options.sink ?? stdioSink
  const threshold = LEVEL_RANK[level]

  const emit = (entryLevel: LogLevel, msg: string, fields?: LogFields): void => {
    if (LEVEL_RANK[entryLevel] < threshold) return
    sink({ ...fields, ts: new Date().toISOString(), level: entryLevel, component, msg })
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (sub) => createLogger(`${component}.${sub}`, { level, sink }),
  }
}

/** Collects entries in memory. For tests. */
export function memorySink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return { sink: (entry) => { entries.push(entry) }, entries }
}
