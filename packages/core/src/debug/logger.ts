import type { DebugLogEntry } from '@polystore/validation'

// ── Logger ─────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface GatewayLogger {
  debug(message: string, fields?: Record<string, unknown>): void
  info(message: string, fields?: Record<string, unknown>): void
  warn(message: string, fields?: Record<string, unknown>): void
  error(message: string, fields?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value)
}

/**
 * Console-backed logger emitting one JSON line per entry at or above `level`.
 */
export function createConsoleLogger(level: LogLevel = 'info', sink: Pick<Console, 'log' | 'error'> = console): GatewayLogger {
  const threshold = LEVEL_ORDER[level]

  function write(entryLevel: Exclude<LogLevel, 'silent'>, message: string, fields?: Record<string, unknown>): void {
    if (LEVEL_ORDER[entryLevel] < threshold) return
    const line = JSON.stringify({ time: new Date().toISOString(), level: entryLevel, msg: message, ...fields })
    if (entryLevel === 'error' || entryLevel === 'warn') {
      sink.error(line)
    } else {
      sink.log(line)
    }
  }

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  }
}

export const silentLogger: GatewayLogger = createConsoleLogger('silent')

// ── Debug Entries ──────────────────────────────────────────────

export function debugEntry(
  phase: DebugLogEntry['phase'],
  message: string,
  durationMs: number,
  details?: unknown,
): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

export function withDebugLog<T extends object>(result: T, debug: boolean, log: readonly DebugLogEntry[]): T {
  if (debug && log.length > 0) {
    return { ...result, debugLog: log }
  }
  return result
}
