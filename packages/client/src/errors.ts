import type { ConfigErrorEntry, ConnectionErrorCode, ValidationErrorEntry } from '@polystore/validation'
import { ConfigError, ConnectionError, GatewayError, isPlainRecord, ValidationError } from '@polystore/validation'

const CONNECTION_CODES: ReadonlySet<string> = new Set<ConnectionErrorCode>([
  'CONNECTION_FAILED',
  'NOT_CONFIGURED',
  'ADAPTER_DEGRADED',
  'ADAPTER_CLOSED',
  'NETWORK_ERROR',
  'REQUEST_TIMEOUT',
])

function isConnectionCode(code: string): code is ConnectionErrorCode {
  return CONNECTION_CODES.has(code)
}

/**
 * Reconstruct a typed error from a JSON body returned by the server.
 * Maps the `code` field to the correct error class.
 */
export function deserializeError(body: Record<string, unknown>): GatewayError {
  const code = typeof body.code === 'string' ? body.code : 'UNKNOWN_ERROR'
  const message = typeof body.message === 'string' ? body.message : 'Unknown error'

  if (code === 'VALIDATION_FAILED') {
    return new ValidationError(
      typeof body.paradigm === 'string' ? body.paradigm : 'unknown',
      typeof body.kind === 'string' ? body.kind : 'unknown',
      readEntries(body.errors, readValidationEntry),
    )
  }

  if (code === 'CONFIG_INVALID') {
    return new ConfigError(readEntries(body.errors, readConfigEntry))
  }

  if (isConnectionCode(code)) {
    const details = isPlainRecord(body.details) ? body.details : {}
    return new ConnectionError(code, message, {
      url: typeof details.url === 'string' ? details.url : undefined,
      timeoutMs: typeof details.timeoutMs === 'number' ? details.timeoutMs : undefined,
    })
  }

  return new GatewayError(code, message)
}

// ── Entries ────────────────────────────────────────────────────

function readEntries<T>(value: unknown, read: (entry: Record<string, unknown>) => T | undefined): T[] {
  if (!Array.isArray(value)) return []
  const entries: T[] = []
  for (const raw of value) {
    const entry = isPlainRecord(raw) ? read(raw) : undefined
    if (entry !== undefined) entries.push(entry)
  }
  return entries
}

const VALIDATION_CODES: ReadonlySet<string> = new Set<ValidationErrorEntry['code']>([
  'UNKNOWN_PARADIGM',
  'UNKNOWN_KIND',
  'MISSING_PARAMETER',
  'INVALID_PARAMETER',
  'UNKNOWN_PARAMETER',
  'DIMENSION_MISMATCH',
  'LIMIT_EXCEEDED',
  'INVALID_ROW',
  'UNKNOWN_NAMED_QUERY',
])

function isValidationCode(code: unknown): code is ValidationErrorEntry['code'] {
  return typeof code === 'string' && VALIDATION_CODES.has(code)
}

function readValidationEntry(raw: Record<string, unknown>): ValidationErrorEntry | undefined {
  if (!isValidationCode(raw.code) || typeof raw.message !== 'string') return undefined
  const details = isPlainRecord(raw.details) ? raw.details : {}
  return {
    code: raw.code,
    message: raw.message,
    details: {
      parameter: optionalString(details.parameter),
      expected: optionalString(details.expected),
      actual: optionalString(details.actual),
      rowIndex: typeof details.rowIndex === 'number' ? details.rowIndex : undefined,
      column: optionalString(details.column),
    },
  }
}

const CONFIG_CODES: ReadonlySet<string> = new Set<ConfigErrorEntry['code']>([
  'MISSING_SETTING',
  'INVALID_SETTING',
  'INVALID_IDENTIFIER',
  'DUPLICATE_NAMED_QUERY',
])

function isConfigCode(code: unknown): code is ConfigErrorEntry['code'] {
  return typeof code === 'string' && CONFIG_CODES.has(code)
}

function readConfigEntry(raw: Record<string, unknown>): ConfigErrorEntry | undefined {
  if (!isConfigCode(raw.code) || typeof raw.message !== 'string') return undefined
  const details = isPlainRecord(raw.details) ? raw.details : {}
  return {
    code: raw.code,
    message: raw.message,
    details: { field: optionalString(details.field), expected: optionalString(details.expected) },
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}
