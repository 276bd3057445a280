import type { ValidationErrorEntry } from '../errors.js'
import type { ColumnType, MetadataValue, PropertyValue, TraversalDirection } from '../types/commands.js'

// ── Shared Constants ───────────────────────────────────────────

export const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/
export const VALID_COLUMN_TYPES = new Set<string>(['string', 'int', 'float', 'decimal', 'date', 'datetime', 'boolean'])
export const VALID_DIRECTIONS = new Set<string>(['out', 'in', 'both'])

export function isIdentifier(value: string): boolean {
  return value.length <= 64 && IDENTIFIER_REGEX.test(value)
}

export function isColumnType(value: unknown): value is ColumnType {
  return typeof value === 'string' && VALID_COLUMN_TYPES.has(value)
}

export function isDirection(value: unknown): value is TraversalDirection {
  return typeof value === 'string' && VALID_DIRECTIONS.has(value)
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array)
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value))
}

export function isPropertyValue(value: unknown): value is PropertyValue {
  if (value === null || isMetadataValue(value)) return true
  return Array.isArray(value) && value.every((v) => isMetadataValue(v))
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Uint8Array) return 'bytes'
  return typeof value
}

// ── Parameter Reader ───────────────────────────────────────────

/**
 * Reads typed parameters off an operation while collecting every problem,
 * so one request reports all of its errors at once.
 */
export class ParamReader {
  readonly errors: ValidationErrorEntry[] = []
  private readonly seen = new Set<string>()

  constructor(private readonly params: Readonly<Record<string, unknown>>) {}

  has(name: string): boolean {
    return this.params[name] !== undefined
  }

  string(name: string, opts: { optional?: boolean; nonEmpty?: boolean; identifier?: boolean } = {}): string | undefined {
    const value = this.take(name, opts.optional === true)
    if (value === undefined) return undefined
    if (typeof value !== 'string') {
      return this.invalid(name, 'string', describeValue(value))
    }
    if (opts.nonEmpty === true && value.length === 0) {
      return this.invalid(name, 'non-empty string', "''")
    }
    if (opts.identifier === true && !isIdentifier(value)) {
      return this.invalid(name, `identifier matching ${IDENTIFIER_REGEX.source}`, `'${value}'`)
    }
    return value
  }

  bytes(name: string): Uint8Array | undefined {
    const value = this.take(name, false)
    if (value === undefined) return undefined
    if (!(value instanceof Uint8Array)) {
      return this.invalid(name, 'bytes', describeValue(value))
    }
    return value
  }

  boolean(name: string): boolean | undefined {
    const value = this.take(name, true)
    if (value === undefined) return undefined
    if (typeof value !== 'boolean') {
      return this.invalid(name, 'boolean', describeValue(value))
    }
    return value
  }

  positiveInt(name: string, opts: { optional?: boolean } = {}): number | undefined {
    const value = this.take(name, opts.optional === true)
    if (value === undefined) return undefined
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      return this.invalid(name, 'positive integer', String(value))
    }
    return value
  }

  embedding(name: string, opts: { optional?: boolean } = {}): number[] | undefined {
    const value = this.take(name, opts.optional === true)
    if (value === undefined) return undefined
    if (!Array.isArray(value) || value.length === 0) {
      return this.invalid(name, 'non-empty array of numbers', describeValue(value))
    }
    const out: number[] = []
    for (const v of value) {
      if (typeof v !== 'number' || !Number.isFinite(v)) {
        return this.invalid(name, 'finite numbers', describeValue(v))
      }
      out.push(v)
    }
    return out
  }

  record<V>(
    name: string,
    isValue: (v: unknown) => v is V,
    expected: string,
    opts: { optional?: boolean } = {},
  ): Record<string, V> | undefined {
    const value = this.take(name, opts.optional === true)
    if (value === undefined) return undefined
    if (!isPlainRecord(value)) {
      return this.invalid(name, 'object', describeValue(value))
    }
    const out: Record<string, V> = {}
    for (const [key, v] of Object.entries(value)) {
      if (!isValue(v)) {
        return this.invalid(`${name}.${key}`, expected, describeValue(v))
      }
      out[key] = v
    }
    return out
  }

  array(name: string, opts: { optional?: boolean } = {}): unknown[] | undefined {
    const value = this.take(name, opts.optional === true)
    if (value === undefined) return undefined
    if (!Array.isArray(value)) {
      return this.invalid(name, 'array', describeValue(value))
    }
    return value
  }

  fail(entry: ValidationErrorEntry): undefined {
    this.errors.push(entry)
    return undefined
  }

  /** Flag every parameter that no reader asked for. */
  rejectUnknown(): void {
    for (const key of Object.keys(this.params)) {
      if (!this.seen.has(key)) {
        this.errors.push({
          code: 'UNKNOWN_PARAMETER',
          message: `Unknown parameter '${key}'`,
          details: { parameter: key },
        })
      }
    }
  }

  private take(name: string, optional: boolean): unknown {
    this.seen.add(name)
    const value = this.params[name]
    if (value === undefined && !optional) {
      this.errors.push({
        code: 'MISSING_PARAMETER',
        message: `Missing required parameter '${name}'`,
        details: { parameter: name },
      })
    }
    return value
  }

  private invalid(name: string, expected: string, actual: string): undefined {
    this.errors.push({
      code: 'INVALID_PARAMETER',
      message: `Parameter '${name}' must be ${expected}, got ${actual}`,
      details: { parameter: name, expected, actual },
    })
    return undefined
  }
}
