import type { ColumnType, TableSchema, ValidationErrorEntry } from '@polystore/gateway'

// ── Type Mapping ───────────────────────────────────────────────

const CLICKHOUSE_TYPES: Readonly<Record<ColumnType, string>> = {
  string: 'String',
  int: 'Int64',
  float: 'Float64',
  decimal: 'Decimal(18, 4)',
  date: 'Date',
  datetime: 'DateTime',
  boolean: 'Bool',
}

export function toClickHouseType(type: ColumnType, nullable: boolean): string {
  const base = CLICKHOUSE_TYPES[type]
  return nullable ? `Nullable(${base})` : base
}

/** Maps a column type reported by DESCRIBE back onto the gateway's column types. */
export function fromClickHouseType(type: string): ColumnType {
  const base = unwrap(unwrap(type, 'Nullable'), 'LowCardinality')
  if (/^U?Int\d+$/.test(base)) return 'int'
  if (/^Float\d+$/.test(base)) return 'float'
  if (base.startsWith('Decimal')) return 'decimal'
  if (/^Date(32)?$/.test(base)) return 'date'
  if (base.startsWith('DateTime')) return 'datetime'
  if (base === 'Bool') return 'boolean'
  return 'string'
}

function unwrap(type: string, wrapper: string): string {
  const prefix = `${wrapper}(`
  return type.startsWith(prefix) && type.endsWith(')') ? type.slice(prefix.length, -1) : type
}

// ── Value Checks ───────────────────────────────────────────────

const DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const DATETIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/
const DECIMAL = /^-?\d+(\.\d+)?$/

// Ranges ClickHouse stores for Date and DateTime, as UTC milliseconds.
const DATE_MIN = Date.UTC(1970, 0, 1)
const DATE_MAX = Date.UTC(2149, 5, 6)
const DATETIME_MAX = Date.UTC(2106, 1, 7, 6, 28, 15)

/** UTC milliseconds of a real calendar date and time of day, or undefined. */
function calendarTime(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number | undefined {
  if (hour > 23 || minute > 59 || second > 59) return undefined
  const time = Date.UTC(year, month - 1, day, hour, minute, second)
  const parsed = new Date(time)
  if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    return undefined
  }
  return time
}

export function isColumnDate(value: string): boolean {
  const match = DATE.exec(value)
  if (match === null) return false
  const time = calendarTime(Number(match[1]), Number(match[2]), Number(match[3]))
  return time !== undefined && time >= DATE_MIN && time <= DATE_MAX
}

export function isColumnDateTime(value: string): boolean {
  const match = DATETIME.exec(value)
  if (match === null) return false
  const time = calendarTime(
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
    Number(match[4]),
    Number(match[5]),
    Number(match[6]),
  )
  return time !== undefined && time >= DATE_MIN && time <= DATETIME_MAX
}

export function matchesColumnType(type: ColumnType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string'
    case 'int':
      return typeof value === 'number' && Number.isSafeInteger(value)
    case 'float':
      return typeof value === 'number' && Number.isFinite(value)
    case 'decimal':
      return (typeof value === 'number' && Number.isFinite(value)) || (typeof value === 'string' && DECIMAL.test(value))
    case 'date':
      return typeof value === 'string' && isColumnDate(value)
    case 'datetime':
      return typeof value === 'string' && isColumnDateTime(value)
    case 'boolean':
      return typeof value === 'boolean'
  }
}

/**
 * Checks every row against the table schema. Returns the first problem found,
 * carrying the offending row index, or undefined when the whole batch is valid.
 */
export function validateRows(
  schema: TableSchema,
  rows: readonly Readonly<Record<string, unknown>>[],
): ValidationErrorEntry | undefined {
  const known = new Set(schema.columns.map((c) => c.name))
  for (let rowIndex = 0; rowIndex < rows.length; rowIndex++) {
    const row = rows[rowIndex] ?? {}
    for (const column of Object.keys(row)) {
      if (!known.has(column)) {
        return {
          code: 'INVALID_ROW',
          message: `Row ${rowIndex} has unknown column '${column}'`,
          details: { parameter: 'rows', rowIndex, column },
        }
      }
    }
    for (const column of schema.columns) {
      const value = row[column.name]
      if (value === undefined || value === null) {
        if (column.nullable === true) continue
        return {
          code: 'INVALID_ROW',
          message: `Row ${rowIndex} is missing column '${column.name}'`,
          details: { parameter: 'rows', rowIndex, column: column.name, expected: column.type },
        }
      }
      if (!matchesColumnType(column.type, value)) {
        return {
          code: 'INVALID_ROW',
          message: `Row ${rowIndex} column '${column.name}' must be ${column.type}, got ${JSON.stringify(value)}`,
          details: { parameter: 'rows', rowIndex, column: column.name, expected: column.type, actual: typeof value },
        }
      }
    }
  }
  return undefined
}
