import type { ClickHouseSettings } from '@clickhouse/client'
import { createClient } from '@clickhouse/client'
import type {
  ColumnarCommand,
  ColumnarStoreConfig,
  ColumnDef,
  ExecutionContext,
  NamedQuery,
  StorageAdapter,
  TableSchema,
  ValidationErrorEntry,
} from '@polystore/gateway'
import { ConnectionError, isPlainRecord, ValidationError, wrapBackendError } from '@polystore/gateway'
import { BUILTIN_NAMED_QUERIES } from './namedQueries.js'
import { fromClickHouseType, matchesColumnType, toClickHouseType, validateRows } from './schema.js'

export { BUILTIN_NAMED_QUERIES, SALES_SCHEMA } from './namedQueries.js'
export { fromClickHouseType, matchesColumnType, toClickHouseType, validateRows } from './schema.js'

export interface ColumnarResultSet {
  readonly columns: readonly string[]
  readonly values: readonly (readonly unknown[])[]
  readonly rowCount: number
  /** False for raw statements, whose shape the gateway cannot vouch for. */
  readonly trusted: boolean
}

export interface TableStats {
  readonly table: string
  readonly totalRows: number
  readonly columns: readonly ColumnDef[]
}

// ── Adapter ────────────────────────────────────────────────────

/**
 * Columnar store adapter over ClickHouse. Tables use the MergeTree engine;
 * analytical reads go through pre-registered named queries or read-only raw statements.
 */
export function createColumnarAdapter(config: ColumnarStoreConfig): StorageAdapter<'columnar'> {
  const settings: ClickHouseSettings = {}
  if (config.timeoutMs !== undefined) {
    settings.max_execution_time = Math.ceil(config.timeoutMs / 1000)
  }

  const client = createClient({
    url: config.url,
    username: config.username,
    password: config.password,
    database: config.database,
    clickhouse_settings: settings,
  })

  const namedQueries = new Map<string, NamedQuery>()
  for (const query of [...BUILTIN_NAMED_QUERIES, ...(config.namedQueries ?? [])]) {
    namedQueries.set(query.name, query)
  }
  const schemas = new Map<string, TableSchema>()

  function unreachable(cause: Error): ConnectionError {
    return new ConnectionError(
      'CONNECTION_FAILED',
      `Columnar store unreachable at ${config.url}`,
      { paradigm: 'columnar', url: config.url },
      cause,
    )
  }

  async function ping(): Promise<void> {
    const result = await client.ping().catch((err: unknown) => {
      throw unreachable(err instanceof Error ? err : new Error(String(err)))
    })
    if (!result.success) throw unreachable(result.error)
  }

  async function describeTable(table: string, signal: AbortSignal): Promise<TableSchema> {
    const cached = schemas.get(table)
    if (cached !== undefined) return cached
    const result = await client.query({
      query: 'DESCRIBE TABLE {table:Identifier}',
      query_params: { table },
      format: 'JSONEachRow',
      abort_signal: signal,
    })
    const rows: unknown = await result.json()
    const columns: ColumnDef[] = []
    for (const row of Array.isArray(rows) ? rows : []) {
      if (!isPlainRecord(row) || typeof row.name !== 'string' || typeof row.type !== 'string') continue
      columns.push({ name: row.name, type: fromClickHouseType(row.type), nullable: row.type.startsWith('Nullable(') })
    }
    const schema: TableSchema = { table, columns }
    schemas.set(table, schema)
    return schema
  }

  async function select(
    query: string,
    params: Record<string, unknown>,
    signal: AbortSignal,
    extra: ClickHouseSettings = {},
  ): Promise<Omit<ColumnarResultSet, 'trusted'>> {
    const result = await client.query({
      query,
      query_params: params,
      format: 'JSONCompact',
      // Int64 and UInt64 come back as JSON numbers rather than strings.
      clickhouse_settings: { ...settings, output_format_json_quote_64bit_integers: 0, ...extra },
      abort_signal: signal,
    })
    return readCompact(await result.json())
  }

  async function run(command: ColumnarCommand, signal: AbortSignal): Promise<unknown> {
    switch (command.kind) {
      case 'createTable': {
        const { schema } = command
        await client.command({ query: createTableSql(schema, command.ifNotExists), abort_signal: signal })
        // With IF NOT EXISTS an older definition may have won; describe it on next use
        if (command.ifNotExists) schemas.delete(schema.table)
        else schemas.set(schema.table, schema)
        return undefined
      }

      case 'bulkInsert': {
        const schema = await describeTable(command.table, signal)
        const problem = validateRows(schema, command.rows)
        if (problem !== undefined) throw new ValidationError('columnar', 'bulkInsert', [problem])
        if (command.rows.length > 0) {
          await client.insert({
            table: command.table,
            values: [...command.rows],
            format: 'JSONEachRow',
            clickhouse_settings: { date_time_input_format: 'best_effort' },
            abort_signal: signal,
          })
        }
        return { inserted: command.rows.length }
      }

      case 'query': {
        const { input } = command
        if ('statement' in input) {
          const result = await select(stripTrailingSemicolons(input.statement), {}, signal, { readonly: '2' })
          const untrusted: ColumnarResultSet = { ...result, trusted: false }
          return untrusted
        }
        const named = namedQueries.get(input.named)
        if (named === undefined) {
          throw new ValidationError('columnar', 'query', [
            {
              code: 'UNKNOWN_NAMED_QUERY',
              message: `Unknown named query '${input.named}'`,
              details: { parameter: 'named', expected: [...namedQueries.keys()].sort().join(' | '), actual: input.named },
            },
          ])
        }
        const result = await select(named.sql, bindNamedParams(named, input.params), signal)
        const trusted: ColumnarResultSet = { ...result, trusted: true }
        return trusted
      }

      case 'stats': {
        const schema = await describeTable(command.table, signal)
        const result = await client.query({
          query: 'SELECT count() AS total FROM {table:Identifier}',
          query_params: { table: command.table },
          format: 'JSONEachRow',
          abort_signal: signal,
        })
        const rows: unknown = await result.json()
        const first: unknown = Array.isArray(rows) ? rows[0] : undefined
        const stats: TableStats = {
          table: command.table,
          totalRows: isPlainRecord(first) ? Number(first.total) : 0,
          columns: schema.columns,
        }
        return stats
      }
    }
  }

  return {
    paradigm: 'columnar',
    concurrency: 'serialized',

    async connect(): Promise<void> {
      await ping()
    },

    async disconnect(): Promise<void> {
      schemas.clear()
      await client.close()
    },

    async healthCheck(): Promise<void> {
      await ping()
    },

    async execute(command: ColumnarCommand, context: ExecutionContext): Promise<unknown> {
      try {
        return await run(command, context.signal)
      } catch (err) {
        throw wrapBackendError(err, 'columnar', command.kind)
      }
    },
  }
}

// ── SQL ────────────────────────────────────────────────────────

export function createTableSql(schema: TableSchema, ifNotExists: boolean): string {
  const columns = schema.columns.map((c) => `\`${c.name}\` ${toClickHouseType(c.type, c.nullable === true)}`)
  const keys = schema.orderBy ?? []
  const orderBy = keys.length > 0 ? `(${keys.map((name) => `\`${name}\``).join(', ')})` : 'tuple()'
  const exists = ifNotExists ? 'IF NOT EXISTS ' : ''
  return `CREATE TABLE ${exists}\`${schema.table}\` (${columns.join(', ')}) ENGINE = MergeTree ORDER BY ${orderBy}`
}

function stripTrailingSemicolons(statement: string): string {
  return statement.replace(/[\s;]+$/, '')
}

/**
 * Checks named-query arguments against the declared parameter shape and fills defaults.
 */
export function bindNamedParams(query: NamedQuery, given: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const declared = query.params ?? {}
  const errors: ValidationErrorEntry[] = []
  const bound: Record<string, unknown> = {}

  for (const name of Object.keys(given)) {
    if (!Object.hasOwn(declared, name)) {
      errors.push({
        code: 'UNKNOWN_PARAMETER',
        message: `Named query '${query.name}' has no parameter '${name}'`,
        details: { parameter: name },
      })
    }
  }
  for (const [name, param] of Object.entries(declared)) {
    const value = given[name] ?? param.default
    if (value === undefined) {
      if (param.required === true) {
        errors.push({
          code: 'MISSING_PARAMETER',
          message: `Named query '${query.name}' needs parameter '${name}'`,
          details: { parameter: name, expected: param.type },
        })
      }
      continue
    }
    if (!matchesColumnType(param.type, value)) {
      errors.push({
        code: 'INVALID_PARAMETER',
        message: `Parameter '${name}' must be ${param.type}, got ${JSON.stringify(value)}`,
        details: { parameter: name, expected: param.type, actual: typeof value },
      })
      continue
    }
    bound[name] = value
  }

  if (errors.length > 0) throw new ValidationError('columnar', 'query', errors)
  return bound
}

function readCompact(body: unknown): Omit<ColumnarResultSet, 'trusted'> {
  if (!isPlainRecord(body)) return { columns: [], values: [], rowCount: 0 }
  const columns: string[] = []
  for (const column of Array.isArray(body.meta) ? body.meta : []) {
    if (isPlainRecord(column) && typeof column.name === 'string') columns.push(column.name)
  }
  const values: unknown[][] = []
  for (const row of Array.isArray(body.data) ? body.data : []) {
    if (Array.isArray(row)) values.push(row)
  }
  return { columns, values, rowCount: values.length }
}
