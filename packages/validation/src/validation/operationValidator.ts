import type { ValidationErrorEntry } from '../errors.js'
import { ValidationError } from '../errors.js'
import type {
  ColumnarCommand,
  ColumnDef,
  Command,
  GraphCommand,
  ObjectCommand,
  VectorCommand,
  VectorQueryInput,
} from '../types/commands.js'
import type { GatewayRequest, Operation } from '../types/operation.js'
import { createOperation } from '../types/operation.js'
import type { Paradigm } from '../types/paradigm.js'
import { isParadigm, PARADIGMS } from '../types/paradigm.js'
import {
  describeValue,
  isColumnType,
  isDirection,
  isIdentifier,
  isMetadataValue,
  isPlainRecord,
  isPropertyValue,
  ParamReader,
} from './rules.js'

type Parser<C extends Command> = (r: ParamReader) => C | undefined

// ── Object Store ───────────────────────────────────────────────

const OBJECT_KINDS: Readonly<Record<string, Parser<ObjectCommand>>> = {
  put: (r) => {
    const key = r.string('key', { nonEmpty: true })
    const bytes = r.bytes('bytes')
    if (key === undefined || bytes === undefined) return undefined
    return { paradigm: 'object', kind: 'put', key, bytes }
  },
  get: (r) => {
    const key = r.string('key', { nonEmpty: true })
    return key === undefined ? undefined : { paradigm: 'object', kind: 'get', key }
  },
  list: (r) => {
    const prefix = r.string('prefix', { optional: true })
    return { paradigm: 'object', kind: 'list', prefix: prefix ?? '' }
  },
  delete: (r) => {
    const key = r.string('key', { nonEmpty: true })
    return key === undefined ? undefined : { paradigm: 'object', kind: 'delete', key }
  },
  stat: (r) => {
    const key = r.string('key', { nonEmpty: true })
    return key === undefined ? undefined : { paradigm: 'object', kind: 'stat', key }
  },
}

// ── Vector Store ───────────────────────────────────────────────

const DEFAULT_TOP_K = 5

const VECTOR_KINDS: Readonly<Record<string, Parser<VectorCommand>>> = {
  index: (r) => {
    const id = r.string('id', { nonEmpty: true })
    const embedding = r.embedding('embedding')
    const metadata = r.record('metadata', isMetadataValue, 'string, number or boolean', { optional: true })
    const text = r.string('text', { optional: true })
    if (id === undefined || embedding === undefined) return undefined
    return { paradigm: 'vector', kind: 'index', id, embedding, metadata: metadata ?? {}, text }
  },
  query: (r) => {
    const hasEmbedding = r.has('embedding')
    const hasText = r.has('text')
    const embedding = r.embedding('embedding', { optional: true })
    const text = r.string('text', { optional: true, nonEmpty: true })
    const topK = r.positiveInt('topK', { optional: true })
    const filter = r.record('filter', isMetadataValue, 'string, number or boolean', { optional: true })

    if (hasEmbedding === hasText) {
      return r.fail({
        code: 'INVALID_PARAMETER',
        message: "Exactly one of 'embedding' or 'text' is required",
        details: { parameter: 'embedding', expected: 'embedding xor text' },
      })
    }
    let input: VectorQueryInput
    if (embedding !== undefined) {
      input = { embedding }
    } else if (text !== undefined) {
      input = { text }
    } else {
      return undefined
    }
    if (r.has('topK') && topK === undefined) return undefined
    return { paradigm: 'vector', kind: 'query', input, topK: topK ?? DEFAULT_TOP_K, filter }
  },
  delete: (r) => {
    const id = r.string('id', { nonEmpty: true })
    return id === undefined ? undefined : { paradigm: 'vector', kind: 'delete', id }
  },
  stats: () => ({ paradigm: 'vector', kind: 'stats' }),
}

// ── Graph Store ────────────────────────────────────────────────

const GRAPH_KINDS: Readonly<Record<string, Parser<GraphCommand>>> = {
  createNode: (r) => {
    const label = r.string('label', { identifier: true })
    const properties = r.record('properties', isPropertyValue, 'scalar or array of scalars', { optional: true })
    if (label === undefined) return undefined
    return { paradigm: 'graph', kind: 'createNode', label, properties: properties ?? {} }
  },
  createEdge: (r) => {
    const fromId = r.string('fromId', { nonEmpty: true })
    const toId = r.string('toId', { nonEmpty: true })
    const relation = r.string('relation', { identifier: true })
    const properties = r.record('properties', isPropertyValue, 'scalar or array of scalars', { optional: true })
    if (fromId === undefined || toId === undefined || relation === undefined) return undefined
    return { paradigm: 'graph', kind: 'createEdge', fromId, toId, relation, properties: properties ?? {} }
  },
  neighbors: (r) => {
    const nodeId = r.string('nodeId', { nonEmpty: true })
    const relation = r.string('relation', { optional: true, identifier: true })
    const maxHops = r.positiveInt('maxHops', { optional: true })
    const direction = r.string('direction', { optional: true })
    if (direction !== undefined && !isDirection(direction)) {
      return r.fail({
        code: 'INVALID_PARAMETER',
        message: `Parameter 'direction' must be one of out, in, both, got '${direction}'`,
        details: { parameter: 'direction', expected: 'out | in | both', actual: direction },
      })
    }
    if (nodeId === undefined) return undefined
    if (r.has('relation') && relation === undefined) return undefined
    if (r.has('maxHops') && maxHops === undefined) return undefined
    return {
      paradigm: 'graph',
      kind: 'neighbors',
      nodeId,
      relation,
      maxHops: maxHops ?? 1,
      direction: isDirection(direction) ? direction : 'out',
    }
  },
  shortestPath: (r) => {
    const fromId = r.string('fromId', { nonEmpty: true })
    const toId = r.string('toId', { nonEmpty: true })
    const relation = r.string('relation', { optional: true, identifier: true })
    if (fromId === undefined || toId === undefined) return undefined
    if (r.has('relation') && relation === undefined) return undefined
    return { paradigm: 'graph', kind: 'shortestPath', fromId, toId, relation }
  },
  clear: () => ({ paradigm: 'graph', kind: 'clear' }),
}

// ── Columnar Store ─────────────────────────────────────────────

function readColumns(r: ParamReader, raw: unknown[]): ColumnDef[] | undefined {
  const columns: ColumnDef[] = []
  const errorsBefore = r.errors.length
  for (let i = 0; i < raw.length; i++) {
    const col = raw[i]
    if (
      !isPlainRecord(col) ||
      typeof col.name !== 'string' ||
      !isIdentifier(col.name) ||
      !isColumnType(col.type) ||
      (col.nullable !== undefined && typeof col.nullable !== 'boolean')
    ) {
      r.fail({
        code: 'INVALID_PARAMETER',
        message: `Column ${i} must be { name: identifier, type: column type, nullable?: boolean }`,
        details: { parameter: `columns[${i}]`, actual: describeValue(col) },
      })
      continue
    }
    const name = col.name
    if (columns.some((c) => c.name === name)) {
      r.fail({
        code: 'INVALID_PARAMETER',
        message: `Duplicate column '${name}'`,
        details: { parameter: `columns[${i}]`, column: name },
      })
      continue
    }
    columns.push({ name, type: col.type, nullable: col.nullable === true })
  }
  if (r.errors.length > errorsBefore) return undefined
  if (columns.length === 0) {
    return r.fail({
      code: 'INVALID_PARAMETER',
      message: 'A table needs at least one column',
      details: { parameter: 'columns', expected: 'non-empty array' },
    })
  }
  return columns
}

const COLUMNAR_KINDS: Readonly<Record<string, Parser<ColumnarCommand>>> = {
  createTable: (r) => {
    const table = r.string('table', { identifier: true })
    const rawColumns = r.array('columns')
    const rawOrderBy = r.array('orderBy', { optional: true })
    const ifNotExists = r.boolean('ifNotExists')
    const columns = rawColumns === undefined ? undefined : readColumns(r, rawColumns)
    if (table === undefined || columns === undefined) return undefined

    const orderBy: string[] = []
    for (const name of rawOrderBy ?? []) {
      if (typeof name !== 'string' || !columns.some((c) => c.name === name)) {
        return r.fail({
          code: 'INVALID_PARAMETER',
          message: `orderBy references unknown column '${String(name)}'`,
          details: { parameter: 'orderBy', actual: String(name) },
        })
      }
      orderBy.push(name)
    }
    return {
      paradigm: 'columnar',
      kind: 'createTable',
      schema: { table, columns, orderBy },
      ifNotExists: ifNotExists ?? false,
    }
  },
  bulkInsert: (r) => {
    const table = r.string('table', { identifier: true })
    const rawRows = r.array('rows')
    if (table === undefined || rawRows === undefined) return undefined
    const rows: Record<string, unknown>[] = []
    for (let i = 0; i < rawRows.length; i++) {
      const row = rawRows[i]
      if (!isPlainRecord(row)) {
        return r.fail({
          code: 'INVALID_ROW',
          message: `Row ${i} must be an object, got ${describeValue(row)}`,
          details: { parameter: 'rows', rowIndex: i, actual: describeValue(row) },
        })
      }
      rows.push(row)
    }
    return { paradigm: 'columnar', kind: 'bulkInsert', table, rows }
  },
  query: (r) => {
    const hasNamed = r.has('named')
    const hasStatement = r.has('statement')
    const named = r.string('named', { optional: true, nonEmpty: true })
    const params = r.record('params', isQueryParam, 'scalar', { optional: true })
    const statement = r.string('statement', { optional: true, nonEmpty: true })
    if (hasNamed === hasStatement) {
      return r.fail({
        code: 'INVALID_PARAMETER',
        message: "Exactly one of 'named' or 'statement' is required",
        details: { parameter: 'named', expected: 'named xor statement' },
      })
    }
    if (named !== undefined) {
      return { paradigm: 'columnar', kind: 'query', input: { named, params: params ?? {} } }
    }
    if (statement !== undefined) {
      if (r.has('params')) {
        return r.fail({
          code: 'INVALID_PARAMETER',
          message: "'params' only applies to named queries",
          details: { parameter: 'params' },
        })
      }
      return { paradigm: 'columnar', kind: 'query', input: { statement } }
    }
    return undefined
  },
  stats: (r) => {
    const table = r.string('table', { identifier: true })
    return table === undefined ? undefined : { paradigm: 'columnar', kind: 'stats', table }
  },
}

function isQueryParam(value: unknown): value is string | number | boolean {
  return isMetadataValue(value)
}

// ── Registry ───────────────────────────────────────────────────

const SCHEMAS: Readonly<Record<Paradigm, Readonly<Record<string, Parser<Command>>>>> = {
  object: OBJECT_KINDS,
  vector: VECTOR_KINDS,
  graph: GRAPH_KINDS,
  columnar: COLUMNAR_KINDS,
}

/** Registered operation kinds per paradigm. */
export const OPERATION_KINDS: Readonly<Record<Paradigm, readonly string[]>> = {
  object: Object.keys(OBJECT_KINDS),
  vector: Object.keys(VECTOR_KINDS),
  graph: Object.keys(GRAPH_KINDS),
  columnar: Object.keys(COLUMNAR_KINDS),
}

export function isRegisteredKind(paradigm: Paradigm, kind: string): boolean {
  return Object.hasOwn(SCHEMAS[paradigm], kind)
}

// ── Validation Entry Points ────────────────────────────────────

export type OperationValidation = { ok: true; command: Command } | { ok: false; error: ValidationError }

/**
 * Checks an untrusted request's paradigm and kind and freezes it into an Operation.
 */
export function parseRequest(request: GatewayRequest): { ok: true; operation: Operation } | { ok: false; error: ValidationError } {
  const errors: ValidationErrorEntry[] = []
  if (!isParadigm(request.paradigm)) {
    errors.push({
      code: 'UNKNOWN_PARADIGM',
      message: `Unknown paradigm '${String(request.paradigm)}'`,
      details: { expected: PARADIGMS.join(' | '), actual: String(request.paradigm) },
    })
    return { ok: false, error: new ValidationError(String(request.paradigm), String(request.kind), errors) }
  }
  if (request.parameters !== undefined && !isPlainRecord(request.parameters)) {
    errors.push({
      code: 'INVALID_PARAMETER',
      message: 'parameters must be an object',
      details: { parameter: 'parameters', actual: describeValue(request.parameters) },
    })
    return { ok: false, error: new ValidationError(request.paradigm, String(request.kind), errors) }
  }
  return { ok: true, operation: createOperation(request.paradigm, request.kind, request.parameters ?? {}) }
}

/**
 * Validates an operation against its paradigm's schema and produces the typed
 * command the adapter executes.
 */
export function validateOperation(operation: Operation): OperationValidation {
  const schema = SCHEMAS[operation.paradigm]
  if (typeof operation.kind !== 'string' || !Object.hasOwn(schema, operation.kind)) {
    return {
      ok: false,
      error: new ValidationError(operation.paradigm, String(operation.kind), [
        {
          code: 'UNKNOWN_KIND',
          message: `Unknown ${operation.paradigm} operation '${String(operation.kind)}'`,
          details: { expected: OPERATION_KINDS[operation.paradigm].join(' | '), actual: String(operation.kind) },
        },
      ]),
    }
  }

  const parse = schema[operation.kind]
  const reader = new ParamReader(operation.parameters)
  const command = parse === undefined ? undefined : parse(reader)
  reader.rejectUnknown()

  if (reader.errors.length > 0 || command === undefined) {
    const errors: ValidationErrorEntry[] =
      reader.errors.length > 0
        ? reader.errors
        : [{ code: 'INVALID_PARAMETER', message: 'Invalid parameters', details: {} }]
    return { ok: false, error: new ValidationError(operation.paradigm, operation.kind, errors) }
  }
  return { ok: true, command }
}
