import type {
  ExecutionContext,
  GraphCommand,
  GraphStoreConfig,
  PropertyValue,
  StorageAdapter,
  TraversalDirection,
} from '@polystore/gateway'
import { ConflictError, ConnectionError, NotFoundError, ValidationError, wrapBackendError } from '@polystore/gateway'
import type { Driver } from 'neo4j-driver'
import neo4j from 'neo4j-driver'
import { randomUUID } from 'node:crypto'

export const DEFAULT_MAX_HOPS = 6

/** One reachable node and the length of its shortest path from the origin. */
export interface HopRow {
  readonly id: string
  readonly hops: number
}

export interface GraphPath {
  readonly path: readonly string[]
  readonly hops: number
}

/**
 * Nodes at exactly `maxHops` from the origin. Anything reachable in fewer hops,
 * and the origin itself, is left out.
 */
export function selectExactHopFrontier(rows: readonly HopRow[], originId: string, maxHops: number): string[] {
  const shortest = new Map<string, number>()
  for (const row of rows) {
    if (row.id === originId) continue
    const known = shortest.get(row.id)
    if (known === undefined || row.hops < known) shortest.set(row.id, row.hops)
  }
  return [...shortest]
    .filter(([, hops]) => hops === maxHops)
    .map(([id]) => id)
    .sort()
}

// ── Cypher ─────────────────────────────────────────────────────

function relationshipPattern(relation: string | undefined, range: string, direction: TraversalDirection): string {
  const type = relation === undefined ? '' : `:\`${relation}\``
  const body = `[${type}*${range}]`
  switch (direction) {
    case 'out':
      return `-${body}->`
    case 'in':
      return `<-${body}-`
    case 'both':
      return `-${body}-`
  }
}

/** Every gateway node carries this label besides its own, so one constraint covers all ids. */
export const NODE_LABEL = 'Node'

const NODE_ID_CONSTRAINT = `CREATE CONSTRAINT node_id_unique IF NOT EXISTS FOR (n:${NODE_LABEL}) REQUIRE n.id IS UNIQUE`
const FIND_NODES = `MATCH (n:${NODE_LABEL}) WHERE n.id IN $ids RETURN collect(DISTINCT n.id) AS found`
const CONSTRAINT_VIOLATION = 'Neo.ClientError.Schema.ConstraintValidationFailed'

// ── Adapter ────────────────────────────────────────────────────

/**
 * Graph store adapter over Neo4j. Nodes are addressed by their `id` property,
 * unique across labels; `createNode` uses `properties.id` when given and a
 * random UUID otherwise.
 */
export function createGraphAdapter(config: GraphStoreConfig): StorageAdapter<'graph'> {
  const ceiling = config.maxHops ?? DEFAULT_MAX_HOPS
  let driver: Driver | undefined

  function unreachable(err: unknown): ConnectionError {
    return new ConnectionError(
      'CONNECTION_FAILED',
      `Graph store unreachable at ${config.uri}`,
      { paradigm: 'graph', url: config.uri },
      err instanceof Error ? err : new Error(String(err)),
    )
  }

  function requireDriver(): Driver {
    if (driver === undefined) {
      throw new ConnectionError('ADAPTER_CLOSED', 'Graph store is not connected', { paradigm: 'graph' })
    }
    return driver
  }

  async function cypher(
    query: string,
    params: Record<string, unknown> = {},
    target: Driver = requireDriver(),
  ): Promise<Record<string, unknown>[]> {
    const session = target.session({ database: config.database })
    try {
      const result = await session.run(query, params)
      return result.records.map((record) => record.toObject())
    } finally {
      await session.close()
    }
  }

  async function missingNodes(ids: readonly string[]): Promise<string[]> {
    const [row] = await cypher(FIND_NODES, { ids: [...new Set(ids)] })
    const found = new Set(readStrings(row?.found))
    return ids.filter((id) => !found.has(id))
  }

  async function requireNodes(ids: readonly string[]): Promise<void> {
    const [missing] = await missingNodes(ids)
    if (missing !== undefined) throw new NotFoundError({ paradigm: 'graph', resource: 'node', id: missing })
  }

  async function run(command: GraphCommand): Promise<unknown> {
    switch (command.kind) {
      case 'createNode': {
        const given = command.properties.id
        const id = typeof given === 'string' && given !== '' ? given : randomUUID()
        try {
          await cypher(`CREATE (n:${NODE_LABEL}:\`${command.label}\` $properties) SET n.id = $id`, {
            properties: toNeo4jProperties(command.properties),
            id,
          })
        } catch (err) {
          if (isConstraintViolation(err)) throw new ConflictError({ paradigm: 'graph', resource: 'node', id })
          throw err
        }
        return { nodeId: id }
      }

      case 'createEdge':
        await requireNodes([command.fromId, command.toId])
        await cypher(
          `MATCH (a:${NODE_LABEL} {id: $fromId}), (b:${NODE_LABEL} {id: $toId})
           CREATE (a)-[r:\`${command.relation}\`]->(b)
           SET r = $properties`,
          { fromId: command.fromId, toId: command.toId, properties: toNeo4jProperties(command.properties) },
        )
        return undefined

      case 'neighbors': {
        if (command.maxHops > ceiling) {
          throw new ValidationError('graph', 'neighbors', [
            {
              code: 'LIMIT_EXCEEDED',
              message: `maxHops must be at most ${ceiling}, got ${command.maxHops}`,
              details: { parameter: 'maxHops', expected: `<= ${ceiling}`, actual: String(command.maxHops) },
            },
          ])
        }
        const pattern = relationshipPattern(command.relation, `1..${command.maxHops}`, command.direction)
        const records = await cypher(
          `MATCH (origin:${NODE_LABEL} {id: $nodeId})
           OPTIONAL MATCH p = (origin)${pattern}(m)
           WITH m, min(length(p)) AS hops
           RETURN m.id AS id, hops`,
          { nodeId: command.nodeId },
        )
        if (records.length === 0) {
          throw new NotFoundError({ paradigm: 'graph', resource: 'node', id: command.nodeId })
        }
        return selectExactHopFrontier(readHopRows(records), command.nodeId, command.maxHops)
      }

      case 'shortestPath': {
        await requireNodes([command.fromId, command.toId])
        if (command.fromId === command.toId) {
          const self: GraphPath = { path: [command.fromId], hops: 0 }
          return self
        }
        const pattern = relationshipPattern(command.relation, '', 'both')
        const [record] = await cypher(
          `MATCH (a:${NODE_LABEL} {id: $fromId}), (b:${NODE_LABEL} {id: $toId})
           MATCH p = shortestPath((a)${pattern}(b))
           RETURN [n IN nodes(p) | n.id] AS path, length(p) AS hops`,
          { fromId: command.fromId, toId: command.toId },
        )
        if (record === undefined) {
          throw new NotFoundError(
            { paradigm: 'graph', resource: 'path', id: `${command.fromId}->${command.toId}` },
            `No path between ${command.fromId} and ${command.toId}`,
          )
        }
        const found: GraphPath = { path: readStrings(record.path), hops: Number(record.hops) }
        return found
      }

      case 'clear':
        await cypher('MATCH (n) DETACH DELETE n')
        return undefined
    }
  }

  return {
    paradigm: 'graph',
    concurrency: 'concurrent',

    async connect(): Promise<void> {
      let next: Driver | undefined
      try {
        next = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
          disableLosslessIntegers: true,
          connectionTimeout: config.connectionTimeoutMs,
        })
        await next.verifyConnectivity({ database: config.database })
        await cypher(NODE_ID_CONSTRAINT, {}, next)
      } catch (err) {
        // A failed close must not replace the connect error.
        await next?.close().catch(() => undefined)
        throw unreachable(err)
      }
      driver = next
    },

    async disconnect(): Promise<void> {
      const current = driver
      driver = undefined
      await current?.close()
    },

    async healthCheck(): Promise<void> {
      try {
        await requireDriver().verifyConnectivity({ database: config.database })
      } catch (err) {
        throw unreachable(err)
      }
    },

    // The driver has no per-query cancellation; the gateway's deadline bounds the wait
    async execute(command: GraphCommand, _context: ExecutionContext): Promise<unknown> {
      try {
        return await run(command)
      } catch (err) {
        throw wrapBackendError(err, 'graph', command.kind)
      }
    },
  }
}

// ── Helpers ────────────────────────────────────────────────────

function toNeo4jProperties(properties: Readonly<Record<string, PropertyValue>>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(properties)) {
    // Neo4j stores no nulls; a null property is simply absent
    if (value !== null) out[key] = Array.isArray(value) ? [...value] : value
  }
  return out
}

function isConstraintViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === CONSTRAINT_VIOLATION
}

function readStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

function readHopRows(records: readonly Record<string, unknown>[]): HopRow[] {
  const rows: HopRow[] = []
  for (const record of records) {
    if (typeof record.id === 'string' && typeof record.hops === 'number') {
      rows.push({ id: record.id, hops: record.hops })
    }
  }
  return rows
}
