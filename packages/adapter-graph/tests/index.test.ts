import { ConflictError, ConnectionError, NotFoundError, ValidationError } from '@polystore/gateway'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createGraphAdapter, selectExactHopFrontier } from '../src/index.js'

// ── Mock neo4j-driver ──────────────────────────────────────────

const mockRun = vi.fn()
const mockSessionClose = vi.fn()
const mockVerify = vi.fn()
const mockDriverClose = vi.fn(async () => {})
const mockSession = vi.fn(() => ({ run: mockRun, close: mockSessionClose }))
const mockCreateDriver = vi.fn((_uri: string, _auth: unknown, _config: unknown) => ({
  session: mockSession,
  verifyConnectivity: mockVerify,
  close: mockDriverClose,
}))

vi.mock('neo4j-driver', () => ({
  default: {
    driver: (uri: string, auth: unknown, config: unknown) => mockCreateDriver(uri, auth, config),
    auth: { basic: (principal: string, credentials: string) => ({ scheme: 'basic', principal, credentials }) },
  },
}))

function records(...rows: Record<string, unknown>[]) {
  return { records: rows.map((row) => ({ toObject: () => row })) }
}

function cypherAt(index: number): string {
  const call = mockRun.mock.calls[index]
  return typeof call?.[0] === 'string' ? call[0] : ''
}

const config = { uri: 'bolt://localhost:7687', user: 'neo4j', password: 'test-secret' }
const context = { signal: new AbortController().signal }

async function connected(overrides: { maxHops?: number } = {}) {
  mockVerify.mockResolvedValue({})
  mockRun.mockResolvedValueOnce(records())
  const adapter = createGraphAdapter({ ...config, ...overrides })
  await adapter.connect()
  // Only the calls a test makes itself are of interest.
  mockRun.mockClear()
  mockSessionClose.mockClear()
  return adapter
}

// ── selectExactHopFrontier ─────────────────────────────────────

describe('selectExactHopFrontier', () => {
  it('keeps only nodes whose shortest distance equals maxHops', () => {
    const rows = [
      { id: 'B', hops: 1 },
      { id: 'C', hops: 2 },
      { id: 'D', hops: 2 },
      { id: 'D', hops: 1 },
    ]
    expect(selectExactHopFrontier(rows, 'A', 2)).toEqual(['C'])
  })

  it('never returns the origin, even on a cycle', () => {
    expect(selectExactHopFrontier([{ id: 'A', hops: 2 }, { id: 'C', hops: 2 }], 'A', 2)).toEqual(['C'])
  })
})

// ── Adapter ────────────────────────────────────────────────────

describe('adapter-graph', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('connect', () => {
    it('opens a driver that returns plain numbers', async () => {
      await connected()
      expect(mockCreateDriver).toHaveBeenCalledWith(
        'bolt://localhost:7687',
        { scheme: 'basic', principal: 'neo4j', credentials: 'test-secret' },
        { disableLosslessIntegers: true, connectionTimeout: undefined },
      )
    })

    it('makes node ids unique before serving commands', async () => {
      mockVerify.mockResolvedValue({})
      mockRun.mockResolvedValueOnce(records())

      await createGraphAdapter(config).connect()

      expect(cypherAt(0)).toBe('CREATE CONSTRAINT node_id_unique IF NOT EXISTS FOR (n:Node) REQUIRE n.id IS UNIQUE')
      expect(mockSessionClose).toHaveBeenCalledTimes(1)
    })

    it('closes the driver and reports ConnectionError when the server is unreachable', async () => {
      mockVerify.mockRejectedValue(Object.assign(new Error('Could not perform discovery'), { code: 'ServiceUnavailable' }))

      const err = await createGraphAdapter(config)
        .connect()
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ConnectionError)
      expect(err).toMatchObject({ code: 'CONNECTION_FAILED', message: 'Graph store unreachable at bolt://localhost:7687' })
      expect(mockDriverClose).toHaveBeenCalledTimes(1)
    })

    it('keeps the connect error when closing the driver also fails', async () => {
      mockVerify.mockRejectedValue(new Error('Could not perform discovery'))
      mockDriverClose.mockRejectedValueOnce(new Error('Pool is closed'))

      const err = await createGraphAdapter(config)
        .connect()
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ConnectionError)
      expect(err).toMatchObject({
        message: 'Graph store unreachable at bolt://localhost:7687',
        cause: { message: 'Could not perform discovery' },
      })
    })

    it('refuses commands before connecting', async () => {
      const err = await createGraphAdapter(config)
        .execute({ paradigm: 'graph', kind: 'clear' }, context)
        .catch((e: unknown) => e)
      expect(err).toMatchObject({ code: 'ADAPTER_CLOSED' })
    })
  })

  describe('createNode', () => {
    it('uses the given id and drops null properties', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records())

      const result = await adapter.execute(
        { paradigm: 'graph', kind: 'createNode', label: 'User', properties: { id: 'u1', name: 'Ada', nickname: null } },
        context,
      )

      expect(result).toEqual({ nodeId: 'u1' })
      expect(cypherAt(0)).toBe('CREATE (n:Node:`User` $properties) SET n.id = $id')
      expect(mockRun.mock.calls[0]?.[1]).toEqual({ properties: { id: 'u1', name: 'Ada' }, id: 'u1' })
      expect(mockSessionClose).toHaveBeenCalledTimes(1)
    })

    it('reports an id the uniqueness constraint refuses as Conflict', async () => {
      const adapter = await connected()
      mockRun.mockRejectedValueOnce(
        Object.assign(new Error("Node(7) already exists with label `Node` and property `id` = 'u1'"), {
          code: 'Neo.ClientError.Schema.ConstraintValidationFailed',
        }),
      )

      const err = await adapter
        .execute({ paradigm: 'graph', kind: 'createNode', label: 'User', properties: { id: 'u1' } }, context)
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ConflictError)
      expect(err).toMatchObject({ message: 'Node already exists: u1' })
      expect(mockRun).toHaveBeenCalledTimes(1)
    })
  })

  describe('createEdge', () => {
    it('reports a missing endpoint as NotFound without creating anything', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records({ found: ['A'] }))

      const err = await adapter
        .execute(
          { paradigm: 'graph', kind: 'createEdge', fromId: 'A', toId: 'B', relation: 'FRIENDS_WITH', properties: {} },
          context,
        )
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(NotFoundError)
      expect(err).toMatchObject({ message: 'Node not found: B' })
      expect(mockRun).toHaveBeenCalledTimes(1)
    })

    it('creates the relationship between existing nodes', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records({ found: ['A', 'B'] })).mockResolvedValueOnce(records())

      const result = await adapter.execute(
        { paradigm: 'graph', kind: 'createEdge', fromId: 'A', toId: 'B', relation: 'FRIENDS_WITH', properties: {} },
        context,
      )

      expect(result).toBeUndefined()
      expect(cypherAt(1)).toContain('CREATE (a)-[r:`FRIENDS_WITH`]->(b)')
    })
  })

  describe('neighbors', () => {
    const neighbors = { paradigm: 'graph', kind: 'neighbors', nodeId: 'A', maxHops: 2, direction: 'out' } as const

    it('returns only the nodes exactly maxHops away', async () => {
      // A -> B -> C
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records({ id: 'B', hops: 1 }, { id: 'C', hops: 2 }))

      const result = await adapter.execute(neighbors, context)

      expect(result).toEqual(['C'])
      expect(cypherAt(0)).toContain('OPTIONAL MATCH p = (origin)-[*1..2]->(m)')
    })

    it('follows the requested relation and direction', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records({ id: null, hops: null }))

      const result = await adapter.execute({ ...neighbors, relation: 'FOLLOWS', direction: 'in', maxHops: 1 }, context)

      expect(result).toEqual([])
      expect(cypherAt(0)).toContain('(origin)<-[:`FOLLOWS`*1..1]-(m)')
    })

    it('reports a missing origin as NotFound', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records())

      await expect(adapter.execute(neighbors, context)).rejects.toThrow('Node not found: A')
    })

    it('rejects maxHops above the ceiling', async () => {
      const adapter = await connected()

      const err = await adapter.execute({ ...neighbors, maxHops: 7 }, context).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ValidationError)
      expect(err).toMatchObject({ errors: [{ code: 'LIMIT_EXCEEDED', message: 'maxHops must be at most 6, got 7' }] })
      expect(mockRun).not.toHaveBeenCalled()
    })
  })

  describe('shortestPath', () => {
    const shortestPath = { paradigm: 'graph', kind: 'shortestPath', fromId: 'A', toId: 'C' } as const

    it('returns the node ids along the path and its length', async () => {
      const adapter = await connected()
      mockRun
        .mockResolvedValueOnce(records({ found: ['A', 'C'] }))
        .mockResolvedValueOnce(records({ path: ['A', 'B', 'C'], hops: 2 }))

      const result = await adapter.execute(shortestPath, context)

      expect(result).toEqual({ path: ['A', 'B', 'C'], hops: 2 })
      expect(cypherAt(1)).toContain('shortestPath((a)-[*]-(b))')
    })

    it('reports disconnected nodes as NotFound', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records({ found: ['A', 'C'] })).mockResolvedValueOnce(records())

      const err = await adapter.execute(shortestPath, context).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(NotFoundError)
      expect(err).toMatchObject({
        message: 'No path between A and C',
        details: { paradigm: 'graph', resource: 'path', id: 'A->C' },
      })
    })

    it('treats a node as zero hops from itself', async () => {
      const adapter = await connected()
      mockRun.mockResolvedValueOnce(records({ found: ['A'] }))

      const result = await adapter.execute({ ...shortestPath, toId: 'A' }, context)

      expect(result).toEqual({ path: ['A'], hops: 0 })
    })
  })

  it('clear detaches and deletes every node', async () => {
    const adapter = await connected()
    mockRun.mockResolvedValueOnce(records())

    await adapter.execute({ paradigm: 'graph', kind: 'clear' }, context)

    expect(cypherAt(0)).toBe('MATCH (n) DETACH DELETE n')
  })

  it('disconnect closes the driver once', async () => {
    const adapter = await connected()
    await adapter.disconnect()
    await adapter.disconnect()
    expect(mockDriverClose).toHaveBeenCalledTimes(1)
  })
})
