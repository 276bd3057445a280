import { describe, expect, it, vi } from 'vitest'
import type { SupervisorOptions } from '../src/index.js'
import {
  BenchmarkTracker,
  GatewayRouter,
  LifecycleSupervisor,
  ResponseNormalizer,
  wrapBackendError,
} from '../src/index.js'
import type { FakeAdapterOptions } from './fakes.js'
import { fakeAdapter, mockLogger, networkError } from './fakes.js'

// ── Setup ──────────────────────────────────────────────────────

function setup(options: FakeAdapterOptions = {}, supervisorOptions: SupervisorOptions = {}) {
  const logger = mockLogger()
  const normalizer = new ResponseNormalizer({ logger })
  const supervisor = new LifecycleSupervisor({
    logger,
    normalizer,
    connectRetryDelayMs: 0,
    now: () => 1000,
    ...supervisorOptions,
  })
  const adapter = fakeAdapter('object', options)
  const factory = vi.fn(() => adapter)
  supervisor.registerAdapter('object', factory)
  const benchmarks = new BenchmarkTracker()
  const router = new GatewayRouter({ supervisor, normalizer, logger, benchmarks, operationTimeoutMs: 1000 })
  return { router, supervisor, adapter, factory, benchmarks, logger }
}

const never = (): Promise<unknown> => new Promise(() => {})

// ── Dispatch ───────────────────────────────────────────────────

describe('GatewayRouter.route', () => {
  it('dispatches a validated command to the adapter', async () => {
    const { router, adapter } = setup({ execute: async () => ['docs/a.txt', 'docs/b.txt'] })

    const envelope = await router.route({ paradigm: 'object', kind: 'list', parameters: { prefix: 'docs/' } })

    expect(envelope).toMatchObject({
      ok: true,
      paradigm: 'object',
      kind: 'list',
      data: ['docs/a.txt', 'docs/b.txt'],
      error: null,
    })
    expect(envelope.latencyMs).toBeGreaterThanOrEqual(0)
    expect(adapter.execute).toHaveBeenCalledWith(
      { paradigm: 'object', kind: 'list', prefix: 'docs/' },
      { signal: expect.any(AbortSignal) },
    )
  })

  it('rejects invalid parameters without touching the adapter', async () => {
    const { router, factory } = setup()

    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: {} })

    expect(envelope).toMatchObject({
      ok: false,
      data: null,
      error: {
        category: 'InvalidInput',
        message: "Validation failed: Missing required parameter 'key'",
        retryable: false,
      },
    })
    expect(factory).not.toHaveBeenCalled()
  })

  it('rejects an unknown paradigm', async () => {
    const { router } = setup()
    const envelope = await router.route({ paradigm: 'document', kind: 'find' })
    expect(envelope.paradigm).toBe('document')
    expect(envelope.error?.category).toBe('InvalidInput')
  })

  it('reports a paradigm with no adapter as BackendUnavailable', async () => {
    const { router } = setup()
    const envelope = await router.route({ paradigm: 'graph', kind: 'clear' })
    expect(envelope.error).toEqual({
      category: 'BackendUnavailable',
      message: 'No adapter registered for the graph store',
      retryable: true,
    })
  })

  it('fails fast on a degraded handle without calling the backend again', async () => {
    const { router, factory } = setup({
      connect: async () => {
        throw networkError('connect ECONNREFUSED 127.0.0.1:9000', 'ECONNREFUSED')
      },
    })

    const first = await router.route({ paradigm: 'object', kind: 'stat', parameters: { key: 'a' } })
    const second = await router.route({ paradigm: 'object', kind: 'stat', parameters: { key: 'a' } })

    expect(first.error).toEqual({
      category: 'BackendUnavailable',
      message: 'Failed to connect the object store',
      retryable: true,
    })
    expect(second.error).toEqual({
      category: 'BackendUnavailable',
      message: 'object store is unavailable',
      retryable: true,
    })
    expect(factory).toHaveBeenCalledTimes(2)
  })

  it('degrades the handle when a call finds the backend unreachable', async () => {
    const { router, supervisor } = setup({
      execute: async () => {
        throw wrapBackendError(networkError('read ECONNRESET', 'ECONNRESET'), 'object', 'get')
      },
    })

    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' } })

    expect(envelope.error).toEqual({ category: 'BackendUnavailable', message: 'read ECONNRESET', retryable: true })
    expect(supervisor.stateOf('object')).toBe('degraded')
  })

  it('turns unshaped failures into Internal', async () => {
    const { router } = setup({
      execute: async () => {
        throw new Error('undefined is not a function')
      },
    })
    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' } })
    expect(envelope.error).toEqual({
      category: 'Internal',
      message: 'Internal error during object.get',
      retryable: false,
    })
  })
})

// ── Deadlines ──────────────────────────────────────────────────

describe('deadlines', () => {
  it('times out with a retryable Timeout envelope', async () => {
    const { router } = setup({ execute: never })
    const envelope = await router.route(
      { paradigm: 'object', kind: 'get', parameters: { key: 'a' } },
      { timeoutMs: 20 },
    )
    expect(envelope.error).toEqual({
      category: 'Timeout',
      message: 'Operation timed out on object store: get (20ms)',
      retryable: true,
    })
  })

  it('honours a per-request timeout', async () => {
    const { router } = setup({ execute: never })
    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' }, timeoutMs: 15 })
    expect(envelope.error?.message).toBe('Operation timed out on object store: get (15ms)')
  })

  it('stops waiting when the caller aborts', async () => {
    const { router, supervisor } = setup({ execute: never })
    await supervisor.ensureReady('object')
    const controller = new AbortController()

    const pending = router.route(
      { paradigm: 'object', kind: 'get', parameters: { key: 'a' } },
      { signal: controller.signal },
    )
    setTimeout(() => controller.abort(), 5)
    const envelope = await pending

    expect(envelope.error).toEqual({
      category: 'Timeout',
      message: 'Operation cancelled on object store: get',
      retryable: true,
    })
    expect(supervisor.stateOf('object')).toBe('ready')
  })

  it('bounds the wait for a handle that is still connecting', async () => {
    const { router, adapter } = setup({ connect: () => new Promise(() => {}) }, { connectTimeoutMs: 50 })

    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' }, timeoutMs: 20 })

    expect(envelope.error).toEqual({
      category: 'Timeout',
      message: 'Operation timed out on object store: get (20ms)',
      retryable: true,
    })
    expect(adapter.execute).not.toHaveBeenCalled()
  })

  it('stops waiting for a connecting handle when the caller aborts', async () => {
    const { router, supervisor } = setup({ connect: () => new Promise(() => {}) }, { connectTimeoutMs: 50 })
    const controller = new AbortController()

    const pending = router.route(
      { paradigm: 'object', kind: 'get', parameters: { key: 'a' } },
      { signal: controller.signal },
    )
    setTimeout(() => controller.abort(), 5)
    const envelope = await pending

    expect(envelope.error).toEqual({
      category: 'Timeout',
      message: 'Operation cancelled on object store: get',
      retryable: true,
    })
    expect(supervisor.stateOf('object')).toBe('connecting')
  })
})

// ── Observability ──────────────────────────────────────────────

describe('observability', () => {
  it('records every envelope in the benchmarks', async () => {
    const { router, benchmarks } = setup()
    await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' } })
    await router.route({ paradigm: 'object', kind: 'get', parameters: {} })

    const stats = benchmarks.summary()['object.get']
    expect(stats?.count).toBe(2)
    expect(stats?.failures).toBe(1)
  })

  it('logs failures with their category', async () => {
    const { router, logger } = setup()
    await router.route({ paradigm: 'object', kind: 'get', parameters: {} })
    expect(logger.info).toHaveBeenCalledWith('Operation failed', {
      paradigm: 'object',
      kind: 'get',
      latencyMs: expect.any(Number),
      category: 'InvalidInput',
      retryable: false,
    })
  })

  it('attaches a debug log on request', async () => {
    const { router } = setup()
    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' }, debug: true })
    expect(envelope.debugLog?.map((e) => e.phase)).toEqual(['validation', 'resolve', 'execution', 'normalization'])
  })

  it('omits the debug log by default', async () => {
    const { router } = setup()
    const envelope = await router.route({ paradigm: 'object', kind: 'get', parameters: { key: 'a' } })
    expect(envelope).not.toHaveProperty('debugLog')
  })
})
