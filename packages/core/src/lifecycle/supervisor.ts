import type {
  AdapterState,
  Command,
  CommandFor,
  ErrorInfo,
  HealthCheckResult,
  HealthRecord,
  Paradigm,
} from '@polystore/validation'
import { ConfigError, ConnectionError, ValidationError } from '@polystore/validation'
import type { GatewayLogger } from '../debug/logger.js'
import { silentLogger } from '../debug/logger.js'
import { ResponseNormalizer } from '../normalizer/normalizer.js'
import type { AdapterConcurrency, AdapterFactory, ExecutionContext } from '../types/interfaces.js'
import { delay, withDeadline } from './deadline.js'

// ── Public Types ───────────────────────────────────────────────

/**
 * Read-only view of a supervised adapter. Callers execute through it; only the
 * supervisor changes its state or touches the underlying connection.
 */
export interface AdapterHandle {
  readonly paradigm: Paradigm
  readonly state: AdapterState
  readonly concurrency: AdapterConcurrency
  execute(command: Command, options: HandleExecuteOptions): Promise<unknown>
}

export interface HandleExecuteOptions {
  readonly timeoutMs: number
  readonly signal?: AbortSignal | undefined
}

export interface SupervisorOptions {
  readonly logger?: GatewayLogger | undefined
  readonly normalizer?: ResponseNormalizer | undefined
  /** Failed connect attempts (each already retried once) before a handle stays degraded. */
  readonly maxConnectAttempts?: number | undefined
  readonly backoffBaseMs?: number | undefined
  readonly backoffMaxMs?: number | undefined
  /** Pause before the single immediate retry of a failed connect. */
  readonly connectRetryDelayMs?: number | undefined
  /** Bound on building and connecting one adapter. */
  readonly connectTimeoutMs?: number | undefined
  readonly healthCheckTimeoutMs?: number | undefined
  /** How long `shutdownAll` waits for in-flight calls before aborting them. */
  readonly shutdownGraceMs?: number | undefined
  readonly now?: (() => number) | undefined
}

export interface ShutdownReport {
  readonly closed: readonly Paradigm[]
  readonly failures: readonly { paradigm: Paradigm; message: string }[]
}

// ── Internal State ─────────────────────────────────────────────

interface InFlightCall {
  readonly controller: AbortController
  readonly settled: Promise<void>
}

/** An adapter with its paradigm erased; `execute` checks the command belongs to it. */
interface LiveAdapter {
  readonly concurrency: AdapterConcurrency
  connect(): Promise<void>
  disconnect(): Promise<void>
  healthCheck(): Promise<void>
  execute(command: Command, context: ExecutionContext): Promise<unknown>
}

function isCommandFor<P extends Paradigm>(paradigm: P, command: Command): command is CommandFor<P> {
  return command.paradigm === paradigm
}

function erase<P extends Paradigm>(paradigm: P, factory: AdapterFactory<P>): () => Promise<LiveAdapter> {
  return async () => {
    const adapter = await factory()
    return {
      concurrency: adapter.concurrency,
      connect: () => adapter.connect(),
      disconnect: () => adapter.disconnect(),
      healthCheck: () => adapter.healthCheck(),
      execute: (command, context) => {
        if (!isCommandFor(paradigm, command)) {
          return Promise.reject(
            new ValidationError(command.paradigm, command.kind, [
              {
                code: 'UNKNOWN_PARADIGM',
                message: `The ${paradigm} store cannot run ${command.paradigm} commands`,
                details: { expected: paradigm, actual: command.paradigm },
              },
            ]),
          )
        }
        return adapter.execute(command, context)
      },
    }
  }
}

const DEFAULTS = {
  maxConnectAttempts: 5,
  backoffBaseMs: 250,
  backoffMaxMs: 10_000,
  connectRetryDelayMs: 50,
  connectTimeoutMs: 10_000,
  healthCheckTimeoutMs: 5_000,
  shutdownGraceMs: 5_000,
}

function noop(): void {}

class SupervisedHandle implements AdapterHandle {
  constructor(private readonly record: HandleRecord) {}

  get paradigm(): Paradigm {
    return this.record.paradigm
  }

  get state(): AdapterState {
    return this.record.state
  }

  get concurrency(): AdapterConcurrency {
    return this.record.adapter?.concurrency ?? 'concurrent'
  }

  execute(command: Command, options: HandleExecuteOptions): Promise<unknown> {
    const record = this.record
    const adapter = record.adapter
    if (record.state !== 'ready' || adapter === undefined) {
      return Promise.reject(
        new ConnectionError(
          record.state === 'closed' ? 'ADAPTER_CLOSED' : 'ADAPTER_DEGRADED',
          `${record.paradigm} store is ${record.state}`,
          { paradigm: record.paradigm },
        ),
      )
    }

    const controller = new AbortController()
    const run = (): Promise<unknown> => {
      if (controller.signal.aborted) {
        return Promise.reject(new ConnectionError('ADAPTER_CLOSED', `${record.paradigm} call abandoned`, {}))
      }
      return adapter.execute(command, { signal: controller.signal })
    }

    let work: Promise<unknown>
    if (adapter.concurrency === 'serialized') {
      work = record.queueTail.then(run)
      // The queue only orders calls; each caller sees its own outcome through `work`.
      record.queueTail = work.then(noop, noop)
    } else {
      work = run()
    }

    const result = withDeadline(work, controller, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      paradigm: record.paradigm,
      kind: command.kind,
    })
    const call: InFlightCall = { controller, settled: result.then(noop, noop) }
    record.inFlight.add(call)
    void call.settled.then(() => record.inFlight.delete(call))
    return result
  }
}

class HandleRecord {
  state: AdapterState = 'disconnected'
  adapter: LiveAdapter | undefined
  connecting: Promise<AdapterHandle> | undefined
  connectController: AbortController | undefined
  attempts = 0
  nextRetryAt = 0
  failure: ConnectionError | undefined
  lastCheckedAt: string | null = null
  lastError: ErrorInfo | null = null
  latencyMs: number | undefined
  readonly inFlight = new Set<InFlightCall>()
  queueTail: Promise<void> = Promise.resolve()
  readonly handle: AdapterHandle = new SupervisedHandle(this)

  constructor(
    readonly paradigm: Paradigm,
    readonly open: () => Promise<LiveAdapter>,
  ) {}
}

// ── Supervisor ─────────────────────────────────────────────────

/**
 * Process-wide registry of adapter handles. Owns connect, health, and teardown;
 * concurrent `ensureReady` calls for one paradigm share a single connect attempt.
 */
export class LifecycleSupervisor {
  private readonly records = new Map<Paradigm, HandleRecord>()
  private readonly logger: GatewayLogger
  private readonly normalizer: ResponseNormalizer
  private readonly settings: typeof DEFAULTS
  private readonly now: () => number
  private healthTimer: ReturnType<typeof setInterval> | undefined
  private shutdown: Promise<ShutdownReport> | undefined

  constructor(options: SupervisorOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.normalizer = options.normalizer ?? new ResponseNormalizer({ logger: this.logger })
    this.now = options.now ?? Date.now
    this.settings = {
      maxConnectAttempts: options.maxConnectAttempts ?? DEFAULTS.maxConnectAttempts,
      backoffBaseMs: options.backoffBaseMs ?? DEFAULTS.backoffBaseMs,
      backoffMaxMs: options.backoffMaxMs ?? DEFAULTS.backoffMaxMs,
      connectRetryDelayMs: options.connectRetryDelayMs ?? DEFAULTS.connectRetryDelayMs,
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULTS.connectTimeoutMs,
      healthCheckTimeoutMs: options.healthCheckTimeoutMs ?? DEFAULTS.healthCheckTimeoutMs,
      shutdownGraceMs: options.shutdownGraceMs ?? DEFAULTS.shutdownGraceMs,
    }
  }

  registerAdapter<P extends Paradigm>(paradigm: P, factory: AdapterFactory<P>): void {
    if (this.shutdown !== undefined) {
      throw new ConnectionError('ADAPTER_CLOSED', 'Gateway is shut down', { paradigm })
    }
    const existing = this.records.get(paradigm)
    if (existing !== undefined && existing.state !== 'disconnected') {
      throw new ConfigError([
        {
          code: 'INVALID_SETTING',
          message: `${paradigm} adapter is already ${existing.state}`,
          details: { paradigm, field: 'adapter' },
        },
      ])
    }

    const record = new HandleRecord(paradigm, erase(paradigm, factory))
    this.records.set(paradigm, record)
  }

  registeredParadigms(): Paradigm[] {
    return [...this.records.keys()]
  }

  /** Current state without triggering a connect. */
  stateOf(paradigm: Paradigm): AdapterState | undefined {
    return this.records.get(paradigm)?.state
  }

  /**
   * Returns a ready handle, connecting on first use. Degraded handles fail fast
   * until their backoff window has passed, and permanently once the attempt
   * ceiling is reached (a health check can still bring them back).
   */
  async ensureReady(paradigm: Paradigm): Promise<AdapterHandle> {
    const record = this.records.get(paradigm)
    if (record === undefined) {
      throw new ConnectionError('NOT_CONFIGURED', `No adapter registered for the ${paradigm} store`, { paradigm })
    }
    if (this.shutdown !== undefined || record.state === 'closed') {
      throw new ConnectionError('ADAPTER_CLOSED', `${paradigm} store is closed`, { paradigm })
    }

    switch (record.state) {
      case 'ready':
        return record.handle
      case 'connecting':
        if (record.connecting !== undefined) return record.connecting
        return this.connect(record)
      case 'degraded': {
        if (record.failure?.code === 'NOT_CONFIGURED') throw record.failure
        const exhausted = record.attempts >= this.settings.maxConnectAttempts
        if (exhausted || this.now() < record.nextRetryAt) {
          throw new ConnectionError(
            'ADAPTER_DEGRADED',
            `${paradigm} store is unavailable`,
            { paradigm, ...(exhausted ? {} : { retryAt: new Date(record.nextRetryAt).toISOString() }) },
            record.failure,
          )
        }
        return this.connect(record)
      }
      default:
        return this.connect(record)
    }
  }

  /**
   * Marks a ready handle degraded after a call found its backend unreachable, so
   * later requests fail fast instead of waiting on a dead connection.
   */
  reportUnavailable(paradigm: Paradigm, error: ErrorInfo): void {
    const record = this.records.get(paradigm)
    if (record === undefined || record.state !== 'ready') return
    record.state = 'degraded'
    record.attempts = 1
    record.nextRetryAt = this.now() + this.backoff(1)
    record.lastError = error
    record.failure = new ConnectionError('CONNECTION_FAILED', error.message, { paradigm })
    this.logger.warn('Adapter degraded', { paradigm, reason: error.message })
  }

  async healthCheck(paradigm: Paradigm): Promise<HealthRecord> {
    const record = this.records.get(paradigm)
    if (record === undefined) {
      return {
        paradigm,
        state: 'disconnected',
        lastCheckedAt: new Date(this.now()).toISOString(),
        lastError: { category: 'BackendUnavailable', message: `No adapter registered for the ${paradigm} store`, retryable: true },
      }
    }

    if (record.state === 'connecting' && record.connecting !== undefined) {
      await record.connecting.catch(noop)
    } else if (record.state === 'ready' && record.adapter !== undefined) {
      await this.probe(record, record.adapter)
    } else if (record.state === 'degraded' || record.state === 'disconnected') {
      // Health checks are the way back after the attempt ceiling.
      record.attempts = 0
      record.nextRetryAt = 0
      await this.connect(record).catch(noop)
    }
    return snapshot(record)
  }

  async healthCheckAll(): Promise<HealthCheckResult> {
    const records = await Promise.all(this.registeredParadigms().map((p) => this.healthCheck(p)))
    const adapters: Partial<Record<Paradigm, HealthRecord>> = {}
    for (const r of records) adapters[r.paradigm] = r
    return { healthy: records.every((r) => r.state === 'ready'), adapters }
  }

  /** Current records without probing any backend. */
  healthSnapshot(): HealthRecord[] {
    return [...this.records.values()].map(snapshot)
  }

  /** Eagerly connects every registered adapter; one failing backend never blocks the others. */
  async startAll(): Promise<HealthRecord[]> {
    await Promise.allSettled(this.registeredParadigms().map((p) => this.ensureReady(p)))
    return this.healthSnapshot()
  }

  startHealthChecks(intervalMs: number): void {
    this.stopHealthChecks()
    this.healthTimer = setInterval(() => {
      this.healthCheckAll().catch((err: unknown) => {
        this.logger.error('Scheduled health check failed', { error: String(err) })
      })
    }, intervalMs)
    this.healthTimer.unref()
  }

  stopHealthChecks(): void {
    if (this.healthTimer !== undefined) {
      clearInterval(this.healthTimer)
      this.healthTimer = undefined
    }
  }

  /**
   * Waits for (then aborts) in-flight calls and releases every live connection
   * exactly once. Safe to call repeatedly; later calls return the first report.
   */
  shutdownAll(): Promise<ShutdownReport> {
    this.shutdown ??= this.performShutdown()
    return this.shutdown
  }

  // ── Connect ──────────────────────────────────────────────────

  private connect(record: HandleRecord): Promise<AdapterHandle> {
    record.state = 'connecting'
    const attempt = this.attemptConnect(record).finally(() => {
      record.connecting = undefined
    })
    record.connecting = attempt
    return attempt
  }

  private async attemptConnect(record: HandleRecord): Promise<AdapterHandle> {
    const { paradigm } = record
    const previous = record.adapter
    record.adapter = undefined
    if (previous !== undefined) await this.release(paradigm, previous)

    let lastErr: unknown
    // One immediate retry absorbs transient hiccups before the handle is marked degraded.
    for (let i = 0; i < 2; i++) {
      if (i > 0) await delay(this.settings.connectRetryDelayMs)
      if (this.shutdown !== undefined) break
      const started = this.now()
      try {
        record.adapter = await this.open(record)
        record.state = 'ready'
        record.attempts = 0
        record.nextRetryAt = 0
        record.failure = undefined
        record.lastError = null
        record.latencyMs = this.now() - started
        record.lastCheckedAt = new Date(this.now()).toISOString()
        this.logger.info('Adapter connected', { paradigm, latencyMs: record.latencyMs })
        return record.handle
      } catch (err) {
        lastErr = err
        if (err instanceof ConnectionError && err.code === 'NOT_CONFIGURED') break
      }
    }

    const failure =
      lastErr instanceof ConnectionError
        ? lastErr
        : new ConnectionError(
            'CONNECTION_FAILED',
            `Failed to connect the ${paradigm} store`,
            { paradigm },
            lastErr instanceof Error ? lastErr : new Error(String(lastErr)),
          )
    record.state = 'degraded'
    record.attempts += 1
    record.nextRetryAt = this.now() + this.backoff(record.attempts)
    record.failure = failure
    record.lastError = this.normalizer.toErrorInfo(paradigm, 'connect', lastErr)
    record.lastCheckedAt = new Date(this.now()).toISOString()
    this.logger.warn('Adapter connect failed', {
      paradigm,
      attempts: record.attempts,
      reason: record.lastError.message,
    })
    throw failure
  }

  /**
   * Builds and connects one adapter within `connectTimeoutMs`. An adapter that
   * connects after the deadline, or fails to connect, is released.
   */
  private async open(record: HandleRecord): Promise<LiveAdapter> {
    const { paradigm } = record
    const opening = (async () => {
      const adapter = await record.open()
      try {
        await adapter.connect()
      } catch (err) {
        await this.release(paradigm, adapter)
        throw err
      }
      return adapter
    })()

    const controller = new AbortController()
    record.connectController = controller
    try {
      return await withDeadline(opening, controller, {
        timeoutMs: this.settings.connectTimeoutMs,
        paradigm,
        kind: 'connect',
      })
    } catch (err) {
      void opening.then((late) => this.release(paradigm, late), noop)
      throw err
    } finally {
      record.connectController = undefined
    }
  }

  private backoff(attempts: number): number {
    return Math.min(this.settings.backoffBaseMs * 2 ** (attempts - 1), this.settings.backoffMaxMs)
  }

  private async probe(record: HandleRecord, adapter: LiveAdapter): Promise<void> {
    const started = this.now()
    try {
      await withDeadline(adapter.healthCheck(), new AbortController(), {
        timeoutMs: this.settings.healthCheckTimeoutMs,
        paradigm: record.paradigm,
        kind: 'healthCheck',
      })
      record.lastError = null
    } catch (err) {
      const info = this.normalizer.toErrorInfo(record.paradigm, 'healthCheck', err)
      this.reportUnavailable(record.paradigm, { ...info, category: 'BackendUnavailable' })
      record.lastError = info
    } finally {
      record.latencyMs = this.now() - started
      record.lastCheckedAt = new Date(this.now()).toISOString()
    }
  }

  private async release(paradigm: Paradigm, adapter: LiveAdapter): Promise<string | undefined> {
    try {
      await adapter.disconnect()
      return undefined
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      this.logger.warn('Adapter disconnect failed', { paradigm, reason: message })
      return message
    }
  }

  // ── Shutdown ─────────────────────────────────────────────────

  private async performShutdown(): Promise<ShutdownReport> {
    this.stopHealthChecks()
    const records = [...this.records.values()]

    // Connects still in flight get the grace period to finish so their connections are released too.
    const connecting = records.flatMap((r) => (r.connecting !== undefined ? [r.connecting] : []))
    if (connecting.length > 0) {
      const connected = await this.withinGrace(Promise.allSettled(connecting))
      if (!connected) {
        this.logger.warn('Abandoning connects still in flight at shutdown', { count: connecting.length })
        for (const record of records) record.connectController?.abort()
        await Promise.allSettled(connecting)
      }
    }

    const inFlight = records.flatMap((r) => [...r.inFlight])
    if (inFlight.length > 0) {
      const drained = await this.withinGrace(Promise.all(inFlight.map((c) => c.settled)))
      if (!drained) {
        this.logger.warn('Aborting in-flight calls at shutdown', { count: inFlight.length })
        for (const call of inFlight) call.controller.abort()
        await Promise.all(inFlight.map((c) => c.settled))
      }
    }

    const closed: Paradigm[] = []
    const failures: { paradigm: Paradigm; message: string }[] = []
    for (const record of records) {
      const adapter = record.adapter
      record.adapter = undefined
      record.state = 'closed'
      if (adapter === undefined) continue
      const failed = await this.release(record.paradigm, adapter)
      if (failed === undefined) {
        closed.push(record.paradigm)
      } else {
        failures.push({ paradigm: record.paradigm, message: failed })
      }
    }

    this.logger.info('Gateway shut down', { closed, failures: failures.length })
    return { closed, failures }
  }

  /** True when `work` settles within the shutdown grace period. */
  private async withinGrace(work: Promise<unknown>): Promise<boolean> {
    let graceTimer: ReturnType<typeof setTimeout> | undefined
    const done = await Promise.race([
      work.then(() => true),
      new Promise<boolean>((resolve) => {
        graceTimer = setTimeout(() => resolve(false), this.settings.shutdownGraceMs)
      }),
    ])
    clearTimeout(graceTimer)
    return done
  }
}

function snapshot(record: HandleRecord): HealthRecord {
  return {
    paradigm: record.paradigm,
    state: record.state,
    lastCheckedAt: record.lastCheckedAt,
    lastError: record.lastError,
    ...(record.latencyMs !== undefined ? { latencyMs: record.latencyMs } : {}),
  }
}
