import type { DebugLogEntry, GatewayRequest, ResultEnvelope } from '@polystore/validation'
import { parseRequest, validateOperation } from '@polystore/validation'
import type { BenchmarkTracker } from './benchmark/tracker.js'
import type { GatewayLogger } from './debug/logger.js'
import { debugEntry, withDebugLog } from './debug/logger.js'
import type { AdapterOutcome, ResponseNormalizer } from './normalizer/normalizer.js'
import { withDeadline } from './lifecycle/deadline.js'
import type { LifecycleSupervisor } from './lifecycle/supervisor.js'

// ── Public Types ───────────────────────────────────────────────

export interface RouteOptions {
  /** Caller cancellation; the envelope is produced as soon as it fires. */
  readonly signal?: AbortSignal | undefined
  /** Overrides both the router default and `request.timeoutMs`. */
  readonly timeoutMs?: number | undefined
}

export interface GatewayRouterOptions {
  readonly supervisor: LifecycleSupervisor
  readonly normalizer: ResponseNormalizer
  readonly logger: GatewayLogger
  readonly benchmarks?: BenchmarkTracker | undefined
  readonly operationTimeoutMs?: number | undefined
  readonly now?: (() => number) | undefined
}

export const DEFAULT_OPERATION_TIMEOUT_MS = 10_000

// ── Router ─────────────────────────────────────────────────────

/**
 * Single entry point for every paradigm. `route` never rejects: every failure,
 * including ones the router does not recognise, comes back as an envelope.
 */
export class GatewayRouter {
  private readonly supervisor: LifecycleSupervisor
  private readonly normalizer: ResponseNormalizer
  private readonly logger: GatewayLogger
  private readonly benchmarks: BenchmarkTracker | undefined
  private readonly operationTimeoutMs: number
  private readonly now: () => number

  constructor(options: GatewayRouterOptions) {
    this.supervisor = options.supervisor
    this.normalizer = options.normalizer
    this.logger = options.logger
    this.benchmarks = options.benchmarks
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS
    this.now = options.now ?? performance.now.bind(performance)
  }

  async route(request: GatewayRequest, options: RouteOptions = {}): Promise<ResultEnvelope> {
    const started = this.now()
    const paradigm = String(request.paradigm)
    const kind = String(request.kind)
    const debug = request.debug === true
    const log: DebugLogEntry[] = []

    let envelope: ResultEnvelope
    try {
      envelope = await this.dispatch(request, options, log, debug, started)
    } catch (err) {
      envelope = this.normalizer.failure(paradigm, kind, err, this.elapsed(started))
    }

    this.benchmarks?.record(envelope)
    this.logEnvelope(envelope)
    return withDebugLog(envelope, debug, log)
  }

  // ── Pipeline ─────────────────────────────────────────────────

  private async dispatch(
    request: GatewayRequest,
    options: RouteOptions,
    log: DebugLogEntry[],
    debug: boolean,
    started: number,
  ): Promise<ResultEnvelope> {
    const paradigm = String(request.paradigm)
    const kind = String(request.kind)

    // 1. Validate
    const t0 = this.now()
    const parsed = parseRequest(request)
    if (!parsed.ok) return this.normalizer.failure(paradigm, kind, parsed.error, this.elapsed(started))
    const validated = validateOperation(parsed.operation)
    if (!validated.ok) return this.normalizer.failure(paradigm, kind, validated.error, this.elapsed(started))
    if (debug) log.push(debugEntry('validation', 'Validated', this.now() - t0))

    // 2. Resolve handle
    const op = parsed.operation
    const t1 = this.now()
    let outcome: AdapterOutcome
    const timeoutMs = options.timeoutMs ?? request.timeoutMs ?? this.operationTimeoutMs
    // One deadline covers waiting for the handle and the call itself.
    const controller = new AbortController()
    const run = async (): Promise<unknown> => {
      const handle = await this.supervisor.ensureReady(op.paradigm)
      // Gave up while the handle was connecting.
      controller.signal.throwIfAborted()
      if (debug) log.push(debugEntry('resolve', `Handle ${handle.state}`, this.now() - t1))

      // 3. Execute
      const t2 = this.now()
      try {
        return await handle.execute(validated.command, { timeoutMs, signal: controller.signal })
      } finally {
        if (debug) log.push(debugEntry('execution', `Executed on ${op.paradigm} store`, this.now() - t2))
      }
    }
    try {
      const value = await withDeadline(run(), controller, {
        timeoutMs,
        signal: options.signal,
        paradigm: op.paradigm,
        kind: op.kind,
      })
      outcome = { ok: true, value }
    } catch (err) {
      outcome = { ok: false, error: err }
    }

    // 4. Normalize
    const t3 = this.now()
    const envelope = this.normalizer.normalize(op.paradigm, op.kind, outcome, this.elapsed(started))
    if (!envelope.ok && envelope.error.category === 'BackendUnavailable') {
      this.supervisor.reportUnavailable(op.paradigm, envelope.error)
    }
    if (debug) log.push(debugEntry('normalization', envelope.ok ? 'Success' : envelope.error.category, this.now() - t3))
    return envelope
  }

  private elapsed(started: number): number {
    return Math.round((this.now() - started) * 100) / 100
  }

  private logEnvelope(envelope: ResultEnvelope): void {
    const fields = { paradigm: envelope.paradigm, kind: envelope.kind, latencyMs: envelope.latencyMs }
    if (envelope.ok) {
      this.logger.debug('Operation succeeded', fields)
    } else {
      this.logger.info('Operation failed', {
        ...fields,
        category: envelope.error.category,
        retryable: envelope.error.retryable,
      })
    }
  }
}
