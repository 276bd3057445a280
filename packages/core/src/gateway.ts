import type {
  BenchmarkReport,
  GatewayLimits,
  GatewayRequest,
  HealthCheckResult,
  HealthRecord,
  Paradigm,
  ResultEnvelope,
} from '@polystore/validation'
import { BenchmarkTracker } from './benchmark/tracker.js'
import type { GatewayLogger } from './debug/logger.js'
import { createConsoleLogger } from './debug/logger.js'
import type { ShutdownReport } from './lifecycle/supervisor.js'
import { LifecycleSupervisor } from './lifecycle/supervisor.js'
import type { ErrorMappingTable } from './normalizer/mappings.js'
import { ResponseNormalizer } from './normalizer/normalizer.js'
import type { RouteOptions } from './router.js'
import { GatewayRouter } from './router.js'
import type { AdapterFactory } from './types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export type AdapterFactories = { readonly [P in Paradigm]?: AdapterFactory<P> | undefined }

export interface CreateGatewayOptions {
  readonly adapters: AdapterFactories
  readonly limits?: GatewayLimits | undefined
  readonly logger?: GatewayLogger | undefined
  readonly errorTables?: Readonly<Partial<Record<Paradigm, ErrorMappingTable>>> | undefined
  readonly benchmarkCapacity?: number | undefined
  /** Connect every registered adapter before returning. Failures are recorded, never thrown. */
  readonly eagerConnect?: boolean | undefined
}

export interface Gateway {
  route(request: GatewayRequest, options?: RouteOptions): Promise<ResultEnvelope>
  healthCheck(): Promise<HealthCheckResult>
  /** Latency summary and recent samples, for every paradigm or just one. */
  benchmarks(paradigm?: Paradigm): BenchmarkReport
  resetBenchmarks(): void
  startAll(): Promise<HealthRecord[]>
  shutdown(): Promise<ShutdownReport>
}

// ── createGateway ──────────────────────────────────────────────

export async function createGateway(options: CreateGatewayOptions): Promise<Gateway> {
  const limits = options.limits ?? {}
  const logger = options.logger ?? createConsoleLogger()
  const normalizer = new ResponseNormalizer({ logger, tables: options.errorTables })
  const benchmarks = new BenchmarkTracker(options.benchmarkCapacity)

  const supervisor = new LifecycleSupervisor({
    logger,
    normalizer,
    maxConnectAttempts: limits.maxConnectAttempts,
    backoffBaseMs: limits.backoffBaseMs,
    backoffMaxMs: limits.backoffMaxMs,
    connectTimeoutMs: limits.connectTimeoutMs,
    shutdownGraceMs: limits.shutdownGraceMs,
  })
  registerAll(supervisor, options.adapters)

  const router = new GatewayRouter({
    supervisor,
    normalizer,
    logger,
    benchmarks,
    operationTimeoutMs: limits.operationTimeoutMs,
  })

  if (options.eagerConnect === true) await supervisor.startAll()
  if (limits.healthCheckIntervalMs !== undefined) supervisor.startHealthChecks(limits.healthCheckIntervalMs)

  return {
    route: (request, routeOptions) => router.route(request, routeOptions),
    healthCheck: () => supervisor.healthCheckAll(),
    benchmarks: (paradigm) => ({ summary: benchmarks.summary(paradigm), recent: benchmarks.recent(paradigm) }),
    resetBenchmarks: () => benchmarks.reset(),
    startAll: () => supervisor.startAll(),
    shutdown: () => supervisor.shutdownAll(),
  }
}

// Spelled out per paradigm so each factory keeps its own command type.
function registerAll(supervisor: LifecycleSupervisor, adapters: AdapterFactories): void {
  if (adapters.object !== undefined) supervisor.registerAdapter('object', adapters.object)
  if (adapters.vector !== undefined) supervisor.registerAdapter('vector', adapters.vector)
  if (adapters.graph !== undefined) supervisor.registerAdapter('graph', adapters.graph)
  if (adapters.columnar !== undefined) supervisor.registerAdapter('columnar', adapters.columnar)
}
