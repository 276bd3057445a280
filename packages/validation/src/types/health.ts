import type { ErrorInfo } from './envelope.js'
import type { Paradigm } from './paradigm.js'

export type AdapterState = 'disconnected' | 'connecting' | 'ready' | 'degraded' | 'closed'

export interface HealthRecord {
  readonly paradigm: Paradigm
  readonly state: AdapterState
  readonly lastCheckedAt: string | null
  readonly lastError: ErrorInfo | null
  readonly latencyMs?: number | undefined
}

export interface HealthCheckResult {
  readonly healthy: boolean
  readonly adapters: Readonly<Partial<Record<Paradigm, HealthRecord>>>
}
