// --- Latency benchmarks ---

export interface BenchmarkSample {
  readonly timestamp: number
  readonly paradigm: string
  readonly kind: string
  readonly latencyMs: number
  readonly ok: boolean
}

export interface BenchmarkStats {
  readonly count: number
  readonly failures: number
  readonly avgMs: number
  readonly minMs: number
  readonly maxMs: number
  readonly p95Ms: number
}

/** Keyed by `paradigm.kind`. */
export type BenchmarkSummary = Record<string, BenchmarkStats>

export interface BenchmarkReport {
  readonly summary: BenchmarkSummary
  readonly recent: readonly BenchmarkSample[]
}
