import type { BenchmarkSample, BenchmarkStats, BenchmarkSummary, Paradigm, ResultEnvelope } from '@polystore/validation'

const DEFAULT_CAPACITY = 1_000

// ── Tracker ────────────────────────────────────────────────────

/**
 * Keeps the most recent `capacity` envelope latencies in a ring so paradigm
 * performance can be compared side by side.
 */
export class BenchmarkTracker {
  private readonly samples: BenchmarkSample[] = []
  private next = 0

  constructor(
    private readonly capacity: number = DEFAULT_CAPACITY,
    private readonly now: () => number = Date.now,
  ) {}

  record(envelope: ResultEnvelope): void {
    const sample: BenchmarkSample = {
      timestamp: this.now(),
      paradigm: envelope.paradigm,
      kind: envelope.kind,
      latencyMs: envelope.latencyMs,
      ok: envelope.ok,
    }
    if (this.samples.length < this.capacity) {
      this.samples.push(sample)
    } else {
      this.samples[this.next] = sample
    }
    this.next = (this.next + 1) % this.capacity
  }

  /** Samples oldest first, optionally for one paradigm only. */
  recent(paradigm?: Paradigm): BenchmarkSample[] {
    const ordered =
      this.samples.length < this.capacity
        ? [...this.samples]
        : [...this.samples.slice(this.next), ...this.samples.slice(0, this.next)]
    return paradigm === undefined ? ordered : ordered.filter((s) => s.paradigm === paradigm)
  }

  summary(paradigm?: Paradigm): BenchmarkSummary {
    const groups = new Map<string, BenchmarkSample[]>()
    for (const s of this.samples) {
      if (paradigm !== undefined && s.paradigm !== paradigm) continue
      const key = `${s.paradigm}.${s.kind}`
      const group = groups.get(key)
      if (group === undefined) {
        groups.set(key, [s])
      } else {
        group.push(s)
      }
    }

    const result: BenchmarkSummary = {}
    for (const [key, group] of [...groups].sort(([a], [b]) => a.localeCompare(b))) {
      result[key] = stats(group)
    }
    return result
  }

  reset(): void {
    this.samples.length = 0
    this.next = 0
  }
}

function stats(group: readonly BenchmarkSample[]): BenchmarkStats {
  const latencies = group.map((s) => s.latencyMs).sort((a, b) => a - b)
  const total = latencies.reduce((sum, v) => sum + v, 0)
  // Nearest-rank percentile
  const rank = Math.max(Math.ceil(0.95 * latencies.length) - 1, 0)
  return {
    count: group.length,
    failures: group.filter((s) => !s.ok).length,
    avgMs: round(total / latencies.length),
    minMs: latencies[0] ?? 0,
    maxMs: latencies[latencies.length - 1] ?? 0,
    p95Ms: latencies[rank] ?? 0,
  }
}

function round(value: number): number {
  return Math.round(value * 100) / 100
}
