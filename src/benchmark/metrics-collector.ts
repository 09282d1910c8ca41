/**
 * Timing collection for the sort/search comparisons.
 */

export interface TimingStats {
  runs: number
  meanMs: number
  stdDevMs: number
  minMs: number
  maxMs: number
}

const avg = (values: readonly number[]): number =>
  values.reduce((sum, v) => sum + v, 0) / values.length

/**
 * Aggregates timing samples. Standard deviation is the population one.
 */
export function summarizeTimings(samples: readonly number[]): TimingStats {
  if (samples.length === 0) {
    return { runs: 0, meanMs: 0, stdDevMs: 0, minMs: 0, maxMs: 0 }
  }

  const meanMs = avg(samples)
  const squaredDiffs = samples.map((v) => Math.pow(v - meanMs, 2))

  return {
    runs: samples.length,
    meanMs,
    stdDevMs: Math.sqrt(avg(squaredDiffs)),
    minMs: Math.min(...samples),
    maxMs: Math.max(...samples),
  }
}

/**
 * Collects labelled timing samples across measurement runs.
 */
export class MetricsCollector {
  private samples: Record<string, number[]> = {}

  addRun(label: string, executionTimeMs: number): void {
    if (!this.samples[label]) {
      this.samples[label] = []
    }
    this.samples[label].push(executionTimeMs)
  }

  getStats(label: string): TimingStats {
    return summarizeTimings(this.samples[label] ?? [])
  }

  reset(): void {
    this.samples = {}
  }
}
