/**
 * Lightweight in-memory counters for the suggestion controller.
 * Never surfaced to the user; read through `getSummary()` when debugging.
 */

export type GhostMetric =
  | 'trigger'
  | 'display'
  | 'accept'
  | 'reject'
  | 'supersede'
  | 'cancel'
  | 'stale_discard'
  | 'error'
  | 'empty'

export class GhostMetrics {
  private counts = new Map<GhostMetric, number>()
  private latencies: number[] = []

  record(type: GhostMetric, extra?: { latencyMs?: number }) {
    this.counts.set(type, this.count(type) + 1)
    if (extra?.latencyMs !== undefined) this.latencies.push(extra.latencyMs)
  }

  count(type: GhostMetric): number {
    return this.counts.get(type) ?? 0
  }

  getSummary() {
    const totalLatency = this.latencies.reduce((sum, ms) => sum + ms, 0)
    return {
      triggers: this.count('trigger'),
      displays: this.count('display'),
      accepts: this.count('accept'),
      rejects: this.count('reject'),
      supersedes: this.count('supersede'),
      cancels: this.count('cancel'),
      staleDiscards: this.count('stale_discard'),
      errors: this.count('error'),
      emptyResponses: this.count('empty'),
      avgLatencyMs: this.latencies.length ? Math.round(totalLatency / this.latencies.length) : 0,
    }
  }

  clear() {
    this.counts.clear()
    this.latencies = []
  }
}
