import type { Bottleneck, BottleneckSummary, NodeTiming } from './types.js';

export const DEFAULT_BOTTLENECK_THRESHOLD = 50;

interface NodeBucket {
  callCount: number;
  totalDurationMs: number;
  totalCostUsd: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Accumulates per-node timing for one run. Loop iterations and retries of the
 * same node id land in one bucket.
 *
 * `record` is synchronous, so updates from parallel branches of the same run
 * are applied one at a time without locking.
 */
export class Profiler {
  private readonly buckets = new Map<string, NodeBucket>();

  record(nodeId: string, durationMs: number, costUsd = 0): void {
    const bucket = this.buckets.get(nodeId) ?? { callCount: 0, totalDurationMs: 0, totalCostUsd: 0 };
    this.buckets.set(nodeId, {
      callCount: bucket.callCount + 1,
      totalDurationMs: bucket.totalDurationMs + durationMs,
      totalCostUsd: bucket.totalCostUsd + costUsd,
    });
  }

  totalTimeMs(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) {
      total += bucket.totalDurationMs;
    }
    return total;
  }

  timings(): NodeTiming[] {
    return [...this.buckets.entries()].map(([nodeId, bucket]) => ({
      nodeId,
      callCount: bucket.callCount,
      totalDurationMs: bucket.totalDurationMs,
      avgDurationMs: round2(bucket.totalDurationMs / bucket.callCount),
      totalCostUsd: Math.round(bucket.totalCostUsd * 1e6) / 1e6,
    }));
  }

  /** Nodes whose share of total time is strictly above `thresholdPercent`, largest first. */
  bottlenecks(thresholdPercent: number = DEFAULT_BOTTLENECK_THRESHOLD): Bottleneck[] {
    const total = this.totalTimeMs();
    if (total <= 0) {
      return [];
    }
    const flagged: Bottleneck[] = [];
    for (const [nodeId, bucket] of this.buckets) {
      const share = (bucket.totalDurationMs / total) * 100;
      if (share > thresholdPercent) {
        flagged.push({
          nodeId,
          totalDurationMs: bucket.totalDurationMs,
          percentOfTotal: round2(share),
          callCount: bucket.callCount,
        });
      }
    }
    return flagged.sort((a, b) => b.totalDurationMs - a.totalDurationMs);
  }

  slowest(): string | null {
    let slowest: string | null = null;
    let longest = -1;
    for (const [nodeId, bucket] of this.buckets) {
      if (bucket.totalDurationMs > longest) {
        slowest = nodeId;
        longest = bucket.totalDurationMs;
      }
    }
    return slowest;
  }

  summary(thresholdPercent: number = DEFAULT_BOTTLENECK_THRESHOLD): BottleneckSummary {
    return {
      totalTimeMs: this.totalTimeMs(),
      nodeCount: this.buckets.size,
      thresholdPercent,
      slowestNode: this.slowest(),
      nodes: this.timings(),
      bottlenecks: this.bottlenecks(thresholdPercent),
    };
  }
}
