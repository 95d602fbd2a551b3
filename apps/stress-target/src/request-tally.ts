import type { TallyEntry } from './types.js';

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Per-instance request counters. Created at startup and handed to whatever
 * needs it; every increment happens on the event loop thread, so updates are
 * serialized and none can be lost. Counters only grow.
 */
export class RequestTally {
  private counts = new Map<string, number>();
  private sum = 0;

  increment(instanceId: string, by = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`Tally increments must be non-negative integers, got ${by}`);
    }
    this.counts.set(instanceId, (this.counts.get(instanceId) ?? 0) + by);
    this.sum += by;
  }

  get(instanceId: string): number {
    return this.counts.get(instanceId) ?? 0;
  }

  total(): number {
    return this.sum;
  }

  /** Ordered by instance id. */
  snapshot(): TallyEntry[] {
    return [...this.counts.entries()]
      .sort(([a], [b]) => byKey(a, b))
      .map(([instanceId, count]) => ({ instanceId, count }));
  }
}

/** Hit counts per endpoint label, for /request-stats. */
export class EndpointStats {
  private counts = new Map<string, number>();

  record(endpoint: string): void {
    this.counts.set(endpoint, (this.counts.get(endpoint) ?? 0) + 1);
  }

  toJSON(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [k, v] of [...this.counts.entries()].sort(([a], [b]) => byKey(a, b))) {
      out[k] = v;
    }
    return out;
  }
}
