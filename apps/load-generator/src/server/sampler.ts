import type { Rng } from './rng.js';

/**
 * Weighted discrete distribution over a fixed list of items.
 *
 * The cumulative table is built once; each draw is one random number and a
 * binary search. Weights are normalized at construction, so inputs need not
 * sum to 1. Zero-weight items are never drawn; on equal cumulative bounds the
 * earlier-registered item wins.
 */
export class DiscreteSampler<T> {
  private readonly items: T[];
  private readonly cumulative: number[];

  constructor(entries: ReadonlyArray<readonly [T, number]>) {
    const usable = entries.filter(([, w]) => Number.isFinite(w) && w > 0);
    if (usable.length === 0) {
      throw new Error('DiscreteSampler needs at least one positive weight');
    }
    const total = usable.reduce((sum, [, w]) => sum + w, 0);

    this.items = usable.map(([item]) => item);
    this.cumulative = [];
    let acc = 0;
    for (const [, w] of usable) {
      acc += w / total;
      this.cumulative.push(acc);
    }
    // Guard against rounding leaving the last bound just under 1
    this.cumulative[this.cumulative.length - 1] = 1;
  }

  get size(): number {
    return this.items.length;
  }

  /** Normalized probabilities in registration order. */
  probabilities(): number[] {
    return this.cumulative.map((c, i) => c - (i === 0 ? 0 : this.cumulative[i - 1]));
  }

  sample(rng: Rng): T {
    const r = rng();
    // first index whose cumulative bound is strictly greater than r
    let lo = 0;
    let hi = this.cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.cumulative[mid] > r) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return this.items[lo];
  }
}
