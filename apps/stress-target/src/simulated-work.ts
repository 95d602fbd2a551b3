import { setTimeout as sleep } from 'node:timers/promises';
import { MB } from './units.js';

export type QueryComplexity = 'simple' | 'medium' | 'complex' | 'heavy';
export type CpuIntensity = 'light' | 'medium' | 'heavy' | 'extreme';

/** Delay ranges in ms */
const QUERY_DELAYS: Record<QueryComplexity, readonly [number, number]> = {
  simple: [10, 50],
  medium: [50, 150],
  complex: [150, 400],
  heavy: [400, 800],
};

const CPU_ITERATIONS: Record<CpuIntensity, number> = {
  light: 100_000,
  medium: 500_000,
  heavy: 2_000_000,
  extreme: 5_000_000,
};

/**
 * Request-path work that looks like a real page render. `scale` shrinks or
 * grows every delay and loop; 0 makes all of it a no-op.
 */
export class SimulatedWork {
  private readonly scale: number;

  constructor(scale = 1) {
    this.scale = scale;
  }

  /** Waits like a DB round trip would; returns the delay in ms. */
  async dbQuery(complexity: QueryComplexity): Promise<number> {
    const [min, max] = QUERY_DELAYS[complexity];
    const delay = (min + Math.random() * (max - min)) * this.scale;
    if (delay > 0) await sleep(delay);
    return delay;
  }

  /** Synchronous compute on the request thread; returns elapsed ms. */
  cpu(intensity: CpuIntensity): number {
    const iterations = Math.round(CPU_ITERATIONS[intensity] * this.scale);
    const start = performance.now();
    let acc = 0;
    for (let i = 0; i < iterations; i++) {
      acc += Math.sqrt(Math.random() * 999);
    }
    // keep the loop observable
    if (acc < 0) throw new Error('unreachable');
    return performance.now() - start;
  }

  /** Touches a short-lived buffer (session/cart data); returns elapsed ms. */
  async memory(sizeMb: number, holdMs: number): Promise<number> {
    const start = performance.now();
    const bytes = Math.round(sizeMb * MB * this.scale);
    if (bytes > 0) {
      const block = Buffer.alloc(bytes);
      block[0] = 1;
      block[bytes - 1] = 1;
      if (holdMs * this.scale > 0) await sleep(holdMs * this.scale);
      // read after the hold so the buffer stays reachable until here
      if (block[bytes - 1] !== 1) throw new Error('buffer corrupted');
    }
    return performance.now() - start;
  }
}
