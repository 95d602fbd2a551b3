/** Uniform source in [0, 1). `Math.random` satisfies it. */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Seeded linear congruential generator (Numerical Recipes constants).
 * Deterministic sequences for tests and reproducible runs.
 */
export function seededRng(seed: number): Rng {
  const m = 0x100000000;
  const a = 1664525;
  const c = 1013904223;
  let state = Math.floor(Math.abs(seed)) % m;
  return () => {
    state = (a * state + c) % m;
    return state / m;
  };
}

export function uniform(rng: Rng, [min, max]: readonly [number, number]): number {
  return min + rng() * (max - min);
}

/** Integer in [min, max], both inclusive. */
export function uniformInt(rng: Rng, [min, max]: readonly [number, number]): number {
  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  if (hi <= lo) return Math.max(lo, 0);
  return lo + Math.floor(rng() * (hi - lo + 1));
}
