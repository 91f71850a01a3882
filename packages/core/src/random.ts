import seedrandom from 'seedrandom';

/** Deterministic random source. Every stochastic choice in a run draws from one. */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  integer(min: number, max: number): number;
}

/**
 * Create a seeded random source backed by seedrandom's default ARC4 generator.
 *
 * @param seed - Any string or number; equal seeds produce equal sequences.
 * @returns A RandomSource whose sequence depends only on `seed`.
 *
 * @example
 * ```typescript
 * const random = createRandomSource('run-7');
 * random.integer(-1, 1); // same value on every run with seed 'run-7'
 * ```
 */
export function createRandomSource(seed: string | number): RandomSource {
  const prng = seedrandom(String(seed));

  const integer = (min: number, max: number): number => {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`integer() needs integer bounds with min <= max, got [${String(min)}, ${String(max)}]`);
    }
    return min + Math.floor(prng() * (max - min + 1));
  };

  return {
    next: () => prng(),
    integer,
  };
}
