/**
 * Random sources for strategies that synthesise inputs no exchange feed
 * provides yet.
 */

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface FundingRateSimulator {
  /** Draws `count` independent funding-rate values. */
  sample(count: number): number[];
}

/**
 * Linear congruential generator (mod 2^31) for reproducible simulations.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = Math.abs(Math.trunc(seed)) & 0x7fffffff;
  return () => {
    // imul keeps the low 32 bits exact; the mask takes them mod 2^31
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 2147483648;
  };
};

export interface GaussianOptions {
  readonly mean?: number;
  readonly stdDev?: number;
  readonly random?: RandomSource;
}

export const SIMULATED_FUNDING_MEAN = 0;
export const SIMULATED_FUNDING_STD_DEV = 0.0005;

/**
 * Normal-distribution sampler using the Box-Muller transform.
 */
export const createGaussianSimulator = (options: GaussianOptions = {}): FundingRateSimulator => {
  const mean = options.mean ?? SIMULATED_FUNDING_MEAN;
  const stdDev = options.stdDev ?? SIMULATED_FUNDING_STD_DEV;
  const random = options.random ?? Math.random;

  const nextStandardNormal = (): number => {
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - random();
    const u2 = random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };

  return {
    sample(count: number): number[] {
      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(mean + stdDev * nextStandardNormal());
      }
      return values;
    },
  };
};

/**
 * Replays fixed values in order. Throws when asked for more than it holds.
 */
export const createFixedSimulator = (values: ReadonlyArray<number>): FundingRateSimulator => {
  let offset = 0;
  return {
    sample(count: number): number[] {
      if (offset + count > values.length) {
        throw new RangeError(
          `Fixed simulator exhausted: requested ${count}, ${values.length - offset} remaining`,
        );
      }
      const slice = values.slice(offset, offset + count);
      offset += count;
      return slice;
    },
  };
};
