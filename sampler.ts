import type { Dataset } from "./data.js";
import { InvalidArgumentError } from "./errors.js";
import { rankPool } from "./pool.js";
import { randomInt, sample, type Random } from "./random.js";

/** index sampler, one index per corpus item per pass */
export type Sampler = Dataset<number> & {
  /** expected number of batches per pass, the last one may be smaller */
  readonly batches: number;
  /** corpus indices sorted by length */
  readonly sortedIndices: readonly number[];
};

export const DIVERSITY = 10;

/**
 * sampler emitting batches of indices with similar lengths
 *
 * each batch is drawn around a random anchor in the length-sorted order,
 * from a window of `diversity * batchSize` positions on either side,
 * so batches are near-homogeneous in length but differ every pass.
 * a wider diversity gives more randomness and less homogeneity.
 */
export const lengthLocal = (
  lengths: readonly number[],
  opts: { batchSize: number; diversity?: number; random?: Random }
): Sampler => {
  const { batchSize, diversity = DIVERSITY, random = Math.random } = opts;
  assertPositive("batchSize", batchSize);
  assertPositive("diversity", diversity);

  // stable, equal lengths keep corpus order
  const sortedIndices = Array.from(lengths.keys()).sort(
    (a, b) => lengths[a] - lengths[b]
  );
  const reach = diversity * batchSize;

  const sampler = function* () {
    const pool = rankPool(sortedIndices.length);
    while (pool.size()) {
      const size = pool.size();
      const anchor = randomInt(random, size);
      const lb = Math.max(0, anchor - reach);
      const rb = Math.min(size, anchor + reach);

      // resolve ranks before removing, removal shifts them
      const positions = sample(random, lb, rb, Math.min(batchSize, rb - lb))
        .map(pool.at);
      positions.forEach(pool.remove);

      for (const position of positions) yield sortedIndices[position];
    }
  };

  return Object.assign(sampler, {
    batches: Math.ceil(sortedIndices.length / batchSize),
    sortedIndices,
  });
};

const assertPositive = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1)
    throw new InvalidArgumentError(
      `${name} must be an integer >= 1, got ${value}`,
      name
    );
};
