import { AnalysisConfigError } from '../errors';
import type { AnyHashFn } from './avalanche';

export interface BucketDistribution {
  counts: number[];
  expected: number;
  chiSquare: number;
}

// How hash(key) % buckets spreads the keys, with the chi-square statistic
// against a uniform spread (degrees of freedom = buckets - 1).
export function bucketDistribution(hash: AnyHashFn, keys: readonly Uint8Array[], buckets: number): BucketDistribution {
  if (!Number.isInteger(buckets) || buckets <= 0) throw new AnalysisConfigError('buckets', buckets);
  const counts = new Array<number>(buckets).fill(0);
  const big = BigInt(buckets);
  for (const key of keys) {
    const h = hash(key);
    const b = typeof h === 'number' ? h % buckets : Number(h % big);
    counts[b]++;
  }
  const expected = keys.length / buckets;
  let chiSquare = 0;
  if (expected > 0) {
    for (const c of counts) chiSquare += ((c - expected) * (c - expected)) / expected;
  }
  return { counts, expected, chiSquare };
}
