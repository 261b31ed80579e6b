import { AnalysisConfigError } from '../errors';
import { mulberry32, randomBytes } from './prng';

export type AnyHashFn = (bytes: Uint8Array) => number | bigint;

export interface AvalancheOptions {
  inputBytes?: number; // default 8
  trials?: number; // default 1000
  seed?: number; // default 1
  outputBits?: number; // default 32 for number results, 64 for bigint
}

export interface AvalancheMatrix {
  inputBits: number;
  outputBits: number;
  trials: number;
  // Row-major [inputBit][outputBit]: fraction of trials in which flipping the
  // input bit flipped the output bit. 0.5 everywhere is ideal.
  probabilities: Float64Array;
}

function requirePositive(field: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) throw new AnalysisConfigError(field, value);
  return value;
}

function diffBits(a: number | bigint, b: number | bigint): bigint {
  return BigInt(a) ^ BigInt(b);
}

export function avalancheMatrix(hash: AnyHashFn, options: AvalancheOptions = {}): AvalancheMatrix {
  const inputBytes = requirePositive('inputBytes', options.inputBytes ?? 8);
  const trials = requirePositive('trials', options.trials ?? 1000);
  const inputBits = inputBytes * 8;
  const probe = hash(new Uint8Array(inputBytes));
  const outputBits = requirePositive('outputBits', options.outputBits ?? (typeof probe === 'number' ? 32 : 64));
  const counts = new Uint32Array(inputBits * outputBits);
  const next = mulberry32(options.seed ?? 1);

  for (let t = 0; t < trials; t++) {
    const input = randomBytes(next, inputBytes);
    const base = hash(input);
    for (let i = 0; i < inputBits; i++) {
      input[i >> 3] ^= 1 << (i & 7);
      const flipped = hash(input);
      input[i >> 3] ^= 1 << (i & 7);
      const row = i * outputBits;
      if (typeof base === 'number' && typeof flipped === 'number' && outputBits <= 32) {
        const d = (base ^ flipped) >>> 0;
        for (let j = 0; j < outputBits; j++) counts[row + j] += (d >>> j) & 1;
      } else {
        const d = diffBits(base, flipped);
        for (let j = 0; j < outputBits; j++) counts[row + j] += Number((d >> BigInt(j)) & 1n);
      }
    }
  }

  const probabilities = new Float64Array(counts.length);
  for (let k = 0; k < counts.length; k++) probabilities[k] = counts[k] / trials;
  return { inputBits, outputBits, trials, probabilities };
}

// Largest distance from the ideal 0.5 over all cells.
export function worstBias(m: AvalancheMatrix): number {
  let worst = 0;
  for (const p of m.probabilities) worst = Math.max(worst, Math.abs(p - 0.5));
  return worst;
}
