import { DuplicateProviderError, UnknownProviderError } from '../errors';
import { toHex128, toHex32, toHex64 } from '../utils/hex';
import { createLogger, type Logger } from '../utils/log';
import { cityHash64, cityHash64WithSeed, cityHash64WithSeeds } from './city';
import { fnv1_32, fnv1_64, fnv1a_32, fnv1a_64 } from './fnv';
import { murmurhash3_128 } from './murmur3_128';
import { murmurhash3_32 } from './murmur3_32';

// One implementation of the one-shot contracts. An alternative provider (a
// binding to a native library, a wasm build) may cover only some of them.
export interface HashProvider {
  readonly name: string;
  fnv1_32?(bytes: Uint8Array): number;
  fnv1a_32?(bytes: Uint8Array): number;
  fnv1_64?(bytes: Uint8Array): bigint;
  fnv1a_64?(bytes: Uint8Array): bigint;
  murmurhash3_32?(bytes: Uint8Array, seed: number): number;
  murmurhash3_128?(bytes: Uint8Array, seed: number): bigint;
  cityHash64?(bytes: Uint8Array): bigint;
  cityHash64WithSeed?(bytes: Uint8Array, seed: bigint): bigint;
  cityHash64WithSeeds?(bytes: Uint8Array, seed0: bigint, seed1: bigint): bigint;
}

export const NATIVE_PROVIDER_NAME = 'native';

export const nativeProvider: HashProvider = {
  name: NATIVE_PROVIDER_NAME,
  fnv1_32,
  fnv1a_32,
  fnv1_64,
  fnv1a_64,
  murmurhash3_32,
  murmurhash3_128,
  cityHash64,
  cityHash64WithSeed,
  cityHash64WithSeeds,
};

export type HashFunctionName = Exclude<keyof HashProvider, 'name'>;

export const HASH_FUNCTION_NAMES: readonly HashFunctionName[] = [
  'fnv1_32',
  'fnv1a_32',
  'fnv1_64',
  'fnv1a_64',
  'murmurhash3_32',
  'murmurhash3_128',
  'cityHash64',
  'cityHash64WithSeed',
  'cityHash64WithSeeds',
];

export interface ProviderMismatch {
  fn: HashFunctionName;
  input: Uint8Array;
  expected: string; // hex
  actual: string; // hex
}

export interface CompareOptions {
  seed32?: number;
  seed64?: bigint;
  seed64b?: bigint;
}

function formatResult(fn: HashFunctionName, value: number | bigint): string {
  if (typeof value === 'number') return toHex32(value);
  return fn === 'murmurhash3_128' ? toHex128(value) : toHex64(value);
}

// Runs one function of a provider; undefined when the provider lacks it.
function run(p: HashProvider, fn: HashFunctionName, input: Uint8Array, opts: Required<CompareOptions>): number | bigint | undefined {
  switch (fn) {
    case 'fnv1_32': return p.fnv1_32?.(input);
    case 'fnv1a_32': return p.fnv1a_32?.(input);
    case 'fnv1_64': return p.fnv1_64?.(input);
    case 'fnv1a_64': return p.fnv1a_64?.(input);
    case 'murmurhash3_32': return p.murmurhash3_32?.(input, opts.seed32);
    case 'murmurhash3_128': return p.murmurhash3_128?.(input, opts.seed32);
    case 'cityHash64': return p.cityHash64?.(input);
    case 'cityHash64WithSeed': return p.cityHash64WithSeed?.(input, opts.seed64);
    case 'cityHash64WithSeeds': return p.cityHash64WithSeeds?.(input, opts.seed64, opts.seed64b);
  }
}

export class ProviderRegistry {
  private readonly providers = new Map<string, HashProvider>();

  constructor(private readonly log: Logger = createLogger('providers')) {
    this.providers.set(nativeProvider.name, nativeProvider);
  }

  register(provider: HashProvider): void {
    if (this.providers.has(provider.name)) throw new DuplicateProviderError(provider.name);
    this.providers.set(provider.name, provider);
    this.log.debug(`registered ${provider.name}`);
  }

  get(name: string): HashProvider {
    const p = this.providers.get(name);
    if (!p) throw new UnknownProviderError(name, this.names());
    return p;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Every (function, input) pair on which the two providers disagree. Functions
   * missing from either provider are skipped.
   */
  compare(a: string, b: string, inputs: readonly Uint8Array[], options: CompareOptions = {}): ProviderMismatch[] {
    const pa = this.get(a);
    const pb = this.get(b);
    const opts: Required<CompareOptions> = {
      seed32: options.seed32 ?? 0,
      seed64: options.seed64 ?? 0n,
      seed64b: options.seed64b ?? 0n,
    };
    const out: ProviderMismatch[] = [];
    for (const fn of HASH_FUNCTION_NAMES) {
      for (const input of inputs) {
        const expected = run(pa, fn, input, opts);
        const actual = run(pb, fn, input, opts);
        if (expected === undefined || actual === undefined) continue;
        if (expected !== actual) {
          out.push({ fn, input, expected: formatResult(fn, expected), actual: formatResult(fn, actual) });
        }
      }
    }
    if (out.length > 0) {
      this.log.warn(`${a} vs ${b}: ${out.length} mismatches (first: ${out[0].fn} len=${out[0].input.length})`);
    }
    return out;
  }
}
