import { MASK_64 } from './bits';
import type { Hasher } from './types';

// FNV-1 multiplies then xors each byte; FNV-1a xors then multiplies.
export type FnvOrder = 'fnv1' | 'fnv1a';

export const FNV32_OFFSET = 0x811c9dc5;
export const FNV32_PRIME = 0x01000193;
export const FNV64_OFFSET = 0xcbf29ce484222325n;
export const FNV64_PRIME = 0x00000100000001b3n;

export interface FnvParams<T extends number | bigint> {
  readonly bits: 32 | 64;
  readonly order: FnvOrder;
  readonly offset: T;
  readonly multiply: (state: T) => T; // wrapping multiply by the width's prime
  readonly xorByte: (state: T, byte: number) => T;
}

const width32 = {
  bits: 32,
  offset: FNV32_OFFSET,
  multiply: (s: number) => Math.imul(s, FNV32_PRIME) >>> 0,
  xorByte: (s: number, b: number) => (s ^ (b & 0xff)) >>> 0,
} as const;

const width64 = {
  bits: 64,
  offset: FNV64_OFFSET,
  multiply: (s: bigint) => (s * FNV64_PRIME) & MASK_64,
  xorByte: (s: bigint, b: number) => s ^ BigInt(b & 0xff),
} as const;

export const FNV1_32: FnvParams<number> = { ...width32, order: 'fnv1' };
export const FNV1A_32: FnvParams<number> = { ...width32, order: 'fnv1a' };
export const FNV1_64: FnvParams<bigint> = { ...width64, order: 'fnv1' };
export const FNV1A_64: FnvParams<bigint> = { ...width64, order: 'fnv1a' };

// One accumulator for all four variants. The state after any prefix is the full
// hash of that prefix, so split writes never need buffering.
export class FnvHasher<T extends number | bigint> implements Hasher<T> {
  private state: T;

  constructor(private readonly params: FnvParams<T>) {
    this.state = params.offset;
  }

  write(bytes: Uint8Array): this {
    const { multiply, xorByte } = this.params;
    let s = this.state;
    if (this.params.order === 'fnv1') {
      for (let i = 0; i < bytes.length; i++) s = xorByte(multiply(s), bytes[i]);
    } else {
      for (let i = 0; i < bytes.length; i++) s = multiply(xorByte(s, bytes[i]));
    }
    this.state = s;
    return this;
  }

  finish(): T {
    return this.state;
  }

  reset(): this {
    this.state = this.params.offset;
    return this;
  }
}

export const createFnv1_32 = (): FnvHasher<number> => new FnvHasher(FNV1_32);
export const createFnv1a_32 = (): FnvHasher<number> => new FnvHasher(FNV1A_32);
export const createFnv1_64 = (): FnvHasher<bigint> => new FnvHasher(FNV1_64);
export const createFnv1a_64 = (): FnvHasher<bigint> => new FnvHasher(FNV1A_64);

export function fnv1_32(bytes: Uint8Array): number {
  return createFnv1_32().write(bytes).finish();
}

export function fnv1a_32(bytes: Uint8Array): number {
  return createFnv1a_32().write(bytes).finish();
}

export function fnv1_64(bytes: Uint8Array): bigint {
  return createFnv1_64().write(bytes).finish();
}

export function fnv1a_64(bytes: Uint8Array): bigint {
  return createFnv1a_64().write(bytes).finish();
}

export function fnv1aHex(bytes: Uint8Array): string {
  const h = fnv1a_32(bytes);
  return ('00000000' + h.toString(16)).slice(-8);
}
