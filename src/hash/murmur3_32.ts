import { fetch32, fetchPartial32, fmix32, mul32, rotl32, toU32, type U32 } from './bits';
import type { Hasher } from './types';

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

function mixK1(k1: U32): U32 {
  return mul32(rotl32(mul32(k1, C1), 15), C2);
}

function mixBlock(h1: U32, k1: U32): U32 {
  h1 = rotl32((h1 ^ mixK1(k1)) >>> 0, 13);
  return (Math.imul(h1, 5) + 0xe6546b64) >>> 0;
}

// Tail bytes only go through the k1 mix and an xor; no rotate/add on h1.
function mixTail(h1: U32, tail: Uint8Array, off: number, count: number): U32 {
  if (count === 0) return h1;
  return (h1 ^ mixK1(fetchPartial32(tail, off, count))) >>> 0;
}

function finalize(h1: U32, length: number): U32 {
  return fmix32((h1 ^ length) >>> 0);
}

/**
 * MurmurHash3 x86 32-bit.
 * @param seed reduced modulo 2^32
 */
export function murmurhash3_32(bytes: Uint8Array, seed = 0): U32 {
  const len = bytes.length;
  const blocksEnd = len - (len & 3);
  let h1 = toU32(seed);
  for (let i = 0; i < blocksEnd; i += 4) {
    h1 = mixBlock(h1, fetch32(bytes, i));
  }
  h1 = mixTail(h1, bytes, blocksEnd, len - blocksEnd);
  return finalize(h1, len >>> 0);
}

// Incremental form. Up to three bytes that do not yet fill a block wait in
// `pending`, so the result depends only on the concatenation of all writes.
export class MurmurHasher32 implements Hasher<U32> {
  private readonly seed: U32;
  private h1: U32;
  private length = 0;
  private readonly pending = new Uint8Array(4);
  private pendingLen = 0;

  constructor(seed = 0) {
    this.seed = toU32(seed);
    this.h1 = this.seed;
  }

  write(bytes: Uint8Array): this {
    let i = 0;
    const n = bytes.length;
    this.length = (this.length + n) >>> 0;

    if (this.pendingLen > 0) {
      while (this.pendingLen < 4 && i < n) this.pending[this.pendingLen++] = bytes[i++];
      if (this.pendingLen < 4) return this;
      this.h1 = mixBlock(this.h1, fetch32(this.pending, 0));
      this.pendingLen = 0;
    }

    let h1 = this.h1;
    for (; i + 4 <= n; i += 4) {
      h1 = mixBlock(h1, fetch32(bytes, i));
    }
    this.h1 = h1;

    while (i < n) this.pending[this.pendingLen++] = bytes[i++];
    return this;
  }

  finish(): U32 {
    return finalize(mixTail(this.h1, this.pending, 0, this.pendingLen), this.length);
  }

  reset(): this {
    this.h1 = this.seed;
    this.length = 0;
    this.pendingLen = 0;
    return this;
  }
}

export const createMurmur3_32 = (seed = 0): MurmurHasher32 => new MurmurHasher32(seed);
