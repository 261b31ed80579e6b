import { add32, fetch32, fetchPartial32, fmix32, mul32, rotl32, toU32, type U128, type U32, type U64 } from './bits';
import type { Hasher } from './types';

// Lane i multiplies its word by C[i] then C[i+1].
const C = [0x239b961b, 0xab0e9789, 0x38b34ae5, 0xa1e38b93] as const;
const K_ROT = [15, 16, 17, 18] as const;
const H_ROT = [19, 17, 15, 13] as const;
const H_ADD = [0x561ccd1b, 0x0bcaa747, 0x96cd1c35, 0x32ac3b17] as const;

type Lanes = [U32, U32, U32, U32];
type Lane = 0 | 1 | 2 | 3;
const LANES: readonly Lane[] = [0, 1, 2, 3];

function mixK(lane: Lane, k: U32): U32 {
  return mul32(rotl32(mul32(k, C[lane]), K_ROT[lane]), C[(lane + 1) & 3]);
}

// Lanes fold in order h1..h4; each adds its right neighbour, so h1..h3 see the
// neighbour's previous value and h4 sees the h1 just written.
function mixBlock(h: Lanes, bytes: Uint8Array, off: number): void {
  for (const lane of LANES) {
    const k = mixK(lane, fetch32(bytes, off + lane * 4));
    let x = rotl32((h[lane] ^ k) >>> 0, H_ROT[lane]);
    x = add32(x, h[(lane + 1) & 3]);
    h[lane] = (Math.imul(x, 5) + H_ADD[lane]) >>> 0;
  }
}

// 0..15 tail bytes; only the lanes the tail reaches are touched.
function mixTail(h: Lanes, tail: Uint8Array, off: number, count: number): void {
  for (const lane of LANES) {
    const n = Math.min(4, count - lane * 4);
    if (n <= 0) break;
    h[lane] = (h[lane] ^ mixK(lane, fetchPartial32(tail, off + lane * 4, n))) >>> 0;
  }
}

function finalize(lanes: Lanes, length: number): U128 {
  let h1 = (lanes[0] ^ length) >>> 0;
  let h2 = (lanes[1] ^ length) >>> 0;
  let h3 = (lanes[2] ^ length) >>> 0;
  let h4 = (lanes[3] ^ length) >>> 0;
  h1 = add32(add32(add32(h1, h2), h3), h4);
  h2 = add32(h2, h1);
  h3 = add32(h3, h1);
  h4 = add32(h4, h1);
  h1 = fmix32(h1);
  h2 = fmix32(h2);
  h3 = fmix32(h3);
  h4 = fmix32(h4);
  return (BigInt(h4) << 96n) | (BigInt(h3) << 64n) | (BigInt(h2) << 32n) | BigInt(h1);
}

/**
 * MurmurHash3 x86 128-bit: four 32-bit lanes.
 * The result packs lanes as (h4 << 96) | (h3 << 64) | (h2 << 32) | h1.
 */
export function murmurhash3_128(bytes: Uint8Array, seed = 0): U128 {
  const s = toU32(seed);
  const h: Lanes = [s, s, s, s];
  const len = bytes.length;
  const blocksEnd = len - (len & 15);
  for (let i = 0; i < blocksEnd; i += 16) mixBlock(h, bytes, i);
  mixTail(h, bytes, blocksEnd, len - blocksEnd);
  return finalize(h, len >>> 0);
}

export function murmurhash3_128_low64(bytes: Uint8Array, seed = 0): U64 {
  return BigInt.asUintN(64, murmurhash3_128(bytes, seed));
}

export class MurmurHasher128 implements Hasher<U128> {
  private readonly seed: U32;
  private h: Lanes;
  private length = 0;
  private readonly pending = new Uint8Array(16);
  private pendingLen = 0;

  constructor(seed = 0) {
    this.seed = toU32(seed);
    this.h = [this.seed, this.seed, this.seed, this.seed];
  }

  write(bytes: Uint8Array): this {
    let i = 0;
    const n = bytes.length;
    this.length = (this.length + n) >>> 0;

    if (this.pendingLen > 0) {
      const take = Math.min(16 - this.pendingLen, n);
      this.pending.set(bytes.subarray(0, take), this.pendingLen);
      this.pendingLen += take;
      i = take;
      if (this.pendingLen < 16) return this;
      mixBlock(this.h, this.pending, 0);
      this.pendingLen = 0;
    }

    for (; i + 16 <= n; i += 16) mixBlock(this.h, bytes, i);

    if (i < n) {
      this.pending.set(bytes.subarray(i), 0);
      this.pendingLen = n - i;
    }
    return this;
  }

  finish(): U128 {
    const h: Lanes = [this.h[0], this.h[1], this.h[2], this.h[3]];
    mixTail(h, this.pending, 0, this.pendingLen);
    return finalize(h, this.length);
  }

  // Low 64 bits of finish(), usable on its own as a 64-bit hash.
  finish64(): U64 {
    return BigInt.asUintN(64, this.finish());
  }

  reset(): this {
    this.h = [this.seed, this.seed, this.seed, this.seed];
    this.length = 0;
    this.pendingLen = 0;
    return this;
  }
}

export const createMurmur3_128 = (seed = 0): MurmurHasher128 => new MurmurHasher128(seed);
