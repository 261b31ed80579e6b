// Shared word loads and mixing steps for the hash algorithms.
// 32-bit values travel as numbers (kept unsigned with >>> 0), 64-bit values as bigints.

export type U32 = number; // 0..0xFFFFFFFF
export type U64 = bigint; // 0..2^64-1
export type U128 = bigint; // 0..2^128-1

export const MASK_64 = (1n << 64n) - 1n;

// Little-endian loads. Callers guarantee off + width <= bytes.length.
export function fetch32(bytes: Uint8Array, off: number): U32 {
  return (bytes[off] | (bytes[off + 1] << 8) | (bytes[off + 2] << 16) | (bytes[off + 3] << 24)) >>> 0;
}

export function fetch64(bytes: Uint8Array, off: number): U64 {
  const lo = fetch32(bytes, off);
  const hi = fetch32(bytes, off + 4);
  return (BigInt(hi) << 32n) | BigInt(lo);
}

// Packs 1..4 bytes little-endian, missing high bytes read as zero.
export function fetchPartial32(bytes: Uint8Array, off: number, count: number): U32 {
  let k = 0;
  for (let i = count - 1; i >= 0; i--) {
    k = (k << 8) | bytes[off + i];
  }
  return k >>> 0;
}

export function rotl32(x: U32, r: number): U32 {
  return ((x << r) | (x >>> (32 - r))) >>> 0;
}

export function rotr64(x: U64, r: number): U64 {
  if (r === 0) return x;
  const s = BigInt(r);
  return ((x >> s) | (x << (64n - s))) & MASK_64;
}

export function mul32(a: U32, b: U32): U32 {
  return Math.imul(a, b) >>> 0;
}

export function add32(a: U32, b: U32): U32 {
  return (a + b) >>> 0;
}

export function mul64(a: U64, b: U64): U64 {
  return (a * b) & MASK_64;
}

export function add64(...terms: U64[]): U64 {
  let sum = 0n;
  for (const t of terms) sum += t;
  return sum & MASK_64;
}

export function sub64(a: U64, b: U64): U64 {
  return (a - b) & MASK_64;
}

// MurmurHash3 finalisation avalanche.
export function fmix32(h: U32): U32 {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

export function shiftMix(v: U64): U64 {
  return v ^ (v >> 47n);
}

export function toU32(seed: number): U32 {
  return seed >>> 0;
}

// Non-finite numbers wrap to 0, as ToUint32 does for toU32.
export function toU64(seed: bigint | number): U64 {
  if (typeof seed === 'bigint') return BigInt.asUintN(64, seed);
  if (!Number.isFinite(seed)) return 0n;
  return BigInt.asUintN(64, BigInt(Math.trunc(seed)));
}
