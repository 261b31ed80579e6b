import { add64, fetch32, fetch64, mul64, rotr64, shiftMix, sub64, toU64, type U64 } from './bits';
import type { Hasher } from './types';

export const K0 = 0xc3a5c85c97cb3127n;
export const K1 = 0xb492b66fbe98f273n;
export const K2 = 0x9ae16a3b2f90404fn;
const K_MUL = 0x9ddfea08eb382d69n;

// The long path reads the first HEAD_BYTES and the last TAIL_BYTES only.
const HEAD_BYTES = 48;
const TAIL_BYTES = 32;

export function hashLen16(u: U64, v: U64, mul: U64): U64 {
  let a = mul64(u ^ v, mul);
  a ^= a >> 47n;
  let b = mul64(v ^ a, mul);
  b ^= b >> 47n;
  return mul64(b, mul);
}

function hashSmall(s: Uint8Array): U64 {
  const len = s.length;
  const n = BigInt(len);
  if (len >= 8) {
    const mul = add64(K2, n * 2n);
    const a = add64(fetch64(s, 0), K2);
    const b = fetch64(s, len - 8);
    const c = add64(mul64(rotr64(b, 37), mul), a);
    const d = mul64(add64(rotr64(a, 25), b), mul);
    return hashLen16(c, d, mul);
  }
  if (len >= 4) {
    const mul = add64(K2, n * 2n);
    const a = BigInt(fetch32(s, 0));
    const b = BigInt(fetch32(s, len - 4));
    return hashLen16(add64(n, a << 3n), b, mul);
  }
  if (len > 0) {
    const a = BigInt(s[0]);
    const b = BigInt(s[len >> 1]);
    const c = BigInt(s[len - 1]);
    const y = a + (b << 8n);
    const z = n + (c << 2n);
    return mul64(shiftMix(mul64(y, K2) ^ mul64(z, K0)), K2);
  }
  return K2;
}

function hashMedium(s: Uint8Array): U64 {
  const len = s.length;
  const mul = add64(K2, BigInt(len) * 2n);
  const a = mul64(fetch64(s, 0), K1);
  const b = fetch64(s, 8);
  const c = mul64(fetch64(s, len - 8), mul);
  const d = mul64(fetch64(s, len - 16), K2);
  return hashLen16(
    add64(rotr64(add64(a, b), 43), rotr64(c, 30), d),
    add64(a, rotr64(add64(b, K2), 18), c),
    mul,
  );
}

// Two-output mix over a 32-byte window. When the window starts the input and
// the input is longer than 48 bytes, the 16 bytes after the window join in.
function weakHash32(w: Uint8Array, len: number): [U64, U64] {
  if (w.length < 32) return [K0, K1];
  let a = fetch64(w, 0);
  let b = fetch64(w, 8);
  let c = fetch64(w, 16);
  const d = fetch64(w, 24);
  a = add64(a, fetch64(w, 0));
  b = rotr64(add64(b, a, d), 21);
  c = add64(c, a);
  a = add64(a, rotr64(a, 44), b);
  let first = add64(a, d);
  let second = add64(c, rotr64(b, 10));
  if (len > 48 && w.length >= 48) {
    first = add64(first, mul64(shiftMix(mul64(fetch64(w, 32), K2)), K0), a);
    second = add64(second, mul64(shiftMix(add64(c, fetch64(w, 40))), K2));
    first = shiftMix(first);
    second = shiftMix(second);
  }
  return [first, second];
}

// head: at least the first min(len, 48) bytes; tail: the last 32 bytes.
function hashLarge(head: Uint8Array, tail: Uint8Array, len: number): U64 {
  let x = mul64(fetch64(head, 0), K2);
  let y = fetch64(head, 8);
  let z = mul64(fetch64(tail, TAIL_BYTES - 8), K2);
  const v = weakHash32(head, len);
  const w = weakHash32(tail, len);
  x = add64(mul64(x, K2), fetch64(head, 16));
  y = add64(y, mul64(rotr64(x, 48), K2), fetch64(head, 24));
  z = add64(mul64(z, K2), fetch64(tail, TAIL_BYTES - 16));
  v[0] = add64(mul64(v[0], K2), w[1]);
  v[1] = add64(mul64(v[1], K2), w[0]);
  const a = add64(mul64(add64(y, z), K2), v[0], w[0]);
  const b = add64(mul64(add64(v[1], w[1]), K2), x, y);
  return hashLen16(a, b, K2);
}

/** CityHash64 over the whole buffer, dispatched on length (<=16, 17..32, >32). */
export function cityHash64(bytes: Uint8Array): U64 {
  const len = bytes.length;
  if (len <= 16) return hashSmall(bytes);
  if (len <= 32) return hashMedium(bytes);
  return hashLarge(bytes.subarray(0, HEAD_BYTES), bytes.subarray(len - TAIL_BYTES), len);
}

export function cityHash64WithSeeds(bytes: Uint8Array, seed0: bigint | number, seed1: bigint | number): U64 {
  return hashLen16(sub64(cityHash64(bytes), toU64(seed0)), toU64(seed1), K_MUL);
}

export function cityHash64WithSeed(bytes: Uint8Array, seed: bigint | number): U64 {
  return cityHash64WithSeeds(bytes, K2, seed);
}

// Keeps the first 48 bytes and a rolling window of the last 32, which is all
// the long path reads, so memory stays constant for any input length.
export class CityHasher64 implements Hasher<U64> {
  private readonly seed: U64 | undefined;
  private readonly head = new Uint8Array(HEAD_BYTES);
  private readonly tail = new Uint8Array(TAIL_BYTES);
  private length = 0;

  constructor(seed?: bigint | number) {
    this.seed = seed === undefined ? undefined : toU64(seed);
  }

  write(bytes: Uint8Array): this {
    const n = bytes.length;
    if (this.length < HEAD_BYTES) {
      const take = Math.min(HEAD_BYTES - this.length, n);
      this.head.set(bytes.subarray(0, take), this.length);
    }
    if (n >= TAIL_BYTES) {
      this.tail.set(bytes.subarray(n - TAIL_BYTES));
    } else if (n > 0) {
      this.tail.copyWithin(0, n);
      this.tail.set(bytes, TAIL_BYTES - n);
    }
    this.length += n;
    return this;
  }

  finish(): U64 {
    const len = this.length;
    const h = len <= HEAD_BYTES
      ? cityHash64(this.head.subarray(0, len))
      : hashLarge(this.head, this.tail, len);
    if (this.seed === undefined) return h;
    return hashLen16(sub64(h, K2), this.seed, K_MUL);
  }

  reset(): this {
    this.length = 0;
    return this;
  }
}

export const createCity64 = (seed?: bigint | number): CityHasher64 => new CityHasher64(seed);
