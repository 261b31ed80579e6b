import { KeyEncodingError } from '../errors';

export type HashKey = string | number | bigint | boolean | Uint8Array | readonly HashKey[];

// Anything that accepts bytes: a Hasher, or a collector in tests.
export interface ByteSink {
  write(bytes: Uint8Array): unknown;
}

const utf8 = new TextEncoder();
const STRING_TERMINATOR = new Uint8Array([0xff]);
const FALSE_BYTE = new Uint8Array([0]);
const TRUE_BYTE = new Uint8Array([1]);

function u64le(v: bigint): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(64, v), true);
  return out;
}

function f64le(v: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, v, true);
  return out;
}

function isKeyList(value: unknown): value is readonly HashKey[] {
  return Array.isArray(value);
}

// Encoding per type:
//   string      utf-8 bytes then 0xff (no valid utf-8 byte is 0xff, so "ab"+"c" != "a"+"bc")
//   boolean     one byte 0/1
//   number      safe integers as 8-byte LE two's complement, anything else as LE float64
//   bigint      8-byte LE, modulo 2^64
//   Uint8Array  8-byte LE length, then the bytes
//   array       8-byte LE length, then each element
export function writeKey(sink: ByteSink, value: HashKey): void {
  if (typeof value === 'string') {
    sink.write(utf8.encode(value));
    sink.write(STRING_TERMINATOR);
    return;
  }
  if (typeof value === 'boolean') {
    sink.write(value ? TRUE_BYTE : FALSE_BYTE);
    return;
  }
  if (typeof value === 'number') {
    sink.write(Number.isSafeInteger(value) ? u64le(BigInt(value)) : f64le(value));
    return;
  }
  if (typeof value === 'bigint') {
    sink.write(u64le(value));
    return;
  }
  if (value instanceof Uint8Array) {
    sink.write(u64le(BigInt(value.length)));
    sink.write(value);
    return;
  }
  if (isKeyList(value)) {
    sink.write(u64le(BigInt(value.length)));
    for (const item of value) writeKey(sink, item);
    return;
  }
  throw new KeyEncodingError(value, 'unsupported type; pass encodeNode for custom node types');
}

export function encodeKey(value: HashKey): Uint8Array {
  const parts: Uint8Array[] = [];
  writeKey({ write: (b) => parts.push(b) }, value);
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let off = 0;
  for (const p of parts) {
    out.set(p, off);
    off += p.length;
  }
  return out;
}
