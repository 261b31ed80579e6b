import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  createFnv1_32, createFnv1_64, createFnv1a_32, createFnv1a_64,
  fnv1_32, fnv1_64, fnv1a_32, fnv1a_64, fnv1aHex,
} from '../../src/hash/fnv';

const utf8 = (s: string) => new TextEncoder().encode(s);

describe('fnv1a', () => {
  it('hashes known sequences', () => {
    expect(fnv1aHex(new Uint8Array([]))).toBe('811c9dc5');
    expect(fnv1aHex(new Uint8Array([0x61]))).toBe('e40c292c'); // 'a'
    expect(fnv1aHex(new Uint8Array([0x61, 0x62, 0x63]))).toBe('1a47e90b'); // 'abc'
  });

  it('returns the offset basis for empty input', () => {
    expect(fnv1_32(new Uint8Array(0))).toBe(0x811c9dc5);
    expect(fnv1a_32(new Uint8Array(0))).toBe(0x811c9dc5);
    expect(fnv1_64(new Uint8Array(0))).toBe(0xcbf29ce484222325n);
    expect(fnv1a_64(new Uint8Array(0))).toBe(0xcbf29ce484222325n);
  });

  it('matches reference values for all four variants', () => {
    expect(fnv1_32(utf8('a'))).toBe(0x050c5d7e);
    expect(fnv1_64(utf8('a'))).toBe(0xaf63bd4c8601b7ben);
    expect(fnv1a_64(utf8('a'))).toBe(0xaf63dc4c8601ec8cn);
    expect(fnv1_32(utf8('hello'))).toBe(0xb6fa7167);
    expect(fnv1a_32(utf8('hello'))).toBe(0x4f9f2cab);
    expect(fnv1_64(utf8('hello'))).toBe(0x7b495389bdbdd4c7n);
    expect(fnv1a_64(utf8('hello'))).toBe(0xa430d84680aabd0bn);
    expect(fnv1_32(utf8('foobar'))).toBe(0x31f0b262);
    expect(fnv1a_32(utf8('foobar'))).toBe(0xbf9cf968);
    expect(fnv1_64(utf8('foobar'))).toBe(0x340d8765a4dda9c2n);
    expect(fnv1a_64(utf8('foobar'))).toBe(0x85944171f73967e8n);
  });

  it('changes the 64-bit hash when one byte changes', () => {
    expect(fnv1a_64(utf8('hello world'))).toBe(0x779a65e7023cd2e7n);
    expect(fnv1a_64(utf8('hello worlD'))).toBe(0x779a45e7023c9c87n);
  });
});

describe('FnvHasher', () => {
  it('matches the one-shot functions across split writes', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 64 }), fc.nat(64), (data, cut) => {
        const at = Math.min(cut, data.length);
        const a = data.subarray(0, at);
        const b = data.subarray(at);
        expect(createFnv1_32().write(a).write(b).finish()).toBe(fnv1_32(data));
        expect(createFnv1a_32().write(a).write(b).finish()).toBe(fnv1a_32(data));
        expect(createFnv1_64().write(a).write(b).finish()).toBe(fnv1_64(data));
        expect(createFnv1a_64().write(a).write(b).finish()).toBe(fnv1a_64(data));
      }),
      { numRuns: 200 },
    );
  });

  it('reset returns to the offset basis', () => {
    const h = createFnv1a_64().write(utf8('hello'));
    expect(h.finish()).toBe(0xa430d84680aabd0bn);
    expect(h.reset().finish()).toBe(0xcbf29ce484222325n);
    expect(h.write(utf8('hello')).finish()).toBe(0xa430d84680aabd0bn);
  });

  it('finish does not disturb the state', () => {
    const h = createFnv1_32().write(utf8('hel'));
    h.finish();
    expect(h.write(utf8('lo')).finish()).toBe(0xb6fa7167);
  });
});
