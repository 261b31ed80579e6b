import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { resolveConfig } from '../../src/config';
import { KeyEncodingError } from '../../src/errors';
import type { Hasher } from '../../src/hash/types';
import type { Logger } from '../../src/utils/log';
import { writeKey } from '../../src/rendezvous/key_encoding';
import {
  RendezvousSelector,
  rendezvousWithCity64,
  rendezvousWithFnv1a64,
  rendezvousWithMurmur3_128,
  rendezvousWithMurmur3_32,
} from '../../src/rendezvous/rendezvous';

const config = resolveConfig({});
const NODES = ['node-a', 'node-b', 'node-c', 'node-d'];

class ConstantHasher implements Hasher<number> {
  write(): this {
    return this;
  }
  finish(): number {
    return 7;
  }
  reset(): this {
    return this;
  }
}

describe('RendezvousSelector', () => {
  it('scores the encoded key followed by the encoded node', () => {
    const r = rendezvousWithCity64(undefined, { config });
    expect(r.score('user-42', 'node-c')).toBe(0xd44e777b44862009n);
    expect(r.score('user-42', 'node-a')).toBe(0x45424d536cce33c0n);
  });

  it('picks the highest score by default', () => {
    const r = rendezvousWithCity64(undefined, { config });
    expect(r.policy).toBe('max');
    expect(r.select('user-42', NODES)).toBe('node-c');
    expect(r.selectIndex('user-42', NODES)).toBe(2);
    expect(r.rank('user-42', NODES)).toEqual(['node-c', 'node-b', 'node-d', 'node-a']);
    expect(r.rank('session:7', NODES)).toEqual(['node-d', 'node-c', 'node-b', 'node-a']);
    expect(r.rank(12345, NODES)).toEqual(['node-b', 'node-a', 'node-d', 'node-c']);
  });

  it('works with every hash family', () => {
    expect(rendezvousWithFnv1a64({ config }).rank('user-42', NODES)).toEqual(['node-a', 'node-b', 'node-c', 'node-d']);
    expect(rendezvousWithMurmur3_32(0, { config }).rank(12345, NODES)).toEqual(['node-d', 'node-c', 'node-a', 'node-b']);
    expect(rendezvousWithMurmur3_128(0, { config }).rank('user-42', NODES)).toEqual(['node-c', 'node-a', 'node-d', 'node-b']);
  });

  it('picks the lowest score under the min policy', () => {
    const r = rendezvousWithCity64(undefined, { config, policy: 'min' });
    expect(r.select('user-42', NODES)).toBe('node-a');
    expect(r.select(12345, NODES)).toBe('node-c');
    expect(rendezvousWithMurmur3_32(0, { config, policy: 'min' }).select(12345, NODES)).toBe('node-b');
  });

  it('reads the default policy from configuration', () => {
    const r = rendezvousWithCity64(undefined, { config: resolveConfig({ HASHMIX_RENDEZVOUS_POLICY: 'min' }) });
    expect(r.policy).toBe('min');
    expect(r.select('user-42', NODES)).toBe('node-a');
  });

  it('returns nothing for an empty node set', () => {
    const r = rendezvousWithFnv1a64({ config });
    expect(r.select('k', [])).toBeUndefined();
    expect(r.selectIndex('k', [])).toBeUndefined();
    expect(r.rank('k', [])).toEqual([]);
    expect(r.selectN('k', [], 3)).toEqual([]);
  });

  it('keeps the earliest node on equal scores', () => {
    const r = new RendezvousSelector(() => new ConstantHasher(), { config });
    expect(r.select('k', ['x', 'y', 'z'])).toBe('x');
    expect(r.rank('k', ['x', 'y', 'z'])).toEqual(['x', 'y', 'z']);
    const min = new RendezvousSelector(() => new ConstantHasher(), { config, policy: 'min' });
    expect(min.selectIndex('k', ['x', 'y', 'z'])).toBe(0);
  });

  it('selectN returns the top of the ranking', () => {
    const r = rendezvousWithCity64(undefined, { config });
    expect(r.selectN('user-42', NODES, 2)).toEqual(['node-c', 'node-b']);
    expect(r.selectN('user-42', NODES, 2.7)).toEqual(['node-c', 'node-b']);
    expect(r.selectN('user-42', NODES, 10)).toEqual(['node-c', 'node-b', 'node-d', 'node-a']);
    expect(r.selectN('user-42', NODES, 0)).toEqual([]);
    expect(r.selectN('user-42', NODES, Number.NaN)).toEqual([]);
  });

  it('rank[0] is always the selected node', () => {
    const r = rendezvousWithMurmur3_32(11, { config });
    fc.assert(
      fc.property(fc.string(), fc.uniqueArray(fc.string(), { minLength: 1, maxLength: 8 }), (key, nodes) => {
        expect(r.rank(key, nodes)[0]).toBe(r.select(key, nodes));
      }),
      { numRuns: 200 },
    );
  });

  it('does not depend on node order', () => {
    const r = rendezvousWithFnv1a64({ config });
    const reversed = [...NODES].reverse();
    for (let k = 0; k < 50; k++) {
      expect(r.select(k, reversed)).toBe(r.select(k, NODES));
    }
  });

  it('only moves the keys of a removed node', () => {
    const r = rendezvousWithCity64(undefined, { config });
    const nodes = ['n0', 'n1', 'n2', 'n3', 'n4'];
    const remaining = nodes.filter((n) => n !== 'n2');
    let moved = 0;
    for (let k = 0; k < 500; k++) {
      const before = r.select(k, nodes);
      const after = r.select(k, remaining);
      if (before === 'n2') {
        moved++;
        expect(after).not.toBe('n2');
      } else {
        expect(after).toBe(before);
      }
    }
    expect(moved).toBe(96);
    // Roughly 1/5 of the keys belonged to the removed node.
    expect(moved / 500).toBeGreaterThan(0.1);
    expect(moved / 500).toBeLessThan(0.32);
  });

  it('only moves keys to an added node', () => {
    const r = rendezvousWithMurmur3_128(0, { config });
    const nodes = ['n0', 'n1', 'n2'];
    const grown = [...nodes, 'n3'];
    for (let k = 0; k < 300; k++) {
      const after = r.select(`key-${k}`, grown);
      if (after !== 'n3') expect(after).toBe(r.select(`key-${k}`, nodes));
    }
  });

  it('accepts custom node types through encodeNode', () => {
    interface Server {
      id: string;
      port: number;
    }
    const servers: Server[] = NODES.map((id, i) => ({ id, port: 8000 + i }));
    const r = rendezvousWithCity64<Server>(undefined, {
      config,
      encodeNode: (sink, s) => writeKey(sink, s.id),
    });
    expect(r.select('user-42', servers)).toEqual({ id: 'node-c', port: 8002 });
    expect(r.selectIndex('user-42', servers)).toBe(2);
  });

  it('rejects custom node types without encodeNode', () => {
    const r = rendezvousWithFnv1a64<unknown>({ config });
    expect(() => r.select('k', [{ id: 1 }])).toThrow(KeyEncodingError);
    expect(() => r.select('k', [{ id: 1 }])).toThrow(
      'Cannot encode object as a rendezvous key: unsupported node type; pass encodeNode for custom node types',
    );
  });

  it('logs each decision when debug logging is on', () => {
    const lines: string[] = [];
    const logger: Logger = { enabled: true, debug: (m) => lines.push(m), warn: (m) => lines.push(m) };
    const r = rendezvousWithCity64(undefined, { config, logger });
    r.select('user-42', NODES);
    r.select('user-42', []);
    expect(lines).toEqual([
      'key=user-42 -> node[2] score=d44e777b44862009 policy=max of 4',
      'select on empty node set',
    ]);
  });
});
