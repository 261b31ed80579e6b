import { resolveConfig, type HashmixConfig, type RendezvousPolicy } from '../config';
import { KeyEncodingError } from '../errors';
import { createCity64 } from '../hash/city';
import { createFnv1a_64 } from '../hash/fnv';
import { createMurmur3_128 } from '../hash/murmur3_128';
import { createMurmur3_32 } from '../hash/murmur3_32';
import type { HasherFactory } from '../hash/types';
import { createLogger, type Logger } from '../utils/log';
import { writeKey, type ByteSink, type HashKey } from './key_encoding';

export type NodeEncoder<N> = (sink: ByteSink, node: N) => void;

export interface RendezvousOptions<N> {
  // 'max' picks the highest score, 'min' the lowest. Defaults to HASHMIX_RENDEZVOUS_POLICY.
  policy?: RendezvousPolicy;
  // Required when nodes are not HashKey values.
  encodeNode?: NodeEncoder<N>;
  config?: HashmixConfig;
  logger?: Logger;
}

function isHashKey(value: unknown): value is HashKey {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return true;
    default:
      if (value instanceof Uint8Array) return true;
      return Array.isArray(value) && value.every(isHashKey);
  }
}

function writeNodeDefault(sink: ByteSink, node: unknown): void {
  if (!isHashKey(node)) {
    throw new KeyEncodingError(node, 'unsupported node type; pass encodeNode for custom node types');
  }
  writeKey(sink, node);
}

function hexScore(s: number | bigint): string {
  return s.toString(16);
}

/**
 * Highest Random Weight selection. Each (key, node) pair is scored by writing the
 * key then the node into a fresh hasher; the node with the extremal score wins.
 * Nothing is cached between calls: removing a node only moves the keys that
 * node had won.
 */
export class RendezvousSelector<S extends number | bigint, N = HashKey> {
  readonly policy: RendezvousPolicy;
  private readonly encodeNode: NodeEncoder<N>;
  private readonly log: Logger;

  constructor(private readonly createHasher: HasherFactory<S>, options: RendezvousOptions<N> = {}) {
    const config = options.config ?? resolveConfig();
    this.policy = options.policy ?? config.rendezvousPolicy;
    this.encodeNode = options.encodeNode ?? writeNodeDefault;
    this.log = options.logger ?? createLogger('rendezvous', config);
  }

  score(key: HashKey, node: N): S {
    const hasher = this.createHasher();
    writeKey(hasher, key);
    this.encodeNode(hasher, node);
    return hasher.finish();
  }

  // Strictly better; equal scores keep the earlier node.
  private beats(a: S, b: S): boolean {
    return this.policy === 'max' ? a > b : a < b;
  }

  selectIndex(key: HashKey, nodes: readonly N[]): number | undefined {
    let best = -1;
    let bestScore: S | undefined;
    for (let i = 0; i < nodes.length; i++) {
      const s = this.score(key, nodes[i]);
      if (bestScore === undefined || this.beats(s, bestScore)) {
        best = i;
        bestScore = s;
      }
    }
    if (bestScore === undefined) {
      this.log.debug('select on empty node set');
      return undefined;
    }
    if (this.log.enabled) {
      this.log.debug(`key=${String(key)} -> node[${best}] score=${hexScore(bestScore)} policy=${this.policy} of ${nodes.length}`);
    }
    return best;
  }

  select(key: HashKey, nodes: readonly N[]): N | undefined {
    const i = this.selectIndex(key, nodes);
    return i === undefined ? undefined : nodes[i];
  }

  // Best first; stable on ties, so rank(key, nodes)[0] === select(key, nodes).
  rank(key: HashKey, nodes: readonly N[]): N[] {
    const scored = nodes.map((node, index) => ({ node, index, score: this.score(key, node) }));
    scored.sort((a, b) => {
      if (this.beats(a.score, b.score)) return -1;
      if (this.beats(b.score, a.score)) return 1;
      return a.index - b.index;
    });
    return scored.map((e) => e.node);
  }

  // The top n nodes, e.g. for replica placement.
  selectN(key: HashKey, nodes: readonly N[], n: number): N[] {
    if (!(n > 0)) return [];
    return this.rank(key, nodes).slice(0, Math.floor(n));
  }
}

export function rendezvousWithFnv1a64<N = HashKey>(options?: RendezvousOptions<N>): RendezvousSelector<bigint, N> {
  return new RendezvousSelector(createFnv1a_64, options);
}

export function rendezvousWithMurmur3_32<N = HashKey>(seed = 0, options?: RendezvousOptions<N>): RendezvousSelector<number, N> {
  return new RendezvousSelector(() => createMurmur3_32(seed), options);
}

export function rendezvousWithMurmur3_128<N = HashKey>(seed = 0, options?: RendezvousOptions<N>): RendezvousSelector<bigint, N> {
  return new RendezvousSelector(() => createMurmur3_128(seed), options);
}

export function rendezvousWithCity64<N = HashKey>(seed?: bigint | number, options?: RendezvousOptions<N>): RendezvousSelector<bigint, N> {
  return new RendezvousSelector(() => createCity64(seed), options);
}
