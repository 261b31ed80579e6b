#!/usr/bin/env tsx
/*
Render the avalanche matrix of one algorithm as a PNG heatmap.

Usage:
  tsx scripts/avalanche_png.ts --algo=murmur3_32 --out=avalanche.png [--bytes=8] [--trials=1000] [--seed=1]

Algorithms: fnv1_32 fnv1a_32 fnv1_64 fnv1a_64 murmur3_32 murmur3_128 city64
*/
import fs from 'fs';
import { avalancheMatrix, worstBias, type AnyHashFn } from '../src/analysis/avalanche';
import { renderAvalanchePng } from '../src/analysis/png';
import { cityHash64 } from '../src/hash/city';
import { fnv1_32, fnv1_64, fnv1a_32, fnv1a_64 } from '../src/hash/fnv';
import { murmurhash3_128 } from '../src/hash/murmur3_128';
import { murmurhash3_32 } from '../src/hash/murmur3_32';

const ALGOS: Record<string, { fn: AnyHashFn; bits: number }> = {
  fnv1_32: { fn: fnv1_32, bits: 32 },
  fnv1a_32: { fn: fnv1a_32, bits: 32 },
  fnv1_64: { fn: fnv1_64, bits: 64 },
  fnv1a_64: { fn: fnv1a_64, bits: 64 },
  murmur3_32: { fn: (b) => murmurhash3_32(b, 0), bits: 32 },
  murmur3_128: { fn: (b) => murmurhash3_128(b, 0), bits: 128 },
  city64: { fn: cityHash64, bits: 64 },
};

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

function main() {
  const args = parseArgs(process.argv);
  const algo = ALGOS[args.algo ?? ''];
  if (!algo) {
    console.error(`Usage: tsx scripts/avalanche_png.ts --algo=<${Object.keys(ALGOS).join('|')}> --out=file.png [--bytes=8] [--trials=1000] [--seed=1]`);
    process.exit(2);
  }
  const outPath = args.out || 'avalanche.png';
  const inputBytes = Number.isFinite(Number(args.bytes)) ? Number(args.bytes) : 8;
  const trials = Number.isFinite(Number(args.trials)) ? Number(args.trials) : 1000;
  const seed = Number.isFinite(Number(args.seed)) ? Number(args.seed) : 1;

  const m = avalancheMatrix(algo.fn, { inputBytes, trials, seed, outputBits: algo.bits });
  fs.writeFileSync(outPath, renderAvalanchePng(m));
  console.log(`[avalanche] ${args.algo}: ${m.inputBits}x${m.outputBits} trials=${trials} worstBias=${worstBias(m).toFixed(4)} -> ${outPath}`);
}

main();
