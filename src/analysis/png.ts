import { PNG } from 'pngjs';
import type { AvalancheMatrix } from './avalanche';

// One pixel per (input bit, output bit): rows are input bits, columns output
// bits, grey level round(p * 255). A good hash renders as flat mid grey.
export function avalancheToPng(m: AvalancheMatrix): PNG {
  const png = new PNG({ width: m.outputBits, height: m.inputBits });
  for (let y = 0; y < m.inputBits; y++) {
    for (let x = 0; x < m.outputBits; x++) {
      const v = Math.round(m.probabilities[y * m.outputBits + x] * 255);
      const o = (y * m.outputBits + x) * 4;
      png.data[o] = v;
      png.data[o + 1] = v;
      png.data[o + 2] = v;
      png.data[o + 3] = 255;
    }
  }
  return png;
}

export function renderAvalanchePng(m: AvalancheMatrix): Buffer {
  return PNG.sync.write(avalancheToPng(m));
}
