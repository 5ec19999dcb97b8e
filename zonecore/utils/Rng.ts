// zonecore/utils/Rng.ts
//
// Seedable generator behind the crafting rolls. The same seed replays the
// same sequence of draws.

/** Anything that can feed the crafting rolls. */
export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Standard normal sample (mean 0, sigma 1). */
  gauss(): number;
}

// FNV-1a over UTF-16 code units
function hashSeed(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0 || 1;
}

export class Rng implements RandomSource {
  private state: number;
  private spare: number | null = null;

  constructor(seed: string | number) {
    this.state = typeof seed === "number" ? seed >>> 0 || 1 : hashSeed(seed);
  }

  // mulberry32
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Marsaglia polar method; every other call returns the cached second sample. */
  gauss(): number {
    if (this.spare !== null) {
      const value = this.spare;
      this.spare = null;
      return value;
    }

    let u = 0;
    let v = 0;
    let s = 0;
    do {
      u = this.next() * 2 - 1;
      v = this.next() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);

    const scale = Math.sqrt((-2 * Math.log(s)) / s);
    this.spare = v * scale;
    return u * scale;
  }
}
