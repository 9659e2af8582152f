//gamecore/utils/Rng.ts

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export class Rng implements RandomSource {
  private _state: number;

  constructor(seed: string | number = Date.now()) {
    if (typeof seed === "number") {
      this._state = (seed >>> 0) || 1;
    } else {
      this._state = Rng.hashString(seed);
    }
  }

  private static hashString(str: string): number {
    let h = 1779033703 ^ str.length;
    for (let i = 0; i < str.length; i++) {
      h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
      h = (h << 13) | (h >>> 19);
    }
    return (h >>> 0) || 1;
  }

  // mulberry32-style
  next(): number {
    let t = (this._state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/** Integer in [min, maxInclusive]. */
export function randomInt(rng: RandomSource, min: number, maxInclusive: number): number {
  if (maxInclusive <= min) return min;
  return min + Math.floor(rng.next() * (maxInclusive - min + 1));
}

export function pick<T>(rng: RandomSource, list: readonly T[]): T {
  if (list.length === 0) {
    throw new Error("pick called with empty list");
  }
  return list[randomInt(rng, 0, list.length - 1)];
}
