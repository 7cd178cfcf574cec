// server/src/simulation/random.ts
// All simulation randomness flows through SeededRandom so a run is a pure
// function of (seed, trial index, decision order).

export interface Weighted<T> {
  value: T;
  weight: number;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return function () {
    t = (t + 0x6D2B79F5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Counter-based sub-seed: trial `index` of a run seeded with `baseSeed`
 * always gets the same stream, whichever worker or batch plays it.
 */
export function deriveSeed(baseSeed: number, index: number): number {
  let z = (baseSeed ^ Math.imul(index + 1, 0x9E3779B9)) >>> 0;
  z = Math.imul(z ^ (z >>> 16), 0x85EBCA6B) >>> 0;
  z = Math.imul(z ^ (z >>> 13), 0xC2B2AE35) >>> 0;
  return (z ^ (z >>> 16)) >>> 0;
}

export function randomBaseSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}

export class SeededRandom {
  private readonly next: () => number;

  constructor(seed: number) {
    this.next = mulberry32(seed);
  }

  /** Float in [0, 1). */
  random(): number {
    return this.next();
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Knuth's multiplication method; fine for the per-segment rates used here. */
  poisson(lambda: number): number {
    if (!(lambda > 0)) return 0;
    const limit = Math.exp(-lambda);
    let k = 0;
    let p = 1;
    do {
      k++;
      p *= this.next();
    } while (p > limit);
    return k - 1;
  }

  weightedChoice<T>(options: ReadonlyArray<Weighted<T>>): T {
    if (options.length === 0) {
      throw new Error('weightedChoice called with no options');
    }
    let total = 0;
    for (const option of options) {
      if (option.weight > 0) total += option.weight;
    }
    if (total <= 0) return options[0].value;

    let roll = this.next() * total;
    for (const option of options) {
      if (option.weight <= 0) continue;
      roll -= option.weight;
      if (roll < 0) return option.value;
    }
    return options[options.length - 1].value;
  }

  /** Fisher-Yates, returns a new array. */
  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }
}
