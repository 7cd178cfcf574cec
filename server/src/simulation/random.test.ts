import { describe, expect, it } from 'vitest';
import { deriveSeed, SeededRandom } from './random.js';

function draws(rng: SeededRandom, n: number): number[] {
  return Array.from({ length: n }, () => rng.random());
}

describe('SeededRandom', () => {
  it('repeats its stream for the same seed', () => {
    expect(draws(new SeededRandom(42), 20)).toEqual(draws(new SeededRandom(42), 20));
    expect(draws(new SeededRandom(43), 20)).not.toEqual(draws(new SeededRandom(42), 20));
  });

  it('stays in [0, 1)', () => {
    for (const value of draws(new SeededRandom(7), 5000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('draws Poisson counts around the rate', () => {
    const rng = new SeededRandom(11);
    const counts = Array.from({ length: 20_000 }, () => rng.poisson(3));
    const avg = counts.reduce((sum, c) => sum + c, 0) / counts.length;
    expect(avg).toBeGreaterThan(2.9);
    expect(avg).toBeLessThan(3.1);
  });

  it('returns zero for a non-positive or NaN rate', () => {
    const rng = new SeededRandom(1);
    expect(rng.poisson(0)).toBe(0);
    expect(rng.poisson(-2)).toBe(0);
    expect(rng.poisson(Number.NaN)).toBe(0);
  });

  it('never picks a zero-weight option', () => {
    const rng = new SeededRandom(5);
    const options = [{ value: 'a', weight: 0 }, { value: 'b', weight: 1 }, { value: 'c', weight: 3 }];
    const picks = Array.from({ length: 2000 }, () => rng.weightedChoice(options));
    expect(picks).not.toContain('a');
    const cShare = picks.filter(p => p === 'c').length / picks.length;
    expect(cShare).toBeGreaterThan(0.7);
    expect(cShare).toBeLessThan(0.8);
  });

  it('rejects an empty option list', () => {
    expect(() => new SeededRandom(1).weightedChoice([])).toThrow('weightedChoice called with no options');
  });

  it('shuffles into a new permutation', () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = new SeededRandom(9).shuffle(items);
    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });
});

describe('deriveSeed', () => {
  it('is a pure function of base seed and index', () => {
    expect(deriveSeed(42, 10)).toBe(deriveSeed(42, 10));
    const seeds = new Set(Array.from({ length: 1000 }, (_, i) => deriveSeed(42, i)));
    expect(seeds.size).toBe(1000);
  });

  it('yields unsigned 32-bit integers', () => {
    const seed = deriveSeed(0xFFFFFFFF, 123_456);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xFFFFFFFF);
  });
});
