import { describe, expect, it, vi } from 'vitest';
import { ProfileCache } from './profileCache.js';
import { SynergyMatrix } from './synergy.js';
import type { GeneralProfile } from './types.js';

function general(season: number): GeneralProfile {
  const rates = { goalsPerGame: 0.3, assistsPerGame: 0.4, shotsPerGame: 2.5, shootingPct: 0.12 };
  return { kind: 'skater', entityId: 101, season, gamesPlayed: 20, rates, stdDev: rates };
}

describe('ProfileCache', () => {
  it('builds once per key and season', () => {
    const cache = new ProfileCache();
    const build = vi.fn(() => general(2024));

    const first = cache.generalProfile('skater:101:2025-01-01', 2024, build);
    const second = cache.generalProfile('skater:101:2025-01-01', 2024, build);

    expect(second).toBe(first);
    expect(build).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, evictions: 0, entries: 1 });
  });

  it('keeps seasons apart', () => {
    const cache = new ProfileCache();
    const build = vi.fn((season: number) => general(season));
    cache.generalProfile('skater:101', 2023, () => build(2023));
    cache.generalProfile('skater:101', 2024, () => build(2024));
    expect(build).toHaveBeenCalledTimes(2);
  });

  it('invalidates only the given season', () => {
    const cache = new ProfileCache();
    cache.generalProfile('skater:101', 2023, () => general(2023));
    cache.generalProfile('skater:101', 2024, () => general(2024));
    cache.synergyMatrix('team:1', 2024, () => new SynergyMatrix());

    expect(cache.invalidateSeason(2024)).toBe(2);
    expect(cache.stats().entries).toBe(1);

    const rebuild = vi.fn(() => general(2024));
    cache.generalProfile('skater:101', 2024, rebuild);
    expect(rebuild).toHaveBeenCalledTimes(1);
  });

  it('evicts the least recently used entry once a kind is full', () => {
    const cache = new ProfileCache({ maxEntries: 2 });
    cache.generalProfile('skater:101@2024-11-01', 2024, () => general(2024));
    cache.generalProfile('skater:101@2024-11-02', 2024, () => general(2024));
    // touching the first entry leaves the second as the oldest
    cache.generalProfile('skater:101@2024-11-01', 2024, () => general(2024));
    cache.generalProfile('skater:101@2024-11-03', 2024, () => general(2024));

    expect(cache.stats()).toEqual({ hits: 1, misses: 3, evictions: 1, entries: 2 });

    const kept = vi.fn(() => general(2024));
    cache.generalProfile('skater:101@2024-11-01', 2024, kept);
    expect(kept).not.toHaveBeenCalled();

    const evicted = vi.fn(() => general(2024));
    cache.generalProfile('skater:101@2024-11-02', 2024, evicted);
    expect(evicted).toHaveBeenCalledTimes(1);
  });

  it('stays bounded across many request dates', () => {
    const cache = new ProfileCache({ maxEntries: 10 });
    for (let day = 0; day < 500; day++) {
      cache.generalProfile(`skater:101@${day}`, 2024, () => general(2024));
      cache.synergyMatrix(`team:1@${day}`, 2024, () => new SynergyMatrix());
    }
    expect(cache.stats().entries).toBe(20);
    expect(cache.stats().evictions).toBe(980);
  });

  it('rejects a non-positive bound', () => {
    expect(() => new ProfileCache({ maxEntries: 0 })).toThrow(RangeError);
  });

  it('clears everything', () => {
    const cache = new ProfileCache();
    cache.generalProfile('skater:101', 2024, () => general(2024));
    cache.synergyMatrix('team:1', 2024, () => new SynergyMatrix());
    cache.clear();
    expect(cache.stats().entries).toBe(0);
  });
});
