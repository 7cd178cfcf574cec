// server/src/simulation/profileCache.ts

import type { SynergyMatrix } from './synergy.js';
import type { GeneralProfile, SegmentProfile, ZoneProfile } from './types.js';

interface Entry<T> {
  season: number;
  value: T;
}

export interface ProfileCacheOptions {
  // per profile kind; the least recently used entry goes first
  maxEntries?: number;
}

export const DEFAULT_MAX_ENTRIES = 5000;

/**
 * Derived profiles keyed by (kind, scope key, season). Entries live until the
 * season they were built from is invalidated after new data is ingested, or
 * until they are the least recently used once a kind reaches `maxEntries`.
 */
export class ProfileCache {
  private readonly maxEntries: number;
  private readonly zones = new Map<string, Entry<ZoneProfile>>();
  private readonly segments = new Map<string, Entry<SegmentProfile>>();
  private readonly generals = new Map<string, Entry<GeneralProfile>>();
  private readonly synergies = new Map<string, Entry<SynergyMatrix>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ProfileCacheOptions = {}) {
    const max = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(max) || max < 1) throw new RangeError(`maxEntries must be a positive integer, got ${max}`);
    this.maxEntries = max;
  }

  private memo<T>(store: Map<string, Entry<T>>, key: string, season: number, build: () => T): T {
    const id = `${season}:${key}`;
    const cached = store.get(id);
    if (cached) {
      this.hits++;
      // Map keeps insertion order: re-inserting marks the entry most recent
      store.delete(id);
      store.set(id, cached);
      return cached.value;
    }
    this.misses++;
    const value = build();
    store.set(id, { season, value });
    while (store.size > this.maxEntries) {
      const oldest = store.keys().next();
      if (oldest.done) break;
      store.delete(oldest.value);
      this.evictions++;
    }
    return value;
  }

  zoneProfile(key: string, season: number, build: () => ZoneProfile): ZoneProfile {
    return this.memo(this.zones, key, season, build);
  }

  segmentProfile(key: string, season: number, build: () => SegmentProfile): SegmentProfile {
    return this.memo(this.segments, key, season, build);
  }

  generalProfile(key: string, season: number, build: () => GeneralProfile): GeneralProfile {
    return this.memo(this.generals, key, season, build);
  }

  synergyMatrix(key: string, season: number, build: () => SynergyMatrix): SynergyMatrix {
    return this.memo(this.synergies, key, season, build);
  }

  /** Drop every entry built from `season`; returns how many were removed. */
  invalidateSeason(season: number): number {
    const stores: Array<Map<string, Entry<unknown>>> = [this.zones, this.segments, this.generals, this.synergies];
    let removed = 0;
    for (const store of stores) {
      for (const [id, entry] of store) {
        if (entry.season === season) {
          store.delete(id);
          removed++;
        }
      }
    }
    return removed;
  }

  clear(): void {
    this.zones.clear();
    this.segments.clear();
    this.generals.clear();
    this.synergies.clear();
  }

  stats() {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      entries: this.zones.size + this.segments.size + this.generals.size + this.synergies.size
    };
  }
}
