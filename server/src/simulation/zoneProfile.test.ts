import { describe, expect, it } from 'vitest';
import { InsufficientDataError } from './errors.js';
import { baselineZoneRate } from './config.js';
import {
  buildZoneProfile, classifyZone, dangerBreakdown, goalsAboveExpected, preferredZones,
  shotTypeDistribution, shrunkZoneGoalRates, zoneDistribution, zoneGoalRate
} from './zoneProfile.js';
import { shot, testConfig } from '../test/fixtures.js';
import type { ShotEventRecord, ZoneProfileScope } from './types.js';

const config = testConfig();
const skaterScope: ZoneProfileScope = { entityId: 101, entityKind: 'skater', season: 2024, perspective: 'for' };

function slotShots(count: number, goals: number, overrides: Partial<ShotEventRecord> = {}): ShotEventRecord[] {
  return Array.from({ length: count }, (_, i) => shot({ x: 75, y: 0, isGoal: i < goals, ...overrides }));
}

describe('classifyZone', () => {
  it.each([
    [86, 0, 'crease'],
    [89, 4, 'crease'],
    [80, 8, 'inner_slot'],
    [70, -20, 'slot'],
    [60, 0, 'high_slot'],
    [60, -20, 'left_circle'],
    [60, 12, 'right_circle'],
    [80, -30, 'left_wing'],
    [80, 30, 'right_wing'],
    [30, -10, 'left_point'],
    [30, 0, 'left_point'],
    [50, 40, 'right_point'],
    [95, 0, 'behind_net'],
    [10, 5, 'neutral_zone'],
    [110, 0, 'other']
  ] as const)('places (%d, %d) in %s', (x, y, zone) => {
    expect(classifyZone(x, y, config)).toBe(zone);
  });

  it('mirrors the defending half onto the attacking half', () => {
    expect(classifyZone(-86, 0, config)).toBe('crease');
    expect(classifyZone(-60, -20, config)).toBe('left_circle');
  });

  it('treats missing coordinates as other', () => {
    expect(classifyZone(null, 0, config)).toBe('other');
    expect(classifyZone(50, null, config)).toBe('other');
    expect(classifyZone(Number.NaN, 0, config)).toBe('other');
  });
});

describe('buildZoneProfile', () => {
  it('reports the observed goal rate of a zone', () => {
    const profile = buildZoneProfile(slotShots(100, 12), skaterScope, config);
    expect(zoneGoalRate(profile, 'slot')).toBe(0.12);
    expect(profile.totals).toMatchObject({ shots: 100, goals: 12 });
  });

  it('prefers a pre-classified zone over coordinates', () => {
    const profile = buildZoneProfile([shot({ x: 75, y: 0, zone: 'behind_net' })], skaterScope, config);
    expect(profile.zones.behind_net.shots).toBe(1);
    expect(profile.zones.slot.shots).toBe(0);
  });

  it('counts only the scoped entity', () => {
    const population = [...slotShots(4, 1), ...slotShots(6, 3, { shooterId: 102 })];
    const profile = buildZoneProfile(population, skaterScope, config);
    expect(profile.totals.shots).toBe(4);
    expect(profile.totals.goals).toBe(1);
  });

  it('builds a goalie profile from shots faced', () => {
    const population = [...slotShots(5, 2), ...slotShots(3, 0, { goalieId: 309 })];
    const profile = buildZoneProfile(
      population,
      { entityId: 209, entityKind: 'goalie', season: 2024, perspective: 'against' },
      config
    );
    expect(profile.totals.shots).toBe(5);
    expect(profile.totals.goals).toBe(2);
  });

  it('filters by opponent when asked', () => {
    const population = [...slotShots(4, 0), ...slotShots(2, 1, { defendingTeamId: 3 })];
    const profile = buildZoneProfile(population, { ...skaterScope, opponentTeamId: 3 }, config);
    expect(profile.totals.shots).toBe(2);
  });

  it('fails with empty-population when the season has no shots', () => {
    expect(() => buildZoneProfile([], skaterScope, config)).toThrow(InsufficientDataError);
    try {
      buildZoneProfile([], skaterScope, config);
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientDataError);
      if (error instanceof InsufficientDataError) expect(error.details.reason).toBe('empty-population');
    }
  });

  it('fails with empty-scope when the entity never shot', () => {
    try {
      buildZoneProfile(slotShots(3, 0, { shooterId: 102 }), skaterScope, config);
      expect.unreachable('expected InsufficientDataError');
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientDataError);
      if (error instanceof InsufficientDataError) {
        expect(error.details).toMatchObject({ entityId: 101, reason: 'empty-scope' });
      }
    }
  });
});

describe('derived views', () => {
  const population = [
    ...slotShots(6, 2),
    ...slotShots(3, 1, { x: 86, y: 0, shotType: 'tip-in' }),
    ...slotShots(1, 0, { x: 30, y: -10, shotType: 'slap' })
  ];
  const profile = buildZoneProfile(population, skaterScope, config);

  it('distributes shots across zones', () => {
    expect(zoneDistribution(profile)).toEqual([
      { value: 'crease', weight: 0.3 },
      { value: 'slot', weight: 0.6 },
      { value: 'left_point', weight: 0.1 }
    ]);
  });

  it('distributes shot types within a zone', () => {
    expect(shotTypeDistribution(profile, 'crease')).toEqual([{ value: 'tip-in', weight: 1 }]);
  });

  it('ranks preferred zones by volume', () => {
    expect(preferredZones(profile)).toEqual(['slot', 'crease', 'left_point']);
    expect(preferredZones(profile, 1)).toEqual(['slot']);
  });

  it('measures goals against the baseline table', () => {
    const expected = 6 * config.baselineXg.slot.wrist + 3 * config.baselineXg.crease['tip-in'] + config.baselineXg.left_point.slap;
    expect(goalsAboveExpected(profile)).toBeCloseTo(3 - expected, 10);
  });

  it('groups zones by danger', () => {
    expect(dangerBreakdown(profile, config)).toEqual({
      high: { shots: 9, goals: 3 },
      medium: { shots: 0, goals: 0 },
      low: { shots: 1, goals: 0 }
    });
  });

  it('shrinks sparse zones toward the league rate', () => {
    const rates = shrunkZoneGoalRates(profile, config);
    expect(rates.behind_net).toBeCloseTo(baselineZoneRate(config, 'behind_net'), 12);
    const k = config.simulation.zonePriorShots;
    expect(rates.slot).toBeCloseTo((2 + k * baselineZoneRate(config, 'slot')) / (6 + k), 12);
  });
});
