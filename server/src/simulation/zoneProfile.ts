// server/src/simulation/zoneProfile.ts

import type { EngineConfig } from './config.js';
import { baselineZoneRate } from './config.js';
import { InsufficientDataError } from './errors.js';
import { recordOf, safeDivide } from './stats.js';
import { SHOT_TYPES, ZONES } from './types.js';
import type {
  ShotEventRecord, ShotType, Zone, ZoneProfile, ZoneProfileScope, ZoneStats
} from './types.js';

/**
 * Static, position-based zone lookup. Coordinates are mirrored onto the
 * attacking half (|x|) and tested against the configured rectangles in
 * priority order; anything inside none of them is 'other'.
 */
export function classifyZone(x: number | null, y: number | null, config: EngineConfig): Zone {
  if (x === null || y === null || !Number.isFinite(x) || !Number.isFinite(y)) return 'other';
  const ax = Math.abs(x);

  for (const zone of config.zones.priority) {
    if (zone === 'other') continue;
    const rect = config.zones.rects[zone];
    if (ax >= rect.xMin && ax <= rect.xMax && y >= rect.yMin && y <= rect.yMax) {
      return zone;
    }
  }
  return 'other';
}

export function zoneOfShot(shot: ShotEventRecord, config: EngineConfig): Zone {
  return shot.zone ?? classifyZone(shot.x, shot.y, config);
}

function emptyZoneStats(): ZoneStats {
  return {
    shots: 0,
    goals: 0,
    expectedGoals: 0,
    shotTypes: recordOf(SHOT_TYPES, () => 0),
    goalsByShotType: recordOf(SHOT_TYPES, () => 0)
  };
}

function inScope(shot: ShotEventRecord, scope: ZoneProfileScope): boolean {
  if (scope.opponentTeamId !== undefined) {
    const opponent = scope.perspective === 'for' ? shot.defendingTeamId : shot.shooterTeamId;
    if (opponent !== scope.opponentTeamId) return false;
  }

  switch (scope.entityKind) {
    case 'skater':
      return scope.perspective === 'for' && shot.shooterId === scope.entityId;
    case 'goalie':
      return scope.perspective === 'against' && shot.goalieId === scope.entityId;
    case 'team':
      return scope.perspective === 'for'
        ? shot.shooterTeamId === scope.entityId
        : shot.defendingTeamId === scope.entityId;
    case 'line':
      // line shots are pre-filtered by the caller; the id is a label only
      return true;
  }
}

/**
 * Aggregate a season's shot population into a per-zone profile for one scope.
 * The expected-goal value of each shot comes from the configured baseline
 * table, never from the data itself.
 */
export function buildZoneProfile(
  population: readonly ShotEventRecord[],
  scope: ZoneProfileScope,
  config: EngineConfig
): ZoneProfile {
  if (population.length === 0) {
    throw new InsufficientDataError(
      `No shot records exist for season ${scope.season}`,
      { entityId: scope.entityId, entityKind: scope.entityKind, season: scope.season, scope: describeScope(scope), reason: 'empty-population' }
    );
  }

  const zones = recordOf(ZONES, emptyZoneStats);
  let shots = 0;
  let goals = 0;
  let expectedGoals = 0;

  for (const shot of population) {
    if (!inScope(shot, scope)) continue;

    const zone = zoneOfShot(shot, config);
    const stats = zones[zone];
    const xg = config.baselineXg[zone][shot.shotType];

    stats.shots++;
    stats.shotTypes[shot.shotType]++;
    stats.expectedGoals += xg;
    if (shot.isGoal) {
      stats.goals++;
      stats.goalsByShotType[shot.shotType]++;
      goals++;
    }
    shots++;
    expectedGoals += xg;
  }

  if (shots === 0) {
    throw new InsufficientDataError(
      `${scope.entityKind} ${scope.entityId} has no shot records in ${describeScope(scope)}`,
      { entityId: scope.entityId, entityKind: scope.entityKind, season: scope.season, scope: describeScope(scope), reason: 'empty-scope' }
    );
  }

  return { scope, zones, totals: { shots, goals, expectedGoals } };
}

function describeScope(scope: ZoneProfileScope): string {
  const base = `season ${scope.season} (${scope.perspective})`;
  return scope.opponentTeamId !== undefined ? `${base} vs team ${scope.opponentTeamId}` : base;
}

// ---------------------------------------------------------------------------
// Derived views
// ---------------------------------------------------------------------------

export function zoneGoalRate(profile: ZoneProfile, zone: Zone): number {
  const stats = profile.zones[zone];
  return safeDivide(stats.goals, stats.shots);
}

export function zoneDistribution(profile: ZoneProfile): Array<{ value: Zone; weight: number }> {
  return ZONES
    .filter(zone => profile.zones[zone].shots > 0)
    .map(zone => ({ value: zone, weight: profile.zones[zone].shots / profile.totals.shots }));
}

export function shotTypeDistribution(profile: ZoneProfile, zone: Zone): Array<{ value: ShotType; weight: number }> {
  const stats = profile.zones[zone];
  return SHOT_TYPES
    .filter(type => stats.shotTypes[type] > 0)
    .map(type => ({ value: type, weight: stats.shotTypes[type] / stats.shots }));
}

export function goalsAboveExpected(profile: ZoneProfile): number {
  return profile.totals.goals - profile.totals.expectedGoals;
}

export function preferredZones(profile: ZoneProfile, count = 3): Zone[] {
  return ZONES
    .filter(zone => profile.zones[zone].shots > 0)
    .sort((a, b) => profile.zones[b].shots - profile.zones[a].shots || ZONES.indexOf(a) - ZONES.indexOf(b))
    .slice(0, count);
}

export function dangerBreakdown(profile: ZoneProfile, config: EngineConfig) {
  const out = {
    high: { shots: 0, goals: 0 },
    medium: { shots: 0, goals: 0 },
    low: { shots: 0, goals: 0 }
  };
  for (const zone of ZONES) {
    if (zone === 'other') continue;
    const level = config.zones.rects[zone].danger;
    out[level].shots += profile.zones[zone].shots;
    out[level].goals += profile.zones[zone].goals;
  }
  return out;
}

/**
 * Shrink each zone's observed goal rate toward the league baseline for that
 * zone, weighted by `priorShots` phantom attempts.
 */
export function shrunkZoneGoalRates(profile: ZoneProfile, config: EngineConfig): Record<Zone, number> {
  const k = config.simulation.zonePriorShots;
  return recordOf(ZONES, zone => {
    const stats = profile.zones[zone];
    const prior = baselineZoneRate(config, zone);
    return safeDivide(stats.goals + k * prior, stats.shots + k, prior);
  });
}
