// server/src/simulation/expectedGoals.ts

import type { EngineConfig } from './config.js';
import { baselineZoneRate, leagueShotTypeSaveRate, leagueZoneSaveRate } from './config.js';
import { composeAdjustments } from './adjustments.js';
import { clamp, safeDivide } from './stats.js';
import type { AdjustmentSet, ResolvedGoalie, ResolvedShooter, ShotType, Zone } from './types.js';

/** Goalie multiplier for one zone and shot type: goals allowed per shot against the league. */
export function goalieFactor(goalie: ResolvedGoalie, zone: Zone, shotType: ShotType, config: EngineConfig): number {
  const zoneFactor = safeDivide(1 - goalie.zoneSaveRates[zone], 1 - leagueZoneSaveRate(config, zone), 1);
  const typeFactor = safeDivide(1 - goalie.shotTypeSaveRates[shotType], 1 - leagueShotTypeSaveRate(config, shotType), 1);
  return zoneFactor * typeFactor;
}

/** Shooter's blended goal rate for the zone, scaled by how the shot type plays there. */
export function shooterBaseRate(shooter: ResolvedShooter, zone: Zone, shotType: ShotType, config: EngineConfig): number {
  const typeFactor = safeDivide(config.baselineXg[zone][shotType], baselineZoneRate(config, zone), 1);
  return shooter.zoneGoalRates[zone] * typeFactor * shooter.finishingFactor;
}

/**
 * Goal probability for one attempt. Order is fixed: shooter base rate, goalie
 * strength, then the adjustment product (clutch, fatigue, momentum, synergy),
 * and finally the clamp to [probabilityFloor, probabilityCeiling].
 */
export function resolveGoalProbability(
  shooter: ResolvedShooter,
  zone: Zone,
  shotType: ShotType,
  goalie: ResolvedGoalie,
  adjustments: AdjustmentSet,
  config: EngineConfig
): number {
  const { probabilityFloor, probabilityCeiling } = config.simulation;

  let p = shooterBaseRate(shooter, zone, shotType, config);
  p *= goalieFactor(goalie, zone, shotType, config);
  p *= composeAdjustments(adjustments, config);

  if (Number.isNaN(p)) return probabilityFloor;
  return clamp(p, probabilityFloor, probabilityCeiling);
}
