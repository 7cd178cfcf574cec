// server/src/simulation/config.ts

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { recordOf } from './stats.js';
import { SHOT_TYPES, ZONES } from './types.js';
import type { GamePhase, ShotType, SimSegment, Zone } from './types.js';

export const DEFAULT_ENGINE_CONFIG_PATH = 'server/config/engine-config.json';

const probability = z.number().gt(0).lt(1);

function keyedBy<K extends string, T extends z.ZodTypeAny>(keys: readonly K[], schema: T) {
  return z.object(recordOf(keys, () => schema)).strict();
}

const RECT_ZONES = ZONES.filter((zone): zone is Exclude<Zone, 'other'> => zone !== 'other');

const zoneRectSchema = z.object({
  xMin: z.number(),
  xMax: z.number(),
  yMin: z.number(),
  yMax: z.number(),
  danger: z.enum(['high', 'medium', 'low'])
}).strict();

const engineConfigSchema = z.object({
  zones: z.object({
    priority: z.array(z.enum(ZONES)),
    rects: keyedBy(RECT_ZONES, zoneRectSchema)
  }).strict(),
  gamePhases: z.object({
    midStartSeconds: z.number().int(),
    lateStartSeconds: z.number().int(),
    regulationSeconds: z.number().int(),
    overtimeSeconds: z.number().int()
  }).strict(),
  baselineXg: keyedBy(ZONES, keyedBy(SHOT_TYPES, probability)),
  matchup: z.object({
    minGames: z.number().int(),
    fullConfidenceGames: z.number().int(),
    similarityScale: z.number().positive()
  }).strict(),
  adjustments: z.object({
    bound: probability,
    compositeMin: z.number().positive(),
    compositeMax: z.number().positive(),
    clutchSensitivity: z.number().nonnegative(),
    minClutchGames: z.number().int().nonnegative(),
    fatigue: z.object({
      backToBackPenalty: z.number().nonnegative(),
      oneDayRestPenalty: z.number().nonnegative(),
      loadThreshold: z.number().int().positive(),
      loadPenaltyPerGame: z.number().nonnegative()
    }).strict(),
    momentum: z.object({
      window: z.number().int().positive(),
      minGames: z.number().int().positive(),
      hotThreshold: z.number(),
      coldThreshold: z.number(),
      magnitudeScale: z.number().positive(),
      highConfidence: probability,
      hotLow: z.number().positive(),
      hotHigh: z.number().positive(),
      coldLow: z.number().positive(),
      coldHigh: z.number().positive()
    }).strict()
  }).strict(),
  synergy: z.object({
    minSharedToiSeconds: z.number().nonnegative(),
    leagueGoalsPer60: z.number().positive(),
    zScale: z.number().positive(),
    maxEffect: probability
  }).strict(),
  segments: z.object({
    factorBound: probability,
    minCellGames: z.number().int().nonnegative()
  }).strict(),
  simulation: z.object({
    leagueShotsPerGame: z.number().positive(),
    homeIceAdvantage: z.number().min(0).max(0.5),
    overtimePaceMultiplier: z.number().positive(),
    overtimePolicy: z.enum(['shootout', 'draw']),
    shootoutRounds: z.number().int().positive(),
    shootoutMaxRounds: z.number().int().positive(),
    shootoutGoalProbability: probability,
    probabilityFloor: probability,
    probabilityCeiling: probability,
    zonePriorShots: z.number().nonnegative(),
    goaliePriorShots: z.number().nonnegative(),
    finishingFactorMin: z.number().positive(),
    finishingFactorMax: z.number().positive(),
    minZoneShots: z.number().int().nonnegative(),
    yieldEvery: z.number().int().positive()
  }).strict()
}).strict();

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type ZoneRect = z.infer<typeof zoneRectSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function semanticIssues(config: EngineConfig): string[] {
  const issues: string[] = [];

  const seen = new Set<Zone>();
  for (const zone of config.zones.priority) {
    if (zone === 'other') issues.push('zones.priority: "other" is the fallback zone and cannot be listed');
    if (seen.has(zone)) issues.push(`zones.priority: ${zone} listed twice`);
    seen.add(zone);
  }
  for (const zone of RECT_ZONES) {
    if (!seen.has(zone)) issues.push(`zones.priority: ${zone} missing`);
    const rect = config.zones.rects[zone];
    if (rect.xMin >= rect.xMax) issues.push(`zones.rects.${zone}: xMin must be below xMax`);
    if (rect.yMin >= rect.yMax) issues.push(`zones.rects.${zone}: yMin must be below yMax`);
  }

  const { midStartSeconds, lateStartSeconds, regulationSeconds, overtimeSeconds } = config.gamePhases;
  if (!(midStartSeconds > 0 && midStartSeconds < lateStartSeconds && lateStartSeconds < regulationSeconds)) {
    issues.push('gamePhases: boundaries must satisfy 0 < midStartSeconds < lateStartSeconds < regulationSeconds');
  }
  if (overtimeSeconds <= 0) issues.push('gamePhases.overtimeSeconds: must be positive');

  if (config.matchup.minGames < 1) issues.push('matchup.minGames: must be at least 1');
  if (config.matchup.fullConfidenceGames <= config.matchup.minGames) {
    issues.push('matchup: fullConfidenceGames must be greater than minGames');
  }

  const adj = config.adjustments;
  if (adj.compositeMin > 1 || adj.compositeMax < 1) {
    issues.push('adjustments: composite bounds must bracket 1.0');
  }
  if (adj.momentum.minGames > adj.momentum.window) {
    issues.push('adjustments.momentum: minGames cannot exceed window');
  }
  if (!(adj.momentum.coldThreshold < 0 && adj.momentum.hotThreshold > 0)) {
    issues.push('adjustments.momentum: coldThreshold must be negative and hotThreshold positive');
  }

  const sim = config.simulation;
  if (sim.probabilityFloor >= sim.probabilityCeiling) {
    issues.push('simulation: probabilityFloor must be below probabilityCeiling');
  }
  if (sim.shootoutMaxRounds < sim.shootoutRounds) {
    issues.push('simulation: shootoutMaxRounds must be at least shootoutRounds');
  }
  if (sim.finishingFactorMin > 1 || sim.finishingFactorMax < 1) {
    issues.push('simulation: finishing factor bounds must bracket 1.0');
  }

  return issues;
}

/**
 * Validate an already-parsed configuration object. Throws ConfigurationError
 * listing every structural and semantic problem found.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Engine configuration is malformed', formatIssues(parsed.error));
  }
  const issues = semanticIssues(parsed.data);
  if (issues.length > 0) {
    throw new ConfigurationError('Engine configuration is inconsistent', issues);
  }
  return parsed.data;
}

export function loadEngineConfig(filePath = process.env.ENGINE_CONFIG ?? DEFAULT_ENGINE_CONFIG_PATH): EngineConfig {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Engine configuration not found at ${resolved}`, [`missing file ${resolved}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Engine configuration at ${resolved} is not valid JSON`, [message]);
  }
  return parseEngineConfig(raw);
}

// ---------------------------------------------------------------------------
// Derived lookups
// ---------------------------------------------------------------------------

export function baselineZoneRate(config: EngineConfig, zone: Zone): number {
  const row = config.baselineXg[zone];
  return SHOT_TYPES.reduce((sum, type) => sum + row[type], 0) / SHOT_TYPES.length;
}

export function baselineTypeRate(config: EngineConfig, shotType: ShotType): number {
  return ZONES.reduce((sum, zone) => sum + config.baselineXg[zone][shotType], 0) / ZONES.length;
}

export function leagueZoneSaveRate(config: EngineConfig, zone: Zone): number {
  return 1 - baselineZoneRate(config, zone);
}

export function leagueShotTypeSaveRate(config: EngineConfig, shotType: ShotType): number {
  return 1 - baselineTypeRate(config, shotType);
}

/** Share of regulation playing time covered by each game phase. */
export function gamePhaseShares(config: EngineConfig): Record<GamePhase, number> {
  const { midStartSeconds, lateStartSeconds, regulationSeconds } = config.gamePhases;
  return {
    early: midStartSeconds / regulationSeconds,
    mid: (lateStartSeconds - midStartSeconds) / regulationSeconds,
    late: (regulationSeconds - lateStartSeconds) / regulationSeconds
  };
}

/** Fraction of a full game's opportunity rate each simulated segment plays. */
export function segmentDurationShares(config: EngineConfig): Record<SimSegment, number> {
  const shares = gamePhaseShares(config);
  return {
    ...shares,
    overtime: config.gamePhases.overtimeSeconds / config.gamePhases.regulationSeconds
  };
}
