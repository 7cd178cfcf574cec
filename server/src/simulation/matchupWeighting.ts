// server/src/simulation/matchupWeighting.ts

import type { EngineConfig } from './config.js';
import { InvalidProfileError } from './errors.js';
import { clamp, mean, recordOf, safeDivide, stdDev } from './stats.js';
import type {
  GeneralProfile, GoalieGameRow, GoalieRates, MatchupHistory, MatchupProfile,
  SkaterGameRow, SkaterRates
} from './types.js';

export const SKATER_RATE_KEYS = ['goalsPerGame', 'assistsPerGame', 'shotsPerGame', 'shootingPct'] as const;
export const GOALIE_RATE_KEYS = ['savePct', 'goalsAgainstAverage', 'shotsAgainstPerGame'] as const;

// ---------------------------------------------------------------------------
// Aggregation from per-game rows
// ---------------------------------------------------------------------------

function skaterRatesOf(rows: readonly SkaterGameRow[]): SkaterRates {
  const goals = rows.reduce((sum, r) => sum + r.goals, 0);
  const shots = rows.reduce((sum, r) => sum + r.shots, 0);
  return {
    goalsPerGame: mean(rows.map(r => r.goals)),
    assistsPerGame: mean(rows.map(r => r.assists)),
    shotsPerGame: mean(rows.map(r => r.shots)),
    shootingPct: safeDivide(goals, shots)
  };
}

function skaterSpreadOf(rows: readonly SkaterGameRow[]): SkaterRates {
  return {
    goalsPerGame: stdDev(rows.map(r => r.goals)),
    assistsPerGame: stdDev(rows.map(r => r.assists)),
    shotsPerGame: stdDev(rows.map(r => r.shots)),
    shootingPct: stdDev(rows.filter(r => r.shots > 0).map(r => r.goals / r.shots))
  };
}

function goalieRatesOf(rows: readonly GoalieGameRow[]): GoalieRates {
  const against = rows.reduce((sum, r) => sum + r.goalsAgainst, 0);
  const shots = rows.reduce((sum, r) => sum + r.shotsAgainst, 0);
  const seconds = rows.reduce((sum, r) => sum + r.timeOnIceSeconds, 0);
  return {
    savePct: shots > 0 ? 1 - against / shots : 0,
    goalsAgainstAverage: seconds > 0 ? (against * 3600) / seconds : mean(rows.map(r => r.goalsAgainst)),
    shotsAgainstPerGame: mean(rows.map(r => r.shotsAgainst))
  };
}

function goalieSpreadOf(rows: readonly GoalieGameRow[]): GoalieRates {
  return {
    savePct: stdDev(rows.filter(r => r.shotsAgainst > 0).map(r => 1 - r.goalsAgainst / r.shotsAgainst)),
    goalsAgainstAverage: stdDev(rows.map(r => r.goalsAgainst)),
    shotsAgainstPerGame: stdDev(rows.map(r => r.shotsAgainst))
  };
}

export function buildSkaterGeneralProfile(entityId: number, season: number, rows: readonly SkaterGameRow[]): GeneralProfile {
  return {
    kind: 'skater',
    entityId,
    season,
    gamesPlayed: rows.length,
    rates: skaterRatesOf(rows),
    stdDev: skaterSpreadOf(rows)
  };
}

export function buildGoalieGeneralProfile(entityId: number, season: number, rows: readonly GoalieGameRow[]): GeneralProfile {
  return {
    kind: 'goalie',
    entityId,
    season,
    gamesPlayed: rows.length,
    rates: goalieRatesOf(rows),
    stdDev: goalieSpreadOf(rows)
  };
}

/** Rows against one opponent; null when the two never met. */
export function buildSkaterMatchupHistory(rows: readonly SkaterGameRow[], opponentTeamId: number): MatchupHistory | null {
  const versus = rows.filter(r => r.opponentTeamId === opponentTeamId);
  if (versus.length === 0) return null;
  const shots = versus.reduce((sum, r) => sum + r.shots, 0);
  return { kind: 'skater', opponentTeamId, gamesPlayed: versus.length, shots, rates: skaterRatesOf(versus) };
}

export function buildGoalieMatchupHistory(rows: readonly GoalieGameRow[], opponentTeamId: number): MatchupHistory | null {
  const versus = rows.filter(r => r.opponentTeamId === opponentTeamId);
  if (versus.length === 0) return null;
  const shotsAgainst = versus.reduce((sum, r) => sum + r.shotsAgainst, 0);
  return { kind: 'goalie', opponentTeamId, gamesPlayed: versus.length, shotsAgainst, rates: goalieRatesOf(versus) };
}

// ---------------------------------------------------------------------------
// Weighting
// ---------------------------------------------------------------------------

/** 0 below the minimum sample, then linear up to 1 at the full-confidence count. */
export function sampleConfidence(sampleSize: number, config: EngineConfig): number {
  const { minGames, fullConfidenceGames } = config.matchup;
  if (sampleSize < minGames) return 0;
  return Math.min(1, sampleSize / fullConfidenceGames);
}

/** |matchup - general| / sd; zero when the spread is zero or undefined. */
export function statDeviation(matchupValue: number, generalValue: number, sd: number): number {
  if (!Number.isFinite(sd) || sd <= 0) return 0;
  const deviation = Math.abs(matchupValue - generalValue) / sd;
  return Number.isFinite(deviation) ? deviation : 0;
}

export function similarityScore(deviations: readonly number[], config: EngineConfig): number {
  if (deviations.length === 0) return 1;
  return clamp(1 - mean(deviations) / config.matchup.similarityScale, 0, 1);
}

export interface BlendWeights {
  similarityScore: number;
  sampleConfidence: number;
  matchupWeight: number;
  generalWeight: number;
}

export function blendWeights(deviations: readonly number[], sampleSize: number, config: EngineConfig): BlendWeights {
  const similarity = similarityScore(deviations, config);
  const confidence = sampleConfidence(sampleSize, config);
  const matchupWeight = (1 - similarity) * confidence;
  return {
    similarityScore: similarity,
    sampleConfidence: confidence,
    matchupWeight,
    generalWeight: 1 - matchupWeight
  };
}

/** Per-key blend; keys missing from the matchup side keep the general value. */
export function blendRates<K extends string>(
  general: Record<K, number>,
  matchup: Partial<Record<K, number>> | null,
  keys: readonly K[],
  matchupWeight: number
): Record<K, number> {
  return recordOf(keys, key => {
    const m = matchup?.[key];
    if (m === undefined || !Number.isFinite(m)) return general[key];
    return (1 - matchupWeight) * general[key] + matchupWeight * m;
  });
}

/**
 * `unmeasured` names rates the matchup sample cannot support (a percentage
 * over zero attempts). They stay out of the similarity mean and keep their
 * general value.
 */
function weigh<K extends string>(
  keys: readonly K[],
  general: Record<K, number>,
  spread: Record<K, number>,
  matchup: Record<K, number> | null,
  sampleSize: number,
  config: EngineConfig,
  unmeasured: readonly K[] = []
) {
  const measured = keys.filter(key => !unmeasured.includes(key));
  const deviations = recordOf(keys, key =>
    matchup && measured.includes(key) ? statDeviation(matchup[key], general[key], spread[key]) : 0
  );
  const weights = blendWeights(measured.map(key => deviations[key]), sampleSize, config);
  const mixed = blendRates(general, matchup, keys, weights.matchupWeight);
  return {
    deviations,
    weights,
    blended: recordOf(keys, key => (unmeasured.includes(key) ? general[key] : mixed[key]))
  };
}

function missingBaseline(
  general: GeneralProfile | null | undefined,
  kind: 'skater' | 'goalie',
  entityId: number,
  season: number
): InvalidProfileError {
  const message = general && general.gamesPlayed > 0
    ? `Expected a ${kind} baseline for entity ${entityId}, got ${general.kind}`
    : `No ${season} season baseline exists for ${kind} ${entityId}`;
  return new InvalidProfileError(message, { entityId, entityKind: kind, season, scope: 'general' });
}

export function weighSkaterMatchup(
  entityId: number,
  season: number,
  opponentTeamId: number,
  general: GeneralProfile | null | undefined,
  history: MatchupHistory | null,
  config: EngineConfig
): MatchupProfile<SkaterRates> {
  if (!general || general.gamesPlayed === 0 || general.kind !== 'skater') {
    throw missingBaseline(general, 'skater', entityId, season);
  }
  const base = general;
  const versus = history?.kind === 'skater' ? history : null;
  const matchup = versus?.rates ?? null;
  const sampleSize = history?.gamesPlayed ?? 0;
  const unmeasured = versus && versus.shots === 0 ? (['shootingPct'] as const) : [];
  const { deviations, weights, blended } = weigh(
    SKATER_RATE_KEYS, base.rates, base.stdDev, matchup, sampleSize, config, unmeasured
  );

  return {
    kind: 'skater',
    entityId,
    opponentTeamId,
    season,
    sampleSize,
    general: base.rates,
    matchup,
    deviations,
    ...weights,
    blended
  };
}

export function weighGoalieMatchup(
  entityId: number,
  season: number,
  opponentTeamId: number,
  general: GeneralProfile | null | undefined,
  history: MatchupHistory | null,
  config: EngineConfig
): MatchupProfile<GoalieRates> {
  if (!general || general.gamesPlayed === 0 || general.kind !== 'goalie') {
    throw missingBaseline(general, 'goalie', entityId, season);
  }
  const base = general;
  const versus = history?.kind === 'goalie' ? history : null;
  const matchup = versus?.rates ?? null;
  const sampleSize = history?.gamesPlayed ?? 0;
  const unmeasured = versus && versus.shotsAgainst === 0 ? (['savePct'] as const) : [];
  const { deviations, weights, blended } = weigh(
    GOALIE_RATE_KEYS, base.rates, base.stdDev, matchup, sampleSize, config, unmeasured
  );

  return {
    kind: 'goalie',
    entityId,
    opponentTeamId,
    season,
    sampleSize,
    general: base.rates,
    matchup,
    deviations,
    ...weights,
    blended
  };
}
