// server/src/simulation/adjustments.ts
// Situational multipliers. Each is centred on 1.0 and bounded on its own;
// the composite clamp lives in composeAdjustments.

import type { EngineConfig } from './config.js';
import { gamePhaseShares } from './config.js';
import { gamePhasePointsPerGame } from './segmentProfile.js';
import { clamp, mean, recordOf, safeDivide } from './stats.js';
import { NEUTRAL_ADJUSTMENTS, SIM_SEGMENTS } from './types.js';
import type {
  AdjustmentSet, MomentumReading, ScheduleContext, ScheduleEntry, SegmentProfile,
  SimSegment, SimulationFeatures, SkaterGameRow
} from './types.js';

const MS_PER_DAY = 86_400_000;

function dayNumber(date: string): number {
  const ms = Date.parse(`${date.slice(0, 10)}T00:00:00Z`);
  if (Number.isNaN(ms)) throw new Error(`Invalid date: ${date}`);
  return Math.round(ms / MS_PER_DAY);
}

// ---------------------------------------------------------------------------
// Schedule
// ---------------------------------------------------------------------------

/** Rest and load going into the game played on `date`. */
export function buildScheduleContext(schedule: readonly ScheduleEntry[], date: string): ScheduleContext {
  const today = dayNumber(date);
  const previous = schedule
    .map(entry => dayNumber(entry.date))
    .filter(day => day < today)
    .sort((a, b) => b - a);

  const last = previous[0];
  const dayDiff = last === undefined ? null : today - last;
  // the game being played counts toward the 7-day window
  const gamesInLast7Days = previous.filter(day => today - day < 7).length + 1;

  return {
    daysRest: dayDiff === null ? null : dayDiff - 1,
    isBackToBack: dayDiff === 1,
    gamesInLast7Days
  };
}

// ---------------------------------------------------------------------------
// Fatigue
// ---------------------------------------------------------------------------

/** 1.0 at full rest; never above 1 and never below 1 - bound. */
export function fatigueModifier(context: ScheduleContext, config: EngineConfig): number {
  const { bound, fatigue } = config.adjustments;
  let penalty = 0;

  if (context.isBackToBack || context.daysRest === 0) penalty += fatigue.backToBackPenalty;
  else if (context.daysRest === 1) penalty += fatigue.oneDayRestPenalty;

  penalty += Math.max(0, context.gamesInLast7Days - fatigue.loadThreshold) * fatigue.loadPenaltyPerGame;
  return clamp(1 - penalty, 1 - bound, 1);
}

// ---------------------------------------------------------------------------
// Momentum
// ---------------------------------------------------------------------------

const NEUTRAL_MOMENTUM: MomentumReading = {
  state: 'neutral',
  confidence: 0,
  deviation: 0,
  shootingDeviation: 0,
  recentGames: 0,
  modifier: 1
};

export interface SeasonScoringRates {
  pointsPerGame: number;
  shootingPct: number;
}

function relativeDeviation(recent: number, season: number): number {
  return season > 0 ? (recent - season) / season : 0;
}

/**
 * Hot/cold reading from the last `window` games played before `date`. The
 * state follows the points-per-game deviation from the season rate;
 * confidence grows with the window's fill and the mean magnitude of the
 * points and shooting-percentage deviations.
 */
export function classifyMomentum(
  rows: readonly SkaterGameRow[],
  date: string,
  season: SeasonScoringRates,
  config: EngineConfig
): MomentumReading {
  const m = config.adjustments.momentum;
  const recent = rows
    .filter(row => row.date < date)
    .sort((a, b) => b.date.localeCompare(a.date) || b.gameId - a.gameId)
    .slice(0, m.window);

  if (recent.length < m.minGames) {
    return { ...NEUTRAL_MOMENTUM, recentGames: recent.length };
  }

  const recentPpg = mean(recent.map(row => row.goals + row.assists));
  const recentShootingPct = safeDivide(
    recent.reduce((sum, row) => sum + row.goals, 0),
    recent.reduce((sum, row) => sum + row.shots, 0)
  );
  const deviation = relativeDeviation(recentPpg, season.pointsPerGame);
  const shootingDeviation = relativeDeviation(recentShootingPct, season.shootingPct);

  const sampleFactor = 0.5 + 0.5 * Math.min(1, recent.length / m.window);
  const magnitude = (Math.abs(deviation) + Math.abs(shootingDeviation)) / 2;
  const confidence = sampleFactor * Math.min(1, magnitude / m.magnitudeScale);

  const bound = config.adjustments.bound;
  const reading = { confidence, deviation, shootingDeviation, recentGames: recent.length };
  if (deviation >= m.hotThreshold) {
    const modifier = confidence >= m.highConfidence ? m.hotHigh : m.hotLow;
    return { ...reading, state: 'hot', modifier: clamp(modifier, 1 - bound, 1 + bound) };
  }
  if (deviation <= m.coldThreshold) {
    const modifier = confidence >= m.highConfidence ? m.coldHigh : m.coldLow;
    return { ...reading, state: 'cold', modifier: clamp(modifier, 1 - bound, 1 + bound) };
  }
  return { ...reading, state: 'neutral', modifier: 1 };
}

// ---------------------------------------------------------------------------
// Clutch
// ---------------------------------------------------------------------------

/**
 * Late-game points per game against what the season rate predicts for the
 * late phase's share of playing time.
 */
export function clutchModifier(profile: SegmentProfile, config: EngineConfig): number {
  const { bound, clutchSensitivity, minClutchGames } = config.adjustments;
  if (profile.gamesPlayed < minClutchGames) return 1;

  const totals = profile.reconciliation.segmentTotals;
  const seasonPpg = safeDivide(totals.goals + totals.assists, profile.gamesPlayed);
  const expectedLate = seasonPpg * gamePhaseShares(config).late;
  if (expectedLate <= 0) return 1;

  const observedLate = gamePhasePointsPerGame(profile, 'late');
  const deviation = (observedLate - expectedLate) / expectedLate;
  return clamp(1 + deviation * clutchSensitivity, 1 - bound, 1 + bound);
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export interface EntityModifiers {
  clutch: number;
  fatigue: number;
  momentum: number;
  synergy: number;
}

/**
 * Spread an entity's modifiers over the simulated segments. Clutch only acts
 * late and in overtime; disabled features stay at 1.
 */
export function segmentAdjustments(
  modifiers: EntityModifiers,
  features: SimulationFeatures
): Record<SimSegment, AdjustmentSet> {
  return recordOf(SIM_SEGMENTS, segment => {
    const closing = segment === 'late' || segment === 'overtime';
    return {
      clutch: features.clutch && closing ? modifiers.clutch : NEUTRAL_ADJUSTMENTS.clutch,
      fatigue: features.fatigue ? modifiers.fatigue : NEUTRAL_ADJUSTMENTS.fatigue,
      momentum: features.momentum ? modifiers.momentum : NEUTRAL_ADJUSTMENTS.momentum,
      synergy: features.synergy ? modifiers.synergy : NEUTRAL_ADJUSTMENTS.synergy
    };
  });
}

/**
 * Product of the set, applied in the fixed order clutch, fatigue, momentum,
 * synergy, and clamped to the configured composite range.
 */
export function composeAdjustments(set: AdjustmentSet, config: EngineConfig): number {
  let product = 1;
  product *= set.clutch;
  product *= set.fatigue;
  product *= set.momentum;
  product *= set.synergy;
  if (Number.isNaN(product)) product = 1;
  return clamp(product, config.adjustments.compositeMin, config.adjustments.compositeMax);
}
