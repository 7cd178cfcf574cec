// server/src/simulation/segmentProfile.ts

import type { EngineConfig } from './config.js';
import { gamePhaseShares } from './config.js';
import { clamp, recordOf, safeDivide } from './stats.js';
import { GAME_PHASES, SEASON_PHASES } from './types.js';
import type {
  GameInfo, GamePhase, ReconciliationMismatch, ReconciliationResult, ScoringEventRecord,
  SeasonPhase, SegmentProfile, SegmentStatLine, SegmentTotals, SegmentWarning, SkaterGameRow
} from './types.js';

const TOTAL_KEYS: Array<keyof SegmentTotals> = ['goals', 'assists', 'shots'];

/**
 * Map every game of a season to its season phase. Regular-season games are
 * ordered by date (game id breaks ties) and cut into thirds by count, with any
 * remainder landing in the late third. Playoff games are their own phase.
 */
export function buildSeasonPhaseMapping(games: readonly GameInfo[]): Map<number, SeasonPhase> {
  const mapping = new Map<number, SeasonPhase>();
  const regular = games
    .filter(g => g.gameType === 'regular')
    .sort((a, b) => a.date.localeCompare(b.date) || a.gameId - b.gameId);

  const third = Math.floor(regular.length / 3);
  regular.forEach((game, i) => {
    const phase: SeasonPhase = i < third ? 'early' : i < third * 2 ? 'mid' : 'late';
    mapping.set(game.gameId, phase);
  });

  for (const game of games) {
    if (game.gameType === 'playoff') mapping.set(game.gameId, 'playoffs');
  }
  return mapping;
}

/**
 * Season phase for a calendar date, judged against the same count-based
 * thirds. Dates after the last regular-season game fall in 'late' unless a
 * playoff game is scheduled on or before them.
 */
export function seasonPhaseForDate(games: readonly GameInfo[], date: string): SeasonPhase {
  const firstPlayoff = games
    .filter(g => g.gameType === 'playoff')
    .map(g => g.date)
    .sort()[0];
  if (firstPlayoff !== undefined && date >= firstPlayoff) return 'playoffs';

  const regular = games
    .filter(g => g.gameType === 'regular')
    .sort((a, b) => a.date.localeCompare(b.date) || a.gameId - b.gameId);
  if (regular.length === 0) return 'early';

  const third = Math.floor(regular.length / 3);
  const played = regular.filter(g => g.date < date).length;
  if (played < third) return 'early';
  if (played < third * 2) return 'mid';
  return 'late';
}

/**
 * Game phase from period and elapsed seconds in that period. Overtime periods
 * fold into 'late'. Returns null for times that cannot be placed.
 */
export function gamePhaseFor(period: number, periodSeconds: number, config: EngineConfig): GamePhase | null {
  const { midStartSeconds, lateStartSeconds, regulationSeconds } = config.gamePhases;
  const periodLength = regulationSeconds / 3;

  if (!Number.isInteger(period) || period < 1) return null;
  if (!Number.isFinite(periodSeconds) || periodSeconds < 0) return null;
  if (period >= 4) return 'late';
  if (periodSeconds > periodLength) return null;

  const gameSeconds = (period - 1) * periodLength + periodSeconds;
  if (gameSeconds < midStartSeconds) return 'early';
  if (gameSeconds < lateStartSeconds) return 'mid';
  return 'late';
}

function emptyLine(games: number): SegmentStatLine {
  return { games, goals: 0, assists: 0, shots: 0 };
}

export interface SegmentProfileInput {
  entityId: number;
  entityKind: 'player' | 'team';
  season: number;
  games: readonly GameInfo[];
  entityGameIds: readonly number[];
  events: readonly ScoringEventRecord[];
  // independently computed ground truth, e.g. summed per-game stat rows
  seasonTotals: SegmentTotals;
}

/** Sum per-game stat rows into season totals, independent of any event log. */
export function seasonTotalsFromRows(rows: readonly SkaterGameRow[]): SegmentTotals {
  return rows.reduce<SegmentTotals>(
    (acc, row) => ({
      goals: acc.goals + row.goals,
      assists: acc.assists + row.assists,
      shots: acc.shots + row.shots
    }),
    { goals: 0, assists: 0, shots: 0 }
  );
}

export function sumSegmentCells(cells: SegmentProfile['cells']): SegmentTotals {
  const totals: SegmentTotals = { goals: 0, assists: 0, shots: 0 };
  for (const seasonPhase of SEASON_PHASES) {
    for (const gamePhase of GAME_PHASES) {
      const cell = cells[seasonPhase][gamePhase];
      totals.goals += cell.goals;
      totals.assists += cell.assists;
      totals.shots += cell.shots;
    }
  }
  return totals;
}

/** Compare the cell sum against the ground truth. Mismatches are reported, never corrected. */
export function reconcileSegments(cells: SegmentProfile['cells'], seasonTotals: SegmentTotals): ReconciliationResult {
  const segmentTotals = sumSegmentCells(cells);
  const mismatches: ReconciliationMismatch[] = [];
  for (const stat of TOTAL_KEYS) {
    if (segmentTotals[stat] !== seasonTotals[stat]) {
      mismatches.push({ stat, segmentTotal: segmentTotals[stat], seasonTotal: seasonTotals[stat] });
    }
  }
  return { ok: mismatches.length === 0, segmentTotals, seasonTotals: { ...seasonTotals }, mismatches };
}

export function buildSegmentProfile(input: SegmentProfileInput, config: EngineConfig): SegmentProfile {
  const mapping = buildSeasonPhaseMapping(input.games);
  const entityGames = new Set(input.entityGameIds);

  const gamesByPhase = recordOf(SEASON_PHASES, () => 0);
  for (const gameId of entityGames) {
    const phase = mapping.get(gameId);
    if (phase) gamesByPhase[phase]++;
  }

  const cells = recordOf(SEASON_PHASES, seasonPhase =>
    recordOf(GAME_PHASES, () => emptyLine(gamesByPhase[seasonPhase]))
  );
  const warnings: SegmentWarning[] = [];

  for (const event of input.events) {
    const owner = input.entityKind === 'player' ? event.playerId : event.teamId;
    if (owner !== input.entityId) continue;

    const seasonPhase = mapping.get(event.gameId);
    const gamePhase = gamePhaseFor(event.period, event.periodSeconds, config);
    if (!seasonPhase || !gamePhase) {
      warnings.push({
        code: 'unassigned-event',
        message: `${event.kind} in game ${event.gameId} (period ${event.period}, ${event.periodSeconds}s) could not be placed in a segment`,
        gameId: event.gameId
      });
      continue;
    }

    const cell = cells[seasonPhase][gamePhase];
    if (event.kind === 'goal') cell.goals++;
    else if (event.kind === 'assist') cell.assists++;
    else cell.shots++;
  }

  const reconciliation = reconcileSegments(cells, input.seasonTotals);
  for (const mismatch of reconciliation.mismatches) {
    warnings.push({
      code: 'reconciliation-mismatch',
      message: `${mismatch.stat}: segments sum to ${mismatch.segmentTotal}, season total is ${mismatch.seasonTotal}`,
      mismatch
    });
  }

  return {
    entityId: input.entityId,
    season: input.season,
    gamesPlayed: entityGames.size,
    cells,
    reconciliation,
    warnings
  };
}

/** Goals and assists per game within one game phase, across every season phase. */
export function gamePhasePointsPerGame(profile: SegmentProfile, gamePhase: GamePhase): number {
  let points = 0;
  for (const seasonPhase of SEASON_PHASES) {
    const cell = profile.cells[seasonPhase][gamePhase];
    points += cell.goals + cell.assists;
  }
  return safeDivide(points, profile.gamesPlayed);
}

/**
 * Per game phase, the observed share of goals divided by that phase's share of
 * playing time, bounded by `segments.factorBound`. Uses the current season
 * phase when it has enough games, otherwise the whole season.
 */
export function segmentScoringFactors(
  profile: SegmentProfile,
  seasonPhase: SeasonPhase,
  config: EngineConfig
): Record<GamePhase, number> {
  const bound = config.segments.factorBound;
  const shares = gamePhaseShares(config);
  const useCurrent = profile.cells[seasonPhase].early.games >= config.segments.minCellGames;
  const phases: readonly SeasonPhase[] = useCurrent ? [seasonPhase] : SEASON_PHASES;

  const goals = recordOf(GAME_PHASES, gamePhase =>
    phases.reduce((sum, sp) => sum + profile.cells[sp][gamePhase].goals, 0)
  );
  const total = GAME_PHASES.reduce((sum, gp) => sum + goals[gp], 0);
  if (total === 0) return recordOf(GAME_PHASES, () => 1);

  return recordOf(GAME_PHASES, gamePhase =>
    clamp(safeDivide(goals[gamePhase] / total, shares[gamePhase], 1), 1 - bound, 1 + bound)
  );
}
