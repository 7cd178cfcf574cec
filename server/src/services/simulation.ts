// server/src/services/simulation.ts
// Single entry point: two teams, a season/date context and a run config in,
// a SimulationResult out. All loading and profile building happens before
// the first trial.

import { z } from 'zod';
import type { EngineConfig } from '../simulation/config.js';
import { MonteCarloEngine } from '../simulation/engine.js';
import type { MatchupContext, RunOptions } from '../simulation/engine.js';
import { ConfigurationError, InvalidProfileError, NotFoundError } from '../simulation/errors.js';
import { ProfileCache } from '../simulation/profileCache.js';
import type { SimulationResult } from '../simulation/result.js';
import { calendarDate, parseSimulationConfig } from '../simulation/simulationConfig.js';
import { buildTeamContext } from '../simulation/teamContext.js';
import type { TeamInputs } from '../simulation/teamContext.js';
import type { GameInfo, ShotEventRecord, SimulationConfig } from '../simulation/types.js';
import type { HistoricalDataSource, TeamSummary } from './dataSource.js';

export interface MatchupRequest {
  season: number;
  date: string; // YYYY-MM-DD; only games before this date feed the profiles
  config: SimulationConfig;
}

const requestContextSchema = z.object({
  season: z.number().int().min(1900).max(3000),
  date: calendarDate
}).passthrough();

/**
 * Validate a request body of `{ season, date, ...runConfig }`. Everything
 * besides the season/date context is the run configuration.
 */
export function parseMatchupRequest(body: unknown): MatchupRequest {
  const parsed = requestContextSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Simulation request is invalid',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }
  const { season, date, ...rest } = parsed.data;
  return { season, date, config: parseSimulationConfig(rest) };
}

export interface SimulateOptions extends RunOptions {
  cache?: ProfileCache;
}

export interface PreparedMatchup {
  context: MatchupContext;
  home: TeamSummary;
  away: TeamSummary;
}

async function loadTeamInputs(
  source: HistoricalDataSource,
  team: TeamSummary,
  opponent: TeamSummary,
  request: MatchupRequest,
  games: GameInfo[],
  shots: ShotEventRecord[],
  playedBefore: Set<number>
): Promise<TeamInputs> {
  const { season, date } = request;
  const lineup = await source.getLineup(team.teamId);
  if (lineup.goalieId === null) {
    throw new InvalidProfileError(
      `${team.abbr} has no starting goalie assigned`,
      { entityId: team.teamId, entityKind: 'team', season, scope: 'lineup' }
    );
  }

  const skaterIds = [...new Set(lineup.lines.flatMap(line => line.playerIds))];
  const [skaterRows, goalieRows, scoringEvents, sharedIce, schedule] = await Promise.all([
    source.getSkaterGameRows(season, skaterIds),
    source.getGoalieGameRows(season, [lineup.goalieId]),
    source.getScoringEvents(season, skaterIds),
    source.getSharedIce(season, team.teamId),
    source.getTeamSchedule(team.teamId, season)
  ]);

  return {
    teamId: team.teamId,
    opponentTeamId: opponent.teamId,
    season,
    date,
    lines: lineup.lines,
    goalieId: lineup.goalieId,
    games,
    shots,
    scoringEvents: scoringEvents.filter(e => playedBefore.has(e.gameId)),
    skaterRows: skaterRows.filter(r => playedBefore.has(r.gameId)),
    goalieRows: goalieRows.filter(r => playedBefore.has(r.gameId)),
    sharedIce: sharedIce.filter(p => playedBefore.has(p.gameId)),
    schedule: schedule.filter(s => s.date < date)
  };
}

/** Load and resolve both teams. Every profile error surfaces here. */
export async function prepareMatchup(
  source: HistoricalDataSource,
  request: MatchupRequest,
  engineConfig: EngineConfig,
  cache: ProfileCache = new ProfileCache()
): Promise<PreparedMatchup> {
  const { homeTeamId, awayTeamId } = request.config;
  const [home, away] = await Promise.all([source.getTeam(homeTeamId), source.getTeam(awayTeamId)]);
  if (!home) throw new NotFoundError('team', homeTeamId);
  if (!away) throw new NotFoundError('team', awayTeamId);

  const [games, allShots] = await Promise.all([
    source.getSeasonGames(request.season),
    source.getShotEvents(request.season)
  ]);
  const playedBefore = new Set(games.filter(g => g.date < request.date).map(g => g.gameId));
  const shots = allShots.filter(s => playedBefore.has(s.gameId));

  const [homeInputs, awayInputs] = await Promise.all([
    loadTeamInputs(source, home, away, request, games, shots, playedBefore),
    loadTeamInputs(source, away, home, request, games, shots, playedBefore)
  ]);

  const features = request.config.features;
  const context: MatchupContext = {
    home: buildTeamContext(homeInputs, features, engineConfig, cache),
    away: buildTeamContext(awayInputs, features, engineConfig, cache),
    season: request.season,
    date: request.date
  };

  for (const [team, ctx] of [[home, context.home], [away, context.away]] as const) {
    const q = ctx.quality;
    if (q.segmentWarnings > 0 || q.sparseZoneProfiles.length > 0) {
      console.warn(
        `${team.abbr}: ${q.segmentWarnings} segment warnings, ` +
        `${q.sparseZoneProfiles.length}/${q.entities - 1} skaters with sparse zone data, ` +
        `${q.lowMatchupSample.length}/${q.entities} entities with thin matchup history`
      );
    }
  }

  return { context, home, away };
}

export interface RunReport {
  stdout: string; // the result alone, so `--json` output stays parseable
  stderr: string; // progress and timing
}

export function renderRunReport(
  result: SimulationResult,
  options: { json: boolean; elapsedMs: number; homeName?: string; awayName?: string }
): RunReport {
  return {
    stdout: options.json
      ? JSON.stringify(result.toJSON(), null, 2)
      : result.renderSummary(options.homeName, options.awayName),
    stderr: `Finished ${result.iterations} trials in ${options.elapsedMs}ms`
  };
}

export async function simulateMatchup(
  source: HistoricalDataSource,
  request: MatchupRequest,
  engineConfig: EngineConfig,
  options: SimulateOptions = {}
): Promise<SimulationResult> {
  const { context } = await prepareMatchup(source, request, engineConfig, options.cache);
  const engine = new MonteCarloEngine(context, request.config, engineConfig);
  return engine.run({ signal: options.signal, onProgress: options.onProgress });
}
