// server/src/services/ingest.ts
// Writes a parsed CSV export into the database and drops cached profiles for
// every season it touched.

import {
  Game, GoalieGameStat, Player, PlayerGameStat, ScoringEvent, SharedIceStat, ShotEvent, Team, TeamLine
} from '../models/index.js';
import type { ProfileCache } from '../simulation/profileCache.js';
import type { HistoricalDataset } from './csvData.js';

const BATCH_SIZE = 500;

export interface IngestSummary {
  counts: Record<keyof HistoricalDataset, number>;
  seasons: number[];
}

async function inBatches<T>(label: string, rows: T[], write: (batch: T[]) => Promise<unknown>): Promise<number> {
  if (rows.length === 0) {
    console.log(`No ${label} to import`);
    return 0;
  }
  console.log(`Updating ${rows.length} ${label}...`);
  for (let i = 0; i < rows.length; i += BATCH_SIZE) {
    await write(rows.slice(i, i + BATCH_SIZE));
  }
  console.log(`Updated ${rows.length} ${label}`);
  return rows.length;
}

function seasonsOf(data: HistoricalDataset): number[] {
  const seasons = new Set<number>();
  for (const table of [data.games, data.skaterStats, data.goalieStats, data.shots, data.scoringEvents, data.sharedIce]) {
    for (const row of table) seasons.add(row.season);
  }
  return [...seasons].sort((a, b) => a - b);
}

export async function ingestDataset(data: HistoricalDataset, cache?: ProfileCache): Promise<IngestSummary> {
  const seasons = seasonsOf(data);

  const teams = await inBatches('teams', data.teams, batch =>
    Team.bulkCreate(
      batch.map(t => ({ ...t, leagueId: null, conferenceId: null, divisionId: null })),
      { updateOnDuplicate: ['name', 'nickname', 'abbr'] }
    )
  );

  const players = await inBatches('players', data.players, batch =>
    Player.bulkCreate(batch, {
      updateOnDuplicate: ['teamId', 'firstName', 'lastName', 'position', 'shoots', 'dateOfBirth', 'retired']
    })
  );

  const games = await inBatches('games', data.games, batch =>
    Game.bulkCreate(batch, {
      updateOnDuplicate: ['season', 'date', 'gameType', 'homeTeamId', 'awayTeamId', 'homeScore', 'awayScore', 'overtime', 'shootout']
    })
  );

  const skaterStats = await inBatches('skater game stats', data.skaterStats, batch =>
    PlayerGameStat.bulkCreate(batch, {
      updateOnDuplicate: ['season', 'teamId', 'opponentTeamId', 'goals', 'assists', 'shotsOnGoal', 'timeOnIce']
    })
  );

  const goalieStats = await inBatches('goalie game stats', data.goalieStats, batch =>
    GoalieGameStat.bulkCreate(batch, {
      updateOnDuplicate: ['season', 'teamId', 'opponentTeamId', 'shotsAgainst', 'goalsAgainst', 'timeOnIce', 'decision']
    })
  );

  // event tables have no natural key: replace the imported games' events wholesale
  const shotGames = [...new Set(data.shots.map(s => s.gameId))];
  if (shotGames.length > 0) await ShotEvent.destroy({ where: { gameId: shotGames } });
  const shots = await inBatches('shot events', data.shots, batch => ShotEvent.bulkCreate(batch));

  const eventGames = [...new Set(data.scoringEvents.map(e => e.gameId))];
  if (eventGames.length > 0) await ScoringEvent.destroy({ where: { gameId: eventGames } });
  const scoringEvents = await inBatches('scoring events', data.scoringEvents, batch => ScoringEvent.bulkCreate(batch));

  const sharedIce = await inBatches('shared-ice pairs', data.sharedIce, batch =>
    SharedIceStat.bulkCreate(batch, { updateOnDuplicate: ['teamId', 'timeOnIce', 'goalsFor', 'shotsFor'] })
  );

  // lines are a current snapshot per team
  const lineTeams = [...new Set(data.lines.map(l => l.teamId))];
  if (lineTeams.length > 0) await TeamLine.destroy({ where: { teamId: lineTeams } });
  const lines = await inBatches('line assignments', data.lines, batch => TeamLine.bulkCreate(batch));

  if (cache) {
    for (const season of seasons) {
      const dropped = cache.invalidateSeason(season);
      console.log(`Invalidated ${dropped} cached profiles for season ${season}`);
    }
  }

  return {
    counts: { teams, players, games, skaterStats, goalieStats, shots, scoringEvents, sharedIce, lines },
    seasons
  };
}
