// server/src/services/dataSource.ts

// Query surface the simulation service reads from, plus the line grouping
// both implementations share.

import { DEFENSE_POSITIONS, FORWARD_POSITIONS } from '../simulation/types.js';
import type {
  GameInfo, GoalieGameRow, LineAssignment, ScheduleEntry, ScoringEventRecord,
  SharedIceRecord, ShotEventRecord, SkaterGameRow
} from '../simulation/types.js';

export interface TeamSummary {
  teamId: number;
  name: string;
  abbr: string;
}

export interface TeamLineup {
  lines: LineAssignment[];
  goalieId: number | null;
}

/** Read-only query surface the simulation service loads its inputs from. */
export interface HistoricalDataSource {
  listTeams(): Promise<TeamSummary[]>;
  getTeam(teamId: number): Promise<TeamSummary | null>;
  getLineup(teamId: number): Promise<TeamLineup>;
  getSeasonGames(season: number): Promise<GameInfo[]>;
  getTeamSchedule(teamId: number, season: number): Promise<ScheduleEntry[]>;
  getSkaterGameRows(season: number, playerIds: readonly number[]): Promise<SkaterGameRow[]>;
  getGoalieGameRows(season: number, goalieIds: readonly number[]): Promise<GoalieGameRow[]>;
  getShotEvents(season: number): Promise<ShotEventRecord[]>;
  getScoringEvents(season: number, playerIds: readonly number[]): Promise<ScoringEventRecord[]>;
  getSharedIce(season: number, teamId: number): Promise<SharedIceRecord[]>;
}

const FORWARDS: readonly string[] = FORWARD_POSITIONS;
const DEFENSE: readonly string[] = DEFENSE_POSITIONS;

/**
 * Group even-strength line rows into forward lines and defence pairs, and pick
 * the starting goalie (lowest lineOrder under 'G').
 */
export function lineupFromRows(
  rows: ReadonlyArray<{ situation: string; position: string; playerId: number | null; lineOrder: number }>
): TeamLineup {
  const groups = new Map<string, LineAssignment>();
  let goalie: { playerId: number; order: number } | null = null;

  for (const row of rows) {
    if (row.playerId === null) continue;

    if (row.position === 'G') {
      if (!goalie || row.lineOrder < goalie.order) goalie = { playerId: row.playerId, order: row.lineOrder };
      continue;
    }
    if (!row.situation.startsWith('ES_')) continue;

    const kind = FORWARDS.includes(row.position) ? 'forward' : DEFENSE.includes(row.position) ? 'defense' : null;
    if (!kind) continue;

    const lineId = `${row.situation}-${kind === 'forward' ? 'F' : 'D'}`;
    const line: LineAssignment = groups.get(lineId) ?? { lineId, kind, playerIds: [] };
    if (!line.playerIds.includes(row.playerId)) line.playerIds.push(row.playerId);
    groups.set(lineId, line);
  }

  const lines = [...groups.values()].sort((a, b) => a.lineId.localeCompare(b.lineId));
  return { lines, goalieId: goalie?.playerId ?? null };
}
