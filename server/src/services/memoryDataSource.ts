// server/src/services/memoryDataSource.ts
// HistoricalDataSource over rows already in memory: a CSV export loaded with
// loadCsvDataset, or fixtures built in tests.

import type {
  GameInfo, GoalieGameRow, ScheduleEntry, ScoringEventRecord,
  SharedIceRecord, ShotEventRecord, SkaterGameRow
} from '../simulation/types.js';
import type { HistoricalDataset } from './csvData.js';
import { lineupFromRows } from './dataSource.js';
import type { HistoricalDataSource, TeamLineup, TeamSummary } from './dataSource.js';

export class MemoryDataSource implements HistoricalDataSource {
  private readonly gameDates: Map<number, string>;

  constructor(private readonly data: HistoricalDataset) {
    this.gameDates = new Map(data.games.map(g => [g.gameId, g.date]));
  }

  async listTeams(): Promise<TeamSummary[]> {
    return this.data.teams
      .map(t => ({ teamId: t.teamId, name: t.name, abbr: t.abbr }))
      .sort((a, b) => a.abbr.localeCompare(b.abbr));
  }

  async getTeam(teamId: number): Promise<TeamSummary | null> {
    const team = this.data.teams.find(t => t.teamId === teamId);
    return team ? { teamId: team.teamId, name: team.name, abbr: team.abbr } : null;
  }

  async getLineup(teamId: number): Promise<TeamLineup> {
    return lineupFromRows(this.data.lines.filter(l => l.teamId === teamId));
  }

  async getSeasonGames(season: number): Promise<GameInfo[]> {
    return this.data.games
      .filter(g => g.season === season)
      .sort((a, b) => a.date.localeCompare(b.date) || a.gameId - b.gameId)
      .map((g): GameInfo => ({
        gameId: g.gameId,
        season: g.season,
        date: g.date,
        gameType: g.gameType,
        homeTeamId: g.homeTeamId,
        awayTeamId: g.awayTeamId,
        homeScore: g.homeScore,
        awayScore: g.awayScore
      }));
  }

  async getTeamSchedule(teamId: number, season: number): Promise<ScheduleEntry[]> {
    return this.data.games
      .filter(g => g.season === season && (g.homeTeamId === teamId || g.awayTeamId === teamId))
      .sort((a, b) => a.date.localeCompare(b.date))
      .map(g => ({ gameId: g.gameId, date: g.date, isHome: g.homeTeamId === teamId }));
  }

  async getSkaterGameRows(season: number, playerIds: readonly number[]): Promise<SkaterGameRow[]> {
    const ids = new Set(playerIds);
    return this.data.skaterStats
      .filter(r => r.season === season && ids.has(r.playerId))
      .map(r => ({
        gameId: r.gameId,
        playerId: r.playerId,
        teamId: r.teamId,
        opponentTeamId: r.opponentTeamId,
        date: this.gameDates.get(r.gameId) ?? '',
        goals: r.goals,
        assists: r.assists,
        shots: r.shotsOnGoal,
        timeOnIceSeconds: r.timeOnIce ?? 0
      }));
  }

  async getGoalieGameRows(season: number, goalieIds: readonly number[]): Promise<GoalieGameRow[]> {
    const ids = new Set(goalieIds);
    return this.data.goalieStats
      .filter(r => r.season === season && ids.has(r.playerId))
      .map(r => ({
        gameId: r.gameId,
        goalieId: r.playerId,
        teamId: r.teamId,
        opponentTeamId: r.opponentTeamId,
        date: this.gameDates.get(r.gameId) ?? '',
        shotsAgainst: r.shotsAgainst,
        goalsAgainst: r.goalsAgainst,
        timeOnIceSeconds: r.timeOnIce ?? 0
      }));
  }

  async getShotEvents(season: number): Promise<ShotEventRecord[]> {
    return this.data.shots
      .filter(s => s.season === season)
      .map(s => ({
        gameId: s.gameId,
        shooterId: s.shooterId,
        shooterTeamId: s.shooterTeamId,
        goalieId: s.goalieId,
        defendingTeamId: s.defendingTeamId,
        x: s.x,
        y: s.y,
        zone: s.zone,
        shotType: s.shotType,
        isGoal: s.isGoal,
        period: s.period,
        periodSeconds: s.periodSeconds
      }));
  }

  async getScoringEvents(season: number, playerIds: readonly number[]): Promise<ScoringEventRecord[]> {
    const ids = new Set(playerIds);
    return this.data.scoringEvents
      .filter(e => e.season === season && ids.has(e.playerId))
      .map(e => ({
        gameId: e.gameId,
        playerId: e.playerId,
        teamId: e.teamId,
        kind: e.kind,
        period: e.period,
        periodSeconds: e.periodSeconds
      }));
  }

  async getSharedIce(season: number, teamId: number): Promise<SharedIceRecord[]> {
    return this.data.sharedIce
      .filter(r => r.season === season && r.teamId === teamId)
      .map(r => ({
        gameId: r.gameId,
        playerA: r.playerA,
        playerB: r.playerB,
        timeOnIceSeconds: r.timeOnIce,
        goalsFor: r.goalsFor,
        shotsFor: r.shotsFor
      }));
  }
}
