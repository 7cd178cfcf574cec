// server/src/services/sequelizeDataSource.ts

import { Op } from 'sequelize';
import {
  Game, GoalieGameStat, PlayerGameStat, ScoringEvent, SharedIceStat, ShotEvent, Team, TeamLine
} from '../models/index.js';
import { isShotType, isZone } from '../simulation/types.js';
import type {
  GameInfo, GoalieGameRow, ScheduleEntry, ScoringEventRecord,
  SharedIceRecord, ShotEventRecord, SkaterGameRow
} from '../simulation/types.js';
import { lineupFromRows } from './dataSource.js';
import type { HistoricalDataSource, TeamLineup, TeamSummary } from './dataSource.js';

export class SequelizeDataSource implements HistoricalDataSource {
  async listTeams(): Promise<TeamSummary[]> {
    const teams = await Team.findAll({ order: [['abbr', 'ASC']] });
    return teams.map(t => ({ teamId: t.teamId, name: t.name, abbr: t.abbr }));
  }

  async getTeam(teamId: number): Promise<TeamSummary | null> {
    const team = await Team.findOne({ where: { teamId } });
    return team ? { teamId: team.teamId, name: team.name, abbr: team.abbr } : null;
  }

  async getLineup(teamId: number): Promise<TeamLineup> {
    const rows = await TeamLine.findAll({ where: { teamId }, order: [['situation', 'ASC'], ['lineOrder', 'ASC']] });
    return lineupFromRows(rows);
  }

  async getSeasonGames(season: number): Promise<GameInfo[]> {
    const games = await Game.findAll({ where: { season }, order: [['date', 'ASC'], ['gameId', 'ASC']] });
    return games.map((g): GameInfo => ({
      gameId: g.gameId,
      season: g.season,
      date: g.date,
      gameType: g.gameType === 'playoff' ? 'playoff' : 'regular',
      homeTeamId: g.homeTeamId,
      awayTeamId: g.awayTeamId,
      homeScore: g.homeScore,
      awayScore: g.awayScore
    }));
  }

  async getTeamSchedule(teamId: number, season: number): Promise<ScheduleEntry[]> {
    const games = await Game.findAll({
      where: { season, [Op.or]: [{ homeTeamId: teamId }, { awayTeamId: teamId }] },
      order: [['date', 'ASC']]
    });
    return games.map(g => ({ gameId: g.gameId, date: g.date, isHome: g.homeTeamId === teamId }));
  }

  async getSkaterGameRows(season: number, playerIds: readonly number[]): Promise<SkaterGameRow[]> {
    if (playerIds.length === 0) return [];
    const [rows, dates] = await Promise.all([
      PlayerGameStat.findAll({ where: { season, playerId: { [Op.in]: [...playerIds] } } }),
      this.gameDates(season)
    ]);
    return rows.map(r => ({
      gameId: r.gameId,
      playerId: r.playerId,
      teamId: r.teamId,
      opponentTeamId: r.opponentTeamId,
      date: dates.get(r.gameId) ?? '',
      goals: r.goals,
      assists: r.assists,
      shots: r.shotsOnGoal,
      timeOnIceSeconds: r.timeOnIce ?? 0
    }));
  }

  async getGoalieGameRows(season: number, goalieIds: readonly number[]): Promise<GoalieGameRow[]> {
    if (goalieIds.length === 0) return [];
    const [rows, dates] = await Promise.all([
      GoalieGameStat.findAll({ where: { season, playerId: { [Op.in]: [...goalieIds] } } }),
      this.gameDates(season)
    ]);
    return rows.map(r => ({
      gameId: r.gameId,
      goalieId: r.playerId,
      teamId: r.teamId,
      opponentTeamId: r.opponentTeamId,
      date: dates.get(r.gameId) ?? '',
      shotsAgainst: r.shotsAgainst,
      goalsAgainst: r.goalsAgainst,
      timeOnIceSeconds: r.timeOnIce ?? 0
    }));
  }

  async getShotEvents(season: number): Promise<ShotEventRecord[]> {
    const shots = await ShotEvent.findAll({ where: { season }, order: [['gameId', 'ASC'], ['id', 'ASC']] });
    const out: ShotEventRecord[] = [];
    for (const s of shots) {
      if (!isShotType(s.shotType)) {
        console.warn(`Skipping shot ${s.id}: unknown shot type "${s.shotType}"`);
        continue;
      }
      out.push({
        gameId: s.gameId,
        shooterId: s.shooterId,
        shooterTeamId: s.shooterTeamId,
        goalieId: s.goalieId,
        defendingTeamId: s.defendingTeamId,
        x: s.x,
        y: s.y,
        zone: s.zone !== null && isZone(s.zone) ? s.zone : null,
        shotType: s.shotType,
        isGoal: s.isGoal,
        period: s.period,
        periodSeconds: s.periodSeconds
      });
    }
    return out;
  }

  async getScoringEvents(season: number, playerIds: readonly number[]): Promise<ScoringEventRecord[]> {
    if (playerIds.length === 0) return [];
    const events = await ScoringEvent.findAll({ where: { season, playerId: { [Op.in]: [...playerIds] } } });
    return events.map(e => ({
      gameId: e.gameId,
      playerId: e.playerId,
      teamId: e.teamId,
      kind: e.kind,
      period: e.period,
      periodSeconds: e.periodSeconds
    }));
  }

  async getSharedIce(season: number, teamId: number): Promise<SharedIceRecord[]> {
    const rows = await SharedIceStat.findAll({ where: { season, teamId } });
    return rows.map(r => ({
      gameId: r.gameId,
      playerA: r.playerA,
      playerB: r.playerB,
      timeOnIceSeconds: r.timeOnIce,
      goalsFor: r.goalsFor,
      shotsFor: r.shotsFor
    }));
  }

  private async gameDates(season: number): Promise<Map<number, string>> {
    const games = await Game.findAll({ where: { season }, attributes: ['gameId', 'date'] });
    return new Map(games.map(g => [g.gameId, g.date]));
  }
}
