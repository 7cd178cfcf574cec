// server/src/routes/teams.ts

import { Router } from 'express';
import { Player } from '../models/index.js';
import { dataSource } from '../services/runtime.js';
import { sendError } from './httpErrors.js';

const r = Router();

r.get('/teams', async (_req, res) => {
  try {
    res.json(await dataSource.listTeams());
  } catch (error) {
    sendError(res, error, 'Failed to fetch teams');
  }
});

r.get('/teams/:teamId/lines', async (req, res) => {
  const teamId = Number(req.params.teamId);
  if (!Number.isInteger(teamId)) return res.status(400).json({ error: 'teamId must be an integer' });

  try {
    const team = await dataSource.getTeam(teamId);
    if (!team) return res.status(404).json({ error: 'Team not found' });

    const lineup = await dataSource.getLineup(teamId);
    const ids = [...lineup.lines.flatMap(l => l.playerIds), ...(lineup.goalieId !== null ? [lineup.goalieId] : [])];
    const players = await Player.findAll({ where: { playerId: ids } });
    const names = new Map(players.map(p => [p.playerId, p.fullName]));

    res.json({
      team,
      goalie: lineup.goalieId !== null ? { playerId: lineup.goalieId, name: names.get(lineup.goalieId) ?? null } : null,
      lines: lineup.lines.map(line => ({
        ...line,
        players: line.playerIds.map(id => ({ playerId: id, name: names.get(id) ?? null }))
      }))
    });
  } catch (error) {
    sendError(res, error, 'Failed to fetch lines');
  }
});

export default r;
