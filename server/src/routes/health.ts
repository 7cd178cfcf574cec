// server/src/routes/health.ts

import { Router } from 'express';
import { z } from 'zod';
import { sequelize } from '../db.js';
import { profileCache } from '../services/runtime.js';
import { sendError } from './httpErrors.js';

const r = Router();

r.get('/health', async (_req, res) => {
  let database = 'up';
  try {
    await sequelize.authenticate();
  } catch (error) {
    console.error('Health check could not reach the database:', error);
    database = 'down';
  }
  res.status(database === 'up' ? 200 : 503).json({
    ok: database === 'up',
    database,
    uptimeSeconds: Math.round(process.uptime()),
    profileCache: profileCache.stats()
  });
});

const invalidateSchema = z.object({ season: z.number().int().optional() });

// Called after an import so a running server stops serving stale profiles.
r.post('/cache/invalidate', (req, res) => {
  const parsed = invalidateSchema.safeParse(req.body ?? {});
  if (!parsed.success) return res.status(400).json({ error: 'season must be an integer' });

  try {
    const { season } = parsed.data;
    if (season === undefined) {
      const { entries } = profileCache.stats();
      profileCache.clear();
      return res.json({ removed: entries });
    }
    res.json({ season, removed: profileCache.invalidateSeason(season) });
  } catch (error) {
    sendError(res, error, 'Failed to invalidate cache');
  }
});

export default r;
