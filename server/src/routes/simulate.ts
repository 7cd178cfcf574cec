// server/src/routes/simulate.ts

import { Router } from 'express';
import { dataSource, engineConfig, profileCache } from '../services/runtime.js';
import { parseMatchupRequest, simulateMatchup } from '../services/simulation.js';
import { sendError } from './httpErrors.js';

const r = Router();

/**
 * POST /simulate
 * Body: { season, date, homeTeamId, awayTeamId, iterationCount?, randomSeed?, features?, segmentWeights? }
 * ?format=text returns the plain-text summary instead of JSON.
 */
r.post('/simulate', async (req, res) => {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort(new Error('client disconnected'));
  });

  try {
    const request = parseMatchupRequest(req.body);
    const { config } = request;

    const started = Date.now();
    const result = await simulateMatchup(
      dataSource,
      request,
      engineConfig,
      { cache: profileCache, signal: controller.signal }
    );
    console.log(
      `Simulated ${config.awayTeamId} @ ${config.homeTeamId}: ${result.iterations} trials in ${Date.now() - started}ms`
    );
    if (!result.complete) return;

    if (req.query.format === 'text') {
      const [home, away] = await Promise.all([dataSource.getTeam(config.homeTeamId), dataSource.getTeam(config.awayTeamId)]);
      return res.type('text/plain').send(result.renderSummary(home?.name, away?.name));
    }
    res.json(result.toJSON());
  } catch (error) {
    sendError(res, error, 'Simulation failed');
  }
});

export default r;
