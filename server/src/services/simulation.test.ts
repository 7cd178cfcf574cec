import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseMatchupRequest, prepareMatchup, renderRunReport, simulateMatchup } from './simulation.js';
import type { MatchupRequest } from './simulation.js';
import type { HistoricalDataset } from './csvData.js';
import { MemoryDataSource } from './memoryDataSource.js';
import { ConfigurationError, InsufficientDataError, InvalidProfileError, NotFoundError } from '../simulation/errors.js';
import { statusFor } from '../routes/httpErrors.js';
import { ProfileCache } from '../simulation/profileCache.js';
import { parseSimulationConfig } from '../simulation/simulationConfig.js';
import type { SimulationConfigInput } from '../simulation/simulationConfig.js';
import { buildLeagueDataset, isoDay, LEAGUE_SEASON, SILENT_SKATER, testConfig } from '../test/fixtures.js';

const engineConfig = testConfig();
const data = buildLeagueDataset();
const source = new MemoryDataSource(data);

function request(date = '2024-12-01', overrides: Partial<SimulationConfigInput> = {}): MatchupRequest {
  return {
    season: LEAGUE_SEASON,
    date,
    config: parseSimulationConfig({ homeTeamId: 1, awayTeamId: 2, iterationCount: 400, randomSeed: 7, ...overrides })
  };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('simulateMatchup', () => {
  it('runs a complete simulation from historical data', async () => {
    const result = await simulateMatchup(source, request(), engineConfig);

    expect(result.complete).toBe(true);
    expect(result.iterations).toBe(400);
    expect(result.meta.seed).toBe(7);
    expect(result.winProbabilityHome + result.winProbabilityAway + result.drawRate).toBeCloseTo(1, 12);
    expect(result.confidenceScore).toBeGreaterThan(0);
    expect(result.confidenceScore).toBeLessThanOrEqual(1);
  });

  it('is reproducible for a fixed seed', async () => {
    const a = await simulateMatchup(source, request(), engineConfig);
    const b = await simulateMatchup(source, request(), engineConfig);
    expect(b.trials).toEqual(a.trials);
  });

  it('reuses cached profiles across runs', async () => {
    const cache = new ProfileCache();
    await simulateMatchup(source, request(), engineConfig, { cache });
    const afterFirst = cache.stats();
    await simulateMatchup(source, request(), engineConfig, { cache });
    expect(cache.stats().misses).toBe(afterFirst.misses);
    expect(cache.stats().hits).toBeGreaterThan(afterFirst.hits);
  });
});

describe('prepareMatchup', () => {
  it('resolves both teams with opportunity shares summing to 1', async () => {
    const { context, home, away } = await prepareMatchup(source, request(), engineConfig);
    expect(home.abbr).toBe('HBP');
    expect(away.abbr).toBe('RDF');
    for (const team of [context.home, context.away]) {
      const total = team.shooters.reduce((sum, s) => sum + s.opportunityShare, 0);
      expect(total).toBeCloseTo(1, 12);
      expect(team.shooters).toHaveLength(5);
    }
  });

  it('falls back to the team profile for a skater without shots', async () => {
    const { context } = await prepareMatchup(source, request(), engineConfig);
    expect(context.home.quality.sparseZoneProfiles).toContain(SILENT_SKATER);
    const silent = context.home.shooters.find(s => s.playerId === SILENT_SKATER);
    expect(silent?.opportunityShare).toBe(0);
  });

  it('ignores games on or after the requested date', async () => {
    const cutoff = '2024-11-01';
    const future = new Set(data.games.filter(g => g.date >= cutoff).map(g => g.gameId));
    const rewritten = new MemoryDataSource({
      ...data,
      shots: data.shots.map(s => (future.has(s.gameId) ? { ...s, isGoal: true } : s)),
      skaterStats: data.skaterStats.map(r => (future.has(r.gameId) ? { ...r, goals: r.goals + 5 } : r)),
      scoringEvents: data.scoringEvents.map(e => (future.has(e.gameId) ? { ...e, period: 3, periodSeconds: 1100 } : e)),
      sharedIce: data.sharedIce.map(p => (future.has(p.gameId) ? { ...p, goalsFor: p.goalsFor + 4 } : p))
    });

    const original = await prepareMatchup(source, request(cutoff), engineConfig);
    const altered = await prepareMatchup(rewritten, request(cutoff), engineConfig);
    expect(altered.context).toEqual(original.context);
  });

  it('keeps later shared ice out of line chemistry', async () => {
    const cutoff = '2024-11-01';
    const future = new Set(data.games.filter(g => g.date >= cutoff).map(g => g.gameId));
    const onlyFuture = new MemoryDataSource({
      ...data,
      sharedIce: data.sharedIce.map(p => (future.has(p.gameId) ? { ...p, goalsFor: 50 } : p))
    });
    const withoutFuture = new MemoryDataSource({
      ...data,
      sharedIce: data.sharedIce.filter(p => !future.has(p.gameId))
    });

    const a = await prepareMatchup(onlyFuture, request(cutoff), engineConfig);
    const b = await prepareMatchup(withoutFuture, request(cutoff), engineConfig);
    const synergyOf = (ctx: typeof a) => ctx.context.home.shooters.map(s => s.adjustments.late.synergy);
    expect(synergyOf(a)).toEqual(synergyOf(b));
  });

  it('places a traded player\'s games with another club in the season', async () => {
    const tradedGames = [2000, 2001, 2002];
    const traded: HistoricalDataset = {
      ...data,
      games: [
        ...data.games,
        ...tradedGames.map((gameId, i) => ({
          gameId, season: LEAGUE_SEASON, date: isoDay('2024-10-02', i * 2), gameType: 'regular' as const,
          homeTeamId: 3, awayTeamId: 2, homeScore: 1, awayScore: 0, overtime: false, shootout: false
        }))
      ],
      skaterStats: [
        ...data.skaterStats,
        ...tradedGames.map(gameId => ({
          gameId, season: LEAGUE_SEASON, playerId: 101, teamId: 3, opponentTeamId: 2,
          goals: 1, assists: 0, shotsOnGoal: 1, timeOnIce: 1020
        }))
      ],
      shots: [
        ...data.shots,
        ...tradedGames.map(gameId => ({
          gameId, season: LEAGUE_SEASON, period: 2, periodSeconds: 300,
          shooterId: 101, shooterTeamId: 3, goalieId: 209, defendingTeamId: 2,
          x: 75, y: 0, zone: null, shotType: 'wrist' as const, isGoal: true
        }))
      ],
      scoringEvents: [
        ...data.scoringEvents,
        ...tradedGames.flatMap(gameId => (['shot', 'goal'] as const).map(kind => ({
          gameId, season: LEAGUE_SEASON, playerId: 101, teamId: 3, kind, period: 2, periodSeconds: 300
        })))
      ]
    };

    const before = await prepareMatchup(source, request(), engineConfig);
    const after = await prepareMatchup(new MemoryDataSource(traded), request(), engineConfig);
    expect(before.context.home.quality.segmentWarnings).toBe(0);
    expect(after.context.home.quality.segmentWarnings).toBe(0);
  });

  it('turns features off without touching the rest', async () => {
    const { context } = await prepareMatchup(
      source,
      request('2024-12-01', { features: { synergy: false, clutch: false, fatigue: false, momentum: false, segmentWeights: false } }),
      engineConfig
    );
    expect(context.home.segmentFactors).toEqual({ early: 1, mid: 1, late: 1, overtime: 1 });
    for (const shooter of context.home.shooters) {
      expect(shooter.adjustments.late).toEqual({ clutch: 1, fatigue: 1, momentum: 1, synergy: 1 });
    }
  });

  it('rejects unknown teams', async () => {
    await expect(prepareMatchup(source, request('2024-12-01', { awayTeamId: 99 }), engineConfig))
      .rejects.toBeInstanceOf(NotFoundError);
  });

  it('requires a starting goalie', async () => {
    const noGoalie = new MemoryDataSource({ ...data, lines: data.lines.filter(l => !(l.teamId === 2 && l.position === 'G')) });
    await expect(prepareMatchup(noGoalie, request(), engineConfig)).rejects.toBeInstanceOf(InvalidProfileError);
    await expect(prepareMatchup(noGoalie, request(), engineConfig)).rejects.toThrow('RDF has no starting goalie assigned');
  });

  it('fails before any trial when no history precedes the date', async () => {
    const attempt = prepareMatchup(source, request('2024-09-01'), engineConfig);
    await expect(attempt).rejects.toBeInstanceOf(InsufficientDataError);
    await expect(attempt).rejects.toMatchObject({ details: { reason: 'empty-population' } });
  });
});

describe('parseMatchupRequest', () => {
  it('splits the season and date from the run configuration', () => {
    const parsed = parseMatchupRequest({ season: 2024, date: '2024-12-01', homeTeamId: 1, awayTeamId: 2, iterationCount: 50 });
    expect(parsed.season).toBe(2024);
    expect(parsed.date).toBe('2024-12-01');
    expect(parsed.config.iterationCount).toBe(50);
  });

  it('rejects an impossible date as a client error', () => {
    let caught: unknown;
    try {
      parseMatchupRequest({ season: 2024, date: '2024-13-45', homeTeamId: 1, awayTeamId: 2 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(statusFor(caught)).toBe(400);
  });
});

describe('renderRunReport', () => {
  it('keeps timing out of the JSON output', async () => {
    const result = await simulateMatchup(source, request('2024-12-01', { iterationCount: 50 }), engineConfig);
    const report = renderRunReport(result, { json: true, elapsedMs: 12 });

    expect(report.stderr).toBe('Finished 50 trials in 12ms');
    const parsed: unknown = JSON.parse(report.stdout);
    expect(parsed).toMatchObject({ iterations: 50, seed: 7, complete: true });
  });

  it('prints the summary with team names otherwise', async () => {
    const result = await simulateMatchup(source, request('2024-12-01', { iterationCount: 50 }), engineConfig);
    const report = renderRunReport(result, { json: false, elapsedMs: 5, homeName: 'Harbour Pilots', awayName: 'Ridge Foxes' });
    expect(report.stdout).toBe(result.renderSummary('Harbour Pilots', 'Ridge Foxes'));
    expect(report.stdout).not.toContain('Finished');
  });
});
