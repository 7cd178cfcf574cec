// server/src/test/fixtures.ts
// Synthetic data for tests. Nothing here is read from a real league.

import { baselineTypeRate, baselineZoneRate, loadEngineConfig } from '../simulation/config.js';
import type { EngineConfig } from '../simulation/config.js';
import { SeededRandom } from '../simulation/random.js';
import { recordOf } from '../simulation/stats.js';
import { NEUTRAL_ADJUSTMENTS, SHOT_TYPES, SIM_SEGMENTS, ZONES } from '../simulation/types.js';
import type {
  GameInfo, ResolvedGoalie, ResolvedShooter, ShotEventRecord, ShotType, SkaterGameRow,
  TeamSimulationContext, Zone
} from '../simulation/types.js';
import type {
  GameRow, GoalieStatRow, HistoricalDataset, LineRow, ScoringEventRow, SharedIceRow, ShotRow, SkaterStatRow
} from '../services/csvData.js';

let cached: EngineConfig | null = null;

export function testConfig(): EngineConfig {
  cached ??= loadEngineConfig();
  return cached;
}

/** Deep copy of the default config with `edit` applied. */
export function configWith(edit: (config: EngineConfig) => void): EngineConfig {
  const copy = structuredClone(testConfig());
  edit(copy);
  return copy;
}

export function shot(overrides: Partial<ShotEventRecord> = {}): ShotEventRecord {
  return {
    gameId: 1,
    shooterId: 101,
    shooterTeamId: 1,
    goalieId: 209,
    defendingTeamId: 2,
    x: 75,
    y: 0,
    zone: null,
    shotType: 'wrist',
    isGoal: false,
    period: 1,
    periodSeconds: 100,
    ...overrides
  };
}

export function game(gameId: number, date: string, overrides: Partial<GameInfo> = {}): GameInfo {
  return {
    gameId,
    season: 2024,
    date,
    gameType: 'regular',
    homeTeamId: 1,
    awayTeamId: 2,
    homeScore: null,
    awayScore: null,
    ...overrides
  };
}

export function skaterRow(overrides: Partial<SkaterGameRow> = {}): SkaterGameRow {
  return {
    gameId: 1,
    playerId: 101,
    teamId: 1,
    opponentTeamId: 2,
    date: '2024-10-01',
    goals: 0,
    assists: 0,
    shots: 2,
    timeOnIceSeconds: 900,
    ...overrides
  };
}

export function isoDay(start: string, offsetDays: number): string {
  const base = Date.parse(`${start}T00:00:00Z`);
  return new Date(base + offsetDays * 86_400_000).toISOString().slice(0, 10);
}

// ---------------------------------------------------------------------------
// Engine-level contexts with league-average players
// ---------------------------------------------------------------------------

export interface SyntheticTeamOptions {
  shotsPerGame?: number;
  finishing?: number; // multiplies every shooter's zone goal rates
  saveStrength?: number; // multiplies the goalie's goals-allowed rates
}

const SHOOTER_ZONES: Array<{ value: Zone; weight: number }> = [
  { value: 'slot', weight: 0.45 },
  { value: 'crease', weight: 0.15 },
  { value: 'left_point', weight: 0.25 },
  { value: 'high_slot', weight: 0.15 }
];

const SHOOTER_TYPES: Array<{ value: ShotType; weight: number }> = [
  { value: 'wrist', weight: 0.6 },
  { value: 'snap', weight: 0.25 },
  { value: 'backhand', weight: 0.15 }
];

export function syntheticTeam(teamId: number, options: SyntheticTeamOptions = {}): TeamSimulationContext {
  const config = testConfig();
  const finishing = options.finishing ?? 1;
  const allowed = options.saveStrength ?? 1;

  const shooters: ResolvedShooter[] = [1, 2, 3, 4].map(i => ({
    playerId: teamId * 100 + i,
    lineId: 'ES_L1-F',
    opportunityShare: 0.25,
    zoneDistribution: SHOOTER_ZONES,
    shotTypesByZone: recordOf(ZONES, () => SHOOTER_TYPES),
    zoneGoalRates: recordOf(ZONES, zone => baselineZoneRate(config, zone) * finishing),
    finishingFactor: 1,
    adjustments: recordOf(SIM_SEGMENTS, () => ({ ...NEUTRAL_ADJUSTMENTS }))
  }));

  const goalie: ResolvedGoalie = {
    goalieId: teamId * 100 + 9,
    zoneSaveRates: recordOf(ZONES, zone => 1 - baselineZoneRate(config, zone) * allowed),
    shotTypeSaveRates: recordOf(SHOT_TYPES, type => 1 - baselineTypeRate(config, type)),
    shotsAgainstPerGame: config.simulation.leagueShotsPerGame
  };

  return {
    teamId,
    shotsPerGame: options.shotsPerGame ?? config.simulation.leagueShotsPerGame,
    segmentFactors: recordOf(SIM_SEGMENTS, () => 1),
    shooters,
    goalie,
    quality: { entities: shooters.length + 1, lowMatchupSample: [], sparseZoneProfiles: [], segmentWarnings: 0 }
  };
}

// ---------------------------------------------------------------------------
// A three-team league for service tests
// ---------------------------------------------------------------------------

export const LEAGUE_SEASON = 2024;
export const LEAGUE_START = '2024-10-01';
export const LEAGUE_GAMES = 30;
/** Team 1's second defenceman never shoots. */
export const SILENT_SKATER = 105;

const SPOTS: Array<{ value: { x: number; y: number }; weight: number }> = [
  { value: { x: 86, y: 0 }, weight: 1 },    // crease
  { value: { x: 75, y: 0 }, weight: 3 },    // slot
  { value: { x: 60, y: 0 }, weight: 2 },    // high slot
  { value: { x: 64, y: 20 }, weight: 2 },   // right circle
  { value: { x: -40, y: -20 }, weight: 2 }  // left point, defending end mirrored
];
const LEAGUE_TYPES: ReadonlyArray<{ value: ShotType; weight: number }> = [
  { value: 'wrist', weight: 5 },
  { value: 'snap', weight: 2 },
  { value: 'slap', weight: 2 },
  { value: 'backhand', weight: 1 },
  { value: 'tip-in', weight: 1 }
];
const POSITIONS = ['LW', 'C', 'RW', 'LD', 'RD'] as const;

function skatersOf(teamId: number): number[] {
  return POSITIONS.map((_, i) => teamId * 100 + i + 1);
}

function goalieOf(teamId: number): number {
  return teamId * 100 + 9;
}

/**
 * Teams 1, 2 and 3 each dress one forward line, one defence pair and one
 * goalie, and play a round-robin every other day. Per-game rows, shot events
 * and scoring events are generated together so they reconcile exactly.
 */
export function buildLeagueDataset(seed = 2024): HistoricalDataset {
  const rng = new SeededRandom(seed);
  const teamIds = [1, 2, 3];
  const pairings: Array<[number, number]> = [[1, 2], [2, 3], [3, 1]];

  const games: GameRow[] = [];
  const skaterStats: SkaterStatRow[] = [];
  const goalieStats: GoalieStatRow[] = [];
  const shots: ShotRow[] = [];
  const scoringEvents: ScoringEventRow[] = [];
  const sharedIce: SharedIceRow[] = [];

  for (let i = 0; i < LEAGUE_GAMES; i++) {
    const gameId = 1000 + i;
    const [homeTeamId, awayTeamId] = pairings[i % pairings.length];
    const score: Record<number, number> = { [homeTeamId]: 0, [awayTeamId]: 0 };
    const shotsOn: Record<number, number> = { [homeTeamId]: 0, [awayTeamId]: 0 };

    for (const [teamId, opponentTeamId] of [[homeTeamId, awayTeamId], [awayTeamId, homeTeamId]]) {
      const scorers: number[] = [];
      for (const [slot, playerId] of skatersOf(teamId).entries()) {
        const forward = slot < 3;
        const attempts = playerId === SILENT_SKATER ? 0 : rng.poisson(forward ? 2.5 : 1.5);
        let goals = 0;

        for (let s = 0; s < attempts; s++) {
          const spot = rng.weightedChoice(SPOTS);
          const isGoal = rng.chance(0.12);
          const period = 1 + Math.floor(rng.random() * 3);
          const periodSeconds = Math.floor(rng.random() * 1200);
          shots.push({
            gameId, season: LEAGUE_SEASON, period, periodSeconds,
            shooterId: playerId, shooterTeamId: teamId,
            goalieId: goalieOf(opponentTeamId), defendingTeamId: opponentTeamId,
            x: spot.x, y: spot.y, zone: null,
            shotType: rng.weightedChoice(LEAGUE_TYPES),
            isGoal
          });
          scoringEvents.push({ gameId, season: LEAGUE_SEASON, playerId, teamId, kind: 'shot', period, periodSeconds });
          if (isGoal) {
            goals++;
            scorers.push(playerId);
            scoringEvents.push({ gameId, season: LEAGUE_SEASON, playerId, teamId, kind: 'goal', period, periodSeconds });
          }
        }

        const assists = rng.poisson(0.3);
        for (let a = 0; a < assists; a++) {
          const period = 1 + Math.floor(rng.random() * 3);
          scoringEvents.push({
            gameId, season: LEAGUE_SEASON, playerId, teamId, kind: 'assist',
            period, periodSeconds: Math.floor(rng.random() * 1200)
          });
        }

        score[teamId] += goals;
        shotsOn[teamId] += attempts;
        skaterStats.push({
          gameId, season: LEAGUE_SEASON, playerId, teamId, opponentTeamId,
          goals, assists, shotsOnGoal: attempts, timeOnIce: forward ? 1020 : 1260
        });
      }

      const line = skatersOf(teamId);
      for (let a = 0; a < line.length; a++) {
        for (let b = a + 1; b < line.length; b++) {
          sharedIce.push({
            season: LEAGUE_SEASON, gameId, teamId, playerA: line[a], playerB: line[b],
            timeOnIce: 600,
            goalsFor: scorers.filter(s => s === line[a] || s === line[b]).length,
            shotsFor: 0
          });
        }
      }
    }

    for (const [teamId, opponentTeamId] of [[homeTeamId, awayTeamId], [awayTeamId, homeTeamId]]) {
      goalieStats.push({
        gameId, season: LEAGUE_SEASON, playerId: goalieOf(teamId), teamId, opponentTeamId,
        shotsAgainst: shotsOn[opponentTeamId], goalsAgainst: score[opponentTeamId],
        timeOnIce: 3600, decision: score[teamId] > score[opponentTeamId] ? 'W' : 'L'
      });
    }

    games.push({
      gameId, season: LEAGUE_SEASON, date: isoDay(LEAGUE_START, i * 2), gameType: 'regular',
      homeTeamId, awayTeamId, homeScore: score[homeTeamId], awayScore: score[awayTeamId],
      overtime: false, shootout: false
    });
  }

  const lines: LineRow[] = [];
  for (const teamId of teamIds) {
    const ids = skatersOf(teamId);
    POSITIONS.forEach((position, i) => {
      lines.push({ teamId, situation: i < 3 ? 'ES_L1' : 'ES_D1', position, playerId: ids[i], lineOrder: 1 });
    });
    lines.push({ teamId, situation: 'G', position: 'G', playerId: goalieOf(teamId), lineOrder: 1 });
  }

  return {
    teams: [
      { teamId: 1, name: 'Harbour Pilots', nickname: 'Pilots', abbr: 'HBP' },
      { teamId: 2, name: 'Ridge Foxes', nickname: 'Foxes', abbr: 'RDF' },
      { teamId: 3, name: 'Lake Herons', nickname: 'Herons', abbr: 'LKH' }
    ],
    players: teamIds.flatMap(teamId => [
      ...skatersOf(teamId).map((playerId, i) => ({
        playerId, teamId, firstName: 'Skater', lastName: `${playerId}`,
        position: POSITIONS[i], shoots: 'L', dateOfBirth: null, retired: false
      })),
      {
        playerId: goalieOf(teamId), teamId, firstName: 'Goalie', lastName: `${goalieOf(teamId)}`,
        position: 'G', shoots: 'L', dateOfBirth: null, retired: false
      }
    ]),
    games,
    skaterStats,
    goalieStats,
    shots,
    scoringEvents,
    sharedIce,
    lines
  };
}
