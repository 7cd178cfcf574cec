// server/src/simulation/teamContext.ts
// Resolves every profile a team needs before the first trial runs. Anything
// missing surfaces here, never mid-simulation.

import type { EngineConfig } from './config.js';
import { baselineTypeRate, baselineZoneRate } from './config.js';
import { InsufficientDataError } from './errors.js';
import {
  buildScheduleContext, classifyMomentum, clutchModifier, fatigueModifier, segmentAdjustments
} from './adjustments.js';
import {
  buildGoalieGeneralProfile, buildGoalieMatchupHistory, buildSkaterGeneralProfile,
  buildSkaterMatchupHistory, weighGoalieMatchup, weighSkaterMatchup
} from './matchupWeighting.js';
import { ProfileCache } from './profileCache.js';
import {
  buildSegmentProfile, seasonPhaseForDate, seasonTotalsFromRows, segmentScoringFactors
} from './segmentProfile.js';
import { clamp, recordOf, safeDivide } from './stats.js';
import { buildSynergyMatrix, lineSynergy, onIceGoalsPer60, synergyFactor } from './synergy.js';
import { SHOT_TYPES, SIM_SEGMENTS, ZONES } from './types.js';
import type {
  GameInfo, GoalieGameRow, LineAssignment, ResolvedGoalie, ResolvedShooter, ScheduleEntry,
  ScoringEventRecord, SegmentProfile, SharedIceRecord, ShotEventRecord, SimSegment,
  SimulationFeatures, SkaterGameRow, TeamSimulationContext, ZoneProfile
} from './types.js';
import {
  buildZoneProfile, shotTypeDistribution, shrunkZoneGoalRates, zoneDistribution
} from './zoneProfile.js';

/** Everything loaded for one side of the matchup. */
export interface TeamInputs {
  teamId: number;
  opponentTeamId: number;
  season: number;
  date: string;
  lines: readonly LineAssignment[];
  goalieId: number;
  games: readonly GameInfo[];
  shots: readonly ShotEventRecord[];
  scoringEvents: readonly ScoringEventRecord[];
  skaterRows: readonly SkaterGameRow[];
  goalieRows: readonly GoalieGameRow[];
  sharedIce: readonly SharedIceRecord[];
  schedule: readonly ScheduleEntry[];
}

function playedTeamGames(inputs: TeamInputs): GameInfo[] {
  return inputs.games.filter(g =>
    g.date < inputs.date && (g.homeTeamId === inputs.teamId || g.awayTeamId === inputs.teamId)
  );
}

function resolveGoalie(inputs: TeamInputs, config: EngineConfig, cache: ProfileCache) {
  const { goalieId, season, opponentTeamId } = inputs;
  const rows = inputs.goalieRows.filter(r => r.goalieId === goalieId);

  const general = cache.generalProfile(`goalie:${goalieId}@${inputs.date}`, season, () =>
    buildGoalieGeneralProfile(goalieId, season, rows)
  );
  const matchup = weighGoalieMatchup(
    goalieId, season, opponentTeamId, general, buildGoalieMatchupHistory(rows, opponentTeamId), config
  );

  const profile = cache.zoneProfile(`goalie:${goalieId}:against@${inputs.date}`, season, () =>
    buildZoneProfile(inputs.shots, { entityId: goalieId, entityKind: 'goalie', season, perspective: 'against' }, config)
  );

  // scale goals-allowed rates by how the matchup blend moved overall save percentage
  const allowedRatio = clamp(
    safeDivide(1 - matchup.blended.savePct, 1 - matchup.general.savePct, 1),
    config.simulation.finishingFactorMin,
    config.simulation.finishingFactorMax
  );

  const k = config.simulation.goaliePriorShots;
  const zoneSaveRates = recordOf(ZONES, zone => {
    const stats = profile.zones[zone];
    const prior = baselineZoneRate(config, zone);
    const allowed = safeDivide(stats.goals + k * prior, stats.shots + k, prior);
    return 1 - clamp(allowed * allowedRatio, 0, 1);
  });

  const shotTypeSaveRates = recordOf(SHOT_TYPES, type => {
    let shots = 0;
    let goals = 0;
    for (const zone of ZONES) {
      shots += profile.zones[zone].shotTypes[type];
      goals += profile.zones[zone].goalsByShotType[type];
    }
    const prior = baselineTypeRate(config, type);
    return 1 - safeDivide(goals + k * prior, shots + k, prior);
  });

  const goalie: ResolvedGoalie = {
    goalieId,
    zoneSaveRates,
    shotTypeSaveRates,
    shotsAgainstPerGame: matchup.blended.shotsAgainstPerGame
  };
  return { goalie, matchup };
}

/**
 * The team's own scoring by segment, built from its shot log. Season phases
 * come from the whole league schedule; only games played before the request
 * date count toward the team's cells.
 */
export function buildTeamSegmentProfile(inputs: TeamInputs, config: EngineConfig): SegmentProfile {
  const { teamId, season } = inputs;
  const teamShots = inputs.shots.filter(s => s.shooterTeamId === teamId);
  const events: ScoringEventRecord[] = [];
  for (const shot of teamShots) {
    const base = { gameId: shot.gameId, playerId: shot.shooterId, teamId, period: shot.period, periodSeconds: shot.periodSeconds };
    events.push({ ...base, kind: 'shot' });
    if (shot.isGoal) events.push({ ...base, kind: 'goal' });
  }

  return buildSegmentProfile({
    entityId: teamId,
    entityKind: 'team',
    season,
    games: inputs.games,
    entityGameIds: playedTeamGames(inputs).map(g => g.gameId),
    events,
    seasonTotals: {
      goals: teamShots.filter(s => s.isGoal).length,
      assists: 0,
      shots: teamShots.length
    }
  }, config);
}

function teamSegmentFactors(
  inputs: TeamInputs,
  features: SimulationFeatures,
  config: EngineConfig,
  cache: ProfileCache
): { factors: Record<SimSegment, number>; profile: SegmentProfile | null } {
  if (!features.segmentWeights) {
    return { factors: recordOf(SIM_SEGMENTS, () => 1), profile: null };
  }

  const profile = cache.segmentProfile(`team:${inputs.teamId}@${inputs.date}`, inputs.season, () =>
    buildTeamSegmentProfile(inputs, config)
  );

  const phase = seasonPhaseForDate(inputs.games, inputs.date);
  const byPhase = segmentScoringFactors(profile, phase, config);
  return {
    factors: { early: byPhase.early, mid: byPhase.mid, late: byPhase.late, overtime: byPhase.late },
    profile
  };
}

/**
 * Build the read-only context one team brings into a simulation: blended
 * shooter and goalie profiles, per-segment adjustments and data-quality notes.
 */
export function buildTeamContext(
  inputs: TeamInputs,
  features: SimulationFeatures,
  config: EngineConfig,
  cache: ProfileCache = new ProfileCache()
): TeamSimulationContext {
  const { teamId, season, opponentTeamId, date } = inputs;

  // team-level shot profile doubles as the fallback for skaters without shots
  const teamProfile = cache.zoneProfile(`team:${teamId}:for@${inputs.date}`, season, () =>
    buildZoneProfile(inputs.shots, { entityId: teamId, entityKind: 'team', season, perspective: 'for' }, config)
  );

  const { goalie, matchup: goalieMatchup } = resolveGoalie(inputs, config, cache);
  const segments = teamSegmentFactors(inputs, features, config, cache);

  const synergy = cache.synergyMatrix(`team:${teamId}@${inputs.date}`, season, () =>
    buildSynergyMatrix(inputs.sharedIce, onIceGoalsPer60(inputs.sharedIce), config)
  );
  const fatigue = fatigueModifier(buildScheduleContext(inputs.schedule, date), config);

  const shooterIds = new Set(inputs.shots.map(s => s.shooterId));
  const lowMatchupSample: number[] = [];
  const sparseZoneProfiles: number[] = [];
  let segmentWarnings = segments.profile?.warnings.length ?? 0;

  if (goalieMatchup.sampleSize < config.matchup.minGames) lowMatchupSample.push(goalie.goalieId);

  const seen = new Set<number>();
  const drafts: Array<Omit<ResolvedShooter, 'opportunityShare'> & { shotsPerGame: number }> = [];

  for (const line of inputs.lines) {
    const lineScore = lineSynergy(synergy, line.playerIds);

    for (const playerId of line.playerIds) {
      if (seen.has(playerId)) continue;
      seen.add(playerId);

      const rows = inputs.skaterRows.filter(r => r.playerId === playerId);
      const general = cache.generalProfile(`skater:${playerId}@${inputs.date}`, season, () =>
        buildSkaterGeneralProfile(playerId, season, rows)
      );
      const matchup = weighSkaterMatchup(
        playerId, season, opponentTeamId, general, buildSkaterMatchupHistory(rows, opponentTeamId), config
      );
      if (matchup.sampleSize < config.matchup.minGames) lowMatchupSample.push(playerId);

      let zoneProfile: ZoneProfile = teamProfile;
      if (shooterIds.has(playerId)) {
        zoneProfile = cache.zoneProfile(`skater:${playerId}:for@${inputs.date}`, season, () =>
          buildZoneProfile(inputs.shots, { entityId: playerId, entityKind: 'skater', season, perspective: 'for' }, config)
        );
      }
      if (zoneProfile === teamProfile || zoneProfile.totals.shots < config.simulation.minZoneShots) {
        sparseZoneProfiles.push(playerId);
      }

      const segmentProfile = cache.segmentProfile(`skater:${playerId}@${inputs.date}`, season, () =>
        buildSegmentProfile({
          entityId: playerId,
          entityKind: 'player',
          season,
          // league-wide games so rows from another club still map to a phase
          games: inputs.games,
          entityGameIds: rows.map(r => r.gameId),
          events: inputs.scoringEvents,
          seasonTotals: seasonTotalsFromRows(rows)
        }, config)
      );
      segmentWarnings += segmentProfile.warnings.length;

      const momentum = classifyMomentum(rows, date, {
        pointsPerGame: matchup.general.goalsPerGame + matchup.general.assistsPerGame,
        shootingPct: matchup.general.shootingPct
      }, config);

      const finishingFactor = clamp(
        safeDivide(matchup.blended.shootingPct, matchup.general.shootingPct, 1),
        config.simulation.finishingFactorMin,
        config.simulation.finishingFactorMax
      );

      const shotTypesByZone: ResolvedShooter['shotTypesByZone'] = {};
      for (const zone of ZONES) {
        if (zoneProfile.zones[zone].shots > 0) shotTypesByZone[zone] = shotTypeDistribution(zoneProfile, zone);
      }

      drafts.push({
        playerId,
        lineId: line.lineId,
        shotsPerGame: Math.max(0, matchup.blended.shotsPerGame),
        zoneDistribution: zoneDistribution(zoneProfile),
        shotTypesByZone,
        zoneGoalRates: shrunkZoneGoalRates(zoneProfile, config),
        finishingFactor,
        adjustments: segmentAdjustments({
          clutch: clutchModifier(segmentProfile, config),
          fatigue,
          momentum: momentum.modifier,
          synergy: synergyFactor(lineScore, config)
        }, features)
      });
    }
  }

  if (drafts.length === 0) {
    throw new InsufficientDataError(
      `Team ${teamId} has no skaters in its line assignments`,
      { entityId: teamId, entityKind: 'team', season, scope: 'line assignments', reason: 'empty-scope' }
    );
  }

  const totalShots = drafts.reduce((sum, d) => sum + d.shotsPerGame, 0);
  const shooters: ResolvedShooter[] = drafts.map(({ shotsPerGame, ...rest }) => ({
    ...rest,
    opportunityShare: totalShots > 0 ? shotsPerGame / totalShots : 1 / drafts.length
  }));

  return {
    teamId,
    shotsPerGame: totalShots > 0 ? totalShots : config.simulation.leagueShotsPerGame,
    segmentFactors: segments.factors,
    shooters,
    goalie,
    quality: {
      entities: shooters.length + 1,
      lowMatchupSample,
      sparseZoneProfiles,
      segmentWarnings
    }
  };
}
