// server/src/simulation/engine.ts

import type { EngineConfig } from './config.js';
import { segmentDurationShares } from './config.js';
import { SimulationAbortedError } from './errors.js';
import { resolveGoalProbability } from './expectedGoals.js';
import { SeededRandom, deriveSeed, randomBaseSeed } from './random.js';
import type { Weighted } from './random.js';
import { SimulationResult } from './result.js';
import type { SimulationMeta } from './result.js';
import { recordOf } from './stats.js';
import { SIM_SEGMENTS } from './types.js';
import type {
  Decision, ResolvedShooter, SegmentTally, ShotType, SimSegment, SimulationConfig,
  TeamSimulationContext, TrialRecord
} from './types.js';

type Side = 'home' | 'away';

const REGULATION: readonly SimSegment[] = ['early', 'mid', 'late'];
const FALLBACK_SHOT_TYPES: ReadonlyArray<Weighted<ShotType>> = [{ value: 'wrist', weight: 1 }];

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export interface MatchupContext {
  home: TeamSimulationContext;
  away: TeamSimulationContext;
  season: number;
  date: string;
}

function emptyTally(): SegmentTally {
  return { homeGoals: 0, awayGoals: 0, homeShots: 0, awayShots: 0, homeExpectedGoals: 0, awayExpectedGoals: 0 };
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' ? reason : undefined;
}

/**
 * Plays independent game trials over read-only team contexts. Trial `i` always
 * draws from the stream seeded by deriveSeed(seed, i), so any split of the
 * index range reproduces the single-run sequence.
 */
export class MonteCarloEngine {
  readonly seed: number;
  private readonly shooterOptions: Record<Side, Array<Weighted<ResolvedShooter>>>;
  private readonly shares: Record<SimSegment, number>;

  constructor(
    private readonly matchup: MatchupContext,
    private readonly simConfig: SimulationConfig,
    private readonly config: EngineConfig
  ) {
    this.seed = simConfig.randomSeed ?? randomBaseSeed();
    this.shares = segmentDurationShares(config);
    this.shooterOptions = {
      home: matchup.home.shooters.map(s => ({ value: s, weight: s.opportunityShare })),
      away: matchup.away.shooters.map(s => ({ value: s, weight: s.opportunityShare }))
    };
  }

  private team(side: Side): TeamSimulationContext {
    return side === 'home' ? this.matchup.home : this.matchup.away;
  }

  /** Expected shot attempts for one side in one segment. */
  opportunityRate(side: Side, segment: SimSegment): number {
    const attack = this.team(side);
    const defense = this.team(side === 'home' ? 'away' : 'home');
    const sim = this.config.simulation;

    const weight = this.simConfig.features.segmentWeights ? this.simConfig.segmentWeights[segment] : 1;
    const pace = 0.5 + 0.5 * (defense.goalie.shotsAgainstPerGame / sim.leagueShotsPerGame);
    const homeIce = side === 'home' ? 1 + sim.homeIceAdvantage : 1;
    const overtimePace = segment === 'overtime' ? sim.overtimePaceMultiplier : 1;

    return attack.shotsPerGame * this.shares[segment] * weight * attack.segmentFactors[segment] * pace * homeIce * overtimePace;
  }

  /** One attempt: shooter, zone, shot type, then the goal draw. */
  private attempt(rng: SeededRandom, side: Side, segment: SimSegment, tally: SegmentTally): boolean {
    const defense = this.team(side === 'home' ? 'away' : 'home');
    const shooter = rng.weightedChoice(this.shooterOptions[side]);
    const zone = rng.weightedChoice(shooter.zoneDistribution);
    const shotType = rng.weightedChoice(shooter.shotTypesByZone[zone] ?? FALLBACK_SHOT_TYPES);

    const p = resolveGoalProbability(shooter, zone, shotType, defense.goalie, shooter.adjustments[segment], this.config);
    const scored = rng.chance(p);

    if (side === 'home') {
      tally.homeShots++;
      tally.homeExpectedGoals += p;
      if (scored) tally.homeGoals++;
    } else {
      tally.awayShots++;
      tally.awayExpectedGoals += p;
      if (scored) tally.awayGoals++;
    }
    return scored;
  }

  private playSegment(rng: SeededRandom, segment: SimSegment, tally: SegmentTally): void {
    for (const side of ['home', 'away'] as const) {
      const attempts = rng.poisson(this.opportunityRate(side, segment));
      for (let i = 0; i < attempts; i++) this.attempt(rng, side, segment, tally);
    }
  }

  /**
   * Sudden death: both sides' attempts for the period are drawn up front and
   * interleaved by a seeded shuffle; the first goal ends it.
   */
  private playOvertime(rng: SeededRandom, tally: SegmentTally): Side | null {
    const order: Side[] = [];
    for (const side of ['home', 'away'] as const) {
      const attempts = rng.poisson(this.opportunityRate(side, 'overtime'));
      for (let i = 0; i < attempts; i++) order.push(side);
    }
    for (const side of rng.shuffle(order)) {
      if (this.attempt(rng, side, 'overtime', tally)) return side;
    }
    return null;
  }

  private playShootout(rng: SeededRandom): Side {
    const { shootoutRounds, shootoutMaxRounds, shootoutGoalProbability: p } = this.config.simulation;
    let home = 0;
    let away = 0;

    for (let round = 1; round <= shootoutMaxRounds; round++) {
      if (rng.chance(p)) home++;
      if (rng.chance(p)) away++;
      if (round >= shootoutRounds && home !== away) return home > away ? 'home' : 'away';
    }
    return rng.chance(0.5) ? 'home' : 'away';
  }

  playTrial(index: number): TrialRecord {
    const rng = new SeededRandom(deriveSeed(this.seed, index));
    const segments = recordOf(SIM_SEGMENTS, emptyTally);

    for (const segment of REGULATION) this.playSegment(rng, segment, segments[segment]);

    let homeScore = REGULATION.reduce((sum, s) => sum + segments[s].homeGoals, 0);
    let awayScore = REGULATION.reduce((sum, s) => sum + segments[s].awayGoals, 0);
    let decidedBy: Decision = 'regulation';

    if (homeScore === awayScore) {
      const winner = this.playOvertime(rng, segments.overtime);
      if (winner) {
        decidedBy = 'overtime';
      } else if (this.config.simulation.overtimePolicy === 'shootout') {
        decidedBy = 'shootout';
        if (this.playShootout(rng) === 'home') homeScore++;
        else awayScore++;
      } else {
        decidedBy = 'draw';
      }
      homeScore += segments.overtime.homeGoals;
      awayScore += segments.overtime.awayGoals;
    }

    return { index, homeScore, awayScore, decidedBy, segments };
  }

  /** Trials [start, end) in index order. */
  runRange(start: number, end: number): TrialRecord[] {
    const trials: TrialRecord[] = [];
    for (let i = start; i < end; i++) trials.push(this.playTrial(i));
    return trials;
  }

  /**
   * Play every trial, yielding to the event loop every `yieldEvery` trials.
   * An abort is honoured between trials and produces a partial result
   * tagged with SimulationAbortedError.
   */
  async run(options: RunOptions = {}): Promise<SimulationResult> {
    const total = this.simConfig.iterationCount;
    const every = this.config.simulation.yieldEvery;
    const trials: TrialRecord[] = [];
    let aborted: SimulationAbortedError | null = null;

    for (let i = 0; i < total; i++) {
      if (options.signal?.aborted) {
        aborted = new SimulationAbortedError(i, total, abortReason(options.signal));
        break;
      }
      trials.push(this.playTrial(i));

      if ((i + 1) % every === 0 && i + 1 < total) {
        options.onProgress?.(i + 1, total);
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    }
    if (!aborted) options.onProgress?.(trials.length, total);

    return new SimulationResult(this.meta(), trials, aborted);
  }

  /** Synchronous full run, for scripts and tests that need no cancellation. */
  runAll(): SimulationResult {
    return new SimulationResult(this.meta(), this.runRange(0, this.simConfig.iterationCount), null);
  }

  private meta(): SimulationMeta {
    return {
      homeTeamId: this.matchup.home.teamId,
      awayTeamId: this.matchup.away.teamId,
      season: this.matchup.season,
      date: this.matchup.date,
      seed: this.seed,
      requestedIterations: this.simConfig.iterationCount,
      config: this.simConfig,
      quality: { home: this.matchup.home.quality, away: this.matchup.away.quality }
    };
  }
}
