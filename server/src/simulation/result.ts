// server/src/simulation/result.ts
// Immutable reduction over a finished (or aborted) batch of trials. Every
// metric here is derived from the stored trial records.

import type { SimulationAbortedError } from './errors.js';
import { recordOf, roundTo, safeDivide } from './stats.js';
import { SIM_SEGMENTS } from './types.js';
import type {
  DataQualityReport, Decision, FinalScore, SimSegment, SimulationConfig, TrialRecord
} from './types.js';

export interface SimulationMeta {
  homeTeamId: number;
  awayTeamId: number;
  season: number;
  date: string;
  seed: number;
  requestedIterations: number;
  config: SimulationConfig;
  quality: { home: DataQualityReport; away: DataQualityReport };
}

export interface ScoreFrequency {
  home: number;
  away: number;
  count: number;
  probability: number;
}

export interface SegmentOutcome {
  homeGoals: number;
  awayGoals: number;
  homeShots: number;
  awayShots: number;
  homeExpectedGoals: number;
  awayExpectedGoals: number;
  homeWinRate: number;
  awayWinRate: number;
  tiedRate: number;
}

export interface SegmentBreakdown {
  segments: Record<SimSegment, SegmentOutcome>;
  dominantSegment: SimSegment;
  dominantSegmentHome: SimSegment;
  dominantSegmentAway: SimSegment;
}

export type WinConfidence = 'very_high' | 'high' | 'medium' | 'low';
export type MatchupType = 'blowout' | 'competitive' | 'toss-up';

export interface PredictionSummary {
  predictedWinner: 'home' | 'away';
  winProbability: number;
  winConfidence: WinConfidence;
  matchupType: MatchupType;
  mostLikelyScore: FinalScore | null;
  averageGoals: FinalScore;
  decisionRates: Record<Decision, number>;
  homeWins: Record<Exclude<Decision, 'draw'>, number>;
  awayWins: Record<Exclude<Decision, 'draw'>, number>;
}

const DECISIONS: readonly Decision[] = ['regulation', 'overtime', 'shootout', 'draw'];
const WIN_DECISIONS = ['regulation', 'overtime', 'shootout'] as const;

export function winConfidenceClass(probability: number): WinConfidence {
  if (probability >= 0.75) return 'very_high';
  if (probability >= 0.65) return 'high';
  if (probability >= 0.55) return 'medium';
  return 'low';
}

export function matchupTypeOf(favouriteProbability: number): MatchupType {
  if (favouriteProbability >= 0.7) return 'blowout';
  if (favouriteProbability < 0.55) return 'toss-up';
  return 'competitive';
}

/**
 * Confidence in [0, 1]: input completeness (share of entities with thin
 * matchup history or sparse zone data) scaled by trial-count precision. The
 * precision term uses the worst-case standard error, so an even split is not
 * penalised.
 */
export function confidenceFromQuality(
  home: DataQualityReport,
  away: DataQualityReport,
  trials: number
): number {
  const entities = home.entities + away.entities;
  const lowShare = safeDivide(home.lowMatchupSample.length + away.lowMatchupSample.length, entities);
  const sparseShare = safeDivide(home.sparseZoneProfiles.length + away.sparseZoneProfiles.length, entities);
  const completeness = Math.max(0, 1 - 0.4 * lowShare - 0.6 * sparseShare);

  const standardError = trials > 0 ? 0.5 / Math.sqrt(trials) : Infinity;
  const precision = 1 - Math.min(1, standardError / 0.05);
  return completeness * (0.8 + 0.2 * precision);
}

export class SimulationResult {
  readonly meta: Readonly<SimulationMeta>;
  readonly complete: boolean;
  readonly abortError: SimulationAbortedError | null;
  readonly trials: readonly TrialRecord[];
  readonly perIterationScores: readonly FinalScore[];
  readonly winProbabilityHome: number;
  readonly winProbabilityAway: number;
  readonly drawRate: number;
  readonly confidenceScore: number;

  private breakdownCache: SegmentBreakdown | null = null;
  private distributionCache: ScoreFrequency[] | null = null;

  constructor(meta: SimulationMeta, trials: readonly TrialRecord[], abortError: SimulationAbortedError | null) {
    this.meta = Object.freeze({ ...meta });
    this.trials = Object.freeze(trials.slice());
    this.abortError = abortError;
    this.complete = abortError === null && trials.length === meta.requestedIterations;
    this.perIterationScores = Object.freeze(
      this.trials.map(t => Object.freeze({ home: t.homeScore, away: t.awayScore }))
    );

    let home = 0;
    let away = 0;
    for (const t of this.trials) {
      if (t.homeScore > t.awayScore) home++;
      else if (t.awayScore > t.homeScore) away++;
    }
    const n = this.trials.length;
    this.winProbabilityHome = safeDivide(home, n);
    this.winProbabilityAway = safeDivide(away, n);
    this.drawRate = safeDivide(n - home - away, n);
    this.confidenceScore = confidenceFromQuality(meta.quality.home, meta.quality.away, n);
  }

  get iterations(): number {
    return this.trials.length;
  }

  /** (home, away) frequency table, most frequent first. */
  scoreDistribution(): readonly ScoreFrequency[] {
    if (this.distributionCache) return this.distributionCache;

    const counts = new Map<string, ScoreFrequency>();
    for (const score of this.perIterationScores) {
      const key = `${score.home}-${score.away}`;
      const entry = counts.get(key) ?? { home: score.home, away: score.away, count: 0, probability: 0 };
      entry.count++;
      counts.set(key, entry);
    }
    const n = this.iterations;
    this.distributionCache = [...counts.values()]
      .map(entry => ({ ...entry, probability: safeDivide(entry.count, n) }))
      .sort((a, b) => b.count - a.count || a.home - b.home || a.away - b.away);
    return this.distributionCache;
  }

  segmentBreakdown(): SegmentBreakdown {
    if (this.breakdownCache) return this.breakdownCache;
    const n = this.iterations;

    const segments = recordOf(SIM_SEGMENTS, segment => {
      const out: SegmentOutcome = {
        homeGoals: 0, awayGoals: 0, homeShots: 0, awayShots: 0,
        homeExpectedGoals: 0, awayExpectedGoals: 0,
        homeWinRate: 0, awayWinRate: 0, tiedRate: 0
      };
      for (const trial of this.trials) {
        const tally = trial.segments[segment];
        out.homeGoals += tally.homeGoals;
        out.awayGoals += tally.awayGoals;
        out.homeShots += tally.homeShots;
        out.awayShots += tally.awayShots;
        out.homeExpectedGoals += tally.homeExpectedGoals;
        out.awayExpectedGoals += tally.awayExpectedGoals;
        if (tally.homeGoals > tally.awayGoals) out.homeWinRate++;
        else if (tally.awayGoals > tally.homeGoals) out.awayWinRate++;
        else out.tiedRate++;
      }
      return {
        homeGoals: safeDivide(out.homeGoals, n),
        awayGoals: safeDivide(out.awayGoals, n),
        homeShots: safeDivide(out.homeShots, n),
        awayShots: safeDivide(out.awayShots, n),
        homeExpectedGoals: safeDivide(out.homeExpectedGoals, n),
        awayExpectedGoals: safeDivide(out.awayExpectedGoals, n),
        homeWinRate: safeDivide(out.homeWinRate, n),
        awayWinRate: safeDivide(out.awayWinRate, n),
        tiedRate: safeDivide(out.tiedRate, n)
      };
    });

    const top = (value: (s: SegmentOutcome) => number): SimSegment =>
      SIM_SEGMENTS.reduce((best, s) => (value(segments[s]) > value(segments[best]) ? s : best), SIM_SEGMENTS[0]);

    this.breakdownCache = {
      segments,
      dominantSegment: top(s => s.homeExpectedGoals + s.awayExpectedGoals),
      dominantSegmentHome: top(s => s.homeExpectedGoals),
      dominantSegmentAway: top(s => s.awayExpectedGoals)
    };
    return this.breakdownCache;
  }

  summary(): PredictionSummary {
    const n = this.iterations;
    const home = this.winProbabilityHome >= this.winProbabilityAway;
    const favourite = home ? this.winProbabilityHome : this.winProbabilityAway;

    const decisionRates = recordOf(DECISIONS, d => safeDivide(this.trials.filter(t => t.decidedBy === d).length, n));
    const winsBy = (side: 'home' | 'away') => recordOf(WIN_DECISIONS, d => safeDivide(
      this.trials.filter(t => t.decidedBy === d && (side === 'home' ? t.homeScore > t.awayScore : t.awayScore > t.homeScore)).length,
      n
    ));

    const top = this.scoreDistribution()[0];
    return {
      predictedWinner: home ? 'home' : 'away',
      winProbability: favourite,
      winConfidence: winConfidenceClass(favourite),
      matchupType: matchupTypeOf(favourite),
      mostLikelyScore: top ? { home: top.home, away: top.away } : null,
      averageGoals: {
        home: safeDivide(this.perIterationScores.reduce((sum, s) => sum + s.home, 0), n),
        away: safeDivide(this.perIterationScores.reduce((sum, s) => sum + s.away, 0), n)
      },
      decisionRates,
      homeWins: winsBy('home'),
      awayWins: winsBy('away')
    };
  }

  toJSON() {
    const summary = this.summary();
    return {
      homeTeamId: this.meta.homeTeamId,
      awayTeamId: this.meta.awayTeamId,
      season: this.meta.season,
      date: this.meta.date,
      seed: this.meta.seed,
      iterations: this.iterations,
      requestedIterations: this.meta.requestedIterations,
      complete: this.complete,
      aborted: this.abortError ? this.abortError.toJSON() : null,
      winProbabilityHome: this.winProbabilityHome,
      winProbabilityAway: this.winProbabilityAway,
      drawRate: this.drawRate,
      confidenceScore: this.confidenceScore,
      summary,
      scoreDistribution: this.scoreDistribution().slice(0, 20),
      segmentBreakdown: this.segmentBreakdown(),
      dataQuality: this.meta.quality,
      features: this.meta.config.features
    };
  }

  renderSummary(homeName = `Team ${this.meta.homeTeamId}`, awayName = `Team ${this.meta.awayTeamId}`): string {
    const pct = (v: number) => `${roundTo(v * 100, 1).toFixed(1)}%`;
    const s = this.summary();
    const breakdown = this.segmentBreakdown();
    const lines: string[] = [];

    lines.push(`${awayName} @ ${homeName}  (${this.meta.date}, season ${this.meta.season})`);
    lines.push(`Trials: ${this.iterations}/${this.meta.requestedIterations}${this.complete ? '' : ' (INCOMPLETE)'}  seed ${this.meta.seed}`);
    lines.push('');
    lines.push(`${homeName} win: ${pct(this.winProbabilityHome)}`);
    lines.push(`${awayName} win: ${pct(this.winProbabilityAway)}`);
    if (this.drawRate > 0) lines.push(`Draw: ${pct(this.drawRate)}`);
    lines.push(`Predicted winner: ${s.predictedWinner === 'home' ? homeName : awayName} (${s.winConfidence}, ${s.matchupType})`);
    if (s.mostLikelyScore) {
      lines.push(`Most likely score: ${s.mostLikelyScore.home}-${s.mostLikelyScore.away}`);
    }
    lines.push(`Average goals: ${s.averageGoals.home.toFixed(2)}-${s.averageGoals.away.toFixed(2)}`);
    lines.push(`Decided in regulation ${pct(s.decisionRates.regulation)}, overtime ${pct(s.decisionRates.overtime)}, shootout ${pct(s.decisionRates.shootout)}`);
    lines.push('');
    lines.push('Segment      xG home  xG away  home win  away win');
    for (const segment of SIM_SEGMENTS) {
      const o = breakdown.segments[segment];
      lines.push(
        `${segment.padEnd(12)} ${o.homeExpectedGoals.toFixed(2).padStart(7)}  ${o.awayExpectedGoals.toFixed(2).padStart(7)}  ${pct(o.homeWinRate).padStart(8)}  ${pct(o.awayWinRate).padStart(8)}`
      );
    }
    lines.push(`Most scoring expected in: ${breakdown.dominantSegment}`);
    lines.push(`Confidence: ${this.confidenceScore.toFixed(2)}`);
    return lines.join('\n');
  }
}
