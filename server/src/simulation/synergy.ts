// server/src/simulation/synergy.ts

import type { EngineConfig } from './config.js';
import { clamp, mean } from './stats.js';
import type { SharedIceRecord } from './types.js';

export interface PairSynergy {
  playerA: number; // always the lower id
  playerB: number;
  score: number;
  observedPer60: number;
  predictedPer60: number;
  sharedToiSeconds: number;
}

function pairKey(a: number, b: number): string {
  return a < b ? `${a}-${b}` : `${b}-${a}`;
}

/**
 * Symmetric chemistry matrix over unordered player pairs. Scores live in
 * (-1, 1); the diagonal is undefined.
 */
export class SynergyMatrix {
  private readonly pairs = new Map<string, PairSynergy>();

  set(entry: PairSynergy): void {
    this.pairs.set(pairKey(entry.playerA, entry.playerB), entry);
  }

  get(a: number, b: number): number | undefined {
    if (a === b) return undefined;
    return this.pairs.get(pairKey(a, b))?.score;
  }

  entry(a: number, b: number): PairSynergy | undefined {
    if (a === b) return undefined;
    return this.pairs.get(pairKey(a, b));
  }

  get size(): number {
    return this.pairs.size;
  }

  entries(): PairSynergy[] {
    return [...this.pairs.values()];
  }
}

/**
 * Score each pair as the normalised gap between the goal rate it produced
 * together and what adding the two players' individual contributions above
 * league average predicts. `individualGoalsPer60` maps player id to the
 * player's on-ice goals-for rate.
 */
export function buildSynergyMatrix(
  records: readonly SharedIceRecord[],
  individualGoalsPer60: ReadonlyMap<number, number>,
  config: EngineConfig
): SynergyMatrix {
  const { minSharedToiSeconds, leagueGoalsPer60: league, zScale } = config.synergy;
  const matrix = new SynergyMatrix();

  // fold every game and both orderings of a pair into one total before scoring
  const merged = new Map<string, Omit<SharedIceRecord, 'gameId'>>();
  for (const record of records) {
    if (record.playerA === record.playerB) continue;
    const key = pairKey(record.playerA, record.playerB);
    const existing = merged.get(key);
    merged.set(key, {
      playerA: Math.min(record.playerA, record.playerB),
      playerB: Math.max(record.playerA, record.playerB),
      timeOnIceSeconds: (existing?.timeOnIceSeconds ?? 0) + record.timeOnIceSeconds,
      goalsFor: (existing?.goalsFor ?? 0) + record.goalsFor,
      shotsFor: (existing?.shotsFor ?? 0) + record.shotsFor
    });
  }

  for (const record of merged.values()) {
    const hours = record.timeOnIceSeconds / 3600;
    const a = individualGoalsPer60.get(record.playerA) ?? league;
    const b = individualGoalsPer60.get(record.playerB) ?? league;
    const predicted = Math.max(0.1, league + (a - league) + (b - league));
    const observed = hours > 0 ? record.goalsFor / hours : 0;

    let score = 0;
    if (record.timeOnIceSeconds >= minSharedToiSeconds && hours > 0) {
      const z = (observed - predicted) / Math.sqrt(predicted / hours);
      score = Math.tanh(z / zScale);
    }

    matrix.set({
      playerA: record.playerA,
      playerB: record.playerB,
      score,
      observedPer60: observed,
      predictedPer60: predicted,
      sharedToiSeconds: record.timeOnIceSeconds
    });
  }
  return matrix;
}

/** Unweighted mean of every pair score within the line; unknown pairs count as 0. */
export function lineSynergy(matrix: SynergyMatrix, playerIds: readonly number[]): number {
  const scores: number[] = [];
  for (let i = 0; i < playerIds.length; i++) {
    for (let j = i + 1; j < playerIds.length; j++) {
      scores.push(matrix.get(playerIds[i], playerIds[j]) ?? 0);
    }
  }
  return mean(scores);
}

/** Map a line score onto a multiplier around 1.0. */
export function synergyFactor(score: number, config: EngineConfig): number {
  const max = config.synergy.maxEffect;
  return clamp(1 + score * max, 1 - max, 1 + max);
}

/** Each player's goals-for rate over all of their shared-ice time. */
export function onIceGoalsPer60(records: readonly SharedIceRecord[]): Map<number, number> {
  const totals = new Map<number, { goals: number; seconds: number }>();
  for (const record of records) {
    for (const id of [record.playerA, record.playerB]) {
      const t = totals.get(id) ?? { goals: 0, seconds: 0 };
      t.goals += record.goalsFor;
      t.seconds += record.timeOnIceSeconds;
      totals.set(id, t);
    }
  }

  const out = new Map<number, number>();
  for (const [id, t] of totals) {
    if (t.seconds > 0) out.set(id, (t.goals * 3600) / t.seconds);
  }
  return out;
}
