// server/src/simulation/types.ts

export const ZONES = [
  'crease',
  'inner_slot',
  'slot',
  'high_slot',
  'left_circle',
  'right_circle',
  'left_wing',
  'right_wing',
  'left_point',
  'right_point',
  'behind_net',
  'neutral_zone',
  'other'
] as const;
export type Zone = typeof ZONES[number];

export const SHOT_TYPES = ['wrist', 'slap', 'snap', 'backhand', 'tip-in', 'deflected', 'wrap-around'] as const;
export type ShotType = typeof SHOT_TYPES[number];

export const SEASON_PHASES = ['early', 'mid', 'late', 'playoffs'] as const;
export type SeasonPhase = typeof SEASON_PHASES[number];

export const GAME_PHASES = ['early', 'mid', 'late'] as const;
export type GamePhase = typeof GAME_PHASES[number];

// Game phases plus the overtime segment only the simulator plays
export const SIM_SEGMENTS = ['early', 'mid', 'late', 'overtime'] as const;
export type SimSegment = typeof SIM_SEGMENTS[number];

export const FORWARD_POSITIONS = ['LW', 'C', 'RW'] as const;
export const DEFENSE_POSITIONS = ['LD', 'RD'] as const;

export type EntityKind = 'skater' | 'goalie' | 'line' | 'team';
export type GameType = 'regular' | 'playoff';

export function isZone(value: string): value is Zone {
  return (ZONES as readonly string[]).includes(value);
}

export function isShotType(value: string): value is ShotType {
  return (SHOT_TYPES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Raw records handed to the builders
// ---------------------------------------------------------------------------

export interface ShotEventRecord {
  gameId: number;
  shooterId: number;
  shooterTeamId: number;
  goalieId: number | null;
  defendingTeamId: number;
  x: number | null;
  y: number | null;
  zone?: Zone | null; // pre-classified, wins over coordinates
  shotType: ShotType;
  isGoal: boolean;
  period: number;
  periodSeconds: number;
}

export interface GameInfo {
  gameId: number;
  season: number;
  date: string; // YYYY-MM-DD
  gameType: GameType;
  homeTeamId: number;
  awayTeamId: number;
  homeScore: number | null;
  awayScore: number | null;
}

export type ScoringEventKind = 'goal' | 'assist' | 'shot';

export interface ScoringEventRecord {
  gameId: number;
  playerId: number;
  teamId: number;
  kind: ScoringEventKind;
  period: number;
  periodSeconds: number;
}

export interface SkaterGameRow {
  gameId: number;
  playerId: number;
  teamId: number;
  opponentTeamId: number;
  date: string;
  goals: number;
  assists: number;
  shots: number;
  timeOnIceSeconds: number;
}

export interface GoalieGameRow {
  gameId: number;
  goalieId: number;
  teamId: number;
  opponentTeamId: number;
  date: string;
  shotsAgainst: number;
  goalsAgainst: number;
  timeOnIceSeconds: number;
}

/** One pair's time together in one game. */
export interface SharedIceRecord {
  gameId: number;
  playerA: number;
  playerB: number;
  timeOnIceSeconds: number;
  goalsFor: number;
  shotsFor: number;
}

export interface ScheduleEntry {
  gameId: number;
  date: string;
  isHome: boolean;
}

export interface LineAssignment {
  lineId: string;
  kind: 'forward' | 'defense';
  playerIds: number[];
}

// ---------------------------------------------------------------------------
// Zone profiles
// ---------------------------------------------------------------------------

export interface ZoneStats {
  shots: number;
  goals: number;
  expectedGoals: number;
  shotTypes: Record<ShotType, number>;
  goalsByShotType: Record<ShotType, number>;
}

export interface ZoneProfileScope {
  entityId: number;
  entityKind: EntityKind;
  season: number;
  // 'for' = shots taken by the entity, 'against' = shots faced (goalies, team defence)
  perspective: 'for' | 'against';
  opponentTeamId?: number;
}

export interface ZoneProfile {
  scope: ZoneProfileScope;
  zones: Record<Zone, ZoneStats>;
  totals: { shots: number; goals: number; expectedGoals: number };
}

// ---------------------------------------------------------------------------
// Segment profiles
// ---------------------------------------------------------------------------

export interface SegmentStatLine {
  games: number;
  goals: number;
  assists: number;
  shots: number;
}

export interface SegmentTotals {
  goals: number;
  assists: number;
  shots: number;
}

export interface ReconciliationMismatch {
  stat: keyof SegmentTotals;
  segmentTotal: number;
  seasonTotal: number;
}

export interface SegmentWarning {
  code: 'reconciliation-mismatch' | 'unassigned-event';
  message: string;
  gameId?: number;
  mismatch?: ReconciliationMismatch;
}

export interface ReconciliationResult {
  ok: boolean;
  segmentTotals: SegmentTotals;
  seasonTotals: SegmentTotals;
  mismatches: ReconciliationMismatch[];
}

export interface SegmentProfile {
  entityId: number;
  season: number;
  gamesPlayed: number;
  cells: Record<SeasonPhase, Record<GamePhase, SegmentStatLine>>;
  reconciliation: ReconciliationResult;
  warnings: SegmentWarning[];
}

// ---------------------------------------------------------------------------
// General vs matchup profiles (closed stat sets per entity kind)
// ---------------------------------------------------------------------------

export interface SkaterRates {
  goalsPerGame: number;
  assistsPerGame: number;
  shotsPerGame: number;
  shootingPct: number;
}

export interface GoalieRates {
  savePct: number;
  goalsAgainstAverage: number;
  shotsAgainstPerGame: number;
}

export type GeneralProfile =
  | { kind: 'skater'; entityId: number; season: number; gamesPlayed: number; rates: SkaterRates; stdDev: SkaterRates }
  | { kind: 'goalie'; entityId: number; season: number; gamesPlayed: number; rates: GoalieRates; stdDev: GoalieRates };

export type MatchupHistory =
  | { kind: 'skater'; opponentTeamId: number; gamesPlayed: number; shots: number; rates: SkaterRates }
  | { kind: 'goalie'; opponentTeamId: number; gamesPlayed: number; shotsAgainst: number; rates: GoalieRates };

export interface MatchupProfile<R = SkaterRates | GoalieRates> {
  kind: 'skater' | 'goalie';
  entityId: number;
  opponentTeamId: number;
  season: number;
  sampleSize: number;
  general: R;
  matchup: R | null;
  deviations: Record<string, number>;
  similarityScore: number;
  sampleConfidence: number;
  matchupWeight: number;
  generalWeight: number;
  blended: R;
}

// ---------------------------------------------------------------------------
// Adjustments
// ---------------------------------------------------------------------------

export interface AdjustmentSet {
  clutch: number;
  fatigue: number;
  momentum: number;
  synergy: number;
}

export const NEUTRAL_ADJUSTMENTS: Readonly<AdjustmentSet> = Object.freeze({
  clutch: 1,
  fatigue: 1,
  momentum: 1,
  synergy: 1
});

export type MomentumState = 'hot' | 'cold' | 'neutral';

export interface MomentumReading {
  state: MomentumState;
  confidence: number;
  deviation: number; // points per game, relative to the season rate
  shootingDeviation: number;
  recentGames: number;
  modifier: number;
}

export interface ScheduleContext {
  daysRest: number | null;
  isBackToBack: boolean;
  gamesInLast7Days: number;
}

// ---------------------------------------------------------------------------
// Simulation inputs
// ---------------------------------------------------------------------------

export interface SimulationFeatures {
  synergy: boolean;
  clutch: boolean;
  fatigue: boolean;
  momentum: boolean;
  segmentWeights: boolean;
}

export interface SimulationConfig {
  homeTeamId: number;
  awayTeamId: number;
  iterationCount: number;
  randomSeed?: number;
  features: SimulationFeatures;
  segmentWeights: Record<SimSegment, number>;
}

export interface ResolvedShooter {
  playerId: number;
  lineId: string;
  opportunityShare: number;
  zoneDistribution: Array<{ value: Zone; weight: number }>;
  shotTypesByZone: Partial<Record<Zone, Array<{ value: ShotType; weight: number }>>>;
  zoneGoalRates: Record<Zone, number>;
  finishingFactor: number;
  adjustments: Record<SimSegment, AdjustmentSet>;
}

export interface ResolvedGoalie {
  goalieId: number;
  zoneSaveRates: Record<Zone, number>;
  shotTypeSaveRates: Record<ShotType, number>;
  shotsAgainstPerGame: number;
}

export interface DataQualityReport {
  entities: number;
  lowMatchupSample: number[];
  sparseZoneProfiles: number[];
  segmentWarnings: number;
}

export interface TeamSimulationContext {
  teamId: number;
  shotsPerGame: number;
  segmentFactors: Record<SimSegment, number>;
  shooters: ResolvedShooter[];
  goalie: ResolvedGoalie;
  quality: DataQualityReport;
}

// ---------------------------------------------------------------------------
// Trial output
// ---------------------------------------------------------------------------

export interface SegmentTally {
  homeGoals: number;
  awayGoals: number;
  homeShots: number;
  awayShots: number;
  homeExpectedGoals: number;
  awayExpectedGoals: number;
}

export type Decision = 'regulation' | 'overtime' | 'shootout' | 'draw';

export interface TrialRecord {
  index: number;
  homeScore: number;
  awayScore: number;
  decidedBy: Decision;
  segments: Record<SimSegment, SegmentTally>;
}

export interface FinalScore {
  home: number;
  away: number;
}
