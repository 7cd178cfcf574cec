// server/src/services/csvData.ts
// CSV export layout shared by the database import and the file-backed data
// source. One file per table; header row required; bad rows are skipped and
// counted.

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { calendarDate } from '../simulation/simulationConfig.js';
import { SHOT_TYPES, ZONES } from '../simulation/types.js';

const blankToNull = (value: unknown) => (value === '' || value === undefined ? null : value);
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const int = z.coerce.number().int();
const num = z.coerce.number();
const optionalInt = z.preprocess(blankToNull, z.coerce.number().int().nullable());
const optionalNum = z.preprocess(blankToNull, z.coerce.number().nullable());
const optionalText = z.preprocess(blankToNull, z.string().trim().nullable());
const flag = z.preprocess(
  value => (typeof value === 'string' ? ['1', 'true', 'yes', 'y'].includes(value.trim().toLowerCase()) : value),
  z.boolean()
);
const isoDate = z.string().trim().pipe(calendarDate);

export const teamRowSchema = z.object({
  teamId: int,
  name: z.string().trim().min(1),
  nickname: optionalText,
  abbr: z.string().trim().min(1).max(10)
});

export const playerRowSchema = z.object({
  playerId: int,
  teamId: optionalInt,
  firstName: z.string().trim(),
  lastName: z.string().trim(),
  position: optionalText,
  shoots: optionalText,
  dateOfBirth: z.preprocess(blankToNull, isoDate.nullable()),
  retired: flag.optional().default(false)
});

export const gameRowSchema = z.object({
  gameId: int,
  season: int,
  date: isoDate,
  gameType: z.preprocess(blankToUndefined, z.enum(['regular', 'playoff']).default('regular')),
  homeTeamId: int,
  awayTeamId: int,
  homeScore: optionalInt,
  awayScore: optionalInt,
  overtime: flag.optional().default(false),
  shootout: flag.optional().default(false)
});

export const skaterStatRowSchema = z.object({
  gameId: int,
  season: int,
  playerId: int,
  teamId: int,
  opponentTeamId: int,
  goals: int.nonnegative(),
  assists: int.nonnegative(),
  shotsOnGoal: int.nonnegative(),
  timeOnIce: optionalInt // seconds
});

export const goalieStatRowSchema = z.object({
  gameId: int,
  season: int,
  playerId: int,
  teamId: int,
  opponentTeamId: int,
  shotsAgainst: int.nonnegative(),
  goalsAgainst: int.nonnegative(),
  timeOnIce: optionalInt,
  decision: optionalText
});

export const shotRowSchema = z.object({
  gameId: int,
  season: int,
  period: int.positive(),
  periodSeconds: int.nonnegative(),
  shooterId: int,
  shooterTeamId: int,
  goalieId: optionalInt,
  defendingTeamId: int,
  x: optionalNum,
  y: optionalNum,
  zone: z.preprocess(blankToNull, z.enum(ZONES).nullable()),
  shotType: z.enum(SHOT_TYPES),
  isGoal: flag
});

export const scoringEventRowSchema = z.object({
  gameId: int,
  season: int,
  playerId: int,
  teamId: int,
  kind: z.enum(['goal', 'assist', 'shot']),
  period: int.positive(),
  periodSeconds: int.nonnegative()
});

export const sharedIceRowSchema = z.object({
  season: int,
  gameId: int,
  teamId: int,
  playerA: int,
  playerB: int,
  timeOnIce: num.nonnegative(),
  goalsFor: int.nonnegative(),
  shotsFor: int.nonnegative()
});

export const lineRowSchema = z.object({
  teamId: int,
  situation: z.string().trim().min(1),
  position: z.string().trim().min(1),
  playerId: optionalInt,
  lineOrder: z.preprocess(blankToUndefined, int.positive().default(1))
});

export type TeamRow = z.infer<typeof teamRowSchema>;
export type PlayerRow = z.infer<typeof playerRowSchema>;
export type GameRow = z.infer<typeof gameRowSchema>;
export type SkaterStatRow = z.infer<typeof skaterStatRowSchema>;
export type GoalieStatRow = z.infer<typeof goalieStatRowSchema>;
export type ShotRow = z.infer<typeof shotRowSchema>;
export type ScoringEventRow = z.infer<typeof scoringEventRowSchema>;
export type SharedIceRow = z.infer<typeof sharedIceRowSchema>;
export type LineRow = z.infer<typeof lineRowSchema>;

export interface HistoricalDataset {
  teams: TeamRow[];
  players: PlayerRow[];
  games: GameRow[];
  skaterStats: SkaterStatRow[];
  goalieStats: GoalieStatRow[];
  shots: ShotRow[];
  scoringEvents: ScoringEventRow[];
  sharedIce: SharedIceRow[];
  lines: LineRow[];
}

export const CSV_FILES = {
  teams: 'teams.csv',
  players: 'players.csv',
  games: 'games.csv',
  skaterStats: 'skater_game_stats.csv',
  goalieStats: 'goalie_game_stats.csv',
  shots: 'shots.csv',
  scoringEvents: 'scoring_events.csv',
  sharedIce: 'shared_ice.csv',
  lines: 'team_lines.csv'
} as const satisfies Record<keyof HistoricalDataset, string>;

export interface CsvParseResult<T> {
  rows: T[];
  skipped: Array<{ line: number; issues: string[] }>;
}

/** Parse one CSV body against a row schema. Line numbers count the header as line 1. */
export function parseCsvRows<S extends z.ZodTypeAny>(
  content: string,
  schema: S,
  delimiter = ','
): CsvParseResult<z.infer<S>> {
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    delimiter,
    relax_column_count: true
  });
  if (!Array.isArray(records)) return { rows: [], skipped: [] };

  const rows: Array<z.infer<S>> = [];
  const skipped: CsvParseResult<z.infer<S>>['skipped'] = [];
  records.forEach((record: unknown, i) => {
    const parsed = schema.safeParse(record);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      skipped.push({
        line: i + 2,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
  });
  return { rows, skipped };
}

function readCsvFile<S extends z.ZodTypeAny>(dir: string, file: string, schema: S, delimiter: string): Array<z.infer<S>> {
  const filePath = path.join(dir, file);
  if (!fs.existsSync(filePath)) {
    console.warn(`${file} not found`);
    return [];
  }

  const { rows, skipped } = parseCsvRows(fs.readFileSync(filePath, 'utf-8'), schema, delimiter);
  if (skipped.length > 0) {
    const first = skipped[0];
    console.warn(`${file}: skipped ${skipped.length} bad rows (first at line ${first.line}: ${first.issues.join('; ')})`);
  }
  return rows;
}

/** Load every table of an export directory. Missing files load as empty tables. */
export function loadCsvDataset(dir: string, delimiter = process.env.CSV_DELIMITER ?? ','): HistoricalDataset {
  return {
    teams: readCsvFile(dir, CSV_FILES.teams, teamRowSchema, delimiter),
    players: readCsvFile(dir, CSV_FILES.players, playerRowSchema, delimiter),
    games: readCsvFile(dir, CSV_FILES.games, gameRowSchema, delimiter),
    skaterStats: readCsvFile(dir, CSV_FILES.skaterStats, skaterStatRowSchema, delimiter),
    goalieStats: readCsvFile(dir, CSV_FILES.goalieStats, goalieStatRowSchema, delimiter),
    shots: readCsvFile(dir, CSV_FILES.shots, shotRowSchema, delimiter),
    scoringEvents: readCsvFile(dir, CSV_FILES.scoringEvents, scoringEventRowSchema, delimiter),
    sharedIce: readCsvFile(dir, CSV_FILES.sharedIce, sharedIceRowSchema, delimiter),
    lines: readCsvFile(dir, CSV_FILES.lines, lineRowSchema, delimiter)
  };
}
