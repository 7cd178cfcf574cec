import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { gameRowSchema, lineRowSchema, loadCsvDataset, parseCsvRows, shotRowSchema, teamRowSchema } from './csvData.js';

describe('parseCsvRows', () => {
  it('coerces typed columns and fills defaults for blank cells', () => {
    const content = [
      'gameId,season,date,gameType,homeTeamId,awayTeamId,homeScore,awayScore,overtime,shootout',
      '1,2024,2024-10-05,,1,2,3,2,0,yes',
      '2,2024,2024-10-07,playoff,2,1,,,,'
    ].join('\n');

    const { rows, skipped } = parseCsvRows(content, gameRowSchema);
    expect(skipped).toEqual([]);
    expect(rows).toEqual([
      {
        gameId: 1, season: 2024, date: '2024-10-05', gameType: 'regular', homeTeamId: 1, awayTeamId: 2,
        homeScore: 3, awayScore: 2, overtime: false, shootout: true
      },
      {
        gameId: 2, season: 2024, date: '2024-10-07', gameType: 'playoff', homeTeamId: 2, awayTeamId: 1,
        homeScore: null, awayScore: null, overtime: false, shootout: false
      }
    ]);
  });

  it('skips bad rows and reports their line numbers', () => {
    const content = [
      'teamId,name,nickname,abbr',
      '1,Harbour Pilots,Pilots,HBP',
      'x,Ridge Foxes,,RDF',
      '3,Lake Herons,,'
    ].join('\n');

    const { rows, skipped } = parseCsvRows(content, teamRowSchema);
    expect(rows).toEqual([{ teamId: 1, name: 'Harbour Pilots', nickname: 'Pilots', abbr: 'HBP' }]);
    expect(skipped.map(s => s.line)).toEqual([3, 4]);
    expect(skipped[0].issues[0]).toMatch(/^teamId: /);
    expect(skipped[1].issues[0]).toMatch(/^abbr: /);
  });

  it('accepts another delimiter', () => {
    const content = 'teamId;situation;position;playerId;lineOrder\n1;ES_L1;C;102;\n1;G;G;;2';
    const { rows } = parseCsvRows(content, lineRowSchema, ';');
    expect(rows).toEqual([
      { teamId: 1, situation: 'ES_L1', position: 'C', playerId: 102, lineOrder: 1 },
      { teamId: 1, situation: 'G', position: 'G', playerId: null, lineOrder: 2 }
    ]);
  });

  it('validates shot zones and types', () => {
    const header = 'gameId,season,period,periodSeconds,shooterId,shooterTeamId,goalieId,defendingTeamId,x,y,zone,shotType,isGoal';
    const content = [
      header,
      '1,2024,1,30,101,1,209,2,75,-3,,wrist,1',
      '1,2024,2,45,102,1,,2,,,slot,snap,0',
      '1,2024,2,50,102,1,,2,,,moon,snap,0',
      '1,2024,2,55,102,1,,2,,,slot,knuckle,0'
    ].join('\n');

    const { rows, skipped } = parseCsvRows(content, shotRowSchema);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({ x: 75, y: -3, zone: null, isGoal: true, goalieId: 209 });
    expect(rows[1]).toMatchObject({ x: null, zone: 'slot', isGoal: false, goalieId: null });
    expect(skipped.map(s => s.line)).toEqual([4, 5]);
  });
});

describe('loadCsvDataset', () => {
  const dirs: string[] = [];

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads present files and warns about missing ones', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rink-csv-'));
    dirs.push(dir);
    fs.writeFileSync(path.join(dir, 'teams.csv'), 'teamId,name,nickname,abbr\n1,Harbour Pilots,,HBP\n2,Ridge Foxes,,\n');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const data = loadCsvDataset(dir, ',');

    expect(data.teams).toEqual([{ teamId: 1, name: 'Harbour Pilots', nickname: null, abbr: 'HBP' }]);
    expect(data.games).toEqual([]);
    expect(data.lines).toEqual([]);
    expect(warn).toHaveBeenCalledWith('games.csv not found');
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^teams\.csv: skipped 1 bad rows \(first at line 3: abbr: /));
  });
});
