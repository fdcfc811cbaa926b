import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Diagnostic } from '../src/errors.js';
import { collectWeather, matchMissionFile, MissionFileIndex, parseMissionText } from '../src/mission-text.js';
import { SAMPLE_MISSION_TEXT, createTempDir, removeDir, writeFixture } from './helpers/campaign-fixture.js';

describe('parseMissionText', () => {
  it('sets exactly the keys present in the file', () => {
    const text = ['Options', '{', '  LCName = 0;', '  Time = 9:5:0;', '  CloudLevel = 1200;', '  Haze = 0.2;', '}'].join('\n');

    const snapshot = parseMissionText(text, 'partial.mission');

    expect(snapshot).toEqual({ sourcePath: 'partial.mission', time: '09:05:00', cloudLevel: 1200, haze: 0.2 });
    expect(Object.keys(snapshot).sort()).toEqual(['cloudLevel', 'haze', 'sourcePath', 'time']);
  });

  it('reads every weather field and the wind layers of the Options block', () => {
    expect(parseMissionText(SAMPLE_MISSION_TEXT, 'full.mission')).toEqual({
      sourcePath: 'full.mission',
      time: '09:30:00',
      date: '1942-08-01',
      cloudLevel: 1500,
      cloudHeight: 600,
      cloudConfig: 'summer\\01_Light_01\\sky.ini',
      precipitationLevel: 0,
      precipitationType: 0,
      temperature: 22,
      pressure: 760,
      haze: 0.1,
      layerFog: 0,
      turbulence: 1,
      seaState: 0,
      windLayers: [
        { altitude: 0, direction: 180, speed: 2 },
        { altitude: 500, direction: 190, speed: 3 }
      ]
    });
  });

  it('keeps an unrecognized date spelling as written', () => {
    expect(parseMissionText('Date = early August;', 'x.mission')).toEqual({ sourcePath: 'x.mission', date: 'early August' });
  });

  it('returns only the source path for text without known keys', () => {
    expect(parseMissionText('Groups\n{\n}\n', 'empty.mission')).toEqual({ sourcePath: 'empty.mission' });
  });
});

describe('MissionFileIndex', () => {
  it('restarts the candidate sequence on every call', () => {
    const index = new MissionFileIndex({ dir: '/m', files: ['/m/a.mission', '/m/b.mission'] });

    expect([...index.candidates()]).toEqual(['/m/a.mission', '/m/b.mission']);
    expect([...index.candidates((path) => path.endsWith('b.mission'))]).toEqual(['/m/b.mission']);
    expect([...index.candidates()]).toEqual(['/m/a.mission', '/m/b.mission']);
  });
});

describe('matchMissionFile', () => {
  const index = new MissionFileIndex({
    dir: '/m',
    files: ['/m/Other 1942-08-01.mission', '/m/Tester_1942-08-01.mission', '/m/Tester_1942-08-02.mission', '/m/quick.mission']
  });

  it('prefers an exact identifier match', () => {
    expect(matchMissionFile(index, { missionId: 'Tester_1942-08-02', pilotNames: [] })).toEqual({
      match: { matched: true, path: '/m/Tester_1942-08-02.mission' },
      diagnostics: []
    });
  });

  it('scores date and pilot name and rejects files from another day', () => {
    const outcome = matchMissionFile(index, { missionId: 'r1', date: '19420801', pilotNames: ['Lt. John Tester'] });

    expect(outcome).toEqual({ match: { matched: true, path: '/m/Tester_1942-08-01.mission' }, diagnostics: [] });
  });

  it('breaks score ties by name length, then path order, and reports the ambiguity', () => {
    const tied = new MissionFileIndex({
      dir: '/m',
      files: ['/m/Tester_1942-08-01.mission', '/m/a_Tester_19420801.mission']
    });

    const outcome = matchMissionFile(tied, { missionId: 'r1', date: '19420801', pilotNames: ['John Tester'] });

    expect(outcome.match).toEqual({ matched: true, path: '/m/Tester_1942-08-01.mission' });
    expect(outcome.diagnostics).toEqual([
      {
        kind: 'weather-match-ambiguous',
        key: 'r1',
        path: '/m/Tester_1942-08-01.mission',
        message: 'Mission r1 matches 2 files equally; using Tester_1942-08-01.mission'
      }
    ]);
  });

  it('returns an explicit no-match with a diagnostic', () => {
    const outcome = matchMissionFile(index, { missionId: 'zzz', date: '19420901', pilotNames: [] });

    expect(outcome.match).toEqual({ matched: false });
    expect(outcome.diagnostics).toEqual([
      {
        kind: 'mission-file-not-found',
        key: 'zzz',
        path: '/m',
        message: 'No .mission file under /m matches mission zzz'
      }
    ]);
  });

  it('reports a miss when there is no mission folder at all', () => {
    const outcome = matchMissionFile(new MissionFileIndex(), { missionId: 'm1', pilotNames: [] });

    expect(outcome.match).toEqual({ matched: false });
    expect(outcome.diagnostics[0].message).toBe('No mission folder available for mission m1');
  });
});

describe('collectWeather', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('parses each matched file once and skips misses', async () => {
    const path = await writeFixture(root, 'Tester_1942-08-01.mission', SAMPLE_MISSION_TEXT);
    const index = new MissionFileIndex({ dir: root, files: [path] });
    const diagnostics: Diagnostic[] = [];

    const weather = await collectWeather(
      index,
      [
        { missionId: 'Tester_1942-08-01', pilotNames: [] },
        { missionId: 'r1', date: '19420801', pilotNames: ['John Tester'] },
        { missionId: 'r2', date: '19420802', pilotNames: ['John Tester'] }
      ],
      { diagnostics }
    );

    expect([...weather.keys()]).toEqual(['Tester_1942-08-01', 'r1']);
    expect(weather.get('r1')).toBe(weather.get('Tester_1942-08-01'));
    expect(weather.get('r1')?.sourcePath).toBe(join(root, 'Tester_1942-08-01.mission'));
    expect(diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.key])).toEqual([['mission-file-not-found', 'r2']]);
  });
});
