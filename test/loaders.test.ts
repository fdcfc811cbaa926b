import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Diagnostic } from '../src/errors.js';
import {
  decodeAces,
  decodeCampaignLog,
  decodeCampaignSummary,
  decodeCombatReport,
  decodeMissionData,
  decodePersonnel,
  loadCampaignFiles,
  loadCombatReports
} from '../src/loaders.js';
import { locateCampaign } from '../src/locate.js';
import { SCHEMA_DIR, createTempDir, removeDir, writeFixture } from './helpers/campaign-fixture.js';

describe('decodeCampaignSummary', () => {
  it('reads the flat layout', () => {
    expect(
      decodeCampaignSummary({ name: 'Kuban', date: 19430401, referencePlayerSerialNumber: '42', product: 'BoS' })
    ).toEqual({ name: 'Kuban', date: '19430401', referencePlayerSerialNumber: '42', product: 'BoS' });
  });

  it('reads a summary nested under campaignData', () => {
    const summary = decodeCampaignSummary({
      campaignData: { campaignName: 'Moscow', campaignDate: '19411101', referencePlayerSerialNumber: 7, referencePlayerSquadronId: 501 }
    });

    expect(summary).toEqual({
      name: 'Moscow',
      date: '19411101',
      referencePlayerSerialNumber: '7',
      squadronId: '501'
    });
  });

  it('leaves absent fields undefined', () => {
    expect(decodeCampaignSummary('not an object')).toEqual({});
  });
});

describe('decodeAces', () => {
  it('reads an array with victory counts', () => {
    expect(decodeAces([{ serialNumber: 5, name: 'Ace One', victories: 12 }])).toEqual([
      { serialNumber: '5', name: 'Ace One', victoryCount: 12 }
    ]);
  });

  it('reads a serial-keyed map with victory lists', () => {
    const aces = decodeAces({
      '301': {
        name: 'Ace Two',
        squadron: 'JG 99',
        victories: [{ date: '19420801', targetCategory: 'Fighter' }, { victoryType: 'Bomber', victim: { name: 'Pe-2' } }]
      }
    });

    expect(aces).toEqual([
      {
        serialNumber: '301',
        name: 'Ace Two',
        squadronName: 'JG 99',
        victories: [
          { date: '19420801', category: 'Fighter' },
          { category: 'Bomber', victim: 'Pe-2' }
        ]
      }
    ]);
  });

  it('unwraps acesInCampaign and uses non-numeric keys as names', () => {
    expect(decodeAces({ acesInCampaign: { 'Ivan Kozlov': { victories: 3 } } })).toEqual([
      { name: 'Ivan Kozlov', victoryCount: 3 }
    ]);
  });
});

describe('decodeCampaignLog', () => {
  it('reads the list layout', () => {
    expect(decodeCampaignLog([{ date: '19420801', log: 'Arrived', squadronId: 10 }])).toEqual([
      { date: '19420801', text: 'Arrived', squadronId: '10' }
    ]);
  });

  it('flattens campaignLogsByDate in key order', () => {
    const entries = decodeCampaignLog({
      campaignLogsByDate: {
        '19420802': { logs: [{ log: 'Second day' }] },
        '19420801': { date: '19420801', logs: [{ log: 'First day', squadronId: 10 }] }
      }
    });

    expect(entries).toEqual([
      { date: '19420801', text: 'First day', squadronId: '10' },
      { date: '19420802', text: 'Second day' }
    ]);
  });
});

describe('decodeCombatReport', () => {
  it('falls back to the file name for the mission identifier', () => {
    const report = decodeCombatReport(
      { reportPilotName: 'A. Pilot', date: '19420801', type: 'Yak-1', flightPilots: ['A. Pilot', { name: 'B. Wing' }], victories: 2, shotDown: true },
      '/campaign/CombatReports/1001/19420801_0930.json',
      '1001'
    );

    expect(report).toEqual({
      folderSerial: '1001',
      missionId: '19420801_0930',
      pilotName: 'A. Pilot',
      date: '19420801',
      aircraft: 'Yak-1',
      flightPilots: ['A. Pilot', 'B. Wing'],
      victories: [{}, {}],
      losses: 1
    });
  });

  it('prefers an explicit mission identifier and counts listed losses', () => {
    const report = decodeCombatReport(
      { missionFileName: 'Pilot_1942-08-01', date: '19420801', losses: [{}, {}], altitude: 1200 },
      '/x/r.json',
      '1001'
    );

    expect(report.missionId).toBe('Pilot_1942-08-01');
    expect(report.losses).toBe(2);
    expect(report.altitude).toBe('1200');
    expect(report.victories).toEqual([]);
  });
});

describe('decodeCombatReport counts', () => {
  it('drops a negative loss count', () => {
    const report = decodeCombatReport({ date: '19420804', losses: -1, victories: -2 }, '/x/r4.json', '1001');

    expect(report.losses).toBeUndefined();
    expect(report.victories).toEqual([]);
  });
});

describe('decodeMissionData', () => {
  it('reads header fields and participants from a plane map', () => {
    const mission = decodeMissionData(
      {
        missionHeader: { missionFileName: 'M1', date: '19420801', squadronId: 10, squadron: 'Sq', aircraftType: 'Il-2', duty: 'Attack' },
        missionDescription: 'Hit the bridge',
        missionPlanes: { a: { pilotSerialNumber: 1, pilotName: 'One', pilotRank: 'Lt', victories: [{}, {}] } }
      },
      '/x/MissionData/file.json'
    );

    expect(mission).toEqual({
      missionId: 'M1',
      date: '19420801',
      squadronId: '10',
      squadronName: 'Sq',
      aircraft: 'Il-2',
      duty: 'Attack',
      description: 'Hit the bridge',
      participants: [{ serialNumber: '1', name: 'One', rank: 'Lt' }]
    });
  });

  it('uses the file base name when the header has no identifier', () => {
    expect(decodeMissionData({ missionHeader: {} }, '/x/MissionData/19420805.json').missionId).toBe('19420805');
  });
});

describe('decodePersonnel', () => {
  it('collects status buckets and drops duplicates', () => {
    const roster = decodePersonnel(
      {
        active: [{ serialNumber: 1, name: 'One', pilotActiveStatus: 0 }],
        wounded: [{ serialNumber: 2, pilotName: 'Two', missionsFlown: 9 }],
        reserve: [{ serialNumber: 1, name: 'One again' }, { name: 'No Serial', kills: 2 }]
      },
      '10101'
    );

    expect(roster).toEqual({
      squadronId: '10101',
      members: [
        { serialNumber: '1', name: 'One', statusCode: 0 },
        { name: 'No Serial', victoryCount: 2 },
        { serialNumber: '2', name: 'Two', missionsFlown: 9 }
      ]
    });
  });

  it('leaves negative counts out', () => {
    expect(decodePersonnel([{ serialNumber: 3, name: 'Three', missions: -3, kills: -1 }], '7').members).toEqual([
      { serialNumber: '3', name: 'Three' }
    ]);
  });

  it('accepts a bare array', () => {
    expect(decodePersonnel([{ name: 'Solo' }], '7').members).toEqual([{ name: 'Solo' }]);
  });
});

describe('loadCampaignFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('skips unparsable files with a malformed-record diagnostic', async () => {
    const broken = await writeFixture(root, 'CombatReports/1001/broken.json', '{ "date": ');
    await writeFixture(root, 'CombatReports/1001/ok.json', { date: '19420801' });

    const diagnostics: Diagnostic[] = [];
    const files = await locateCampaign(root);
    const reports = await loadCombatReports(files.combatReportFolders, { schemaDir: SCHEMA_DIR, diagnostics });

    expect(reports.map((report) => report.sourcePath)).toEqual([join(root, 'CombatReports', '1001', 'ok.json')]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe('malformed-record');
    expect(diagnostics[0].path).toBe(broken);
  });

  it('keeps unrecognized shapes as partial records', async () => {
    const path = await writeFixture(root, 'CombatReports/1001/odd.json', { reportPilotName: 'A. Pilot', victories: 'many' });

    const diagnostics: Diagnostic[] = [];
    const files = await locateCampaign(root);
    const [report] = await loadCombatReports(files.combatReportFolders, { schemaDir: SCHEMA_DIR, diagnostics });

    expect(report.status).toBe('partial');
    expect(report.data.pilotName).toBe('A. Pilot');
    expect(report.data.victories).toEqual([]);
    expect(diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.path])).toEqual([['schema-mismatch', path]]);
  });

  it('loads every category and reports each one', async () => {
    await writeFixture(root, 'Campaign.json', { name: 'C', date: '19420801', referencePlayerSerialNumber: 1 });
    await writeFixture(root, 'MissionData/m.json', { missionHeader: { date: '19420801' }, missionPlanes: [] });

    const loaded: string[] = [];
    const diagnostics: Diagnostic[] = [];
    const files = await loadCampaignFiles(await locateCampaign(root), {
      schemaDir: SCHEMA_DIR,
      diagnostics,
      onCategoryLoaded: (category) => loaded.push(category)
    });

    expect(files.campaign?.status).toBe('complete');
    expect(files.campaign?.data.name).toBe('C');
    expect(files.aces).toBeUndefined();
    expect(files.missions).toHaveLength(1);
    expect(loaded.sort()).toEqual(['aces', 'campaign', 'combatReports', 'log', 'missionData', 'personnel']);
    expect(diagnostics).toEqual([]);
  });

  it('stops when the signal is aborted', async () => {
    await writeFixture(root, 'MissionData/m.json', { missionHeader: { date: '19420801' } });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(
      loadCampaignFiles(await locateCampaign(root), { schemaDir: SCHEMA_DIR, diagnostics: [], signal: controller.signal })
    ).rejects.toThrow('stop');
  });
});
