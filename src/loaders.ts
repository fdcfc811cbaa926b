import { basename } from 'node:path';
import { MalformedRecordError, SchemaMismatchWarning, type Diagnostic } from './errors.js';
import { canonicalName } from './lib/canon.js';
import {
  firstField,
  isRecord,
  objectAt,
  optionalId,
  optionalCount,
  optionalNumber,
  optionalString,
  recordList,
  stringList,
  type RawObject
} from './lib/tolerant.js';
import type { CampaignFileSet, CombatReportFolder, PersonnelFile } from './locate.js';
import { readJson } from './utils/fs.js';
import { log } from './utils/log.js';
import { checkShape, type SchemaName } from './validate.js';
import type {
  AceEntryRecord,
  CampaignSummaryRecord,
  CombatReportRecord,
  FileCategory,
  LoadedCampaignFiles,
  LoadedRecord,
  LogEntryRecord,
  MissionDataRecord,
  MissionParticipantRecord,
  PersonnelMemberRecord,
  PersonnelRecord,
  VictoryEvent
} from './types/index.js';

export interface LoadContext {
  schemaDir: string;
  diagnostics: Diagnostic[];
  signal?: AbortSignal;
  onCategoryLoaded?: (category: FileCategory, files: number) => void;
}

const SERIAL_KEYS = ['serialNumber', 'pilotSerialNumber', 'serial'] as const;
const SQUADRON_ID_KEYS = ['squadronId', 'squadronID'] as const;
const PERSONNEL_COLLECTION_KEYS = ['pilots', 'members', 'personnel', 'roster', 'squadronMemberCollection'];
const PERSONNEL_STATUS_KEYS = ['active', 'reserve', 'wounded', 'kia', 'mia', 'transfer', 'retired'];

function stripJsonExtension(file: string): string {
  return basename(file).replace(/\.json$/i, '');
}

function countOf(value: unknown): number | undefined {
  if (Array.isArray(value)) return value.length;
  if (isRecord(value)) return Object.keys(value).length;
  return optionalCount(value);
}

/**
 * Reads one JSON file and decodes it. Unparsable files are reported and skipped; a
 * payload that matches none of the known schema versions is still decoded and marked
 * partial.
 */
async function loadRecord<T>(
  path: string,
  schema: SchemaName,
  decode: (payload: unknown) => T,
  ctx: LoadContext
): Promise<LoadedRecord<T> | undefined> {
  ctx.signal?.throwIfAborted();

  let payload: unknown;
  try {
    payload = await readJson(path);
  } catch (error) {
    const malformed = new MalformedRecordError(path, error);
    log.warn('Skipping unreadable record', { path, error: malformed.message });
    ctx.diagnostics.push(malformed.toDiagnostic());
    return undefined;
  }

  const shape = await checkShape(ctx.schemaDir, schema, payload, basename(path));
  const data = decode(payload);
  if (!shape.valid) {
    const warning = new SchemaMismatchWarning(path, shape.details);
    log.warn('Record kept as partial', { path, details: shape.details });
    ctx.diagnostics.push(warning.toDiagnostic());
  }

  return { sourcePath: path, status: shape.valid ? 'complete' : 'partial', data };
}

export function decodeVictory(entry: unknown): VictoryEvent {
  if (!isRecord(entry)) return {};
  const victim = entry.victim;
  return {
    date: firstField(entry, ['date', 'victoryDate'], optionalId),
    category: firstField(entry, ['category', 'targetCategory', 'victoryType'], optionalString),
    victim: isRecord(victim)
      ? firstField(victim, ['name', 'type'], optionalString)
      : optionalString(victim)
  };
}

function decodeVictoryList(value: unknown): VictoryEvent[] | undefined {
  if (Array.isArray(value)) return value.map(decodeVictory);
  const count = optionalCount(value);
  if (count === undefined) return undefined;
  return Array.from({ length: count }, () => ({}));
}

export function decodeCampaignSummary(payload: unknown): CampaignSummaryRecord {
  const root = isRecord(payload) ? payload : {};
  const nested = objectAt(root, 'campaign') ?? objectAt(root, 'campaignData');
  const source: RawObject = nested ? { ...root, ...nested } : root;
  return {
    name: firstField(source, ['name', 'campaignName'], optionalString),
    date: firstField(source, ['date', 'campaignDate'], optionalId),
    referencePlayerSerialNumber: firstField(
      source,
      ['referencePlayerSerialNumber', 'referencePilotSerialNumber', 'playerSerialNumber'],
      optionalId
    ),
    squadronId: firstField(source, [...SQUADRON_ID_KEYS, 'referencePlayerSquadronId'], optionalId),
    product: optionalString(source.product)
  };
}

function decodeAce(raw: RawObject, key?: string): AceEntryRecord {
  const numericKey = key !== undefined && /^\d+$/.test(key);
  const listed = Array.isArray(raw.victories);
  return {
    serialNumber: firstField(raw, SERIAL_KEYS, optionalId) ?? (numericKey ? key : undefined),
    name: firstField(raw, ['name', 'pilotName'], optionalString) ?? (numericKey ? undefined : optionalString(key)),
    rank: firstField(raw, ['rank', 'pilotRank'], optionalString),
    country: optionalId(raw.country),
    squadronId: firstField(raw, SQUADRON_ID_KEYS, optionalId),
    squadronName: firstField(raw, ['squadron', 'squadronName'], optionalString),
    missionsFlown: firstField(raw, ['missionFlown', 'missionsFlown', 'missions'], optionalCount),
    victories: listed ? decodeVictoryList(raw.victories) : undefined,
    victoryCount: listed ? undefined : firstField(raw, ['victories', 'victoryCount', 'kills'], optionalCount)
  };
}

export function decodeAces(payload: unknown): AceEntryRecord[] {
  let container: unknown = payload;
  if (isRecord(payload)) {
    const inner = payload.acesInCampaign ?? payload.aces;
    if (inner !== undefined) container = inner;
  }

  if (Array.isArray(container)) {
    return container.filter(isRecord).map((entry) => decodeAce(entry));
  }
  if (isRecord(container)) {
    const entries: AceEntryRecord[] = [];
    for (const [key, value] of Object.entries(container)) {
      if (isRecord(value)) entries.push(decodeAce(value, key));
    }
    return entries;
  }
  return [];
}

function decodeLogEntry(raw: RawObject, fallbackDate?: string): LogEntryRecord {
  return {
    date: optionalId(raw.date) ?? fallbackDate,
    text: firstField(raw, ['log', 'text'], optionalString),
    squadronId: firstField(raw, SQUADRON_ID_KEYS, optionalId)
  };
}

export function decodeCampaignLog(payload: unknown): LogEntryRecord[] {
  if (Array.isArray(payload)) {
    return payload.filter(isRecord).map((entry) => decodeLogEntry(entry));
  }
  if (!isRecord(payload)) return [];

  const byDate = objectAt(payload, 'campaignLogsByDate');
  if (!byDate) {
    return recordList(payload.logs).map((entry) => decodeLogEntry(entry));
  }

  const entries: LogEntryRecord[] = [];
  for (const dateKey of Object.keys(byDate).sort()) {
    const bucket = byDate[dateKey];
    if (!isRecord(bucket)) continue;
    const bucketDate = optionalId(bucket.date) ?? dateKey;
    for (const entry of recordList(bucket.logs)) {
      entries.push(decodeLogEntry(entry, bucketDate));
    }
  }
  return entries;
}

export function decodeCombatReport(payload: unknown, path: string, folderSerial: string): CombatReportRecord {
  const raw = isRecord(payload) ? payload : {};
  const lossList = raw.losses;
  return {
    folderSerial,
    missionId:
      firstField(raw, ['missionId', 'missionFileName', 'missionName'], optionalId) ?? stripJsonExtension(path),
    pilotSerialNumber: firstField(raw, SERIAL_KEYS, optionalId),
    pilotName: firstField(raw, ['reportPilotName', 'pilotName'], optionalString),
    squadronName: firstField(raw, ['squadron', 'squadronName'], optionalString),
    date: optionalId(raw.date),
    time: optionalString(raw.time),
    aircraft: firstField(raw, ['type', 'aircraft', 'aircraftType'], optionalString),
    locality: optionalString(raw.locality),
    duty: optionalString(raw.duty),
    altitude: optionalId(raw.altitude),
    haReport: optionalString(raw.haReport),
    narrative: optionalString(raw.narrative),
    flightPilots: stringList(raw.flightPilots),
    victories: decodeVictoryList(raw.victories) ?? [],
    losses: Array.isArray(lossList)
      ? lossList.length
      : optionalCount(lossList) ?? (raw.shotDown === true ? 1 : undefined)
  };
}

function decodeParticipant(raw: RawObject): MissionParticipantRecord {
  return {
    serialNumber: firstField(raw, SERIAL_KEYS, optionalId),
    name: firstField(raw, ['pilotName', 'name'], optionalString),
    rank: firstField(raw, ['pilotRank', 'rank'], optionalString),
    squadronId: firstField(raw, SQUADRON_ID_KEYS, optionalId),
    missionsFlown: firstField(raw, ['missionsFlown', 'missionFlown', 'missions'], optionalCount)
  };
}

export function decodeMissionData(payload: unknown, path: string): MissionDataRecord {
  const raw = isRecord(payload) ? payload : {};
  const header = objectAt(raw, 'missionHeader') ?? {};
  return {
    missionId:
      firstField(header, ['missionFileName', 'missionId', 'missionName'], optionalId) ??
      firstField(raw, ['missionId', 'missionFileName'], optionalId) ??
      stripJsonExtension(path),
    date: optionalId(header.date) ?? optionalId(raw.date),
    time: optionalString(header.time) ?? optionalString(raw.time),
    squadronId: firstField(header, SQUADRON_ID_KEYS, optionalId) ?? firstField(raw, SQUADRON_ID_KEYS, optionalId),
    squadronName: firstField(header, ['squadron', 'squadronName'], optionalString),
    aircraft: firstField(header, ['aircraftType', 'aircraft'], optionalString),
    duty: optionalString(header.duty) ?? optionalString(raw.missionType),
    airfield: optionalString(header.airfield),
    altitudeMeters: optionalNumber(header.altitude),
    description: optionalString(raw.missionDescription),
    participants: recordList(raw.missionPlanes).map(decodeParticipant)
  };
}

function collectPersonnelEntries(payload: unknown): RawObject[] {
  if (Array.isArray(payload)) return payload.filter(isRecord);
  if (!isRecord(payload)) return [];

  const entries: RawObject[] = [];
  for (const key of PERSONNEL_COLLECTION_KEYS) {
    entries.push(...recordList(payload[key]));
  }
  for (const key of PERSONNEL_STATUS_KEYS) {
    const bucket = payload[key];
    if (Array.isArray(bucket)) entries.push(...bucket.filter(isRecord));
  }
  if (!entries.length) {
    const values = Object.values(payload);
    if (values.length && values.every(isRecord)) entries.push(...values.filter(isRecord));
  }
  return entries;
}

function decodePersonnelMember(raw: RawObject): PersonnelMemberRecord {
  return {
    serialNumber: firstField(raw, SERIAL_KEYS, optionalId),
    name: firstField(raw, ['name', 'pilotName'], optionalString),
    rank: firstField(raw, ['rank', 'pilotRank', 'pilotRankText'], optionalString),
    missionsFlown: firstField(
      raw,
      ['missions', 'missionsFlown', 'missionFlown', 'missionCount', 'sorties', 'numMissions'],
      optionalCount
    ),
    victoryCount: countOf(raw.victories) ?? firstField(raw, ['kills', 'victoryCount'], optionalCount),
    statusCode: optionalNumber(raw.pilotActiveStatus),
    statusText: firstField(raw, ['status', 'pilotActiveStatusText'], optionalString)
  };
}

export function decodePersonnel(payload: unknown, squadronId: string): PersonnelRecord {
  const seen = new Set<string>();
  const members: PersonnelMemberRecord[] = [];
  for (const entry of collectPersonnelEntries(payload)) {
    const member = decodePersonnelMember(entry);
    const key = member.serialNumber ? `serial:${member.serialNumber}` : `name:${canonicalName(member.name)}`;
    if (key === 'name:' || seen.has(key)) continue;
    seen.add(key);
    members.push(member);
  }
  return { squadronId, members };
}

export function loadCampaignSummary(path: string, ctx: LoadContext) {
  return loadRecord(path, 'campaign', decodeCampaignSummary, ctx);
}

export function loadAces(path: string, ctx: LoadContext) {
  return loadRecord(path, 'aces', decodeAces, ctx);
}

export function loadCampaignLog(path: string, ctx: LoadContext) {
  return loadRecord(path, 'log', decodeCampaignLog, ctx);
}

async function loadEach<S, T>(
  sources: readonly S[],
  load: (source: S) => Promise<LoadedRecord<T> | undefined>
): Promise<LoadedRecord<T>[]> {
  const records: LoadedRecord<T>[] = [];
  for (const source of sources) {
    const record = await load(source);
    if (record) records.push(record);
  }
  return records;
}

export function loadCombatReports(folders: readonly CombatReportFolder[], ctx: LoadContext) {
  const files = folders.flatMap((folder) => folder.files.map((path) => ({ path, serial: folder.serialNumber })));
  return loadEach(files, ({ path, serial }) =>
    loadRecord(path, 'combatReport', (payload) => decodeCombatReport(payload, path, serial), ctx)
  );
}

export function loadMissionData(paths: readonly string[], ctx: LoadContext) {
  return loadEach(paths, (path) =>
    loadRecord(path, 'missionData', (payload) => decodeMissionData(payload, path), ctx)
  );
}

export function loadPersonnel(files: readonly PersonnelFile[], ctx: LoadContext) {
  return loadEach(files, ({ path, squadronId }) =>
    loadRecord(path, 'personnel', (payload) => decodePersonnel(payload, squadronId), ctx)
  );
}

async function optionalLoad<T>(
  path: string | undefined,
  load: (path: string, ctx: LoadContext) => Promise<LoadedRecord<T> | undefined>,
  ctx: LoadContext
): Promise<LoadedRecord<T> | undefined> {
  return path ? load(path, ctx) : undefined;
}

/**
 * Loads every located category. Categories are independent, so they run concurrently;
 * the returned promise is the barrier the resolver waits on.
 */
export async function loadCampaignFiles(fileSet: CampaignFileSet, ctx: LoadContext): Promise<LoadedCampaignFiles> {
  const track = async <R>(category: FileCategory, files: number, work: Promise<R>): Promise<R> => {
    const result = await work;
    ctx.onCategoryLoaded?.(category, files);
    return result;
  };

  const reportFiles = fileSet.combatReportFolders.reduce((sum, folder) => sum + folder.files.length, 0);

  const [campaign, aces, campaignLog, combatReports, missions, personnel] = await Promise.all([
    track('campaign', fileSet.campaign ? 1 : 0, optionalLoad(fileSet.campaign, loadCampaignSummary, ctx)),
    track('aces', fileSet.aces ? 1 : 0, optionalLoad(fileSet.aces, loadAces, ctx)),
    track('log', fileSet.log ? 1 : 0, optionalLoad(fileSet.log, loadCampaignLog, ctx)),
    track('combatReports', reportFiles, loadCombatReports(fileSet.combatReportFolders, ctx)),
    track('missionData', fileSet.missionData.length, loadMissionData(fileSet.missionData, ctx)),
    track('personnel', fileSet.personnel.length, loadPersonnel(fileSet.personnel, ctx))
  ]);

  log.info('Campaign records loaded', {
    root: fileSet.root,
    combatReports: combatReports.length,
    missions: missions.length,
    personnel: personnel.length,
    partial: [campaign, aces, campaignLog, ...combatReports, ...missions, ...personnel].filter(
      (record) => record?.status === 'partial'
    ).length
  });

  return {
    root: fileSet.root,
    campaign,
    aces,
    log: campaignLog,
    combatReports,
    missions,
    personnel
  };
}
