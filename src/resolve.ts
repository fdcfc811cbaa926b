import { basename } from 'node:path';
import { IdentityConflictError, type Diagnostic, type IdentityClaim } from './errors.js';
import { canonicalName, compareSerials, namesMateriallyDiffer, preferredName } from './lib/canon.js';
import { compareOptionalDates, dateKey, normalizeCampaignDate } from './lib/dates.js';
import { parseAltitudeMeters } from './lib/tolerant.js';
import type {
  AceEntryRecord,
  CampaignInfo,
  CombatReportRecord,
  LoadedCampaignFiles,
  LoadedRecord,
  LogEntry,
  MissionCombatReport,
  MissionDataRecord,
  MissionHistoryEntry,
  PilotStatus,
  WeatherSnapshot
} from './types/index.js';

export interface ResolvedPilot {
  serialNumber: string;
  name: string;
  rank?: string;
  squadronId?: string;
  status?: PilotStatus;
  isReference: boolean;
  missionsFlownReported?: number;
  ace?: AceEntryRecord;
  /** Victory count carried on the squadron roster, when the roster lists one. */
  rosterVictoryCount?: number;
  combatReports: LoadedRecord<CombatReportRecord>[];
  sources: string[];
  partial: boolean;
}

export interface ResolvedSquadron {
  id: string;
  name?: string;
  roster: string[];
  log: LogEntry[];
}

export interface ResolvedCampaign {
  campaign: CampaignInfo;
  pilots: ResolvedPilot[];
  squadrons: ResolvedSquadron[];
  missions: MissionHistoryEntry[];
  campaignLog: LogEntry[];
  diagnostics: Diagnostic[];
}

const STATUS_BY_CODE: readonly PilotStatus[] = [
  'active',
  'resting',
  'wounded',
  'hospital',
  'missing',
  'killed',
  'transferred'
];

const STATUS_BY_TEXT: Record<string, PilotStatus> = {
  active: 'active',
  resting: 'resting',
  wounded: 'wounded',
  hospital: 'hospital',
  mia: 'missing',
  missing: 'missing',
  kia: 'killed',
  killed: 'killed',
  transferred: 'transferred',
  transfer: 'transferred'
};

const SQUADMATE_HEADER = /this mission was flown by/i;

function decodeStatus(code: number | undefined, text: string | undefined): PilotStatus | undefined {
  if (code !== undefined && Number.isInteger(code) && code >= 0 && code < STATUS_BY_CODE.length) {
    return STATUS_BY_CODE[code];
  }
  return text ? STATUS_BY_TEXT[text.trim().toLowerCase()] : undefined;
}

/**
 * Pilot names listed under the "This mission was flown by" line of a report, up to the
 * next blank line. Lines with digits are aircraft or time entries, not names.
 */
export function squadmatesFromReport(haReport: string | undefined): string[] {
  if (!haReport) return [];
  const lines = haReport.split(/\r?\n/);
  const start = lines.findIndex((line) => SQUADMATE_HEADER.test(line));
  if (start < 0) return [];

  const names: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const trimmed = line.trim();
    if (!trimmed) {
      if (names.length) break;
      continue;
    }
    if (/\d/.test(trimmed)) continue;
    names.push(trimmed);
  }
  return names;
}

function byDateThenPath<T extends { sourcePath: string }>(date: (item: T) => string | undefined) {
  return (a: T, b: T): number =>
    compareOptionalDates(date(a), date(b)) || (a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0);
}

function normalizeTimeKey(time: string | undefined): string | undefined {
  const match = time?.match(/^(\d{1,2}):(\d{2})/);
  return match ? `${match[1].padStart(2, '0')}:${match[2]}` : undefined;
}

class PilotDraft {
  readonly names: string[] = [];
  readonly sources = new Set<string>();
  rank?: string;
  squadronId?: string;
  status?: PilotStatus;
  missionsFlownReported?: number;
  ace?: AceEntryRecord;
  rosterVictoryCount?: number;
  readonly combatReports: LoadedRecord<CombatReportRecord>[] = [];
  partial = false;

  constructor(readonly serialNumber: string) {}

  touch(sourcePath: string, partial: boolean): void {
    this.sources.add(sourcePath);
    if (partial) this.partial = true;
  }
}

/**
 * Registers identity claims and fails loudly when one serial number is claimed by two
 * materially different names.
 */
class IdentityRegistry {
  private readonly claims = new Map<string, IdentityClaim[]>();
  private readonly drafts = new Map<string, PilotDraft>();

  claim(serialNumber: string, name: string | undefined, sourcePath: string): PilotDraft {
    const draft = this.draft(serialNumber);
    if (!name) return draft;

    const existing = this.claims.get(serialNumber) ?? [];
    for (const prior of existing) {
      if (namesMateriallyDiffer(prior.name, name)) {
        throw new IdentityConflictError(serialNumber, [prior, { serialNumber, name, sourcePath }]);
      }
    }
    existing.push({ serialNumber, name, sourcePath });
    this.claims.set(serialNumber, existing);
    draft.names.push(name);
    return draft;
  }

  draft(serialNumber: string): PilotDraft {
    let draft = this.drafts.get(serialNumber);
    if (!draft) {
      draft = new PilotDraft(serialNumber);
      this.drafts.set(serialNumber, draft);
    }
    return draft;
  }

  get(serialNumber: string): PilotDraft | undefined {
    return this.drafts.get(serialNumber);
  }

  all(): PilotDraft[] {
    return [...this.drafts.values()].sort((a, b) => compareSerials(a.serialNumber, b.serialNumber));
  }
}

/** Canonical name to serial, for sources that only carry names. Ambiguous names map nowhere. */
function buildNameIndex(pilots: readonly PilotDraft[]): Map<string, string | undefined> {
  const index = new Map<string, string | undefined>();
  for (const pilot of pilots) {
    for (const name of new Set(pilot.names.map(canonicalName))) {
      if (!name) continue;
      index.set(name, index.has(name) && index.get(name) !== pilot.serialNumber ? undefined : pilot.serialNumber);
    }
  }
  return index;
}

function missionDate(record: LoadedRecord<MissionDataRecord>): string | undefined {
  return normalizeCampaignDate(record.data.date);
}

function summarizeReport(report: LoadedRecord<CombatReportRecord>): MissionCombatReport {
  return {
    sourcePath: report.sourcePath,
    narrative: report.data.narrative,
    haReport: report.data.haReport,
    victories: report.data.victories.length,
    losses: report.data.losses ?? 0
  };
}

/**
 * Scores a same-day mission as the home of an unjoined combat report. Squadron name
 * counts double; aircraft, duty and take-off time count once each.
 */
function joinScore(report: CombatReportRecord, mission: MissionDataRecord): number {
  let score = 0;
  if (report.squadronName && canonicalName(report.squadronName) === canonicalName(mission.squadronName)) score += 2;
  if (report.aircraft && canonicalName(report.aircraft) === canonicalName(mission.aircraft)) score += 1;
  if (report.duty && canonicalName(report.duty) === canonicalName(mission.duty)) score += 1;
  const reportTime = normalizeTimeKey(report.time);
  if (reportTime && reportTime === normalizeTimeKey(mission.time)) score += 1;
  return score;
}

function compareHistory(a: MissionHistoryEntry, b: MissionHistoryEntry): number {
  return (
    compareOptionalDates(a.date, b.date) ||
    compareOptionalDates(a.time, b.time) ||
    (a.missionId < b.missionId ? -1 : a.missionId > b.missionId ? 1 : 0) ||
    (a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0)
  );
}

/**
 * Joins loaded records by their weak keys into pilots, squadrons, a chronological mission
 * history and the campaign-level log. Deterministic for identical input; throws
 * IdentityConflictError before producing anything when identities disagree.
 */
export function resolveCampaign(
  files: LoadedCampaignFiles,
  weather: ReadonlyMap<string, WeatherSnapshot> = new Map()
): ResolvedCampaign {
  const diagnostics: Diagnostic[] = [];
  const registry = new IdentityRegistry();
  const summary = files.campaign?.data;
  const missions = [...files.missions].sort(byDateThenPath(missionDate));
  const reports = [...files.combatReports].sort(
    byDateThenPath((report) => normalizeCampaignDate(report.data.date))
  );

  // Identity claims, in a fixed source order so conflicts always name the same pair.
  const unresolvedAces: AceEntryRecord[] = [];
  if (files.aces) {
    for (const entry of files.aces.data) {
      if (!entry.serialNumber) {
        unresolvedAces.push(entry);
        continue;
      }
      const draft = registry.claim(entry.serialNumber, entry.name, files.aces.sourcePath);
      draft.touch(files.aces.sourcePath, files.aces.status === 'partial');
      draft.ace = entry;
      draft.rank ??= entry.rank;
      draft.squadronId ??= entry.squadronId;
      draft.missionsFlownReported ??= entry.missionsFlown;
    }
  }

  for (const mission of missions) {
    for (const participant of mission.data.participants) {
      if (!participant.serialNumber) continue;
      const draft = registry.claim(participant.serialNumber, participant.name, mission.sourcePath);
      draft.touch(mission.sourcePath, mission.status === 'partial');
      // Later missions carry the more current rank and unit.
      if (participant.rank) draft.rank = participant.rank;
      const squadronId = participant.squadronId ?? mission.data.squadronId;
      if (squadronId) draft.squadronId = squadronId;
      if (participant.missionsFlown !== undefined) draft.missionsFlownReported = participant.missionsFlown;
    }
  }

  for (const report of reports) {
    const serial = report.data.pilotSerialNumber ?? report.data.folderSerial;
    registry.claim(serial, report.data.pilotName, report.sourcePath);
  }

  for (const roster of files.personnel) {
    for (const member of roster.data.members) {
      if (!member.serialNumber) continue;
      const draft = registry.claim(member.serialNumber, member.name, roster.sourcePath);
      draft.touch(roster.sourcePath, roster.status === 'partial');
      if (member.rank) draft.rank = member.rank;
      draft.squadronId = roster.data.squadronId;
      draft.status = decodeStatus(member.statusCode, member.statusText) ?? draft.status;
      if (member.missionsFlown !== undefined) draft.missionsFlownReported = member.missionsFlown;
      if (member.victoryCount !== undefined) draft.rosterVictoryCount = member.victoryCount;
    }
  }

  // Reference pilot: named by Campaign.json, else the only combat-report folder.
  const reportFolders = [...new Set(files.combatReports.map((report) => report.data.folderSerial))];
  const referenceSerial =
    summary?.referencePlayerSerialNumber ?? (reportFolders.length === 1 ? reportFolders[0] : undefined);
  if (referenceSerial) {
    const reference = registry.draft(referenceSerial);
    if (files.campaign) reference.touch(files.campaign.sourcePath, files.campaign.status === 'partial');
  }

  for (const report of reports) {
    const folderSerial = report.data.folderSerial;
    const pilot = registry.draft(folderSerial);
    pilot.touch(report.sourcePath, report.status === 'partial');
    pilot.combatReports.push(report);
    if (report.data.pilotSerialNumber && report.data.pilotSerialNumber !== folderSerial) {
      diagnostics.push({
        kind: 'unresolved-reference',
        path: report.sourcePath,
        key: report.data.pilotSerialNumber,
        message: `Report names serial ${report.data.pilotSerialNumber} but sits in the folder of ${folderSerial}`
      });
    }
  }

  const drafts = registry.all();
  const nameIndex = buildNameIndex(drafts);
  const lookupByName = (name: string): string | undefined => nameIndex.get(canonicalName(name));

  for (const entry of unresolvedAces) {
    const serial = entry.name ? lookupByName(entry.name) : undefined;
    const draft = serial ? registry.get(serial) : undefined;
    if (draft && files.aces) {
      draft.ace ??= entry;
      draft.touch(files.aces.sourcePath, files.aces.status === 'partial');
    } else {
      diagnostics.push({
        kind: 'unresolved-reference',
        path: files.aces?.sourcePath,
        key: entry.name,
        message: `Ace entry ${entry.name ?? '(unnamed)'} has no serial number and matches no known pilot`
      });
    }
  }

  // Reference squadron: Campaign.json, then the reference pilot's own mission entry,
  // then the latest mission header.
  let referenceSquadronId = summary?.squadronId;
  if (!referenceSquadronId && referenceSerial) {
    for (const mission of missions) {
      const own = mission.data.participants.find((participant) => participant.serialNumber === referenceSerial);
      referenceSquadronId = own?.squadronId ?? (own ? mission.data.squadronId : undefined) ?? referenceSquadronId;
    }
  }
  if (!referenceSquadronId) {
    referenceSquadronId = [...missions].reverse().find((mission) => mission.data.squadronId)?.data.squadronId;
  }

  const campaignName = summary?.name ?? basename(files.root);
  if (referenceSerial) {
    const reference = registry.draft(referenceSerial);
    reference.squadronId ??= referenceSquadronId;
  }

  // Squadrons: every id any source mentions.
  const squadronIds = new Set<string>();
  const squadronNames = new Map<string, string>();
  const squadronIdsByName = new Map<string, string>();
  const squadronLogs = new Map<string, LogEntry[]>();
  const noteSquadron = (id: string | undefined, name: string | undefined): void => {
    if (!id) return;
    squadronIds.add(id);
    if (!name) return;
    if (!squadronNames.has(id)) squadronNames.set(id, name);
    if (!squadronIdsByName.has(canonicalName(name))) squadronIdsByName.set(canonicalName(name), id);
  };

  for (const mission of missions) noteSquadron(mission.data.squadronId, mission.data.squadronName);
  for (const entry of files.aces?.data ?? []) noteSquadron(entry.squadronId, entry.squadronName);
  for (const roster of files.personnel) noteSquadron(roster.data.squadronId, undefined);
  for (const draft of drafts) noteSquadron(draft.squadronId, undefined);
  noteSquadron(referenceSquadronId, undefined);

  // Log entries, stable chronological order.
  const campaignLog: LogEntry[] = [];
  if (files.log) {
    const entries: LogEntry[] = [];
    for (const raw of files.log.data) {
      if (!raw.text) continue;
      entries.push({
        date: normalizeCampaignDate(raw.date),
        rawDate: raw.date,
        text: raw.text,
        squadronId: raw.squadronId,
        sourcePath: files.log.sourcePath
      });
    }
    entries.sort((a, b) => compareOptionalDates(a.date, b.date));
    for (const entry of entries) {
      if (!entry.squadronId) {
        campaignLog.push(entry);
        continue;
      }
      noteSquadron(entry.squadronId, undefined);
      const bucket = squadronLogs.get(entry.squadronId) ?? [];
      bucket.push(entry);
      squadronLogs.set(entry.squadronId, bucket);
    }
  }

  // Missions and the reports that belong to them.
  const history: MissionHistoryEntry[] = [];
  const joined = new Set<LoadedRecord<CombatReportRecord>>();
  const reportsByMission = new Map<string, LoadedRecord<CombatReportRecord>>();
  for (const report of reports) {
    if (!reportsByMission.has(report.data.missionId)) reportsByMission.set(report.data.missionId, report);
  }

  const missionReports = new Map<LoadedRecord<MissionDataRecord>, LoadedRecord<CombatReportRecord>>();
  for (const mission of missions) {
    const report = reportsByMission.get(mission.data.missionId);
    if (report && !joined.has(report)) {
      missionReports.set(mission, report);
      joined.add(report);
    }
  }
  for (const report of reports) {
    if (joined.has(report)) continue;
    const reportDay = dateKey(report.data.date);
    if (!reportDay) continue;
    let best: { mission: LoadedRecord<MissionDataRecord>; score: number } | undefined;
    for (const mission of missions) {
      if (missionReports.has(mission) || dateKey(mission.data.date) !== reportDay) continue;
      const score = joinScore(report.data, mission.data);
      if (!best || score > best.score) best = { mission, score };
    }
    if (best) {
      missionReports.set(best.mission, report);
      joined.add(report);
    }
  }

  const resolveNames = (names: readonly string[]): { serials: string[]; unresolved: string[] } => {
    const serials = new Set<string>();
    const unresolved = new Set<string>();
    for (const name of names) {
      const serial = lookupByName(name);
      if (serial) serials.add(serial);
      else unresolved.add(name);
    }
    return { serials: [...serials], unresolved: [...unresolved] };
  };

  for (const mission of missions) {
    const data = mission.data;
    const report = missionReports.get(mission);
    const serials = new Set<string>();
    const unresolved = new Set<string>();
    for (const participant of data.participants) {
      const serial = participant.serialNumber ?? (participant.name ? lookupByName(participant.name) : undefined);
      if (serial) serials.add(serial);
      else if (participant.name) unresolved.add(participant.name);
    }
    if (!serials.size && !unresolved.size && report) {
      const recovered = resolveNames(
        report.data.flightPilots.length ? report.data.flightPilots : squadmatesFromReport(report.data.haReport)
      );
      recovered.serials.forEach((serial) => serials.add(serial));
      recovered.unresolved.forEach((name) => unresolved.add(name));
    }
    if (report) serials.add(report.data.folderSerial);

    history.push({
      missionId: data.missionId,
      origin: 'mission-data',
      date: normalizeCampaignDate(data.date),
      time: data.time,
      squadronId: data.squadronId,
      squadronName: data.squadronName,
      aircraft: data.aircraft,
      duty: data.duty,
      airfield: data.airfield,
      altitudeMeters: data.altitudeMeters,
      description: data.description,
      participants: [...serials].sort(compareSerials),
      unresolvedParticipants: [...unresolved].sort(),
      combatReport: report ? summarizeReport(report) : undefined,
      weather: weather.get(data.missionId),
      sourcePath: mission.sourcePath
    });
  }

  for (const report of reports) {
    if (joined.has(report)) continue;
    const data = report.data;
    const recovered = resolveNames(data.flightPilots.length ? data.flightPilots : squadmatesFromReport(data.haReport));
    const participants = new Set([data.folderSerial, ...recovered.serials]);
    const squadronId =
      (data.squadronName ? squadronIdsByName.get(canonicalName(data.squadronName)) : undefined) ??
      registry.get(data.folderSerial)?.squadronId;

    history.push({
      missionId: data.missionId,
      origin: 'combat-report',
      date: normalizeCampaignDate(data.date),
      time: data.time,
      squadronId,
      squadronName: data.squadronName,
      aircraft: data.aircraft,
      duty: data.duty,
      altitudeMeters: parseAltitudeMeters(data.altitude),
      participants: [...participants].sort(compareSerials),
      unresolvedParticipants: [...new Set(recovered.unresolved)].sort(),
      combatReport: summarizeReport(report),
      weather: weather.get(data.missionId),
      sourcePath: report.sourcePath
    });
  }
  history.sort(compareHistory);

  const pilots: ResolvedPilot[] = drafts.map((draft) => ({
    serialNumber: draft.serialNumber,
    name:
      preferredName(draft.names) ??
      (draft.serialNumber === referenceSerial && summary?.name ? summary.name : draft.serialNumber),
    rank: draft.rank,
    squadronId: draft.squadronId,
    status: draft.status,
    isReference: draft.serialNumber === referenceSerial,
    missionsFlownReported: draft.missionsFlownReported,
    ace: draft.ace,
    rosterVictoryCount: draft.rosterVictoryCount,
    combatReports: draft.combatReports,
    sources: [...draft.sources].sort(),
    partial: draft.partial
  }));

  const squadrons: ResolvedSquadron[] = [...squadronIds].sort(compareSerials).map((id) => ({
    id,
    name: squadronNames.get(id),
    roster: pilots.filter((pilot) => pilot.squadronId === id).map((pilot) => pilot.serialNumber),
    log: squadronLogs.get(id) ?? []
  }));

  return {
    campaign: {
      name: campaignName,
      date: normalizeCampaignDate(summary?.date),
      rawDate: summary?.date,
      referencePilotSerial: referenceSerial,
      referenceSquadronId,
      product: summary?.product
    },
    pilots,
    squadrons,
    missions: history,
    campaignLog,
    diagnostics
  };
}
