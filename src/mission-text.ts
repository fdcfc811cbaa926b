import { basename } from 'node:path';
import { MalformedRecordError, MissionFileNotFound, type Diagnostic } from './errors.js';
import { nameTokens, tokenize } from './lib/canon.js';
import { dateKey, dateKeyFromFileName, normalizeCampaignDate } from './lib/dates.js';
import type { MissionFolder } from './locate.js';
import { readText } from './utils/fs.js';
import { log } from './utils/log.js';
import type { WeatherSnapshot, WindLayer } from './types/index.js';

const MISSION_EXTENSION = /\.mission$/i;

/**
 * Candidate `.mission` paths of one simulator folder. Every call to `candidates` starts a
 * fresh pass over the folder, so a caller can scan it again with another predicate.
 */
export class MissionFileIndex {
  readonly dir?: string;
  private readonly files: readonly string[];

  constructor(folder?: MissionFolder) {
    this.dir = folder?.dir;
    this.files = folder ? [...folder.files] : [];
  }

  get size(): number {
    return this.files.length;
  }

  *candidates(predicate: (path: string) => boolean = () => true): Generator<string, void, undefined> {
    for (const file of this.files) {
      if (predicate(file)) yield file;
    }
  }
}

export interface MissionMatchQuery {
  missionId: string;
  date?: string;
  pilotNames: string[];
}

export type MissionMatch = { matched: true; path: string } | { matched: false };

export interface MissionMatchOutcome {
  match: MissionMatch;
  diagnostics: Diagnostic[];
}

function missionBaseName(path: string): string {
  return basename(path).replace(MISSION_EXTENSION, '');
}

interface ScoredCandidate {
  path: string;
  score: number;
  lengthGap: number;
}

function pickBest(scored: ScoredCandidate[]): ScoredCandidate[] {
  const best = Math.max(...scored.map((entry) => entry.score));
  return scored
    .filter((entry) => entry.score === best)
    .sort((a, b) => a.lengthGap - b.lengthGap || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * Finds the `.mission` file generated for one mission. An exact identifier match wins
 * outright; otherwise candidates are scored on the date key embedded in the file name and
 * on the pilot-name tokens it shares with the mission. A file whose name carries another
 * date is never chosen.
 */
export function matchMissionFile(index: MissionFileIndex, query: MissionMatchQuery): MissionMatchOutcome {
  const notFound = (): MissionMatchOutcome => ({
    match: { matched: false },
    diagnostics: [new MissionFileNotFound(query.missionId, index.dir).toDiagnostic()]
  });

  if (!index.size) return notFound();

  const wantedBase = query.missionId.replace(MISSION_EXTENSION, '').toLowerCase();
  for (const path of index.candidates((file) => missionBaseName(file).toLowerCase() === wantedBase)) {
    return { match: { matched: true, path }, diagnostics: [] };
  }

  const missionKey = dateKey(query.date);
  const pilotTokens = new Set(
    query.pilotNames.flatMap((name) => nameTokens(name)).filter((token) => token.length > 1)
  );

  const scored: ScoredCandidate[] = [];
  const sameDateOrUndated = (file: string): boolean => {
    const fileKey = dateKeyFromFileName(basename(file));
    return !(fileKey && missionKey && fileKey !== missionKey);
  };

  for (const path of index.candidates(sameDateOrUndated)) {
    const name = missionBaseName(path);
    let score = 0;
    if (missionKey && dateKeyFromFileName(name) === missionKey) score += 2;
    for (const token of new Set(tokenize(name))) {
      if (pilotTokens.has(token)) score += 1;
    }
    if (score > 0) {
      scored.push({ path, score, lengthGap: Math.abs(name.length - query.missionId.length) });
    }
  }

  if (!scored.length) return notFound();

  const [winner, ...tied] = pickBest(scored);
  const diagnostics: Diagnostic[] = [];
  if (tied.length) {
    diagnostics.push({
      kind: 'weather-match-ambiguous',
      key: query.missionId,
      path: winner.path,
      message: `Mission ${query.missionId} matches ${tied.length + 1} files equally; using ${basename(winner.path)}`
    });
  }
  return { match: { matched: true, path: winner.path }, diagnostics };
}

/** Text of the top-level `Options { ... }` block, or the whole file when it has none. */
function optionsBlock(text: string): string {
  const start = text.search(/^\s*Options\s*$/m);
  if (start < 0) return text;
  const open = text.indexOf('{', start);
  if (open < 0) return text;
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '{') depth++;
    else if (text[i] === '}') {
      depth--;
      if (depth === 0) return text.slice(open + 1, i);
    }
  }
  return text.slice(open + 1);
}

function readValue(block: string, key: string): string | undefined {
  const match = block.match(new RegExp(`^\\s*${key}\\s*=\\s*(.*?)\\s*;\\s*$`, 'm'));
  if (!match) return undefined;
  return match[1].replace(/^"(.*)"$/, '$1');
}

function readNumber(block: string, key: string): number | undefined {
  const raw = readValue(block, key);
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function normalizeTime(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const match = raw.match(/^(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?$/);
  if (!match) return raw;
  return [match[1], match[2], match[3] ?? '0'].map((part) => part.padStart(2, '0')).join(':');
}

function readWindLayers(block: string): WindLayer[] | undefined {
  const match = block.match(/^\s*WindLayers\s*\{([^}]*)\}/m);
  if (!match) return undefined;
  const layers: WindLayer[] = [];
  const layerPattern = /(-?\d+(?:\.\d+)?)\s*:\s*(-?\d+(?:\.\d+)?)\s*:\s*(-?\d+(?:\.\d+)?)\s*;/g;
  for (const layer of match[1].matchAll(layerPattern)) {
    layers.push({ altitude: Number(layer[1]), direction: Number(layer[2]), speed: Number(layer[3]) });
  }
  return layers;
}

const NUMERIC_KEYS = [
  ['CloudLevel', 'cloudLevel'],
  ['CloudHeight', 'cloudHeight'],
  ['PrecLevel', 'precipitationLevel'],
  ['PrecType', 'precipitationType'],
  ['Temperature', 'temperature'],
  ['Pressure', 'pressure'],
  ['Haze', 'haze'],
  ['LayerFog', 'layerFog'],
  ['Turbulence', 'turbulence'],
  ['SeaState', 'seaState']
] as const;

/**
 * Extracts time of day and weather from mission text. Only keys present in the file are
 * set on the snapshot; missing keys are not added as undefined properties.
 */
export function parseMissionText(text: string, sourcePath: string): WeatherSnapshot {
  const block = optionsBlock(text);
  const snapshot: WeatherSnapshot = { sourcePath };

  const time = normalizeTime(readValue(block, 'Time'));
  if (time !== undefined) snapshot.time = time;

  const rawDate = readValue(block, 'Date');
  if (rawDate !== undefined) snapshot.date = normalizeCampaignDate(rawDate) ?? rawDate;

  const cloudConfig = readValue(block, 'CloudConfig');
  if (cloudConfig) snapshot.cloudConfig = cloudConfig;

  for (const [key, field] of NUMERIC_KEYS) {
    const value = readNumber(block, key);
    if (value !== undefined) snapshot[field] = value;
  }

  const windLayers = readWindLayers(block);
  if (windLayers) snapshot.windLayers = windLayers;

  return snapshot;
}

export interface WeatherMatchOptions {
  signal?: AbortSignal;
  diagnostics: Diagnostic[];
}

/**
 * Matches and parses a `.mission` file for every query. Weather is advisory: a miss or an
 * unreadable file only adds a diagnostic.
 */
export async function collectWeather(
  index: MissionFileIndex,
  queries: readonly MissionMatchQuery[],
  options: WeatherMatchOptions
): Promise<Map<string, WeatherSnapshot>> {
  const weather = new Map<string, WeatherSnapshot>();
  const parsed = new Map<string, WeatherSnapshot | undefined>();

  for (const query of queries) {
    options.signal?.throwIfAborted();
    if (weather.has(query.missionId)) continue;

    const { match, diagnostics } = matchMissionFile(index, query);
    options.diagnostics.push(...diagnostics);
    if (!match.matched) continue;

    let snapshot = parsed.get(match.path);
    if (!parsed.has(match.path)) {
      try {
        snapshot = parseMissionText(await readText(match.path), match.path);
      } catch (error) {
        const malformed = new MalformedRecordError(match.path, error);
        log.warn('Mission file unreadable, weather skipped', { path: match.path, error: malformed.message });
        options.diagnostics.push(malformed.toDiagnostic());
      }
      parsed.set(match.path, snapshot);
    }
    if (snapshot) weather.set(query.missionId, snapshot);
  }

  log.debug('Weather matched', { queries: queries.length, matched: weather.size });
  return weather;
}
