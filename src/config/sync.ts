import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { log } from '../utils/log.js';

export interface SyncConfig {
  campaignRoot?: string;
  simulatorRoot?: string;
  missionSubdir: string;
  annotationStorePath: string;
  schemaDir: string;
  weatherMatching: boolean;
}

export const DEFAULT_MISSION_SUBDIR = join('data', 'Missions', 'PWCG');

function optionalPath(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? resolve(trimmed) : undefined;
}

/** Nearest directory above this module that holds the package manifest. */
function packageRoot(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return process.cwd();
    dir = parent;
  }
  return dir;
}

export const DEFAULT_SCHEMA_DIR = join(packageRoot(), 'schemas');

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    value: raw
  });
  return defaultValue;
}

export function loadSyncConfig(
  overrides?: Partial<SyncConfig>,
  env: NodeJS.ProcessEnv = process.env
): SyncConfig {
  return {
    campaignRoot: overrides?.campaignRoot ?? optionalPath(env.CAMPAIGN_ROOT),
    simulatorRoot: overrides?.simulatorRoot ?? optionalPath(env.SIMULATOR_ROOT),
    missionSubdir: overrides?.missionSubdir ?? (env.MISSION_SUBDIR?.trim() || DEFAULT_MISSION_SUBDIR),
    annotationStorePath:
      overrides?.annotationStorePath ??
      optionalPath(env.ANNOTATION_STORE) ??
      resolve('pilot-annotations.json'),
    schemaDir: overrides?.schemaDir ?? optionalPath(env.SCHEMA_DIR) ?? DEFAULT_SCHEMA_DIR,
    weatherMatching: overrides?.weatherMatching ?? parseBoolean(env.WEATHER_MATCHING, true)
  };
}
