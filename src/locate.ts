import { basename, join, resolve } from 'node:path';
import fg from 'fast-glob';
import { PathInvalidError } from './errors.js';
import { isReadableDirectory, pathExists } from './utils/fs.js';
import { log } from './utils/log.js';
import type { FileCategory } from './types/index.js';

export interface CombatReportFolder {
  serialNumber: string;
  dir: string;
  files: string[];
}

export interface PersonnelFile {
  squadronId: string;
  path: string;
}

export interface CampaignFileSet {
  root: string;
  campaign?: string;
  aces?: string;
  log?: string;
  combatReportFolders: CombatReportFolder[];
  missionData: string[];
  personnel: PersonnelFile[];
  /** Categories with nothing on disk. Absence is reported, never raised. */
  absent: FileCategory[];
}

export interface MissionFolder {
  dir: string;
  files: string[];
}

const SUMMARY_FILES = {
  campaign: 'campaign.json',
  aces: 'campaignaces.json',
  log: 'campaignlog.json'
} as const;

const GLOB_DEFAULTS = { caseSensitiveMatch: false, dot: false } as const;

function byPath(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function listFiles(cwd: string, pattern: string): Promise<string[]> {
  const matches = await fg(pattern, { ...GLOB_DEFAULTS, cwd, onlyFiles: true });
  return matches.map((entry) => join(cwd, entry)).sort(byPath);
}

async function listDirectories(cwd: string, pattern: string): Promise<string[]> {
  const matches = await fg(pattern, { ...GLOB_DEFAULTS, cwd, onlyDirectories: true });
  return matches.map((entry) => join(cwd, entry)).sort(byPath);
}

function stripJsonExtension(file: string): string {
  return basename(file).replace(/\.json$/i, '');
}

export async function locateCampaign(campaignRoot: string): Promise<CampaignFileSet> {
  const root = resolve(campaignRoot);
  if (!(await pathExists(root))) {
    throw new PathInvalidError(root, 'directory does not exist');
  }
  if (!(await isReadableDirectory(root))) {
    throw new PathInvalidError(root, 'not a readable directory');
  }

  const topLevel = await listFiles(root, '*.json');
  const byName = new Map<string, string>();
  for (const file of topLevel) {
    const key = basename(file).toLowerCase();
    if (!byName.has(key)) byName.set(key, file);
  }

  const reportDirs = await listDirectories(root, 'CombatReports/*');
  const combatReportFolders: CombatReportFolder[] = [];
  for (const dir of reportDirs) {
    combatReportFolders.push({
      serialNumber: basename(dir),
      dir,
      files: await listFiles(dir, '*.json')
    });
  }

  const missionData = await listFiles(root, 'MissionData/*.json');
  const personnel = (await listFiles(root, 'Personnel/*.json')).map((path) => ({
    squadronId: stripJsonExtension(path),
    path
  }));

  const fileSet: CampaignFileSet = {
    root,
    campaign: byName.get(SUMMARY_FILES.campaign),
    aces: byName.get(SUMMARY_FILES.aces),
    log: byName.get(SUMMARY_FILES.log),
    combatReportFolders,
    missionData,
    personnel,
    absent: []
  };

  if (!fileSet.campaign) fileSet.absent.push('campaign');
  if (!fileSet.aces) fileSet.absent.push('aces');
  if (!fileSet.log) fileSet.absent.push('log');
  if (!combatReportFolders.some((folder) => folder.files.length)) fileSet.absent.push('combatReports');
  if (!missionData.length) fileSet.absent.push('missionData');
  if (!personnel.length) fileSet.absent.push('personnel');

  if (fileSet.absent.length) {
    log.info('Campaign categories not present on disk (will be skipped)', {
      root,
      absent: fileSet.absent
    });
  }

  log.debug('Campaign files located', {
    root,
    combatReportFolders: combatReportFolders.length,
    missionData: missionData.length,
    personnel: personnel.length
  });

  return fileSet;
}

/**
 * Lists the simulator's generated `.mission` files. This tree lives under the game
 * install, not the campaign folder; a missing folder yields undefined.
 */
export async function locateMissionFolder(
  simulatorRoot: string,
  missionSubdir: string
): Promise<MissionFolder | undefined> {
  const dir = resolve(simulatorRoot, missionSubdir);
  if (!(await isReadableDirectory(dir))) {
    log.info('Mission folder not available, weather will be skipped', { dir });
    return undefined;
  }
  return { dir, files: await listFiles(dir, '*.mission') };
}

/** Campaign directory names under `<pwcgRoot>/User/Campaigns`. */
export async function listCampaigns(pwcgRoot: string): Promise<string[]> {
  const campaignsDir = join(resolve(pwcgRoot), 'User', 'Campaigns');
  if (!(await isReadableDirectory(campaignsDir))) return [];
  const dirs = await listDirectories(campaignsDir, '*');
  return dirs.map((dir) => basename(dir));
}
