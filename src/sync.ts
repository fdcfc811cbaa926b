import { aggregateCampaign } from './aggregate.js';
import { AnnotationStore } from './annotations.js';
import { assembleModel } from './assemble.js';
import type { SyncConfig } from './config/sync.js';
import { compareDiagnostics, PathInvalidError, SyncCancelledError, type Diagnostic } from './errors.js';
import { loadCampaignFiles } from './loaders.js';
import { locateCampaign, locateMissionFolder, type MissionFolder } from './locate.js';
import { collectWeather, MissionFileIndex, type MissionMatchQuery } from './mission-text.js';
import { resolveCampaign } from './resolve.js';
import { SyncRun, type SyncRunSummary } from './utils/sync-run.js';
import { validateModel } from './validate.js';
import type { FileCategory, LoadedCampaignFiles, UnifiedCampaignModel, WeatherSnapshot } from './types/index.js';

export type SyncStage = 'locate' | 'load' | 'weather' | 'resolve' | 'aggregate' | 'assemble' | 'done';

export interface SyncProgress {
  stage: SyncStage;
  category?: FileCategory;
  files?: number;
}

export interface SyncOptions {
  signal?: AbortSignal;
  onProgress?: (progress: SyncProgress) => void;
  /** Store to read annotations from; defaults to the file named by the config. */
  annotationStore?: AnnotationStore;
}

export interface SyncResult {
  model: UnifiedCampaignModel;
  diagnostics: Diagnostic[];
  run: SyncRunSummary;
}

function cancellation(signal: AbortSignal, campaignRoot: string): SyncCancelledError {
  return signal.reason instanceof SyncCancelledError ? signal.reason : new SyncCancelledError(campaignRoot);
}

/** One weather query per distinct mission id, mission data first, then lone combat reports. */
export function buildWeatherQueries(files: LoadedCampaignFiles): MissionMatchQuery[] {
  const queries = new Map<string, MissionMatchQuery>();
  for (const mission of files.missions) {
    const { missionId, date, participants } = mission.data;
    if (queries.has(missionId)) continue;
    queries.set(missionId, {
      missionId,
      date,
      pilotNames: participants.flatMap((participant) => (participant.name ? [participant.name] : []))
    });
  }
  for (const report of files.combatReports) {
    const { missionId, date, pilotName, flightPilots } = report.data;
    if (queries.has(missionId)) continue;
    queries.set(missionId, {
      missionId,
      date,
      pilotNames: [...(pilotName ? [pilotName] : []), ...flightPilots]
    });
  }
  return [...queries.values()];
}

/**
 * Runs one full sync of a campaign folder: locate, load every category concurrently,
 * match weather, resolve, aggregate and assemble. Everything is recomputed from disk.
 * Recovered problems come back as sorted diagnostics; fatal ones reject.
 */
export async function runSync(config: SyncConfig, options: SyncOptions = {}): Promise<SyncResult> {
  const campaignRoot = config.campaignRoot;
  if (!campaignRoot) {
    throw new PathInvalidError('(not configured)', 'set CAMPAIGN_ROOT or pass a campaign root');
  }

  const { signal, onProgress } = options;
  const run = new SyncRun(campaignRoot);
  const diagnostics: Diagnostic[] = [];
  const checkpoint = (): void => {
    if (signal?.aborted) throw cancellation(signal, campaignRoot);
  };

  run.start();
  try {
    checkpoint();
    onProgress?.({ stage: 'locate' });
    const fileSet = await locateCampaign(campaignRoot);
    checkpoint();

    for (const category of fileSet.absent) {
      diagnostics.push({
        kind: 'category-absent',
        key: category,
        path: fileSet.root,
        message: `No ${category} files under ${fileSet.root}`
      });
    }

    const store = options.annotationStore ?? new AnnotationStore(config.annotationStorePath, config.schemaDir);
    const missionFolderTask: Promise<MissionFolder | undefined> =
      config.weatherMatching && config.simulatorRoot
        ? locateMissionFolder(config.simulatorRoot, config.missionSubdir)
        : Promise.resolve(undefined);

    // Barrier: nothing downstream starts until every loader has settled.
    const [files, missionFolder, annotationDiagnostics] = await Promise.all([
      loadCampaignFiles(fileSet, {
        schemaDir: config.schemaDir,
        diagnostics,
        signal,
        onCategoryLoaded: (category, count) => onProgress?.({ stage: 'load', category, files: count })
      }),
      missionFolderTask,
      store.load()
    ]);
    checkpoint();
    diagnostics.push(...annotationDiagnostics);
    run.updateStats({
      combatReports: files.combatReports.length,
      missionData: files.missions.length,
      personnel: files.personnel.length
    });

    let weather: ReadonlyMap<string, WeatherSnapshot> = new Map();
    if (config.weatherMatching) {
      if (missionFolder) {
        onProgress?.({ stage: 'weather', category: 'missionFiles', files: missionFolder.files.length });
        weather = await collectWeather(new MissionFileIndex(missionFolder), buildWeatherQueries(files), {
          signal,
          diagnostics
        });
        run.updateStats({ weatherMatched: weather.size });
      } else {
        diagnostics.push({
          kind: 'category-absent',
          key: 'missionFiles',
          path: config.simulatorRoot,
          message: 'No simulator mission folder available; missions carry no weather'
        });
      }
    }
    checkpoint();

    onProgress?.({ stage: 'resolve' });
    const resolved = resolveCampaign(files, weather);
    diagnostics.push(...resolved.diagnostics);

    onProgress?.({ stage: 'aggregate' });
    const aggregate = aggregateCampaign(resolved);

    onProgress?.({ stage: 'assemble' });
    const annotations = store.snapshot();
    const model = assembleModel(resolved, aggregate, (serial) => annotations.get(serial));
    await validateModel(model, config.schemaDir);
    checkpoint();

    run.updateStats({
      pilots: model.totals.pilots,
      missions: model.totals.missions,
      diagnostics: diagnostics.length
    });
    run.finishSuccess();
    onProgress?.({ stage: 'done' });

    return { model, diagnostics: diagnostics.sort(compareDiagnostics), run: run.summary() };
  } catch (error) {
    const failure = signal?.aborted ? cancellation(signal, campaignRoot) : error;
    run.finishFail(failure);
    throw failure;
  }
}

/**
 * Entry point for callers that trigger syncs repeatedly. Starting a sync aborts the one in
 * flight, which rejects with SyncCancelledError; only the newest result is delivered.
 */
export class CampaignSyncController {
  private current?: AbortController;

  constructor(
    private readonly config: SyncConfig,
    private readonly annotationStore?: AnnotationStore
  ) {}

  async sync(onProgress?: (progress: SyncProgress) => void): Promise<SyncResult> {
    this.cancel();
    const controller = new AbortController();
    this.current = controller;
    try {
      return await runSync(this.config, {
        signal: controller.signal,
        onProgress,
        annotationStore: this.annotationStore
      });
    } finally {
      if (this.current === controller) this.current = undefined;
    }
  }

  cancel(): void {
    this.current?.abort(new SyncCancelledError(this.config.campaignRoot ?? '(not configured)'));
    this.current = undefined;
  }
}

export { loadSyncConfig, type SyncConfig } from './config/sync.js';
export { AnnotationStore, type AnnotationFields, type PutResult } from './annotations.js';
export { listCampaigns } from './locate.js';
export * from './errors.js';
export type * from './types/index.js';
