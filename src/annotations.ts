import { AnnotationStoreCorrupt, errorMessage, type Diagnostic } from './errors.js';
import { normalizeCampaignDate } from './lib/dates.js';
import { isRecord, optionalString } from './lib/tolerant.js';
import { pathExists, readJson, writeJsonAtomic } from './utils/fs.js';
import { log } from './utils/log.js';
import { checkShape } from './validate.js';
import type { AnnotationRecord } from './types/index.js';

export const ANNOTATION_FILE_VERSION = 1;

export type AnnotationFields = Omit<AnnotationRecord, 'serialNumber'>;

export type PutResult = { ok: true } | { ok: false; error: string };

interface AnnotationFile {
  version: typeof ANNOTATION_FILE_VERSION;
  pilots: Record<string, AnnotationRecord>;
}

function readRecord(serialNumber: string, raw: unknown): AnnotationRecord {
  const source = isRecord(raw) ? raw : {};
  const record: AnnotationRecord = { serialNumber };
  const birthDate = optionalString(source.birthDate);
  const birthPlace = optionalString(source.birthPlace);
  const notes = optionalString(source.notes);
  const photoRef = optionalString(source.photoRef);
  if (birthDate) record.birthDate = birthDate;
  if (birthPlace) record.birthPlace = birthPlace;
  if (notes) record.notes = notes;
  if (photoRef) record.photoRef = photoRef;
  return record;
}

/**
 * User-maintained pilot metadata keyed by serial number, kept in one JSON file that
 * survives re-imports. The sync pipeline only reads it. Loads and writes run one at a
 * time through a single queue; writes replace the whole file atomically and readers
 * always see a complete snapshot.
 */
export class AnnotationStore {
  private records: ReadonlyMap<string, AnnotationRecord> = new Map();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly schemaDir: string
  ) {}

  /**
   * Reads the file. Corrupt content resets the store to empty and is reported, not thrown.
   * Loads queue behind pending writes, so a load never replaces records a write just saved.
   */
  load(): Promise<Diagnostic[]> {
    const task = this.queue.then(() => this.readFromDisk());
    this.queue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }

  private async readFromDisk(): Promise<Diagnostic[]> {
    if (!(await pathExists(this.path))) {
      this.records = new Map();
      log.debug('Annotation store not found, starting empty', { path: this.path });
      return [];
    }

    let payload: unknown;
    try {
      payload = await readJson(this.path);
    } catch (error) {
      return this.reset(errorMessage(error));
    }

    const shape = await checkShape(this.schemaDir, 'annotations', payload, 'annotations');
    if (!shape.valid) return this.reset(shape.details);

    const pilots = isRecord(payload) && isRecord(payload.pilots) ? payload.pilots : {};
    const records = new Map<string, AnnotationRecord>();
    for (const serial of Object.keys(pilots).sort()) {
      records.set(serial, readRecord(serial, pilots[serial]));
    }
    this.records = records;
    log.debug('Annotation store loaded', { path: this.path, pilots: records.size });
    return [];
  }

  get(serialNumber: string): AnnotationRecord | undefined {
    const record = this.records.get(serialNumber);
    return record ? { ...record } : undefined;
  }

  /** The current records; later writes do not change a snapshot already taken. */
  snapshot(): ReadonlyMap<string, AnnotationRecord> {
    return this.records;
  }

  async put(serialNumber: string, fields: AnnotationFields): Promise<PutResult> {
    const serial = serialNumber.trim();
    if (!serial) return { ok: false, error: 'Serial number is required' };

    const record = readRecord(serial, fields);
    if (record.birthDate && !normalizeCampaignDate(record.birthDate)) {
      return { ok: false, error: `Birth date "${record.birthDate}" is not DD/MM/YYYY or YYYY-MM-DD` };
    }

    const task = this.queue.then(() => this.persist(record));
    this.queue = task.catch(() => undefined);

    try {
      await task;
      return { ok: true };
    } catch (error) {
      log.error('Annotation write failed', { path: this.path, serialNumber: serial, error: errorMessage(error) });
      return { ok: false, error: errorMessage(error) };
    }
  }

  private async persist(record: AnnotationRecord): Promise<void> {
    const next = new Map(this.records);
    next.set(record.serialNumber, record);

    const pilots: Record<string, AnnotationRecord> = {};
    for (const serial of [...next.keys()].sort()) {
      const entry = next.get(serial);
      if (entry) pilots[serial] = entry;
    }
    const file: AnnotationFile = { version: ANNOTATION_FILE_VERSION, pilots };

    await writeJsonAtomic(this.path, file);
    this.records = next;
    log.info('Annotation saved', { path: this.path, serialNumber: record.serialNumber });
  }

  private reset(reason: string): Diagnostic[] {
    const corrupt = new AnnotationStoreCorrupt(this.path, reason);
    log.warn('Annotation store reset', { path: this.path, reason });
    this.records = new Map();
    return [corrupt.toDiagnostic()];
  }
}
