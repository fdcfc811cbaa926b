export type DiagnosticKind =
  | 'category-absent'
  | 'malformed-record'
  | 'schema-mismatch'
  | 'mission-file-not-found'
  | 'weather-match-ambiguous'
  | 'unresolved-reference'
  | 'annotation-store-corrupt';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  path?: string;
  key?: string;
}

export interface IdentityClaim {
  serialNumber: string;
  name: string;
  sourcePath: string;
}

/** Campaign root missing or not a readable directory. Aborts the sync. */
export class PathInvalidError extends Error {
  readonly code = 'PATH_INVALID';

  constructor(readonly path: string, reason: string) {
    super(`Campaign root ${path} is not usable: ${reason}`);
    this.name = 'PathInvalidError';
  }
}

export class MalformedRecordError extends Error {
  readonly code = 'MALFORMED_RECORD';

  constructor(readonly path: string, cause: unknown) {
    super(`Unable to parse ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'MalformedRecordError';
  }

  toDiagnostic(): Diagnostic {
    return { kind: 'malformed-record', path: this.path, message: this.message };
  }
}

export class SchemaMismatchWarning extends Error {
  readonly code = 'SCHEMA_MISMATCH';

  constructor(readonly path: string, readonly details: string) {
    super(`Unrecognized shape in ${path}; kept the fields that could be read (${details})`);
    this.name = 'SchemaMismatchWarning';
  }

  toDiagnostic(): Diagnostic {
    return { kind: 'schema-mismatch', path: this.path, message: this.message };
  }
}

export class MissionFileNotFound extends Error {
  readonly code = 'MISSION_FILE_NOT_FOUND';

  constructor(readonly missionId: string, readonly searchedDir?: string) {
    super(
      searchedDir
        ? `No .mission file under ${searchedDir} matches mission ${missionId}`
        : `No mission folder available for mission ${missionId}`
    );
    this.name = 'MissionFileNotFound';
  }

  toDiagnostic(): Diagnostic {
    return {
      kind: 'mission-file-not-found',
      key: this.missionId,
      path: this.searchedDir,
      message: this.message
    };
  }
}

/** Two sources claim one serial number for materially different pilots. Aborts the sync. */
export class IdentityConflictError extends Error {
  readonly code = 'IDENTITY_CONFLICT';
  readonly paths: string[];

  constructor(readonly serialNumber: string, readonly claims: [IdentityClaim, IdentityClaim]) {
    const [first, second] = claims;
    super(
      `Serial number ${serialNumber} is claimed by "${first.name}" in ${first.sourcePath} ` +
        `and by "${second.name}" in ${second.sourcePath}`
    );
    this.name = 'IdentityConflictError';
    this.paths = [first.sourcePath, second.sourcePath];
  }
}

export class AnnotationStoreCorrupt extends Error {
  readonly code = 'ANNOTATION_STORE_CORRUPT';

  constructor(readonly path: string, reason: string) {
    super(`Annotation store ${path} is unreadable, starting empty: ${reason}`);
    this.name = 'AnnotationStoreCorrupt';
  }

  toDiagnostic(): Diagnostic {
    return { kind: 'annotation-store-corrupt', path: this.path, message: this.message };
  }
}

export class SyncCancelledError extends Error {
  readonly code = 'SYNC_CANCELLED';

  constructor(readonly campaignRoot: string) {
    super(`Sync of ${campaignRoot} was superseded by a newer request`);
    this.name = 'SyncCancelledError';
  }
}

export class ModelValidationError extends Error {
  readonly code = 'MODEL_INVALID';

  constructor(details: string) {
    super(`Assembled campaign model failed validation: ${details}`);
    this.name = 'ModelValidationError';
  }
}

function compareText(a = '', b = ''): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareText(a.kind, b.kind) ||
    compareText(a.path, b.path) ||
    compareText(a.key, b.key) ||
    compareText(a.message, b.message)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
