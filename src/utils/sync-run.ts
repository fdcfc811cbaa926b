import { SyncCancelledError } from '../errors.js';
import { log } from './log.js';

export type SyncRunState = 'pending' | 'running' | 'success' | 'failed' | 'cancelled';

export interface SyncRunSummary {
  campaignRoot: string;
  state: SyncRunState;
  startedAt: string;
  finishedAt?: string;
  durationMs?: number;
  stats: Record<string, number>;
  error?: string;
}

function nowIso(): string {
  return new Date().toISOString();
}

function serializeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

/** Tracks one sync: timing, per-stage counters and the outcome, logged as it goes. */
export class SyncRun {
  private state: SyncRunState = 'pending';
  private startedAt = nowIso();
  private startedMs = Date.now();
  private finishedAt?: string;
  private durationMs?: number;
  private error?: string;
  private readonly stats: Record<string, number> = {};

  constructor(readonly campaignRoot: string) {}

  start(): void {
    if (this.state !== 'pending') return;
    this.state = 'running';
    this.startedAt = nowIso();
    this.startedMs = Date.now();
    log.info('Sync started', { campaignRoot: this.campaignRoot });
  }

  updateStats(partial: Record<string, number>): void {
    if (this.state !== 'running') return;
    Object.assign(this.stats, partial);
  }

  finishSuccess(): void {
    if (!this.finish('success')) return;
    log.info('Sync finished', { campaignRoot: this.campaignRoot, durationMs: this.durationMs, ...this.stats });
  }

  finishFail(error: unknown): void {
    const cancelled = error instanceof SyncCancelledError;
    if (!this.finish(cancelled ? 'cancelled' : 'failed')) return;
    this.error = serializeError(error);
    if (cancelled) {
      log.info('Sync cancelled', { campaignRoot: this.campaignRoot });
    } else {
      log.error('Sync failed', { campaignRoot: this.campaignRoot, error: this.error });
    }
  }

  summary(): SyncRunSummary {
    return {
      campaignRoot: this.campaignRoot,
      state: this.state,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      durationMs: this.durationMs,
      stats: { ...this.stats },
      error: this.error
    };
  }

  private finish(state: SyncRunState): boolean {
    if (this.state !== 'running') return false;
    this.state = state;
    this.finishedAt = nowIso();
    this.durationMs = Date.now() - this.startedMs;
    return true;
  }
}
