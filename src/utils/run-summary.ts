import { describeError } from '../errors.js';
import type { SourceDrop, SourceStats } from '../sources.js';
import type { SourceTag } from '../types/index.js';
import { writeJson } from './fs.js';
import { log } from './log.js';

export type RunState = 'pending' | 'running' | 'success' | 'failed';

export interface SourceSummary {
  source: SourceTag;
  state: 'loaded' | 'unavailable';
  files: number;
  read: number;
  accepted: number;
  dropped: number;
  error?: string;
}

export interface NameConflict {
  key: string;
  chosen: string;
  rejected: string[];
  sources: SourceTag[];
}

export interface RunSummaryRecord {
  state: RunState;
  started_at: string | null;
  finished_at: string | null;
  sources: SourceSummary[];
  drops: Array<SourceDrop & { source: SourceTag }>;
  conflicts: NameConflict[];
  stats: Record<string, unknown>;
  outputs: string[];
  log: string | null;
}

function nowIso(): string {
  return new Date().toISOString();
}

/** Tracks what a run read, dropped, degraded and wrote. */
export class RunSummary {
  private state: RunState = 'pending';
  private startedAt: string | null = null;
  private finishedAt: string | null = null;
  private readonly sources = new Map<SourceTag, SourceSummary>();
  private readonly drops: RunSummaryRecord['drops'] = [];
  private readonly conflicts: NameConflict[] = [];
  private readonly outputs: string[] = [];
  private stats: Record<string, unknown> = {};
  private failure: string | null = null;

  start(extra?: Record<string, unknown>): void {
    if (this.state === 'running') return;
    this.state = 'running';
    this.startedAt = nowIso();
    this.stats = { ...extra };
    log.info('Run started', extra);
  }

  recordSourceLoaded(source: SourceTag, accepted: number, stats?: SourceStats): void {
    this.sources.set(source, {
      source,
      state: 'loaded',
      files: stats?.files.length ?? 0,
      read: stats?.read ?? accepted,
      accepted,
      dropped: stats?.dropped ?? 0
    });
    for (const drop of stats?.drops ?? []) {
      this.drops.push({ source, ...drop });
    }
  }

  recordSourceUnavailable(source: SourceTag, error: unknown): void {
    this.sources.set(source, {
      source,
      state: 'unavailable',
      files: 0,
      read: 0,
      accepted: 0,
      dropped: 0,
      error: error instanceof Error ? error.message : String(error)
    });
  }

  recordConflict(conflict: NameConflict): void {
    this.conflicts.push(conflict);
  }

  addOutput(path: string): void {
    this.outputs.push(path);
  }

  updateStats(partial: Record<string, unknown>): void {
    Object.assign(this.stats, partial);
  }

  get droppedCount(): number {
    return this.drops.length;
  }

  get unavailableSources(): SourceTag[] {
    return [...this.sources.values()]
      .filter((summary) => summary.state === 'unavailable')
      .map((summary) => summary.source);
  }

  finishSuccess(): void {
    this.state = 'success';
    this.finishedAt = nowIso();
    log.info('Run finished successfully', {
      sources: this.sources.size,
      dropped: this.drops.length,
      unavailable: this.unavailableSources,
      conflicts: this.conflicts.length
    });
  }

  finishFail(error: unknown): void {
    this.state = 'failed';
    this.finishedAt = nowIso();
    this.failure = describeError(error);
    log.error('Run failed', { error });
  }

  toJSON(): RunSummaryRecord {
    return {
      state: this.state,
      started_at: this.startedAt,
      finished_at: this.finishedAt,
      sources: [...this.sources.values()],
      drops: [...this.drops],
      conflicts: [...this.conflicts],
      stats: { ...this.stats },
      outputs: [...this.outputs],
      log: this.failure
    };
  }

  async write(file: string): Promise<void> {
    await writeJson(file, this.toJSON());
  }
}
