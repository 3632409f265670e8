import path from 'node:path';
import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  PIPELINE_RUNS_FILE,
  STAGING_DIR,
} from '../config/briefing.constants';
import {
  ContentRecord,
  PipelineRun,
  PipelineState,
} from '../types/briefing.types';
import { SerialQueue } from '../utils/concurrency.util';
import { readJsonFile, writeJsonAtomic } from '../utils/json-file.util';

/**
 * Run audit log plus the record batch each date's latest collect produced.
 * Sequence numbers are unique per date across languages; writes go through
 * one queue and apply to the state current when they run.
 */
@Injectable()
export class PipelineRunStoreService {
  private readonly dataDir: string | null;
  private runs: PipelineRun[] | null = null;
  private loading: Promise<PipelineRun[]> | null = null;
  private readonly reserved = new Map<string, number>();
  private readonly writes = new SerialQueue();
  private readonly staged = new Map<string, ContentRecord[]>();

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.dataDir =
      config.storage.driver === 'file' ? config.storage.dataDir : null;
  }

  nextSequence(date: string): Promise<number> {
    return this.writes.run(async () => {
      const stored = (await this.load())
        .filter((run) => run.date === date)
        .reduce((max, run) => Math.max(max, run.sequence), 0);
      const sequence = Math.max(stored, this.reserved.get(date) ?? 0) + 1;
      this.reserved.set(date, sequence);
      return sequence;
    });
  }

  save(run: PipelineRun): Promise<void> {
    const snapshot = structuredClone(run);
    return this.writes.run(async () => {
      const next = (await this.load()).filter(
        (existing) => existing.id !== snapshot.id,
      );
      next.push(snapshot);
      if (this.dataDir) {
        await writeJsonAtomic(path.join(this.dataDir, PIPELINE_RUNS_FILE), next);
      }
      this.runs = next;
    });
  }

  async findLatest(
    date: string,
    language: string,
    state?: PipelineState,
  ): Promise<PipelineRun | null> {
    const runs = await this.load();
    const matching = runs
      .filter(
        (run) =>
          run.date === date &&
          run.language === language &&
          (!state || run.state === state),
      )
      .sort((a, b) => b.sequence - a.sequence);
    return matching[0] ? structuredClone(matching[0]) : null;
  }

  /** Most recent first. */
  async list(limit = 20): Promise<PipelineRun[]> {
    const runs = await this.load();
    return [...runs]
      .sort(
        (a, b) =>
          b.startedAt.localeCompare(a.startedAt) || b.sequence - a.sequence,
      )
      .slice(0, Math.max(0, limit))
      .map((run) => structuredClone(run));
  }

  async saveStagedRecords(
    date: string,
    records: ContentRecord[],
  ): Promise<void> {
    if (this.dataDir) {
      await writeJsonAtomic(this.stagingPath(this.dataDir, date), records);
    }
    this.staged.set(date, structuredClone(records));
  }

  async getStagedRecords(date: string): Promise<ContentRecord[] | null> {
    const cached = this.staged.get(date);
    if (cached) {
      return structuredClone(cached);
    }
    if (!this.dataDir) {
      return null;
    }
    const stored = await readJsonFile<ContentRecord[]>(
      this.stagingPath(this.dataDir, date),
    );
    if (stored) {
      this.staged.set(date, stored);
    }
    return stored;
  }

  private stagingPath(dataDir: string, date: string): string {
    return path.join(dataDir, STAGING_DIR, `${date}.json`);
  }

  private async load(): Promise<PipelineRun[]> {
    if (this.runs) {
      return this.runs;
    }
    this.loading ??= this.readRuns();
    const stored = await this.loading;
    this.runs ??= stored;
    return this.runs;
  }

  private async readRuns(): Promise<PipelineRun[]> {
    if (!this.dataDir) {
      return [];
    }
    return (
      (await readJsonFile<PipelineRun[]>(
        path.join(this.dataDir, PIPELINE_RUNS_FILE),
      )) ?? []
    );
  }
}
