import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  EMBEDDING_BACKEND,
  PIPELINE_STAGES,
  RECORD_STORE,
  SOURCE_COLLECTOR,
  STAGE_STATES,
  VECTOR_INDEX,
} from '../config/briefing.constants';
import {
  CollectionError,
  IndexError,
  PersistError,
  PipelineAbortedError,
  PipelineError,
  ReportError,
  StageError,
} from '../errors/briefing.errors';
import {
  CollectionResult,
  ContentRecord,
  EmbeddingBackend,
  PipelineRun,
  PipelineStage,
  RecordStore,
  SourceCollector,
  StageProgress,
  StageRunResult,
  VectorIndex,
} from '../types/briefing.types';
import { chunkArray } from '../utils/concurrency.util';
import { isValidDateString, todayString } from '../utils/date.util';
import { normalizeLanguage } from '../utils/language.util';
import {
  buildEmbeddingMetadata,
  contentHash,
  recordText,
} from '../utils/record.util';
import { PipelineRunStoreService } from './pipeline-run-store.service';
import { ReportGeneratorService } from './report-generator.service';

export interface RunOptions {
  date?: string;
  language?: string;
  /** Run again even when a completed run exists for the date and language. */
  force?: boolean;
  /** Continue the latest failed run from its failed stage. */
  resume?: boolean;
  signal?: AbortSignal;
}

export interface StageOptions {
  date?: string;
  language?: string;
  signal?: AbortSignal;
}

interface ResumePoint {
  run: PipelineRun;
  lastCompletedStage: PipelineStage;
  records: ContentRecord[];
}

function pendingProgress(): StageProgress {
  return {
    status: 'pending',
    processed: 0,
    failed: 0,
    startedAt: null,
    finishedAt: null,
    error: null,
  };
}

@Injectable()
export class PipelineRunnerService implements OnApplicationShutdown {
  private readonly logger = new Logger(PipelineRunnerService.name);
  private readonly inFlightRuns = new Map<string, Promise<PipelineRun>>();
  private readonly shutdown = new AbortController();

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(SOURCE_COLLECTOR) private readonly sourceCollector: SourceCollector,
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    @Inject(EMBEDDING_BACKEND)
    private readonly embeddingBackend: EmbeddingBackend,
    @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
    private readonly runStore: PipelineRunStoreService,
    private readonly reportGenerator: ReportGeneratorService,
  ) {}

  /**
   * Runs collect → index → persist → report for one date and language.
   * Stage failures end the run in `failed` and are returned, not thrown;
   * only an invalid request throws (PipelineError).
   */
  async run(options: RunOptions = {}): Promise<PipelineRun> {
    const date = this.resolveDate(options.date);
    const language = this.resolveLanguage(options.language);
    const force = Boolean(options.force);
    const resume = Boolean(options.resume);
    const lockKey = `${date}:${language}:${force ? '1' : '0'}:${resume ? '1' : '0'}`;

    const inFlight = this.inFlightRuns.get(lockKey);
    if (inFlight) {
      this.logger.log(`run already in flight: key=${lockKey}`);
      return inFlight;
    }

    const task = this.runCore({
      date,
      language,
      force,
      resume,
      signal: options.signal,
    });
    this.inFlightRuns.set(lockKey, task);
    try {
      return await task;
    } finally {
      if (this.inFlightRuns.get(lockKey) === task) {
        this.inFlightRuns.delete(lockKey);
      }
    }
  }

  /**
   * Runs a single stage against the date's staged batch. Collect stages a
   * fresh batch; index and persist require one.
   */
  async runStage(
    stage: PipelineStage,
    options: StageOptions = {},
  ): Promise<StageRunResult> {
    const date = this.resolveDate(options.date);
    const language = this.resolveLanguage(options.language);
    const progress = pendingProgress();
    const result: StageRunResult = {
      stage,
      date,
      language,
      progress,
      sourceFailures: [],
      error: null,
    };

    const staged =
      stage === 'index' || stage === 'persist'
        ? await this.runStore.getStagedRecords(date)
        : null;
    if ((stage === 'index' || stage === 'persist') && !staged) {
      throw new PipelineError(
        `no staged records for ${date}; run the collect stage first`,
      );
    }

    if (this.isAborted(options.signal)) {
      result.error = this.describeError(new PipelineAbortedError(stage));
      return result;
    }

    progress.startedAt = new Date().toISOString();
    try {
      switch (stage) {
        case 'collect': {
          const collected = await this.collectStage(date, progress, options.signal);
          result.sourceFailures = collected.failures;
          break;
        }
        case 'index':
          await this.indexStage(staged ?? [], progress);
          break;
        case 'persist':
          await this.persistStage(staged ?? [], progress);
          break;
        case 'report':
          await this.reportStage(date, language, progress);
          break;
      }
      progress.status = 'succeeded';
    } catch (error) {
      const stageError = options.signal?.aborted
        ? new PipelineAbortedError(stage, true, { cause: error })
        : this.toStageError(stage, error, progress.processed);
      progress.status = 'failed';
      progress.error = stageError.message;
      result.error = this.describeError(stageError);
      if (stageError instanceof CollectionError) {
        result.sourceFailures = stageError.failures;
      }
      this.logger.warn(
        `stage failed: stage=${stage} date=${date} ${stageError.name}: ${stageError.message}`,
      );
    }
    progress.finishedAt = new Date().toISOString();
    return result;
  }

  listRuns(limit?: number): Promise<PipelineRun[]> {
    return this.runStore.list(limit);
  }

  /** In-flight runs stop before their next stage and are awaited. */
  async onApplicationShutdown(): Promise<void> {
    this.shutdown.abort();
    const pending = [...this.inFlightRuns.values()];
    if (pending.length > 0) {
      this.logger.log(`shutdown: waiting for runs=${pending.length} to stop`);
      await Promise.allSettled(pending);
    }
  }

  private async runCore(params: {
    date: string;
    language: string;
    force: boolean;
    resume: boolean;
    signal?: AbortSignal;
  }): Promise<PipelineRun> {
    const { date, language, force, resume, signal } = params;

    if (!force) {
      const completed = await this.runStore.findLatest(
        date,
        language,
        'completed',
      );
      if (completed) {
        this.logger.log(
          `run skipped (already completed): id=${completed.id} language=${language}`,
        );
        return completed;
      }
    }

    const resumePoint = resume
      ? await this.findResumePoint(date, language)
      : null;
    const run = await this.createRun(date, language, force);
    let records: ContentRecord[] = [];
    let stages = PIPELINE_STAGES;

    if (resumePoint) {
      const resumeIndex =
        PIPELINE_STAGES.indexOf(resumePoint.lastCompletedStage) + 1;
      for (const stage of PIPELINE_STAGES.slice(0, resumeIndex)) {
        run.stages[stage].status = 'skipped';
      }
      run.lastCompletedStage = resumePoint.lastCompletedStage;
      run.resumedFrom = resumePoint.run.id;
      run.sourceFailures = resumePoint.run.sourceFailures;
      records = resumePoint.records;
      stages = PIPELINE_STAGES.slice(resumeIndex);
    }

    await this.runStore.save(run);
    this.logger.log(
      `run start: id=${run.id} language=${language} force=${force} resumedFrom=${run.resumedFrom ?? '-'}`,
    );

    for (const stage of stages) {
      if (this.isAborted(signal)) {
        return this.failRun(run, stage, new PipelineAbortedError(stage));
      }

      const progress = run.stages[stage];
      run.state = STAGE_STATES[stage];
      progress.startedAt = new Date().toISOString();

      try {
        await this.runStore.save(run);
        switch (stage) {
          case 'collect': {
            const collected = await this.collectStage(date, progress, signal);
            run.sourceFailures = collected.failures;
            records = collected.records;
            break;
          }
          case 'index':
            await this.indexStage(records, progress);
            break;
          case 'persist':
            await this.persistStage(records, progress);
            break;
          case 'report':
            await this.reportStage(date, language, progress);
            break;
        }
      } catch (error) {
        return this.failRun(
          run,
          stage,
          signal?.aborted
            ? new PipelineAbortedError(stage, true, { cause: error })
            : this.toStageError(stage, error, progress.processed),
        );
      }

      progress.status = 'succeeded';
      progress.finishedAt = new Date().toISOString();
      run.lastCompletedStage = stage;
      await this.runStore.save(run);
    }

    run.state = 'completed';
    run.finishedAt = new Date().toISOString();
    await this.runStore.save(run);
    this.logger.log(
      `run completed: id=${run.id} records=${records.length} sourceFailures=${run.sourceFailures.length}`,
    );
    return run;
  }

  private async collectStage(
    date: string,
    progress: StageProgress,
    signal?: AbortSignal,
  ): Promise<CollectionResult> {
    const collected = await this.sourceCollector.fetchAll(signal);
    progress.processed = collected.records.length;
    progress.failed = collected.failures.length;
    await this.runStore.saveStagedRecords(date, collected.records);
    return collected;
  }

  /** Embeds new or changed records only; whatever was upserted is flushed. */
  private async indexStage(
    records: ContentRecord[],
    progress: StageProgress,
  ): Promise<void> {
    let unchanged = 0;
    try {
      for (const record of records) {
        const hash = contentHash(record);
        const existing = await this.vectorIndex.getMetadata(record.id);
        if (existing?.contentHash === hash) {
          unchanged += 1;
          continue;
        }

        const vector = await this.embeddingBackend.embed(recordText(record));
        if (!vector) {
          progress.failed += 1;
          throw new IndexError(
            `embedding backend unavailable (record ${record.id})`,
            progress.processed,
          );
        }
        await this.vectorIndex.upsert(
          record.id,
          vector,
          buildEmbeddingMetadata(record, hash),
        );
        progress.processed += 1;
      }
    } finally {
      await this.vectorIndex.flush();
    }
    this.logger.log(
      `index done: upserted=${progress.processed} unchanged=${unchanged}`,
    );
  }

  private async persistStage(
    records: ContentRecord[],
    progress: StageProgress,
  ): Promise<void> {
    for (const batch of chunkArray(records, this.config.pipeline.persistBatchSize)) {
      try {
        await this.recordStore.upsertAll(batch);
      } catch (error) {
        progress.failed += batch.length;
        throw new PersistError(
          `storage write failed after ${progress.processed} records`,
          progress.processed,
          { cause: error },
        );
      }
      progress.processed += batch.length;
    }
  }

  private async reportStage(
    date: string,
    language: string,
    progress: StageProgress,
  ): Promise<void> {
    const report = await this.reportGenerator.generate(date, language);
    progress.processed = report.sourceIds.length;
  }

  private async failRun(
    run: PipelineRun,
    stage: PipelineStage,
    error: StageError,
  ): Promise<PipelineRun> {
    const now = new Date().toISOString();
    const progress = run.stages[stage];
    if (!(error instanceof PipelineAbortedError) || error.during) {
      progress.status = 'failed';
      progress.finishedAt = now;
      progress.error = error.message;
    }
    if (error instanceof CollectionError) {
      run.sourceFailures = error.failures;
      progress.failed = error.failures.length;
    }

    run.state = 'failed';
    run.failedStage = stage;
    run.error = this.describeError(error);
    run.finishedAt = now;
    await this.runStore.save(run);

    this.logger.warn(
      `run failed: id=${run.id} stage=${stage} lastCompleted=${run.lastCompletedStage ?? '-'} ${error.name}: ${error.message}`,
    );
    return run;
  }

  private async findResumePoint(
    date: string,
    language: string,
  ): Promise<ResumePoint | null> {
    const latest = await this.runStore.findLatest(date, language);
    if (!latest || latest.state !== 'failed' || !latest.lastCompletedStage) {
      return null;
    }
    const { lastCompletedStage } = latest;
    const records = await this.runStore.getStagedRecords(date);
    if (!records) {
      this.logger.warn(`resume unavailable: id=${latest.id} has no staged records`);
      return null;
    }
    return {
      run: latest,
      lastCompletedStage,
      records,
    };
  }

  private async createRun(
    date: string,
    language: string,
    forced: boolean,
  ): Promise<PipelineRun> {
    const sequence = await this.runStore.nextSequence(date);
    return {
      id: `${date}#${sequence}`,
      date,
      language,
      sequence,
      state: 'not_started',
      failedStage: null,
      lastCompletedStage: null,
      stages: {
        collect: pendingProgress(),
        index: pendingProgress(),
        persist: pendingProgress(),
        report: pendingProgress(),
      },
      sourceFailures: [],
      forced,
      resumedFrom: null,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      error: null,
    };
  }

  private toStageError(
    stage: PipelineStage,
    error: unknown,
    succeeded: number,
  ): StageError {
    if (error instanceof StageError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    const options = { cause: error };
    switch (stage) {
      case 'collect':
        return new CollectionError(message, [], options);
      case 'index':
        return new IndexError(message, succeeded, options);
      case 'persist':
        return new PersistError(message, succeeded, options);
      case 'report':
        return new ReportError(message, succeeded, options);
    }
  }

  private isAborted(signal?: AbortSignal): boolean {
    return Boolean(signal?.aborted) || this.shutdown.signal.aborted;
  }

  private describeError(error: Error): { name: string; message: string } {
    return { name: error.name, message: error.message };
  }

  private resolveDate(date?: string): string {
    const resolved = date?.trim() || todayString(this.config.timezoneOffsetHours);
    if (!isValidDateString(resolved)) {
      throw new PipelineError(`invalid date: ${resolved} (expected YYYY-MM-DD)`);
    }
    return resolved;
  }

  private resolveLanguage(language?: string): string {
    return normalizeLanguage(language ?? this.config.defaultLanguage);
  }
}
