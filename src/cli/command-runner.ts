import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig, redactConfig } from '../config/app-config';
import {
  EMBEDDING_BACKEND,
  VECTOR_INDEX,
} from '../briefing/config/briefing.constants';
import { ChatError, PipelineError } from '../briefing/errors/briefing.errors';
import { ArticleSummarizerService } from '../briefing/services/article-summarizer.service';
import { ChatService } from '../briefing/services/chat.service';
import { PipelineRunnerService } from '../briefing/services/pipeline-runner.service';
import { ReportGeneratorService } from '../briefing/services/report-generator.service';
import {
  EmbeddingBackend,
  PipelineRun,
  StageProgress,
  VectorIndex,
} from '../briefing/types/briefing.types';
import { todayString } from '../briefing/utils/date.util';
import { normalizeLanguage } from '../briefing/utils/language.util';
import { CliCommand, USAGE } from './command-parser';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  write(line: string): void;
  /** Resolves null at end of input. */
  prompt(question: string): Promise<string | null>;
}

const CHAT_EXIT_WORDS = new Set(['exit', 'quit', 'q']);

@Injectable()
export class CommandRunner {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly pipelineRunner: PipelineRunnerService,
    private readonly reportGenerator: ReportGeneratorService,
    private readonly articleSummarizer: ArticleSummarizerService,
    private readonly chatService: ChatService,
    @Inject(VECTOR_INDEX) private readonly vectorIndex: VectorIndex,
    @Inject(EMBEDDING_BACKEND)
    private readonly embeddingBackend: EmbeddingBackend,
  ) {}

  /** `signal` stops a pipeline run or stage before its next stage starts. */
  async execute(
    command: CliCommand,
    io: CliIo,
    signal?: AbortSignal,
  ): Promise<number> {
    try {
      return await this.dispatch(command, io, signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const name = error instanceof Error ? error.name : 'Error';
      io.write(`error: ${name}: ${message}`);
      return error instanceof PipelineError ? EXIT_USAGE : EXIT_FAILURE;
    }
  }

  private async dispatch(
    command: CliCommand,
    io: CliIo,
    signal?: AbortSignal,
  ): Promise<number> {
    switch (command.kind) {
      case 'help':
        io.write(USAGE);
        return EXIT_OK;

      case 'config':
        io.write(JSON.stringify(redactConfig(this.config), null, 2));
        return EXIT_OK;

      case 'run': {
        const run = await this.pipelineRunner.run({ ...command, signal });
        this.writeRun(run, io);
        return run.state === 'completed' ? EXIT_OK : EXIT_FAILURE;
      }

      case 'stage': {
        const result = await this.pipelineRunner.runStage(command.stage, {
          date: command.date,
          language: command.language,
          signal,
        });
        io.write(
          `stage ${result.stage} ${result.date} (${result.language}): ${this.describeProgress(result.progress)}`,
        );
        for (const failure of result.sourceFailures) {
          io.write(
            `  source failed: ${failure.source} after ${failure.attempts} attempts: ${failure.message}`,
          );
        }
        if (result.error) {
          io.write(`error: ${result.error.name}: ${result.error.message}`);
          return EXIT_FAILURE;
        }
        return EXIT_OK;
      }

      case 'summarize': {
        const result = await this.articleSummarizer.summarize(
          this.resolveDate(command.date),
          this.resolveLanguage(command.language),
          { force: command.force },
        );
        io.write(
          `summaries ${result.date} (${result.language}): summarized=${result.summarized} skipped=${result.skipped} failed=${result.failed} corrected=${result.corrected}`,
        );
        return EXIT_OK;
      }

      case 'report': {
        const report = await this.reportGenerator.generate(
          this.resolveDate(command.date),
          this.resolveLanguage(command.language),
        );
        io.write(`Report ${report.date} (${report.language}), ${report.sourceIds.length} sources`);
        io.write('');
        io.write(report.summary);
        return EXIT_OK;
      }

      case 'runs': {
        const runs = await this.pipelineRunner.listRuns(command.limit);
        if (runs.length === 0) {
          io.write('no pipeline runs yet');
        }
        for (const run of runs) {
          const failed = run.failedStage ? ` at ${run.failedStage}` : '';
          io.write(`${run.id} ${run.language} ${run.state}${failed} ${run.startedAt}`);
        }
        return EXIT_OK;
      }

      case 'index-query': {
        const vector = await this.embeddingBackend.embed(command.text);
        if (!vector) {
          io.write('error: embedding backend unavailable');
          return EXIT_FAILURE;
        }
        const matches = await this.vectorIndex.query(
          vector,
          command.k ?? this.config.chat.topK,
        );
        if (matches.length === 0) {
          io.write('no matches');
        }
        for (const match of matches) {
          io.write(
            `${match.score.toFixed(3)} ${match.id} ${match.metadata.title} (${match.metadata.sourceName})`,
          );
        }
        return EXIT_OK;
      }

      case 'index-clear':
        await this.vectorIndex.clear();
        io.write('vector index cleared');
        return EXIT_OK;

      case 'chat':
        return this.chat(io);
    }
  }

  private async chat(io: CliIo): Promise<number> {
    const session = this.chatService.createSession();
    io.write('Ask about the collected news and stats. Type "exit" to leave.');

    for (;;) {
      const line = await io.prompt('> ');
      if (line === null || CHAT_EXIT_WORDS.has(line.trim().toLowerCase())) {
        return EXIT_OK;
      }
      if (!line.trim()) {
        continue;
      }

      try {
        const answer = await session.ask(line);
        io.write(answer.answer);
        answer.sources.forEach((source, index) => {
          io.write(`  [${index + 1}] ${source.title} (${source.sourceName})`);
        });
        if (answer.statSubjects.length > 0) {
          io.write(`  stats: ${answer.statSubjects.join(', ')}`);
        }
      } catch (error) {
        if (!(error instanceof ChatError)) {
          throw error;
        }
        io.write(`error: ${error.message}`);
      }
    }
  }

  private writeRun(run: PipelineRun, io: CliIo): void {
    const resumed = run.resumedFrom ? ` (resumed from ${run.resumedFrom})` : '';
    io.write(`run ${run.id} ${run.language}: ${run.state}${resumed}`);
    for (const [stage, progress] of Object.entries(run.stages)) {
      io.write(`  ${stage}: ${this.describeProgress(progress)}`);
    }
    for (const failure of run.sourceFailures) {
      io.write(
        `  source failed: ${failure.source} after ${failure.attempts} attempts: ${failure.message}`,
      );
    }
    if (run.error) {
      io.write(
        `failed at ${run.failedStage ?? '-'}: ${run.error.name}: ${run.error.message}`,
      );
    }
  }

  private describeProgress(progress: StageProgress): string {
    return `${progress.status} processed=${progress.processed} failed=${progress.failed}`;
  }

  private resolveDate(date?: string): string {
    return date ?? todayString(this.config.timezoneOffsetHours);
  }

  private resolveLanguage(language?: string): string {
    return normalizeLanguage(language ?? this.config.defaultLanguage);
  }
}
