import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Inject,
  NotFoundException,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import {
  PIPELINE_STAGES,
  RECORD_STORE,
  SERVICE_NAME,
} from './config/briefing.constants';
import { ChatError, ConfigError, PipelineError } from './errors/briefing.errors';
import { ArticleSummarizerService } from './services/article-summarizer.service';
import { ChatService } from './services/chat.service';
import { PipelineRunnerService } from './services/pipeline-runner.service';
import {
  ChatAnswer,
  PipelineRun,
  PipelineStage,
  RecordStore,
  ReportDocument,
  StageRunResult,
  SummarizeResult,
} from './types/briefing.types';
import { isValidDateString, todayString } from './utils/date.util';
import { normalizeLanguage } from './utils/language.util';

@Controller()
export class BriefingController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly pipelineRunner: PipelineRunnerService,
    private readonly articleSummarizer: ArticleSummarizerService,
    private readonly chatService: ChatService,
    @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return { status: 'ok', service: SERVICE_NAME };
  }

  @Post('pipeline/run')
  @HttpCode(200)
  async runPipeline(
    @Body('date') date?: unknown,
    @Body('language') language?: unknown,
    @Body('force') force?: unknown,
    @Body('resume') resume?: unknown,
  ): Promise<PipelineRun> {
    return this.handle(() =>
      this.pipelineRunner.run({
        date: this.parseDate(date),
        language: this.parseLanguage(language),
        force: this.parseBoolean(force, 'force'),
        resume: this.parseBoolean(resume, 'resume'),
      }),
    );
  }

  @Post('pipeline/stages/:stage')
  @HttpCode(200)
  async runStage(
    @Param('stage') stage: string,
    @Body('date') date?: unknown,
    @Body('language') language?: unknown,
  ): Promise<StageRunResult> {
    return this.handle(() =>
      this.pipelineRunner.runStage(this.parseStage(stage), {
        date: this.parseDate(date),
        language: this.parseLanguage(language),
      }),
    );
  }

  @Get('pipeline/runs')
  async listRuns(@Query('limit') limit?: string): Promise<PipelineRun[]> {
    return this.pipelineRunner.listRuns(this.parseLimit(limit));
  }

  @Get('reports/:date')
  async getReport(
    @Param('date') date: string,
    @Query('language') language?: string,
  ): Promise<ReportDocument> {
    const resolvedDate = this.parseDate(date) ?? date;
    const resolvedLanguage = this.parseLanguage(language);
    const report = await this.recordStore.getReport(
      resolvedDate,
      resolvedLanguage,
    );
    if (!report) {
      throw new NotFoundException(
        `no report for ${resolvedDate} (${resolvedLanguage})`,
      );
    }
    return report;
  }

  @Post('articles/summarize')
  @HttpCode(200)
  async summarize(
    @Body('date') date?: unknown,
    @Body('language') language?: unknown,
    @Body('force') force?: unknown,
  ): Promise<SummarizeResult> {
    return this.articleSummarizer.summarize(
      this.parseDate(date) ?? todayString(this.config.timezoneOffsetHours),
      this.parseLanguage(language),
      { force: this.parseBoolean(force, 'force') },
    );
  }

  @Post('chat/ask')
  @HttpCode(200)
  async ask(
    @Body('question') question?: unknown,
    @Body('sessionId') sessionId?: unknown,
  ): Promise<ChatAnswer & { sessionId: string }> {
    const session = this.chatService.getOrCreate(
      this.parseString(sessionId, 'sessionId'),
    );
    const answer = await this.handle(() =>
      session.ask(typeof question === 'string' ? question : ''),
    );
    return { sessionId: session.id, ...answer };
  }

  private async handle<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof PipelineError || error instanceof ConfigError) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof ChatError) {
        if (error.reason === 'empty_question') {
          throw new BadRequestException(error.message);
        }
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }

  private parseStage(value: string): PipelineStage {
    const stage = PIPELINE_STAGES.find((candidate) => candidate === value);
    if (!stage) {
      throw new BadRequestException(
        `stage must be one of ${PIPELINE_STAGES.join(', ')}`,
      );
    }
    return stage;
  }

  private parseDate(value: unknown): string | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string' || !isValidDateString(value)) {
      throw new BadRequestException('date must be YYYY-MM-DD');
    }
    return value;
  }

  private parseString(value: unknown, fieldName: string): string | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new BadRequestException(`${fieldName} must be a string`);
    }
    return value.trim() || undefined;
  }

  private parseLanguage(value: unknown): string {
    const language =
      this.parseString(value, 'language') ?? this.config.defaultLanguage;
    try {
      return normalizeLanguage(language);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  private parseLimit(value: unknown): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new BadRequestException('limit must be a positive number');
    }
    return Math.floor(parsed);
  }

  private parseBoolean(value: unknown, fieldName: string): boolean {
    if (value == null || value === '') {
      return false;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
    }
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n'].includes(lowered)) {
        return false;
      }
    }

    throw new BadRequestException(`${fieldName} must be a boolean value`);
  }
}
