import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  COMPLETION_BACKEND,
  RECORD_STORE,
} from '../config/briefing.constants';
import { ReportError } from '../errors/briefing.errors';
import { buildReportPrompt, ReportPromptEntry } from '../prompts/report.prompt';
import {
  Article,
  ArticleSummary,
  CompletionBackend,
  ContentRecord,
  RecordStore,
  ReportDocument,
  StatRecord,
} from '../types/briefing.types';
import { dayRange } from '../utils/date.util';
import { recordText, recordTitle, recordTimestamp } from '../utils/record.util';
import { cleanMultiline, cleanText, truncate } from '../utils/text.util';

@Injectable()
export class ReportGeneratorService {
  private readonly logger = new Logger(ReportGeneratorService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
    @Inject(COMPLETION_BACKEND)
    private readonly completionBackend: CompletionBackend,
  ) {}

  async generate(date: string, language: string): Promise<ReportDocument> {
    const startedAt = Date.now();
    const records = await this.recordStore.queryByDateRange({
      range: dayRange(date, this.config.timezoneOffsetHours),
      language,
    });
    if (records.length === 0) {
      throw new ReportError(`no records for ${date} (${language})`);
    }

    const selected = this.selectRecords(records);
    const summaries = await this.recordStore.getSummaries(
      selected.filter((r) => r.kind === 'article').map((r) => r.id),
      language,
    );
    const prompt = buildReportPrompt(
      date,
      language,
      selected.map((record) => this.toPromptEntry(record, summaries)),
    );

    let output: string | null;
    try {
      output = await this.completionBackend.complete(prompt, {
        model: this.config.llm.model,
        temperature: this.config.llm.temperature,
        maxTokens: this.config.llm.maxTokens,
        language,
      });
    } catch (error) {
      throw new ReportError(`completion failed for ${date} (${language})`, 0, {
        cause: error,
      });
    }

    const summary = cleanMultiline(output ?? '');
    if (!summary) {
      throw new ReportError(
        `completion backend returned no report for ${date} (${language})`,
      );
    }

    const report: ReportDocument = {
      date,
      language,
      summary,
      sourceIds: selected.map((record) => record.id).sort(),
      model: this.config.llm.model,
      generatedAt: new Date().toISOString(),
    };
    await this.recordStore.upsertReport(report);

    this.logger.log(
      `report saved: date=${date} language=${language} records=${selected.length} summaries=${summaries.size} elapsedMs=${Date.now() - startedAt}`,
    );
    return report;
  }

  /** Newest articles first, then stats, capped at report.maxRecords. */
  private selectRecords(records: ContentRecord[]): ContentRecord[] {
    const articles = records
      .filter((record): record is Article => record.kind === 'article')
      .sort(
        (a, b) =>
          b.publishedAt.localeCompare(a.publishedAt) || a.id.localeCompare(b.id),
      );
    const stats = records.filter(
      (record): record is StatRecord => record.kind === 'stat',
    );
    return [...articles, ...stats].slice(0, this.config.report.maxRecords);
  }

  private toPromptEntry(
    record: ContentRecord,
    summaries: Map<string, ArticleSummary>,
  ): ReportPromptEntry {
    const base = {
      kind: record.kind,
      title: recordTitle(record),
      sourceName: record.sourceName,
      timestamp: recordTimestamp(record),
    };
    if (record.kind === 'stat') {
      return { ...base, body: recordText(record) };
    }

    const summary = summaries.get(record.id);
    if (summary) {
      const highlights = summary.highlights.length
        ? `\nHighlights: ${summary.highlights.join('; ')}`
        : '';
      return { ...base, body: `Summary: ${summary.summary}${highlights}` };
    }
    return {
      ...base,
      body: truncate(cleanText(record.text), this.config.report.maxCharsPerRecord),
    };
  }
}
