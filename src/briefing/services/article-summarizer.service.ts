import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  COMPLETION_BACKEND,
  RECORD_STORE,
} from '../config/briefing.constants';
import {
  buildSummaryCheckPrompt,
  buildSummaryPrompt,
  SUMMARY_CHECK_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT,
} from '../prompts/summary.prompt';
import {
  Article,
  ArticleSummary,
  CompletionBackend,
  RecordStore,
  SummarizeResult,
  SummaryVerification,
} from '../types/briefing.types';
import { dayRange } from '../utils/date.util';
import { cleanText, truncate } from '../utils/text.util';

const MAX_HIGHLIGHTS = 3;

interface Draft {
  summary: string;
  highlights: string[];
}

function readHighlights(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => cleanText(item))
    .filter(Boolean)
    .slice(0, MAX_HIGHLIGHTS);
}

@Injectable()
export class ArticleSummarizerService {
  private readonly logger = new Logger(ArticleSummarizerService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
    @Inject(COMPLETION_BACKEND)
    private readonly completionBackend: CompletionBackend,
  ) {}

  async summarize(
    date: string,
    language: string,
    options: { force?: boolean } = {},
  ): Promise<SummarizeResult> {
    const records = await this.recordStore.queryByDateRange({
      range: dayRange(date, this.config.timezoneOffsetHours),
      language,
      kind: 'article',
    });
    const articles = records.filter(
      (record): record is Article => record.kind === 'article',
    );
    const existing = options.force
      ? new Map<string, ArticleSummary>()
      : await this.recordStore.getSummaries(
          articles.map((article) => article.id),
          language,
        );
    const pending = articles.filter((article) => !existing.has(article.id));

    this.logger.log(
      `summarize start: date=${date} language=${language} articles=${articles.length} pending=${pending.length}`,
    );

    const summaries: ArticleSummary[] = [];
    let failed = 0;
    let corrected = 0;
    for (const [index, article] of pending.entries()) {
      const summary = await this.summarizeArticle(article, language);
      if (summary) {
        summaries.push(summary);
        if (summary.verification?.accurate === false) {
          corrected += 1;
        }
      } else {
        failed += 1;
      }
      if ((index + 1) % 10 === 0 || index === pending.length - 1) {
        this.logger.log(
          `summarize progress: ${index + 1}/${pending.length} failed=${failed} corrected=${corrected}`,
        );
      }
    }

    await this.recordStore.upsertSummaries(summaries);
    return {
      date,
      language,
      summarized: summaries.length,
      skipped: articles.length - pending.length,
      failed,
      corrected,
    };
  }

  private async summarizeArticle(
    article: Article,
    language: string,
  ): Promise<ArticleSummary | null> {
    const text = truncate(cleanText(article.text), this.config.llm.embedMaxChars);
    const response = await this.completionBackend.completeJson(
      SUMMARY_SYSTEM_PROMPT,
      buildSummaryPrompt(article.title, text, language),
    );
    const rawSummary = response?.summary;
    const summary = typeof rawSummary === 'string' ? cleanText(rawSummary) : '';
    if (!summary) {
      this.logger.warn(`summary unusable: id=${article.id}`);
      return null;
    }

    let draft: Draft = {
      summary,
      highlights: readHighlights(response?.highlights) ?? [],
    };
    let verification: SummaryVerification | undefined;
    if (this.config.summarize.verify) {
      const check = await this.completionBackend.completeJson(
        SUMMARY_CHECK_SYSTEM_PROMPT,
        buildSummaryCheckPrompt(article.title, text, draft, language),
      );
      const verdict = this.readVerdict(article.id, check, draft);
      if (verdict) {
        draft = verdict.draft;
        verification = verdict.verification;
      }
    }

    return {
      articleId: article.id,
      language,
      ...draft,
      model: this.config.llm.model,
      createdAt: new Date().toISOString(),
      ...(verification ? { verification } : {}),
    };
  }

  /** Keeps the draft when the check has no verdict or an empty correction. */
  private readVerdict(
    articleId: string,
    check: Record<string, unknown> | null,
    draft: Draft,
  ): { draft: Draft; verification: SummaryVerification } | null {
    const accurate = check?.accurate;
    if (typeof accurate !== 'boolean') {
      this.logger.warn(`summary check unusable: id=${articleId}`);
      return null;
    }
    const rawReasoning = check?.reasoning;
    const reasoning =
      typeof rawReasoning === 'string' ? cleanText(rawReasoning) : '';
    if (accurate) {
      return { draft, verification: { accurate, reasoning } };
    }

    const rawSummary = check?.summary;
    const correctedSummary =
      typeof rawSummary === 'string' ? cleanText(rawSummary) : '';
    if (!correctedSummary) {
      this.logger.warn(`summary correction empty: id=${articleId}`);
      return null;
    }
    this.logger.log(`summary corrected: id=${articleId} reason=${reasoning}`);
    return {
      draft: {
        summary: correctedSummary,
        highlights: readHighlights(check?.highlights) ?? draft.highlights,
      },
      verification: { accurate, reasoning },
    };
  }
}
