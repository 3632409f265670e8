import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  RECORDS_FILE,
  REPORTS_FILE,
  SUMMARIES_FILE,
} from '../config/briefing.constants';
import {
  ArticleSummary,
  ContentRecord,
  RecordQuery,
  RecordStore,
  ReportDocument,
  StatRecord,
  StoreCounts,
  UpsertSummary,
} from '../types/briefing.types';
import { SerialQueue } from '../utils/concurrency.util';
import { isWithinRange } from '../utils/date.util';
import { readJsonFile, writeJsonAtomic } from '../utils/json-file.util';
import { contentHash, recordTimestamp } from '../utils/record.util';

interface StoredRecord {
  hash: string;
  record: ContentRecord;
}

type Collection = 'records' | 'summaries' | 'reports';

const FILES: Record<Collection, string> = {
  records: RECORDS_FILE,
  summaries: SUMMARIES_FILE,
  reports: REPORTS_FILE,
};

function summaryKey(articleId: string, language: string): string {
  return `${articleId}|${language}`;
}

function reportKey(date: string, language: string): string {
  return `${date}|${language}`;
}

/**
 * Keyed JSON collections. Writes run one at a time; each builds the next
 * state from the current one, writes it atomically, and only then replaces
 * the in-memory copy.
 */
@Injectable()
export class RecordStoreService implements RecordStore {
  private readonly logger = new Logger(RecordStoreService.name);
  private readonly dataDir: string | null;

  private records: Map<string, StoredRecord> | null = null;
  private summaries: Map<string, ArticleSummary> | null = null;
  private reports: Map<string, ReportDocument> | null = null;
  private recordsLoad: Promise<Map<string, StoredRecord>> | null = null;
  private summariesLoad: Promise<Map<string, ArticleSummary>> | null = null;
  private reportsLoad: Promise<Map<string, ReportDocument>> | null = null;
  private readonly writes = new SerialQueue();

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.dataDir =
      config.storage.driver === 'file' ? config.storage.dataDir : null;
  }

  upsertAll(records: ContentRecord[]): Promise<UpsertSummary> {
    return this.writes.run(async () => {
      const next = new Map(await this.loadRecords());
      const summary: UpsertSummary = { inserted: 0, updated: 0, unchanged: 0 };

      for (const record of records) {
        const hash = contentHash(record);
        const existing = next.get(record.id);
        if (!existing) {
          summary.inserted += 1;
        } else if (existing.hash === hash) {
          summary.unchanged += 1;
          continue;
        } else {
          summary.updated += 1;
        }
        next.set(record.id, { hash, record });
      }

      if (summary.inserted + summary.updated > 0) {
        await this.persist('records', [...next.values()]);
        this.records = next;
      }

      this.logger.log(
        `records upserted: inserted=${summary.inserted} updated=${summary.updated} unchanged=${summary.unchanged}`,
      );
      return summary;
    });
  }

  async queryByDateRange(query: RecordQuery): Promise<ContentRecord[]> {
    const records = await this.loadRecords();
    return [...records.values()]
      .map((stored) => stored.record)
      .filter((record) => !query.kind || record.kind === query.kind)
      .filter(
        (record) =>
          !query.language ||
          record.kind === 'stat' ||
          record.language === query.language,
      )
      .filter((record) => isWithinRange(recordTimestamp(record), query.range))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  async getMany(ids: string[]): Promise<ContentRecord[]> {
    const records = await this.loadRecords();
    const found: ContentRecord[] = [];
    for (const id of ids) {
      const stored = records.get(id);
      if (stored) {
        found.push(stored.record);
      }
    }
    return found;
  }

  async listStats(): Promise<StatRecord[]> {
    const records = await this.loadRecords();
    return [...records.values()]
      .map((stored) => stored.record)
      .filter((record): record is StatRecord => record.kind === 'stat')
      .sort(
        (a, b) =>
          b.recordedAt.localeCompare(a.recordedAt) || a.id.localeCompare(b.id),
      );
  }

  upsertReport(report: ReportDocument): Promise<void> {
    return this.writes.run(async () => {
      const next = new Map(await this.loadReports());
      next.set(reportKey(report.date, report.language), report);
      await this.persist('reports', [...next.values()]);
      this.reports = next;
    });
  }

  async getReport(
    date: string,
    language: string,
  ): Promise<ReportDocument | null> {
    const reports = await this.loadReports();
    return reports.get(reportKey(date, language)) ?? null;
  }

  async listReports(): Promise<ReportDocument[]> {
    const reports = await this.loadReports();
    return [...reports.values()].sort(
      (a, b) =>
        b.date.localeCompare(a.date) || a.language.localeCompare(b.language),
    );
  }

  async upsertSummaries(summaries: ArticleSummary[]): Promise<void> {
    if (summaries.length === 0) {
      return;
    }
    await this.writes.run(async () => {
      const next = new Map(await this.loadSummaries());
      for (const summary of summaries) {
        next.set(summaryKey(summary.articleId, summary.language), summary);
      }
      await this.persist('summaries', [...next.values()]);
      this.summaries = next;
    });
  }

  async getSummaries(
    articleIds: string[],
    language: string,
  ): Promise<Map<string, ArticleSummary>> {
    const summaries = await this.loadSummaries();
    const found = new Map<string, ArticleSummary>();
    for (const id of articleIds) {
      const summary = summaries.get(summaryKey(id, language));
      if (summary) {
        found.set(id, summary);
      }
    }
    return found;
  }

  async counts(): Promise<StoreCounts> {
    const records = [...(await this.loadRecords()).values()];
    return {
      articles: records.filter((stored) => stored.record.kind === 'article')
        .length,
      stats: records.filter((stored) => stored.record.kind === 'stat').length,
      summaries: (await this.loadSummaries()).size,
      reports: (await this.loadReports()).size,
    };
  }

  private async loadRecords(): Promise<Map<string, StoredRecord>> {
    if (!this.records) {
      this.recordsLoad ??= this.read<StoredRecord>('records').then(
        (stored) => new Map(stored.map((item) => [item.record.id, item])),
      );
      const loaded = await this.recordsLoad;
      this.records ??= loaded;
    }
    return this.records;
  }

  private async loadSummaries(): Promise<Map<string, ArticleSummary>> {
    if (!this.summaries) {
      this.summariesLoad ??= this.read<ArticleSummary>('summaries').then(
        (stored) =>
          new Map(
            stored.map((item) => [summaryKey(item.articleId, item.language), item]),
          ),
      );
      const loaded = await this.summariesLoad;
      this.summaries ??= loaded;
    }
    return this.summaries;
  }

  private async loadReports(): Promise<Map<string, ReportDocument>> {
    if (!this.reports) {
      this.reportsLoad ??= this.read<ReportDocument>('reports').then(
        (stored) =>
          new Map(stored.map((item) => [reportKey(item.date, item.language), item])),
      );
      const loaded = await this.reportsLoad;
      this.reports ??= loaded;
    }
    return this.reports;
  }

  private async read<T>(collection: Collection): Promise<T[]> {
    if (!this.dataDir) {
      return [];
    }
    return (
      (await readJsonFile<T[]>(path.join(this.dataDir, FILES[collection]))) ??
      []
    );
  }

  private async persist(collection: Collection, items: unknown[]): Promise<void> {
    if (!this.dataDir) {
      return;
    }
    await writeJsonAtomic(path.join(this.dataDir, FILES[collection]), items);
  }
}
