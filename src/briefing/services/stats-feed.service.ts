import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  APP_CONFIG,
  AppConfig,
  StatsSourceConfig,
} from '../../config/app-config';
import { USER_AGENT } from '../config/briefing.constants';
import { StatRecord } from '../types/briefing.types';
import { parseDateToIso } from '../utils/date.util';
import { describeUrl, fetchText } from '../utils/http.util';
import { buildStatId } from '../utils/record.util';
import { cleanText, isPlainNumber, parseNumber } from '../utils/text.util';

const statRowSchema = z.object({
  subject: z.string().min(1),
  metric: z.string().min(1),
  value: z.union([z.number(), z.string()]),
  recordedAt: z.string().optional(),
  date: z.string().optional(),
  competition: z.string().optional(),
});

const statsPayloadSchema = z.union([
  z.array(z.unknown()),
  z.object({ stats: z.array(z.unknown()) }),
]);

@Injectable()
export class StatsFeedService {
  private readonly logger = new Logger(StatsFeedService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async fetch(
    source: StatsSourceConfig,
    signal?: AbortSignal,
  ): Promise<StatRecord[]> {
    const res = await fetchText(source.url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      timeoutMs: this.config.collect.fetchTimeoutMs,
      signal,
    });

    if (!res.ok) {
      throw new Error(
        `stats fetch failed: status=${res.status} ${res.raw.slice(0, 120)}`,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.raw);
    } catch {
      throw new Error(`stats payload is not JSON: ${describeUrl(source.url)}`);
    }

    const stats = this.parse(payload, source, new Date().toISOString());
    this.logger.log(`stats fetch done: source=${source.name} rows=${stats.length}`);
    return stats;
  }

  parse(
    payload: unknown,
    source: StatsSourceConfig,
    fetchedAt: string,
  ): StatRecord[] {
    const parsed = statsPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`stats payload has no rows: ${describeUrl(source.url)}`);
    }
    const rows = Array.isArray(parsed.data) ? parsed.data : parsed.data.stats;

    const stats: StatRecord[] = [];
    let skipped = 0;
    for (const row of rows) {
      const stat = this.toStat(row, source, fetchedAt);
      if (stat) {
        stats.push(stat);
      } else {
        skipped += 1;
      }
    }

    if (skipped > 0) {
      this.logger.warn(`stats rows skipped: source=${source.name} count=${skipped}`);
    }
    return stats;
  }

  private toStat(
    row: unknown,
    source: StatsSourceConfig,
    fetchedAt: string,
  ): StatRecord | null {
    const parsed = statRowSchema.safeParse(row);
    if (!parsed.success) {
      return null;
    }
    const value = parseNumber(parsed.data.value);
    if (value == null) {
      return null;
    }

    const recordedAt =
      parseDateToIso(parsed.data.recordedAt ?? parsed.data.date ?? '') ||
      fetchedAt;
    const raw = parsed.data.value;
    const rawValue =
      typeof raw === 'string' && !isPlainNumber(raw) ? raw.trim() : undefined;
    const competition = parsed.data.competition ?? source.competition;
    const base = {
      sourceName: source.name,
      subject: cleanText(parsed.data.subject),
      metric: cleanText(parsed.data.metric),
      recordedAt,
    };

    return {
      kind: 'stat',
      id: buildStatId(base),
      ...base,
      value,
      ...(rawValue ? { rawValue } : {}),
      ...(competition ? { competition } : {}),
    };
  }
}
