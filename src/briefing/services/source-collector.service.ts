import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig, SourceConfig } from '../../config/app-config';
import { CollectionError } from '../errors/briefing.errors';
import {
  CollectionResult,
  ContentRecord,
  SourceCollector,
  SourceFailure,
} from '../types/briefing.types';
import { mapWithConcurrency, sleep } from '../utils/concurrency.util';
import { RssFeedService } from './rss-feed.service';
import { StatsFeedService } from './stats-feed.service';

class SourceFetchError extends Error {
  constructor(
    readonly source: string,
    readonly attempts: number,
    options: { cause: unknown },
  ) {
    super(
      options.cause instanceof Error
        ? options.cause.message
        : String(options.cause),
      options,
    );
  }
}

@Injectable()
export class SourceCollectorService implements SourceCollector {
  private readonly logger = new Logger(SourceCollectorService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly rssFeedService: RssFeedService,
    private readonly statsFeedService: StatsFeedService,
  ) {}

  async fetchAll(signal?: AbortSignal): Promise<CollectionResult> {
    const { sources } = this.config;
    const startedAt = Date.now();
    const settled = await mapWithConcurrency(
      sources,
      this.config.collect.concurrency,
      (source) => this.fetchWithRetry(source, signal),
    );

    const records: ContentRecord[] = [];
    const seen = new Set<string>();
    const failures: SourceFailure[] = [];

    settled.forEach((result, index) => {
      if (!result.ok) {
        const { error } = result;
        failures.push({
          source: sources[index].name,
          attempts: error instanceof SourceFetchError ? error.attempts : 1,
          message: error.message,
        });
        return;
      }
      for (const record of result.value) {
        if (seen.has(record.id)) {
          continue;
        }
        seen.add(record.id);
        records.push(record);
      }
    });

    this.logger.log(
      `collect done: sources=${sources.length} failed=${failures.length} records=${records.length} elapsedMs=${Date.now() - startedAt}`,
    );

    if (failures.length === sources.length) {
      throw new CollectionError(
        `all ${sources.length} sources failed: ${failures
          .map((failure) => `${failure.source} (${failure.message})`)
          .join('; ')}`,
        failures,
      );
    }

    return { records, failures, sourcesAttempted: sources.length };
  }

  private async fetchWithRetry(
    source: SourceConfig,
    signal?: AbortSignal,
  ): Promise<ContentRecord[]> {
    const { maxRetries, retryBackoffMs } = this.config.collect;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries + 1; attempt += 1) {
      try {
        return await this.fetchSource(source, signal);
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `source fetch failed: source=${source.name} attempt=${attempt}/${maxRetries + 1} ${message}`,
        );
        if (signal?.aborted) {
          throw new SourceFetchError(source.name, attempt, { cause: error });
        }
        if (attempt <= maxRetries) {
          await sleep(retryBackoffMs * 2 ** (attempt - 1));
        }
      }
    }

    throw new SourceFetchError(source.name, maxRetries + 1, {
      cause: lastError,
    });
  }

  private fetchSource(
    source: SourceConfig,
    signal?: AbortSignal,
  ): Promise<ContentRecord[]> {
    switch (source.kind) {
      case 'rss':
        return this.rssFeedService.fetch(source, signal);
      case 'stats':
        return this.statsFeedService.fetch(source, signal);
    }
  }
}
