import path from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { VECTOR_INDEX_FILE } from '../config/briefing.constants';
import {
  EmbeddingEntry,
  EmbeddingMetadata,
  VectorIndex,
  VectorMatch,
} from '../types/briefing.types';
import { SerialQueue } from '../utils/concurrency.util';
import { readJsonFile, writeJsonAtomic } from '../utils/json-file.util';
import { cosineSimilarity, sameVector } from '../utils/similarity.util';

interface VectorIndexFile {
  entries: EmbeddingEntry[];
}

/**
 * Brute-force cosine index held in memory. With the file driver the entries
 * are loaded on first use and written back on flush().
 */
@Injectable()
export class VectorIndexService implements VectorIndex {
  private readonly logger = new Logger(VectorIndexService.name);
  private readonly filePath: string | null;
  private entries: Map<string, EmbeddingEntry> | null = null;
  private loading: Promise<Map<string, EmbeddingEntry>> | null = null;
  private version = 0;
  private flushedVersion = 0;
  private readonly writes = new SerialQueue();

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.filePath =
      config.storage.driver === 'file'
        ? path.join(config.storage.dataDir, VECTOR_INDEX_FILE)
        : null;
  }

  async upsert(
    id: string,
    vector: number[],
    metadata: EmbeddingMetadata,
  ): Promise<void> {
    const entries = await this.load();
    const existing = entries.get(id);
    if (
      existing &&
      existing.metadata.contentHash === metadata.contentHash &&
      sameVector(existing.vector, vector)
    ) {
      return;
    }
    entries.set(id, { id, vector: [...vector], metadata: { ...metadata } });
    this.version += 1;
  }

  async query(vector: number[], k: number): Promise<VectorMatch[]> {
    if (k <= 0) {
      return [];
    }
    const entries = await this.load();
    return [...entries.values()]
      .map((entry) => ({
        id: entry.id,
        score: cosineSimilarity(vector, entry.vector),
        metadata: { ...entry.metadata },
      }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, k);
  }

  async getMetadata(id: string): Promise<EmbeddingMetadata | null> {
    const entry = (await this.load()).get(id);
    return entry ? { ...entry.metadata } : null;
  }

  /** Writes the entries when anything changed since the last flush. */
  flush(): Promise<void> {
    return this.writes.run(async () => {
      const { entries, version } = this;
      if (!entries || version === this.flushedVersion) {
        return;
      }
      if (this.filePath) {
        const payload: VectorIndexFile = { entries: [...entries.values()] };
        await writeJsonAtomic(this.filePath, payload);
        this.logger.log(`vector index flushed: entries=${entries.size}`);
      }
      this.flushedVersion = version;
    });
  }

  async clear(): Promise<void> {
    this.entries = new Map();
    this.version += 1;
    await this.flush();
  }

  async size(): Promise<number> {
    return (await this.load()).size;
  }

  private async load(): Promise<Map<string, EmbeddingEntry>> {
    if (!this.entries) {
      this.loading ??= this.readEntries();
      const loaded = await this.loading;
      this.entries ??= loaded;
    }
    return this.entries;
  }

  private async readEntries(): Promise<Map<string, EmbeddingEntry>> {
    const stored = this.filePath
      ? await readJsonFile<VectorIndexFile>(this.filePath)
      : null;
    const entries = new Map<string, EmbeddingEntry>();
    for (const entry of stored?.entries ?? []) {
      entries.set(entry.id, entry);
    }
    return entries;
  }
}
