import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EmbeddingMetadata } from '../types/briefing.types';
import { buildConfig } from '../testing/fixtures';
import { VectorIndexService } from './vector-index.service';

function metadata(overrides: Partial<EmbeddingMetadata> = {}): EmbeddingMetadata {
  return {
    kind: 'article',
    sourceName: 'source-a',
    timestamp: '2026-03-10T18:00:00.000Z',
    title: 'Derby',
    snippet: 'Olympiacos won the derby',
    contentHash: 'hash-1',
    ...overrides,
  };
}

describe('VectorIndexService', () => {
  it('returns the k closest entries by cosine score', async () => {
    const index = new VectorIndexService(buildConfig());
    await index.upsert('a', [1, 0], metadata());
    await index.upsert('b', [0, 1], metadata());
    await index.upsert('c', [1, 1], metadata());

    const matches = await index.query([1, 0], 2);

    expect(matches.map((m) => m.id)).toEqual(['a', 'c']);
    expect(matches[0].score).toBeCloseTo(1);
    expect(matches[1].score).toBeCloseTo(Math.SQRT1_2);
  });

  it('returns nothing for a non-positive k or an empty index', async () => {
    const index = new VectorIndexService(buildConfig());

    await expect(index.query([1, 0], 3)).resolves.toEqual([]);
    await index.upsert('a', [1, 0], metadata());
    await expect(index.query([1, 0], 0)).resolves.toEqual([]);
  });

  it('replaces the entry for a re-upserted id', async () => {
    const index = new VectorIndexService(buildConfig());
    await index.upsert('a', [1, 0], metadata());
    await index.upsert('a', [0, 1], metadata({ contentHash: 'hash-2' }));

    await expect(index.size()).resolves.toBe(1);
    await expect(index.getMetadata('a')).resolves.toMatchObject({
      contentHash: 'hash-2',
    });
    await expect(index.getMetadata('missing')).resolves.toBeNull();
  });

  describe('file driver', () => {
    let dataDir: string;

    beforeEach(async () => {
      dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'vector-index-'));
    });

    afterEach(async () => {
      await fs.rm(dataDir, { recursive: true, force: true });
    });

    it('persists on flush and reloads in a new instance', async () => {
      const config = buildConfig({ STORAGE_DRIVER: 'file', DATA_DIR: dataDir });
      const index = new VectorIndexService(config);
      await index.upsert('a', [1, 0], metadata());
      await index.flush();

      const reloaded = new VectorIndexService(config);

      await expect(reloaded.size()).resolves.toBe(1);
      await expect(reloaded.getMetadata('a')).resolves.toEqual(metadata());
    });

    it('does not rewrite the file for an identical upsert', async () => {
      const config = buildConfig({ STORAGE_DRIVER: 'file', DATA_DIR: dataDir });
      const index = new VectorIndexService(config);
      await index.upsert('a', [1, 0], metadata());
      await index.flush();
      const writeSpy = jest.spyOn(fs, 'writeFile');

      await index.upsert('a', [1, 0], metadata());
      await index.flush();

      expect(writeSpy).not.toHaveBeenCalled();
      writeSpy.mockRestore();
    });

    it('keeps entries upserted by overlapping writers', async () => {
      const config = buildConfig({ STORAGE_DRIVER: 'file', DATA_DIR: dataDir });
      const index = new VectorIndexService(config);

      await Promise.all([
        index.upsert('a', [1, 0], metadata()).then(() => index.flush()),
        index
          .upsert('b', [0, 1], metadata({ contentHash: 'hash-2' }))
          .then(() => index.flush()),
      ]);

      const reloaded = new VectorIndexService(config);
      await expect(reloaded.size()).resolves.toBe(2);
    });

    it('clear empties the index on disk', async () => {
      const config = buildConfig({ STORAGE_DRIVER: 'file', DATA_DIR: dataDir });
      const index = new VectorIndexService(config);
      await index.upsert('a', [1, 0], metadata());
      await index.flush();

      await index.clear();

      await expect(new VectorIndexService(config).size()).resolves.toBe(0);
    });
  });
});
