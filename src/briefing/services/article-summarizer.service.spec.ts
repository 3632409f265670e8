import { SUMMARY_CHECK_SYSTEM_PROMPT } from '../prompts/summary.prompt';
import { buildArticle, buildConfig, buildStat } from '../testing/fixtures';
import { ArticleSummarizerService } from './article-summarizer.service';
import { RecordStoreService } from './record-store.service';

describe('ArticleSummarizerService', () => {
  async function setup(completeJson: jest.Mock, config = buildConfig()) {
    const recordStore = new RecordStoreService(config);
    await recordStore.upsertAll([
      buildArticle({ id: 'a', title: 'Derby' }),
      buildArticle({ id: 'b', title: 'Transfer' }),
      buildArticle({ id: 'c', language: 'el' }),
      buildStat(),
    ]);
    const service = new ArticleSummarizerService(config, recordStore, {
      complete: jest.fn(),
      completeJson,
    });
    return { recordStore, service };
  }

  it('summarizes the day articles in the requested language', async () => {
    const completeJson = jest.fn().mockResolvedValue({
      summary: ' Olympiacos won 2-1. ',
      highlights: ['2-1', 42, '', 'late goal'],
    });
    const { recordStore, service } = await setup(completeJson);

    const result = await service.summarize('2026-03-10', 'en');

    expect(result).toEqual({
      date: '2026-03-10',
      language: 'en',
      summarized: 2,
      skipped: 0,
      failed: 0,
      corrected: 0,
    });
    const summaries = await recordStore.getSummaries(['a', 'b', 'c'], 'en');
    expect([...summaries.keys()]).toEqual(['a', 'b']);
    expect(summaries.get('a')).toMatchObject({
      summary: 'Olympiacos won 2-1.',
      highlights: ['2-1', 'late goal'],
      model: 'test-model',
    });
  });

  it('skips summarized articles unless forced', async () => {
    const completeJson = jest
      .fn()
      .mockResolvedValue({ summary: 'Done.', highlights: [] });
    const { service } = await setup(completeJson);
    await service.summarize('2026-03-10', 'en');

    await expect(service.summarize('2026-03-10', 'en')).resolves.toMatchObject({
      summarized: 0,
      skipped: 2,
    });
    await expect(
      service.summarize('2026-03-10', 'en', { force: true }),
    ).resolves.toMatchObject({ summarized: 2, skipped: 0 });
    expect(completeJson).toHaveBeenCalledTimes(4);
  });

  it('counts unusable responses as failed', async () => {
    const completeJson = jest
      .fn()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce({ summary: 'Transfer agreed.' });
    const { recordStore, service } = await setup(completeJson);

    const result = await service.summarize('2026-03-10', 'en');

    expect(result).toMatchObject({ summarized: 1, failed: 1 });
    const summaries = await recordStore.getSummaries(['a', 'b'], 'en');
    expect(summaries.get('b')?.highlights).toEqual([]);
  });

  describe('with the fact-check pass', () => {
    const verifying = buildConfig({ SUMMARY_VERIFY: 'true' });

    it('replaces a draft the check marks inaccurate', async () => {
      const completeJson = jest
        .fn()
        .mockResolvedValueOnce({ summary: 'Olympiacos won 3-1.', highlights: ['3-1'] })
        .mockResolvedValueOnce({
          accurate: false,
          reasoning: 'The score was 2-1.',
          summary: 'Olympiacos won 2-1.',
          highlights: ['2-1'],
        })
        .mockResolvedValueOnce({
          summary: 'Transfer agreed.',
          highlights: ['fee undisclosed'],
        })
        .mockResolvedValueOnce({
          accurate: true,
          reasoning: 'Supported.',
          summary: 'Something else.',
          highlights: [],
        });
      const { recordStore, service } = await setup(completeJson, verifying);

      const result = await service.summarize('2026-03-10', 'en');

      expect(result).toMatchObject({ summarized: 2, failed: 0, corrected: 1 });
      expect(completeJson.mock.calls[1][0]).toBe(SUMMARY_CHECK_SYSTEM_PROMPT);
      expect(completeJson.mock.calls[1][1]).toContain(
        'Draft summary:\nOlympiacos won 3-1.\n\nDraft highlights:\n- 3-1',
      );
      const summaries = await recordStore.getSummaries(['a', 'b'], 'en');
      expect(summaries.get('a')).toMatchObject({
        summary: 'Olympiacos won 2-1.',
        highlights: ['2-1'],
        verification: { accurate: false, reasoning: 'The score was 2-1.' },
      });
      expect(summaries.get('b')).toMatchObject({
        summary: 'Transfer agreed.',
        highlights: ['fee undisclosed'],
        verification: { accurate: true, reasoning: 'Supported.' },
      });
    });

    it('keeps the draft when the check gives no usable verdict', async () => {
      const completeJson = jest
        .fn()
        .mockResolvedValueOnce({ summary: 'Olympiacos won 2-1.', highlights: [] })
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce({ summary: 'Transfer agreed.' })
        .mockResolvedValueOnce({ accurate: false, summary: '   ' });
      const { recordStore, service } = await setup(completeJson, verifying);

      const result = await service.summarize('2026-03-10', 'en');

      expect(result).toMatchObject({ summarized: 2, corrected: 0 });
      const summaries = await recordStore.getSummaries(['a', 'b'], 'en');
      expect(summaries.get('a')?.summary).toBe('Olympiacos won 2-1.');
      expect(summaries.get('a')?.verification).toBeUndefined();
      expect(summaries.get('b')?.summary).toBe('Transfer agreed.');
      expect(summaries.get('b')?.verification).toBeUndefined();
    });
  });
});
