import { ReportError } from '../errors/briefing.errors';
import { buildArticle, buildConfig, buildStat } from '../testing/fixtures';
import { RecordStoreService } from './record-store.service';
import { ReportGeneratorService } from './report-generator.service';

describe('ReportGeneratorService', () => {
  const config = buildConfig();

  function createService(complete: jest.Mock) {
    const recordStore = new RecordStoreService(config);
    const service = new ReportGeneratorService(config, recordStore, {
      complete,
      completeJson: jest.fn(),
    });
    return { recordStore, service };
  }

  it('writes one report referencing every input record', async () => {
    const complete = jest.fn().mockResolvedValue('  Olympiacos won the derby [1].  ');
    const { recordStore, service } = createService(complete);
    await recordStore.upsertAll([
      buildArticle({ id: 'b', publishedAt: '2026-03-10T10:00:00.000Z' }),
      buildArticle({ id: 'a', publishedAt: '2026-03-10T19:00:00.000Z' }),
      buildArticle({ id: 'other-day', publishedAt: '2026-03-09T10:00:00.000Z' }),
      buildStat({ id: 'stat:1' }),
    ]);

    const report = await service.generate('2026-03-10', 'en');

    expect(report).toMatchObject({
      date: '2026-03-10',
      language: 'en',
      summary: 'Olympiacos won the derby [1].',
      sourceIds: ['a', 'b', 'stat:1'],
      model: 'test-model',
    });
    expect(complete).toHaveBeenCalledWith(expect.any(String), {
      model: 'test-model',
      temperature: 0.2,
      maxTokens: 1200,
      language: 'en',
    });
    await expect(recordStore.getReport('2026-03-10', 'en')).resolves.toEqual(
      report,
    );
  });

  it('orders the prompt newest article first and prefers summaries', async () => {
    const complete = jest.fn().mockResolvedValue('Report');
    const { recordStore, service } = createService(complete);
    await recordStore.upsertAll([
      buildArticle({
        id: 'old',
        title: 'Early kickoff',
        publishedAt: '2026-03-10T10:00:00.000Z',
      }),
      buildArticle({
        id: 'new',
        title: 'Late derby',
        publishedAt: '2026-03-10T19:00:00.000Z',
      }),
    ]);
    await recordStore.upsertSummaries([
      {
        articleId: 'new',
        language: 'en',
        summary: 'Derby decided late.',
        highlights: ['2-1'],
        model: 'test-model',
        createdAt: '2026-03-10T20:00:00.000Z',
      },
    ]);

    await service.generate('2026-03-10', 'en');

    const prompt: string = complete.mock.calls[0][0];
    expect(prompt.indexOf('[1] ARTICLE | source-a | 2026-03-10T19:00:00.000Z')).toBeGreaterThan(-1);
    expect(prompt.indexOf('Title: Late derby')).toBeLessThan(
      prompt.indexOf('Title: Early kickoff'),
    );
    expect(prompt).toContain('Summary: Derby decided late.\nHighlights: 2-1');
  });

  it('fails with ReportError when the day has no records', async () => {
    const complete = jest.fn();
    const { service } = createService(complete);

    await expect(service.generate('2026-03-10', 'en')).rejects.toBeInstanceOf(
      ReportError,
    );
    expect(complete).not.toHaveBeenCalled();
  });

  it('fails with ReportError and saves nothing on empty output', async () => {
    const { recordStore, service } = createService(
      jest.fn().mockResolvedValue(null),
    );
    await recordStore.upsertAll([buildArticle()]);

    await expect(service.generate('2026-03-10', 'en')).rejects.toThrow(
      'completion backend returned no report for 2026-03-10 (en)',
    );
    await expect(recordStore.listReports()).resolves.toEqual([]);
  });

  it('caps the records sent to the model', async () => {
    const complete = jest.fn().mockResolvedValue('Report');
    const cappedConfig = buildConfig({ REPORT_MAX_RECORDS: '2' });
    const recordStore = new RecordStoreService(cappedConfig);
    const service = new ReportGeneratorService(cappedConfig, recordStore, {
      complete,
      completeJson: jest.fn(),
    });
    await recordStore.upsertAll([
      buildArticle({ id: 'a', publishedAt: '2026-03-10T08:00:00.000Z' }),
      buildArticle({ id: 'b', publishedAt: '2026-03-10T09:00:00.000Z' }),
      buildStat({ id: 'stat:1' }),
    ]);

    const report = await service.generate('2026-03-10', 'en');

    expect(report.sourceIds).toEqual(['a', 'b']);
  });
});
