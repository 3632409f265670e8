import { NO_INFORMATION_ANSWER } from '../config/briefing.constants';
import { ChatError } from '../errors/briefing.errors';
import { ContentRecord } from '../types/briefing.types';
import {
  buildArticle,
  buildConfig,
  buildStat,
  keywordEmbedding,
} from '../testing/fixtures';
import { buildEmbeddingMetadata, recordText } from '../utils/record.util';
import { ChatService } from './chat.service';
import { RecordStoreService } from './record-store.service';
import { StatsLookupService } from './stats-lookup.service';
import { VectorIndexService } from './vector-index.service';

const DERBY = buildArticle({
  id: 'https://a.example.com/news/derby',
  text: 'Olympiacos won the derby match 2-1.',
});
const TRANSFER = buildArticle({
  id: 'https://b.example.com/news/transfer',
  sourceName: 'source-b',
  title: 'Striker signs',
  text: 'The transfer fee was not disclosed.',
});

describe('ChatService', () => {
  async function setup(options: {
    env?: NodeJS.ProcessEnv;
    records?: ContentRecord[];
    complete?: jest.Mock;
    embed?: jest.Mock;
  } = {}) {
    const config = buildConfig(options.env);
    const vectorIndex = new VectorIndexService(config);
    const recordStore = new RecordStoreService(config);
    const records = options.records ?? [];
    await recordStore.upsertAll(records);
    for (const record of records) {
      await vectorIndex.upsert(
        record.id,
        keywordEmbedding(recordText(record)),
        buildEmbeddingMetadata(record),
      );
    }
    const complete =
      options.complete ?? jest.fn().mockResolvedValue('Olympiacos won 2-1 [1].');
    const embed =
      options.embed ??
      jest.fn().mockImplementation(async (text: string) => keywordEmbedding(text));
    const service = new ChatService(
      config,
      vectorIndex,
      recordStore,
      { complete, completeJson: jest.fn() },
      { embed },
      new StatsLookupService(config, recordStore),
    );
    return { service, complete, embed };
  }

  it('answers from the relevant indexed entry', async () => {
    const { service, complete } = await setup({ records: [DERBY, TRANSFER] });

    const answer = await service
      .createSession()
      .ask("who won yesterday's match?");

    expect(answer.answer).toBe('Olympiacos won 2-1 [1].');
    expect(answer.grounded).toBe(true);
    expect(answer.sources).toHaveLength(1);
    expect(answer.sources[0]).toMatchObject({
      id: DERBY.id,
      title: 'Olympiacos beat Panathinaikos',
      sourceName: 'source-a',
    });
    expect(answer.sources[0].score).toBeCloseTo(1);
    const prompt: string = complete.mock.calls[0][0];
    expect(prompt).toContain('Olympiacos won the derby match 2-1.');
    expect(prompt).not.toContain('transfer fee');
  });

  it('returns the no-information answer for an empty index', async () => {
    const { service, complete } = await setup();

    const answer = await service
      .createSession()
      .ask("who won yesterday's match?");

    expect(answer).toEqual({
      answer: NO_INFORMATION_ANSWER,
      sources: [],
      statSubjects: [],
      grounded: false,
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('feeds earlier turns back and evicts the oldest beyond the window', async () => {
    const complete = jest
      .fn()
      .mockResolvedValueOnce('First answer.')
      .mockResolvedValueOnce('Second answer.');
    const { service } = await setup({
      env: { CHAT_WINDOW_TURNS: '2' },
      records: [DERBY],
      complete,
    });
    const session = service.createSession();

    await session.ask('who won the match?');
    await session.ask('and the match score?');

    expect(complete.mock.calls[1][0]).toContain(
      'User: who won the match?\nAssistant: First answer.',
    );
    expect(session.history).toEqual([
      { role: 'user', content: 'and the match score?' },
      { role: 'assistant', content: 'Second answer.' },
    ]);

    session.reset();
    expect(session.history).toEqual([]);
  });

  it('drops whole question and answer pairs with an odd window', async () => {
    const complete = jest
      .fn()
      .mockResolvedValueOnce('First answer.')
      .mockResolvedValueOnce('Second answer.');
    const { service } = await setup({
      env: { CHAT_WINDOW_TURNS: '3' },
      records: [DERBY],
      complete,
    });
    const session = service.createSession();

    await session.ask('who won the match?');
    await session.ask('and the match score?');

    expect(session.history).toEqual([
      { role: 'user', content: 'and the match score?' },
      { role: 'assistant', content: 'Second answer.' },
    ]);
  });

  it('searches with the refined query and answers the question as asked', async () => {
    const complete = jest
      .fn()
      .mockResolvedValueOnce('"striker transfer"\nKeeps the key words.')
      .mockResolvedValueOnce('The fee was not disclosed [1].');
    const { service, embed } = await setup({
      env: { CHAT_REFINE_QUERY: 'true' },
      records: [DERBY, TRANSFER],
      complete,
    });

    const answer = await service
      .createSession()
      .ask('tell me about the new signing');

    expect(embed).toHaveBeenCalledWith('striker transfer');
    expect(complete.mock.calls[0][0]).toContain(
      'Question: tell me about the new signing',
    );
    expect(complete.mock.calls[1][0]).toContain(
      'Question: tell me about the new signing',
    );
    expect(answer.sources.map((source) => source.id)).toEqual([TRANSFER.id]);
  });

  it('searches with the question itself when refinement gives nothing', async () => {
    const complete = jest
      .fn()
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce('Olympiacos won 2-1 [1].');
    const { service, embed } = await setup({
      env: { CHAT_REFINE_QUERY: 'true' },
      records: [DERBY],
      complete,
    });

    const answer = await service.createSession().ask('who won the match?');

    expect(embed).toHaveBeenCalledWith('who won the match?');
    expect(answer.grounded).toBe(true);
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('answers from stat lookups for a named team without index hits', async () => {
    const complete = jest.fn().mockResolvedValue('Olympiacos average 2.5 goals [1].');
    const { service } = await setup({
      records: [
        buildStat({ id: 's1', competition: 'Super League' }),
        buildStat({
          id: 's2',
          metric: 'Shots',
          value: 12,
          competition: 'Super League',
        }),
        buildStat({ id: 's3', value: 3, recordedAt: '2026-03-03T20:00:00.000Z' }),
        buildStat({ id: 's4', subject: 'PAOK', value: 1 }),
      ],
      complete,
    });

    const answer = await service
      .createSession()
      .ask('How many goals does Olympiacos average?');

    expect(answer).toEqual({
      answer: 'Olympiacos average 2.5 goals [1].',
      sources: [],
      statSubjects: ['Olympiacos'],
      grounded: true,
    });
    expect(complete.mock.calls[0][0]).toContain(
      [
        '[1] Olympiacos stats (stats, 2026-03-10)',
        'Averages: Goals 2.5 over 2 games; Shots 12 over 1 game',
        'Recent games:',
        '2026-03-10 (Super League): Goals 2, Shots 12',
        '2026-03-03: Goals 3',
      ].join('\n'),
    );
  });

  it('skips stat lookups when they are switched off', async () => {
    const { service, complete } = await setup({
      env: { CHAT_STATS_LOOKUP: 'false' },
      records: [buildStat()],
    });

    const answer = await service
      .createSession()
      .ask('How many goals does Olympiacos average?');

    expect(answer.answer).toBe(NO_INFORMATION_ANSWER);
    expect(complete).not.toHaveBeenCalled();
  });

  it('rejects an empty question', async () => {
    const { service } = await setup();

    await expect(service.createSession().ask('   ')).rejects.toMatchObject({
      reason: 'empty_question',
    });
  });

  it('fails with ChatError when a backend is unavailable', async () => {
    const noEmbedding = await setup({ embed: jest.fn().mockResolvedValue(null) });
    const noCompletion = await setup({
      records: [DERBY],
      complete: jest.fn().mockResolvedValue(null),
    });

    const embedFailure = await noEmbedding.service
      .createSession()
      .ask('who won the match?')
      .catch((e: unknown) => e);
    const completeFailure = await noCompletion.service
      .createSession()
      .ask('who won the match?')
      .catch((e: unknown) => e);

    expect(embedFailure).toBeInstanceOf(ChatError);
    expect(embedFailure).toMatchObject({ reason: 'embedding_unavailable' });
    expect(completeFailure).toMatchObject({ reason: 'completion_unavailable' });
  });

  it('keeps sessions by id and drops the oldest past the limit', async () => {
    const { service } = await setup({ env: { CHAT_MAX_SESSIONS: '2' } });

    const first = service.getOrCreate('s-1');
    expect(service.getOrCreate('s-1')).toBe(first);
    service.getOrCreate('s-2');
    service.getOrCreate('s-3');

    expect(service.getOrCreate('s-1')).not.toBe(first);
    expect(service.reset('missing')).toBe(false);
  });
});
