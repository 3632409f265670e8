import { buildConfig, buildStat } from '../testing/fixtures';
import { RecordStoreService } from './record-store.service';
import { nameTokens, StatsLookupService } from './stats-lookup.service';

describe('StatsLookupService', () => {
  async function setup(env: NodeJS.ProcessEnv = {}) {
    const config = buildConfig(env);
    const recordStore = new RecordStoreService(config);
    await recordStore.upsertAll([
      buildStat({ id: 's1', subject: 'Sloukas K.', metric: 'Points', value: 14 }),
      buildStat({
        id: 's2',
        subject: 'Sloukas K.',
        metric: 'Free throws',
        value: 89,
        rawValue: '17/19 (89%)',
      }),
      buildStat({
        id: 's3',
        subject: 'Sloukas K.',
        metric: 'Points',
        value: 9,
        recordedAt: '2026-03-06T20:00:00.000Z',
      }),
      buildStat({
        id: 's4',
        subject: 'Sloukas K.',
        metric: 'Points',
        value: 20,
        recordedAt: '2026-02-27T20:00:00.000Z',
      }),
      buildStat({ id: 's5', subject: 'PAOK', value: 1 }),
      buildStat({ id: 's6', subject: 'Ολυμπιακός', value: 2 }),
    ]);
    return new StatsLookupService(config, recordStore);
  }

  it('averages each metric and lists the latest games for a named player', async () => {
    const service = await setup();

    const [stats, ...rest] = await service.lookup('How has Sloukas played lately?');

    expect(rest).toEqual([]);
    expect(stats.subject).toBe('Sloukas K.');
    expect(stats.averages).toEqual([
      { metric: 'Free throws', average: 89, games: 1 },
      { metric: 'Points', average: 14.3, games: 3 },
    ]);
    expect(stats.recentGames).toEqual([
      {
        date: '2026-03-10',
        values: [
          { metric: 'Free throws', value: 89, rawValue: '17/19 (89%)' },
          { metric: 'Points', value: 14 },
        ],
      },
      { date: '2026-03-06', values: [{ metric: 'Points', value: 9 }] },
      { date: '2026-02-27', values: [{ metric: 'Points', value: 20 }] },
    ]);
  });

  it('caps the number of subjects and recent games', async () => {
    const service = await setup({
      CHAT_STATS_SUBJECTS: '1',
      CHAT_STATS_RECENT_GAMES: '1',
    });

    const found = await service.lookup('Sloukas or PAOK, who scored more?');

    expect(found.map((stats) => stats.subject)).toEqual(['Sloukas K.']);
    expect(found[0].recentGames.map((game) => game.date)).toEqual(['2026-03-10']);
    expect(found[0].averages).toContainEqual({
      metric: 'Points',
      average: 14.3,
      games: 3,
    });
  });

  it('matches names written without accents in the question', async () => {
    const service = await setup();

    const found = await service.lookup('Πώς τα πήγε ο Ολυμπιακός;');

    expect(found.map((stats) => stats.subject)).toEqual(['Ολυμπιακός']);
  });

  it('finds nothing when no stored subject is named', async () => {
    const service = await setup();

    await expect(service.lookup('who won the derby?')).resolves.toEqual([]);
    await expect(service.lookup('?!')).resolves.toEqual([]);
  });
});

describe('nameTokens', () => {
  it('drops initials and short words', () => {
    expect(nameTokens('Sloukas K.')).toEqual(['sloukas']);
    expect(nameTokens('Olympiacos FC')).toEqual(['olympiacos']);
    expect(nameTokens('Gilgeous-Alexander S.')).toEqual(['gilgeous', 'alexander']);
  });
});
