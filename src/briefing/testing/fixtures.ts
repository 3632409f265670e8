import { AppConfig, loadConfig } from '../../config/app-config';
import { Article, StatRecord } from '../types/briefing.types';

const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: 'test',
  STORAGE_DRIVER: 'memory',
  DATA_DIR: '/tmp/sports-briefing-test',
  LLM_PROVIDER: 'openai',
  LLM_BASE_URL: 'http://llm.test/v1',
  LLM_API_KEY: 'test-key',
  LLM_MODEL: 'test-model',
  LLM_EMBEDDING_MODEL: 'test-embedding',
  LLM_MAX_RETRIES: '0',
  LLM_RETRY_BACKOFF_MS: '0',
  COLLECT_RETRY_BACKOFF_MS: '0',
  SUMMARY_VERIFY: 'false',
};

export const TEST_SOURCES = [
  {
    kind: 'rss',
    name: 'source-a',
    url: 'https://a.example.com/rss.xml',
    limit: 10,
    language: 'en',
  },
  {
    kind: 'rss',
    name: 'source-b',
    url: 'https://b.example.com/rss.xml',
    limit: 10,
    language: 'en',
  },
];

export function buildConfig(
  env: NodeJS.ProcessEnv = {},
  sources: unknown = TEST_SOURCES,
): AppConfig {
  return loadConfig({ env: { ...TEST_ENV, ...env }, sources });
}

export function buildArticle(overrides: Partial<Article> = {}): Article {
  return {
    kind: 'article',
    id: 'https://a.example.com/news/1',
    sourceName: 'source-a',
    publishedAt: '2026-03-10T18:00:00.000Z',
    title: 'Olympiacos beat Panathinaikos',
    text: 'Olympiacos won the derby 2-1 with a late goal.',
    language: 'en',
    url: 'https://a.example.com/news/1',
    ...overrides,
  };
}

export function buildStat(overrides: Partial<StatRecord> = {}): StatRecord {
  return {
    kind: 'stat',
    id: 'stat:league:olympiacos:goals:2026-03-10',
    sourceName: 'league',
    subject: 'Olympiacos',
    metric: 'Goals',
    value: 2,
    recordedAt: '2026-03-10T20:00:00.000Z',
    ...overrides,
  };
}

export const KEYWORD_DIMENSIONS = [
  'match',
  'won',
  'transfer',
  'injury',
  'basketball',
] as const;

/** Deterministic stand-in embedding: one dimension per keyword present. */
export function keywordEmbedding(text: string): number[] {
  const lowered = text.toLowerCase();
  return KEYWORD_DIMENSIONS.map((keyword) => (lowered.includes(keyword) ? 1 : 0));
}
