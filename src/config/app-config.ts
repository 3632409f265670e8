import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import { ConfigError } from '../briefing/errors/briefing.errors';

export const APP_CONFIG = Symbol('APP_CONFIG');

const rssSourceSchema = z.object({
  kind: z.literal('rss'),
  name: z.string().min(1),
  url: z.string().url(),
  limit: z.coerce.number().int().positive().default(20),
  language: z.string().min(2).default('en'),
  sport: z.string().optional(),
  competition: z.string().optional(),
});

const statsSourceSchema = z.object({
  kind: z.literal('stats'),
  name: z.string().min(1),
  url: z.string().url(),
  competition: z.string().optional(),
});

export const sourceSchema = z.discriminatedUnion('kind', [
  rssSourceSchema,
  statsSourceSchema,
]);

const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

/** `true`/`false`/`1`/`0` env switch; z.coerce.boolean would read "false" as true. */
function flagSchema(fallback: boolean) {
  return z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');
}

export const configSchema = z.object({
  nodeEnv: z.enum(['development', 'test', 'production']).default('development'),
  logLevel: z.enum(LOG_LEVELS).default('log'),
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535).default(3000),
  }),
  defaultLanguage: z.string().trim().toLowerCase().min(2).default('en'),
  timezoneOffsetHours: z.coerce.number().min(-12).max(14).default(0),
  storage: z.object({
    driver: z.enum(['file', 'memory']).default('file'),
    dataDir: z.string().min(1),
  }),
  sources: z
    .array(sourceSchema)
    .min(1, 'at least one source must be configured')
    .refine(
      (sources) => new Set(sources.map((s) => s.name)).size === sources.length,
      'source names must be unique',
    ),
  collect: z.object({
    concurrency: z.coerce.number().int().min(1).max(8).default(4),
    maxRetries: z.coerce.number().int().min(0).max(5).default(2),
    retryBackoffMs: z.coerce.number().int().min(0).default(1000),
    fetchTimeoutMs: z.coerce.number().int().positive().default(12_000),
  }),
  pipeline: z.object({
    persistBatchSize: z.coerce.number().int().positive().default(200),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'ollama']).default('ollama'),
    baseUrl: z.string().url(),
    apiKey: z.string().optional(),
    model: z.string().min(1).default('llama3.1:8b'),
    embeddingModel: z.string().min(1).default('nomic-embed-text'),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
    maxTokens: z.coerce.number().int().positive().default(1200),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
    maxRetries: z.coerce.number().int().min(0).max(5).default(2),
    retryBackoffMs: z.coerce.number().int().min(0).default(1500),
    embedMaxChars: z.coerce.number().int().positive().default(8000),
  }),
  summarize: z.object({
    verify: flagSchema(true),
  }),
  report: z.object({
    maxRecords: z.coerce.number().int().positive().default(60),
    maxCharsPerRecord: z.coerce.number().int().positive().default(600),
  }),
  chat: z.object({
    topK: z.coerce.number().int().min(1).max(20).default(4),
    windowTurns: z.coerce.number().int().min(0).max(50).default(6),
    minScore: z.coerce.number().min(-1).max(1).default(0.2),
    maxSessions: z.coerce.number().int().positive().default(20),
    refineQuery: flagSchema(false),
    statsLookup: flagSchema(true),
    statsSubjects: z.coerce.number().int().min(1).max(10).default(3),
    statsRecentGames: z.coerce.number().int().min(1).max(20).default(5),
  }),
});

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type AppConfig = DeepReadonly<z.infer<typeof configSchema>>;
export type SourceConfig = AppConfig['sources'][number];
export type RssSourceConfig = Extract<SourceConfig, { kind: 'rss' }>;
export type StatsSourceConfig = Extract<SourceConfig, { kind: 'stats' }>;

const DEFAULT_BASE_URLS = {
  openai: 'https://api.openai.com/v1',
  ollama: 'http://localhost:11434',
} as const;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Source list to use instead of reading SOURCES_FILE. */
  sources?: unknown;
  readFile?: (filePath: string) => string;
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const provider = env.LLM_PROVIDER === 'openai' ? 'openai' : 'ollama';

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    server: { port: env.PORT },
    defaultLanguage: env.APP_LANGUAGE,
    timezoneOffsetHours: env.TZ_OFFSET_HOURS,
    storage: {
      driver: env.STORAGE_DRIVER,
      dataDir: path.resolve(cwd, env.DATA_DIR ?? 'data'),
    },
    sources: options.sources ?? readSources(env, cwd, options.readFile),
    collect: {
      concurrency: env.COLLECT_CONCURRENCY,
      maxRetries: env.COLLECT_MAX_RETRIES,
      retryBackoffMs: env.COLLECT_RETRY_BACKOFF_MS,
      fetchTimeoutMs: env.COLLECT_FETCH_TIMEOUT_MS,
    },
    pipeline: { persistBatchSize: env.PERSIST_BATCH_SIZE },
    llm: {
      provider: env.LLM_PROVIDER,
      baseUrl: (env.LLM_BASE_URL || DEFAULT_BASE_URLS[provider]).replace(
        /\/+$/,
        '',
      ),
      apiKey: env.LLM_API_KEY?.trim() || undefined,
      model: env.LLM_MODEL,
      embeddingModel: env.LLM_EMBEDDING_MODEL,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxRetries: env.LLM_MAX_RETRIES,
      retryBackoffMs: env.LLM_RETRY_BACKOFF_MS,
      embedMaxChars: env.LLM_EMBED_MAX_CHARS,
    },
    summarize: { verify: env.SUMMARY_VERIFY },
    report: {
      maxRecords: env.REPORT_MAX_RECORDS,
      maxCharsPerRecord: env.REPORT_MAX_CHARS_PER_RECORD,
    },
    chat: {
      topK: env.CHAT_TOP_K,
      windowTurns: env.CHAT_WINDOW_TURNS,
      minScore: env.CHAT_MIN_SCORE,
      maxSessions: env.CHAT_MAX_SESSIONS,
      refineQuery: env.CHAT_REFINE_QUERY,
      statsLookup: env.CHAT_STATS_LOOKUP,
      statsSubjects: env.CHAT_STATS_SUBJECTS,
      statsRecentGames: env.CHAT_STATS_RECENT_GAMES,
    },
  });

  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigError(`Invalid configuration: ${formattedErrors}`);
  }

  deepFreeze(result.data);
  return result.data;
}

export function resolveLogLevels(level: AppConfig['logLevel']): LogLevel[] {
  return [...LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1)];
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    llm: { ...config.llm, apiKey: config.llm.apiKey ? '***' : undefined },
  };
}

function readSources(
  env: NodeJS.ProcessEnv,
  cwd: string,
  readFile: (filePath: string) => string = (filePath) =>
    readFileSync(filePath, 'utf-8'),
): unknown {
  const filePath = path.resolve(
    cwd,
    env.SOURCES_FILE ?? path.join('config', 'sources.json'),
  );
  let raw: string;
  try {
    raw = readFile(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`sources file unreadable: ${filePath} (${message})`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigError(`sources file is not valid JSON: ${filePath}`);
  }
}

function deepFreeze(value: unknown): void {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
}
