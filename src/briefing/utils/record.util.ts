import { createHash } from 'node:crypto';
import { EMBEDDING_SNIPPET_CHARS } from '../config/briefing.constants';
import {
  ContentRecord,
  EmbeddingMetadata,
  StatRecord,
} from '../types/briefing.types';
import { cleanText, slugify, truncate } from './text.util';

const TRACKING_PARAM_RE = /^(utm_|fbclid$|gclid$|at_)/i;

export function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/** Canonical article identifier: the URL without fragment or tracking params. */
export function buildArticleId(url: string, fallback: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    for (const key of [...parsed.searchParams.keys()]) {
      if (TRACKING_PARAM_RE.test(key)) {
        parsed.searchParams.delete(key);
      }
    }
    return parsed.toString();
  } catch {
    return `article:${sha256(fallback).slice(0, 24)}`;
  }
}

export function buildStatId(
  stat: Pick<StatRecord, 'sourceName' | 'subject' | 'metric' | 'recordedAt'>,
): string {
  return [
    'stat',
    slugify(stat.sourceName),
    slugify(stat.subject),
    slugify(stat.metric),
    stat.recordedAt.slice(0, 10),
  ].join(':');
}

export function recordTimestamp(record: ContentRecord): string {
  return record.kind === 'article' ? record.publishedAt : record.recordedAt;
}

export function recordTitle(record: ContentRecord): string {
  return record.kind === 'article'
    ? record.title
    : `${record.subject} · ${record.metric}`;
}

/** The text that gets embedded and shown as context. */
export function recordText(record: ContentRecord): string {
  if (record.kind === 'article') {
    return `${record.title}\n\n${record.text}`.trim();
  }
  const competition = record.competition ? ` ${record.competition}` : '';
  return `${record.subject} ${record.metric}: ${record.rawValue ?? record.value} (${record.sourceName}${competition}, ${record.recordedAt.slice(0, 10)})`;
}

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function contentHash(record: ContentRecord): string {
  return sha256(stableStringify(record));
}

export function buildEmbeddingMetadata(
  record: ContentRecord,
  hash = contentHash(record),
): EmbeddingMetadata {
  const body = record.kind === 'article' ? record.text : recordText(record);
  return {
    kind: record.kind,
    sourceName: record.sourceName,
    timestamp: recordTimestamp(record),
    title: recordTitle(record),
    snippet: truncate(cleanText(body), EMBEDDING_SNIPPET_CHARS),
    contentHash: hash,
  };
}
