import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig, RssSourceConfig } from '../../config/app-config';
import { USER_AGENT } from '../config/briefing.constants';
import { Article } from '../types/briefing.types';
import { describeUrl, fetchText } from '../utils/http.util';
import { parseDateToIso } from '../utils/date.util';
import { buildArticleId } from '../utils/record.util';
import { cleanText, trimTitleNoise } from '../utils/text.util';

@Injectable()
export class RssFeedService {
  private readonly logger = new Logger(RssFeedService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /** Fetches one feed. HTTP and network faults throw so the caller can retry. */
  async fetch(source: RssSourceConfig, signal?: AbortSignal): Promise<Article[]> {
    const startedAt = Date.now();
    this.logger.log(
      `rss fetch start: source=${source.name} limit=${source.limit} ${describeUrl(source.url)}`,
    );

    const res = await fetchText(source.url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept:
          'application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
      },
      timeoutMs: this.config.collect.fetchTimeoutMs,
      signal,
    });

    if (!res.ok) {
      throw new Error(
        `rss fetch failed: status=${res.status} ${res.raw.slice(0, 120)}`,
      );
    }

    const articles = this.parse(res.raw, source, new Date().toISOString()).slice(
      0,
      source.limit,
    );
    this.logger.log(
      `rss fetch done: source=${source.name} items=${articles.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return articles;
  }

  parse(xml: string, source: RssSourceConfig, fetchedAt: string): Article[] {
    const items: string[] = xml.match(/<item\b[\s\S]*?<\/item>/gi) ?? [];
    return items
      .map((itemXml: string): Article => {
        const itemSource = this.extractTag(itemXml, 'source');
        const title = trimTitleNoise(
          this.extractTag(itemXml, 'title'),
          itemSource || source.name,
        );
        const link = cleanText(this.extractTag(itemXml, 'link'));
        const text =
          this.extractTag(itemXml, 'content:encoded') ||
          this.extractTag(itemXml, 'description');

        return {
          kind: 'article',
          id: buildArticleId(link, `${source.name}:${title}`),
          sourceName: source.name,
          publishedAt: this.extractPublishedAt(itemXml) || fetchedAt,
          title,
          text,
          language: source.language,
          url: link,
          ...(source.sport ? { sport: source.sport } : {}),
          ...(source.competition ? { competition: source.competition } : {}),
        };
      })
      .filter((article) => article.title && article.url);
  }

  private extractPublishedAt(itemXml: string): string {
    const tags = ['pubDate', 'published', 'updated', 'dc:date'];
    for (const tag of tags) {
      const iso = parseDateToIso(this.extractTag(itemXml, tag));
      if (iso) {
        return iso;
      }
    }
    return '';
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return cleanText(match[1]);
  }
}
