import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import { RECORD_STORE } from '../config/briefing.constants';
import {
  GameLine,
  MetricAverage,
  RecordStore,
  StatRecord,
  SubjectStats,
} from '../types/briefing.types';
import { slugify } from '../utils/text.util';

/** Name words that identify a subject; initials and short club suffixes are ignored. */
export function nameTokens(value: string): string[] {
  return slugify(value)
    .split('-')
    .filter((token) => token.length > 2);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Structured lookups over stored stat lines for the teams and players a
 * question names: per-metric averages and the most recent games.
 */
@Injectable()
export class StatsLookupService {
  private readonly logger = new Logger(StatsLookupService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(RECORD_STORE) private readonly recordStore: RecordStore,
  ) {}

  /** Subjects named in the question, the ones with the most stat lines first. */
  async lookup(question: string): Promise<SubjectStats[]> {
    const words = new Set(nameTokens(question));
    if (words.size === 0) {
      return [];
    }

    const bySubject = new Map<string, StatRecord[]>();
    for (const stat of await this.recordStore.listStats()) {
      const tokens = nameTokens(stat.subject);
      if (tokens.length === 0 || !tokens.every((token) => words.has(token))) {
        continue;
      }
      const key = tokens.join('-');
      const lines = bySubject.get(key);
      if (lines) {
        lines.push(stat);
      } else {
        bySubject.set(key, [stat]);
      }
    }

    const found = [...bySubject.values()]
      .sort(
        (a, b) =>
          b.length - a.length || a[0].subject.localeCompare(b[0].subject),
      )
      .slice(0, this.config.chat.statsSubjects)
      .map((lines) => this.summarize(lines));

    this.logger.debug(
      `stats lookup: subjects=${found.map((stats) => stats.subject).join(',') || '-'}`,
    );
    return found;
  }

  /** `lines` arrive newest first, as listStats returns them. */
  private summarize(lines: StatRecord[]): SubjectStats {
    const totals = new Map<string, { sum: number; games: number }>();
    for (const line of lines) {
      const total = totals.get(line.metric) ?? { sum: 0, games: 0 };
      total.sum += line.value;
      total.games += 1;
      totals.set(line.metric, total);
    }
    const averages: MetricAverage[] = [...totals.entries()]
      .map(([metric, total]) => ({
        metric,
        average: round1(total.sum / total.games),
        games: total.games,
      }))
      .sort((a, b) => a.metric.localeCompare(b.metric));

    const games = new Map<string, GameLine>();
    for (const line of lines) {
      const date = line.recordedAt.slice(0, 10);
      let game = games.get(date);
      if (!game) {
        if (games.size === this.config.chat.statsRecentGames) {
          continue;
        }
        game = {
          date,
          ...(line.competition ? { competition: line.competition } : {}),
          values: [],
        };
        games.set(date, game);
      }
      game.values.push({
        metric: line.metric,
        value: line.value,
        ...(line.rawValue ? { rawValue: line.rawValue } : {}),
      });
    }
    for (const game of games.values()) {
      game.values.sort((a, b) => a.metric.localeCompare(b.metric));
    }

    return { subject: lines[0].subject, averages, recentGames: [...games.values()] };
  }
}
