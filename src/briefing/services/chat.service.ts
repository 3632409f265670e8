import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  CHAT_CONTEXT_CHARS_PER_SOURCE,
  COMPLETION_BACKEND,
  EMBEDDING_BACKEND,
  NO_INFORMATION_ANSWER,
  RECORD_STORE,
  VECTOR_INDEX,
} from '../config/briefing.constants';
import { ChatError } from '../errors/briefing.errors';
import {
  buildChatPrompt,
  buildQueryRefinePrompt,
  ChatContextEntry,
  formatSubjectStats,
} from '../prompts/chat.prompt';
import {
  ChatAnswer,
  ChatTurn,
  CompletionBackend,
  EmbeddingBackend,
  RecordStore,
  SubjectStats,
  VectorIndex,
  VectorMatch,
} from '../types/briefing.types';
import { recordText } from '../utils/record.util';
import { cleanMultiline, cleanText, truncate } from '../utils/text.util';
import { StatsLookupService } from './stats-lookup.service';

export interface ChatDependencies {
  config: AppConfig;
  vectorIndex: VectorIndex;
  recordStore: RecordStore;
  completionBackend: CompletionBackend;
  embeddingBackend: EmbeddingBackend;
  statsLookup: StatsLookupService;
}

/**
 * Retrieval-grounded Q&A over indexed records plus stat lookups for the
 * subjects a question names. The only state is the rolling window of recent
 * turns, capped at chat.windowTurns messages.
 */
export class ChatSession {
  private readonly logger = new Logger(ChatSession.name);
  private readonly turns: ChatTurn[] = [];

  constructor(
    readonly id: string,
    private readonly deps: ChatDependencies,
  ) {}

  get history(): readonly ChatTurn[] {
    return [...this.turns];
  }

  async ask(question: string): Promise<ChatAnswer> {
    const cleaned = cleanText(question);
    if (!cleaned) {
      throw new ChatError('question is empty', 'empty_question');
    }

    const { config, vectorIndex, embeddingBackend, statsLookup } = this.deps;
    const query = config.chat.refineQuery
      ? await this.refineQuery(cleaned)
      : cleaned;
    const vector = await embeddingBackend.embed(query);
    if (!vector) {
      throw new ChatError(
        'embedding backend unavailable',
        'embedding_unavailable',
      );
    }

    const matches = (await vectorIndex.query(vector, config.chat.topK)).filter(
      (match) => match.score >= config.chat.minScore,
    );
    const stats = config.chat.statsLookup
      ? await statsLookup.lookup(cleaned)
      : [];
    this.logger.log(
      `chat retrieve: session=${this.id} hits=${matches.length} topK=${config.chat.topK} stats=${stats.length}`,
    );
    if (matches.length === 0 && stats.length === 0) {
      return {
        answer: NO_INFORMATION_ANSWER,
        sources: [],
        statSubjects: [],
        grounded: false,
      };
    }

    const prompt = buildChatPrompt(
      cleaned,
      [
        ...(await this.buildContext(matches)),
        ...stats.map((item) => this.statsContext(item)),
      ],
      this.turns,
    );
    const output = await this.deps.completionBackend.complete(prompt, {
      language: config.defaultLanguage,
    });
    const answer = cleanMultiline(output ?? '');
    if (!answer) {
      throw new ChatError(
        'completion backend unavailable',
        'completion_unavailable',
      );
    }

    this.remember(cleaned, answer);

    return {
      answer,
      sources: matches.map((match) => ({
        id: match.id,
        title: match.metadata.title,
        sourceName: match.metadata.sourceName,
        score: match.score,
      })),
      statSubjects: stats.map((item) => item.subject),
      grounded: true,
    };
  }

  reset(): void {
    this.turns.length = 0;
  }

  private async buildContext(matches: VectorMatch[]): Promise<ChatContextEntry[]> {
    const records = await this.deps.recordStore.getMany(
      matches.map((match) => match.id),
    );
    const byId = new Map(records.map((record) => [record.id, record]));

    return matches.map((match) => {
      const record = byId.get(match.id);
      const body = record ? cleanText(recordText(record)) : match.metadata.snippet;
      return {
        title: match.metadata.title,
        sourceName: match.metadata.sourceName,
        timestamp: match.metadata.timestamp,
        body: truncate(body, CHAT_CONTEXT_CHARS_PER_SOURCE),
      };
    });
  }

  /** Evicts whole question/answer pairs so the window never opens on an answer. */
  /** Falls back to the question itself when the backend gives nothing usable. */
  private async refineQuery(question: string): Promise<string> {
    const output = await this.deps.completionBackend.complete(
      buildQueryRefinePrompt(question),
      { language: this.deps.config.defaultLanguage, temperature: 0 },
    );
    const firstLine = (output ?? '').split('\n').find((line) => line.trim());
    const refined = cleanText(firstLine ?? '').replace(/^["'`]+|["'`]+$/g, '');
    if (!refined) {
      this.logger.warn(`query refine unusable: session=${this.id}`);
      return question;
    }
    this.logger.debug(`query refined: session=${this.id} query=${refined}`);
    return refined;
  }

  private statsContext(stats: SubjectStats): ChatContextEntry {
    return {
      title: `${stats.subject} stats`,
      sourceName: 'stats',
      timestamp: stats.recentGames[0]?.date ?? '',
      body: formatSubjectStats(stats),
    };
  }

  private remember(question: string, answer: string): void {
    this.turns.push(
      { role: 'user', content: question },
      { role: 'assistant', content: answer },
    );
    while (this.turns.length > this.deps.config.chat.windowTurns) {
      this.turns.splice(0, 2);
    }
  }
}

/** Sessions by id for the HTTP surface; the oldest is dropped past maxSessions. */
@Injectable()
export class ChatService {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly deps: ChatDependencies;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    @Inject(VECTOR_INDEX) vectorIndex: VectorIndex,
    @Inject(RECORD_STORE) recordStore: RecordStore,
    @Inject(COMPLETION_BACKEND) completionBackend: CompletionBackend,
    @Inject(EMBEDDING_BACKEND) embeddingBackend: EmbeddingBackend,
    statsLookup: StatsLookupService,
  ) {
    this.deps = {
      config,
      vectorIndex,
      recordStore,
      completionBackend,
      embeddingBackend,
      statsLookup,
    };
  }

  createSession(id: string = randomUUID()): ChatSession {
    return new ChatSession(id, this.deps);
  }

  getOrCreate(id?: string): ChatSession {
    const existing = id ? this.sessions.get(id) : undefined;
    if (existing) {
      return existing;
    }
    const session = this.createSession(id || randomUUID());
    this.sessions.set(session.id, session);
    while (this.sessions.size > this.deps.config.chat.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
    }
    return session;
  }

  reset(id: string): boolean {
    const session = this.sessions.get(id);
    session?.reset();
    return Boolean(session);
  }
}
