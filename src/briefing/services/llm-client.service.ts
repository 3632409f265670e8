import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app-config';
import {
  CompletionBackend,
  CompletionOptions,
  EmbeddingBackend,
} from '../types/briefing.types';
import { fetchText } from '../utils/http.util';
import { sleep } from '../utils/concurrency.util';
import { cleanText, stripThinkSection } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([0, 429, 500, 502, 503, 504]);

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface JsonResponse {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

@Injectable()
export class LlmClientService implements CompletionBackend, EmbeddingBackend {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async complete(
    prompt: string,
    options: Partial<CompletionOptions> = {},
  ): Promise<string | null> {
    const resolved: CompletionOptions = {
      model: options.model ?? this.config.llm.model,
      temperature: options.temperature ?? this.config.llm.temperature,
      maxTokens: options.maxTokens ?? this.config.llm.maxTokens,
      language: options.language ?? this.config.defaultLanguage,
    };
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: `Write your entire answer in the language with code "${resolved.language}".`,
      },
      { role: 'user', content: prompt },
    ];

    const text = await this.chat(messages, resolved, false);
    const cleaned = stripThinkSection(text ?? '');
    return cleaned || null;
  }

  async completeJson(
    systemPrompt: string,
    userPrompt: string,
  ): Promise<Record<string, unknown> | null> {
    const options: CompletionOptions = {
      model: this.config.llm.model,
      temperature: this.config.llm.temperature,
      maxTokens: this.config.llm.maxTokens,
      language: this.config.defaultLanguage,
    };
    const messages: ChatMessage[] = [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userPrompt },
    ];

    for (let attempt = 1; attempt <= this.config.llm.maxRetries + 1; attempt += 1) {
      const text = await this.chat(messages, options, true);
      if (text == null) {
        return null;
      }
      const parsed = this.parseJsonObject(stripThinkSection(text));
      if (parsed) {
        return parsed;
      }
      if (attempt <= this.config.llm.maxRetries) {
        await sleep(this.backoffMs(attempt));
      }
    }

    this.logUnavailable('json_parse_failed');
    return null;
  }

  async embed(text: string): Promise<number[] | null> {
    const cleaned = cleanText(text || '');
    if (!cleaned) {
      return null;
    }

    const input = cleaned.slice(0, this.config.llm.embedMaxChars);
    if (this.config.llm.provider === 'openai') {
      return this.openaiEmbedding(input);
    }
    return this.ollamaEmbedding(input);
  }

  private async chat(
    messages: ChatMessage[],
    options: CompletionOptions,
    json: boolean,
  ): Promise<string | null> {
    const { provider } = this.config.llm;
    const request =
      provider === 'openai'
        ? {
            url: `${this.config.llm.baseUrl}/chat/completions`,
            body: {
              model: options.model,
              messages,
              temperature: options.temperature,
              max_tokens: options.maxTokens,
              ...(json ? { response_format: { type: 'json_object' } } : {}),
            },
          }
        : {
            url: `${this.config.llm.baseUrl}/api/chat`,
            body: {
              model: options.model,
              messages,
              stream: false,
              options: {
                temperature: options.temperature,
                num_predict: options.maxTokens,
              },
              ...(json ? { format: 'json' } : {}),
            },
          };

    for (let attempt = 1; attempt <= this.config.llm.maxRetries + 1; attempt += 1) {
      const response = await this.postJson(request.url, request.body);

      if (!response.ok) {
        if (
          RETRYABLE_STATUS.has(response.status) &&
          attempt <= this.config.llm.maxRetries
        ) {
          await sleep(this.backoffMs(attempt));
          continue;
        }
        this.logUnavailable(
          `${provider}_chat_failed`,
          `${response.status} ${response.raw.slice(0, 180)}`,
        );
        return null;
      }

      const text =
        provider === 'openai'
          ? this.extractOpenaiText(response.json)
          : this.extractOllamaText(response.json);
      if (text) {
        return text;
      }
      this.logUnavailable(`${provider}_chat_empty`);
      return null;
    }

    return null;
  }

  private async openaiEmbedding(text: string): Promise<number[] | null> {
    const response = await this.postJson(`${this.config.llm.baseUrl}/embeddings`, {
      model: this.config.llm.embeddingModel,
      input: text,
    });

    if (!response.ok) {
      this.logUnavailable('openai_embedding_failed', `${response.status}`);
      return null;
    }

    const data: unknown = response.json?.data;
    const first: unknown = Array.isArray(data) ? data[0] : null;
    return this.toVector(isRecord(first) ? first.embedding : null);
  }

  private async ollamaEmbedding(text: string): Promise<number[] | null> {
    const response = await this.postJson(
      `${this.config.llm.baseUrl}/api/embeddings`,
      { model: this.config.llm.embeddingModel, prompt: text },
    );

    if (!response.ok) {
      this.logUnavailable('ollama_embedding_failed', `${response.status}`);
      return null;
    }

    return this.toVector(response.json?.embedding);
  }

  private toVector(value: unknown): number[] | null {
    if (!Array.isArray(value)) {
      return null;
    }
    const values = value.filter((v): v is number => typeof v === 'number');
    return values.length ? values : null;
  }

  private extractOpenaiText(json: Record<string, unknown> | null): string {
    const choices: unknown = json?.choices;
    const first: unknown = Array.isArray(choices) ? choices[0] : null;
    const message = isRecord(first) ? first.message : null;
    return isRecord(message) && typeof message.content === 'string'
      ? message.content
      : '';
  }

  private extractOllamaText(json: Record<string, unknown> | null): string {
    const message = json?.message;
    return isRecord(message) && typeof message.content === 'string'
      ? message.content
      : '';
  }

  private parseJsonObject(text: string): Record<string, unknown> | null {
    if (!text) {
      return null;
    }
    const trimmed = text
      .trim()
      .replace(/```json/gi, '')
      .replace(/```/g, '')
      .trim();

    const direct = this.tryJsonParse(trimmed);
    if (direct) {
      return direct;
    }

    const block = this.extractJsonBlock(trimmed);
    if (!block) {
      return null;
    }

    return (
      this.tryJsonParse(block) ??
      this.tryJsonParse(this.stripTrailingCommas(block))
    );
  }

  private tryJsonParse(value: string): Record<string, unknown> | null {
    try {
      const parsed: unknown = JSON.parse(value);
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private extractJsonBlock(value: string): string | null {
    const start = value.indexOf('{');
    if (start === -1) {
      return null;
    }

    let depth = 0;
    for (let i = start; i < value.length; i += 1) {
      const ch = value[i];
      if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          return value.slice(start, i + 1);
        }
      }
    }
    return null;
  }

  private stripTrailingCommas(value: string): string {
    return value.replace(/,\s*([}\]])/g, '$1');
  }

  private async postJson(url: string, body: unknown): Promise<JsonResponse> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.config.llm.apiKey) {
      headers.Authorization = `Bearer ${this.config.llm.apiKey}`;
    }

    const response = await fetchText(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      timeoutMs: this.config.llm.timeoutMs,
    });
    return { ...response, json: this.tryJsonParse(response.raw) };
  }

  private backoffMs(attempt: number): number {
    return this.config.llm.retryBackoffMs * 2 ** (attempt - 1);
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`LLM unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`LLM unavailable: ${reason}`);
  }
}
