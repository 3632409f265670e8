export type RecordKind = 'article' | 'stat';

export interface Article {
  kind: 'article';
  id: string;
  sourceName: string;
  publishedAt: string;
  title: string;
  text: string;
  language: string;
  url: string;
  sport?: string;
  competition?: string;
}

export interface StatRecord {
  kind: 'stat';
  id: string;
  sourceName: string;
  subject: string;
  metric: string;
  value: number;
  /** The value as the source wrote it, kept when it was not a plain number. */
  rawValue?: string;
  recordedAt: string;
  competition?: string;
}

export type ContentRecord = Article | StatRecord;

export interface EmbeddingMetadata {
  kind: RecordKind;
  sourceName: string;
  timestamp: string;
  title: string;
  snippet: string;
  contentHash: string;
}

export interface EmbeddingEntry {
  id: string;
  vector: number[];
  metadata: EmbeddingMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: EmbeddingMetadata;
}

/** Verdict of the fact-check pass over a draft summary. */
export interface SummaryVerification {
  accurate: boolean;
  reasoning: string;
}

export interface ArticleSummary {
  articleId: string;
  language: string;
  summary: string;
  highlights: string[];
  model: string;
  createdAt: string;
  /** Absent when verification is off or the check gave no usable verdict. */
  verification?: SummaryVerification;
}

export interface ReportDocument {
  date: string;
  language: string;
  summary: string;
  sourceIds: string[];
  model: string;
  generatedAt: string;
}

export type PipelineStage = 'collect' | 'index' | 'persist' | 'report';

export type PipelineState =
  | 'not_started'
  | 'collecting'
  | 'indexing'
  | 'persisting'
  | 'reporting'
  | 'completed'
  | 'failed';

export type StageStatus = 'pending' | 'succeeded' | 'failed' | 'skipped';

export interface StageProgress {
  status: StageStatus;
  processed: number;
  failed: number;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
}

export interface SourceFailure {
  source: string;
  attempts: number;
  message: string;
}

export interface PipelineRun {
  id: string;
  date: string;
  language: string;
  sequence: number;
  state: PipelineState;
  failedStage: PipelineStage | null;
  lastCompletedStage: PipelineStage | null;
  stages: Record<PipelineStage, StageProgress>;
  sourceFailures: SourceFailure[];
  forced: boolean;
  resumedFrom: string | null;
  startedAt: string;
  finishedAt: string | null;
  error: { name: string; message: string } | null;
}

export interface StageRunResult {
  stage: PipelineStage;
  date: string;
  language: string;
  progress: StageProgress;
  sourceFailures: SourceFailure[];
  error: { name: string; message: string } | null;
}

/** Half-open ISO interval [from, to). */
export interface DateRange {
  from: string;
  to: string;
}

export interface RecordQuery {
  range: DateRange;
  language?: string;
  kind?: RecordKind;
}

export interface UpsertSummary {
  inserted: number;
  updated: number;
  unchanged: number;
}

export interface CollectionResult {
  records: ContentRecord[];
  failures: SourceFailure[];
  sourcesAttempted: number;
}

export interface SourceCollector {
  fetchAll(signal?: AbortSignal): Promise<CollectionResult>;
}

export interface VectorIndex {
  upsert(
    id: string,
    vector: number[],
    metadata: EmbeddingMetadata,
  ): Promise<void>;
  query(vector: number[], k: number): Promise<VectorMatch[]>;
  getMetadata(id: string): Promise<EmbeddingMetadata | null>;
  flush(): Promise<void>;
  clear(): Promise<void>;
  size(): Promise<number>;
}

export interface StoreCounts {
  articles: number;
  stats: number;
  summaries: number;
  reports: number;
}

export interface RecordStore {
  upsertAll(records: ContentRecord[]): Promise<UpsertSummary>;
  queryByDateRange(query: RecordQuery): Promise<ContentRecord[]>;
  getMany(ids: string[]): Promise<ContentRecord[]>;
  upsertReport(report: ReportDocument): Promise<void>;
  getReport(date: string, language: string): Promise<ReportDocument | null>;
  listReports(): Promise<ReportDocument[]>;
  upsertSummaries(summaries: ArticleSummary[]): Promise<void>;
  getSummaries(
    articleIds: string[],
    language: string,
  ): Promise<Map<string, ArticleSummary>>;
  /** Every stored stat line, newest first. */
  listStats(): Promise<StatRecord[]>;
  counts(): Promise<StoreCounts>;
}

export interface CompletionOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  language: string;
}

export interface CompletionBackend {
  complete(
    prompt: string,
    options?: Partial<CompletionOptions>,
  ): Promise<string | null>;
  completeJson(
    systemPrompt: string,
    userPrompt: string,
  ): Promise<Record<string, unknown> | null>;
}

export interface EmbeddingBackend {
  embed(text: string): Promise<number[] | null>;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatSource {
  id: string;
  title: string;
  sourceName: string;
  score: number;
}

export interface ChatAnswer {
  answer: string;
  sources: ChatSource[];
  /** Subjects whose stored stats were looked up for this answer. */
  statSubjects: string[];
  grounded: boolean;
}

export interface MetricAverage {
  metric: string;
  average: number;
  games: number;
}

export interface GameLine {
  date: string;
  competition?: string;
  values: { metric: string; value: number; rawValue?: string }[];
}

/** Aggregates over every stored stat line for one team or player. */
export interface SubjectStats {
  subject: string;
  averages: MetricAverage[];
  /** Newest first. */
  recentGames: GameLine[];
}

export interface SummarizeResult {
  date: string;
  language: string;
  summarized: number;
  skipped: number;
  failed: number;
  /** Summaries the fact-check pass rewrote. */
  corrected: number;
}
