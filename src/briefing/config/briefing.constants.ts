import { PipelineStage, PipelineState } from '../types/briefing.types';

export const SERVICE_NAME = 'sports-briefing-assistant';
export const SERVICE_VERSION = '0.1.0';
export const USER_AGENT = `${SERVICE_NAME}/${SERVICE_VERSION}`;

export const SOURCE_COLLECTOR = Symbol('SOURCE_COLLECTOR');
export const VECTOR_INDEX = Symbol('VECTOR_INDEX');
export const RECORD_STORE = Symbol('RECORD_STORE');
export const COMPLETION_BACKEND = Symbol('COMPLETION_BACKEND');
export const EMBEDDING_BACKEND = Symbol('EMBEDDING_BACKEND');

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'collect',
  'index',
  'persist',
  'report',
];

export const STAGE_STATES: Record<PipelineStage, PipelineState> = {
  collect: 'collecting',
  index: 'indexing',
  persist: 'persisting',
  report: 'reporting',
};

export const RECORDS_FILE = 'records.json';
export const SUMMARIES_FILE = 'summaries.json';
export const REPORTS_FILE = 'reports.json';
export const VECTOR_INDEX_FILE = 'vector-index.json';
export const PIPELINE_RUNS_FILE = 'pipeline-runs.json';
export const STAGING_DIR = 'staging';

export const EMBEDDING_SNIPPET_CHARS = 500;
export const CHAT_CONTEXT_CHARS_PER_SOURCE = 800;

export const NO_INFORMATION_ANSWER =
  'I have no information about that in the collected news and stats yet.';
