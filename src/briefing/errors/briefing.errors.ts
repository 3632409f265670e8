import type { PipelineStage, SourceFailure } from '../types/briefing.types';

export class BriefingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable configuration. Fatal at startup. */
export class ConfigError extends BriefingError {}

/** A request the pipeline cannot serve, e.g. a bad date or a missing staged batch. */
export class PipelineError extends BriefingError {}

/**
 * Base for failures that stop a run at one stage. `succeeded` is the number
 * of records the stage handled before it failed.
 */
export abstract class StageError extends BriefingError {
  abstract readonly stage: PipelineStage;

  constructor(
    message: string,
    readonly succeeded = 0,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CollectionError extends StageError {
  readonly stage = 'collect' as const;

  constructor(
    message: string,
    readonly failures: SourceFailure[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, 0, options);
  }
}

export class IndexError extends StageError {
  readonly stage = 'index' as const;
}

export class PersistError extends StageError {
  readonly stage = 'persist' as const;
}

export class ReportError extends StageError {
  readonly stage = 'report' as const;
}

/** `during` is set when the abort cut a running stage short. */
export class PipelineAbortedError extends StageError {
  constructor(
    readonly stage: PipelineStage,
    readonly during = false,
    options?: { cause?: unknown },
  ) {
    super(`run aborted ${during ? 'during' : 'before'} stage ${stage}`, 0, options);
  }
}

export type ChatFailureReason =
  | 'empty_question'
  | 'embedding_unavailable'
  | 'completion_unavailable';

export class ChatError extends BriefingError {
  constructor(
    message: string,
    readonly reason: ChatFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
