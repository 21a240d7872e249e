import { PipelineStage } from './result.types';

/**
 * Raised while turning a raw row into a Shipment. Row-local: the orchestrator
 * records it against the row and carries on with the batch.
 */
export class MalformedRowError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'MalformedRowError';
  }
}

/**
 * Base for errors that abort a pipeline run.
 */
export abstract class FatalPipelineFailure extends Error {
  abstract readonly stage: PipelineStage;
  abstract readonly errorType: 'EXTRACTION_ERROR' | 'LOAD_ERROR';

  constructor(
    message: string,
    public readonly originalError?: Error
  ) {
    super(message);
  }
}

export class ExtractionError extends FatalPipelineFailure {
  readonly stage = 'extract' as const;
  readonly errorType = 'EXTRACTION_ERROR' as const;

  constructor(message: string, originalError?: Error) {
    super(message, originalError);
    this.name = 'ExtractionError';
  }
}

export class LoadError extends FatalPipelineFailure {
  readonly stage = 'load' as const;
  readonly errorType = 'LOAD_ERROR' as const;

  constructor(message: string, originalError?: Error) {
    super(message, originalError);
    this.name = 'LoadError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
