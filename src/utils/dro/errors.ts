import type { ModelId } from '../../types/dro';

export class DroError extends Error {
  readonly code: string = 'DRO_ERROR';
  readonly recoverable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DroError';
  }
}

export class OutOfRangeError extends DroError {
  override readonly code = 'OUT_OF_RANGE';

  constructor(message: string) {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

export class UnknownModelError extends DroError {
  override readonly code = 'UNKNOWN_MODEL';

  constructor(public readonly model: string) {
    super(`Unknown model: ${model}`);
    this.name = 'UnknownModelError';
  }
}

export class UnknownParameterError extends DroError {
  override readonly code = 'UNKNOWN_PARAMETER';

  constructor(
    public readonly model: string,
    public readonly param: string
  ) {
    super(`Unknown parameter "${param}" for model ${model}`);
    this.name = 'UnknownParameterError';
  }
}

/** Load-time only; a dataset that fails this check is never constructed. */
export class ShapeMismatchError extends DroError {
  override readonly code = 'SHAPE_MISMATCH';

  constructor(message: string) {
    super(message);
    this.name = 'ShapeMismatchError';
  }
}

export class EmptyDistributionError extends DroError {
  override readonly code = 'EMPTY_DISTRIBUTION';
  override readonly recoverable = true;

  constructor(message = 'No valid fits') {
    super(message);
    this.name = 'EmptyDistributionError';
  }
}

export class ModelEvaluationError extends DroError {
  override readonly code = 'MODEL_EVALUATION';
  override readonly recoverable = true;

  constructor(
    public readonly model: ModelId,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${model}: ${message}`, options);
    this.name = 'ModelEvaluationError';
  }
}

export class DatasetLoadError extends DroError {
  override readonly code = 'DATASET_LOAD';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetLoadError';
  }
}

export function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}
