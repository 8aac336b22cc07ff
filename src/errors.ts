/**
 * Error hierarchy for corpus ranking.
 *
 * Every failure is a local validation failure raised before any
 * computation starts, so no estimator ever returns a partial result.
 */

export type PageRankErrorCode =
  | 'INVALID_NODE'
  | 'INVALID_SAMPLE_COUNT'
  | 'INVALID_THRESHOLD'
  | 'INVALID_DAMPING'
  | 'EMPTY_CORPUS'
  | 'NOT_CONVERGED'
  | 'ESTIMATOR_STATE'
  | 'CORPUS_READ'
  | 'CONFIG';

export class PageRankError extends Error {
  constructor(message: string, public readonly code: PageRankErrorCode) {
    super(message);
    this.name = 'PageRankError';
  }
}

/** A page that is not a key of the corpus was named. */
export class InvalidNodeError extends PageRankError {
  constructor(public readonly node: unknown, detail?: string) {
    super(detail ?? `Page ${String(node)} is not in the corpus`, 'INVALID_NODE');
    this.name = 'InvalidNodeError';
  }
}

export class InvalidSampleCountError extends PageRankError {
  constructor(public readonly samples: number) {
    super(`Number of samples must be a positive integer, got ${samples}`, 'INVALID_SAMPLE_COUNT');
    this.name = 'InvalidSampleCountError';
  }
}

export class InvalidThresholdError extends PageRankError {
  constructor(public readonly threshold: number) {
    super(`Convergence threshold must be a positive number, got ${threshold}`, 'INVALID_THRESHOLD');
    this.name = 'InvalidThresholdError';
  }
}

export class InvalidDampingError extends PageRankError {
  constructor(public readonly damping: number) {
    super(`Damping factor must be between 0 and 1, got ${damping}`, 'INVALID_DAMPING');
    this.name = 'InvalidDampingError';
  }
}

export class EmptyCorpusError extends PageRankError {
  constructor() {
    super('Corpus has no pages to rank', 'EMPTY_CORPUS');
    this.name = 'EmptyCorpusError';
  }
}

/** The iteration cap was reached before every page moved less than the threshold. */
export class ConvergenceError extends PageRankError {
  constructor(public readonly iterations: number, public readonly maxDelta: number) {
    super(`PageRank did not converge after ${iterations} iterations (last max delta ${maxDelta})`, 'NOT_CONVERGED');
    this.name = 'ConvergenceError';
  }
}

export class EstimatorStateError extends PageRankError {
  constructor(message: string) {
    super(message, 'ESTIMATOR_STATE');
    this.name = 'EstimatorStateError';
  }
}

export class CorpusReadError extends PageRankError {
  constructor(public readonly directory: string, cause: unknown) {
    super(`Cannot read corpus directory ${directory}: ${cause instanceof Error ? cause.message : String(cause)}`, 'CORPUS_READ');
    this.name = 'CorpusReadError';
  }
}

export class ConfigError extends PageRankError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}
