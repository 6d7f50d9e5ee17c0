/**
 * Search pipeline error taxonomy
 *
 * ConfigurationError     - invalid fusion/search configuration. Fatal, raised before any query runs.
 * SourceUnavailableError - a retrieval call failed or timed out. The pipeline degrades that source to an empty list.
 * ScoringError           - non-finite scores or a failed rerank. Fatal for the current request.
 * EvaluationInputError   - a malformed judgment. Flagged per query, never aborts the batch.
 *
 * @module services/search/errors
 */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Error.captureStackTrace?.(this, ConfigurationError);
  }
}

export class SourceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SourceUnavailableError';
    Error.captureStackTrace?.(this, SourceUnavailableError);
  }
}

export class ScoringError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ScoringError';
    Error.captureStackTrace?.(this, ScoringError);
  }
}

export class EvaluationInputError extends Error {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = 'EvaluationInputError';
    Error.captureStackTrace?.(this, EvaluationInputError);
  }
}

/**
 * Throw ScoringError unless `value` is a finite number
 */
export function assertFiniteScore(value: number, context: Record<string, unknown>): void {
  if (!Number.isFinite(value)) {
    throw new ScoringError(`Non-finite score ${String(value)} rejected`, { ...context, score: String(value) });
  }
}
