import { Dependency } from './dependency';

export interface UpstreamFailureDetails {
  status?: number;
  timedOut?: boolean;
}

/**
 * Failure reported by one external collaborator. Whether it is fatal for the
 * analysis depends on which component observed it.
 */
export class UpstreamError extends Error {
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    readonly dependency: Dependency,
    message: string,
    details: UpstreamFailureDetails = {},
  ) {
    super(message);
    this.name = 'UpstreamError';
    this.status = details.status;
    this.timedOut = details.timedOut ?? false;
  }
}

export class EnrichmentError extends UpstreamError {
  constructor(message: string, details?: UpstreamFailureDetails) {
    super(Dependency.ENRICHMENT, message, details);
    this.name = 'EnrichmentError';
  }
}

/** A single search query failed. `fatal` failures abort the whole gather. */
export class SearchError extends UpstreamError {
  readonly fatal: boolean;

  constructor(message: string, details: UpstreamFailureDetails & { fatal?: boolean } = {}) {
    super(Dependency.SEARCH, message, details);
    this.name = 'SearchError';
    this.fatal = details.fatal ?? false;
  }
}

export class SignalError extends UpstreamError {
  constructor(message: string, details?: UpstreamFailureDetails) {
    super(Dependency.SEARCH, message, details);
    this.name = 'SignalError';
  }
}

export class TextGenerationError extends UpstreamError {
  constructor(message: string, details?: UpstreamFailureDetails) {
    super(Dependency.TEXT_GENERATION, message, details);
    this.name = 'TextGenerationError';
  }
}
