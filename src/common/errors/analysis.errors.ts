import { HttpStatus } from '@nestjs/common';
import { Dependency } from './dependency';
import { UpstreamError } from './upstream.errors';
import { errorMessage } from '../result';

export type ScoringStage = 'simple' | 'extraction' | 'scoring' | 'synthesis';

/**
 * Errors that end an analysis. Each carries a stable code, the HTTP status the
 * API answers with, and details safe to return to the caller.
 */
export abstract class AnalysisError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

/** Required inputs missing; raised before any network call. */
export class ConfigurationError extends AnalysisError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = HttpStatus.BAD_REQUEST;

  constructor(readonly missing: string[]) {
    super(`Missing required inputs: ${missing.join(', ')}`, { missing });
    this.name = 'ConfigurationError';
  }
}

/** Neither the enrichment record nor the signal bundle could be gathered. */
export class DataAvailabilityError extends AnalysisError {
  readonly code = 'DATA_UNAVAILABLE';
  readonly statusCode = HttpStatus.FAILED_DEPENDENCY;

  constructor(readonly reasons: Partial<Record<Dependency, string>>) {
    super('Failed to gather company or market signal data', { reasons });
    this.name = 'DataAvailabilityError';
  }
}

/** A model response could not be read as the JSON shape its stage expects. */
export class ScoringContractError extends AnalysisError {
  readonly code = 'SCORING_CONTRACT_ERROR';
  readonly statusCode = HttpStatus.BAD_GATEWAY;

  constructor(
    readonly stage: ScoringStage,
    readonly reason: string,
  ) {
    super(`Scoring stage "${stage}" returned an unusable response: ${reason}`, {
      stage,
    });
    this.name = 'ScoringContractError';
  }
}

/** A call that the analysis cannot continue without failed in transport. */
export class TransportError extends AnalysisError {
  readonly code = 'TRANSPORT_ERROR';
  readonly statusCode: number;

  constructor(
    readonly dependency: Dependency,
    reason: string,
    readonly timedOut: boolean,
    readonly stage?: ScoringStage,
  ) {
    super(
      `${dependency} call${stage ? ` (stage "${stage}")` : ''} failed: ${reason}`,
      { dependency, ...(stage ? { stage } : {}), timedOut },
    );
    this.name = 'TransportError';
    this.statusCode = timedOut
      ? HttpStatus.GATEWAY_TIMEOUT
      : HttpStatus.BAD_GATEWAY;
  }

  static from(
    dependency: Dependency,
    error: unknown,
    stage?: ScoringStage,
  ): TransportError {
    const timedOut = error instanceof UpstreamError && error.timedOut;
    return new TransportError(dependency, errorMessage(error), timedOut, stage);
  }
}
