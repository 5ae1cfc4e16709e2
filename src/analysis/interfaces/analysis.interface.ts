import type { CompanyRecord } from '../../enrichment/interfaces/enrichment-provider.interface';
import type { SignalBundle } from '../../signals/signal-topics';
import type {
  AnalysisResult,
  ScoringMode,
} from '../../scoring/interfaces/scoring.interface';

/** Caller-supplied keys, held only for the calls that use them. */
export interface AnalysisCredentials {
  readonly textGeneration?: string;
  readonly search?: string;
  readonly enrichment?: string;
}

export interface AnalysisRequest {
  readonly domain: string;
  readonly strategy: ScoringMode;
  readonly credentials: AnalysisCredentials;
}

export interface ResolvedCredentials {
  readonly textGeneration: string;
  readonly search: string;
  readonly enrichment: string;
}

export interface AnalysisReport {
  analysisId: string;
  domain: string;
  strategy: ScoringMode;
  result: AnalysisResult;
  /** Raw upstream data for display; null when that dependency failed. */
  company: CompanyRecord | null;
  signals: SignalBundle | null;
  /** Recoverable upstream failures the analysis continued past. */
  warnings: string[];
  completedAt: string;
}
