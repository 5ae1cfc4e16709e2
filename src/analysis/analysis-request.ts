import { ScoringMode } from '../scoring/interfaces/scoring.interface';
import { ConfigurationError } from '../common/errors/analysis.errors';
import { Dependency } from '../common/errors/dependency';
import type {
  AnalysisCredentials,
  AnalysisRequest,
  ResolvedCredentials,
} from './interfaces/analysis.interface';

export interface AnalysisRequestInput {
  domain?: string;
  strategy?: ScoringMode;
  credentials?: AnalysisCredentials;
}

export function createAnalysisRequest(input: AnalysisRequestInput): AnalysisRequest {
  return Object.freeze({
    domain: input.domain ?? '',
    strategy: input.strategy ?? ScoringMode.SIMPLE,
    credentials: Object.freeze({ ...input.credentials }),
  });
}

/**
 * Throws `ConfigurationError` naming every missing credential (in
 * text_generation, search, enrichment order) and `domain` when it is blank.
 */
export function resolveCredentials(request: AnalysisRequest): ResolvedCredentials {
  const missing: string[] = [];
  const present = (dependency: Dependency, value: string | undefined): string => {
    if (value === undefined || value.trim().length === 0) {
      missing.push(dependency);
      return '';
    }
    return value;
  };

  const resolved: ResolvedCredentials = {
    textGeneration: present(Dependency.TEXT_GENERATION, request.credentials.textGeneration),
    search: present(Dependency.SEARCH, request.credentials.search),
    enrichment: present(Dependency.ENRICHMENT, request.credentials.enrichment),
  };
  if (request.domain.trim().length === 0) missing.push('domain');

  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }
  return resolved;
}
