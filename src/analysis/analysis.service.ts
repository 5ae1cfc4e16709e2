import { Injectable, Logger } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import type { Counter, Histogram } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { EnrichmentService } from '../enrichment/enrichment.service';
import { MarketSignalsService } from '../signals/market-signals.service';
import { ScoringService } from '../scoring/scoring.service';
import {
  AnalysisError,
  DataAvailabilityError,
} from '../common/errors/analysis.errors';
import { Dependency } from '../common/errors/dependency';
import { errorMessage } from '../common/result';
import {
  BUDGET_ANALYSES_TOTAL,
  BUDGET_ANALYSIS_DURATION,
  UPSTREAM_FAILURES_TOTAL,
} from '../common/metrics.providers';
import type {
  AnalysisReport,
  AnalysisRequest,
} from './interfaces/analysis.interface';
import { resolveCredentials } from './analysis-request';
import { readCompanyField } from '../enrichment/company-record';
import { countSignals } from '../signals/signal-topics';

/**
 * Analysis orchestrator.
 *
 * Flow:
 * 1. Reject the request if a credential or the domain is missing (no calls made)
 * 2. Enrichment and market signals, concurrently; each may fail on its own
 * 3. Stop if neither produced data
 * 4. Score with the caller's strategy
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    private readonly enrichmentService: EnrichmentService,
    private readonly marketSignalsService: MarketSignalsService,
    private readonly scoringService: ScoringService,
    @InjectMetric(BUDGET_ANALYSES_TOTAL)
    private readonly analysesCounter: Counter<string>,
    @InjectMetric(BUDGET_ANALYSIS_DURATION)
    private readonly durationHistogram: Histogram<string>,
    @InjectMetric(UPSTREAM_FAILURES_TOTAL)
    private readonly upstreamFailures: Counter<string>,
  ) {}

  async analyze(request: AnalysisRequest): Promise<AnalysisReport> {
    const stopTimer = this.durationHistogram.startTimer({
      strategy: request.strategy,
    });

    try {
      const report = await this.run(request);
      this.analysesCounter.inc({ strategy: request.strategy, outcome: 'success' });
      return report;
    } catch (error: unknown) {
      this.analysesCounter.inc({
        strategy: request.strategy,
        outcome:
          error instanceof AnalysisError
            ? error.code.toLowerCase()
            : 'internal_error',
      });
      throw error;
    } finally {
      stopTimer();
    }
  }

  private async run(request: AnalysisRequest): Promise<AnalysisReport> {
    const credentials = resolveCredentials(request);
    const { domain, strategy } = request;
    const analysisId = uuidv4();

    this.logger.log(`[${analysisId}] Starting ${strategy} analysis for ${domain}`);

    const [enrichment, signals] = await Promise.all([
      this.enrichmentService.fetchCompany(domain, credentials.enrichment),
      this.marketSignalsService.gather(domain, credentials.search),
    ]);

    const warnings: string[] = [];
    const reasons: Partial<Record<Dependency, string>> = {};

    if (!enrichment.ok) {
      this.upstreamFailures.inc({ dependency: Dependency.ENRICHMENT });
      reasons[Dependency.ENRICHMENT] = enrichment.error.message;
      warnings.push(`Enrichment unavailable: ${enrichment.error.message}`);
    }
    if (!signals.ok) {
      this.upstreamFailures.inc({ dependency: Dependency.SEARCH });
      reasons[Dependency.SEARCH] = signals.error.message;
      warnings.push(`Market signals unavailable: ${signals.error.message}`);
    }

    const company = enrichment.ok ? enrichment.value : null;
    const bundle = signals.ok ? signals.value : null;

    if (!company && !bundle) {
      this.logger.error(
        `[${analysisId}] No upstream data for ${domain}; scoring skipped`,
      );
      throw new DataAvailabilityError(reasons);
    }

    const companyName =
      readCompanyField(company, 'name') ?? (company ? 'unnamed' : 'none');
    this.logger.log(
      `[${analysisId}] Gathered data for ${domain}: company=${companyName}, signals=${bundle ? countSignals(bundle) : 'none'}`,
    );

    try {
      const result = await this.scoringService.score(
        strategy,
        { domain, company, signals: bundle },
        credentials.textGeneration,
      );

      this.logger.log(
        `[${analysisId}] Analysis for ${domain} finished: ${result.status} (${result.score})`,
      );

      return {
        analysisId,
        domain,
        strategy,
        result,
        company,
        signals: bundle,
        warnings,
        completedAt: new Date().toISOString(),
      };
    } catch (error: unknown) {
      this.logger.error(
        `[${analysisId}] Scoring failed for ${domain}: ${errorMessage(error)}`,
      );
      throw error;
    }
  }
}
