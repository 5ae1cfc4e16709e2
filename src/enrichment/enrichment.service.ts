import { Injectable, Inject, Logger } from '@nestjs/common';
import { ENRICHMENT_PROVIDER } from './interfaces/enrichment-provider.interface';
import type {
  EnrichmentProvider,
  CompanyRecord,
} from './interfaces/enrichment-provider.interface';
import { EnrichmentError } from '../common/errors/upstream.errors';
import { err, errorMessage, ok, Result } from '../common/result';

export type { CompanyRecord };

@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(
    @Inject(ENRICHMENT_PROVIDER)
    private readonly provider: EnrichmentProvider,
  ) {}

  /**
   * One attempt against the configured provider. Failures are returned, not
   * thrown: the analysis continues without a company record.
   */
  async fetchCompany(
    domain: string,
    apiKey: string,
  ): Promise<Result<CompanyRecord, EnrichmentError>> {
    if (domain.trim().length === 0) {
      return err(new EnrichmentError('Domain must not be empty'));
    }

    try {
      const record = await this.provider.enrich(domain, apiKey);
      return ok(record);
    } catch (error: unknown) {
      const failure =
        error instanceof EnrichmentError
          ? error
          : new EnrichmentError(errorMessage(error));
      this.logger.warn(
        `Enrichment (${this.provider.name}) failed for ${domain}: ${failure.message}`,
      );
      return err(failure);
    }
  }
}
