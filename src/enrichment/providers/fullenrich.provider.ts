import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  EnrichmentProvider,
  CompanyRecord,
} from '../interfaces/enrichment-provider.interface';
import { EnrichmentError } from '../../common/errors/upstream.errors';
import {
  HttpRequestError,
  isPlainObject,
  postJson,
} from '../../common/http/post-json';

/**
 * FullEnrich company enrichment. The response body is passed through as the
 * CompanyRecord without schema validation.
 */
@Injectable()
export class FullEnrichProvider implements EnrichmentProvider {
  readonly name = 'fullenrich';
  private readonly logger = new Logger(FullEnrichProvider.name);

  constructor(private readonly configService: ConfigService) {}

  async enrich(domain: string, apiKey: string): Promise<CompanyRecord> {
    const baseUrl = this.configService.get<string>(
      'FULLENRICH_BASE_URL',
      'https://api.fullenrich.com/v1',
    );
    const timeoutMs = this.configService.get<number>(
      'ENRICHMENT_TIMEOUT_MS',
      30_000,
    );

    let body: unknown;
    try {
      body = await postJson(
        `${baseUrl}/company/enrich`,
        { domain },
        { headers: { Authorization: `Bearer ${apiKey}` }, timeoutMs },
      );
    } catch (error: unknown) {
      if (error instanceof HttpRequestError) {
        throw new EnrichmentError(
          error.status !== undefined
            ? `FullEnrich API returned status ${error.status}`
            : `FullEnrich request failed: ${error.message}`,
          { status: error.status, timedOut: error.timedOut },
        );
      }
      throw error;
    }

    if (!isPlainObject(body)) {
      throw new EnrichmentError('FullEnrich returned a body that is not a JSON object');
    }

    this.logger.debug(`FullEnrich returned ${Object.keys(body).length} fields for ${domain}`);
    return body;
  }
}
