import { Injectable } from '@nestjs/common';
import {
  EnrichmentProvider,
  CompanyRecord,
} from '../interfaces/enrichment-provider.interface';
import { EnrichmentError } from '../../common/errors/upstream.errors';

/** Offline fixture data for demos and local runs without an enrichment key. */
@Injectable()
export class MockEnrichmentProvider implements EnrichmentProvider {
  readonly name = 'mock';

  private readonly mockDb: Record<string, CompanyRecord> = {
    'stripe.com': {
      name: 'Stripe',
      domain: 'stripe.com',
      revenue: '$14B',
      employees: 8000,
      industry: 'Fintech',
      founded: 2010,
      location: 'San Francisco, CA',
    },
    'netflix.com': {
      name: 'Netflix',
      domain: 'netflix.com',
      revenue: '$33.7B',
      employees: 13000,
      industry: 'Entertainment',
      founded: 1997,
      location: 'Los Gatos, CA',
    },
    'example-saas.io': {
      name: 'Example SaaS',
      domain: 'example-saas.io',
      revenue: '$12M',
      employees: 140,
      industry: 'B2B Software',
      founded: 2019,
      location: 'Austin, TX',
    },
  };

  enrich(domain: string): Promise<CompanyRecord> {
    const record = this.mockDb[domain.toLowerCase()];
    if (!record) {
      return Promise.reject(
        new EnrichmentError(`Mock enrichment has no record for ${domain}`, {
          status: 404,
        }),
      );
    }
    return Promise.resolve({ ...record });
  }
}
