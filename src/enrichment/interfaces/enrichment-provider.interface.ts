/**
 * Firmographic record as returned by the enrichment provider. Fields vary by
 * provider; read them through `readCompanyField` rather than by shape.
 */
export type CompanyRecord = Record<string, unknown>;

/** Fields known to appear in most providers' records. None is guaranteed. */
export const DOCUMENTED_COMPANY_FIELDS = [
  'name',
  'domain',
  'revenue',
  'employees',
  'industry',
  'founded',
  'location',
] as const;

export type CompanyField = (typeof DOCUMENTED_COMPANY_FIELDS)[number];

export interface EnrichmentProvider {
  readonly name: string;
  /** Rejects with `EnrichmentError` on any failure. */
  enrich(domain: string, apiKey: string): Promise<CompanyRecord>;
}

export const ENRICHMENT_PROVIDER = 'ENRICHMENT_PROVIDER';
