import type {
  CompanyField,
  CompanyRecord,
} from './interfaces/enrichment-provider.interface';

/** Scalar value of a documented field, or undefined when absent or structured. */
export function readCompanyField(
  record: CompanyRecord | null,
  field: CompanyField,
): string | number | undefined {
  const value = record?.[field];
  if (typeof value === 'string') {
    return value.trim().length > 0 ? value : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return undefined;
}

/** Pretty-printed record, cut to `limit` characters for prompt embedding. */
export function snapshotCompany(
  record: CompanyRecord | null,
  limit: number,
): string {
  if (!record) {
    return 'NOT_AVAILABLE';
  }
  const text = JSON.stringify(record, null, 2);
  return text.length > limit ? `${text.slice(0, limit)}…` : text;
}
