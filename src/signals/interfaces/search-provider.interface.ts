/** One ranked web-search hit. Provider order is preserved. */
export interface SearchResultItem {
  title: string;
  url: string;
  snippet: string;
  score?: number;
  /** Remaining provider fields, passed through untouched. */
  metadata: Record<string, unknown>;
}

export interface SearchOptions {
  maxResults: number;
}

export interface SearchProvider {
  readonly name: string;
  /** Rejects with `SearchError`; `fatal` errors abort the whole gather. */
  search(
    query: string,
    apiKey: string,
    options: SearchOptions,
  ): Promise<SearchResultItem[]>;
}

export const SEARCH_PROVIDER = 'SEARCH_PROVIDER';
