import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import {
  SearchOptions,
  SearchProvider,
  SearchResultItem,
} from '../interfaces/search-provider.interface';
import { SearchError } from '../../common/errors/upstream.errors';
import { HttpRequestError, postJson } from '../../common/http/post-json';

const TavilyResultSchema = z
  .object({
    title: z.string().default(''),
    url: z.string().default(''),
    content: z.string().default(''),
    score: z.number().optional(),
  })
  .passthrough();

const TavilySearchResponseSchema = z
  .object({
    results: z.array(TavilyResultSchema).default([]),
  })
  .passthrough();

/** Credential rejections fail identically for every query. */
const FATAL_STATUSES = new Set([401, 403]);

@Injectable()
export class TavilyProvider implements SearchProvider {
  readonly name = 'tavily';
  private readonly logger = new Logger(TavilyProvider.name);

  constructor(private readonly configService: ConfigService) {}

  async search(
    query: string,
    apiKey: string,
    options: SearchOptions,
  ): Promise<SearchResultItem[]> {
    const baseUrl = this.configService.get<string>(
      'TAVILY_BASE_URL',
      'https://api.tavily.com',
    );
    const timeoutMs = this.configService.get<number>('SEARCH_TIMEOUT_MS', 30_000);

    let body: unknown;
    try {
      body = await postJson(
        `${baseUrl}/search`,
        {
          query,
          max_results: options.maxResults,
          search_depth: 'basic',
        },
        { headers: { Authorization: `Bearer ${apiKey}` }, timeoutMs },
      );
    } catch (error: unknown) {
      if (error instanceof HttpRequestError) {
        throw new SearchError(`Tavily search failed: ${error.message}`, {
          status: error.status,
          timedOut: error.timedOut,
          fatal:
            error.status !== undefined && FATAL_STATUSES.has(error.status),
        });
      }
      throw error;
    }

    const parsed = TavilySearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchError(
        `Tavily returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
      );
    }

    const results = parsed.data.results
      .slice(0, options.maxResults)
      .map(({ title, url, content, score, ...metadata }) => ({
        title,
        url,
        snippet: content,
        score,
        metadata,
      }));

    this.logger.debug(`Tavily: ${results.length} results for "${query.slice(0, 60)}"`);
    return results;
  }
}
