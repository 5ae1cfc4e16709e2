import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { TavilyProvider } from './tavily.provider';
import { SearchError } from '../../common/errors/upstream.errors';

describe('TavilyProvider', () => {
  let provider: TavilyProvider;
  let fetchSpy: jest.SpyInstance<
    Promise<Response>,
    Parameters<typeof fetch>
  >;

  const config: Record<string, unknown> = {
    TAVILY_BASE_URL: 'https://tavily.test',
    SEARCH_TIMEOUT_MS: 1000,
  };

  const respond = (body: unknown, status = 200): void => {
    fetchSpy.mockResolvedValue(
      new Response(typeof body === 'string' ? body : JSON.stringify(body), {
        status,
      }),
    );
  };

  beforeEach(async () => {
    fetchSpy = jest.spyOn(global, 'fetch');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TavilyProvider,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, fallback?: unknown) => config[key] ?? fallback),
          },
        },
      ],
    }).compile();

    provider = module.get<TavilyProvider>(TavilyProvider);
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should send a basic-depth search capped at maxResults', async () => {
    respond({ results: [] });

    await provider.search('Is acme.io hiring for sales roles?', 'test-search-key', {
      maxResults: 3,
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://tavily.test/search');
    expect(init).toMatchObject({
      headers: { Authorization: 'Bearer test-search-key' },
      body: JSON.stringify({
        query: 'Is acme.io hiring for sales roles?',
        max_results: 3,
        search_depth: 'basic',
      }),
    });
  });

  it('should map results in provider order and keep extra fields as metadata', async () => {
    respond({
      query: 'q',
      results: [
        {
          title: 'Acme raises $25M',
          url: 'https://news.example.com/a',
          content: 'Series B led by Example Ventures.',
          score: 0.91,
          published_date: '2026-08-01',
        },
        {
          title: 'Acme careers',
          url: 'https://acme.io/careers',
          content: 'Open roles: Account Executive.',
        },
      ],
    });

    const results = await provider.search('q', 'test-search-key', { maxResults: 3 });

    expect(results).toEqual([
      {
        title: 'Acme raises $25M',
        url: 'https://news.example.com/a',
        snippet: 'Series B led by Example Ventures.',
        score: 0.91,
        metadata: { published_date: '2026-08-01' },
      },
      {
        title: 'Acme careers',
        url: 'https://acme.io/careers',
        snippet: 'Open roles: Account Executive.',
        metadata: {},
      },
    ]);
  });

  it('should never return more than maxResults items', async () => {
    respond({
      results: [1, 2, 3, 4, 5].map((n) => ({
        title: `Result ${n}`,
        url: `https://example.com/${n}`,
        content: '',
      })),
    });

    const results = await provider.search('q', 'test-search-key', { maxResults: 2 });

    expect(results.map((r) => r.title)).toEqual(['Result 1', 'Result 2']);
  });

  it('should treat a missing results array as no hits', async () => {
    respond({ answer: null });

    await expect(
      provider.search('q', 'test-search-key', { maxResults: 3 }),
    ).resolves.toEqual([]);
  });

  it.each([401, 403])('should mark status %i as fatal', async (status) => {
    respond('denied', status);

    const error: unknown = await provider
      .search('q', 'test-search-key', { maxResults: 3 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchError);
    expect(error).toMatchObject({ status, fatal: true });
  });

  it('should keep other failures non-fatal', async () => {
    respond('unavailable', 503);

    await expect(
      provider.search('q', 'test-search-key', { maxResults: 3 }),
    ).rejects.toMatchObject({
      message: 'Tavily search failed: HTTP 503: unavailable',
      fatal: false,
    });
  });

  it('should reject a body of the wrong shape', async () => {
    respond({ results: 'none' });

    await expect(
      provider.search('q', 'test-search-key', { maxResults: 3 }),
    ).rejects.toBeInstanceOf(SearchError);
  });
});
