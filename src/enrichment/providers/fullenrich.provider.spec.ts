import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { FullEnrichProvider } from './fullenrich.provider';
import { EnrichmentError } from '../../common/errors/upstream.errors';

describe('FullEnrichProvider', () => {
  let provider: FullEnrichProvider;
  let fetchSpy: jest.SpyInstance<
    Promise<Response>,
    Parameters<typeof fetch>
  >;

  const config: Record<string, unknown> = {
    FULLENRICH_BASE_URL: 'https://fullenrich.test/v1',
    ENRICHMENT_TIMEOUT_MS: 1000,
  };

  beforeEach(async () => {
    fetchSpy = jest.spyOn(global, 'fetch');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FullEnrichProvider,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, fallback?: unknown) => config[key] ?? fallback),
          },
        },
      ],
    }).compile();

    provider = module.get<FullEnrichProvider>(FullEnrichProvider);
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should POST the domain with a bearer token', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ name: 'Acme', employees: 240 }), {
        status: 200,
      }),
    );

    const record = await provider.enrich('acme.io', 'test-enrich-key');

    expect(record).toEqual({ name: 'Acme', employees: 240 });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://fullenrich.test/v1/company/enrich');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer test-enrich-key' },
      body: '{"domain":"acme.io"}',
    });
  });

  it('should turn a non-success status into an enrichment error', async () => {
    fetchSpy.mockResolvedValue(new Response('unauthorized', { status: 401 }));

    const error: unknown = await provider
      .enrich('acme.io', 'test-enrich-key')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EnrichmentError);
    expect(error).toMatchObject({
      message: 'FullEnrich API returned status 401',
      status: 401,
    });
  });

  it('should reject a body that is not an object', async () => {
    fetchSpy.mockResolvedValue(new Response('[1,2]', { status: 200 }));

    await expect(provider.enrich('acme.io', 'test-enrich-key')).rejects.toThrow(
      'FullEnrich returned a body that is not a JSON object',
    );
  });

  it('should mark timeouts', async () => {
    fetchSpy.mockRejectedValue(
      Object.assign(new Error('aborted'), { name: 'TimeoutError' }),
    );

    await expect(provider.enrich('acme.io', 'test-enrich-key')).rejects.toMatchObject({
      message: 'FullEnrich request failed: Request timed out after 1000ms',
      timedOut: true,
    });
  });
});
