import { HttpRequestError, isPlainObject, postJson } from './post-json';

describe('postJson', () => {
  let fetchSpy: jest.SpyInstance<
    Promise<Response>,
    Parameters<typeof fetch>
  >;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should POST the JSON body and return the parsed response', async () => {
    fetchSpy.mockResolvedValue(
      new Response(JSON.stringify({ name: 'Acme' }), { status: 200 }),
    );

    const body = await postJson(
      'https://api.test/company',
      { domain: 'acme.io' },
      { headers: { Authorization: 'Bearer test-key' }, timeoutMs: 1000 },
    );

    expect(body).toEqual({ name: 'Acme' });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://api.test/company');
    expect(init).toMatchObject({
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-key',
      },
      body: '{"domain":"acme.io"}',
    });
  });

  it('should reject non-2xx responses with the status and body', async () => {
    fetchSpy.mockResolvedValue(new Response('quota exceeded', { status: 429 }));

    const error: unknown = await postJson('https://api.test', {}, { timeoutMs: 1000 }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(HttpRequestError);
    expect(error).toMatchObject({
      message: 'HTTP 429: quota exceeded',
      status: 429,
      timedOut: false,
    });
  });

  it('should report aborted requests as timed out', async () => {
    fetchSpy.mockRejectedValue(
      Object.assign(new Error('The operation was aborted'), { name: 'TimeoutError' }),
    );

    await expect(
      postJson('https://api.test', {}, { timeoutMs: 250 }),
    ).rejects.toMatchObject({
      message: 'Request timed out after 250ms',
      timedOut: true,
    });
  });

  it('should wrap connection failures', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      postJson('https://api.test', {}, { timeoutMs: 1000 }),
    ).rejects.toMatchObject({ message: 'Request failed: fetch failed', timedOut: false });
  });

  it('should reject a body that is not JSON', async () => {
    fetchSpy.mockResolvedValue(new Response('<html></html>', { status: 200 }));

    await expect(
      postJson('https://api.test', {}, { timeoutMs: 1000 }),
    ).rejects.toMatchObject({ message: 'Response body is not valid JSON', status: 200 });
  });
});

describe('isPlainObject', () => {
  it.each([
    [{ a: 1 }, true],
    [[], false],
    [null, false],
    ['text', false],
  ])('should classify %p as %p', (value, expected) => {
    expect(isPlainObject(value)).toBe(expected);
  });
});
