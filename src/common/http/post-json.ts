export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
}

/** Non-2xx status, timeout, connection failure or an unreadable body. */
export class HttpRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly timedOut = false,
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

function isAbort(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * POSTs a JSON body and resolves with the parsed JSON response. Single
 * attempt; the request is abandoned once `timeoutMs` elapses.
 */
export async function postJson(
  url: string,
  body: unknown,
  options: PostJsonOptions,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error: unknown) {
    if (isAbort(error)) {
      throw new HttpRequestError(
        `Request timed out after ${options.timeoutMs}ms`,
        undefined,
        true,
      );
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new HttpRequestError(`Request failed: ${message}`);
  }

  if (!response.ok) {
    const text = await response.text().catch(() => '');
    throw new HttpRequestError(
      `HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
      response.status,
    );
  }

  try {
    const parsed: unknown = await response.json();
    return parsed;
  } catch (error: unknown) {
    if (isAbort(error)) {
      throw new HttpRequestError(
        `Request timed out after ${options.timeoutMs}ms`,
        response.status,
        true,
      );
    }
    throw new HttpRequestError('Response body is not valid JSON', response.status);
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
