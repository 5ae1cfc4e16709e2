export class JsonEnvelopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JsonEnvelopeError';
  }
}

/**
 * Returns the span from the first `{` to the last `}` of a model response.
 * Prose or code fences around the object are discarded; anything between the
 * braces is kept verbatim.
 */
export function extractJsonEnvelope(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) {
    throw new JsonEnvelopeError('No JSON object found in response');
  }
  return text.slice(start, end + 1);
}

export function parseJsonEnvelope(text: string): unknown {
  const envelope = extractJsonEnvelope(text);
  try {
    const parsed: unknown = JSON.parse(envelope);
    return parsed;
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : 'parse failure';
    throw new JsonEnvelopeError(`Invalid JSON object: ${reason}`);
  }
}
