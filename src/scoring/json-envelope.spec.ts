import {
  extractJsonEnvelope,
  JsonEnvelopeError,
  parseJsonEnvelope,
} from './json-envelope';

describe('extractJsonEnvelope', () => {
  it('should discard prose around the object', () => {
    const text = 'Sure, here it is:\n{"score":55,"status":"YELLOW"}\nHope this helps!';
    expect(extractJsonEnvelope(text)).toBe('{"score":55,"status":"YELLOW"}');
  });

  it('should strip markdown code fences', () => {
    const text = '```json\n{"a":1}\n```';
    expect(extractJsonEnvelope(text)).toBe('{"a":1}');
  });

  it('should keep nested objects intact', () => {
    expect(extractJsonEnvelope('x {"a":{"b":1}} y')).toBe('{"a":{"b":1}}');
  });

  it('should throw when there is no opening brace', () => {
    expect(() => extractJsonEnvelope('I cannot help with that.')).toThrow(
      JsonEnvelopeError,
    );
  });

  it('should throw when the last closing brace precedes the first opening brace', () => {
    expect(() => extractJsonEnvelope('} oops {')).toThrow(
      'No JSON object found in response',
    );
  });
});

describe('parseJsonEnvelope', () => {
  it('should parse the enclosed object', () => {
    expect(parseJsonEnvelope('Result: {"evidence":["a","b"]} done')).toEqual({
      evidence: ['a', 'b'],
    });
  });

  it('should reject invalid JSON between the braces', () => {
    expect(() => parseJsonEnvelope('{score: 55}')).toThrow(/^Invalid JSON object:/);
  });

  it('should reject two objects separated by prose', () => {
    expect(() => parseJsonEnvelope('{"a":1} and then {"b":2}')).toThrow(
      JsonEnvelopeError,
    );
  });
});
