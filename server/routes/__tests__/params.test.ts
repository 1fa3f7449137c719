import { describe, expect, it } from 'vitest';
import { MAX_INPUT_LENGTH, RequestValidationError, parseInput, parseOptionalString, parsePositiveInt } from '../params.js';

describe('parsePositiveInt', () => {
  it('falls back when absent', () => {
    expect(parsePositiveInt(undefined, 'limit', 50, 200)).toBe(50);
    expect(parsePositiveInt('', 'limit', 50, 200)).toBe(50);
  });

  it('parses and clamps', () => {
    expect(parsePositiveInt(' 20 ', 'limit', 50, 200)).toBe(20);
    expect(parsePositiveInt('1000', 'limit', 50, 200)).toBe(200);
  });

  it.each(['0', '-3', '2.5', 'ten', ['5']])('rejects %j', (value) => {
    expect(() => parsePositiveInt(value, 'limit', 50, 200)).toThrow(
      new RequestValidationError('limit must be a positive integer', 'limit', value)
    );
  });
});

describe('parseOptionalString', () => {
  it('returns strings and skips empty values', () => {
    expect(parseOptionalString('github', 'service')).toBe('github');
    expect(parseOptionalString('', 'service')).toBeUndefined();
    expect(parseOptionalString(undefined, 'service')).toBeUndefined();
  });

  it('rejects repeated query parameters', () => {
    expect(() => parseOptionalString(['a', 'b'], 'service')).toThrow('service must be a string');
  });
});

describe('parseInput', () => {
  it('returns the trimmed input', () => {
    expect(parseInput({ input: '  plan my week ' })).toBe('plan my week');
  });

  it.each([undefined, null, {}, { input: '   ' }, { input: 42 }])('rejects %j', (body) => {
    expect(() => parseInput(body)).toThrow('input is required and must be a non-empty string');
  });

  it('rejects oversized input', () => {
    expect(() => parseInput({ input: 'x'.repeat(MAX_INPUT_LENGTH + 1) })).toThrow(
      `input must be at most ${MAX_INPUT_LENGTH} characters`
    );
  });
});
