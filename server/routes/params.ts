/**
 * Query/body parsing helpers shared by the API routers.
 */

export class RequestValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export const MAX_INPUT_LENGTH = 10000;

/**
 * Positive integer from a query string value, clamped to `max`.
 * Absent or empty → fallback.
 */
export function parsePositiveInt(value: unknown, field: string, fallback: number, max: number): number {
  if (value === undefined || value === '') return fallback;
  const raw = typeof value === 'string' ? value.trim() : value;
  const parsed = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new RequestValidationError(`${field} must be a positive integer`, field, value);
  }
  return Math.min(parsed, max);
}

export function parseOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new RequestValidationError(`${field} must be a string`, field, value);
  }
  return value;
}

export function parseInput(body: unknown): string {
  const input = typeof body === 'object' && body !== null && 'input' in body ? body.input : undefined;
  if (typeof input !== 'string' || !input.trim()) {
    throw new RequestValidationError('input is required and must be a non-empty string', 'input', input);
  }
  if (input.length > MAX_INPUT_LENGTH) {
    throw new RequestValidationError(`input must be at most ${MAX_INPUT_LENGTH} characters`, 'input', input.length);
  }
  return input.trim();
}
