import { describe, it, expect } from 'vitest';
import { safeAsync, safeSync } from '../result.js';
import { ProviderError, QueryCancelledError, ValidationError, isRetryableError } from '../errors.js';

describe('safeAsync', () => {
  it('wraps a resolved value', async () => {
    await expect(safeAsync(async () => 3)).resolves.toEqual({ ok: true, value: 3 });
  });

  it('captures rejections and synchronous throws', async () => {
    const rejected = await safeAsync(async () => {
      throw new Error('async');
    });
    const thrown = await safeAsync(() => {
      throw new Error('sync');
    });

    expect(rejected.ok ? undefined : rejected.error.message).toBe('async');
    expect(thrown.ok ? undefined : thrown.error.message).toBe('sync');
  });

  it('wraps non-Error throws', async () => {
    const result = await safeAsync(() => Promise.reject('text'));
    expect(result.ok ? undefined : result.error).toEqual(new Error('text'));
  });
});

describe('safeSync', () => {
  it('captures JSON parse failures', () => {
    expect(safeSync(() => JSON.parse('{"a":1}'))).toEqual({ ok: true, value: { a: 1 } });
    expect(safeSync(() => JSON.parse('{')).ok).toBe(false);
  });
});

describe('error hierarchy', () => {
  it('serializes details with the code', () => {
    const json = new ValidationError('query', 'non-empty question', '""').toJSON();
    expect(json).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Validation failed for query: expected non-empty question, got ""',
      retryable: false,
      details: { field: 'query', expected: 'non-empty question', received: '""' },
    });
  });

  it('reports retryability', () => {
    expect(isRetryableError(new ProviderError('ollama', 'network_error', true, 'down'))).toBe(true);
    expect(isRetryableError(new QueryCancelledError('plan'))).toBe(true);
    expect(isRetryableError(new ValidationError('f', 'e', 'r'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('formats as code and message', () => {
    expect(String(new QueryCancelledError('act'))).toBe('[QUERY_CANCELLED] Query cancelled before phase act');
  });
});
