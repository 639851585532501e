/**
 * Unit tests for the axios adapter
 * @module @loadramp/runtime/tests/unit/http-adapter
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@loadramp/shared';

import { HttpAdapter, HttpAdapterError } from '../../src/adapters/http-adapter';

describe('HttpAdapterError', () => {
  it('maps timeouts and cancellation to their error codes', () => {
    expect(new HttpAdapterError('slow', { isTimeout: true }).code).toBe(ErrorCode.TIMEOUT);
    expect(new HttpAdapterError('stop', { isCancelled: true }).code).toBe(ErrorCode.CANCELLED);
    expect(new HttpAdapterError('HTTP 502: Bad Gateway', { status: 502 })).toMatchObject({
      code: ErrorCode.UNKNOWN,
      status: 502,
      isTimeout: false,
      isNetworkError: false,
    });
  });
});

describe('HttpAdapter', () => {
  it('rejects an aborted request as cancelled', async () => {
    const adapter = new HttpAdapter({ baseUrl: 'http://127.0.0.1:9', timeout: 1000 });
    const abort = new AbortController();
    abort.abort();

    const failure = adapter.get('/metrics', { signal: abort.signal });

    await expect(failure).rejects.toBeInstanceOf(HttpAdapterError);
    await expect(failure).rejects.toMatchObject({ isCancelled: true, code: ErrorCode.CANCELLED });
  });
});
