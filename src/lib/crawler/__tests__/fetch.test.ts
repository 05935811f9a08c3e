import { afterEach, describe, expect, it, vi } from 'vitest';
import { fetchPage } from '../fetch';
import { FetchError } from '../../errors';

async function fetchError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error('Expected a FetchError');
}

describe('fetchPage', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the body and sends the configured user agent', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const body = await fetchPage('https://shop.example.com/item', { userAgent: 'test-agent', timeoutMs: 50 });

    expect(body).toBe('<html>ok</html>');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://shop.example.com/item',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent' })
      })
    );
  });

  it('reports non-2xx responses with status and text', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('nope', { status: 404, statusText: 'Not Found' }))
    );

    const error = await fetchError(fetchPage('https://shop.example.com/missing'));

    expect(error.message).toBe('HTTP 404: Not Found');
    expect(error.status).toBe(404);
  });

  it('reports network failures with the underlying message', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    const error = await fetchError(fetchPage('https://shop.example.com/item'));

    expect(error.message).toBe('fetch failed');
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it('reports timeouts', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(timeout));

    const error = await fetchError(fetchPage('https://shop.example.com/slow', { timeoutMs: 50 }));

    expect(error.message).toBe('Request timed out after 50ms');
  });
});
