import { FetchError, errorMessage } from '../errors';
import { DEFAULT_USER_AGENT } from '../db/queries/settings';

export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

export interface FetchPageOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * GET a product page and return its body.
 * @throws FetchError on a non-2xx response, a timeout or a network failure
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        'User-Agent': options.userAgent || DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9'
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs)
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new FetchError(`Request timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw new FetchError(errorMessage(error), { cause: error });
  }

  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, {
      status: response.status
    });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(`Failed to read response body: ${errorMessage(error)}`, { cause: error });
  }
}
