/**
 * JSON-over-HTTP for rate sources: per-attempt timeout, exponential backoff
 * on transient failures, and every failure mapped onto a FetchError kind.
 */

import { err, ok, type Result } from 'neverthrow';
import { FetchError, toError, type RateSourceName } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import type { RateLimiter } from './rate_limiter';
import type { RequestOptions } from './types';

const logger = createChildLogger('http');

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isAbortError(error: Error): boolean {
  return error.name === 'AbortError' || error.name === 'TimeoutError';
}

interface AttemptOutcome {
  result: Result<unknown, FetchError>;
  transient: boolean;
}

async function attempt(source: RateSourceName, url: string, timeoutMs: number): Promise<AttemptOutcome> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { accept: 'application/json' },
    });

    if (response.status === 429) {
      return {
        result: err(new FetchError('RateLimited', source, 'HTTP 429 Too Many Requests')),
        transient: true,
      };
    }
    if (!response.ok) {
      return {
        result: err(
          new FetchError('BadResponse', source, `HTTP ${response.status} ${response.statusText}`)
        ),
        transient: response.status >= 500,
      };
    }

    try {
      const body: unknown = await response.json();
      return { result: ok(body), transient: false };
    } catch (error) {
      return {
        result: err(
          new FetchError('BadResponse', source, 'Response body is not JSON', toError(error))
        ),
        transient: false,
      };
    }
  } catch (error) {
    const cause = toError(error);
    if (isAbortError(cause)) {
      return {
        result: err(new FetchError('Timeout', source, `No response within ${timeoutMs}ms`, cause)),
        transient: true,
      };
    }
    // Connection-level failure (DNS, reset); worth retrying.
    return {
      result: err(new FetchError('BadResponse', source, `Request failed: ${cause.message}`, cause)),
      transient: true,
    };
  } finally {
    clearTimeout(timeout);
  }
}

export async function fetchJson(
  source: RateSourceName,
  url: string,
  options: RequestOptions,
  limiter?: RateLimiter
): Promise<Result<unknown, FetchError>> {
  let last: FetchError | null = null;

  for (let attemptNo = 0; attemptNo <= options.maxRetries; attemptNo++) {
    const run = () => attempt(source, url, options.timeoutMs);
    const { result, transient } = limiter ? await limiter.schedule(run) : await run();
    if (result.isOk()) {
      return result;
    }

    last = result.error;
    if (!transient || attemptNo === options.maxRetries) {
      break;
    }

    const backoffMs = options.initialBackoffMs * Math.pow(2, attemptNo);
    logger.warn(
      { source, attempt: attemptNo, backoffMs, kind: last.kind, error: last.message },
      'Rate request failed, retrying'
    );
    await sleep(backoffMs);
  }

  return err(last ?? new FetchError('BadResponse', source, 'Request failed'));
}
