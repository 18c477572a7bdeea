import { createChildLogger } from '@findr/shared/src/logger.js';
import { RateLimitExhaustedError, UpstreamHttpError } from '@findr/shared/src/utils/errors.js';

const log = createChildLogger('http:rate-limit');

const DEFAULT_RETRY_AFTER_SECONDS = 1;
const MAX_ERROR_BODY_LENGTH = 200;

export type FetchFn = typeof fetch;
export type SleepFn = (ms: number) => Promise<void>;

export interface RateLimitPolicy {
  readonly maxRetries: number;
  readonly fetch?: FetchFn;
  readonly sleep?: SleepFn;
  readonly onRetry?: (attempt: number, delayMs: number) => void;
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** `Retry-After` in seconds; absent or non-numeric values fall back to one second. */
export function parseRetryAfterMs(header: string | null): number {
  if (header === null || header.trim() === '') {
    return DEFAULT_RETRY_AFTER_SECONDS * 1000;
  }
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return DEFAULT_RETRY_AFTER_SECONDS * 1000;
  }
  return seconds * 1000;
}

async function send(fetchFn: FetchFn, url: string, init: RequestInit): Promise<Response> {
  try {
    return await fetchFn(url, init);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new UpstreamHttpError(`Request to ${url} failed: ${cause.message}`, undefined, cause);
  }
}

/**
 * Issues the request and re-issues it after each 429, waiting for the
 * server's `Retry-After` hint, at most `maxRetries` times. The last response
 * is returned as-is, so an exhausted rate limit comes back as a 429.
 */
export async function fetchWithRateLimitRetry(
  url: string,
  init: RequestInit,
  policy: RateLimitPolicy,
): Promise<Response> {
  const fetchFn = policy.fetch ?? fetch;
  const wait = policy.sleep ?? sleep;

  let response = await send(fetchFn, url, init);
  let retries = 0;

  while (response.status === 429 && retries < policy.maxRetries) {
    const delayMs = parseRetryAfterMs(response.headers.get('Retry-After'));
    retries++;

    log.warn(
      { url, attempt: retries, maxRetries: policy.maxRetries, delayMs },
      'Rate limited, retrying',
    );
    policy.onRetry?.(retries, delayMs);

    await response.body?.cancel();
    await wait(delayMs);
    response = await send(fetchFn, url, init);
  }

  return response;
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const text = (await response.text()).trim();
    return text.length > MAX_ERROR_BODY_LENGTH ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}...` : text;
  } catch (error) {
    log.debug(
      { url: response.url, error: error instanceof Error ? error.message : String(error) },
      'Could not read error response body',
    );
    return '';
  }
}

export async function raiseForStatus(
  response: Response,
  url: string,
  retries: number,
): Promise<void> {
  if (response.ok) {
    return;
  }

  const detail = await readErrorDetail(response);
  const suffix = detail ? `: ${detail}` : '';

  if (response.status === 429) {
    throw new RateLimitExhaustedError(
      `429 Too Many Requests for url ${url} after ${String(retries)} retries${suffix}`,
      retries,
    );
  }

  throw new UpstreamHttpError(
    `${String(response.status)} ${response.statusText} for url ${url}${suffix}`,
    response.status,
  );
}
