// ABOUTME: Fetch utilities with optional timeout support for external API calls.
// ABOUTME: Turns aborted requests into TimeoutError so callers see one error family.

import { AppError } from './errors';

/**
 * Default timeouts for different service types (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Search and lookup APIs (10 seconds) */
  fast: 10_000,
  /** Large result pages on a busy server (30 seconds) */
  slow: 30_000,
  verySlow: 60_000,
} as const;

export type TimeoutPreset = keyof typeof DEFAULT_TIMEOUTS;

export interface FetchWithTimeoutOptions extends RequestInit {
  /** Timeout in milliseconds, or a preset name. Omit to wait for the transport. */
  timeout?: number | TimeoutPreset;
}

/**
 * Error thrown when a fetch request times out
 */
export class TimeoutError extends AppError {
  constructor(
    public url: string,
    public timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 'TIMEOUT_ERROR', {
      details: { url, timeoutMs },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Resolve timeout value from number or preset
 */
export function resolveTimeout(timeout: number | TimeoutPreset | undefined): number | undefined {
  if (timeout === undefined || typeof timeout === 'number') {
    return timeout;
  }
  return DEFAULT_TIMEOUTS[timeout];
}

/**
 * Fetch with an optional timeout.
 *
 * Uses AbortController to cancel requests that take too long. Without a
 * timeout the request runs until the runtime's own transport gives up.
 *
 * @example
 * // Using a preset
 * const response = await fetchWithTimeout('https://musicbrainz.org/ws/2/tag?query=jazz', {
 *   timeout: 'fast',
 * });
 *
 * @example
 * // Using custom timeout
 * const response = await fetchWithTimeout(url, { timeout: 5000 });
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const { timeout, ...fetchOptions } = options;
  const timeoutMs = resolveTimeout(timeout);

  if (timeoutMs === undefined) {
    return fetch(url.toString(), fetchOptions);
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url.toString(), {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(url.toString(), timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
