// ABOUTME: Fetch wrapper for the MusicBrainz WS2 API.
// ABOUTME: Sends the identifying User-Agent, reads the whole body, and maps failures to AppErrors.

import {
  ExternalApiError,
  RateLimitError,
  TimeoutError,
  TransportError,
  fetchWithTimeout,
  parseIntSafe,
  type TimeoutPreset,
} from '@mbsearch/shared';
import { decodeErrorText } from './decode';

const SERVICE = 'MusicBrainz';

export interface MusicBrainzRequestOptions {
  userAgent: string;
  timeout?: number | TimeoutPreset;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * GET a MusicBrainz URL and return the response body as text.
 *
 * The body is always read to the end, so the connection is released before
 * the caller decodes it (or before a status error is thrown).
 *
 * @throws TransportError when no response arrives or the body cannot be read
 * @throws TimeoutError when the configured timeout elapses
 * @throws RateLimitError on 503, which MusicBrainz uses when throttling
 * @throws ExternalApiError on any other non-2xx status
 */
export async function musicbrainzFetch(
  url: string,
  options: MusicBrainzRequestOptions
): Promise<string> {
  console.log(`[MusicBrainz] Fetching: ${url}`);

  let response: Response;
  try {
    response = await fetchWithTimeout(url, {
      timeout: options.timeout,
      headers: {
        'User-Agent': options.userAgent,
        'Accept': 'application/xml',
      },
    });
  } catch (error) {
    if (error instanceof TimeoutError) {
      console.error(`[MusicBrainz] Timed out after ${error.timeoutMs}ms: ${url}`);
      throw error;
    }
    console.error(`[MusicBrainz] Request failed for ${url}:`, errorMessage(error));
    throw new TransportError(SERVICE, url, error);
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    console.error(`[MusicBrainz] Could not read response body for ${url}:`, errorMessage(error));
    throw new TransportError(SERVICE, url, error);
  }

  if (response.status === 503) {
    console.error('[MusicBrainz] 503 Service Unavailable - rate limited or down');
    throw new RateLimitError(SERVICE, parseIntSafe(response.headers.get('Retry-After') ?? undefined));
  }

  if (!response.ok) {
    const reason = decodeErrorText(body);
    console.error(`[MusicBrainz] API error: ${response.status} ${response.statusText}`);
    throw new ExternalApiError(
      SERVICE,
      `${response.status} ${response.statusText}${reason ? `: ${reason}` : ''}`,
      response.status
    );
  }

  return body;
}
