// ABOUTME: MusicBrainz WS2 search client for artists, releases, release groups and tags.
// ABOUTME: Each search is one GET with the client's User-Agent, decoded from XML into a typed page.

import { MUSICBRAINZ_CONFIG, type EntityKind } from '@mbsearch/config';
import { DecodeError, ValidationError } from '@mbsearch/shared';
import { decodeSearchResponse } from './decode';
import { musicbrainzFetch } from './fetch';
import { buildSearchParams } from './params';
import type {
  ArtistSearchResult,
  ClientConfig,
  ReleaseGroupSearchResult,
  ReleaseSearchResult,
  SearchParams,
  SearchResult,
  TagSearchResult,
} from './types';

const { sentinel } = MUSICBRAINZ_CONFIG.search;

/**
 * Format a User-Agent the way MusicBrainz asks applications to identify themselves.
 *
 * @example
 * formatUserAgent('App', '1.0', 'a@b.com'); // "App/1.0 ( a@b.com )"
 */
export function formatUserAgent(application: string, version: string, contact: string): string {
  return `${application}/${version} ( ${contact} )`;
}

const DEFAULT_CONFIG: Readonly<ClientConfig> = Object.freeze({
  rootUrl: MUSICBRAINZ_CONFIG.rootUrl,
  userAgent: formatUserAgent(
    MUSICBRAINZ_CONFIG.clientInfo.application,
    MUSICBRAINZ_CONFIG.clientInfo.version,
    MUSICBRAINZ_CONFIG.clientInfo.contact
  ),
});

function createConfig(
  overrides: Partial<ClientConfig>,
  base: Readonly<ClientConfig>
): Readonly<ClientConfig> {
  const rootUrl = (overrides.rootUrl ?? base.rootUrl).replace(/\/+$/, '');

  let parsed: URL;
  try {
    parsed = new URL(rootUrl);
  } catch {
    throw new ValidationError(`rootUrl is not an absolute URL: ${rootUrl}`, { rootUrl });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`rootUrl must use http or https: ${rootUrl}`, { rootUrl });
  }

  return Object.freeze({
    rootUrl,
    userAgent: overrides.userAgent ?? base.userAgent,
    timeout: 'timeout' in overrides ? overrides.timeout : base.timeout,
  });
}

function searchUrl(config: Readonly<ClientConfig>, kind: EntityKind, params: SearchParams): string {
  return `${config.rootUrl}${MUSICBRAINZ_CONFIG.endpoints[kind]}?${buildSearchParams(params).toString()}`;
}

export class MusicBrainzClient {
  private current: Readonly<ClientConfig>;

  constructor(config: Partial<ClientConfig> = {}) {
    this.current = createConfig(config, DEFAULT_CONFIG);
  }

  /** The active configuration. Frozen; replaced wholesale by setClientInfo. */
  get config(): Readonly<ClientConfig> {
    return this.current;
  }

  /**
   * Identify the calling application. MusicBrainz throttles or blocks
   * anonymous-looking User-Agents, so call this before issuing real traffic.
   *
   * Requests already in flight keep the header they started with.
   */
  setClientInfo(application: string, version: string, contact: string): void {
    this.current = createConfig(
      { userAgent: formatUserAgent(application, version, contact) },
      this.current
    );
  }

  /**
   * The URL a search with these parameters would request.
   *
   * @throws ValidationError for a limit or offset that is neither -1 nor a non-negative integer
   */
  buildSearchUrl(kind: EntityKind, params: SearchParams): string {
    return searchUrl(this.current, kind, params);
  }

  /**
   * Search one entity kind.
   *
   * @param kind - Which endpoint to query
   * @param query - Lucene query; an empty string is sent as-is
   * @param limit - Page size (server accepts 1-100, defaults to 25), or -1 for the server default
   * @param offset - Index of the first result, or -1 for the server default
   */
  async search<K extends EntityKind>(
    kind: K,
    query: string,
    limit: number = sentinel,
    offset: number = sentinel
  ): Promise<SearchResult<K>> {
    const config = this.current;
    const url = searchUrl(config, kind, { query, limit, offset });
    const body = await musicbrainzFetch(url, {
      userAgent: config.userAgent,
      timeout: config.timeout,
    });

    try {
      return decodeSearchResponse(kind, body);
    } catch (error) {
      if (error instanceof DecodeError) {
        console.error(`[MusicBrainz] Could not decode ${kind} search response: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Search for artists. Without field qualifiers the server matches the
   * artist name, sort name and aliases.
   */
  searchArtist(query: string, limit: number = sentinel, offset: number = sentinel): Promise<ArtistSearchResult> {
    return this.search('artist', query, limit, offset);
  }

  /** Search for releases. Without field qualifiers the server matches the release title. */
  searchRelease(query: string, limit: number = sentinel, offset: number = sentinel): Promise<ReleaseSearchResult> {
    return this.search('release', query, limit, offset);
  }

  /** Search for release groups. Without field qualifiers the server matches the group title. */
  searchReleaseGroup(
    query: string,
    limit: number = sentinel,
    offset: number = sentinel
  ): Promise<ReleaseGroupSearchResult> {
    return this.search('release-group', query, limit, offset);
  }

  searchTag(query: string, limit: number = sentinel, offset: number = sentinel): Promise<TagSearchResult> {
    return this.search('tag', query, limit, offset);
  }
}
