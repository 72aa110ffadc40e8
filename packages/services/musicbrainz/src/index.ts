// ABOUTME: MusicBrainz WS2 search client.
// ABOUTME: Searches artists, releases, release groups and tags and returns typed result pages.

export { MusicBrainzClient, formatUserAgent } from './client';
export { decodeSearchResponse, decodeErrorText } from './decode';
export { musicbrainzFetch, type MusicBrainzRequestOptions } from './fetch';
export { buildSearchParams, escapeLucene, formatPagingParam } from './params';
export type {
  Alias,
  Area,
  Artist,
  ArtistSearchResult,
  ClientConfig,
  CreditedArtist,
  EntityMap,
  EntityOf,
  Label,
  LabelInfo,
  LifeSpan,
  Medium,
  NameCredit,
  Release,
  ReleaseGroup,
  ReleaseGroupRef,
  ReleaseGroupSearchResult,
  ReleaseRef,
  ReleaseSearchResult,
  SearchParams,
  SearchResult,
  Tag,
  TagSearchResult,
  TextRepresentation,
} from './types';

export { ENTITY_KINDS, type EntityKind } from '@mbsearch/config';
export {
  AppError,
  DecodeError,
  ExternalApiError,
  RateLimitError,
  TimeoutError,
  TransportError,
  ValidationError,
  isAppError,
} from '@mbsearch/shared';
