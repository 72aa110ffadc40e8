// ABOUTME: MusicBrainz WS2 search result types for artists, releases, release groups and tags.
// ABOUTME: Mirrors the subset of the mmd-2.0 XML schema the client decodes.

import type { EntityKind } from '@mbsearch/config';
import type { TimeoutPreset } from '@mbsearch/shared';

export interface ClientConfig {
  /** Service root, e.g. https://musicbrainz.org/ws/2 */
  rootUrl: string;
  /** Sent as the User-Agent header on every request */
  userAgent: string;
  /** Milliseconds or a preset name. Omit to wait for the transport. */
  timeout?: number | TimeoutPreset;
}

/** Search term plus paging. -1 for limit or offset means "server default". */
export interface SearchParams {
  query: string;
  limit: number;
  offset: number;
}

export interface Tag {
  name: string;
  /** Relevance from the search server (ext:score), 0-100 */
  score?: number;
  /** Number of times the tag was applied, when nested inside another entity */
  count?: number;
}

export interface Area {
  id: string;
  name: string;
  sortName?: string;
}

export interface LifeSpan {
  begin?: string;
  end?: string;
  ended: boolean;
}

export interface Alias {
  name: string;
  sortName?: string;
  locale?: string;
  type?: string;
  primary: boolean;
}

export interface Artist {
  id: string;
  type?: string;
  score?: number;
  name: string;
  sortName?: string;
  gender?: string;
  country?: string;
  disambiguation?: string;
  area?: Area;
  beginArea?: Area;
  lifeSpan?: LifeSpan;
  aliases: Alias[];
  tags: Tag[];
}

/** Artist as it appears inside an artist credit */
export interface CreditedArtist {
  id: string;
  name: string;
  sortName?: string;
  disambiguation?: string;
}

export interface NameCredit {
  /** Credited name when it differs from the artist's own name */
  name?: string;
  joinPhrase?: string;
  artist: CreditedArtist;
}

export interface TextRepresentation {
  language?: string;
  script?: string;
}

export interface ReleaseGroupRef {
  id: string;
  type?: string;
  primaryType?: string;
  title?: string;
}

export interface Label {
  id: string;
  name: string;
}

export interface LabelInfo {
  catalogNumber?: string;
  label?: Label;
}

export interface Medium {
  format?: string;
  discCount: number;
  trackCount: number;
}

export interface Release {
  id: string;
  score?: number;
  title: string;
  status?: string;
  packaging?: string;
  disambiguation?: string;
  textRepresentation?: TextRepresentation;
  artistCredit: NameCredit[];
  releaseGroup?: ReleaseGroupRef;
  date?: string;
  country?: string;
  barcode?: string;
  asin?: string;
  labelInfo: LabelInfo[];
  media: Medium[];
  /** Sum of track counts over all media */
  trackCount: number;
  tags: Tag[];
}

export interface ReleaseRef {
  id: string;
  title: string;
  status?: string;
}

export interface ReleaseGroup {
  id: string;
  type?: string;
  score?: number;
  title: string;
  primaryType?: string;
  secondaryTypes: string[];
  disambiguation?: string;
  firstReleaseDate?: string;
  artistCredit: NameCredit[];
  releases: ReleaseRef[];
  tags: Tag[];
}

export interface EntityMap {
  artist: Artist;
  release: Release;
  'release-group': ReleaseGroup;
  tag: Tag;
}

export type EntityOf<K extends EntityKind> = EntityMap[K];

/** One page of search results for a single entity kind */
export interface SearchResult<K extends EntityKind> {
  kind: K;
  /** Server timestamp from the metadata root */
  created?: string;
  /** Total number of matches on the server, not the size of this page */
  count: number;
  offset: number;
  entities: EntityOf<K>[];
}

export type ArtistSearchResult = SearchResult<'artist'>;
export type ReleaseSearchResult = SearchResult<'release'>;
export type ReleaseGroupSearchResult = SearchResult<'release-group'>;
export type TagSearchResult = SearchResult<'tag'>;
