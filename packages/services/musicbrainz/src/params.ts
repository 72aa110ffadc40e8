// ABOUTME: Query string construction for MusicBrainz search endpoints.
// ABOUTME: Maps the -1 sentinel to an empty parameter and validates paging values.

import { MUSICBRAINZ_CONFIG } from '@mbsearch/config';
import { ValidationError } from '@mbsearch/shared';
import type { SearchParams } from './types';

const { maxLimit, sentinel } = MUSICBRAINZ_CONFIG.search;

/**
 * Escape special Lucene query characters for MusicBrainz search.
 * Characters: + - && || ! ( ) { } [ ] ^ " ~ * ? : \ /
 *
 * @example
 * const query = `release:${escapeLucene('AC/DC Live')} AND artist:${escapeLucene('AC/DC')}`;
 */
export function escapeLucene(str: string): string {
  return str.replace(/[+\-&|!(){}[\]^"~*?:\\/]/g, '\\$&');
}

/**
 * Render a paging value. The sentinel becomes an empty string so the server
 * applies its own default.
 */
export function formatPagingParam(name: 'limit' | 'offset', value: number): string {
  if (value === sentinel) return '';

  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer or ${sentinel}`, {
      [name]: value,
    });
  }
  if (name === 'limit' && value > maxLimit) {
    console.log(`[MusicBrainz] limit ${value} is above ${maxLimit}; the server will cap it`);
  }
  return String(value);
}

/**
 * Build the query parameters for a search request, in the order
 * query, limit, offset.
 */
export function buildSearchParams({ query, limit, offset }: SearchParams): URLSearchParams {
  return new URLSearchParams([
    ['query', query],
    ['limit', formatPagingParam('limit', limit)],
    ['offset', formatPagingParam('offset', offset)],
  ]);
}
