// Centralized configuration for the MusicBrainz WS2 search service

export const MUSICBRAINZ_CONFIG = {
  rootUrl: 'https://musicbrainz.org/ws/2',

  // Sent until the caller identifies itself with setClientInfo
  clientInfo: {
    application: 'mbsearch',
    version: '0.1.0',
    contact: 'mbsearch@example.com',
  },

  search: {
    maxLimit: 100, // Larger limits are capped by the server; it defaults to 25
    sentinel: -1, // "Let the server decide" for limit and offset
  },

  endpoints: {
    artist: '/artist',
    release: '/release',
    'release-group': '/release-group',
    tag: '/tag',
  },

  // Element wrapping the results for each endpoint
  listElements: {
    artist: 'artist-list',
    release: 'release-list',
    'release-group': 'release-group-list',
    tag: 'tag-list',
  },
} as const;

export type EntityKind = keyof typeof MUSICBRAINZ_CONFIG.endpoints;

export const ENTITY_KINDS: readonly EntityKind[] = ['artist', 'release', 'release-group', 'tag'];
