// Main entry point for @mbsearch/config

export * from './musicbrainz';
