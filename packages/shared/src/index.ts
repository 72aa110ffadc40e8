// Main entry point for @mbsearch/shared

export * from './utils/errors';
export * from './utils/fetch';
export * from './utils/xml';
