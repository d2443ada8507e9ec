/**
 * Daily Weather Archive — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';

// Error kinds
export * from './errors';

// Calendar dates
export * from './time';

// Geo-distance resolver
export * from './location';

// Fetching + normalization
export * from './ingest/fetcher';

// Completeness
export * from './completeness';

// Presentation + export
export * from './report';
export * from './export';
