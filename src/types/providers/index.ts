/**
 * Provider Types
 *
 * Central export for all provider-related types.
 */

// Capabilities
export * from './capabilities.js';

// Provider-specific types
export * from './musicbrainz.js';
export * from './wikipedia.js';
export * from './discogs.js';
