/**
 * Application-wide Constants
 *
 * Centralized location for magic numbers and tuning values.
 */

/**
 * Time durations in milliseconds
 */
export const TIME = {
  /** 1 minute */
  ONE_MINUTE: 60000,
  /** 5 minutes */
  FIVE_MINUTES: 300000,
} as const;

/**
 * Rate limiting configuration for inbound HTTP traffic
 */
export const RATE_LIMITS = {
  /** API rate limit window */
  API_WINDOW: TIME.ONE_MINUTE,
  /** Max API requests per window */
  API_MAX_REQUESTS: 300,
  /** Max IPs to track in rate limiter */
  MAX_TRACKED_IPS: 10000,
} as const;

/**
 * Paging and fan-out limits for catalog lookups
 */
export const CATALOG = {
  /** Default page size for artist search */
  SEARCH_DEFAULT_LIMIT: 25,
  /** Largest page MusicBrainz will return */
  SEARCH_MAX_LIMIT: 100,
  /** Release groups fetched when an artist is first resolved */
  ARTIST_ALBUM_LIMIT: 50,
} as const;

/**
 * Circuit breaker settings shared by provider clients
 */
export const CIRCUIT_BREAKER = {
  /** Consecutive failures before the circuit opens */
  THRESHOLD: 5,
  /** Time to wait before a recovery attempt */
  RESET_TIMEOUT: TIME.FIVE_MINUTES,
} as const;
