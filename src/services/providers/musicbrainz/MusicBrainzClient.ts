/**
 * MusicBrainz API Client
 *
 * Authoritative source for artist identity, release groups and track
 * listings. MusicBrainz asks clients for a descriptive User-Agent with
 * contact details and allows one request per second.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { logger } from '../../../middleware/logging.js';
import { CircuitBreaker } from '../utils/CircuitBreaker.js';
import { RateLimiter } from '../utils/RateLimiter.js';
import { convertToApplicationError, isBenignFailure } from '../utils/httpErrors.js';
import { ValidationError } from '../../../errors/index.js';
import { CIRCUIT_BREAKER, CATALOG } from '../../../config/constants.js';
import { normalizePaging } from '../../../utils/paging.js';
import { ArtistSearchResult, Track } from '../../../types/models.js';
import {
  MusicBrainzArtistDetail,
  MusicBrainzArtistsSearchResponse,
  MusicBrainzReleaseDetail,
  MusicBrainzReleaseGroupBrowseResponse,
  MusicBrainzReleaseGroupDetail,
  PrimaryArtist,
  PrimaryMetadataProvider,
  PrimaryReleaseGroup,
  ProviderRequestOptions,
} from '../../../types/providers/index.js';
import {
  selectRepresentativeRelease,
  toArtistSearchHit,
  toPrimaryArtist,
  toPrimaryReleaseGroup,
  toTracks,
} from './transforms.js';

export interface MusicBrainzClientOptions {
  appName: string;
  appVersion: string;
  contact: string;
  baseUrl?: string;
  timeoutMs?: number;
  requestsPerSecond?: number;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

type QueryParams = Record<string, string | number>;

// `inc` values are space-separated; axios encodes the space as '+'
const ARTIST_INCLUDES = ['aliases', 'genres', 'tags'].join(' ');
const RELEASE_GROUP_INCLUDES = ['artists', 'releases'].join(' ');

export class MusicBrainzClient implements PrimaryMetadataProvider {
  private readonly client: AxiosInstance;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly rateLimiter: RateLimiter;
  private readonly baseUrl: string;

  constructor(options: MusicBrainzClientOptions) {
    const contact = options.contact.trim();
    if (!contact) {
      throw new ValidationError('MusicBrainz contact is required', {
        service: 'MusicBrainzClient',
        operation: 'constructor',
      });
    }

    this.baseUrl = (options.baseUrl || 'https://musicbrainz.org/ws/2').replace(/\/+$/, '');
    const userAgent = `${options.appName || 'linernotes'}/${options.appVersion || 'dev'} ( ${contact} )`;

    this.circuitBreaker = new CircuitBreaker({
      providerName: 'MusicBrainz',
      threshold: CIRCUIT_BREAKER.THRESHOLD,
      resetTimeoutMs: CIRCUIT_BREAKER.RESET_TIMEOUT,
      isFailure: error => !isBenignFailure(error),
    });

    this.rateLimiter = new RateLimiter({
      requestsPerSecond: options.requestsPerSecond ?? 1,
    });

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 6000,
      headers: {
        'User-Agent': userAgent,
        Accept: 'application/json',
      },
      ...(options.adapter && { adapter: options.adapter }),
    });

    logger.info('MusicBrainz client initialized', {
      baseUrl: this.baseUrl,
      userAgent,
    });
  }

  /**
   * Rate-limited GET through the circuit breaker
   */
  private async request<T>(
    endpoint: string,
    params: QueryParams,
    resourceId: string,
    options: ProviderRequestOptions = {}
  ): Promise<T> {
    return this.circuitBreaker.execute(() =>
      this.rateLimiter.execute(async () => {
        try {
          const response = await this.client.get<T>(endpoint, {
            params: { fmt: 'json', ...params },
            ...(options.signal && { signal: options.signal }),
          });
          return response.data;
        } catch (error) {
          throw convertToApplicationError(error, {
            providerName: 'MusicBrainz',
            service: 'MusicBrainzClient',
            endpoint,
            resourceId,
          });
        }
      }, options.signal)
    );
  }

  private requireId(value: string, field: string, operation: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
      throw new ValidationError(`MusicBrainz ${field} is required`, {
        service: 'MusicBrainzClient',
        operation,
        metadata: { field },
      });
    }
    return trimmed;
  }

  /**
   * Get artist details including aliases, genres and tags
   */
  async lookupArtist(id: string, options?: ProviderRequestOptions): Promise<PrimaryArtist> {
    const mbid = this.requireId(id, 'artist id', 'lookupArtist');
    const data = await this.request<MusicBrainzArtistDetail>(
      `/artist/${encodeURIComponent(mbid)}`,
      { inc: ARTIST_INCLUDES },
      mbid,
      options
    );
    return toPrimaryArtist(data);
  }

  /**
   * Get a release group (album) with its artist credits
   */
  async lookupReleaseGroup(id: string, options?: ProviderRequestOptions): Promise<PrimaryReleaseGroup> {
    const mbid = this.requireId(id, 'release group id', 'lookupReleaseGroup');
    const data = await this.request<MusicBrainzReleaseGroupDetail>(
      `/release-group/${encodeURIComponent(mbid)}`,
      { inc: RELEASE_GROUP_INCLUDES },
      mbid,
      options
    );
    return toPrimaryReleaseGroup(data);
  }

  /**
   * Search artists by free text
   */
  async searchArtists(
    query: string,
    limit: number = CATALOG.SEARCH_DEFAULT_LIMIT,
    offset: number = 0,
    options?: ProviderRequestOptions
  ): Promise<ArtistSearchResult> {
    const term = this.requireId(query, 'search query', 'searchArtists');
    const page = normalizePaging(limit, offset);

    const data = await this.request<MusicBrainzArtistsSearchResponse>(
      '/artist',
      { query: term, limit: page.limit, offset: page.offset },
      term,
      options
    );

    return {
      artists: (data.artists ?? []).map(toArtistSearchHit),
      count: data.count ?? 0,
      offset: data.offset ?? page.offset,
    };
  }

  /**
   * Browse an artist's albums and EPs
   */
  async getArtistReleaseGroups(
    artistId: string,
    limit: number = CATALOG.SEARCH_DEFAULT_LIMIT,
    offset: number = 0,
    options?: ProviderRequestOptions
  ): Promise<PrimaryReleaseGroup[]> {
    const mbid = this.requireId(artistId, 'artist id', 'getArtistReleaseGroups');
    const page = normalizePaging(limit, offset);

    const data = await this.request<MusicBrainzReleaseGroupBrowseResponse>(
      '/release-group',
      { artist: mbid, type: 'album|ep', limit: page.limit, offset: page.offset },
      mbid,
      options
    );

    return (data['release-groups'] ?? []).map(toPrimaryReleaseGroup);
  }

  /**
   * Track listing of the group's representative release
   */
  async getReleaseGroupTracks(releaseGroupId: string, options?: ProviderRequestOptions): Promise<Track[]> {
    const mbid = this.requireId(releaseGroupId, 'release group id', 'getReleaseGroupTracks');

    const group = await this.request<MusicBrainzReleaseGroupDetail>(
      `/release-group/${encodeURIComponent(mbid)}`,
      { inc: 'releases' },
      mbid,
      options
    );

    const release = selectRepresentativeRelease(group.releases ?? []);
    if (!release) {
      logger.debug('Release group has no releases', { releaseGroupId: mbid });
      return [];
    }

    const detail = await this.request<MusicBrainzReleaseDetail>(
      `/release/${encodeURIComponent(release.id)}`,
      { inc: 'recordings' },
      release.id,
      options
    );

    return toTracks(detail);
  }
}
