/**
 * Discogs API Client
 *
 * Community review data for albums: the closest release by free-text search,
 * then its community rating, collection counts and notes.
 *
 * Authentication is optional. A personal token is sent as a header; without
 * one, a consumer key and secret travel as query parameters.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { logger } from '../../../middleware/logging.js';
import { CircuitBreaker } from '../utils/CircuitBreaker.js';
import { convertToApplicationError, isBenignFailure } from '../utils/httpErrors.js';
import { ProviderNotFoundError, ValidationError } from '../../../errors/index.js';
import { CIRCUIT_BREAKER } from '../../../config/constants.js';
import { Review } from '../../../types/models.js';
import {
  DiscogsRelease,
  DiscogsSearchResponse,
  ProviderRequestOptions,
  ReviewProvider,
} from '../../../types/providers/index.js';

export interface DiscogsClientOptions {
  baseUrl?: string;
  userAgent?: string;
  token?: string | undefined;
  consumerKey?: string | undefined;
  consumerSecret?: string | undefined;
  timeoutMs?: number;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

const SEARCH_PAGE_SIZE = 5;

export class DiscogsClient implements ReviewProvider {
  private readonly client: AxiosInstance;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly authParams: Record<string, string>;

  constructor(options: DiscogsClientOptions = {}) {
    const baseUrl = (options.baseUrl || 'https://api.discogs.com').replace(/\/+$/, '');
    const token = options.token?.trim();

    this.authParams = !token && options.consumerKey && options.consumerSecret
      ? { key: options.consumerKey, secret: options.consumerSecret }
      : {};

    this.circuitBreaker = new CircuitBreaker({
      providerName: 'Discogs',
      threshold: CIRCUIT_BREAKER.THRESHOLD,
      resetTimeoutMs: CIRCUIT_BREAKER.RESET_TIMEOUT,
      isFailure: error => !isBenignFailure(error),
    });

    this.client = axios.create({
      baseURL: baseUrl,
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'User-Agent': options.userAgent || 'linernotes/1.0 (catalog service)',
        Accept: 'application/json',
        ...(token && { Authorization: `Discogs token=${token}` }),
      },
      ...(options.adapter && { adapter: options.adapter }),
    });

    logger.info('Discogs client initialized', {
      authentication: token ? 'token' : Object.keys(this.authParams).length > 0 ? 'key' : 'none',
    });
  }

  private async request<T>(
    endpoint: string,
    params: Record<string, string | number>,
    resourceId: string,
    options: ProviderRequestOptions = {}
  ): Promise<T> {
    return this.circuitBreaker.execute(async () => {
      try {
        const response = await this.client.get<T>(endpoint, {
          params: { ...params, ...this.authParams },
          ...(options.signal && { signal: options.signal }),
        });
        return response.data;
      } catch (error) {
        throw convertToApplicationError(error, {
          providerName: 'Discogs',
          service: 'DiscogsClient',
          endpoint,
          resourceId,
        });
      }
    });
  }

  /**
   * Review for the best-matching release of an album
   *
   * @throws {ProviderNotFoundError} when the search finds nothing
   */
  async getAlbumReview(
    artistName: string,
    albumTitle: string,
    options?: ProviderRequestOptions
  ): Promise<Review> {
    const query = `${artistName.trim()} ${albumTitle.trim()}`.trim();
    if (!query) {
      throw new ValidationError('Artist name or album title is required', {
        service: 'DiscogsClient',
        operation: 'getAlbumReview',
      });
    }

    const search = await this.request<DiscogsSearchResponse>(
      '/database/search',
      { q: query, type: 'release', per_page: SEARCH_PAGE_SIZE },
      query,
      options
    );

    const bestMatch = search.results?.[0];
    if (!bestMatch) {
      throw new ProviderNotFoundError('Discogs', query, `No Discogs release matches: ${query}`, {
        service: 'DiscogsClient',
        operation: 'getAlbumReview',
      });
    }

    const release = await this.request<DiscogsRelease>(
      `/releases/${bestMatch.id}`,
      {},
      String(bestMatch.id),
      options
    );

    return toReview(release);
  }
}

export function toReview(release: DiscogsRelease): Review {
  const review: Review = {
    source: 'Discogs',
    author: '',
    rating: 0,
    summary: '',
    text: '',
    url: `https://www.discogs.com/release/${release.id}`,
  };

  const community = release.community;
  const ratingCount = community?.rating?.count ?? 0;
  if (ratingCount > 0) {
    review.rating = community?.rating?.average ?? 0;
    review.summary = `Community rating based on ${ratingCount} user ratings`;
  }

  const notes = release.notes?.trim();
  if (notes) {
    review.text = notes;
    review.author = 'Community';
  }

  const have = community?.have ?? 0;
  const want = community?.want ?? 0;
  if (!review.summary && !review.text && (have > 0 || want > 0)) {
    review.summary = `Collected by ${have} users, wanted by ${want} users`;
  }

  return review;
}
