/**
 * Wikipedia REST API Client
 *
 * Supplies artist biographies from page summaries. Ambiguous names are
 * retried with the suffixes Wikipedia uses for musicians.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { logger } from '../../../middleware/logging.js';
import { CircuitBreaker } from '../utils/CircuitBreaker.js';
import { convertToApplicationError, isBenignFailure } from '../utils/httpErrors.js';
import { ProviderNotFoundError, ValidationError } from '../../../errors/index.js';
import { CIRCUIT_BREAKER } from '../../../config/constants.js';
import {
  BiographyProvider,
  ProviderRequestOptions,
  WikipediaPageSummary,
} from '../../../types/providers/index.js';

export interface WikipediaClientOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

const TITLE_SUFFIXES = ['', ' (band)', ' (musician)', ' (singer)'];
const MAX_SENTENCES = 3;
const MAX_LENGTH = 500;

export class WikipediaClient implements BiographyProvider {
  private readonly client: AxiosInstance;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(options: WikipediaClientOptions = {}) {
    const baseUrl = (options.baseUrl || 'https://en.wikipedia.org/api/rest_v1').replace(/\/+$/, '');

    this.circuitBreaker = new CircuitBreaker({
      providerName: 'Wikipedia',
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
      },
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  /**
   * Biography for an artist: the plain name first, then each musician
   * suffix while the previous title was missing or a disambiguation page.
   *
   * @throws {ProviderNotFoundError} when no title yields an article
   */
  async getArtistBiography(artistName: string, options?: ProviderRequestOptions): Promise<string> {
    const name = artistName.trim();
    if (!name) {
      throw new ValidationError('Artist name is required', {
        service: 'WikipediaClient',
        operation: 'getArtistBiography',
      });
    }

    for (const suffix of TITLE_SUFFIXES) {
      const title = `${name}${suffix}`;
      try {
        const summary = await this.getPageSummary(title, options);
        if (summary.extract) {
          return cleanExtract(summary.extract);
        }
        // An article without an extract ends the search
        break;
      } catch (error) {
        if (!(error instanceof ProviderNotFoundError)) {
          throw error;
        }
        logger.debug('Wikipedia title not usable, trying next', { title });
      }
    }

    throw new ProviderNotFoundError('Wikipedia', name, `No Wikipedia biography for: ${name}`, {
      service: 'WikipediaClient',
      operation: 'getArtistBiography',
    });
  }

  private async getPageSummary(
    title: string,
    options: ProviderRequestOptions = {}
  ): Promise<WikipediaPageSummary> {
    const endpoint = `/page/summary/${encodeURIComponent(title)}`;

    const summary = await this.circuitBreaker.execute(async () => {
      try {
        const response = await this.client.get<WikipediaPageSummary>(endpoint, {
          ...(options.signal && { signal: options.signal }),
        });
        return response.data;
      } catch (error) {
        throw convertToApplicationError(error, {
          providerName: 'Wikipedia',
          service: 'WikipediaClient',
          endpoint,
          resourceId: title,
        });
      }
    });

    const extract = summary.extract ?? '';
    if (summary.type === 'disambiguation' || extract.toLowerCase().includes('may refer to')) {
      throw new ProviderNotFoundError('Wikipedia', title, `Disambiguation page: ${title}`, {
        service: 'WikipediaClient',
        operation: 'getPageSummary',
      });
    }

    return summary;
  }
}

/**
 * Tidy a summary extract for display: drop pronunciation and audio
 * parentheticals, collapse whitespace, then keep at most three sentences
 * and at most 500 characters, cutting on a sentence boundary.
 */
export function cleanExtract(extract: string): string {
  let cleaned = extract
    .replace(/^([^(]*?)\s*\([^)]*pronunciation[^)]*\)/i, '$1')
    .replace(/\s*\([^)]*listen[^)]*\)/gi, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (!cleaned) {
    return '';
  }

  const sentences = cleaned.split('. ');
  if (sentences.length > MAX_SENTENCES) {
    cleaned = `${sentences.slice(0, MAX_SENTENCES).join('. ')}.`;
  }

  if (cleaned.length <= MAX_LENGTH) {
    return cleaned;
  }

  let result = '';
  for (const part of cleaned.split('. ')) {
    const candidate = result ? `${result}. ${part}` : part;
    if (candidate.length + 1 > MAX_LENGTH) {
      break;
    }
    result = candidate;
  }

  if (!result) {
    // A single sentence longer than the limit: cut on a word boundary
    const cut = cleaned.slice(0, MAX_LENGTH - 3);
    const lastSpace = cut.lastIndexOf(' ');
    return `${lastSpace > 0 ? cut.slice(0, lastSpace) : cut}...`;
  }

  return result.endsWith('.') ? result : `${result}.`;
}
