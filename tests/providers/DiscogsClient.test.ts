/**
 * DiscogsClient Tests
 */

import { describe, it, expect } from '@jest/globals';
import { DiscogsClient, DiscogsClientOptions, toReview } from '../../src/services/providers/discogs/DiscogsClient.js';
import {
  ProviderNotFoundError,
  ProviderServerError,
  RateLimitError,
} from '../../src/errors/index.js';
import { createFakeTransport, FakeRoute } from './helpers.js';

const searchHit: FakeRoute = { data: { results: [{ id: 1234, type: 'release' }, { id: 99 }] } };

function createClient(routes: Record<string, FakeRoute>, options: DiscogsClientOptions = {}) {
  const transport = createFakeTransport(routes);
  const client = new DiscogsClient({ ...options, adapter: transport.adapter });
  return { client, transport };
}

describe('DiscogsClient', () => {
  describe('getAlbumReview', () => {
    it('should search releases and review the first match', async () => {
      const { client, transport } = createClient({
        '/database/search': searchHit,
        '/releases/1234': {
          data: {
            id: 1234,
            notes: 'Recorded live in one take.',
            community: { have: 10, want: 4, rating: { count: 8, average: 4.25 } },
          },
        },
      });

      const review = await client.getAlbumReview('Test Artist', 'Test Album');

      expect(transport.urls()).toEqual(['/database/search', '/releases/1234']);
      expect(transport.requests[0]?.params).toEqual({
        q: 'Test Artist Test Album',
        type: 'release',
        per_page: 5,
      });
      expect(review).toEqual({
        source: 'Discogs',
        author: 'Community',
        rating: 4.25,
        summary: 'Community rating based on 8 user ratings',
        text: 'Recorded live in one take.',
        url: 'https://www.discogs.com/release/1234',
      });
    });

    it('should send a personal token as a header', async () => {
      const { client, transport } = createClient(
        { '/database/search': searchHit, '/releases/1234': { data: { id: 1234 } } },
        { token: 'test-token', consumerKey: 'test-key', consumerSecret: 'test-secret' }
      );

      await client.getAlbumReview('Test Artist', 'Test Album');

      expect(transport.requests[0]?.header('Authorization')).toBe('Discogs token=test-token');
      expect(transport.requests[0]?.params).not.toHaveProperty('key');
    });

    it('should send consumer credentials as query parameters without a token', async () => {
      const { client, transport } = createClient(
        { '/database/search': searchHit, '/releases/1234': { data: { id: 1234 } } },
        { consumerKey: 'test-key', consumerSecret: 'test-secret' }
      );

      await client.getAlbumReview('Test Artist', 'Test Album');

      expect(transport.requests[0]?.header('Authorization')).toBeUndefined();
      expect(transport.requests[1]?.params).toEqual({ key: 'test-key', secret: 'test-secret' });
    });

    it('should send no credentials when only a key is configured', async () => {
      const { client, transport } = createClient(
        { '/database/search': searchHit, '/releases/1234': { data: { id: 1234 } } },
        { consumerKey: 'test-key' }
      );

      await client.getAlbumReview('Test Artist', 'Test Album');

      expect(transport.requests[1]?.params).toEqual({});
    });

    it('should report an empty search as ProviderNotFoundError', async () => {
      const { client, transport } = createClient({
        '/database/search': { data: { results: [] } },
      });

      await expect(client.getAlbumReview('Test Artist', 'Unknown')).rejects.toThrow(ProviderNotFoundError);
      expect(transport.requests).toHaveLength(1);
    });

    it('should report 429 as RateLimitError', async () => {
      const { client } = createClient({ '/database/search': { status: 429 } });

      await expect(client.getAlbumReview('Test Artist', 'Test Album')).rejects.toThrow(RateLimitError);
    });

    it('should report 401 as a provider error with status 401', async () => {
      const { client } = createClient({ '/database/search': { status: 401 } });

      const error = await client.getAlbumReview('Test Artist', 'Test Album').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderServerError);
      expect(error instanceof ProviderServerError && error.httpStatusCode).toBe(401);
    });
  });

  describe('toReview', () => {
    it('should summarize collection counts when unrated', () => {
      expect(toReview({ id: 7, community: { have: 3, want: 0, rating: { count: 0, average: 0 } } })).toEqual({
        source: 'Discogs',
        author: '',
        rating: 0,
        summary: 'Collected by 3 users, wanted by 0 users',
        text: '',
        url: 'https://www.discogs.com/release/7',
      });
    });

    it('should not summarize collection counts when notes are present', () => {
      const review = toReview({
        id: 9,
        notes: 'Liner notes',
        community: { have: 3, want: 1, rating: { count: 0, average: 0 } },
      });

      expect(review.summary).toBe('');
      expect(review.text).toBe('Liner notes');
      expect(review.author).toBe('Community');
    });

    it('should leave the summary empty without any community data', () => {
      const review = toReview({ id: 8, notes: '   ' });

      expect(review.summary).toBe('');
      expect(review.text).toBe('');
      expect(review.author).toBe('');
      expect(review.rating).toBe(0);
    });
  });
});
