/**
 * CatalogOrchestrator Tests
 *
 * Cache-first resolution against in-memory providers and repository.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { CatalogOrchestrator } from '../../src/services/catalog/CatalogOrchestrator.js';
import {
  ProviderNotFoundError,
  ProviderServerError,
  RequestCancelledError,
  ResourceNotFoundError,
  StoreError,
  UpstreamError,
  ValidationError,
} from '../../src/errors/index.js';
import { Album, Review } from '../../src/types/models.js';
import {
  FakeBiographyProvider,
  FakePrimaryProvider,
  FakeReviewProvider,
  FlakyRepository,
  makePrimaryArtist,
  makeReleaseGroup,
} from '../utils/fakeProviders.js';
import { makeArtist } from '../utils/fixtures.js';

const EMPTY_REVIEW: Review = { source: '', author: '', rating: 0, summary: '', text: '', url: '' };

function summary(overrides: Partial<Album>): Album {
  return {
    id: 'album-1',
    title: 'Test Album',
    artistId: 'artist-1',
    artistName: 'Test Artist',
    primaryType: 'Album',
    secondaryTypes: [],
    firstReleaseDate: '2001-02-03',
    year: 2001,
    genre: '',
    label: '',
    tracks: [],
    review: EMPTY_REVIEW,
    coverUrl: '',
    ...overrides,
  };
}

describe('CatalogOrchestrator', () => {
  let repository: FlakyRepository;
  let primary: FakePrimaryProvider;
  let biography: FakeBiographyProvider;
  let reviews: FakeReviewProvider;
  let orchestrator: CatalogOrchestrator;

  beforeEach(() => {
    repository = new FlakyRepository();
    primary = new FakePrimaryProvider();
    biography = new FakeBiographyProvider();
    reviews = new FakeReviewProvider();
    orchestrator = new CatalogOrchestrator({ repository, primary, biography, reviews });

    primary.artists.set('artist-1', makePrimaryArtist());
    primary.artistReleaseGroups.set('artist-1', [
      makeReleaseGroup({
        id: 'album-1',
        title: 'First',
        artistCredits: [{ name: 'Guest Credit', artistId: 'someone-else', artistName: 'Someone Else' }],
      }),
      makeReleaseGroup({ id: 'album-2', title: 'Second', firstReleaseDate: '2005' }),
    ]);
    biography.biographies.set('Test Artist', 'Test Artist is a band.');
  });

  describe('resolveArtist', () => {
    it('should build, persist and return an artist on a cache miss', async () => {
      const artist = await orchestrator.resolveArtist('artist-1');

      expect(artist).toEqual({
        id: 'artist-1',
        name: 'Test Artist',
        biography: 'Test Artist is a band.',
        genres: ['rock', 'indie'],
        albums: [
          summary({ id: 'album-1', title: 'First' }),
          summary({ id: 'album-2', title: 'Second', firstReleaseDate: '2005', year: 2005 }),
        ],
        related: [],
        imageUrl: '',
        country: 'GB',
        type: 'Group',
        disambiguation: '',
        aliases: ['TA'],
        lifeSpan: { begin: '1990', end: '', ended: false },
      });
      await expect(repository.inner.get('artist', 'artist-1')).resolves.toEqual(artist);
    });

    it('should list the first 50 albums and look up the biography by display name', async () => {
      await orchestrator.resolveArtist('artist-1');

      const listing = primary.calls.find(call => call.method === 'getArtistReleaseGroups');
      expect(listing?.args).toEqual(['artist-1', 50, 0]);
      expect(biography.calls).toEqual(['Test Artist']);
    });

    it('should trim the id', async () => {
      const artist = await orchestrator.resolveArtist('  artist-1 ');

      expect(artist.id).toBe('artist-1');
      expect(primary.calls[0]?.args).toEqual(['artist-1']);
    });

    it('should serve the second lookup from the repository', async () => {
      const first = await orchestrator.resolveArtist('artist-1');
      const second = await orchestrator.resolveArtist('artist-1');

      expect(second).toEqual(first);
      expect(primary.callCount('lookupArtist')).toBe(1);
      expect(primary.callCount('getArtistReleaseGroups')).toBe(1);
    });

    it('should not let callers change cached records', async () => {
      const first = await orchestrator.resolveArtist('artist-1');
      first.name = 'Mutated';
      first.albums.pop();

      const second = await orchestrator.resolveArtist('artist-1');

      expect(second.name).toBe('Test Artist');
      expect(second.albums).toHaveLength(2);
    });

    it('should report a missing artist as not found and persist nothing', async () => {
      const error = await orchestrator.resolveArtist('missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResourceNotFoundError);
      expect(error instanceof ResourceNotFoundError && error.message).toBe('Artist not found: missing');
      expect(repository.writes).toBe(0);
    });

    it('should report other primary failures as upstream errors', async () => {
      const failure = new ProviderServerError('MusicBrainz', 503);
      primary.failures.set('lookupArtist', failure);

      const error = await orchestrator.resolveArtist('artist-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).not.toBeInstanceOf(RequestCancelledError);
      expect(error instanceof UpstreamError && error.cause).toBe(failure);
      expect(repository.writes).toBe(0);
    });

    it('should succeed with empty facets when secondary sources fail', async () => {
      biography.failure = new ProviderServerError('Wikipedia', 500);
      primary.failures.set('getArtistReleaseGroups', new ProviderServerError('MusicBrainz', 502));

      const artist = await orchestrator.resolveArtist('artist-1');

      expect(artist.biography).toBe('');
      expect(artist.albums).toEqual([]);
      await expect(repository.inner.get('artist', 'artist-1')).resolves.toEqual(artist);
    });

    it('should leave the biography empty when none is found', async () => {
      biography.biographies.clear();

      const artist = await orchestrator.resolveArtist('artist-1');

      expect(artist.biography).toBe('');
      expect(artist.albums).toHaveLength(2);
    });

    it('should resolve without a biography provider', async () => {
      const withoutBiography = new CatalogOrchestrator({ repository, primary });

      const artist = await withoutBiography.resolveArtist('artist-1');

      expect(artist.biography).toBe('');
      expect(biography.calls).toEqual([]);
    });

    it('should return a cached artist with albums without upstream calls', async () => {
      const cached = makeArtist();
      await repository.inner.put('artist', cached);

      await expect(orchestrator.resolveArtist('artist-1')).resolves.toEqual(cached);
      expect(primary.calls).toEqual([]);
    });

    it('should backfill albums of a cached artist that has none', async () => {
      await repository.inner.put('artist', makeArtist({ albums: [] }));

      const artist = await orchestrator.resolveArtist('artist-1');

      expect(primary.callCount('lookupArtist')).toBe(0);
      expect(artist.biography).toBe('Test Artist is a band.');
      expect(artist.albums.map(album => album.id)).toEqual(['album-1', 'album-2']);
      const stored = await repository.inner.get('artist', 'artist-1');
      expect(stored?.albums).toHaveLength(2);
    });

    it('should return the cached artist when the backfill fails', async () => {
      const cached = makeArtist({ albums: [] });
      await repository.inner.put('artist', cached);
      primary.failures.set('getArtistReleaseGroups', new ProviderServerError('MusicBrainz', 500));

      await expect(orchestrator.resolveArtist('artist-1')).resolves.toEqual(cached);
      expect(repository.writes).toBe(0);
    });

    it('should return the backfilled artist even when saving it fails', async () => {
      await repository.inner.put('artist', makeArtist({ albums: [] }));
      repository.failWrites = true;

      const artist = await orchestrator.resolveArtist('artist-1');

      expect(artist.albums).toHaveLength(2);
      expect(repository.writes).toBe(1);
    });

    it('should not save when the backfill finds no albums', async () => {
      await repository.inner.put('artist', makeArtist({ albums: [] }));
      primary.artistReleaseGroups.clear();

      const artist = await orchestrator.resolveArtist('artist-1');

      expect(artist.albums).toEqual([]);
      expect(repository.writes).toBe(0);
    });

    it('should reject an empty id before touching the repository', async () => {
      await expect(orchestrator.resolveArtist('   ')).rejects.toThrow(ValidationError);
      expect(repository.reads).toBe(0);
      expect(primary.calls).toEqual([]);
    });

    it('should report repository read failures as store errors without upstream calls', async () => {
      repository.failReads = true;

      await expect(orchestrator.resolveArtist('artist-1')).rejects.toThrow(StoreError);
      expect(primary.calls).toEqual([]);
    });

    it('should report repository write failures as store errors', async () => {
      repository.failWrites = true;

      await expect(orchestrator.resolveArtist('artist-1')).rejects.toThrow(StoreError);
    });

    it('should pass the caller signal to every upstream call', async () => {
      const controller = new AbortController();

      await orchestrator.resolveArtist('artist-1', { signal: controller.signal });

      expect(primary.calls.map(call => call.signal)).toEqual([controller.signal, controller.signal]);
    });

    it('should refuse to start with an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(orchestrator.resolveArtist('artist-1', { signal: controller.signal }))
        .rejects.toThrow(RequestCancelledError);
      expect(repository.reads).toBe(0);
    });

    it('should neither substitute empty facets nor persist after cancellation', async () => {
      const controller = new AbortController();
      biography.onCall = () => controller.abort();

      await expect(orchestrator.resolveArtist('artist-1', { signal: controller.signal }))
        .rejects.toThrow(RequestCancelledError);
      await expect(repository.inner.get('artist', 'artist-1')).resolves.toBeNull();
      expect(repository.writes).toBe(0);
    });
  });

  describe('resolveAlbum', () => {
    const review: Review = {
      source: 'Discogs',
      author: 'Community',
      rating: 4.5,
      summary: 'Community rating based on 12 user ratings',
      text: 'A classic.',
      url: 'https://www.discogs.com/release/1',
    };

    beforeEach(() => {
      primary.releaseGroups.set('rg-1', makeReleaseGroup({
        id: 'rg-1',
        title: 'Nevermind',
        firstReleaseDate: '1999-06-01',
        artistCredits: [{ name: 'Remote Artist', artistId: 'artist-1', artistName: '' }],
      }));
      primary.tracks.set('rg-1', [
        { number: 1, title: 'Opening', length: '5:01' },
        { number: 2, title: 'Closing', length: '' },
      ]);
      reviews.reviews.set('Remote Artist|Nevermind', review);
    });

    it('should build, persist and return an album on a cache miss', async () => {
      const album = await orchestrator.resolveAlbum('rg-1');

      expect(album).toEqual({
        id: 'rg-1',
        title: 'Nevermind',
        artistId: 'artist-1',
        artistName: 'Remote Artist',
        primaryType: 'Album',
        secondaryTypes: [],
        firstReleaseDate: '1999-06-01',
        year: 1999,
        genre: '',
        label: '',
        tracks: [
          { number: 1, title: 'Opening', length: '5:01' },
          { number: 2, title: 'Closing', length: '' },
        ],
        review,
        coverUrl: '',
      });
      expect(reviews.calls).toEqual([{ artistName: 'Remote Artist', albumTitle: 'Nevermind' }]);
      await expect(repository.inner.get('album', 'rg-1')).resolves.toEqual(album);
    });

    it('should use the first credit name when no credit links an artist', async () => {
      primary.releaseGroups.set('rg-2', makeReleaseGroup({
        id: 'rg-2',
        artistCredits: [
          { name: 'Printed Name', artistId: '', artistName: '' },
          { name: 'Second Name', artistId: '', artistName: '' },
        ],
      }));

      const album = await orchestrator.resolveAlbum('rg-2');

      expect(album.artistId).toBe('');
      expect(album.artistName).toBe('Printed Name');
    });

    it('should resolve with a zero review when none is found', async () => {
      reviews.reviews.clear();

      const album = await orchestrator.resolveAlbum('rg-1');

      expect(album.review).toEqual(EMPTY_REVIEW);
      expect(album.tracks).toHaveLength(2);
    });

    it('should resolve with no tracks when the listing fails', async () => {
      primary.failures.set('getReleaseGroupTracks', new ProviderServerError('MusicBrainz', 500));
      reviews.failure = new ProviderServerError('Discogs', 500);

      const album = await orchestrator.resolveAlbum('rg-1');

      expect(album.tracks).toEqual([]);
      expect(album.review).toEqual(EMPTY_REVIEW);
      expect(repository.writes).toBe(1);
    });

    it('should resolve without a review provider', async () => {
      const withoutReviews = new CatalogOrchestrator({ repository, primary, biography });

      const album = await withoutReviews.resolveAlbum('rg-1');

      expect(album.review).toEqual(EMPTY_REVIEW);
      expect(reviews.calls).toEqual([]);
    });

    it('should serve cached albums as stored, even without tracks', async () => {
      primary.tracks.clear();
      const first = await orchestrator.resolveAlbum('rg-1');
      expect(first.tracks).toEqual([]);

      primary.tracks.set('rg-1', [{ number: 1, title: 'Late', length: '1:00' }]);
      const second = await orchestrator.resolveAlbum('rg-1');

      expect(second).toEqual(first);
      expect(primary.callCount('lookupReleaseGroup')).toBe(1);
      expect(primary.callCount('getReleaseGroupTracks')).toBe(1);
    });

    it('should report a missing album as not found', async () => {
      await expect(orchestrator.resolveAlbum('nope')).rejects.toThrow('Album not found: nope');
      expect(repository.writes).toBe(0);
    });

    it('should report primary failures as upstream errors', async () => {
      primary.failures.set('lookupReleaseGroup', new Error('socket hang up'));

      await expect(orchestrator.resolveAlbum('rg-1'))
        .rejects.toThrow('Album lookup failed for rg-1: socket hang up');
    });

    it('should map a provider not-found failure to not found', async () => {
      primary.failures.set('lookupReleaseGroup', new ProviderNotFoundError('MusicBrainz', 'rg-1'));

      await expect(orchestrator.resolveAlbum('rg-1')).rejects.toThrow(ResourceNotFoundError);
    });

    it('should report write failures as store errors', async () => {
      repository.failWrites = true;

      await expect(orchestrator.resolveAlbum('rg-1')).rejects.toThrow(StoreError);
    });

    it('should reject an empty id', async () => {
      await expect(orchestrator.resolveAlbum('')).rejects.toThrow('Album id is required');
    });

    it('should surface a cancelled secondary call as cancellation', async () => {
      reviews.failure = new RequestCancelledError();

      await expect(orchestrator.resolveAlbum('rg-1')).rejects.toThrow(RequestCancelledError);
      expect(repository.writes).toBe(0);
    });
  });

  describe('searchArtists', () => {
    beforeEach(() => {
      primary.searchResult = {
        artists: [{
          id: 'artist-1',
          name: 'Test Artist',
          score: 100,
          country: 'GB',
          type: 'Group',
          disambiguation: '',
          aliases: [],
          lifeSpan: { begin: '', end: '', ended: false },
        }],
        count: 1,
        offset: 0,
      };
    });

    it('should pass the trimmed query with default paging', async () => {
      const result = await orchestrator.searchArtists('  test  ');

      expect(result).toEqual(primary.searchResult);
      expect(primary.calls[0]?.args).toEqual(['test', 25, 0]);
    });

    it('should clamp paging', async () => {
      await orchestrator.searchArtists('test', 0, -5);
      await orchestrator.searchArtists('test', 1000, 7);

      expect(primary.calls.map(call => call.args)).toEqual([
        ['test', 25, 0],
        ['test', 100, 7],
      ]);
    });

    it('should not cache results', async () => {
      await orchestrator.searchArtists('test');
      await orchestrator.searchArtists('test');

      expect(primary.callCount('searchArtists')).toBe(2);
      expect(repository.reads).toBe(0);
      expect(repository.writes).toBe(0);
    });

    it('should reject an empty query', async () => {
      await expect(orchestrator.searchArtists(' ')).rejects.toThrow(ValidationError);
      expect(primary.calls).toEqual([]);
    });

    it('should report provider failures as upstream errors', async () => {
      primary.failures.set('searchArtists', new ProviderServerError('MusicBrainz', 503));

      await expect(orchestrator.searchArtists('test')).rejects.toThrow(UpstreamError);
    });
  });
});
