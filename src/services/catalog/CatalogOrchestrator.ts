/**
 * Catalog Orchestrator
 *
 * Cache-first resolution of artists and albums. A repository miss is filled
 * from the primary metadata source, then enriched concurrently by the
 * secondary sources and written back, so the next lookup costs nothing
 * upstream.
 *
 * Usage:
 *   const artist = await orchestrator.resolveArtist(mbid, { signal });
 *
 * Errors leaving this class are always one of ValidationError,
 * ResourceNotFoundError, UpstreamError (or RequestCancelledError) and
 * StoreError. Secondary sources never fail a lookup.
 */

import { logger } from '../../middleware/logging.js';
import {
  ErrorContext,
  ProviderNotFoundError,
  RequestCancelledError,
  ResourceNotFoundError,
  StoreError,
  UpstreamError,
  ValidationError,
} from '../../errors/index.js';
import { CATALOG } from '../../config/constants.js';
import { Repository } from '../../types/database.js';
import {
  Album,
  Artist,
  ArtistSearchResult,
  CatalogEntityKind,
  CatalogEntityMap,
  Review,
  Track,
} from '../../types/models.js';
import {
  BiographyProvider,
  PrimaryMetadataProvider,
  PrimaryReleaseGroup,
  ProviderRequestOptions,
  ReviewProvider,
} from '../../types/providers/index.js';
import { createErrorLogContext, getErrorMessage, toError } from '../../utils/errorHandling.js';
import { normalizePaging } from '../../utils/paging.js';
import { emptyReview, toAlbum, toAlbumSummary, toArtist } from './transforms.js';

export interface CatalogOrchestratorDeps {
  repository: Repository;
  primary: PrimaryMetadataProvider;
  /** Without one, artists resolve with an empty biography */
  biography?: BiographyProvider | undefined;
  /** Without one, albums resolve with an empty review */
  reviews?: ReviewProvider | undefined;
}

export type ResolveOptions = ProviderRequestOptions;

const SERVICE = 'CatalogOrchestrator';

const ENTITY_LABELS: Record<CatalogEntityKind, string> = {
  artist: 'Artist',
  album: 'Album',
};

export class CatalogOrchestrator {
  private readonly repository: Repository;
  private readonly primary: PrimaryMetadataProvider;
  private readonly biography: BiographyProvider | undefined;
  private readonly reviews: ReviewProvider | undefined;

  constructor(deps: CatalogOrchestratorDeps) {
    this.repository = deps.repository;
    this.primary = deps.primary;
    this.biography = deps.biography;
    this.reviews = deps.reviews;
  }

  /**
   * Artist by MusicBrainz id, with biography and album summaries
   */
  async resolveArtist(artistId: string, options: ResolveOptions = {}): Promise<Artist> {
    const id = this.requireId('artist', artistId, 'resolveArtist');
    const { signal } = options;
    throwIfCancelled(signal);

    const cached = await this.read('artist', id);
    if (cached) {
      if (cached.albums.length > 0) {
        logger.debug(`[${SERVICE}] Artist cache hit`, { artistId: id });
        return cached;
      }
      return this.backfillAlbums(cached, signal);
    }

    logger.info(`[${SERVICE}] Artist cache miss, fetching from providers`, { artistId: id });

    let artist: Artist;
    try {
      artist = toArtist(await this.primary.lookupArtist(id, { signal }));
    } catch (error) {
      throw this.primaryFailure(error, 'artist', id, 'lookupArtist', signal);
    }

    const [biography, albums] = await Promise.all([
      this.optional(
        'biography',
        id,
        async () => this.biography ? this.biography.getArtistBiography(artist.name, { signal }) : '',
        '',
        signal
      ),
      this.optional(
        'albums',
        id,
        async () => this.fetchAlbumSummaries(artist, signal),
        [],
        signal
      ),
    ]);

    artist.biography = biography;
    artist.albums = albums;

    throwIfCancelled(signal);
    await this.write('artist', artist);
    return artist;
  }

  /**
   * Album by MusicBrainz release-group id, with tracks and review
   */
  async resolveAlbum(albumId: string, options: ResolveOptions = {}): Promise<Album> {
    const id = this.requireId('album', albumId, 'resolveAlbum');
    const { signal } = options;
    throwIfCancelled(signal);

    const cached = await this.read('album', id);
    if (cached) {
      logger.debug(`[${SERVICE}] Album cache hit`, { albumId: id });
      return cached;
    }

    logger.info(`[${SERVICE}] Album cache miss, fetching from providers`, { albumId: id });

    let album: Album;
    try {
      album = toAlbum(await this.primary.lookupReleaseGroup(id, { signal }));
    } catch (error) {
      throw this.primaryFailure(error, 'album', id, 'lookupReleaseGroup', signal);
    }

    const [tracks, review] = await Promise.all([
      this.optional<Track[]>(
        'tracks',
        id,
        async () => this.primary.getReleaseGroupTracks(id, { signal }),
        [],
        signal
      ),
      this.optional<Review>(
        'review',
        id,
        async () => this.reviews
          ? this.reviews.getAlbumReview(album.artistName, album.title, { signal })
          : emptyReview(),
        emptyReview(),
        signal
      ),
    ]);

    album.tracks = tracks;
    album.review = review;

    throwIfCancelled(signal);
    await this.write('album', album);
    return album;
  }

  /**
   * Free-text artist search. Results come straight from the primary source
   * and are not cached.
   */
  async searchArtists(
    query: string,
    limit?: number,
    offset?: number,
    options: ResolveOptions = {}
  ): Promise<ArtistSearchResult> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError('Search query is required', {
        service: SERVICE,
        operation: 'searchArtists',
      });
    }

    const { signal } = options;
    throwIfCancelled(signal);
    const page = normalizePaging(limit, offset);

    try {
      return await this.primary.searchArtists(trimmed, page.limit, page.offset, { signal });
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw cancellation(error, { service: SERVICE, operation: 'searchArtists' });
      }
      throw new UpstreamError(
        `Artist search failed: ${getErrorMessage(error)}`,
        { service: SERVICE, operation: 'searchArtists', metadata: { query: trimmed, ...page } },
        toError(error)
      );
    }
  }

  /**
   * A cached artist stored before its albums were known. The listing is
   * fetched once more; failing that, the cached record is returned as is.
   */
  private async backfillAlbums(cached: Artist, signal: AbortSignal | undefined): Promise<Artist> {
    logger.debug(`[${SERVICE}] Cached artist has no albums, backfilling`, { artistId: cached.id });

    let albums: Album[];
    try {
      albums = await this.fetchAlbumSummaries(cached, signal);
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw cancellation(error, { service: SERVICE, operation: 'backfillAlbums', entityId: cached.id });
      }
      logger.warn(`[${SERVICE}] Album backfill failed`, createErrorLogContext(error, { artistId: cached.id }));
      return cached;
    }

    if (albums.length === 0) {
      return cached;
    }

    const enriched: Artist = { ...cached, albums };
    throwIfCancelled(signal);
    try {
      await this.repository.put('artist', enriched);
    } catch (error) {
      logger.warn(
        `[${SERVICE}] Could not save backfilled albums`,
        createErrorLogContext(error, { artistId: cached.id })
      );
    }
    return enriched;
  }

  private async fetchAlbumSummaries(artist: Artist, signal: AbortSignal | undefined): Promise<Album[]> {
    const groups: PrimaryReleaseGroup[] = await this.primary.getArtistReleaseGroups(
      artist.id,
      CATALOG.ARTIST_ALBUM_LIMIT,
      0,
      { signal }
    );
    return groups.map(group => toAlbumSummary(group, artist.id, artist.name));
  }

  /**
   * Run a secondary lookup. Failures become the fallback value and a
   * warning, unless the caller has gone away.
   */
  private async optional<T>(
    facet: string,
    entityId: string,
    fetch: () => Promise<T>,
    fallback: T,
    signal: AbortSignal | undefined
  ): Promise<T> {
    try {
      return await fetch();
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw cancellation(error, { service: SERVICE, operation: facet, entityId });
      }
      const level = error instanceof ProviderNotFoundError ? 'info' : 'warn';
      logger.log(level, `[${SERVICE}] ${facet} unavailable`, createErrorLogContext(error, { facet, entityId }));
      return fallback;
    }
  }

  private async read<K extends CatalogEntityKind>(kind: K, id: string): Promise<CatalogEntityMap[K] | null> {
    try {
      return await this.repository.get(kind, id);
    } catch (error) {
      throw new StoreError(
        `Failed to read ${kind} ${id}: ${getErrorMessage(error)}`,
        { service: SERVICE, operation: 'read', entityType: kind, entityId: id },
        toError(error)
      );
    }
  }

  private async write<K extends CatalogEntityKind>(kind: K, record: CatalogEntityMap[K]): Promise<void> {
    try {
      await this.repository.put(kind, record);
    } catch (error) {
      throw new StoreError(
        `Failed to save ${kind} ${record.id}: ${getErrorMessage(error)}`,
        { service: SERVICE, operation: 'write', entityType: kind, entityId: record.id },
        toError(error)
      );
    }
  }

  private requireId(kind: CatalogEntityKind, id: string, operation: string): string {
    const trimmed = id.trim();
    if (!trimmed) {
      throw new ValidationError(`${ENTITY_LABELS[kind]} id is required`, {
        service: SERVICE,
        operation,
        entityType: kind,
      });
    }
    return trimmed;
  }

  private primaryFailure(
    error: unknown,
    kind: CatalogEntityKind,
    id: string,
    operation: string,
    signal: AbortSignal | undefined
  ): Error {
    const context: ErrorContext = { service: SERVICE, operation, entityType: kind, entityId: id };

    if (isCancellation(error, signal)) {
      return cancellation(error, context);
    }
    if (error instanceof ProviderNotFoundError) {
      return new ResourceNotFoundError(ENTITY_LABELS[kind], id, undefined, context, error);
    }
    return new UpstreamError(
      `${ENTITY_LABELS[kind]} lookup failed for ${id}: ${getErrorMessage(error)}`,
      context,
      toError(error)
    );
  }
}

function isCancellation(error: unknown, signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true || error instanceof RequestCancelledError;
}

function cancellation(error: unknown, context: ErrorContext): RequestCancelledError {
  if (error instanceof RequestCancelledError) {
    return error;
  }
  return new RequestCancelledError(undefined, context, toError(error));
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}
