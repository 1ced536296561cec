/**
 * Provider Capability Contracts
 *
 * The catalog orchestrator depends only on these interfaces. Each external
 * source implements one of them; tests substitute in-memory fakes.
 *
 * A lookup signals "the entity does not exist" by rejecting with
 * ProviderNotFoundError. Any other rejection is a transport or server
 * failure.
 */

import { ArtistSearchResult, LifeSpan, Review, Track } from '../models.js';

export interface ProviderRequestOptions {
  /** Aborts the in-flight HTTP request when the caller goes away */
  signal?: AbortSignal;
}

/**
 * Artist facts as reported by the primary source
 */
export interface PrimaryArtist {
  id: string;
  name: string;
  country: string;
  type: string;
  disambiguation: string;
  aliases: string[];
  /** Genre and tag names, most-voted first, without duplicates */
  tags: string[];
  lifeSpan: LifeSpan;
}

export interface PrimaryArtistCredit {
  /** Name as printed on the release */
  name: string;
  artistId: string;
  artistName: string;
}

export interface PrimaryReleaseGroup {
  id: string;
  title: string;
  primaryType: string;
  secondaryTypes: string[];
  firstReleaseDate: string;
  artistCredits: PrimaryArtistCredit[];
}

export interface PrimaryMetadataProvider {
  lookupArtist(id: string, options?: ProviderRequestOptions): Promise<PrimaryArtist>;

  lookupReleaseGroup(id: string, options?: ProviderRequestOptions): Promise<PrimaryReleaseGroup>;

  searchArtists(
    query: string,
    limit: number,
    offset: number,
    options?: ProviderRequestOptions
  ): Promise<ArtistSearchResult>;

  getArtistReleaseGroups(
    artistId: string,
    limit: number,
    offset: number,
    options?: ProviderRequestOptions
  ): Promise<PrimaryReleaseGroup[]>;

  /** Tracks of the group's representative release, numbered from 1 */
  getReleaseGroupTracks(releaseGroupId: string, options?: ProviderRequestOptions): Promise<Track[]>;
}

export interface BiographyProvider {
  getArtistBiography(artistName: string, options?: ProviderRequestOptions): Promise<string>;
}

export interface ReviewProvider {
  getAlbumReview(
    artistName: string,
    albumTitle: string,
    options?: ProviderRequestOptions
  ): Promise<Review>;
}
