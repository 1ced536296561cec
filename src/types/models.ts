/**
 * Catalog domain records
 *
 * These are the shapes persisted by the repository and returned over HTTP.
 * Optional provider facts are carried as empty strings or empty arrays,
 * never as undefined, so a cached record round-trips unchanged.
 */

export interface LifeSpan {
  begin: string;
  end: string;
  /** true with an empty `end` means the artist ended on an unknown date */
  ended: boolean;
}

/**
 * Community review of an album. All fields empty and rating 0 means no review
 * was found; that is a valid terminal state and is cached like any other.
 */
export interface Review {
  source: string;
  author: string;
  rating: number;
  summary: string;
  text: string;
  url: string;
}

export interface Track {
  /** 1-based position in the representative release */
  number: number;
  title: string;
  /** `M:SS`, or empty when the duration is unknown */
  length: string;
}

export interface Album {
  id: string;
  title: string;
  artistId: string;
  artistName: string;
  primaryType: string;
  secondaryTypes: string[];
  firstReleaseDate: string;
  year: number;
  genre: string;
  label: string;
  tracks: Track[];
  review: Review;
  coverUrl: string;
}

export interface Artist {
  id: string;
  name: string;
  biography: string;
  genres: string[];
  /** Album summaries: no tracks, empty review */
  albums: Album[];
  related: string[];
  imageUrl: string;
  country: string;
  type: string;
  disambiguation: string;
  aliases: string[];
  lifeSpan: LifeSpan;
}

export interface ArtistSearchHit {
  id: string;
  name: string;
  score: number;
  country: string;
  type: string;
  disambiguation: string;
  aliases: string[];
  lifeSpan: LifeSpan;
}

export interface ArtistSearchResult {
  artists: ArtistSearchHit[];
  count: number;
  offset: number;
}

export type CatalogEntityKind = 'artist' | 'album';

export interface CatalogEntityMap {
  artist: Artist;
  album: Album;
}
