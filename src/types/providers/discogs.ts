/**
 * Discogs API Response Types
 * @see https://www.discogs.com/developers
 */

export interface DiscogsRating {
  count?: number;
  average?: number;
}

export interface DiscogsCommunityStats {
  have?: number;
  want?: number;
  rating?: DiscogsRating;
  data_quality?: string;
}

export interface DiscogsSearchItem {
  id: number;
  type?: string;
  title?: string;
  master_id?: number;
  resource_url?: string;
  year?: string;
  country?: string;
  genre?: string[];
  style?: string[];
  label?: string[];
}

export interface DiscogsSearchResponse {
  results?: DiscogsSearchItem[];
}

export interface DiscogsArtist {
  id?: number;
  name?: string;
}

export interface DiscogsRelease {
  id: number;
  title?: string;
  artists?: DiscogsArtist[];
  community?: DiscogsCommunityStats;
  notes?: string;
}
