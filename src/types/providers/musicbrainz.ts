/**
 * MusicBrainz API Response Types
 * Based on MusicBrainz API v2 documentation
 * @see https://musicbrainz.org/doc/MusicBrainz_API
 */

// ============================================
// Shared fragments
// ============================================

export interface MusicBrainzLifeSpan {
  begin?: string | null;
  end?: string | null;
  ended?: boolean | null;
}

export interface MusicBrainzAlias {
  name: string;
  'sort-name'?: string;
  locale?: string | null;
  type?: string | null;
  primary?: boolean | null;
}

/** Genres and folksonomy tags share a shape */
export interface MusicBrainzTag {
  name: string;
  count?: number;
}

export interface MusicBrainzArtistCredit {
  name?: string;
  joinphrase?: string;
  artist?: {
    id?: string;
    name?: string;
    'sort-name'?: string;
    disambiguation?: string;
  };
}

// ============================================
// Artist
// ============================================

export interface MusicBrainzArtistDetail {
  id: string;
  name: string;
  'sort-name'?: string;
  disambiguation?: string;
  type?: string | null;
  country?: string | null;
  'life-span'?: MusicBrainzLifeSpan;
  aliases?: MusicBrainzAlias[];
  genres?: MusicBrainzTag[];
  tags?: MusicBrainzTag[];
}

export interface MusicBrainzArtistSearchResult extends MusicBrainzArtistDetail {
  score?: number;
}

export interface MusicBrainzArtistsSearchResponse {
  artists?: MusicBrainzArtistSearchResult[];
  count?: number;
  offset?: number;
  created?: string;
}

// ============================================
// Release groups and releases
// ============================================

export interface MusicBrainzReleaseSummary {
  id: string;
  title?: string;
  status?: string | null;
  date?: string;
}

export interface MusicBrainzReleaseGroupDetail {
  id: string;
  title: string;
  disambiguation?: string;
  'primary-type'?: string | null;
  'secondary-types'?: string[];
  'first-release-date'?: string;
  'artist-credit'?: MusicBrainzArtistCredit[];
  releases?: MusicBrainzReleaseSummary[];
}

export interface MusicBrainzReleaseGroupBrowseResponse {
  'release-groups'?: MusicBrainzReleaseGroupDetail[];
  'release-group-count'?: number;
  'release-group-offset'?: number;
}

export interface MusicBrainzTrack {
  id?: string;
  position?: number;
  number?: string;
  title?: string;
  length?: number | null;
  recording?: {
    id?: string;
    title?: string;
    length?: number | null;
  };
}

export interface MusicBrainzMedium {
  position?: number;
  format?: string;
  tracks?: MusicBrainzTrack[];
}

export interface MusicBrainzReleaseDetail {
  id: string;
  title?: string;
  status?: string | null;
  date?: string;
  media?: MusicBrainzMedium[];
}
