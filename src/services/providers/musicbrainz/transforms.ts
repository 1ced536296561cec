import { ArtistSearchHit, Track } from '../../../types/models.js';
import {
  MusicBrainzArtistCredit,
  MusicBrainzArtistDetail,
  MusicBrainzArtistSearchResult,
  MusicBrainzLifeSpan,
  MusicBrainzReleaseDetail,
  MusicBrainzReleaseGroupDetail,
  MusicBrainzReleaseSummary,
  MusicBrainzTag,
  PrimaryArtist,
  PrimaryArtistCredit,
  PrimaryReleaseGroup,
} from '../../../types/providers/index.js';

/**
 * Format a duration in milliseconds as `M:SS`.
 * Unknown or non-positive durations format as an empty string.
 */
export function formatTrackLength(ms: number | null | undefined): string {
  if (!ms || ms <= 0) {
    return '';
  }
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

/**
 * The first release with status exactly "Official", otherwise the first
 * release listed.
 */
export function selectRepresentativeRelease<T extends Pick<MusicBrainzReleaseSummary, 'status'>>(
  releases: readonly T[]
): T | undefined {
  return releases.find(release => release.status === 'Official') ?? releases[0];
}

/**
 * Merge genres and tags, most-voted first, dropping case-insensitive repeats
 */
export function collectTags(...lists: Array<MusicBrainzTag[] | undefined>): string[] {
  const merged = lists
    .flatMap(list => list ?? [])
    .filter(tag => tag.name.trim().length > 0)
    .sort((a, b) => (b.count ?? 0) - (a.count ?? 0));

  const seen = new Set<string>();
  const names: string[] = [];
  for (const tag of merged) {
    const name = tag.name.trim();
    const key = name.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      names.push(name);
    }
  }
  return names;
}

function toLifeSpan(span: MusicBrainzLifeSpan | undefined): PrimaryArtist['lifeSpan'] {
  return {
    begin: span?.begin ?? '',
    end: span?.end ?? '',
    ended: span?.ended ?? false,
  };
}

function aliasNames(data: MusicBrainzArtistDetail): string[] {
  return (data.aliases ?? [])
    .map(alias => alias.name.trim())
    .filter(name => name.length > 0);
}

export function toPrimaryArtist(data: MusicBrainzArtistDetail): PrimaryArtist {
  return {
    id: data.id,
    name: data.name,
    country: data.country ?? '',
    type: data.type ?? '',
    disambiguation: data.disambiguation ?? '',
    aliases: aliasNames(data),
    tags: collectTags(data.genres, data.tags),
    lifeSpan: toLifeSpan(data['life-span']),
  };
}

export function toArtistSearchHit(data: MusicBrainzArtistSearchResult): ArtistSearchHit {
  return {
    id: data.id,
    name: data.name,
    score: data.score ?? 0,
    country: data.country ?? '',
    type: data.type ?? '',
    disambiguation: data.disambiguation ?? '',
    aliases: aliasNames(data),
    lifeSpan: toLifeSpan(data['life-span']),
  };
}

function toCredit(credit: MusicBrainzArtistCredit): PrimaryArtistCredit {
  return {
    name: credit.name ?? '',
    artistId: credit.artist?.id ?? '',
    artistName: credit.artist?.name ?? '',
  };
}

export function toPrimaryReleaseGroup(data: MusicBrainzReleaseGroupDetail): PrimaryReleaseGroup {
  return {
    id: data.id,
    title: data.title,
    primaryType: data['primary-type'] ?? '',
    secondaryTypes: [...(data['secondary-types'] ?? [])],
    firstReleaseDate: data['first-release-date'] ?? '',
    artistCredits: (data['artist-credit'] ?? []).map(toCredit),
  };
}

/**
 * Flatten all media of a release into one track list numbered from 1
 */
export function toTracks(release: MusicBrainzReleaseDetail): Track[] {
  const media = [...(release.media ?? [])].sort((a, b) => (a.position ?? 0) - (b.position ?? 0));

  const tracks: Track[] = [];
  for (const medium of media) {
    for (const track of medium.tracks ?? []) {
      tracks.push({
        number: tracks.length + 1,
        title: track.title || track.recording?.title || '',
        length: formatTrackLength(track.length ?? track.recording?.length),
      });
    }
  }
  return tracks;
}
