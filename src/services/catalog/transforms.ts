import { Album, Artist, Review } from '../../types/models.js';
import {
  PrimaryArtist,
  PrimaryArtistCredit,
  PrimaryReleaseGroup,
} from '../../types/providers/index.js';

/**
 * The "no review found" value
 */
export function emptyReview(): Review {
  return { source: '', author: '', rating: 0, summary: '', text: '', url: '' };
}

/**
 * Year from the first four characters of a (possibly partial) ISO date,
 * 0 when they do not parse
 */
export function releaseYear(date: string): number {
  if (date.length < 4) {
    return 0;
  }
  const prefix = date.slice(0, 4);
  if (!/^\d{4}$/.test(prefix)) {
    return 0;
  }
  return Number.parseInt(prefix, 10);
}

function creditedArtist(credits: readonly PrimaryArtistCredit[]): PrimaryArtistCredit | undefined {
  return credits.find(credit => credit.artistId !== '');
}

export function primaryArtistId(credits: readonly PrimaryArtistCredit[]): string {
  return creditedArtist(credits)?.artistId ?? '';
}

/**
 * Display name of the credited artist; with no linked artist, the first
 * credit's printed name
 */
export function primaryArtistName(credits: readonly PrimaryArtistCredit[]): string {
  const credit = creditedArtist(credits);
  if (credit) {
    return credit.artistName || credit.name;
  }
  return credits[0]?.name ?? '';
}

export function toArtist(primary: PrimaryArtist): Artist {
  return {
    id: primary.id,
    name: primary.name,
    biography: '',
    genres: [...primary.tags],
    albums: [],
    related: [],
    imageUrl: '',
    country: primary.country,
    type: primary.type,
    disambiguation: primary.disambiguation,
    aliases: [...primary.aliases],
    lifeSpan: { ...primary.lifeSpan },
  };
}

export function toAlbum(group: PrimaryReleaseGroup): Album {
  return {
    id: group.id,
    title: group.title,
    artistId: primaryArtistId(group.artistCredits),
    artistName: primaryArtistName(group.artistCredits),
    primaryType: group.primaryType,
    secondaryTypes: [...group.secondaryTypes],
    firstReleaseDate: group.firstReleaseDate,
    year: releaseYear(group.firstReleaseDate),
    genre: '',
    label: '',
    tracks: [],
    review: emptyReview(),
    coverUrl: '',
  };
}

/**
 * Album entry embedded in an artist record: attributed to that artist,
 * without tracks or review
 */
export function toAlbumSummary(group: PrimaryReleaseGroup, artistId: string, artistName: string): Album {
  return {
    ...toAlbum(group),
    artistId,
    artistName,
  };
}
