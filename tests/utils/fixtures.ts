/**
 * Catalog record builders for tests
 */

import { Album, Artist } from '../../src/types/models.js';

export function makeAlbum(overrides: Partial<Album> = {}): Album {
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
    tracks: [{ number: 1, title: 'Opening', length: '3:30' }],
    review: { source: '', author: '', rating: 0, summary: '', text: '', url: '' },
    coverUrl: '',
    ...overrides,
  };
}

export function makeArtist(overrides: Partial<Artist> = {}): Artist {
  return {
    id: 'artist-1',
    name: 'Test Artist',
    biography: 'Test Artist is a band.',
    genres: ['rock'],
    albums: [makeAlbum({ tracks: [] })],
    related: [],
    imageUrl: '',
    country: 'GB',
    type: 'Group',
    disambiguation: '',
    aliases: [],
    lifeSpan: { begin: '1990', end: '', ended: false },
    ...overrides,
  };
}
