import { z } from 'zod';
import { Album, Artist } from '../types/models.js';
import { CATALOG } from '../config/constants.js';

/**
 * Catalog Validation Schemas
 *
 * Stored payloads are parsed back through these before they leave the
 * repository; request schemas validate the HTTP surface.
 */

const lifeSpanSchema = z.object({
  begin: z.string().default(''),
  end: z.string().default(''),
  ended: z.boolean().default(false),
});

const reviewSchema = z.object({
  source: z.string().default(''),
  author: z.string().default(''),
  rating: z.number().default(0),
  summary: z.string().default(''),
  text: z.string().default(''),
  url: z.string().default(''),
});

const trackSchema = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  length: z.string().default(''),
});

export const albumSchema: z.ZodType<Album, z.ZodTypeDef, unknown> = z.object({
  id: z.string().trim().min(1),
  title: z.string(),
  artistId: z.string().default(''),
  artistName: z.string().default(''),
  primaryType: z.string().default(''),
  secondaryTypes: z.array(z.string()).default([]),
  firstReleaseDate: z.string().default(''),
  year: z.number().int().default(0),
  genre: z.string().default(''),
  label: z.string().default(''),
  tracks: z.array(trackSchema).default([]),
  review: reviewSchema.default({}),
  coverUrl: z.string().default(''),
});

export const artistSchema: z.ZodType<Artist, z.ZodTypeDef, unknown> = z.object({
  id: z.string().trim().min(1),
  name: z.string(),
  biography: z.string().default(''),
  genres: z.array(z.string()).default([]),
  albums: z.array(albumSchema).default([]),
  related: z.array(z.string()).default([]),
  imageUrl: z.string().default(''),
  country: z.string().default(''),
  type: z.string().default(''),
  disambiguation: z.string().default(''),
  aliases: z.array(z.string()).default([]),
  lifeSpan: lifeSpanSchema.default({}),
});

/**
 * Path parameter for /artists/:id and /albums/:id
 */
export const entityIdParamSchema = z.object({
  id: z.string().trim().min(1, 'ID is required'),
});

/**
 * Query for /search. Unparseable or out-of-range paging values fall back to
 * the defaults instead of failing the request.
 */
export const searchQuerySchema = z.object({
  q: z.string({ required_error: 'Query parameter q is required' })
    .trim()
    .min(1, 'Query parameter q is required'),
  limit: z.coerce.number()
    .int()
    .min(1)
    .max(CATALOG.SEARCH_MAX_LIMIT)
    .catch(CATALOG.SEARCH_DEFAULT_LIMIT),
  offset: z.coerce.number()
    .int()
    .min(0)
    .catch(0),
});
