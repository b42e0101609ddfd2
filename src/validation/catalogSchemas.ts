import { z } from 'zod';

/**
 * Catalog Validation Schemas
 *
 * Zod schemas checked at the store boundary before anything reaches SQL
 */

/**
 * Store-assigned row id
 */
export const entityIdSchema = z.number().int('ID must be an integer').positive('ID must be a positive integer');

/**
 * Whether `id` could name a stored row; anything else matches nothing
 */
export function isEntityId(id: unknown): id is number {
  return entityIdSchema.safeParse(id).success;
}

/**
 * Actor and genre names are stored trimmed
 */
export const actorNameSchema = z.string().trim().min(1, 'Actor name can not be empty').max(255);

export const genreNameSchema = z.string().trim().min(1, 'Genre name can not be empty').max(100);

export const actorSchema = z.object({
  id: entityIdSchema,
  name: actorNameSchema,
});

export const genreSchema = z.object({
  id: entityIdSchema,
  name: genreNameSchema,
});

/**
 * Movie as submitted for create()
 */
export const movieInputSchema = z.object({
  title: z.string().max(500).refine(title => title.trim().length > 0, 'Title can not be empty'),
  releaseYear: z.number().int('Release year must be an integer'),
  director: z.string().max(255),
  writer: z.string().max(255),
  producer: z.string().max(255),
  cinematographer: z.string().max(255),
  budget: z.number().int('Budget must be an integer').nonnegative('Budget can not be negative'),
  country: z.string().max(100),
  actorIds: z.array(entityIdSchema),
  genreIds: z.array(entityIdSchema),
});

/**
 * Persisted movie as submitted for update()
 */
export const movieSchema = movieInputSchema.extend({
  id: entityIdSchema,
});

/**
 * Catalog names become database file names, so path separators and dots are rejected
 */
export const catalogNameSchema = z
  .string()
  .min(1, 'Catalog name is required')
  .max(100)
  .regex(/^[A-Za-z0-9_-]+$/, 'Catalog name may only contain letters, digits, "_" and "-"');
