import { describe, it, expect } from '@jest/globals';
import { parseOrThrow } from '../../src/validation/parse.js';
import { actorNameSchema, movieInputSchema, catalogNameSchema, isEntityId } from '../../src/validation/catalogSchemas.js';
import { SchemaValidationError, ErrorCode } from '../../src/errors/index.js';

describe('parseOrThrow', () => {
  it('should return the parsed value', () => {
    expect(parseOrThrow(actorNameSchema, '  Tom Hanks  ', { service: 'test' })).toBe('Tom Hanks');
  });

  it('should convert zod issues into SchemaValidationError', () => {
    let caught: unknown;
    try {
      parseOrThrow(
        movieInputSchema,
        {
          title: '',
          releaseYear: 2023,
          director: '',
          writer: '',
          producer: '',
          cinematographer: '',
          budget: 10,
          country: '',
          actorIds: [-1],
          genreIds: [],
        },
        { service: 'MovieStore', operation: 'create' }
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaValidationError);
    if (caught instanceof SchemaValidationError) {
      expect(caught.code).toBe(ErrorCode.VALIDATION_SCHEMA_MISMATCH);
      expect(caught.errors).toEqual([
        { path: 'title', message: 'Title can not be empty' },
        { path: 'actorIds.0', message: 'ID must be a positive integer' },
      ]);
      expect(caught.message).toBe('title: Title can not be empty; actorIds.0: ID must be a positive integer');
      expect(caught.context.operation).toBe('create');
    }
  });

  it('should accept only plain catalog names', () => {
    expect(catalogNameSchema.safeParse('my-movies_2').success).toBe(true);
    expect(catalogNameSchema.safeParse('movies.db').success).toBe(false);
    expect(catalogNameSchema.safeParse('../movies').success).toBe(false);
  });
});

describe('isEntityId', () => {
  it('should accept only positive integers', () => {
    expect(isEntityId(1)).toBe(true);
    expect(isEntityId(0)).toBe(false);
    expect(isEntityId(-1)).toBe(false);
    expect(isEntityId(1.5)).toBe(false);
    expect(isEntityId(Number.NaN)).toBe(false);
  });
});
