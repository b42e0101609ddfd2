import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';
import { GenreStore } from '../../src/stores/GenreStore.js';
import { ResourceInUseError, SchemaValidationError } from '../../src/errors/index.js';
import { genresEqual } from '../../src/types/models.js';

describe('GenreStore', () => {
  let testDb: TestDatabase;
  let store: GenreStore;

  beforeEach(async () => {
    testDb = await createTestDatabase(['Action', 'Adventure', 'Comedy']);
    store = new GenreStore(testDb.getConnection());
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('readAll', () => {
    it('should return the seeded genres ordered by id', async () => {
      expect(await store.readAll()).toEqual([
        { id: 1, name: 'Action' },
        { id: 2, name: 'Adventure' },
        { id: 3, name: 'Comedy' },
      ]);
    });
  });

  describe('getById', () => {
    it('should return the genre with the given id', async () => {
      expect(await store.getById(2)).toEqual({ id: 2, name: 'Adventure' });
    });

    it('should return null for non-existent genre', async () => {
      expect(await store.getById(42)).toBeNull();
    });
  });

  describe('getByName', () => {
    it('should find a genre by exact name', async () => {
      expect(await store.getByName('Comedy')).toEqual({ id: 3, name: 'Comedy' });
    });

    it('should return null when no genre has the name', async () => {
      expect(await store.getByName('Western')).toBeNull();
    });
  });

  describe('create / update / delete', () => {
    it('should create a genre after the seeded ones', async () => {
      const id = await store.create(' Western ');

      expect(id).toBe(4);
      expect(await store.getById(id)).toEqual({ id: 4, name: 'Western' });
    });

    it('should reject an empty genre name', async () => {
      await expect(store.create('')).rejects.toThrow(SchemaValidationError);
    });

    it('should rename an existing genre', async () => {
      expect(await store.update({ id: 1, name: 'Action & Adventure' })).toBe(true);
      expect(await store.getById(1)).toEqual({ id: 1, name: 'Action & Adventure' });
    });

    it('should return false when renaming a non-existent genre', async () => {
      expect(await store.update({ id: 42, name: 'Noir' })).toBe(false);
      expect(await store.update({ id: 0, name: 'Noir' })).toBe(false);
    });

    it('should return false when deleting zero or negative ids', async () => {
      expect(await store.delete(0)).toBe(false);
      expect(await store.delete(-1)).toBe(false);
      expect(await store.readAll()).toHaveLength(3);
    });

    it('should delete an unused genre', async () => {
      expect(await store.delete(3)).toBe(true);
      expect(await store.getById(3)).toBeNull();
      expect(await store.delete(3)).toBe(false);
    });

    it('should reject deleting a genre that a movie carries', async () => {
      const db = testDb.getConnection();
      const movie = await db.execute("INSERT INTO movies (title) VALUES ('Tagged')");
      await db.execute('INSERT INTO movie_genres (movie_id, genre_id) VALUES (?, 1)', [movie.insertId ?? 0]);

      await expect(store.delete(1)).rejects.toThrow(ResourceInUseError);
      expect(await store.getById(1)).toEqual({ id: 1, name: 'Action' });
    });
  });

  describe('genresEqual', () => {
    it('should compare id and name together', async () => {
      const action = await store.getById(1);
      if (!action) {
        throw new Error('seeded genre missing');
      }

      expect(genresEqual(action, { id: 1, name: 'Action' })).toBe(true);
      expect(genresEqual(action, { id: 1, name: 'Adventure' })).toBe(false);
      expect(genresEqual(action, { id: 2, name: 'Action' })).toBe(false);
    });
  });
});
