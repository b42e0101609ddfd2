import { describe, it, expect, afterEach } from '@jest/globals';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';
import { CatalogSchema } from '../../src/database/CatalogSchema.js';
import { DEFAULT_GENRES } from '../../src/config/defaults.js';

describe('CatalogSchema', () => {
  let testDb: TestDatabase;

  afterEach(async () => {
    await testDb.destroy();
  });

  it('should create the catalog tables and the actor name index', async () => {
    testDb = await createTestDatabase();

    const objects = await testDb.getConnection().query<{ type: string; name: string }>(
      "SELECT type, name FROM sqlite_master WHERE name NOT LIKE 'sqlite_%' ORDER BY type, name"
    );

    expect(objects).toEqual([
      { type: 'index', name: 'idx_actor_name' },
      { type: 'table', name: 'actors' },
      { type: 'table', name: 'genres' },
      { type: 'table', name: 'movie_actors' },
      { type: 'table', name: 'movie_genres' },
      { type: 'table', name: 'movies' },
    ]);
  });

  it('should seed the given genres in order', async () => {
    testDb = await createTestDatabase(['Action', 'Adventure', 'Comedy']);

    const genres = await testDb.getConnection().query<{ id: number; name: string }>(
      'SELECT id, name FROM genres ORDER BY id'
    );

    expect(genres).toEqual([
      { id: 1, name: 'Action' },
      { id: 2, name: 'Adventure' },
      { id: 3, name: 'Comedy' },
    ]);
  });

  it('should seed the default genre list', async () => {
    testDb = await createTestDatabase(DEFAULT_GENRES);

    expect(await testDb.countRows('genres')).toBe(21);
  });

  it('should be safe to run again on an initialized database', async () => {
    testDb = await createTestDatabase(['Action', 'Comedy']);
    const db = testDb.getConnection();
    await db.execute("INSERT INTO actors (name) VALUES ('Kept')");

    await CatalogSchema.initialize(db, ['Drama', 'Horror', 'War']);

    expect(await testDb.countRows('genres')).toBe(2);
    expect(await testDb.countRows('actors')).toBe(1);
  });

  it('should skip seeding when genres already exist', async () => {
    testDb = await createTestDatabase(['Action']);

    expect(await CatalogSchema.seedGenres(testDb.getConnection(), ['Drama'])).toBe(0);
  });

  it('should cascade junction rows when a movie row is deleted directly', async () => {
    testDb = await createTestDatabase(['Action']);
    const db = testDb.getConnection();
    const [actorId] = await testDb.seedActors(['Cascade']);
    const movie = await db.execute("INSERT INTO movies (title) VALUES ('Gone')");
    const movieId = movie.insertId ?? 0;
    await db.execute('INSERT INTO movie_actors (movie_id, actor_id) VALUES (?, ?)', [movieId, actorId]);
    await db.execute('INSERT INTO movie_genres (movie_id, genre_id) VALUES (?, 1)', [movieId]);

    await db.execute('DELETE FROM movies WHERE id = ?', [movieId]);

    expect(await testDb.countRows('movie_actors')).toBe(0);
    expect(await testDb.countRows('movie_genres')).toBe(0);
  });
});
