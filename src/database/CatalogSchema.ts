import { DatabaseConnection } from '../types/database.js';
import { logger } from '../logging/logger.js';
import { runInTransaction } from './transaction.js';

/**
 * Catalog schema
 *
 * Every statement is CREATE ... IF NOT EXISTS, so initialize() can run on
 * each start against new and existing database files alike.
 */
export class CatalogSchema {
  static async initialize(db: DatabaseConnection, genreSeed: readonly string[]): Promise<void> {
    await CatalogSchema.createActorsTable(db);
    await CatalogSchema.createGenresTable(db);
    await CatalogSchema.createMoviesTable(db);
    await CatalogSchema.createMovieActorsTable(db);
    await CatalogSchema.createMovieGenresTable(db);

    const seeded = await CatalogSchema.seedGenres(db, genreSeed);
    logger.debug('Catalog schema ready', { seededGenres: seeded });
  }

  private static async createActorsTable(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS actors (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL
      )
    `);

    await db.execute('CREATE INDEX IF NOT EXISTS idx_actor_name ON actors (name)');
  }

  private static async createGenresTable(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS genres (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL
      )
    `);
  }

  private static async createMoviesTable(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS movies (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        release_year INTEGER,
        director TEXT,
        writer TEXT,
        producer TEXT,
        cinematographer TEXT,
        budget INTEGER,
        country TEXT
      )
    `);
  }

  private static async createMovieActorsTable(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS movie_actors (
        movie_id INTEGER,
        actor_id INTEGER,
        PRIMARY KEY (movie_id, actor_id),
        FOREIGN KEY (movie_id) REFERENCES movies(id) ON DELETE CASCADE,
        FOREIGN KEY (actor_id) REFERENCES actors(id) ON DELETE CASCADE
      )
    `);
  }

  private static async createMovieGenresTable(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE IF NOT EXISTS movie_genres (
        movie_id INTEGER,
        genre_id INTEGER,
        PRIMARY KEY (movie_id, genre_id),
        FOREIGN KEY (movie_id) REFERENCES movies(id) ON DELETE CASCADE,
        FOREIGN KEY (genre_id) REFERENCES genres(id) ON DELETE CASCADE
      )
    `);
  }

  /**
   * Insert the reference genres into an empty table
   *
   * @returns number of genres inserted (0 when the table already had rows)
   */
  static async seedGenres(db: DatabaseConnection, genreSeed: readonly string[]): Promise<number> {
    const row = await db.get<{ count: number }>('SELECT COUNT(*) AS count FROM genres');
    if ((row?.count ?? 0) > 0) {
      return 0;
    }

    await runInTransaction(db, 'seedGenres', async tx => {
      for (const name of genreSeed) {
        await tx.execute('INSERT INTO genres (name) VALUES (?)', [name]);
      }
    });

    if (genreSeed.length > 0) {
      logger.info('Seeded genres', { count: genreSeed.length });
    }
    return genreSeed.length;
  }
}
