import { DatabaseConnection, SqlParam } from '../types/database.js';
import { MOVIE_DETAIL_FIELDS, Movie, MovieDetails, MovieInput } from '../types/models.js';
import { logger } from '../logging/logger.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { runInTransaction } from '../database/transaction.js';
import { parseOrThrow } from '../validation/parse.js';
import { isEntityId, movieInputSchema, movieSchema } from '../validation/catalogSchemas.js';
import {
  addLinks,
  fetchLinkedIds,
  fetchLinkedMovieIds,
  removeAllLinks,
  syncLinks,
  uniqueIds,
} from './relationLinks.js';

/**
 * Database row type for the movies table
 */
interface MovieRow {
  id: number;
  title: string;
  release_year: number | null;
  director: string | null;
  writer: string | null;
  producer: string | null;
  cinematographer: string | null;
  budget: number | null;
  country: string | null;
}

const MOVIE_COLUMNS =
  'id, title, release_year, director, writer, producer, cinematographer, budget, country';

const SERVICE = 'MovieStore';

/**
 * Movies plus their actor and genre links.
 *
 * Every write that touches more than one row runs in a single transaction:
 * a failure leaves neither the movie row nor any of its links behind.
 */
export class MovieStore {
  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Insert the movie and its links; returns the generated id
   */
  async create(movie: MovieInput): Promise<number> {
    const input = parseOrThrow(movieInputSchema, movie, {
      service: SERVICE,
      operation: 'create',
      entityType: 'movie',
    });

    const movieId = await runInTransaction(this.db, 'MovieStore.create', async tx => {
      const result = await tx.execute(
        `INSERT INTO movies (title, release_year, director, writer, producer, cinematographer, budget, country)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        this.detailParams(input)
      );

      const generatedId = result.insertId ?? 0;
      if (generatedId <= 0) {
        throw new DatabaseError(
          'Failed to retrieve generated movie ID',
          ErrorCode.DATABASE_TRANSACTION_FAILED,
          false,
          { service: SERVICE, operation: 'create', entityType: 'movie' }
        );
      }

      await addLinks(tx, 'actor', generatedId, uniqueIds(input.actorIds));
      await addLinks(tx, 'genre', generatedId, uniqueIds(input.genreIds));

      return generatedId;
    });

    logger.info('Movie created', {
      movieId,
      title: input.title,
      actors: input.actorIds.length,
      genres: input.genreIds.length,
    });

    return movieId;
  }

  async read(id: number): Promise<Movie | null> {
    const row = await this.db.get<MovieRow>(`SELECT ${MOVIE_COLUMNS} FROM movies WHERE id = ?`, [id]);
    if (!row) {
      return null;
    }
    return this.mapMovie(row);
  }

  async readAll(): Promise<Movie[]> {
    const rows = await this.db.query<MovieRow>(`SELECT ${MOVIE_COLUMNS} FROM movies ORDER BY id`);

    const movies: Movie[] = [];
    for (const row of rows) {
      movies.push(await this.mapMovie(row));
    }
    return movies;
  }

  /**
   * Ids of the movies an actor appears in
   */
  async readByActor(actorId: number): Promise<number[]> {
    return fetchLinkedMovieIds(this.db, 'actor', actorId);
  }

  /**
   * Ids of the movies tagged with a genre
   */
  async readByGenre(genreId: number): Promise<number[]> {
    return fetchLinkedMovieIds(this.db, 'genre', genreId);
  }

  /**
   * Replace a movie's details and links, writing only what changed.
   *
   * Scalar columns are rewritten together when any of them differs; actor and
   * genre links are reconciled as sets (stale links removed, new ones added).
   *
   * @returns false when no movie has the given id; nothing is written then
   */
  async update(movie: Movie): Promise<boolean> {
    if (!isEntityId(movie.id)) {
      logger.debug('Movie update skipped, no such movie', { movieId: movie.id });
      return false;
    }

    const requested = parseOrThrow(movieSchema, movie, {
      service: SERVICE,
      operation: 'update',
      entityType: 'movie',
      entityId: movie.id,
    });

    const existing = await this.read(requested.id);
    if (!existing) {
      logger.debug('Movie update skipped, no such movie', { movieId: requested.id });
      return false;
    }

    const changes = await runInTransaction(this.db, 'MovieStore.update', async tx => {
      const detailsChanged = this.hasDetailsChanged(existing, requested);
      if (detailsChanged) {
        await tx.execute(
          `UPDATE movies
           SET title = ?, release_year = ?, director = ?, writer = ?, producer = ?,
               cinematographer = ?, budget = ?, country = ?
           WHERE id = ?`,
          [...this.detailParams(requested), requested.id]
        );
      }

      const actors = await syncLinks(tx, 'actor', requested.id, requested.actorIds);
      const genres = await syncLinks(tx, 'genre', requested.id, requested.genreIds);

      return { detailsChanged, actors, genres };
    });

    logger.info('Movie updated', {
      movieId: requested.id,
      detailsChanged: changes.detailsChanged,
      actorsAdded: changes.actors.added.length,
      actorsRemoved: changes.actors.removed.length,
      genresAdded: changes.genres.added.length,
      genresRemoved: changes.genres.removed.length,
    });

    return true;
  }

  /**
   * Remove a movie and every link that references it
   *
   * @returns false when no movie has the given id
   */
  async delete(movieId: number): Promise<boolean> {
    if (!isEntityId(movieId)) {
      return false;
    }

    const deleted = await runInTransaction(this.db, 'MovieStore.delete', async tx => {
      await removeAllLinks(tx, 'actor', movieId);
      await removeAllLinks(tx, 'genre', movieId);

      const result = await tx.execute('DELETE FROM movies WHERE id = ?', [movieId]);
      return result.affectedRows > 0;
    });

    if (deleted) {
      logger.info('Movie deleted', { movieId });
    }
    return deleted;
  }

  private hasDetailsChanged(existing: MovieDetails, requested: MovieDetails): boolean {
    return MOVIE_DETAIL_FIELDS.some(field => existing[field] !== requested[field]);
  }

  private detailParams(movie: MovieDetails): SqlParam[] {
    return [
      movie.title,
      movie.releaseYear,
      movie.director,
      movie.writer,
      movie.producer,
      movie.cinematographer,
      movie.budget,
      movie.country,
    ];
  }

  private async mapMovie(row: MovieRow): Promise<Movie> {
    return {
      id: row.id,
      title: row.title,
      releaseYear: row.release_year ?? 0,
      director: row.director ?? '',
      writer: row.writer ?? '',
      producer: row.producer ?? '',
      cinematographer: row.cinematographer ?? '',
      budget: row.budget ?? 0,
      country: row.country ?? '',
      actorIds: await fetchLinkedIds(this.db, 'actor', row.id),
      genreIds: await fetchLinkedIds(this.db, 'genre', row.id),
    };
  }
}
