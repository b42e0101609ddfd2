import { DatabaseConnection } from '../types/database.js';
import { Genre } from '../types/models.js';
import { logger } from '../logging/logger.js';
import { DatabaseError, ErrorCode, ResourceInUseError } from '../errors/index.js';
import { parseOrThrow } from '../validation/parse.js';
import { genreNameSchema, genreSchema, isEntityId } from '../validation/catalogSchemas.js';
import { countLinks } from './relationLinks.js';

interface GenreRow {
  id: number;
  name: string;
}

const SERVICE = 'GenreStore';

/**
 * Genres are reference data seeded with the schema; the write operations
 * exist for maintenance and mirror ActorStore.
 */
export class GenreStore {
  constructor(private readonly db: DatabaseConnection) {}

  async readAll(): Promise<Genre[]> {
    const rows = await this.db.query<GenreRow>('SELECT id, name FROM genres ORDER BY id');
    return rows.map(row => this.mapGenre(row));
  }

  async getById(id: number): Promise<Genre | null> {
    const row = await this.db.get<GenreRow>('SELECT id, name FROM genres WHERE id = ?', [id]);
    return row ? this.mapGenre(row) : null;
  }

  async getByName(name: string): Promise<Genre | null> {
    const row = await this.db.get<GenreRow>(
      'SELECT id, name FROM genres WHERE name = ? ORDER BY id LIMIT 1',
      [name]
    );
    return row ? this.mapGenre(row) : null;
  }

  async create(name: string): Promise<number> {
    const genreName = parseOrThrow(genreNameSchema, name, { service: SERVICE, operation: 'create' });

    const result = await this.db.execute('INSERT INTO genres (name) VALUES (?)', [genreName]);
    const genreId = result.insertId ?? 0;
    if (genreId <= 0) {
      throw new DatabaseError(
        'Failed to retrieve generated genre ID',
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: SERVICE, operation: 'create', entityType: 'genre' }
      );
    }

    logger.info('Genre created', { genreId, name: genreName });
    return genreId;
  }

  async update(genre: Genre): Promise<boolean> {
    if (!isEntityId(genre.id)) {
      return false;
    }

    const { id, name } = parseOrThrow(genreSchema, genre, {
      service: SERVICE,
      operation: 'update',
      entityType: 'genre',
      entityId: genre.id,
    });

    const result = await this.db.execute('UPDATE genres SET name = ? WHERE id = ?', [name, id]);
    return result.affectedRows > 0;
  }

  /**
   * @throws ResourceInUseError when a movie still carries the genre
   */
  async delete(genreId: number): Promise<boolean> {
    if (!isEntityId(genreId)) {
      return false;
    }

    const linkedMovies = await countLinks(this.db, 'genre', genreId);
    if (linkedMovies > 0) {
      throw new ResourceInUseError('genre', genreId, linkedMovies, undefined, {
        service: SERVICE,
        operation: 'delete',
      });
    }

    const result = await this.db.execute('DELETE FROM genres WHERE id = ?', [genreId]);
    if (result.affectedRows > 0) {
      logger.info('Genre deleted', { genreId });
    }
    return result.affectedRows > 0;
  }

  private mapGenre(row: GenreRow): Genre {
    return { id: row.id, name: row.name };
  }
}
