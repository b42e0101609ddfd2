import { DatabaseConnection } from '../types/database.js';
import { Actor } from '../types/models.js';
import { logger } from '../logging/logger.js';
import { DatabaseError, ErrorCode, ResourceInUseError } from '../errors/index.js';
import { parseOrThrow } from '../validation/parse.js';
import { actorNameSchema, actorSchema, isEntityId } from '../validation/catalogSchemas.js';
import { countLinks } from './relationLinks.js';

export interface ActorStoreOptions {
  /** Characters required before findByPrefix returns suggestions */
  autocompleteMinLength?: number;
  /** Maximum suggestions returned by findByPrefix */
  autocompleteLimit?: number;
}

/**
 * Database row type for actor queries
 */
interface ActorRow {
  id: number;
  name: string;
}

const SERVICE = 'ActorStore';

export class ActorStore {
  private readonly autocompleteMinLength: number;
  private readonly autocompleteLimit: number;

  constructor(
    private readonly db: DatabaseConnection,
    options: ActorStoreOptions = {}
  ) {
    this.autocompleteMinLength = options.autocompleteMinLength ?? 3;
    this.autocompleteLimit = options.autocompleteLimit ?? 10;
  }

  /**
   * Insert a new actor and return its id. Duplicate names are allowed.
   */
  async create(name: string): Promise<number> {
    const actorName = parseOrThrow(actorNameSchema, name, { service: SERVICE, operation: 'create' });

    const result = await this.db.execute('INSERT INTO actors (name) VALUES (?)', [actorName]);
    const actorId = result.insertId ?? 0;
    if (actorId <= 0) {
      throw new DatabaseError(
        'Failed to retrieve generated actor ID',
        ErrorCode.DATABASE_QUERY_FAILED,
        false,
        { service: SERVICE, operation: 'create', entityType: 'actor' }
      );
    }

    logger.debug('Actor created', { actorId, name: actorName });
    return actorId;
  }

  async read(id: number): Promise<Actor | null> {
    const row = await this.db.get<ActorRow>('SELECT id, name FROM actors WHERE id = ?', [id]);
    return row ? this.mapActor(row) : null;
  }

  /**
   * Overwrite the actor's name
   *
   * @returns false when no actor has the given id
   */
  async update(actor: Actor): Promise<boolean> {
    if (!isEntityId(actor.id)) {
      return false;
    }

    const { id, name } = parseOrThrow(actorSchema, actor, {
      service: SERVICE,
      operation: 'update',
      entityType: 'actor',
      entityId: actor.id,
    });

    const result = await this.db.execute('UPDATE actors SET name = ? WHERE id = ?', [name, id]);
    if (result.affectedRows > 0) {
      logger.debug('Actor updated', { actorId: id, name });
    }
    return result.affectedRows > 0;
  }

  /**
   * Delete an actor that no movie references
   *
   * @returns false when no actor has the given id
   * @throws ResourceInUseError when the actor is linked to at least one movie
   */
  async delete(actorId: number): Promise<boolean> {
    if (!isEntityId(actorId)) {
      return false;
    }

    const linkedMovies = await countLinks(this.db, 'actor', actorId);
    if (linkedMovies > 0) {
      throw new ResourceInUseError('actor', actorId, linkedMovies, undefined, {
        service: SERVICE,
        operation: 'delete',
      });
    }

    const result = await this.db.execute('DELETE FROM actors WHERE id = ?', [actorId]);
    if (result.affectedRows > 0) {
      logger.info('Actor deleted', { actorId });
    }
    return result.affectedRows > 0;
  }

  async readAll(): Promise<Actor[]> {
    const rows = await this.db.query<ActorRow>('SELECT id, name FROM actors ORDER BY id');
    return rows.map(row => this.mapActor(row));
  }

  /**
   * Exact-match lookup; the lowest id wins when names repeat
   */
  async getByName(name: string): Promise<Actor | null> {
    const row = await this.db.get<ActorRow>(
      'SELECT id, name FROM actors WHERE name = ? ORDER BY id LIMIT 1',
      [name]
    );
    return row ? this.mapActor(row) : null;
  }

  /**
   * Autocomplete suggestions: actors whose name starts with `prefix`, ignoring case.
   * Input shorter than the configured minimum yields no suggestions.
   */
  async findByPrefix(prefix: string): Promise<Actor[]> {
    const needle = prefix.trim().toLocaleLowerCase();
    if (needle.length < this.autocompleteMinLength) {
      return [];
    }

    // SQLite's LIKE only folds ASCII case, so matching happens here
    const rows = await this.db.query<ActorRow>('SELECT id, name FROM actors ORDER BY name, id');
    return rows
      .filter(row => row.name.toLocaleLowerCase().startsWith(needle))
      .slice(0, this.autocompleteLimit)
      .map(row => this.mapActor(row));
  }

  private mapActor(row: ActorRow): Actor {
    return {
      id: row.id,
      name: row.name,
    };
  }
}
