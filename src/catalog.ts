import path from 'path';
import { ConfigManager } from './config/ConfigManager.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { CatalogSchema } from './database/CatalogSchema.js';
import { IN_MEMORY_DATABASE } from './database/connections/SqliteConnection.js';
import { ActorStore } from './stores/ActorStore.js';
import { GenreStore } from './stores/GenreStore.js';
import { MovieStore } from './stores/MovieStore.js';
import { logger, initializeLogger } from './logging/logger.js';
import { parseOrThrow } from './validation/parse.js';
import { catalogNameSchema } from './validation/catalogSchemas.js';
import { getErrorMessage } from './utils/errorHandling.js';

export interface OpenCatalogOptions {
  /** Catalog name; defaults to DB_NAME. Use ':memory:' for a throwaway catalog */
  name?: string;
  /** Directory holding catalog files; defaults to DB_DIR */
  directory?: string;
  genreSeed?: readonly string[];
  autocompleteMinLength?: number;
  autocompleteLimit?: number;
}

export interface Catalog {
  readonly filename: string;
  readonly actors: ActorStore;
  readonly genres: GenreStore;
  readonly movies: MovieStore;
  close(): Promise<void>;
}

/**
 * Map a catalog name to its database file, `<directory>/<name>.db`
 */
export function resolveDatabasePath(name: string, directory: string): string {
  if (name === IN_MEMORY_DATABASE) {
    return IN_MEMORY_DATABASE;
  }

  const catalogName = parseOrThrow(catalogNameSchema, name, {
    service: 'Catalog',
    operation: 'resolveDatabasePath',
  });
  return path.join(directory, `${catalogName}.db`);
}

/**
 * Open (creating when missing) a catalog database, make sure its schema
 * exists, and hand back stores sharing the one connection.
 *
 * Validates the environment configuration and applies its logging settings first.
 */
export async function openCatalog(options: OpenCatalogOptions = {}): Promise<Catalog> {
  const config = ConfigManager.getInstance();
  config.validate();
  initializeLogger();

  const database = config.getDatabaseConfig();
  const catalog = config.getCatalogConfig();

  const filename = resolveDatabasePath(
    options.name ?? database.name,
    options.directory ?? database.directory
  );

  const manager = new DatabaseManager(filename);
  await manager.connect();

  try {
    await CatalogSchema.initialize(manager.getConnection(), options.genreSeed ?? catalog.genreSeed);
  } catch (error) {
    logger.error('Catalog schema initialization failed', {
      filename,
      error: getErrorMessage(error),
    });
    await manager.disconnect();
    throw error;
  }

  const connection = manager.getConnection();
  logger.info('Catalog opened', { filename });

  return {
    filename,
    actors: new ActorStore(connection, {
      autocompleteMinLength: options.autocompleteMinLength ?? catalog.autocomplete.minLength,
      autocompleteLimit: options.autocompleteLimit ?? catalog.autocomplete.limit,
    }),
    genres: new GenreStore(connection),
    movies: new MovieStore(connection),
    close: () => manager.disconnect(),
  };
}
