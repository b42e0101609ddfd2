export { openCatalog, resolveDatabasePath, type Catalog, type OpenCatalogOptions } from './catalog.js';
export { ActorStore, type ActorStoreOptions } from './stores/ActorStore.js';
export { GenreStore } from './stores/GenreStore.js';
export { MovieStore } from './stores/MovieStore.js';
export { RELATION_LINKS, type RelationKind } from './stores/relationLinks.js';
export { CatalogSchema } from './database/CatalogSchema.js';
export { DatabaseManager } from './database/DatabaseManager.js';
export { SqliteConnection, IN_MEMORY_DATABASE } from './database/connections/SqliteConnection.js';
export { runInTransaction } from './database/transaction.js';
export { ConfigManager } from './config/ConfigManager.js';
export { DEFAULT_GENRES } from './config/defaults.js';
export { logger, initializeLogger } from './logging/logger.js';
export * from './errors/index.js';
export type { DatabaseConnection, ExecuteResult, SqlParam } from './types/database.js';
export { genresEqual, type Actor, type Genre, type Movie, type MovieInput } from './types/models.js';
