export interface DatabaseConfig {
  /** Directory that holds catalog database files */
  directory: string;
  /** Catalog name, resolved to `<directory>/<name>.db` */
  name: string;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface CatalogConfig {
  autocomplete: {
    minLength: number; // characters typed before suggestions are returned
    limit: number; // suggestions per lookup
  };
  genreSeed: string[]; // seeded once into an empty genres table
}

export interface AppConfig {
  database: DatabaseConfig;
  logging: LoggingConfig;
  catalog: CatalogConfig;
}
