import dotenv from 'dotenv';
import { AppConfig, CatalogConfig, DatabaseConfig, LoggingConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Database configuration
    config.database.directory = this.getString('DB_DIR', config.database.directory);
    config.database.name = this.getString('DB_NAME', config.database.name);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Catalog behaviour
    config.catalog.autocomplete.minLength = this.getNumber(
      'AUTOCOMPLETE_MIN_LENGTH',
      config.catalog.autocomplete.minLength
    );
    config.catalog.autocomplete.limit = this.getNumber(
      'AUTOCOMPLETE_LIMIT',
      config.catalog.autocomplete.limit
    );
    config.catalog.genreSeed = this.getStringArray('GENRE_SEED', config.catalog.genreSeed);

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(candidate => candidate === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getCatalogConfig(): CatalogConfig {
    return this.config.catalog;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];
    const { autocomplete, genreSeed } = this.config.catalog;

    if (autocomplete.minLength < 1) {
      errors.push('AUTOCOMPLETE_MIN_LENGTH must be at least 1');
    }
    if (autocomplete.limit < 1) {
      errors.push('AUTOCOMPLETE_LIMIT must be at least 1');
    }
    if (new Set(genreSeed).size !== genreSeed.length) {
      errors.push('GENRE_SEED must not repeat a genre');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'catalog',
        `Configuration validation failed:\n${errors.join('\n')}`,
        { metadata: { errors } }
      );
    }
  }
}
