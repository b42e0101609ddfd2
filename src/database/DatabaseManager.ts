import { DatabaseConnection, ExecuteResult, SqlParam } from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { runInTransaction } from './transaction.js';
import { logger } from '../logging/logger.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';

/**
 * Owns the single connection a catalog works against.
 *
 * Stores never construct connections themselves; they receive the handle from
 * getConnection().
 */
export class DatabaseManager {
  private connection: DatabaseConnection | null = null;

  constructor(private readonly filename: string) {}

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = new SqliteConnection(this.filename);
    await connection.connect();
    this.connection = connection;

    logger.info('Database connected', { filename: this.filename });
  }

  async disconnect(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
      logger.info('Database disconnected', { filename: this.filename });
    }
  }

  /**
   * Validate database connection by running a simple query
   */
  async validateConnection(): Promise<boolean> {
    if (!this.connection) {
      return false;
    }

    try {
      await this.connection.query('SELECT 1 as ping', []);
      return true;
    } catch (error) {
      logger.warn('Database connection validation failed', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        {
          service: 'DatabaseManager',
          operation: 'getConnection',
        }
      );
    }
    return this.connection;
  }

  async query<T>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.getConnection().query<T>(sql, params);
  }

  async execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    return this.getConnection().execute(sql, params);
  }

  async transaction<T>(callback: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
    return runInTransaction(this.getConnection(), 'DatabaseManager.transaction', callback);
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}
