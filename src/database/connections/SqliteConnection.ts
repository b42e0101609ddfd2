import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConnection, ExecuteResult, SqlParam } from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
  ErrorCode,
} from '../../errors/index.js';
import { getErrorCode, toError } from '../../utils/errorHandling.js';

export const IN_MEMORY_DATABASE = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;

  constructor(private readonly filename: string) {}

  async connect(): Promise<void> {
    if (this.db) {
      return;
    }

    if (this.filename !== IN_MEMORY_DATABASE) {
      const dir = path.dirname(this.filename);
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new FileSystemError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.FS_PERMISSION_DENIED,
          dir,
          false,
          { service: 'SqliteConnection', operation: 'connect' },
          toError(err)
        );
      }
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const opened: sqlite3.Database = new sqlite3.Database(this.filename, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to connect to SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            true,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { dbPath: this.filename },
            },
            err
          ));
        } else {
          resolve(opened);
        }
      });
    });

    this.db = db;
    // Cascades on movie_actors / movie_genres depend on this
    await this.execute('PRAGMA foreign_keys = ON');
  }

  async query<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows);
        }
      });
    });
  }

  async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get<T>(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');

    return new Promise((resolve, reject) => {
      // Store reference to class instance for error conversion
      const self = this;
      db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) {
          reject(self.convertDatabaseError(err, sql, 'execute'));
        } else {
          // 'this' refers to the statement context, providing changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    await this.execute('BEGIN TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(
    error: Error,
    sql: string,
    operation: string
  ): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message, sqliteCode: getErrorCode(error) },
    };

    // UNIQUE / PRIMARY KEY constraint violation
    if (errorMessage.includes('unique constraint')) {
      const match = errorMessage.match(/unique constraint failed: (\w+)\.(\w+)/i);
      return new DuplicateKeyError(
        match?.[1] ?? 'unknown', // table
        match?.[2] ?? 'unknown', // key
        error.message,
        context,
        error
      );
    }

    // FOREIGN KEY constraint violation
    if (errorMessage.includes('foreign key constraint')) {
      return new ForeignKeyViolationError(
        'unknown', // table - SQLite doesn't provide this in error
        'foreign_key',
        error.message,
        context,
        error
      );
    }

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      true,
      context,
      error
    );
  }
}
