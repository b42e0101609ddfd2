import { DatabaseConnection } from '../types/database.js';
import { logger } from '../logging/logger.js';
import { getErrorMessage } from '../utils/errorHandling.js';

/**
 * Run `callback` inside BEGIN ... COMMIT on `db`.
 *
 * Any error rolls the whole unit back and is rethrown unchanged. SQLite
 * returns to auto-commit mode after COMMIT or ROLLBACK, so the connection
 * leaves this function in auto-commit mode on every path where the rollback
 * itself succeeds.
 */
export async function runInTransaction<T>(
  db: DatabaseConnection,
  operation: string,
  callback: (db: DatabaseConnection) => Promise<T>
): Promise<T> {
  await db.beginTransaction();

  let result: T;
  try {
    result = await callback(db);
    await db.commit();
  } catch (error) {
    try {
      await db.rollback();
      logger.warn('Transaction rolled back', {
        operation,
        error: getErrorMessage(error),
      });
    } catch (rollbackError) {
      logger.error('Error during transaction rollback', {
        operation,
        error: getErrorMessage(error),
        rollbackError: getErrorMessage(rollbackError),
      });
    }
    throw error;
  }

  return result;
}
