import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { runInTransaction } from '../../src/database/transaction.js';
import { DatabaseConnection } from '../../src/types/database.js';
import { logger } from '../../src/logging/logger.js';

function createRecordingConnection(calls: string[], failRollback = false): DatabaseConnection {
  return {
    query: async () => [],
    get: async () => undefined,
    execute: async sql => {
      calls.push(sql);
      return { affectedRows: 1 };
    },
    close: async () => {},
    beginTransaction: async () => {
      calls.push('BEGIN');
    },
    commit: async () => {
      calls.push('COMMIT');
    },
    rollback: async () => {
      calls.push('ROLLBACK');
      if (failRollback) {
        throw new Error('cannot rollback - no transaction is active');
      }
    },
  };
}

describe('runInTransaction', () => {
  let calls: string[];

  beforeEach(() => {
    calls = [];
    jest.restoreAllMocks();
  });

  it('should commit and return the callback result', async () => {
    const db = createRecordingConnection(calls);

    const result = await runInTransaction(db, 'test', async tx => {
      await tx.execute('INSERT 1');
      return 42;
    });

    expect(result).toBe(42);
    expect(calls).toEqual(['BEGIN', 'INSERT 1', 'COMMIT']);
  });

  it('should roll back and rethrow the original error', async () => {
    const db = createRecordingConnection(calls);
    const failure = new Error('constraint failed');

    await expect(
      runInTransaction(db, 'test', async tx => {
        await tx.execute('INSERT 1');
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(calls).toEqual(['BEGIN', 'INSERT 1', 'ROLLBACK']);
  });

  it('should roll back when the commit fails', async () => {
    const db = createRecordingConnection(calls);
    db.commit = async () => {
      calls.push('COMMIT');
      throw new Error('database is locked');
    };

    await expect(runInTransaction(db, 'test', async () => 'done')).rejects.toThrow('database is locked');

    expect(calls).toEqual(['BEGIN', 'COMMIT', 'ROLLBACK']);
  });

  it('should log a failed rollback and still rethrow the original error', async () => {
    const errorSpy = jest.spyOn(logger, 'error');
    const db = createRecordingConnection(calls, true);
    const failure = new Error('constraint failed');

    await expect(
      runInTransaction(db, 'MovieStore.create', async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(errorSpy).toHaveBeenCalledWith('Error during transaction rollback', {
      operation: 'MovieStore.create',
      error: 'constraint failed',
      rollbackError: 'cannot rollback - no transaction is active',
    });
  });
});
