import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { DatabaseManager } from '../../src/database/DatabaseManager.js';
import { IN_MEMORY_DATABASE } from '../../src/database/connections/SqliteConnection.js';
import { DatabaseError, ErrorCode } from '../../src/errors/index.js';

describe('DatabaseManager', () => {
  let manager: DatabaseManager;

  beforeEach(() => {
    manager = new DatabaseManager(IN_MEMORY_DATABASE);
  });

  afterEach(async () => {
    await manager.disconnect();
  });

  it('should refuse to hand out a connection before connect()', () => {
    expect(manager.isConnected()).toBe(false);
    expect(() => manager.getConnection()).toThrow(DatabaseError);
  });

  it('should connect once and validate the connection', async () => {
    await manager.connect();
    const connection = manager.getConnection();
    await manager.connect();

    expect(manager.getConnection()).toBe(connection);
    expect(await manager.validateConnection()).toBe(true);
  });

  it('should report an invalid connection after disconnect', async () => {
    await manager.connect();
    await manager.disconnect();

    expect(manager.isConnected()).toBe(false);
    expect(await manager.validateConnection()).toBe(false);
  });

  it('should commit transaction work and roll back failed work', async () => {
    await manager.connect();
    await manager.execute('CREATE TABLE notes (body TEXT NOT NULL)');

    await manager.transaction(async tx => {
      await tx.execute('INSERT INTO notes (body) VALUES (?)', ['kept']);
    });
    await expect(
      manager.transaction(async tx => {
        await tx.execute('INSERT INTO notes (body) VALUES (?)', ['dropped']);
        await tx.execute('INSERT INTO notes (body) VALUES (?)', [null]);
      })
    ).rejects.toMatchObject({ code: ErrorCode.DATABASE_QUERY_FAILED });

    expect(await manager.query<{ body: string }>('SELECT body FROM notes')).toEqual([{ body: 'kept' }]);
  });
});
