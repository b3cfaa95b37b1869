import { describe, it, expect } from 'vitest';
import { withTransaction } from './database.js';
import { createPoolMock } from '../test/pgMock.js';

describe('withTransaction', () => {
  it('commits and returns the result of the work', async () => {
    const { pool, client } = createPoolMock();

    const result = await withTransaction(pool, async (tx) => {
      await tx.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(client.query.mock.calls.map(([text]) => text)).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rethrows the original failure when the rollback fails too', async () => {
    const { pool, client } = createPoolMock((text) => {
      if (text === 'ROLLBACK') {
        throw new Error('connection terminated');
      }
      return { rows: [], rowCount: 0 };
    });

    await expect(withTransaction(pool, async () => {
      throw new Error('deadlock detected');
    })).rejects.toThrow('deadlock detected');

    expect(client.query.mock.calls.map(([text]) => text)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
