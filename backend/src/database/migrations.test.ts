import { describe, it, expect } from 'vitest';
import { migrations, rollbackMigration, runMigrations } from './migrations.js';
import { createPoolMock } from '../test/pgMock.js';

describe('runMigrations', () => {
  it('runs only pending migrations, each in its own transaction', async () => {
    const { pool, client } = createPoolMock((text, values) => {
      if (text.startsWith('SELECT id FROM migrations') && values?.[0] === migrations[0].id) {
        return { rows: [{ id: migrations[0].id }], rowCount: 1 };
      }
      return { rows: [], rowCount: 0 };
    });

    const result = await runMigrations(pool);

    expect(result).toBe(true);
    const recorded = client.query.mock.calls
      .filter(([text]) => text.startsWith('INSERT INTO migrations'))
      .map(([, values]) => values?.[0]);
    expect(recorded).toEqual([migrations[1].id, migrations[2].id]);
    expect(client.release).toHaveBeenCalledTimes(2);
  });

  it('stops at the first failing migration', async () => {
    const { pool, client } = createPoolMock((text) => {
      if (text.includes('CREATE TABLE IF NOT EXISTS review_progress')) {
        throw new Error('syntax error');
      }
      return { rows: [], rowCount: 0 };
    });

    const result = await runMigrations(pool);

    expect(result).toBe(false);
    const commands = client.query.mock.calls.map(([text]) => text);
    expect(commands.filter(text => text === 'COMMIT')).toHaveLength(1);
    expect(commands.filter(text => text === 'ROLLBACK')).toHaveLength(1);
    expect(commands.some(text => text.includes('exposure_stats'))).toBe(false);
  });
});

describe('rollbackMigration', () => {
  it('runs the down script and removes the migration record', async () => {
    const { pool, client } = createPoolMock();

    const result = await rollbackMigration(pool, migrations[2]);

    expect(result).toBe(true);
    expect(client.query.mock.calls).toEqual([
      ['BEGIN'],
      [migrations[2].down],
      ['DELETE FROM migrations WHERE id = $1', [migrations[2].id]],
      ['COMMIT']
    ]);
  });

  it('reports failure and rolls back when the down script fails', async () => {
    const { pool, client } = createPoolMock((text) => {
      if (text.startsWith('DROP TABLE')) {
        throw new Error('permission denied');
      }
      return { rows: [], rowCount: 0 };
    });

    const result = await rollbackMigration(pool, migrations[2]);

    expect(result).toBe(false);
    expect(client.query.mock.calls.map(([text]) => text)).toEqual(['BEGIN', migrations[2].down, 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
