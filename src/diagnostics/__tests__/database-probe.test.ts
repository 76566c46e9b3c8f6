import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { Database } from 'sqlite3';
import { SqliteDatabaseProbe } from '../database-probe';

function createDatabase(filename: string, schema: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const db = new Database(filename, (openErr) => {
      if (openErr) {
        reject(openErr);
        return;
      }
      db.exec(schema, (execErr) => {
        db.close((closeErr) => {
          const err = execErr ?? closeErr;
          if (err) reject(err);
          else resolve();
        });
      });
    });
  });
}

describe('SqliteDatabaseProbe', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'gateway-probe-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports no database when none is configured', async () => {
    const probe = new SqliteDatabaseProbe({});

    expect(await probe.probe()).toEqual({
      database: 'not available',
      connectionStatus: 'not connected',
      tables: [],
    });
  });

  it('lists the tables of a reachable database', async () => {
    const filename = path.join(dir, 'explorer.sqlite');
    await createDatabase(filename, 'CREATE TABLE blocks (slot INTEGER PRIMARY KEY, tx_count INTEGER)');

    const probe = new SqliteDatabaseProbe({ url: filename });

    expect(await probe.probe()).toEqual({
      database: 'connected & working',
      connectionStatus: 'connected',
      tables: ['blocks'],
    });
  });

  it('reports an open failure without throwing', async () => {
    const probe = new SqliteDatabaseProbe({ url: path.join(dir, 'missing', 'explorer.sqlite') });

    const status = await probe.probe();

    expect(status.connectionStatus).toBe('not connected');
    expect(status.tables).toEqual([]);
    expect(status.database).toMatch(/^error: /);
  });
});
