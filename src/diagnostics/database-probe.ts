import { DatabaseConfig } from '@/types/config';

export interface DatabaseStatus {
  database: string;
  connectionStatus: 'connected' | 'not connected';
  tables: string[];
}

/**
 * Optional storage diagnostic behind GET /test. Nothing in the request path
 * depends on a database; this only reports whether one is reachable.
 */
export interface DatabaseProbe {
  probe(): Promise<DatabaseStatus>;
}

const MAX_LISTED_TABLES = 10;

/**
 * Probes a SQLite file named by `database.url`. The driver is loaded on demand
 * so a missing native binding is reported instead of crashing the service.
 */
export class SqliteDatabaseProbe implements DatabaseProbe {
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async probe(): Promise<DatabaseStatus> {
    const filename = this.config.url;
    if (!filename) {
      return { database: 'not available', connectionStatus: 'not connected', tables: [] };
    }

    let sqlite3: typeof import('sqlite3');
    try {
      sqlite3 = await import('sqlite3');
    } catch (error) {
      return {
        database: `driver not available: ${truncate(describe(error))}`,
        connectionStatus: 'not connected',
        tables: [],
      };
    }

    let db: import('sqlite3').Database;
    try {
      db = await new Promise<import('sqlite3').Database>((resolve, reject) => {
        const handle = new sqlite3.Database(filename, sqlite3.OPEN_READONLY, (err) =>
          err ? reject(err) : resolve(handle)
        );
      });
    } catch (error) {
      return { database: `error: ${truncate(describe(error))}`, connectionStatus: 'not connected', tables: [] };
    }

    try {
      const rows = await new Promise<unknown[]>((resolve, reject) => {
        db.all(
          `SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name LIMIT ${MAX_LISTED_TABLES}`,
          (err, result) => (err ? reject(err) : resolve(result))
        );
      });
      return { database: 'connected & working', connectionStatus: 'connected', tables: tableNames(rows) };
    } catch (error) {
      return {
        database: `connected but error: ${truncate(describe(error))}`,
        connectionStatus: 'connected',
        tables: [],
      };
    } finally {
      db.close();
    }
  }
}

function tableNames(rows: unknown[]): string[] {
  const names: string[] = [];
  for (const row of rows) {
    if (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string') {
      names.push(row.name);
    }
  }
  return names;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function truncate(message: string): string {
  return message.slice(0, 50);
}
