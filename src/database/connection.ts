import pkg from 'pg';
const { Pool } = pkg;
import { env } from '../config/env.js';

export type QueryParams = readonly unknown[];

/** Query surface shared by the pool and a client checked out for a transaction. */
export interface Queryable {
  query<T extends pkg.QueryResultRow = pkg.QueryResultRow>(text: string, params?: QueryParams): Promise<pkg.QueryResult<T>>;
}

export class Database implements Queryable {
  private static instance: Database;
  private pool: pkg.Pool;

  private constructor() {
    this.pool = new Pool({
      connectionString: env.DATABASE_URL,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000
    });

    this.pool.on('error', (err) => {
      console.error('[Database] unexpected error on idle client', err);
      process.exit(-1);
    });
  }

  public static getInstance(): Database {
    if (!Database.instance) {
      Database.instance = new Database();
    }
    return Database.instance;
  }

  public getPool(): pkg.Pool {
    return this.pool;
  }

  public async query<T extends pkg.QueryResultRow = pkg.QueryResultRow>(
    text: string,
    params?: QueryParams
  ): Promise<pkg.QueryResult<T>> {
    const start = Date.now();
    try {
      const res = await this.pool.query<T>(text, params ? [...params] : undefined);
      const duration = Date.now() - start;
      console.debug('[Database] executed query', { text, duration, rows: res.rowCount });
      return res;
    } catch (error) {
      console.error('[Database] query error', { text, error });
      throw error;
    }
  }

  /** Runs `work` inside BEGIN/COMMIT on one client, rolling back on any error. */
  public async transaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const scoped: Queryable = {
      query: async <R extends pkg.QueryResultRow = pkg.QueryResultRow>(text: string, params?: QueryParams) =>
        client.query<R>(text, params ? [...params] : undefined)
    };

    try {
      await client.query('BEGIN');
      const result = await work(scoped);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  public async close(): Promise<void> {
    await this.pool.end();
  }
}

export const db = Database.getInstance();
