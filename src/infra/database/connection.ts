// src/infra/database/connection.ts
import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow, types } from 'pg';
import { DatabaseError } from '../../shared/errors/database.error';
import { DATABASE_DEFAULTS } from '../../shared/constants';
import { logger } from '../logger';
import { parseDatabaseUrl } from './database-url';

const PG_DATE_OID = 1082;
const PG_NUMERIC_OID = 1700;

// DATE stays a plain 'YYYY-MM-DD' string; NUMERIC becomes a JS number.
types.setTypeParser(PG_DATE_OID, (value: string) => value);
types.setTypeParser(PG_NUMERIC_OID, (value: string) => Number.parseFloat(value));

/**
 * Parameters required to establish a connection pool.
 */
export interface DatabaseConfig {
  connectionString: string;
  ssl?: boolean;
  maxConnections?: number;
  minConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * Singleton wrapper around the `pg` connection pool.
 * * Provides query execution, client checkout for transactions and shutdown.
 */
class Database {
  private pool: Pool | null = null;
  private isShuttingDown = false;

  /**
   * Creates the pool and verifies connectivity with `SELECT 1`.
   * * The pool is kept even when the check fails, so the process can keep
   * serving diagnostics and recover once the server becomes reachable.
   * * @throws {DatabaseError} If the initial connection test fails.
   */
  async connect(config: DatabaseConfig): Promise<void> {
    if (this.pool) {
      logger.warn('Database already connected');
      return;
    }

    const parameters = parseDatabaseUrl(config.connectionString, config.ssl ?? true);
    const poolConfig: PoolConfig = {
      ...parameters,
      min: config.minConnections ?? DATABASE_DEFAULTS.MIN_CONNECTIONS,
      max: config.maxConnections ?? DATABASE_DEFAULTS.MAX_CONNECTIONS,
      idleTimeoutMillis: config.idleTimeoutMs ?? DATABASE_DEFAULTS.IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? DATABASE_DEFAULTS.CONNECTION_TIMEOUT_MS,
    };

    const pool = new Pool(poolConfig);

    pool.on('error', (err) => {
      logger.error('Unexpected database pool error', { error: err.message });
    });

    pool.on('connect', () => {
      logger.debug('New database client connected');
    });

    this.pool = pool;
    this.isShuttingDown = false;

    logger.info('Database pool created', {
      host: parameters.host,
      port: parameters.port,
      database: parameters.database,
    });

    await this.ping();
    logger.info('Database connection established successfully');
  }

  /**
   * Adopts an already constructed pool (e.g. an in-process stand-in).
   * * Replaces any pool held before without closing it.
   */
  attach(pool: Pool): void {
    this.pool = pool;
    this.isShuttingDown = false;
  }

  /**
   * Runs `SELECT 1` and returns the scalar.
   */
  async ping(): Promise<number> {
    const result = await this.query<{ result: number }>('SELECT 1 AS result');
    return Number(result.rows[0]?.result ?? 0);
  }

  /**
   * Executes a parameterized SQL query against the pool.
   * * Parameters are masked in error logs.
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = []
  ): Promise<QueryResult<T>> {
    if (!this.pool) {
      throw new DatabaseError('Database not initialized');
    }

    const start = Date.now();

    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug('Query executed', {
        duration: `${duration}ms`,
        rows: result.rowCount ?? 0,
      });

      return result;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Database query error', {
        error: err.message,
        query: text,
        params: params.map(() => '?'),
      });
      throw new DatabaseError(`Query failed: ${err.message}`, err);
    }
  }

  /**
   * Acquires a raw client from the pool.
   * * **Important:** The caller is responsible for releasing the client.
   */
  async getClient(): Promise<PoolClient> {
    if (!this.pool) {
      throw new DatabaseError('Database not initialized');
    }

    try {
      return await this.pool.connect();
    } catch (error) {
      throw new DatabaseError(
        'Failed to acquire database client',
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Gracefully shuts down the connection pool.
   */
  async disconnect(): Promise<void> {
    if (this.isShuttingDown || !this.pool) {
      return;
    }

    this.isShuttingDown = true;
    const pool = this.pool;

    try {
      await pool.end();
      this.pool = null;
      logger.info('Database connections closed successfully');
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Error closing database connections', { error: err.message });
      throw new DatabaseError('Failed to close database connections', err);
    } finally {
      this.isShuttingDown = false;
    }
  }

  /**
   * Current pool statistics: total, idle and waiting client counts.
   */
  getPoolStats(): { total: number; idle: number; waiting: number } | null {
    if (!this.pool) {
      return null;
    }

    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }
}

// Singleton instance
export const database = new Database();
