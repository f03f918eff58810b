import pkg from 'pg';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
const { Pool } = pkg;
type PoolType = InstanceType<typeof Pool>;
import type { PostgresConfig } from './PostgresConfig.js';
import { logger } from '../../utils/logger.js';

/**
 * Manages PostgreSQL database connections using connection pooling
 */
export class PostgresConnectionManager {
  private pool: PoolType | null = null;
  private readonly config: PostgresConfig;

  constructor(config: PostgresConfig) {
    this.config = config;
  }

  /**
   * Get or create the connection pool
   */
  getPool(): PoolType {
    if (!this.pool) {
      this.pool = new Pool({
        host: this.config.host,
        port: this.config.port,
        user: this.config.user,
        password: this.config.password,
        database: this.config.database,
        ssl: this.config.ssl,
        max: this.config.max || 10,
        idleTimeoutMillis: this.config.idleTimeoutMillis || 30000,
        connectionTimeoutMillis: this.config.connectionTimeoutMillis || 2000,
      });

      this.pool.on('error', (err) => {
        logger.error('Unexpected error on idle PostgreSQL client', err);
      });

      logger.info('PostgreSQL connection pool created', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    }

    return this.pool;
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>> {
    return this.getPool().query<R>(text, params);
  }

  /**
   * Get a client from the pool for transaction management
   */
  async getClient(): Promise<PoolClient> {
    return this.getPool().connect();
  }

  /**
   * Run `work` between BEGIN and COMMIT on one pooled client.
   * Any error rolls the transaction back and is rethrown.
   */
  async withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getClient();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('PostgreSQL rollback failed', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Test the database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query<{ now: Date }>('SELECT NOW() AS now');
      logger.info('PostgreSQL connection test successful', {
        serverTime: result.rows[0]?.now,
      });
      return true;
    } catch (error) {
      logger.error('PostgreSQL connection test failed', error);
      return false;
    }
  }

  /**
   * Close all connections in the pool
   */
  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('PostgreSQL connection pool closed');
    }
  }
}
