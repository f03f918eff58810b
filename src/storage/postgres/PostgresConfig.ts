export interface PostgresConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  /**
   * SSL configuration for PostgreSQL connection
   */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /**
   * Maximum number of clients in the pool
   */
  max?: number;
  /**
   * Idle timeout in milliseconds
   */
  idleTimeoutMillis?: number;
  /**
   * Connection timeout in milliseconds
   */
  connectionTimeoutMillis?: number;
}

export const DEFAULT_POSTGRES_CONFIG: PostgresConfig = {
  host: 'localhost',
  port: 5432,
  user: 'postgres',
  password: 'postgres',
  database: 'pole_classifier',
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};
