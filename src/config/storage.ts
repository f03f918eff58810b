import type { PostgresConfig } from '../storage/postgres/PostgresConfig.js';
import { DEFAULT_POSTGRES_CONFIG } from '../storage/postgres/PostgresConfig.js';
import { getDataDirectoryPath, resolveDatabasePath } from './paths.js';
import { logger } from '../utils/logger.js';

export type StorageType = 'sqlite' | 'postgres';

/**
 * Configuration for the analysis store
 */
export interface StorageConfig {
  type: StorageType;

  /**
   * SQLite database file (sqlite only)
   */
  sqlitePath: string;

  /**
   * Connection settings (postgres only)
   */
  postgres: PostgresConfig;
}

/**
 * Determines the storage type based on the environment variable
 * @returns 'postgres' for postgres/postgresql, otherwise 'sqlite'
 */
export function determineStorageType(envType: string | undefined): StorageType {
  const type = (envType || 'sqlite').toLowerCase();

  if (type === 'postgres' || type === 'postgresql') {
    return 'postgres';
  }

  return 'sqlite';
}

/**
 * Creates a storage configuration object from environment variables
 */
export function createStorageConfig(storageType: string | undefined): StorageConfig {
  const type = determineStorageType(storageType);

  const sqlitePath =
    process.env.SQLITE_PATH === ':memory:'
      ? ':memory:'
      : type === 'sqlite'
        ? resolveDatabasePath(process.env.SQLITE_PATH, getDataDirectoryPath())
        : '';

  const config: StorageConfig = {
    type,
    sqlitePath,
    postgres: {
      host: process.env.POSTGRES_HOST || DEFAULT_POSTGRES_CONFIG.host,
      port: process.env.POSTGRES_PORT ? parseInt(process.env.POSTGRES_PORT, 10) : DEFAULT_POSTGRES_CONFIG.port,
      user: process.env.POSTGRES_USER || DEFAULT_POSTGRES_CONFIG.user,
      password: process.env.POSTGRES_PASSWORD || DEFAULT_POSTGRES_CONFIG.password,
      database: process.env.POSTGRES_DATABASE || DEFAULT_POSTGRES_CONFIG.database,
      ssl: process.env.POSTGRES_SSL === 'true' ? { rejectUnauthorized: false } : undefined,
      max: process.env.POSTGRES_POOL_MAX ? parseInt(process.env.POSTGRES_POOL_MAX, 10) : DEFAULT_POSTGRES_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POSTGRES_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POSTGRES_CONFIG.connectionTimeoutMillis,
    },
  };

  logger.info('Configuring analysis store', {
    type,
    sqlitePath: type === 'sqlite' ? sqlitePath : undefined,
    postgresHost: type === 'postgres' ? config.postgres.host : undefined,
    postgresDatabase: type === 'postgres' ? config.postgres.database : undefined,
  });

  return config;
}
