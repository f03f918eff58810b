import type { AnalysisStore, CorrectionDefaults } from './AnalysisStore.js';
import { SqliteAnalysisStore } from './sqlite/SqliteAnalysisStore.js';
import { PostgresAnalysisStore } from './postgres/PostgresAnalysisStore.js';
import type { StorageConfig } from '../config/storage.js';

function instantiate(config: StorageConfig, defaults?: CorrectionDefaults): AnalysisStore {
  switch (config.type) {
    case 'postgres':
      return new PostgresAnalysisStore({ connection: config.postgres, defaults });
    case 'sqlite':
      return new SqliteAnalysisStore({ filename: config.sqlitePath, defaults });
  }
}

/**
 * Create and initialize the analysis store named by the configuration
 */
export async function createAnalysisStore(
  config: StorageConfig,
  defaults?: CorrectionDefaults
): Promise<AnalysisStore> {
  const store = instantiate(config, defaults);
  await store.init();
  return store;
}
