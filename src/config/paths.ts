import path from 'path';
import * as fs from 'fs';
import { fileURLToPath } from 'url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the absolute path to the data directory
 * Creates the directory if it doesn't exist
 */
export function getDataDirectoryPath(): string {
  const envDir = process.env.DATA_DIR;
  const dataDir = envDir
    ? path.isAbsolute(envDir)
      ? envDir
      : path.join(process.cwd(), envDir)
    : path.join(process.cwd(), 'data');

  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  return dataDir;
}

/**
 * Resolve the SQLite database path.
 * ':memory:' passes through; relative paths land in the data directory.
 */
export function resolveDatabasePath(envPath: string | undefined, dataDir: string): string {
  if (envPath === ':memory:') {
    return envPath;
  }

  const defaultPath = path.join(dataDir, 'pole-classifier.db');

  if (!envPath) {
    return defaultPath;
  }

  return path.isAbsolute(envPath) ? envPath : path.join(dataDir, envPath);
}

/**
 * Locate a file under the repository's config/ directory, from sources or
 * from the compiled dist/ tree. CONFIG_DIR takes precedence.
 */
export function resolveConfigFile(fileName: string): string {
  const candidates = [
    process.env.CONFIG_DIR ? path.resolve(process.env.CONFIG_DIR, fileName) : null,
    path.join(moduleDir, '../../config', fileName),
    path.join(moduleDir, '../../../config', fileName),
  ].filter((candidate): candidate is string => candidate !== null);

  return candidates.find(candidate => fs.existsSync(candidate)) ?? candidates[0];
}
