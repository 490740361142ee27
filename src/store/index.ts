import type { AppConfig } from '../config.js';
import type { EntryRepository } from '../types/index.js';
import { JsonFileRepository } from './json-file.js';
import { GitVersionedRepository } from './versioned.js';

export { JsonFileRepository, parseDataFile, serializeDataFile, DATA_FILE_VERSION } from './json-file.js';
export type { DataFile } from './json-file.js';
export { MemoryRepository } from './memory.js';
export type { SavedSnapshot } from './memory.js';
export { GitVersionedRepository } from './versioned.js';
export { GitOps } from './git-ops.js';

export function createRepository(config: AppConfig): EntryRepository {
  const file = new JsonFileRepository(config.dataPath);
  return config.git ? new GitVersionedRepository(file) : file;
}
