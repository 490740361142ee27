import type { EntryCollection } from './entry.js';
import type { Result } from '../utils/result.js';

/**
 * Persistence collaborator behind the record store. Both operations report
 * failures as values rather than throwing.
 */
export interface EntryRepository {
  load(): Promise<Result<EntryCollection>>;
  /** Persist the collection. `message` describes the change being saved. */
  save(collection: EntryCollection, message: string): Promise<Result<void>>;
}

/** Records one commit per saved change. */
export interface VersionControl {
  commit(filePath: string, message: string): Promise<string>;
}
