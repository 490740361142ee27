import type { Entry, EntryCollection, EntryRepository } from '../types/index.js';
import { StoreError, ok, err, type Result } from '../utils/index.js';

export interface SavedSnapshot {
  collection: EntryCollection;
  message: string;
}

/**
 * In-process repository used as a fixture. Every save is recorded, and loads
 * or saves can be made to fail.
 */
export class MemoryRepository implements EntryRepository {
  private collection: EntryCollection;
  readonly saves: SavedSnapshot[] = [];
  loadCount = 0;
  failLoad: string | null = null;
  failSave: string | null = null;

  constructor(entries: Entry[] = [], lastId?: number) {
    this.collection = {
      entries: [...entries],
      lastId: lastId ?? entries.reduce((max, entry) => Math.max(max, entry.id), 0),
    };
  }

  get current(): EntryCollection {
    return { entries: [...this.collection.entries], lastId: this.collection.lastId };
  }

  async load(): Promise<Result<EntryCollection>> {
    this.loadCount++;
    if (this.failLoad !== null) return err(new StoreError(this.failLoad));
    return ok(this.current);
  }

  async save(collection: EntryCollection, message: string): Promise<Result<void>> {
    if (this.failSave !== null) return err(new StoreError(this.failSave));
    this.collection = { entries: [...collection.entries], lastId: collection.lastId };
    this.saves.push({ collection: this.current, message });
    return ok(undefined);
  }
}
