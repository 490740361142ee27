import type { CountryCode } from 'libphonenumber-js';
import type { Entry, EntryCollection, EntryRepository, NewEntry } from '../types/index.js';
import {
  DuplicateEntryError, EntryNotFoundError, logger, ok, err,
  type PhonebookError, type Result,
} from '../utils/index.js';
import { createEntry, fullName, nextId } from './model.js';
import { DEFAULT_COUNTRY } from './normalize.js';
import { findByPhone, searchEntries } from './search.js';

export interface RecordStoreOptions {
  /** Country assumed for phone numbers written without a country code. */
  defaultCountry?: CountryCode;
}

/**
 * Owns the entry collection for one invocation. The collection is loaded from
 * the repository on first use and handed back to it after every mutation.
 */
export class RecordStore {
  private repository: EntryRepository;
  private defaultCountry: CountryCode;
  private collection: EntryCollection | null = null;

  constructor(repository: EntryRepository, options: RecordStoreOptions = {}) {
    this.repository = repository;
    this.defaultCountry = options.defaultCountry ?? DEFAULT_COUNTRY;
  }

  private async loaded(): Promise<Result<EntryCollection>> {
    if (this.collection) return ok(this.collection);

    const result = await this.repository.load();
    if (!result.ok) return result;

    this.collection = result.value;
    logger.debug('Loaded', this.collection.entries.length, 'entries');
    return ok(this.collection);
  }

  async getList(): Promise<Result<Entry[]>> {
    const loaded = await this.loaded();
    if (!loaded.ok) return loaded;
    return ok([...loaded.value.entries]);
  }

  search(entries: readonly Entry[], term: string): Result<Entry> {
    return searchEntries(entries, term, this.defaultCountry);
  }

  async insert(fields: NewEntry): Promise<Result<number>> {
    const loaded = await this.loaded();
    if (!loaded.ok) return loaded;
    const collection = loaded.value;

    if (findByPhone(collection.entries, fields.phoneNumber, this.defaultCountry) !== -1) {
      return err(new DuplicateEntryError(fields.phoneNumber.trim()));
    }

    const entry = createEntry(nextId(collection), fields);
    const saved = await this.commit(
      { entries: [...collection.entries, entry], lastId: entry.id },
      `Insert entry ${entry.id}: ${fullName(entry)}`,
    );
    if (!saved.ok) return saved;

    logger.debug('Inserted entry', entry.id, fullName(entry));
    return ok(entry.id);
  }

  async delete(phoneNumber: string): Promise<Result<void>> {
    const loaded = await this.loaded();
    if (!loaded.ok) return loaded;
    const collection = loaded.value;

    const index = findByPhone(collection.entries, phoneNumber, this.defaultCountry);
    if (index === -1) {
      return err(EntryNotFoundError.forPhone(phoneNumber));
    }

    const removed = collection.entries[index];
    const saved = await this.commit(
      {
        entries: collection.entries.filter((_, i) => i !== index),
        lastId: nextId(collection) - 1,
      },
      `Delete entry ${removed.id}: ${fullName(removed)}`,
    );
    if (!saved.ok) return saved;

    logger.debug('Deleted entry', removed.id, fullName(removed));
    return ok(undefined);
  }

  /** Persist `next` and adopt it; the current collection stays on failure. */
  private async commit(next: EntryCollection, message: string): Promise<Result<void, PhonebookError>> {
    const saved = await this.repository.save(next, message);
    if (!saved.ok) return saved;
    this.collection = next;
    return ok(undefined);
  }
}
