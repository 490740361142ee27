import type { Entry, EntryCollection, NewEntry } from '../types/index.js';

/** Next identifier: one past the highest ever assigned, never a reused one. */
export function nextId(collection: EntryCollection): number {
  const highest = collection.entries.reduce((max, entry) => Math.max(max, entry.id), collection.lastId);
  return highest + 1;
}

export function createEntry(id: number, fields: NewEntry): Entry {
  return {
    id,
    name: fields.name.trim(),
    surname: fields.surname.trim(),
    phoneNumber: fields.phoneNumber.trim(),
  };
}

export function fullName(entry: Pick<Entry, 'name' | 'surname'>): string {
  return `${entry.name} ${entry.surname}`.trim();
}
