export type { Entry, NewEntry, EntryCollection } from './entry.js';
export { emptyCollection } from './entry.js';
export type { EntryRepository, VersionControl } from './store.js';
