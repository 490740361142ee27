export { RecordStore } from './record-store.js';
export type { RecordStoreOptions } from './record-store.js';
export { createEntry, fullName, nextId } from './model.js';
export { normalizePhone, normalizeName, samePhone, isCountryCode, DEFAULT_COUNTRY } from './normalize.js';
export { searchEntries, matchesEntry, findByPhone, phoneMatches } from './search.js';
