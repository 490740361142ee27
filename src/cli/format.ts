import type { Entry } from '../types/index.js';

export const EMPTY_LIST = 'no entries';

export function formatEntry(entry: Entry): string {
  return [entry.id, entry.name, entry.surname, entry.phoneNumber].join('\t');
}

export function formatList(entries: readonly Entry[]): string[] {
  if (entries.length === 0) return [EMPTY_LIST];
  return entries.map(formatEntry);
}
