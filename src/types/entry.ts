export interface Entry {
  readonly id: number;
  readonly name: string;
  readonly surname: string;
  readonly phoneNumber: string;
}

/** An entry as supplied by the caller, before the store assigns its id. */
export type NewEntry = Omit<Entry, 'id'>;

export interface EntryCollection {
  entries: Entry[];
  /** Highest identifier ever assigned, including ids of deleted entries. */
  lastId: number;
}

export function emptyCollection(): EntryCollection {
  return { entries: [], lastId: 0 };
}
