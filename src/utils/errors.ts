export type PhonebookErrorCode =
  | 'validation'
  | 'not_found'
  | 'duplicate'
  | 'store'
  | 'config';

export class PhonebookError extends Error {
  readonly code: PhonebookErrorCode;

  constructor(code: PhonebookErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'PhonebookError';
  }
}

export class ValidationError extends PhonebookError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class EntryNotFoundError extends PhonebookError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'EntryNotFoundError';
  }

  static forTerm(term: string): EntryNotFoundError {
    return new EntryNotFoundError(`no entry matches "${term}"`);
  }

  static forPhone(phoneNumber: string): EntryNotFoundError {
    return new EntryNotFoundError(`no entry with phone number ${phoneNumber}`);
  }
}

export class DuplicateEntryError extends PhonebookError {
  constructor(phoneNumber: string) {
    super('duplicate', `entry with phone number ${phoneNumber} already exists`);
    this.name = 'DuplicateEntryError';
  }
}

export class StoreError extends PhonebookError {
  constructor(message: string) {
    super('store', message);
    this.name = 'StoreError';
  }
}

export class ConfigError extends PhonebookError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for a Node system error carrying the given `code` (e.g. ENOENT). */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
