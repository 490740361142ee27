import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { EntryCollection, EntryRepository } from '../types/index.js';
import { emptyCollection } from '../types/index.js';
import {
  StoreError, describeError, hasErrorCode, logger, ok, err, type Result,
} from '../utils/index.js';

export const DATA_FILE_VERSION = 1;

const entrySchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  surname: z.string(),
  phoneNumber: z.string(),
});

const dataFileSchema = z.object({
  version: z.literal(DATA_FILE_VERSION),
  lastId: z.number().int().nonnegative(),
  entries: z.array(entrySchema),
}).superRefine((data, ctx) => {
  const seen = new Set<number>();
  for (const entry of data.entries) {
    if (seen.has(entry.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate id ${entry.id}` });
    }
    seen.add(entry.id);
  }
});

export type DataFile = z.infer<typeof dataFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Parse and validate the text of a data file. */
export function parseDataFile(raw: string): Result<EntryCollection> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    return err(new StoreError(`invalid JSON (${describeError(e)})`));
  }

  const parsed = dataFileSchema.safeParse(json);
  if (!parsed.success) {
    return err(new StoreError(formatIssues(parsed.error)));
  }
  return ok({ entries: parsed.data.entries, lastId: parsed.data.lastId });
}

export function serializeDataFile(collection: EntryCollection): string {
  const data: DataFile = {
    version: DATA_FILE_VERSION,
    lastId: collection.lastId,
    entries: collection.entries.map(({ id, name, surname, phoneNumber }) => ({ id, name, surname, phoneNumber })),
  };
  return JSON.stringify(data, null, 2) + '\n';
}

/** Entries kept in a single JSON document on disk. */
export class JsonFileRepository implements EntryRepository {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<Result<EntryCollection>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (e) {
      if (hasErrorCode(e, 'ENOENT')) {
        logger.debug('No data file at', this.filePath, '- starting empty');
        return ok(emptyCollection());
      }
      return err(new StoreError(`failed to load entries from ${this.filePath}: ${describeError(e)}`));
    }

    const parsed = parseDataFile(raw);
    if (!parsed.ok) {
      return err(new StoreError(`failed to load entries from ${this.filePath}: ${parsed.error.message}`));
    }
    return parsed;
  }

  async save(collection: EntryCollection, message: string): Promise<Result<void>> {
    const written = await this.write(serializeDataFile(collection));
    if (!written.ok) return written;

    logger.debug('Saved', collection.entries.length, 'entries:', message);
    return ok(undefined);
  }

  /** Raw file contents, or null when there is no file yet. */
  async snapshot(): Promise<Result<string | null>> {
    try {
      return ok(await fs.readFile(this.filePath, 'utf-8'));
    } catch (e) {
      if (hasErrorCode(e, 'ENOENT')) return ok(null);
      return err(new StoreError(`failed to read ${this.filePath}: ${describeError(e)}`));
    }
  }

  /** Put back contents taken with `snapshot()`; null removes the file. */
  async restore(snapshot: string | null): Promise<Result<void>> {
    if (snapshot !== null) return this.write(snapshot);
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (e) {
      return err(new StoreError(`failed to remove ${this.filePath}: ${describeError(e)}`));
    }
    return ok(undefined);
  }

  private async write(text: string): Promise<Result<void>> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, text, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (e) {
      await fs.rm(tmpPath, { force: true })
        .catch((rmErr: unknown) => logger.debug('Could not remove', tmpPath, describeError(rmErr)));
      return err(new StoreError(`failed to save entries to ${this.filePath}: ${describeError(e)}`));
    }
    return ok(undefined);
  }
}
