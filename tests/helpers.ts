import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { RecordStore } from '../src/phonebook/record-store.js';
import { MemoryRepository } from '../src/store/memory.js';
import type { Entry } from '../src/types/entry.js';

/** Create a temp directory for file-backed tests. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'phonebook-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Build an entry for testing. */
export function makeEntry(id: number, name: string, surname: string, phoneNumber: string): Entry {
  return { id, name, surname, phoneNumber };
}

/** A store over an in-memory repository seeded with `entries`. */
export function createMemoryStore(entries: Entry[] = [], lastId?: number): { store: RecordStore; repo: MemoryRepository } {
  const repo = new MemoryRepository(entries, lastId);
  return { store: new RecordStore(repo), repo };
}

/** Output sink that collects printed lines. */
export function captureOutput(): { lines: string[]; out: (line: string) => void } {
  const lines: string[] = [];
  return { lines, out: (line: string) => { lines.push(line); } };
}
