import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { RecordStore } from '../../src/phonebook/record-store.js';
import { JsonFileRepository } from '../../src/store/json-file.js';
import { GitVersionedRepository } from '../../src/store/versioned.js';
import type { VersionControl } from '../../src/types/store.js';
import { createTempDir, makeEntry } from '../helpers.js';

class FakeVersionControl implements VersionControl {
  readonly commits: { filePath: string; message: string }[] = [];
  fail: string | null = null;

  async commit(filePath: string, message: string): Promise<string> {
    if (this.fail !== null) throw new Error(this.fail);
    this.commits.push({ filePath, message });
    return `commit-${this.commits.length}`;
  }
}

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
  ({ dir, cleanup } = await createTempDir());
});

afterEach(async () => {
  await cleanup();
});

describe('GitVersionedRepository', () => {
  it('should commit the data file after each save', async () => {
    const filePath = path.join(dir, 'entries.json');
    const vcs = new FakeVersionControl();
    const repo = new GitVersionedRepository(new JsonFileRepository(filePath), vcs);

    await repo.save({ lastId: 1, entries: [makeEntry(1, 'Alice', 'Smith', '555-0100')] }, 'Insert entry 1: Alice Smith');

    expect(vcs.commits).toEqual([{ filePath, message: 'Insert entry 1: Alice Smith' }]);
    const loaded = await repo.load();
    expect(loaded.ok && loaded.value.entries).toHaveLength(1);
  });

  it('should report a failed commit as a save failure', async () => {
    const vcs = new FakeVersionControl();
    vcs.fail = 'author identity unknown';
    const repo = new GitVersionedRepository(new JsonFileRepository(path.join(dir, 'entries.json')), vcs);

    const result = await repo.save({ lastId: 0, entries: [] }, 'anything');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('failed to record history: author identity unknown');
  });

  it('should not commit when writing the file fails', async () => {
    const vcs = new FakeVersionControl();
    const blocked = path.join(dir, 'blocked');
    await fs.mkdir(blocked);
    const repo = new GitVersionedRepository(new JsonFileRepository(blocked), vcs);

    expect((await repo.save({ lastId: 0, entries: [] }, 'anything')).ok).toBe(false);
    expect(vcs.commits).toHaveLength(0);
  });

  it('should put the previous file back when the commit fails', async () => {
    const filePath = path.join(dir, 'entries.json');
    const vcs = new FakeVersionControl();
    const repo = new GitVersionedRepository(new JsonFileRepository(filePath), vcs);
    const original = { lastId: 1, entries: [makeEntry(1, 'Alice', 'Smith', '555-0100')] };
    await repo.save(original, 'Insert entry 1: Alice Smith');
    const before = await fs.readFile(filePath, 'utf-8');

    vcs.fail = 'author identity unknown';
    const result = await repo.save(
      { lastId: 2, entries: [...original.entries, makeEntry(2, 'Bob', 'Jones', '555-0101')] },
      'Insert entry 2: Bob Jones',
    );

    expect(result.ok).toBe(false);
    expect(await fs.readFile(filePath, 'utf-8')).toBe(before);
    expect(await new JsonFileRepository(filePath).load()).toEqual({ ok: true, value: original });
  });

  it('should not leave a data file behind when the first commit fails', async () => {
    const vcs = new FakeVersionControl();
    vcs.fail = 'author identity unknown';
    const repo = new GitVersionedRepository(new JsonFileRepository(path.join(dir, 'entries.json')), vcs);

    await repo.save({ lastId: 1, entries: [makeEntry(1, 'Alice', 'Smith', '555-0100')] }, 'Insert entry 1: Alice Smith');

    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should keep the store unchanged on disk and in memory when history fails', async () => {
    const filePath = path.join(dir, 'entries.json');
    const vcs = new FakeVersionControl();
    vcs.fail = 'author identity unknown';
    const store = new RecordStore(new GitVersionedRepository(new JsonFileRepository(filePath), vcs));

    const result = await store.insert({ name: 'Alice', surname: 'Smith', phoneNumber: '555-0100' });

    expect(result.ok).toBe(false);
    expect(await new JsonFileRepository(filePath).load()).toEqual({ ok: true, value: { entries: [], lastId: 0 } });
    const list = await store.getList();
    expect(list.ok && list.value).toEqual([]);
  });
});
