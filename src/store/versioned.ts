import * as path from 'node:path';
import type { EntryCollection, EntryRepository, VersionControl } from '../types/index.js';
import { StoreError, describeError, logger, ok, err, type Result } from '../utils/index.js';
import { GitOps } from './git-ops.js';
import type { JsonFileRepository } from './json-file.js';

/**
 * Data file whose every change is committed to a git repository living in
 * the file's directory.
 */
export class GitVersionedRepository implements EntryRepository {
  private inner: JsonFileRepository;
  private vcs: VersionControl;

  constructor(inner: JsonFileRepository, vcs?: VersionControl) {
    this.inner = inner;
    this.vcs = vcs ?? new GitOps(path.dirname(inner.filePath));
  }

  load(): Promise<Result<EntryCollection>> {
    return this.inner.load();
  }

  async save(collection: EntryCollection, message: string): Promise<Result<void>> {
    const previous = await this.inner.snapshot();
    if (!previous.ok) return previous;

    const saved = await this.inner.save(collection, message);
    if (!saved.ok) return saved;

    try {
      const hash = await this.vcs.commit(this.inner.filePath, message);
      logger.debug('Committed', hash, message);
    } catch (e) {
      // The file must not hold a change that history does not
      const restored = await this.inner.restore(previous.value);
      if (!restored.ok) logger.error('Could not roll back', this.inner.filePath, restored.error.message);
      return err(new StoreError(`failed to record history: ${describeError(e)}`));
    }
    return ok(undefined);
  }
}
