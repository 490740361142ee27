import { simpleGit, type SimpleGit } from 'simple-git';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { VersionControl } from '../types/index.js';
import { logger } from '../utils/index.js';

export class GitOps implements VersionControl {
  private git: SimpleGit | null = null;
  readonly repoPath: string;

  constructor(repoPath: string) {
    this.repoPath = repoPath;
  }

  /** Open the repository, creating it on first use. */
  async init(): Promise<void> {
    if (this.git) return;

    // The directory has to exist before simpleGit will bind to it
    await fs.mkdir(this.repoPath, { recursive: true });
    const git = simpleGit(this.repoPath);

    const isRepo = await git.checkIsRepo();
    if (!isRepo) {
      await git.init();
      logger.info('Initialized git repository at', this.repoPath);
    }
    this.git = git;
  }

  /** Stage `filePath` and commit it; returns the new commit hash. */
  async commit(filePath: string, message: string): Promise<string> {
    await this.init();
    const git = this.requireGit();
    const relative = path.relative(this.repoPath, filePath);
    await git.add(relative);
    const result = await git.commit(message, relative);
    return result.commit;
  }

  private requireGit(): SimpleGit {
    if (!this.git) throw new Error(`git repository at ${this.repoPath} is not initialized`);
    return this.git;
  }
}
