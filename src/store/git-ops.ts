import { simpleGit, type SimpleGit, type LogOptions, type LogResult } from 'simple-git';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StoreError, logger } from '../utils/index.js';
import { CONTACTS_DIR, METADATA_DIR } from './file-layout.js';

const COMMITTER_NAME = 'contact-curator';
const COMMITTER_EMAIL = 'contact-curator@localhost';

export class GitOps {
  private git: SimpleGit | undefined;
  readonly storePath: string;

  constructor(storePath: string) {
    this.storePath = storePath;
  }

  /** Initialize the git repo and directory structure. Safe to call on an existing store. */
  async init(): Promise<void> {
    // Directories first so simpleGit has a working directory
    await fs.mkdir(path.join(this.storePath, CONTACTS_DIR), { recursive: true });
    await fs.mkdir(path.join(this.storePath, METADATA_DIR), { recursive: true });

    const git = simpleGit(this.storePath);
    this.git = git;

    const isRepo = await git.checkIsRepo().catch(() => false);
    if (!isRepo) {
      await git.init();
      // Commits must not depend on a global git identity being configured
      await git.addConfig('user.name', COMMITTER_NAME);
      await git.addConfig('user.email', COMMITTER_EMAIL);
      await fs.writeFile(path.join(this.storePath, '.gitignore'), '.lock\n', 'utf-8');
      await git.add('.gitignore');
      await git.commit('Initial commit');
      logger.info('Initialized git repository at', this.storePath);
    }
  }

  async add(filePath: string): Promise<void> {
    await this.repo().add(filePath);
  }

  async addMultiple(filePaths: string[]): Promise<void> {
    if (filePaths.length > 0) {
      await this.repo().add(filePaths);
    }
  }

  /** Remove a tracked file from the working tree and stage the removal. */
  async remove(filePath: string): Promise<void> {
    await this.repo().rm(filePath);
  }

  async commit(message: string): Promise<string> {
    const result = await this.repo().commit(message);
    return result.commit;
  }

  async log(options: { file?: string; maxCount?: number } = {}): Promise<LogResult> {
    const logOptions: LogOptions = {};
    if (options.maxCount) logOptions.maxCount = options.maxCount;
    if (options.file) logOptions.file = options.file;
    return this.repo().log(logOptions);
  }

  private repo(): SimpleGit {
    if (!this.git) throw new StoreError('Store not initialized; call init() first');
    return this.git;
  }
}
