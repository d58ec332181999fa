import { dirname } from 'path';

import { BaseRepo } from './base-repo.js';
import { outputLines } from './command.js';
import { ensureDir } from '../../utils/fs.js';

/**
 * Centralized backend: revisions are numbers, tags are directories under ^/tags.
 */
export class SvnRepo extends BaseRepo {
  readonly kind = 'svn' as const;

  protected async readRemote(): Promise<string> {
    return this.exec('svn', ['info', '--show-item', 'url']);
  }

  async isDirty(): Promise<boolean> {
    const status = await this.exec('svn', ['status', '--quiet']);
    return status.length > 0;
  }

  async get(): Promise<void> {
    await ensureDir(dirname(this.localPath));
    await this.run('svn', ['checkout', this.remote, this.localPath]);
  }

  async updateVersion(ref: string): Promise<void> {
    await this.exec('svn', ['update', '--revision', ref]);
  }

  async isReference(ref: string): Promise<boolean> {
    return ref === await this.version();
  }

  async version(): Promise<string> {
    return this.exec('svn', ['info', '--show-item', 'revision']);
  }

  async tags(): Promise<string[]> {
    try {
      return outputLines(await this.exec('svn', ['list', '^/tags'])).map(tag => tag.replace(/\/$/, ''));
    } catch {
      return [];
    }
  }
}
