import { dirname } from 'path';

import { BaseRepo } from './base-repo.js';
import { outputLines } from './command.js';
import { ensureDir } from '../../utils/fs.js';

export class GitRepo extends BaseRepo {
  readonly kind = 'git' as const;

  protected async readRemote(): Promise<string> {
    return this.exec('git', ['config', '--get', 'remote.origin.url']);
  }

  async isDirty(): Promise<boolean> {
    // Tracked changes only, like the hg and svn checks
    const status = await this.exec('git', ['status', '--porcelain', '--untracked-files=no']);
    return status.length > 0;
  }

  async get(): Promise<void> {
    await ensureDir(dirname(this.localPath));
    await this.run('git', ['clone', this.remote, this.localPath]);
  }

  async updateVersion(ref: string): Promise<void> {
    await this.exec('git', ['fetch', '--tags', 'origin']);
    await this.exec('git', ['checkout', ref]);
  }

  async isReference(ref: string): Promise<boolean> {
    try {
      const target = await this.exec('git', ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
      return target === await this.version();
    } catch {
      return false;
    }
  }

  async version(): Promise<string> {
    return this.exec('git', ['rev-parse', 'HEAD']);
  }

  async tags(): Promise<string[]> {
    return outputLines(await this.exec('git', ['tag', '--list']));
  }
}
