import { dirname } from 'path';

import { BaseRepo } from './base-repo.js';
import { outputLines } from './command.js';
import { ensureDir } from '../../utils/fs.js';

export class HgRepo extends BaseRepo {
  readonly kind = 'hg' as const;

  protected async readRemote(): Promise<string> {
    return this.exec('hg', ['paths', 'default']);
  }

  async isDirty(): Promise<boolean> {
    const status = await this.exec('hg', ['status', '--modified', '--added', '--removed', '--deleted']);
    return status.length > 0;
  }

  async get(): Promise<void> {
    await ensureDir(dirname(this.localPath));
    await this.run('hg', ['clone', this.remote, this.localPath]);
  }

  async updateVersion(ref: string): Promise<void> {
    await this.exec('hg', ['pull']);
    await this.exec('hg', ['update', '--rev', ref]);
  }

  async isReference(ref: string): Promise<boolean> {
    try {
      const target = await this.exec('hg', ['log', '--rev', ref, '--template', '{node}']);
      return target === await this.version();
    } catch {
      return false;
    }
  }

  async version(): Promise<string> {
    return this.exec('hg', ['log', '--rev', '.', '--template', '{node}']);
  }

  async tags(): Promise<string[]> {
    return outputLines(await this.exec('hg', ['tags', '--quiet'])).filter(tag => tag !== 'tip');
  }
}
