import { join } from 'path';

import type { BackendKind, VcsCommandRunner, VcsRepo } from './types.js';
import { VCS_MARKERS } from '../../constants/index.js';
import { exists } from '../../utils/fs.js';
import { runVcsCommand } from './command.js';

/**
 * Shared plumbing for command-line backed repositories.
 */
export abstract class BaseRepo implements VcsRepo {
  abstract readonly kind: BackendKind;
  remote: string;

  constructor(
    remote: string,
    readonly localPath: string,
    protected readonly run: VcsCommandRunner = runVcsCommand
  ) {
    this.remote = remote;
  }

  async checkLocal(): Promise<boolean> {
    return exists(join(this.localPath, VCS_MARKERS[this.kind]));
  }

  /**
   * Fill in `remote` from the checkout's own configuration.
   */
  async loadRemote(): Promise<void> {
    this.remote = await this.readRemote();
  }

  protected async exec(command: string, args: string[]): Promise<string> {
    const { stdout } = await this.run(command, args, this.localPath);
    return stdout.trim();
  }

  protected abstract readRemote(): Promise<string>;

  abstract isDirty(): Promise<boolean>;
  abstract get(): Promise<void>;
  abstract updateVersion(ref: string): Promise<void>;
  abstract isReference(ref: string): Promise<boolean>;
  abstract version(): Promise<string>;
  abstract tags(): Promise<string[]>;
}
