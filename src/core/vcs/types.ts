/**
 * Version-control adapter contract shared by every backend kind.
 */

/** git and hg keep a history graph locally; svn is centralized */
export type VcsKind = 'git' | 'hg' | 'svn' | 'none';

export type BackendKind = Exclude<VcsKind, 'none'>;

export interface VcsRepo {
  readonly kind: BackendKind;
  /** Remote address; read from the checkout when constructed without one */
  readonly remote: string;
  readonly localPath: string;

  /** Whether a checkout exists at `localPath` */
  checkLocal(): Promise<boolean>;
  /** Whether the working copy carries local modifications */
  isDirty(): Promise<boolean>;
  /** Initial fetch of the remote into `localPath` */
  get(): Promise<void>;
  /** Move the working copy to `ref` (tag, branch, revision) */
  updateVersion(ref: string): Promise<void>;
  /** Whether the working copy currently sits at `ref` */
  isReference(ref: string): Promise<boolean>;
  /** Concrete revision of the working copy */
  version(): Promise<string>;
  /** Tags known to the checkout */
  tags(): Promise<string[]>;
}

export interface VcsCommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Executes one VCS command-line invocation. Rejects with VcsCommandError.
 */
export type VcsCommandRunner = (
  command: string,
  args: string[],
  cwd?: string
) => Promise<VcsCommandResult>;

/**
 * Opens backend handles; swapped for an in-process fake in tests.
 */
export interface VcsProvider {
  open(kind: BackendKind, remote: string, localPath: string): Promise<VcsRepo>;
  /** First existing checkout among `paths` */
  fromPath(paths: string[]): Promise<VcsRepo | undefined>;
}
