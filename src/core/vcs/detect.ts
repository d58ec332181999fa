import { join } from 'path';

import type { BackendKind, VcsCommandRunner, VcsProvider } from './types.js';
import { VCS_MARKERS } from '../../constants/index.js';
import { isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { BaseRepo } from './base-repo.js';
import { GitRepo } from './git-repo.js';
import { HgRepo } from './hg-repo.js';
import { SvnRepo } from './svn-repo.js';
import { runVcsCommand } from './command.js';

const DETECTION_ORDER: BackendKind[] = ['git', 'hg', 'svn'];

/**
 * Backend kind of the checkout at `path`, judged by its metadata directory.
 */
export async function detectVcsFromFs(path: string): Promise<BackendKind | undefined> {
  for (const kind of DETECTION_ORDER) {
    if (await isDirectory(join(path, VCS_MARKERS[kind]))) {
      return kind;
    }
  }
  return undefined;
}

export function createRepo(
  kind: BackendKind,
  remote: string,
  localPath: string,
  run: VcsCommandRunner = runVcsCommand
): BaseRepo {
  switch (kind) {
    case 'git':
      return new GitRepo(remote, localPath, run);
    case 'hg':
      return new HgRepo(remote, localPath, run);
    case 'svn':
      return new SvnRepo(remote, localPath, run);
  }
}

/**
 * Construct a backend handle. Without an explicit remote, an existing
 * checkout supplies its own.
 */
export async function openRepo(
  kind: BackendKind,
  remote: string,
  localPath: string,
  run: VcsCommandRunner = runVcsCommand
): Promise<BaseRepo> {
  const repo = createRepo(kind, remote, localPath, run);
  if (!remote && await repo.checkLocal()) {
    await repo.loadRemote();
  }
  return repo;
}

/**
 * First existing checkout among `paths`, in order.
 */
export async function repoFromPath(
  paths: string[],
  run: VcsCommandRunner = runVcsCommand
): Promise<BaseRepo | undefined> {
  for (const path of paths) {
    const kind = await detectVcsFromFs(path);
    if (!kind) {
      continue;
    }
    try {
      return await openRepo(kind, '', path, run);
    } catch (error) {
      logger.debug(`Ignoring unreadable ${kind} checkout at ${path}: ${errorMessage(error)}`);
    }
  }
  return undefined;
}

/**
 * Provider backed by the git, hg and svn command-line tools.
 */
export function commandLineVcs(run: VcsCommandRunner = runVcsCommand): VcsProvider {
  return {
    open: (kind, remote, localPath) => openRepo(kind, remote, localPath, run),
    fromPath: paths => repoFromPath(paths, run)
  };
}
