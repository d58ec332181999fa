/**
 * Version Controller: binds a module node to a version-control backend and
 * pins its working copy.
 */

import { join } from 'path';
import * as semver from 'semver';

import type { EngineConfig } from '../../types/index.js';
import type { ModuleNode } from '../graph/module-node.js';
import type { GraphBuildResult } from '../resolution/graph-builder.js';
import type { VcsKind, VcsProvider, VcsRepo } from './types.js';
import type { ManifestStore } from '../manifest/manifest-store.js';
import { DIR_PATTERNS } from '../../constants/index.js';
import { inferKindFromUrl, inferRemoteFromName } from './remote-inference.js';
import { commandLineVcs } from './detect.js';
import { BackendResolutionError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Re-derives a parent's dependency set from source when a freshly checked
 * out module carries no manifest of its own.
 */
export type ManifestFallback = (parent: ModuleNode) => Promise<GraphBuildResult | undefined>;

export type ManifestState = 'loaded' | 'rederived' | 'absent';

export type CheckoutOutcome =
  | { status: 'skipped-root' }
  | { status: 'not-installed' }
  | { status: 'dirty' }
  | { status: 'failed'; error: string }
  | {
      status: 'up-to-date' | 'updated';
      reference: string;
      manifest: ManifestState;
      rederive?: GraphBuildResult;
    };

export interface VersionControllerOptions {
  provider?: VcsProvider;
  onManifestAbsent?: ManifestFallback;
}

export class VersionController {
  private readonly provider: VcsProvider;
  private readonly onManifestAbsent?: ManifestFallback;

  constructor(
    private readonly config: EngineConfig,
    private readonly manifests: ManifestStore,
    options: VersionControllerOptions = {}
  ) {
    this.provider = options.provider ?? commandLineVcs();
    this.onManifestAbsent = options.onManifestAbsent;
  }

  /**
   * Memoized backend handle. Concurrent callers share one construction; a
   * failed construction is not cached.
   */
  vcs(node: ModuleNode): Promise<VcsRepo> {
    node.repo ??= this.createRepo(node).catch((error: unknown) => {
      node.repo = undefined;
      throw error;
    });
    return node.repo;
  }

  /**
   * Where an existing checkout of `node` may already live.
   */
  private checkoutPaths(node: ModuleNode): string[] {
    return [
      node.repoPath(this.config),
      join(this.config.workspaceRoot, DIR_PATTERNS.WORKSPACE_SRC, node.name)
    ];
  }

  async repoType(node: ModuleNode): Promise<VcsKind> {
    const existing = await this.provider.fromPath(this.checkoutPaths(node));
    if (existing) {
      return existing.kind;
    }
    const inferred = inferRemoteFromName(node.name);
    if (inferred.kind === 'none' && node.url) {
      return inferKindFromUrl(node.url);
    }
    return inferred.kind;
  }

  /**
   * Remote address for `node`. Inferring it from a versioned name
   * (gopkg.in/yaml.v2) also fills in an empty version constraint.
   */
  async repoUrl(node: ModuleNode): Promise<string> {
    if (node.url) {
      return node.url;
    }
    const existing = await this.provider.fromPath(this.checkoutPaths(node));
    if (existing) {
      return existing.remote;
    }
    const inferred = inferRemoteFromName(node.name);
    if (inferred.version && !node.version) {
      node.version = inferred.version;
    }
    return inferred.url;
  }

  private async createRepo(node: ModuleNode): Promise<VcsRepo> {
    const kind = await this.repoType(node);
    if (kind === 'none') {
      throw new BackendResolutionError(node.name, 'no version control backend matches this module');
    }
    const url = await this.repoUrl(node);
    try {
      return await this.provider.open(kind, url, node.repoPath(this.config));
    } catch (error) {
      throw new BackendResolutionError(node.name, errorMessage(error));
    }
  }

  /**
   * Semver ranges resolve to the highest matching tag; anything else (a
   * branch, a revision, a range no tag satisfies) is used verbatim.
   */
  async resolveTarget(repo: VcsRepo, target: string): Promise<string> {
    if (!semver.validRange(target)) {
      return target;
    }
    try {
      const tags = (await repo.tags()).filter(tag => semver.valid(tag) !== null);
      return semver.maxSatisfying(tags, target) ?? target;
    } catch (error) {
      logger.debug(`Could not list tags in ${repo.localPath}: ${errorMessage(error)}`);
      return target;
    }
  }

  /**
   * Move the node's working copy to its pinned reference (or, failing that,
   * its version constraint), record the resolved revision, then load the
   * nested manifest. Without one, the parent's dependencies are re-derived
   * unless the checkout was already at its target.
   */
  async checkout(node: ModuleNode): Promise<CheckoutOutcome> {
    const parent = node.parent;
    if (!parent) {
      return { status: 'skipped-root' };
    }

    const log = logger.forModule(node.name);
    let status: 'up-to-date' | 'updated' = 'up-to-date';
    let satisfied = false;
    try {
      const repo = await this.vcs(node);
      node.installed = await repo.checkLocal();
      if (!node.installed) {
        return { status: 'not-installed' };
      }
      if (await repo.isDirty()) {
        log.warn('Skipping checkout. Dependency is dirty.');
        return { status: 'dirty' };
      }

      const target = node.reference || node.version;
      if (target) {
        const resolved = await this.resolveTarget(repo, target);
        if (await repo.isReference(resolved)) {
          log.info(`OK at ${resolved}`);
          satisfied = true;
        } else {
          await repo.updateVersion(resolved);
          status = 'updated';
        }
      }

      node.reference = await repo.version();
      node.path = repo.localPath;
    } catch (error) {
      log.error(`Checkout failed: ${errorMessage(error)}`);
      return { status: 'failed', error: errorMessage(error) };
    }

    const reference = node.reference;
    const manifest = await this.manifests.load(node);
    if (manifest.loaded) {
      // The checked out revision wins over whatever the module recorded for itself
      node.reference = reference;
      return { status, reference, manifest: 'loaded' };
    }

    // A checkout already at its target is done; only moved or unpinned
    // checkouts re-derive the parent's dependencies
    if (satisfied) {
      return { status, reference, manifest: 'absent' };
    }
    const rederive = this.onManifestAbsent ? await this.onManifestAbsent(parent) : undefined;
    return rederive
      ? { status, reference, manifest: 'rederived', rederive }
      : { status, reference, manifest: 'absent' };
  }
}
