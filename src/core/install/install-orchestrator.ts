/**
 * Install Orchestrator: fetch-if-absent plus checkout for one node, and
 * concurrent fan-out over a node's children.
 */

import type { EngineConfig } from '../../types/index.js';
import type { ModuleNode } from '../graph/module-node.js';
import type { CheckoutOutcome, VersionController } from '../vcs/version-controller.js';
import type { VcsRepo } from '../vcs/types.js';
import { BackendResolutionError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * - root:      the current workspace, never touched
 * - installed: fetched (when absent) and checked out
 * - shared:    another node is installing into the same checkout directory
 * - failed:    backend resolution, fetch or checkout failed
 */
export type InstallStatus = 'root' | 'installed' | 'shared' | 'failed';

export interface InstallResult {
  name: string;
  status: InstallStatus;
  fetched: boolean;
  fetchError?: string;
  checkout?: CheckoutOutcome;
  error?: string;
  /** Results for the node's own dependencies, in `dependencies` order */
  dependencies: InstallResult[];
}

export interface Installer {
  install(node: ModuleNode): Promise<InstallResult>;
}

function hasCheckedOut(outcome: CheckoutOutcome): boolean {
  return outcome.status === 'up-to-date' || outcome.status === 'updated';
}

export class InstallOrchestrator implements Installer {
  /** Checkout directories with an install in progress; one writer each */
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly config: EngineConfig,
    private readonly versions: VersionController
  ) {}

  /**
   * Install one node. Never rejects: every failure is reported on the result.
   */
  async install(node: ModuleNode): Promise<InstallResult> {
    const result: InstallResult = { name: node.name, status: 'installed', fetched: false, dependencies: [] };
    if (node.isRoot()) {
      return { ...result, status: 'root' };
    }

    const checkoutDir = node.repoPath(this.config);
    if (this.inFlight.has(checkoutDir)) {
      logger.forModule(node.name).debug(`Already being installed into ${checkoutDir}`);
      return { ...result, status: 'shared' };
    }

    this.inFlight.add(checkoutDir);
    try {
      return await this.installExclusive(node, result);
    } catch (error) {
      logger.error(`Unexpected failure installing ${node.name}`, error);
      return { ...result, status: 'failed', error: errorMessage(error) };
    } finally {
      this.inFlight.delete(checkoutDir);
    }
  }

  private async installExclusive(node: ModuleNode, result: InstallResult): Promise<InstallResult> {
    const log = logger.forModule(node.name);
    let repo: VcsRepo;
    try {
      repo = await this.versions.vcs(node);
    } catch (error) {
      const failure = error instanceof BackendResolutionError
        ? error
        : new BackendResolutionError(node.name, errorMessage(error));
      log.error(failure.message);
      return { ...result, status: 'failed', error: failure.message };
    }

    node.installed = await repo.checkLocal();
    node.path = repo.localPath;
    if (!node.installed) {
      logger.info(`Installing ${node.name}`);
      try {
        await repo.get();
        result.fetched = true;
      } catch (error) {
        // Checkout still runs and reports the missing working copy
        result.fetchError = errorMessage(error);
        log.error(`Fetch into ${node.path} failed: ${result.fetchError}`);
      }
    }

    const checkout = await this.versions.checkout(node);
    result.checkout = checkout;

    if (hasCheckedOut(checkout)) {
      const inherited = node.pruneInherited();
      if (inherited.length > 0) {
        log.debug(`Ancestors already provide ${inherited.join(', ')}`);
      }
      result.dependencies = await this.installDeps(node);
    }

    if (result.fetchError) {
      return { ...result, status: 'failed', error: result.fetchError };
    }
    if (checkout.status === 'failed' || checkout.status === 'not-installed') {
      const error = checkout.status === 'failed' ? checkout.error : `${node.name} has no local checkout`;
      return { ...result, status: 'failed', error };
    }
    return result;
  }

  /**
   * Install every direct child concurrently; one result per child, in order.
   */
  async installDeps(node: ModuleNode): Promise<InstallResult[]> {
    const results = await Promise.all(node.dependencies.map(dep => this.install(dep)));
    for (const result of results) {
      if (result.status === 'failed') {
        logger.warn(`Module ${result.name} could not be installed: ${result.error}`);
      }
    }
    return results;
  }
}
