/**
 * Dependency graph builder.
 * Turns a unit's metadata into child nodes for every newly discovered
 * module and installs them concurrently.
 */

import type { EngineConfig, ModuleMeta } from '../../types/index.js';
import { ModuleNode } from '../graph/module-node.js';
import type { ImportResolutionFailure, ImportResolver } from './import-resolver.js';
import type { Installer, InstallResult } from '../install/install-orchestrator.js';
import type { MetadataLoader } from '../source/metadata-loader.js';
import { baseModuleName } from '../../utils/module-name.js';
import { logger } from '../../utils/logger.js';

export interface GraphBuildResult {
  /** Names of the children created by this call, in creation order */
  added: string[];
  /** Names already present somewhere in the ancestor chain */
  reused: string[];
  /** One result per added child, same order as `added` */
  installs: InstallResult[];
  failures: ImportResolutionFailure[];
}

export class DependencyGraphBuilder {
  constructor(
    private readonly config: EngineConfig,
    private readonly resolver: ImportResolver,
    private readonly metadata: MetadataLoader,
    private readonly installer: Installer
  ) {}

  async init(node: ModuleNode, meta: ModuleMeta): Promise<GraphBuildResult> {
    node.path = meta.dir;
    if (node.isInWorkspace(this.config)) {
      node.name = baseModuleName(meta.importPath);
    }

    const { modules, failures } = await this.resolver.resolve(node.name, meta.imports);

    const added: ModuleNode[] = [];
    const reused: string[] = [];
    // Lookup and append run without an intervening await, so concurrent
    // builders always observe a consistent dependency list
    for (const name of modules) {
      if (node.isInLineage(name)) {
        continue;
      }
      if (node.find(name)) {
        // First discovery wins; differing constraints are not reconciled
        reused.push(name);
        continue;
      }
      added.push(node.addDependency(new ModuleNode(name)));
    }

    if (added.length > 0) {
      logger.debug(`Discovered ${added.length} new dependencies of ${node.name || '.'}`, {
        added: added.map(dep => dep.name)
      });
    }

    const installs = await Promise.all(added.map(dep => this.installer.install(dep)));

    return {
      added: added.map(dep => dep.name),
      reused,
      installs,
      failures
    };
  }

  /**
   * Re-run discovery for `node` from its own metadata. Used when a
   * dependency predates manifests and its imports must be derived from
   * source instead.
   */
  async rederive(node: ModuleNode): Promise<GraphBuildResult | undefined> {
    const meta = await this.metadata.load(node);
    if (!meta) {
      return undefined;
    }
    return this.init(node, meta);
  }
}
