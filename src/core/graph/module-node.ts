import { join, sep } from 'path';

import type { EngineConfig, ModuleMeta } from '../../types/index.js';
import type { VcsRepo } from '../vcs/types.js';
import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import { isSameOrSubpackage } from '../../utils/module-name.js';

/** Version compatibility expression, e.g. "~1.0.0", "1.*" or "v2" */
export type VersionConstraint = string;

/**
 * One module in the dependency graph: the root (current workspace) or a
 * dependency. Children are owned through `dependencies`; `parent` is a
 * lookup-only back-reference.
 */
export class ModuleNode {
  name: string;
  version: VersionConstraint = '';
  reference = '';
  url = '';
  dependencies: ModuleNode[] = [];

  parent?: ModuleNode;

  // Transient state, never serialized
  path = '';
  meta?: ModuleMeta;
  repo?: Promise<VcsRepo>;
  installed = false;
  hasManifest = false;
  manifestFile: string = FILE_PATTERNS.MANIFEST_YML;

  constructor(name: string, init: Partial<Pick<ModuleNode, 'version' | 'reference' | 'url' | 'path'>> = {}) {
    this.name = name;
    this.version = init.version ?? '';
    this.reference = init.reference ?? '';
    this.url = init.url ?? '';
    this.path = init.path ?? '';
  }

  isRoot(): boolean {
    return this.parent === undefined;
  }

  /**
   * Topmost node (the application module)
   */
  root(): ModuleNode {
    let node: ModuleNode = this;
    while (node.parent) {
      node = node.parent;
    }
    return node;
  }

  /**
   * Nearest node named `name`: own direct dependencies first, then each
   * ancestor's direct dependencies in turn.
   */
  find(name: string): ModuleNode | undefined {
    let scope: ModuleNode | undefined = this;
    while (scope) {
      const match = scope.dependencies.find(dep => dep.name === name);
      if (match) {
        return match;
      }
      scope = scope.parent;
    }
    return undefined;
  }

  /**
   * Whether `name` is this node, one of its ancestors, or a subpackage of
   * either. Such a name is never added as a dependency.
   */
  isInLineage(name: string): boolean {
    let node: ModuleNode | undefined = this;
    while (node) {
      if (isSameOrSubpackage(name, node.name)) {
        return true;
      }
      node = node.parent;
    }
    return false;
  }

  /**
   * Drop dependencies the ancestor chain already provides, as a nested
   * manifest may list modules the application pins itself. Returns the
   * names removed.
   */
  pruneInherited(): string[] {
    const parent = this.parent;
    if (!parent) {
      return [];
    }
    const removed: string[] = [];
    this.dependencies = this.dependencies.filter(dep => {
      if (parent.find(dep.name) || this.isInLineage(dep.name)) {
        removed.push(dep.name);
        return false;
      }
      return true;
    });
    return removed;
  }

  /**
   * Link `child` under this node and append it in discovery order.
   */
  addDependency(child: ModuleNode): ModuleNode {
    child.parent = this;
    this.dependencies.push(child);
    return child;
  }

  /**
   * Restore parent links for every dependency subtree; serialized manifests
   * cannot carry them.
   */
  relinkDependencies(): void {
    for (const dep of this.dependencies) {
      dep.parent = this;
      dep.relinkDependencies();
    }
  }

  /**
   * Depth-first pre-order traversal of this node's subtree (excluding itself).
   */
  *walk(): Generator<{ node: ModuleNode; depth: number }> {
    for (const dep of this.dependencies) {
      yield { node: dep, depth: 1 };
      for (const nested of dep.walk()) {
        yield { node: nested.node, depth: nested.depth + 1 };
      }
    }
  }

  repoPath(config: EngineConfig): string {
    return join(config.installRoot, this.name);
  }

  /**
   * Whether the application and all its vendored modules live inside the
   * shared workspace source tree.
   */
  isInWorkspace(config: EngineConfig): boolean {
    if (this.parent) {
      return this.root().isInWorkspace(config);
    }
    const workspaceSrc = join(config.workspaceRoot, DIR_PATTERNS.WORKSPACE_SRC);
    return this.path === workspaceSrc || this.path.startsWith(workspaceSrc + sep);
  }

  /**
   * Name the import extractor resolves for this node: the working directory
   * for the root, the module name otherwise.
   */
  fqn(): string {
    return this.isRoot() ? '.' : this.name;
  }
}
