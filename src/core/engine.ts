/**
 * Wires the engine components together for one invocation.
 */

import type { BuiltinClassifier, EngineConfig, ImportExtractor } from '../types/index.js';
import type { VcsProvider } from './vcs/types.js';
import { ModuleNode } from './graph/module-node.js';
import { ManifestStore } from './manifest/manifest-store.js';
import { SourceImportExtractor } from './source/import-extractor.js';
import { MetadataLoader } from './source/metadata-loader.js';
import { ImportResolver } from './resolution/import-resolver.js';
import { DependencyGraphBuilder } from './resolution/graph-builder.js';
import { VersionController } from './vcs/version-controller.js';
import { InstallOrchestrator } from './install/install-orchestrator.js';
import { isBuiltinImport } from '../utils/module-name.js';

export interface EngineCollaborators {
  extractor?: ImportExtractor;
  isBuiltin?: BuiltinClassifier;
  vcs?: VcsProvider;
}

export interface DependencyEngine {
  readonly config: EngineConfig;
  readonly manifests: ManifestStore;
  readonly metadata: MetadataLoader;
  readonly resolver: ImportResolver;
  readonly versions: VersionController;
  readonly installer: InstallOrchestrator;
  readonly graph: DependencyGraphBuilder;
}

export function createEngine(config: EngineConfig, collaborators: EngineCollaborators = {}): DependencyEngine {
  const extractor = collaborators.extractor ?? new SourceImportExtractor(config);
  const manifests = new ManifestStore();
  const metadata = new MetadataLoader(config, extractor);
  const resolver = new ImportResolver(config, extractor, collaborators.isBuiltin ?? isBuiltinImport);

  // The graph builder and the version controller refer to each other:
  // checkout falls back to re-deriving the parent's dependencies.
  const versions = new VersionController(config, manifests, {
    provider: collaborators.vcs,
    onManifestAbsent: parent => graph.rederive(parent)
  });
  const installer = new InstallOrchestrator(config, versions);
  const graph: DependencyGraphBuilder = new DependencyGraphBuilder(config, resolver, metadata, installer);

  return { config, manifests, metadata, resolver, versions, installer, graph };
}

/**
 * Root node for the current workspace.
 */
export function createRootNode(config: EngineConfig): ModuleNode {
  return new ModuleNode('', { path: config.cwd });
}
