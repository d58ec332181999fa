/**
 * Top-level install: rehydrate the root manifest, install what it records,
 * discover what the sources import beyond it, then persist the graph.
 */

import { basename } from 'path';

import type { CommandResult, EngineConfig } from '../../types/index.js';
import type { ImportResolutionFailure } from '../resolution/import-resolver.js';
import type { InstallResult } from './install-orchestrator.js';
import type { ModuleNode } from '../graph/module-node.js';
import { createEngine, createRootNode, type EngineCollaborators } from '../engine.js';
import { createEngineConfig, type EngineConfigOverrides } from '../config.js';
import { logger } from '../../utils/logger.js';

export interface InstallPipelineOptions extends EngineConfigOverrides {
  /** Write the root manifest afterwards (default: true) */
  save?: boolean;
  config?: EngineConfig;
  collaborators?: EngineCollaborators;
}

export interface InstallSummary {
  root: ModuleNode;
  manifestLoaded: boolean;
  manifestPath?: string;
  /** Results for every install started during this run, depth-first */
  results: InstallResult[];
  fetched: string[];
  dirty: string[];
  failed: Array<{ name: string; error: string }>;
  importFailures: ImportResolutionFailure[];
}

/**
 * Every result reachable from `results`, including installs started by
 * re-derivation, in depth-first order.
 */
export function flattenInstallResults(
  results: InstallResult[],
  importFailures: ImportResolutionFailure[] = []
): InstallResult[] {
  const flat: InstallResult[] = [];
  const visit = (result: InstallResult): void => {
    flat.push(result);
    result.dependencies.forEach(visit);
    const checkout = result.checkout;
    if (checkout && (checkout.status === 'up-to-date' || checkout.status === 'updated') && checkout.rederive) {
      importFailures.push(...checkout.rederive.failures);
      checkout.rederive.installs.forEach(visit);
    }
  };
  results.forEach(visit);
  return flat;
}

export function summarizeInstall(
  root: ModuleNode,
  topLevel: InstallResult[],
  importFailures: ImportResolutionFailure[],
  manifestLoaded: boolean
): InstallSummary {
  const allFailures = [...importFailures];
  const results = flattenInstallResults(topLevel, allFailures);
  return {
    root,
    manifestLoaded,
    results,
    fetched: results.filter(r => r.fetched).map(r => r.name),
    dirty: results.filter(r => r.checkout?.status === 'dirty').map(r => r.name),
    failed: results
      .filter(r => r.status === 'failed')
      .map(r => ({ name: r.name, error: r.error ?? 'unknown error' })),
    importFailures: allFailures
  };
}

export async function runInstallPipeline(
  options: InstallPipelineOptions = {}
): Promise<CommandResult<InstallSummary>> {
  const config = options.config ?? createEngineConfig(options);
  const engine = createEngine(config, options.collaborators);
  const root = createRootNode(config);

  const manifest = await engine.manifests.load(root);
  const topLevel: InstallResult[] = [];
  const importFailures: ImportResolutionFailure[] = [];

  if (manifest.loaded) {
    logger.info(`Installing ${root.dependencies.length} recorded dependencies from ${manifest.path}`);
    topLevel.push(...await engine.installer.installDeps(root));
  }

  const meta = await engine.metadata.load(root);
  if (meta) {
    const build = await engine.graph.init(root, meta);
    topLevel.push(...build.installs);
    importFailures.push(...build.failures);
  } else {
    logger.debug(`No buildable source in ${config.cwd}; skipping import discovery`);
  }

  if (!root.name) {
    root.name = basename(config.cwd);
  }

  const summary = summarizeInstall(root, topLevel, importFailures, manifest.loaded);
  if (options.save !== false) {
    summary.manifestPath = await engine.manifests.save(root);
  }

  return {
    success: summary.failed.length === 0,
    data: summary,
    warnings: [
      ...summary.dirty.map(name => `${name} has local modifications; checkout skipped`),
      ...summary.importFailures.map(f => `Could not read ${f.importPath} (imported by ${f.requestedBy || '.'}): ${f.reason}`)
    ]
  };
}
