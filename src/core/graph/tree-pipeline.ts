import type { CommandResult } from '../../types/index.js';
import { createEngineConfig, type EngineConfigOverrides } from '../config.js';
import { createRootNode } from '../engine.js';
import { ManifestStore } from '../manifest/manifest-store.js';
import { renderDependencyTree } from './tree-display.js';

export interface TreeReport {
  manifestPath: string;
  lines: string[];
  moduleCount: number;
}

/**
 * Render the graph recorded in the root manifest.
 */
export async function runTreePipeline(options: EngineConfigOverrides = {}): Promise<CommandResult<TreeReport>> {
  const config = createEngineConfig(options);
  const root = createRootNode(config);
  const result = await new ManifestStore().load(root);
  if (!result.loaded) {
    return { success: false, error: `No manifest at ${result.path}. Run 'modpin install' first.` };
  }
  return {
    success: true,
    data: {
      manifestPath: result.path,
      lines: renderDependencyTree(root),
      moduleCount: Array.from(root.walk()).length
    }
  };
}
