import type { EngineConfig, ImportExtractor, ModuleMeta } from '../../types/index.js';
import type { ModuleNode } from '../graph/module-node.js';
import { NoSourceError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Per-node cached metadata. A unit without buildable source yields
 * `undefined`, which callers treat as "nothing to discover".
 */
export class MetadataLoader {
  constructor(
    private readonly config: EngineConfig,
    private readonly extractor: ImportExtractor
  ) {}

  async load(node: ModuleNode): Promise<ModuleMeta | undefined> {
    if (node.meta) {
      return node.meta;
    }
    try {
      node.meta = await this.extractor.extract(node.fqn(), this.config.cwd);
    } catch (error) {
      if (!(error instanceof NoSourceError)) {
        logger.warn(`Unable to read metadata for ${node.fqn()}: ${errorMessage(error)}`);
      } else {
        logger.debug(error.message);
      }
      return undefined;
    }
    return node.meta;
  }
}
