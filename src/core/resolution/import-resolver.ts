/**
 * Import Resolver: flattens a unit's direct imports into the sorted set of
 * external modules it depends on, descending into every import whose
 * metadata is already readable.
 */

import type { BuiltinClassifier, EngineConfig, ImportExtractor } from '../../types/index.js';
import { DIR_PATTERNS } from '../../constants/index.js';
import { baseModuleName, isBuiltinImport } from '../../utils/module-name.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * A branch whose metadata could not be loaded, typically because the module
 * is not installed yet. Recursion stops there; resolution continues.
 */
export interface ImportResolutionFailure {
  importPath: string;
  requestedBy: string;
  reason: string;
}

export interface ImportResolution {
  /** External module roots, unique and sorted */
  modules: string[];
  failures: ImportResolutionFailure[];
}

export class ImportResolver {
  constructor(
    private readonly config: EngineConfig,
    private readonly extractor: ImportExtractor,
    private readonly isBuiltin: BuiltinClassifier = isBuiltinImport
  ) {}

  async resolve(name: string, imports: string[]): Promise<ImportResolution> {
    const failures: ImportResolutionFailure[] = [];
    const found = await this.collect(name, imports, failures, new Set([name]));
    const modules = Array.from(new Set(found)).sort();
    logger.debug(`Resolved imports for ${name || '.'}`, { modules, failures: failures.length });
    return { modules, failures };
  }

  private async collect(
    name: string,
    imports: string[],
    failures: ImportResolutionFailure[],
    active: Set<string>
  ): Promise<string[]> {
    const found: string[] = [];

    for (const importPath of imports) {
      if (this.isBuiltin(importPath)) {
        continue;
      }
      // Descent is tied to vendoring: without it nothing survives this filter
      if (!this.config.vendoring || importPath.includes(DIR_PATTERNS.VENDOR)) {
        continue;
      }

      if (!active.has(importPath)) {
        let nested: string[] | undefined;
        try {
          nested = (await this.extractor.extract(importPath, this.config.cwd)).imports;
        } catch (error) {
          failures.push({ importPath, requestedBy: name, reason: errorMessage(error) });
        }
        if (nested) {
          active.add(importPath);
          found.push(...await this.collect(importPath, nested, failures, active));
          active.delete(importPath);
        }
      }

      const base = baseModuleName(importPath);
      if (base === name) {
        continue;
      }
      found.push(base);
    }

    return found;
  }
}
