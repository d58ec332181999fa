/**
 * Default import extractor: locates a unit's directory and lists the bare
 * module specifiers its source files import.
 */

import { extname, isAbsolute, join, relative, resolve, sep } from 'path';

import type { EngineConfig, ImportExtractor, ModuleMeta } from '../../types/index.js';
import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import { isDirectory, listFiles, readTextFile } from '../../utils/fs.js';
import { NoSourceError } from '../../utils/errors.js';

// import x from 'y' | export * from 'y' | import 'y' | require('y') | import('y')
const IMPORT_PATTERNS: RegExp[] = [
  /\b(?:import|export)\s+(?:type\s+)?[\w*{}\s,$]*?\bfrom\s*['"]([^'"]+)['"]/g,
  /\bimport\s*['"]([^'"]+)['"]/g,
  /\b(?:require|import)\s*\(\s*['"]([^'"]+)['"]\s*\)/g
];

const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set(FILE_PATTERNS.SOURCE_FILES);

function isSourceFile(fileName: string): boolean {
  if (FILE_PATTERNS.DECLARATION_FILES.some(ext => fileName.endsWith(ext))) {
    return false;
  }
  if (FILE_PATTERNS.TEST_FILE_MARKERS.some(marker => fileName.includes(marker))) {
    return false;
  }
  return SOURCE_EXTENSIONS.has(extname(fileName));
}

function isRelativeSpecifier(specifier: string): boolean {
  return specifier.startsWith('.') || specifier.startsWith('/');
}

/**
 * Non-relative specifiers imported by `source`, in order of appearance.
 */
export function extractImportSpecifiers(source: string): string[] {
  const found: string[] = [];
  for (const pattern of IMPORT_PATTERNS) {
    for (const match of source.matchAll(pattern)) {
      const specifier = match[1];
      if (specifier && !isRelativeSpecifier(specifier)) {
        found.push(specifier);
      }
    }
  }
  return found;
}

export class SourceImportExtractor implements ImportExtractor {
  constructor(private readonly config: EngineConfig) {}

  private get workspaceSrc(): string {
    return join(this.config.workspaceRoot, DIR_PATTERNS.WORKSPACE_SRC);
  }

  /**
   * Candidate directories for `name`, in lookup order.
   */
  candidateDirs(name: string, cwd: string): string[] {
    if (name === '.' || isRelativeSpecifier(name)) {
      return [resolve(cwd, name)];
    }
    if (isAbsolute(name)) {
      return [name];
    }
    const candidates = [
      join(this.config.installRoot, name),
      join(cwd, DIR_PATTERNS.VENDOR, name),
      join(this.workspaceSrc, name)
    ];
    return Array.from(new Set(candidates));
  }

  private importPathFor(dir: string, name: string): string {
    if (dir.startsWith(this.workspaceSrc + sep)) {
      return relative(this.workspaceSrc, dir).split(sep).join('/');
    }
    return name;
  }

  async extract(name: string, cwd: string): Promise<ModuleMeta> {
    let dir: string | undefined;
    for (const candidate of this.candidateDirs(name, cwd)) {
      if (await isDirectory(candidate)) {
        dir = candidate;
        break;
      }
    }
    if (!dir) {
      throw new NoSourceError(name);
    }

    const sourceFiles = (await listFiles(dir)).filter(isSourceFile).sort();
    if (sourceFiles.length === 0) {
      throw new NoSourceError(name, dir);
    }

    const imports = new Set<string>();
    for (const file of sourceFiles) {
      const content = await readTextFile(join(dir, file));
      for (const specifier of extractImportSpecifiers(content)) {
        imports.add(specifier);
      }
    }

    return {
      dir,
      importPath: this.importPathFor(dir, name),
      imports: Array.from(imports).sort()
    };
  }
}
