/**
 * Manifest Store: persists a node and its subtree to `modpin.yml` in the
 * node's directory and rehydrates it.
 */

import { join } from 'path';
import * as yaml from 'js-yaml';

import { ModuleNode } from '../graph/module-node.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { ManifestWriteError, ValidationError, errorMessage } from '../../utils/errors.js';

/**
 * On-disk manifest document. Only `pkg` is required.
 */
export interface ManifestDocument {
  pkg: string;
  ver?: string;
  ref?: string;
  deps?: ManifestDocument[];
  url?: string;
}

export type ManifestLoadResult =
  | { loaded: true; path: string }
  | { loaded: false; path: string; reason: string };

export function getManifestPath(node: ModuleNode): string {
  return join(node.path, node.manifestFile);
}

/**
 * Serialize a node. Below the top level, a node that owns a manifest of its
 * own keeps its dependencies out of the ancestor's document.
 */
export function toDocument(node: ModuleNode, topLevel: boolean = true): ManifestDocument {
  const doc: ManifestDocument = { pkg: node.name };
  if (node.version) doc.ver = node.version;
  if (node.reference) doc.ref = node.reference;

  const ownsManifest = !topLevel && node.hasManifest && !node.isRoot();
  if (!ownsManifest && node.dependencies.length > 0) {
    doc.deps = node.dependencies.map(dep => toDocument(dep, false));
  }

  if (node.url) doc.url = node.url;
  return doc;
}

/**
 * Build a detached subtree from a document. Parent links are not set here;
 * callers relink after attaching.
 */
export function fromDocument(doc: ManifestDocument): ModuleNode {
  const node = new ModuleNode(doc.pkg, {
    version: doc.ver,
    reference: doc.ref,
    url: doc.url
  });
  node.dependencies = (doc.deps ?? []).map(fromDocument);
  return node;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalScalar(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  // YAML reads `ver: 1.2` as a number
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  throw new ValidationError(`'${key}' must be a string in ${where}`);
}

/**
 * Validate a parsed YAML value as a manifest document.
 */
export function parseManifestDocument(raw: unknown, where: string = 'manifest'): ManifestDocument {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where} must be a mapping`);
  }
  const pkg = optionalScalar(raw, 'pkg', where);
  if (!pkg) {
    throw new ValidationError(`${where} must contain a pkg field`);
  }

  const doc: ManifestDocument = { pkg };
  const ver = optionalScalar(raw, 'ver', where);
  const ref = optionalScalar(raw, 'ref', where);
  const url = optionalScalar(raw, 'url', where);
  if (ver !== undefined) doc.ver = ver;
  if (ref !== undefined) doc.ref = ref;

  if (raw.deps !== undefined && raw.deps !== null) {
    if (!Array.isArray(raw.deps)) {
      throw new ValidationError(`'deps' must be a list in ${where}`);
    }
    doc.deps = raw.deps.map((dep, index) => parseManifestDocument(dep, `${where} deps[${index}]`));
  }

  if (url !== undefined) doc.url = url;
  return doc;
}

export function serializeManifest(node: ModuleNode): string {
  return yaml.dump(toDocument(node), {
    indent: 2,
    noArrayIndent: true,
    sortKeys: false,
    quotingType: '"'
  });
}

export class ManifestStore {
  /**
   * Read the node's manifest into it. A missing or unreadable manifest is a
   * normal outcome: `hasManifest` is cleared and the reason returned.
   */
  async load(node: ModuleNode): Promise<ManifestLoadResult> {
    node.hasManifest = false;
    const path = getManifestPath(node);

    let doc: ManifestDocument;
    try {
      const content = await readTextFile(path);
      doc = parseManifestDocument(yaml.load(content), path);
    } catch (error) {
      logger.debug(`No usable manifest for ${node.name || '.'}: ${errorMessage(error)}`);
      return { loaded: false, path, reason: errorMessage(error) };
    }

    // Fields absent from the document keep their current values
    node.name = doc.pkg;
    if (doc.ver !== undefined) node.version = doc.ver;
    if (doc.ref !== undefined) node.reference = doc.ref;
    if (doc.url !== undefined) node.url = doc.url;
    if (doc.deps !== undefined) node.dependencies = doc.deps.map(fromDocument);

    node.hasManifest = true;
    node.relinkDependencies();
    logger.debug(`Loaded manifest ${path}`, { dependencies: node.dependencies.length });
    return { loaded: true, path };
  }

  async save(node: ModuleNode): Promise<string> {
    const path = getManifestPath(node);
    try {
      await writeTextFile(path, serializeManifest(node));
    } catch (error) {
      throw new ManifestWriteError(path, error);
    }
    return path;
  }
}
