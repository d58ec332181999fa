/**
 * Module name helpers: base-module reduction and the default built-in classifier.
 */

import { DIR_PATTERNS } from '../constants/index.js';

const VENDOR_SEGMENT = `/${DIR_PATTERNS.VENDOR}/`;
const VENDOR_PREFIX = `${DIR_PATTERNS.VENDOR}/`;

/** `yaml.v2`, `check.v1` */
export const GOPKG_VERSIONED_SEGMENT = /^(.+)\.(v\d+)$/;

/**
 * Reduce an import path to the module hosting it: the repository root,
 * without internal subpackage segments or a leading vendor prefix.
 *
 *   github.com/acme/lib/sub/pkg -> github.com/acme/lib
 *   gopkg.in/yaml.v2/internal   -> gopkg.in/yaml.v2
 *   app/vendor/github.com/x/y/z -> github.com/x/y
 */
export function baseModuleName(importPath: string): string {
  let path = importPath;
  const vendorIndex = path.lastIndexOf(VENDOR_SEGMENT);
  if (vendorIndex >= 0) {
    path = path.slice(vendorIndex + VENDOR_SEGMENT.length);
  } else if (path.startsWith(VENDOR_PREFIX)) {
    path = path.slice(VENDOR_PREFIX.length);
  }

  const parts = path.split('/').filter(Boolean);
  let segments = 3;
  if (parts[0] === 'gopkg.in' && parts.length >= 2 && GOPKG_VERSIONED_SEGMENT.test(parts[1])) {
    segments = 2;
  }
  return parts.slice(0, segments).join('/');
}

/**
 * Default built-in/standard classifier. Hosted modules always start with a
 * host segment (`github.com/...`); anything whose first segment has no dot
 * is a language or runtime module (`fs`, `node:path`, `net/http`).
 */
export function isBuiltinImport(importPath: string): boolean {
  const first = importPath.split('/')[0] ?? '';
  return !first.includes('.');
}

/**
 * True when `name` is `parent` itself or one of its subpackages.
 */
export function isSameOrSubpackage(name: string, parent: string): boolean {
  if (!parent) {
    return false;
  }
  return name === parent || name.startsWith(`${parent}/`);
}
