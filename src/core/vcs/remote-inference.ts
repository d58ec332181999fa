/**
 * Hosting conventions: derive backend kind and remote address from a module
 * name when no checkout exists yet.
 */

import type { VcsKind } from './types.js';
import { GOPKG_VERSIONED_SEGMENT } from '../../utils/module-name.js';

export interface InferredRemote {
  kind: VcsKind;
  url: string;
  /** Version encoded in the name itself (gopkg.in/yaml.v2 -> v2) */
  version?: string;
}

const UNKNOWN: InferredRemote = { kind: 'none', url: '' };

function sshUrl(host: string, owner: string, repo: string): string {
  return `git@${host}:${owner}/${repo}.git`;
}

/**
 * gopkg.in/owner/name.vN -> github.com/owner/name at vN
 * gopkg.in/name.vN       -> github.com/go-name/name at vN
 */
function inferGopkg(parts: string[]): InferredRemote {
  if (parts.length === 2) {
    const match = GOPKG_VERSIONED_SEGMENT.exec(parts[1]);
    if (!match) {
      return UNKNOWN;
    }
    return { kind: 'git', url: sshUrl('github.com', `go-${match[1]}`, match[1]), version: match[2] };
  }
  const match = GOPKG_VERSIONED_SEGMENT.exec(parts[2]);
  if (!match) {
    return UNKNOWN;
  }
  return { kind: 'git', url: sshUrl('github.com', parts[1], match[1]), version: match[2] };
}

export function inferRemoteFromName(name: string): InferredRemote {
  const parts = name.split('/').filter(Boolean);
  if (parts.length < 2) {
    return UNKNOWN;
  }

  switch (parts[0]) {
    case 'github.com':
    case 'gitlab.com':
    case 'bitbucket.org':
      return parts.length >= 3 ? { kind: 'git', url: sshUrl(parts[0], parts[1], parts[2]) } : UNKNOWN;
    case 'gopkg.in':
      return inferGopkg(parts);
    case 'golang.org':
      // golang.org/x/name mirrors github.com/golang/name
      return parts.length >= 3 && parts[1] === 'x' ? { kind: 'git', url: sshUrl('github.com', 'golang', parts[2]) } : UNKNOWN;
    default:
      return UNKNOWN;
  }
}

/**
 * Backend kind implied by an explicit remote address.
 */
export function inferKindFromUrl(url: string): VcsKind {
  if (/^svn(\+\w+)?:\/\//.test(url)) {
    return 'svn';
  }
  if (/^hg::|^ssh:\/\/hg@/.test(url)) {
    return 'hg';
  }
  if (/\.git\/?$/.test(url) || /^git(@|:\/\/)/.test(url)) {
    return 'git';
  }
  return 'none';
}
