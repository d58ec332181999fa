/**
 * Text rendering of a module graph.
 */

import type { ModuleNode } from './module-node.js';

const FULL_SHA = /^[0-9a-f]{40}$/i;

export function formatNodeLabel(node: ModuleNode): string {
  if (node.reference) {
    const ref = FULL_SHA.test(node.reference) ? node.reference.slice(0, 7) : node.reference;
    return `${node.name}@${ref}`;
  }
  return node.version ? `${node.name}@${node.version}` : node.name;
}

export function renderDependencyTree(root: ModuleNode): string[] {
  const lines = [root.name || '.'];

  const renderChildren = (node: ModuleNode, prefix: string): void => {
    node.dependencies.forEach((dep, index) => {
      const isLast = index === node.dependencies.length - 1;
      lines.push(`${prefix}${isLast ? '└── ' : '├── '}${formatNodeLabel(dep)}`);
      renderChildren(dep, `${prefix}${isLast ? '    ' : '│   '}`);
    });
  };

  renderChildren(root, '');
  return lines;
}
