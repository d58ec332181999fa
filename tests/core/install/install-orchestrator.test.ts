import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createEngine, createRootNode, type DependencyEngine } from '../../../src/core/engine.js';
import { ModuleNode } from '../../../src/core/graph/module-node.js';
import type { EngineConfig } from '../../../src/types/index.js';
import { FakeVcsProvider, MemoryExtractor, makeConfig, makeTempDir, removeTempDir } from '../../test-helpers.js';

let tmp: string;
let config: EngineConfig;
let provider: FakeVcsProvider;
let extractor: MemoryExtractor;
let engine: DependencyEngine;

beforeEach(async () => {
  tmp = await makeTempDir('orchestrator');
  config = makeConfig(tmp);
  provider = new FakeVcsProvider();
  extractor = new MemoryExtractor();
  engine = createEngine(config, { extractor, vcs: provider });
});

afterEach(async () => {
  await removeTempDir(tmp);
});

function checkoutDir(name: string): string {
  return join(config.installRoot, name);
}

describe('InstallOrchestrator.install', () => {
  it('leaves the root alone', async () => {
    const result = await engine.installer.install(createRootNode(config));
    assert.equal(result.status, 'root');
    assert.deepEqual(provider.opened, []);
  });

  it('fetches a missing checkout before pinning it', async () => {
    const root = createRootNode(config);
    const node = root.addDependency(new ModuleNode('github.com/x/a'));
    const repo = provider.repoAt(checkoutDir('github.com/x/a'), { local: false, head: 'r1' });

    const result = await engine.installer.install(node);

    assert.equal(result.status, 'installed');
    assert.equal(result.fetched, true);
    assert.deepEqual(result.checkout, { status: 'up-to-date', reference: 'r1', manifest: 'absent' });
    assert.deepEqual(repo.calls, ['get']);
    assert.equal(node.reference, 'r1');
    assert.equal(node.path, checkoutDir('github.com/x/a'));
  });

  it('does not fetch an existing checkout', async () => {
    const root = createRootNode(config);
    const node = root.addDependency(new ModuleNode('github.com/x/a'));
    const repo = provider.repoAt(checkoutDir('github.com/x/a'), { local: true });

    const result = await engine.installer.install(node);
    assert.equal(result.fetched, false);
    assert.deepEqual(repo.calls, []);
  });

  it('leaves a clean installed checkout untouched when installed again', async () => {
    const root = createRootNode(config);
    const node = root.addDependency(new ModuleNode('github.com/x/a', { reference: 'r3' }));
    const repo = provider.repoAt(checkoutDir('github.com/x/a'), { local: true, head: 'r3' });

    const first = await engine.installer.install(node);
    const second = await engine.installer.install(node);

    for (const result of [first, second]) {
      assert.equal(result.status, 'installed');
      assert.equal(result.fetched, false);
      assert.deepEqual(result.checkout, { status: 'up-to-date', reference: 'r3', manifest: 'absent' });
    }
    assert.deepEqual(repo.calls, []);
    assert.equal(node.reference, 'r3');
  });

  it('reports a failed fetch', async () => {
    const root = createRootNode(config);
    const node = root.addDependency(new ModuleNode('github.com/x/a'));
    provider.repoAt(checkoutDir('github.com/x/a'), { getError: 'permission denied' });

    const result = await engine.installer.install(node);
    assert.equal(result.status, 'failed');
    assert.equal(result.error, 'permission denied');
    assert.deepEqual(result.checkout, { status: 'not-installed' });
  });

  it('reports modules no backend can serve', async () => {
    const root = createRootNode(config);
    const node = root.addDependency(new ModuleNode('example.com/x/q'));

    const result = await engine.installer.install(node);
    assert.equal(result.status, 'failed');
    assert.equal(result.error, 'Could not resolve repo for example.com/x/q: no version control backend matches this module');
    assert.equal(result.checkout, undefined);
  });

  it('lets only one install write to a checkout directory at a time', async () => {
    const root = createRootNode(config);
    const first = root.addDependency(new ModuleNode('github.com/x/a'));
    const other = root.addDependency(new ModuleNode('github.com/x/b'));
    const second = other.addDependency(new ModuleNode('github.com/x/a'));
    const repo = provider.repoAt(checkoutDir('github.com/x/a'), { local: false });

    const results = await Promise.all([engine.installer.install(first), engine.installer.install(second)]);

    assert.deepEqual(results.map(r => r.status), ['installed', 'shared']);
    assert.deepEqual(repo.calls, ['get']);
  });

  it('installs dependencies recorded in a fetched module manifest', async () => {
    const root = createRootNode(config);
    const node = root.addDependency(new ModuleNode('github.com/x/a'));
    const dir = checkoutDir('github.com/x/a');
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'modpin.yml'), 'pkg: github.com/x/a\ndeps:\n- pkg: github.com/x/d\n', 'utf8');
    provider.repoAt(dir, { local: true, head: 'r1' });
    const nested = provider.repoAt(checkoutDir('github.com/x/d'), { local: false, head: 'r2' });

    const result = await engine.installer.install(node);

    assert.equal(result.status, 'installed');
    assert.deepEqual(result.dependencies.map(r => [r.name, r.status, r.fetched]), [['github.com/x/d', 'installed', true]]);
    assert.deepEqual(nested.calls, ['get']);
    assert.equal(node.dependencies[0].reference, 'r2');
  });
});

describe('diamond dependencies', () => {
  it('keeps the ancestor pin when a nested manifest lists the same module', async () => {
    const a = 'github.com/x/a';
    const c = 'github.com/x/c';
    const root = createRootNode(config);
    const rootC = root.addDependency(new ModuleNode(c, { reference: 'rc1' }));
    const nodeA = root.addDependency(new ModuleNode(a));
    await mkdir(checkoutDir(a), { recursive: true });
    await writeFile(join(checkoutDir(a), 'modpin.yml'), `pkg: ${a}\ndeps:\n- pkg: ${c}\n  ref: rc2\n`, 'utf8');
    provider.repoAt(checkoutDir(a), { local: true, head: 'ra' });
    const repoC = provider.repoAt(checkoutDir(c), { local: true, head: 'rc1' });

    const result = await engine.installer.install(nodeA);

    assert.equal(result.status, 'installed');
    assert.deepEqual(result.dependencies, []);
    assert.deepEqual(nodeA.dependencies, []);
    assert.equal(Array.from(root.walk()).filter(({ node }) => node.name === c).length, 1);
    assert.deepEqual(repoC.calls, []);
    assert.equal(rootC.reference, 'rc1');
  });

  it('installs a module shared by two siblings exactly once', async () => {
    const a = 'github.com/x/a';
    const b = 'github.com/x/b';
    const c = 'github.com/x/c';
    extractor.add('.', [a, b], config.cwd, '.');
    // Sources only become readable once their checkout exists
    provider.repoAt(checkoutDir(a), { onGet: () => { extractor.add(a, [c]); } });
    provider.repoAt(checkoutDir(b), { onGet: () => { extractor.add(b, [c]); } });

    const root = createRootNode(config);
    const meta = await engine.metadata.load(root);
    if (!meta) {
      throw new Error('root metadata should load');
    }
    const build = await engine.graph.init(root, meta);

    assert.deepEqual(build.added, [a, b]);
    assert.deepEqual(root.dependencies.map(dep => dep.name), [a, b, c]);
    const copies = Array.from(root.walk()).filter(({ node }) => node.name === c);
    assert.equal(copies.length, 1);
    assert.equal(copies[0].depth, 1);

    const repoC = provider.repos.get(checkoutDir(c));
    assert.deepEqual(repoC?.calls, ['get']);
  });
});
