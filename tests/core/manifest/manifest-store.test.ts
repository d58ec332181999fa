import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { ModuleNode } from '../../../src/core/graph/module-node.js';
import {
  ManifestStore,
  parseManifestDocument,
  serializeManifest,
  toDocument
} from '../../../src/core/manifest/manifest-store.js';
import { ManifestWriteError, ValidationError } from '../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../test-helpers.js';

let dir: string;

before(async () => {
  dir = await makeTempDir('manifest');
});

after(async () => {
  await removeTempDir(dir);
});

describe('toDocument', () => {
  it('keeps dependencies of nested manifest owners out of the ancestor document', () => {
    const root = new ModuleNode('app');
    const a = root.addDependency(new ModuleNode('github.com/x/a', { reference: 'abc' }));
    a.hasManifest = true;
    a.addDependency(new ModuleNode('github.com/x/c'));
    const b = root.addDependency(new ModuleNode('github.com/x/b', { version: 'v1' }));
    b.addDependency(new ModuleNode('github.com/x/d'));

    assert.deepEqual(toDocument(root), {
      pkg: 'app',
      deps: [
        { pkg: 'github.com/x/a', ref: 'abc' },
        { pkg: 'github.com/x/b', ver: 'v1', deps: [{ pkg: 'github.com/x/d' }] }
      ]
    });
  });

  it('always records the dependencies of the node being saved', () => {
    const root = new ModuleNode('app');
    const a = root.addDependency(new ModuleNode('github.com/x/a'));
    a.hasManifest = true;
    a.addDependency(new ModuleNode('github.com/x/c'));

    assert.deepEqual(toDocument(a), { pkg: 'github.com/x/a', deps: [{ pkg: 'github.com/x/c' }] });
  });

  it('omits empty fields', () => {
    assert.deepEqual(toDocument(new ModuleNode('github.com/x/a')), { pkg: 'github.com/x/a' });
  });
});

describe('serializeManifest', () => {
  it('writes fields in pkg, ver, ref, deps order', () => {
    const root = new ModuleNode('app', { version: 'v1.2.0' });
    root.addDependency(new ModuleNode('github.com/x/a', { reference: 'abc' }));

    assert.equal(serializeManifest(root), [
      'pkg: app',
      'ver: v1.2.0',
      'deps:',
      '- pkg: github.com/x/a',
      '  ref: abc',
      ''
    ].join('\n'));
  });
});

describe('parseManifestDocument', () => {
  it('requires a pkg field', () => {
    assert.throws(
      () => parseManifestDocument({ ver: 'v1' }),
      (error: unknown) => error instanceof ValidationError
        && error.message === 'Validation error: manifest must contain a pkg field'
    );
  });

  it('reads numeric scalars as strings', () => {
    assert.deepEqual(parseManifestDocument({ pkg: 'app', ver: 1.2 }), { pkg: 'app', ver: '1.2' });
  });

  it('rejects deps that are not a list', () => {
    assert.throws(() => parseManifestDocument({ pkg: 'app', deps: 'github.com/x/a' }), ValidationError);
  });
});

describe('ManifestStore', () => {
  const store = new ManifestStore();

  it('round-trips a graph through the manifest file', async () => {
    const root = new ModuleNode('app', { path: dir, url: 'git@github.com:acme/app.git' });
    const a = root.addDependency(new ModuleNode('github.com/x/a', { version: 'v2', reference: 'abc' }));
    a.addDependency(new ModuleNode('github.com/x/c', { reference: 'def' }));

    const path = await store.save(root);
    assert.equal(path, join(dir, 'modpin.yml'));

    const loaded = new ModuleNode('', { path: dir });
    const result = await store.load(loaded);
    assert.deepEqual(result, { loaded: true, path });
    assert.equal(loaded.hasManifest, true);
    assert.equal(loaded.name, 'app');
    assert.equal(loaded.url, 'git@github.com:acme/app.git');
    assert.deepEqual(toDocument(loaded), toDocument(root));

    const [child] = loaded.dependencies;
    assert.equal(child.parent, loaded);
    assert.equal(child.dependencies[0].parent, child);
  });

  it('keeps current values for fields the document leaves out', async () => {
    const sub = await makeTempDir('manifest-partial');
    try {
      await writeFile(join(sub, 'modpin.yml'), 'pkg: github.com/x/a\n', 'utf8');
      const node = new ModuleNode('github.com/x/a', { path: sub, version: 'v3', reference: 'r1' });
      node.addDependency(new ModuleNode('github.com/x/keep'));

      const result = await store.load(node);
      assert.equal(result.loaded, true);
      assert.equal(node.version, 'v3');
      assert.equal(node.reference, 'r1');
      assert.deepEqual(node.dependencies.map(dep => dep.name), ['github.com/x/keep']);
    } finally {
      await removeTempDir(sub);
    }
  });

  it('reports a missing manifest without throwing', async () => {
    const sub = await makeTempDir('manifest-missing');
    try {
      const node = new ModuleNode('github.com/x/a', { path: sub });
      node.hasManifest = true;
      const result = await store.load(node);
      assert.equal(result.loaded, false);
      assert.equal(result.path, join(sub, 'modpin.yml'));
      assert.equal(node.hasManifest, false);
    } finally {
      await removeTempDir(sub);
    }
  });

  it('treats a malformed manifest as absent', async () => {
    const sub = await makeTempDir('manifest-bad');
    try {
      await writeFile(join(sub, 'modpin.yml'), 'ver: v1\n', 'utf8');
      const node = new ModuleNode('github.com/x/a', { path: sub });
      const result = await store.load(node);
      assert.equal(result.loaded, false);
      assert.equal(node.name, 'github.com/x/a');
    } finally {
      await removeTempDir(sub);
    }
  });

  it('wraps write failures', async () => {
    const blocker = join(dir, 'not-a-directory');
    await writeFile(blocker, 'x', 'utf8');
    const node = new ModuleNode('app', { path: blocker });
    await assert.rejects(store.save(node), ManifestWriteError);
    assert.equal(await readFile(blocker, 'utf8'), 'x');
  });
});
