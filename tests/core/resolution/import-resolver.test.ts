import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ImportResolver } from '../../../src/core/resolution/import-resolver.js';
import { MemoryExtractor, makeConfig } from '../../test-helpers.js';

function cyclicExtractor(): MemoryExtractor {
  return new MemoryExtractor()
    .add('github.com/x/a/sub', ['github.com/x/b', 'fs'])
    .add('github.com/x/b', ['github.com/x/c/deep'])
    .add('github.com/x/c/deep', ['github.com/x/a/sub']);
}

describe('ImportResolver', () => {
  it('flattens transitive imports into sorted module roots', async () => {
    const resolver = new ImportResolver(makeConfig('/tmp/r'), cyclicExtractor());
    const result = await resolver.resolve('app', ['github.com/x/a/sub', 'net/http']);
    assert.deepEqual(result.modules, ['github.com/x/a', 'github.com/x/b', 'github.com/x/c']);
    assert.deepEqual(result.failures, []);
  });

  it('does not depend on import order', async () => {
    const imports = ['github.com/x/b', 'github.com/x/a/sub', 'os'];
    const forward = await new ImportResolver(makeConfig('/tmp/r'), cyclicExtractor()).resolve('app', imports);
    const reversed = await new ImportResolver(makeConfig('/tmp/r'), cyclicExtractor()).resolve('app', [...imports].reverse());
    assert.deepEqual(forward.modules, reversed.modules);
  });

  it('records unreadable imports and keeps going', async () => {
    const resolver = new ImportResolver(makeConfig('/tmp/r'), cyclicExtractor());
    const result = await resolver.resolve('app', ['github.com/y/missing/pkg', 'github.com/x/b']);
    assert.deepEqual(result.modules, ['github.com/x/a', 'github.com/x/b', 'github.com/x/c', 'github.com/y/missing']);
    assert.deepEqual(result.failures, [{
      importPath: 'github.com/y/missing/pkg',
      requestedBy: 'app',
      reason: "No buildable source for 'github.com/y/missing/pkg'"
    }]);
  });

  it('never lists the requesting module itself', async () => {
    const extractor = new MemoryExtractor().add('github.com/x/a', []);
    const resolver = new ImportResolver(makeConfig('/tmp/r'), extractor);
    const result = await resolver.resolve('github.com/x/a', ['github.com/x/a']);
    assert.deepEqual(result.modules, []);
  });

  it('returns nothing and reads nothing when vendoring is disabled', async () => {
    const extractor = cyclicExtractor();
    const resolver = new ImportResolver(makeConfig('/tmp/r', { vendoring: false }), extractor);
    const result = await resolver.resolve('app', ['github.com/x/a/sub', 'github.com/x/b']);
    assert.deepEqual(result, { modules: [], failures: [] });
    assert.deepEqual(extractor.calls, []);
  });

  it('skips vendored import paths', async () => {
    const extractor = cyclicExtractor();
    const resolver = new ImportResolver(makeConfig('/tmp/r'), extractor);
    const result = await resolver.resolve('app', ['example.com/app/vendor/github.com/x/b']);
    assert.deepEqual(result.modules, []);
    assert.deepEqual(extractor.calls, []);
  });

  it('honors a custom built-in classifier', async () => {
    const extractor = cyclicExtractor();
    const resolver = new ImportResolver(makeConfig('/tmp/r'), extractor, path => path.startsWith('github.com/x/b'));
    const result = await resolver.resolve('app', ['github.com/x/b', 'github.com/z/q']);
    assert.deepEqual(result.modules, ['github.com/z/q']);
    assert.deepEqual(extractor.calls, ['github.com/z/q']);
  });
});
