import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { createEngineConfig, parseBooleanFlag } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('createEngineConfig', () => {
  it('defaults the install root to vendor/ under the working directory', () => {
    const config = createEngineConfig({ cwd: '/work/app' }, {});
    assert.equal(config.cwd, '/work/app');
    assert.equal(config.installRoot, '/work/app/vendor');
    assert.equal(config.workspaceRoot, join(homedir(), 'modpin'));
    assert.equal(config.vendoring, true);
  });

  it('reads the workspace root from MODPIN_WORKSPACE', () => {
    const config = createEngineConfig({ cwd: '/work/app' }, { MODPIN_WORKSPACE: '/shared/ws' });
    assert.equal(config.workspaceRoot, '/shared/ws');
  });

  it('falls back to the home directory for an empty MODPIN_WORKSPACE', () => {
    const config = createEngineConfig({ cwd: '/work/app' }, { MODPIN_WORKSPACE: '' });
    assert.equal(config.workspaceRoot, join(homedir(), 'modpin'));
  });

  it('resolves a relative install root against the working directory', () => {
    const config = createEngineConfig({ cwd: '/work/app' }, { MODPIN_INSTALL_ROOT: 'deps' });
    assert.equal(config.installRoot, '/work/app/deps');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = createEngineConfig(
      { cwd: '/work/app', installRoot: '/elsewhere', workspaceRoot: '/ws', vendoring: true },
      { MODPIN_INSTALL_ROOT: 'deps', MODPIN_WORKSPACE: '/env-ws', MODPIN_VENDORING: 'off' }
    );
    assert.equal(config.installRoot, '/elsewhere');
    assert.equal(config.workspaceRoot, '/ws');
    assert.equal(config.vendoring, true);
  });

  it('reads the vendoring flag from the environment', () => {
    const config = createEngineConfig({ cwd: '/work/app' }, { MODPIN_VENDORING: 'off' });
    assert.equal(config.vendoring, false);
  });

  it('returns a frozen configuration', () => {
    const config = createEngineConfig({ cwd: '/work/app' }, {});
    assert.equal(Object.isFrozen(config), true);
  });
});

describe('parseBooleanFlag', () => {
  it('accepts the usual spellings', () => {
    assert.equal(parseBooleanFlag('X', 'YES', false), true);
    assert.equal(parseBooleanFlag('X', '0', true), false);
    assert.equal(parseBooleanFlag('X', undefined, true), true);
    assert.equal(parseBooleanFlag('X', '  ', false), false);
  });

  it('rejects anything else', () => {
    assert.throws(() => parseBooleanFlag('MODPIN_VENDORING', 'maybe', true), ConfigError);
  });
});
