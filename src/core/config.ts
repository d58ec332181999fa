import { homedir } from 'os';
import { join, resolve } from 'path';

import type { EngineConfig } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Engine configuration: explicit overrides first, then the environment.
 */

export interface EngineConfigOverrides {
  cwd?: string;
  workspaceRoot?: string;
  installRoot?: string;
  vendoring?: boolean;
}

const FALSE_VALUES = new Set(['0', 'false', 'off', 'no']);
const TRUE_VALUES = new Set(['1', 'true', 'on', 'yes']);

/**
 * Parse a boolean environment flag; unset means `fallback`.
 */
export function parseBooleanFlag(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (FALSE_VALUES.has(value)) return false;
  if (TRUE_VALUES.has(value)) return true;
  throw new ConfigError(`${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')} (got '${raw}')`, { name, raw });
}

/**
 * Shared workspace root: MODPIN_WORKSPACE, then ~/modpin.
 */
function defaultWorkspaceRoot(env: NodeJS.ProcessEnv): string {
  return env[ENV_VARS.WORKSPACE] || join(homedir(), DIR_PATTERNS.DEFAULT_WORKSPACE);
}

export function createEngineConfig(
  overrides: EngineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const cwd = resolve(overrides.cwd ?? process.cwd());
  const installRoot = overrides.installRoot ?? env[ENV_VARS.INSTALL_ROOT];

  const config: EngineConfig = Object.freeze({
    cwd,
    workspaceRoot: resolve(overrides.workspaceRoot ?? defaultWorkspaceRoot(env)),
    installRoot: installRoot ? resolve(cwd, installRoot) : join(cwd, DIR_PATTERNS.VENDOR),
    vendoring: overrides.vendoring ?? parseBooleanFlag(ENV_VARS.VENDORING, env[ENV_VARS.VENDORING], true)
  });

  logger.debug('Engine configuration', config);
  return config;
}
