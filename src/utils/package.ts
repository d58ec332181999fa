import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import { logger } from './logger.js';
import { errorMessage } from './errors.js';

/**
 * Version from the package.json shipped alongside the sources.
 */
export function getVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug(`Unable to read package version: ${errorMessage(error)}`);
  }
  return '0.0.0';
}
