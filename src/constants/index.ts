/**
 * Shared constants for the modpin CLI application
 * Single source of truth for directory names, file patterns and
 * environment variables used throughout the application.
 */

export const DIR_PATTERNS = {
  VENDOR: 'vendor',
  WORKSPACE_SRC: 'src',
  DEFAULT_WORKSPACE: 'modpin'
} as const;

export const FILE_PATTERNS = {
  MANIFEST_YML: 'modpin.yml',
  // Extensions the source extractor reads
  SOURCE_FILES: ['.ts', '.tsx', '.mts', '.cts', '.js', '.mjs', '.cjs'],
  DECLARATION_FILES: ['.d.ts', '.d.mts', '.d.cts'],
  TEST_FILE_MARKERS: ['.test.', '.spec.']
} as const;

export const ENV_VARS = {
  VERBOSE: 'MODPIN_VERBOSE',
  WORKSPACE: 'MODPIN_WORKSPACE',
  INSTALL_ROOT: 'MODPIN_INSTALL_ROOT',
  VENDORING: 'MODPIN_VENDORING'
} as const;

/**
 * Metadata directories that mark an on-disk checkout, per backend kind.
 */
export const VCS_MARKERS = {
  git: '.git',
  hg: '.hg',
  svn: '.svn'
} as const;
