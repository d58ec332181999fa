import { Command } from 'commander';
import pico from 'picocolors';

import type { CommandResult } from '../types/index.js';
import { runInstallPipeline, type InstallSummary } from '../core/install/install-pipeline.js';
import { renderDependencyTree } from '../core/graph/tree-display.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface InstallCommandOptions {
  save: boolean;
  vendor: boolean;
  installRoot?: string;
  workspace?: string;
}

function printSummary(summary: InstallSummary, warnings: string[]): void {
  const [rootLine, ...branches] = renderDependencyTree(summary.root);
  console.log(pico.cyan(rootLine));
  for (const line of branches) {
    console.log(line);
  }
  console.log('');

  if (summary.fetched.length > 0) {
    console.log(pico.green(`✓ Fetched ${summary.fetched.length} module${summary.fetched.length === 1 ? '' : 's'}`));
  }
  for (const warning of warnings) {
    console.log(pico.yellow(`⚠️  ${warning}`));
  }
  for (const failure of summary.failed) {
    console.log(pico.red(`❌ ${failure.name}: ${failure.error}`));
  }
  if (summary.manifestPath) {
    console.log(`${pico.green('✓')} Wrote ${pico.dim(summary.manifestPath)}`);
  }
}

async function installCommand(options: InstallCommandOptions, cwd: string | undefined): Promise<CommandResult<InstallSummary>> {
  logger.debug('Install options', { ...options, cwd });
  return runInstallPipeline({
    cwd,
    save: options.save,
    vendoring: options.vendor ? undefined : false,
    installRoot: options.installRoot,
    workspaceRoot: options.workspace
  });
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Resolve, fetch and pin every module the current workspace imports')
    .option('--no-save', 'do not write the manifest afterwards')
    .option('--no-vendor', 'disable vendoring (and with it recursive import discovery)')
    .option('--install-root <dir>', 'directory dependencies are checked out into')
    .option('--workspace <dir>', 'shared workspace root')
    .action(withErrorHandling(async (options: InstallCommandOptions, command: Command) => {
      const globals: { cwd?: string } = command.optsWithGlobals();
      const result = await installCommand(options, globals.cwd);
      if (result.data) {
        printSummary(result.data, result.warnings ?? []);
      }
      if (!result.success) {
        process.exitCode = 1;
      }
    }));
}
