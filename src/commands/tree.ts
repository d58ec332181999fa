import { Command } from 'commander';
import pico from 'picocolors';

import { runTreePipeline } from '../core/graph/tree-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';

export function setupTreeCommand(program: Command): void {
  program
    .command('tree')
    .description('Show the dependency graph recorded in the manifest')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      const globals: { cwd?: string } = command.optsWithGlobals();
      const result = await runTreePipeline({ cwd: globals.cwd });
      if (!result.success || !result.data) {
        throw new Error(result.error ?? 'Unable to read the manifest');
      }
      for (const line of result.data.lines) {
        console.log(line);
      }
      console.log(pico.dim(`\nTotal: ${result.data.moduleCount} modules`));
    }));
}
