import type { Command } from 'commander';
import { createRuntime } from '../runtime.js';

interface PruneOptions {
  workingDir: string;
}

/** 註冊 prune 指令 */
export function registerPruneCommand(program: Command): void {
  program
    .command('prune')
    .description('Delete cache records whose file name matches a pattern (e.g. "query_*")')
    .argument('<pattern>', 'File name pattern; supports * and ?')
    .option('--working-dir <path>', 'Directory of markdown files', '.')
    .action(async (pattern: string, opts: PruneOptions) => {
      const runtime = await createRuntime(opts.workingDir);
      const removed = await runtime.store.removeOld(pattern);
      process.stdout.write(`Removed ${removed} cache files\n`);
    });
}
