import type { Command } from 'commander';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { createRuntime, parseFormat } from '../runtime.js';

interface StatsOptions {
  workingDir: string;
  format: string;
}

/** 註冊 stats 指令 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show cache statistics')
    .option('--working-dir <path>', 'Directory of markdown files', '.')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: StatsOptions) => {
      const format = parseFormat(opts.format);
      const runtime = await createRuntime(opts.workingDir);
      const stats = await runtime.store.getCacheStats();
      process.stdout.write(new ProgressiveDisclosureFormatter().formatObject(stats, format) + '\n');
    });
}
