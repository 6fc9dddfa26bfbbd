import type { Command } from 'commander';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { createRuntime, parseFormat } from '../runtime.js';

interface VerifyOptions {
  workingDir: string;
  fix: boolean;
  format: string;
}

/** 註冊 verify 指令 */
export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check cache consistency')
    .option('--working-dir <path>', 'Directory of markdown files', '.')
    .option('--fix', 'Remove manifest entries whose records are missing', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: VerifyOptions) => {
      const format = parseFormat(opts.format);
      const runtime = await createRuntime(opts.workingDir);

      const report = await runtime.health.check({ fix: opts.fix });

      process.stdout.write(new ProgressiveDisclosureFormatter().formatObject(report, format) + '\n');
      process.exitCode = report.healthy ? 0 : 1;
    });
}
