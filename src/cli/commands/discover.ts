import type { Command } from 'commander';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { createRuntime, parseFormat } from '../runtime.js';

interface DiscoverOptions {
  workingDir: string;
  embed: boolean;
  format: string;
}

/** 註冊 discover 指令 */
export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover')
    .description('Chunk markdown files and refresh the cache')
    .option('--working-dir <path>', 'Directory of markdown files', '.')
    .option('--embed', 'Compute missing embeddings after discovery', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: DiscoverOptions) => {
      const format = parseFormat(opts.format);
      const runtime = await createRuntime(opts.workingDir);
      const formatter = new ProgressiveDisclosureFormatter();

      const { chunks, stats } = await runtime.discovery.discover(opts.workingDir);
      let embedding: { embedded: number; failed: number } | undefined;
      if (opts.embed) {
        const filled = await runtime.embeddings.embedMissing(chunks);
        embedding = { embedded: filled.embedded, failed: filled.failed };
        stats.warnings.push(...filled.warnings);
      }

      process.stdout.write(formatter.formatObject({ ...stats, totalChunks: chunks.length, embedding }, format) + '\n');
      process.exitCode = stats.filesFailed > 0 || (embedding?.failed ?? 0) > 0 ? 1 : 0;
    });
}
