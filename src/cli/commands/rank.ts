import fs from 'node:fs/promises';
import type { Command } from 'commander';
import { QueryContextInvalidError } from '../../domain/errors/DomainErrors.js';
import { isPlainRecord } from '../../shared/TypeGuards.js';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import { createRuntime, parseFormat, parseLevel } from '../runtime.js';

interface RankOptions {
  workingDir: string;
  context: string;
  level: string;
  format: string;
}

async function readContext(file: string): Promise<Record<string, unknown>> {
  const raw = await fs.readFile(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new QueryContextInvalidError(`${file} is not valid JSON`, { cause: err });
  }
  if (!isPlainRecord(parsed)) {
    throw new QueryContextInvalidError(`${file} must contain a JSON object`);
  }
  return parsed;
}

/** 註冊 rank 指令 */
export function registerRankCommand(program: Command): void {
  program
    .command('rank')
    .description('Rank existing files against a goal (discovers and embeds first)')
    .requiredOption('--context <file>', 'JSON file: {goal, audience?, service?, materials?}')
    .option('--working-dir <path>', 'Directory of markdown files', '.')
    .option('--level <level>', 'Detail level: brief, normal, full', 'normal')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: RankOptions) => {
      const format = parseFormat(opts.format);
      const level = parseLevel(opts.level);
      const context = await readContext(opts.context);
      const runtime = await createRuntime(opts.workingDir);

      const { chunks } = await runtime.discovery.discover(opts.workingDir);
      const filled = await runtime.embeddings.embedMissing(chunks);

      const ranked = await runtime.relevance.rank(context, filled.chunks);
      if (!ranked.ok) throw ranked.error;

      process.stdout.write(new ProgressiveDisclosureFormatter().formatRankedFiles(ranked.value, format, level) + '\n');
    });
}
