#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerDiscoverCommand } from './commands/discover.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerRankCommand } from './commands/rank.js';
import { registerPruneCommand } from './commands/prune.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('mdsift')
  .description('Incremental semantic chunking and relevance ranking for markdown directories')
  .version(version);

registerDiscoverCommand(program);
registerStatsCommand(program);
registerVerifyCommand(program);
registerRankCommand(program);
registerPruneCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${err instanceof Error ? err.message : 'Unknown error'}\n`);
    process.exit(1);
  }
}

void main();
