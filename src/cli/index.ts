#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { PipelineError, errorMessage } from '../domain/errors/DomainErrors.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerTranslateCommand } from './commands/translate.js';
import { registerVerifyCommand } from './commands/verify.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

const program = new Command();

program
  .name('scripture-translate')
  .description('Chunk a scripture document into a SQLite store and translate it resumably')
  .version(version)
  .option('--config <path>', 'Path to a .scripture.json config file');

/** 全域錯誤處理；須在註冊子指令前設定才會被繼承 */
program.exitOverride();

registerIngestCommand(program);
registerTranslateCommand(program);
registerVerifyCommand(program);

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander 已自行輸出說明或錯誤訊息
      process.exit(err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : err.exitCode);
    }
    if (err instanceof PipelineError) {
      process.stderr.write(`Error [${err.code}]: ${err.message}\n`);
    } else {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
    }
    process.exit(1);
  }
}

void main();
