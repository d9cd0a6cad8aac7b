import type { Command } from 'commander';
import { VerifyUseCase } from '../../application/VerifyUseCase.js';
import { ChunkRange } from '../../domain/value-objects/ChunkRange.js';
import { ReportFormatter, type OutputFormat } from '../formatters/ReportFormatter.js';
import { loadCommandConfig, openStore, parseChunkId, parseOutputFormat } from './shared.js';

interface VerifyCommandOptions {
  start: number;
  end?: number;
  output: OutputFormat;
}

/** 註冊 verify 指令：回報範圍內的翻譯完成度 */
export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Report translation completeness for a chunk range')
    .option('--start <id>', 'First chunk_id (inclusive)', parseChunkId, 1)
    .option('--end <id>', 'Last chunk_id (inclusive)', parseChunkId)
    .option('--output <format>', 'Output format: json or text', parseOutputFormat, 'text')
    .action((opts: VerifyCommandOptions, command: Command) => {
      const { config, baseDir } = loadCommandConfig(command);
      const range = ChunkRange.of(opts.start, opts.end);
      const formatter = new ReportFormatter(opts.output);
      const { dbMgr, store } = openStore(config, baseDir);

      try {
        const report = new VerifyUseCase(store).verify(range);
        process.stdout.write(formatter.formatObject(report) + '\n');
        process.exitCode = report.complete ? 0 : 1;
      } finally {
        dbMgr.close();
      }
    });
}
