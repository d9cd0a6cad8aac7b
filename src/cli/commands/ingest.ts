import path from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import { IngestUseCase } from '../../application/IngestUseCase.js';
import type { SourceFormat } from '../../domain/ports/DocumentSourcePort.js';
import { ChunkAssembler } from '../../infrastructure/chunking/ChunkAssembler.js';
import { createDocumentSource } from '../../infrastructure/document/createDocumentSource.js';
import { ReportFormatter, type OutputFormat } from '../formatters/ReportFormatter.js';
import { loadCommandConfig, openStore, parseOutputFormat } from './shared.js';

const SOURCE_FORMATS: readonly SourceFormat[] = ['daisy-xml', 'markdown'];

interface IngestCommandOptions {
  source?: string;
  format?: SourceFormat;
  append?: boolean;
  dryRun?: boolean;
  output: OutputFormat;
}

function parseSourceFormat(value: string): SourceFormat {
  const format = SOURCE_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${SOURCE_FORMATS.join(', ')}.`);
  }
  return format;
}

/** 註冊 ingest 指令：文件 → chunks → 儲存層 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Split the source document into chunks and load them into the store')
    .option('--source <path>', 'Source document (overrides source.path)')
    .option('--format <format>', 'Source format: daisy-xml or markdown', parseSourceFormat)
    .option('--append', 'Continue chunk numbering after the existing rows')
    .option('--dry-run', 'Assemble chunks without writing them')
    .option('--output <format>', 'Output format: json or text', parseOutputFormat, 'text')
    .action(async (opts: IngestCommandOptions, command: Command) => {
      const { config, baseDir } = loadCommandConfig(command, {
        source: { path: opts.source, format: opts.format },
      });
      const formatter = new ReportFormatter(opts.output);
      const { dbMgr, store } = openStore(config, baseDir);

      try {
        const useCase = new IngestUseCase(
          createDocumentSource(config.source.format, config.source.headingLevels),
          new ChunkAssembler(config.chunking.maxChars, config.chunking.defaultSection),
          store,
          config.store.batchSize,
        );
        const stats = await useCase.ingest(path.resolve(baseDir, config.source.path), {
          append: opts.append ?? false,
          dryRun: opts.dryRun ?? false,
        });

        process.stdout.write(formatter.formatObject(stats) + '\n');
      } finally {
        dbMgr.close();
      }
    });
}
