import readline from 'node:readline/promises';
import type { Command } from 'commander';
import { TranslateUseCase } from '../../application/TranslateUseCase.js';
import { VerifyUseCase } from '../../application/VerifyUseCase.js';
import { assertTranslationCredentials } from '../../config/ConfigLoader.js';
import { ChunkRange } from '../../domain/value-objects/ChunkRange.js';
import { SentenceSplitter } from '../../infrastructure/chunking/SentenceSplitter.js';
import { RetryingTranslator } from '../../infrastructure/translation/RetryingTranslator.js';
import { createTranslationClient } from '../../infrastructure/translation/createTranslationClient.js';
import { Logger } from '../../shared/Logger.js';
import { ReportFormatter, type OutputFormat } from '../formatters/ReportFormatter.js';
import { loadCommandConfig, openStore, parseChunkId, parseOutputFormat } from './shared.js';

interface TranslateCommandOptions {
  start: number;
  end?: number;
  yes?: boolean;
  output: OutputFormat;
}

const logger = new Logger('translate');

/** 互動式確認；輸入 y / yes 才繼續 */
async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(question);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

/** 註冊 translate 指令：翻譯範圍內 translation 為 NULL 的 chunks */
export function registerTranslateCommand(program: Command): void {
  program
    .command('translate')
    .description('Translate every untranslated chunk in the range, resuming where the last run stopped')
    .option('--start <id>', 'First chunk_id (inclusive)', parseChunkId, 1)
    .option('--end <id>', 'Last chunk_id (inclusive); defaults to the last chunk', parseChunkId)
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--output <format>', 'Output format: json or text', parseOutputFormat, 'text')
    .action(async (opts: TranslateCommandOptions, command: Command) => {
      const { config, baseDir } = loadCommandConfig(command);
      const range = ChunkRange.of(opts.start, opts.end);
      assertTranslationCredentials(config);

      const formatter = new ReportFormatter(opts.output);
      const { dbMgr, store } = openStore(config, baseDir);
      const controller = new AbortController();
      const onSigint = (): void => {
        logger.warn('Interrupt received, stopping after the current chunk');
        controller.abort();
      };

      try {
        const verifier = new VerifyUseCase(store);
        const client = createTranslationClient(config.translation);
        const translator = new RetryingTranslator(client, {
          retry: config.retry,
          splitter: new SentenceSplitter(config.splitter),
          splitThreshold: config.translation.splitThreshold,
          minResultChars: config.translation.minResultChars,
        });
        const useCase = new TranslateUseCase(store, translator, verifier, {
          minContentLength: config.translation.minContentLength,
          reportEvery: config.progress.reportEvery,
          failureCooldownMs: config.retry.failureCooldownMs,
          estimateSecondsPerChunk: config.progress.estimateSecondsPerChunk,
        });

        const plan = useCase.plan(range);
        process.stderr.write(formatter.formatPlan(plan) + '\n');

        if (plan.pending === 0) {
          process.stdout.write(formatter.formatObject(verifier.verify(range)) + '\n');
          return;
        }

        const autoConfirm = opts.yes === true || config.autoConfirm || !process.stdin.isTTY;
        if (!autoConfirm && !(await confirm(`Translate ${plan.pending} chunk(s)? [y/N] `))) {
          process.stderr.write('Aborted.\n');
          return;
        }

        if (!(await client.isAvailable())) {
          logger.warn('Translation service did not answer the availability probe; failures will be retried per chunk', {
            provider: client.providerId,
            baseUrl: config.translation.baseUrl,
          });
        }

        process.once('SIGINT', onSigint);
        const textOutput = opts.output === 'text';
        const report = await useCase.run(range, {
          signal: controller.signal,
          onChunk: textOutput ? (result) => process.stderr.write(formatter.formatChunkLine(result) + '\n') : undefined,
          onProgress: textOutput ? (snapshot) => process.stderr.write(formatter.formatProgress(snapshot) + '\n') : undefined,
        });

        process.stdout.write(formatter.formatObject(report) + '\n');
        process.exitCode = report.verification?.complete ? 0 : 1;
      } finally {
        process.removeListener('SIGINT', onSigint);
        dbMgr.close();
      }
    });
}
