import type { StoredChunk } from '../domain/entities/Chunk.js';
import type { ChunkStorePort } from '../domain/ports/ChunkStorePort.js';
import type { ChunkRange } from '../domain/value-objects/ChunkRange.js';
import { SentinelTranslation } from '../domain/value-objects/SentinelTranslation.js';
import { errorMessage } from '../domain/errors/DomainErrors.js';
import type { RetryingTranslator, TranslationOutcome } from '../infrastructure/translation/RetryingTranslator.js';
import { sleep as realSleep, type Sleep } from '../shared/RetryPolicy.js';
import { Logger } from '../shared/Logger.js';
import { ProgressTracker } from './ProgressTracker.js';
import type { VerifyUseCase } from './VerifyUseCase.js';
import { toPreview } from './dto/ChunkPreview.js';
import type {
  ChunkResult,
  ProgressSnapshot,
  TranslationPlan,
  TranslationRunReport,
} from './dto/TranslationRun.js';
import type { VerificationReport } from './dto/VerificationReport.js';

export interface TranslateUseCaseOptions {
  /** 低於此長度寫入 [too short] */
  minContentLength: number;
  /** 每處理 N 個 chunk 回報一次進度 */
  reportEvery: number;
  /** chunk 最終失敗後的固定冷卻（毫秒） */
  failureCooldownMs: number;
  /** 執行前預估用的每 chunk 秒數 */
  estimateSecondsPerChunk: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface RunOptions {
  /** 取消訊號；只在 chunk 與 chunk 之間檢查 */
  signal?: AbortSignal;
  onProgress?: (snapshot: ProgressSnapshot) => void;
  onChunk?: (result: ChunkResult) => void;
}

type WriteResult = 'written' | 'conflict' | 'error';

const SAMPLE_COUNT = 3;
const SAMPLE_CHARS = 80;

/**
 * 翻譯用例（orchestrator）
 *
 * 每次執行都從儲存層重新取得 translation IS NULL 的 worklist，
 * 依 chunk_id 順序逐一處理，不在執行之間保留任何狀態：
 * 中斷後再執行只會處理剩下的 chunks，已寫入的結果不會重做。
 *
 * 單一 chunk 的失敗（翻譯耗盡、寫入錯誤）只計數與記錄，不會中止整批。
 * 翻譯失敗的 chunk 維持 NULL，留給下一次執行。
 */
export class TranslateUseCase {
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly logger = new Logger('TranslateUseCase');

  constructor(
    private readonly store: ChunkStorePort,
    private readonly translator: RetryingTranslator,
    private readonly verifier: VerifyUseCase,
    private readonly options: TranslateUseCaseOptions,
  ) {
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
  }

  /** 執行前摘要：範圍內總數、待處理數、前幾筆樣本與預估時間 */
  plan(range: ChunkRange): TranslationPlan {
    const totalInRange = this.store.countChunks({ range, translation: 'any' });
    const pending = this.store.countChunks({ range, translation: 'missing' });
    const samples = this.store
      .findUntranslated(range, SAMPLE_COUNT)
      .map((c) => toPreview(c, SAMPLE_CHARS));

    return {
      range: range.toString(),
      totalInRange,
      pending,
      samples,
      estimatedMs: Math.round(pending * this.options.estimateSecondsPerChunk * 1000),
    };
  }

  async run(range: ChunkRange, runOptions: RunOptions = {}): Promise<TranslationRunReport> {
    const startedAt = this.now();
    const worklist = this.store.findUntranslated(range);
    const total = worklist.length;
    const tracker = new ProgressTracker(total, this.now);
    let interrupted = false;
    let translatedMs = 0;

    this.logger.info('Translation run started', { range: range.toString(), pending: total });

    for (let i = 0; i < total; i++) {
      if (runOptions.signal?.aborted) {
        interrupted = true;
        this.logger.warn('Translation run interrupted', { processed: tracker.completed, remaining: total - i });
        break;
      }

      const chunk = worklist[i];
      const chunkStart = this.now();
      const { status, reason, attempts, fragments } = await this.processChunk(chunk);
      const durationMs = this.now() - chunkStart;

      tracker.record(status);
      if (status === 'translated') translatedMs += durationMs;
      runOptions.onChunk?.({
        chunkId: chunk.chunkId, index: i + 1, total, status, reason, attempts, durationMs, fragments,
      });

      if (tracker.completed % this.options.reportEvery === 0) {
        const snapshot = tracker.snapshot();
        this.logger.info('Progress', { ...snapshot });
        runOptions.onProgress?.(snapshot);
      }
    }

    const final = tracker.snapshot();
    const report: TranslationRunReport = {
      range: range.toString(),
      total,
      processed: final.completed,
      translated: final.translated,
      skipped: final.skipped,
      failed: final.failed,
      interrupted,
      durationMs: this.now() - startedAt,
      averageMsPerTranslated: final.translated > 0 ? Math.round(translatedMs / final.translated) : 0,
      verification: this.verify(range),
    };

    this.logger.info('Translation run finished', {
      translated: report.translated,
      skipped: report.skipped,
      failed: report.failed,
      interrupted,
      percentage: report.verification?.percentage ?? null,
    });
    return report;
  }

  /** 分類 → 哨兵或翻譯 → 寫回 */
  private async processChunk(
    chunk: StoredChunk,
  ): Promise<Pick<ChunkResult, 'status' | 'reason' | 'attempts' | 'fragments'>> {
    const sentinel = SentinelTranslation.classify(chunk.content, this.options.minContentLength);
    if (sentinel) {
      const written = this.write(chunk.chunkId, sentinel.marker);
      if (written === 'error') return { status: 'failed', reason: 'store-error', attempts: 0 };
      return { status: 'skipped', reason: written === 'conflict' ? 'conflict' : sentinel.kind, attempts: 0 };
    }

    let outcome: TranslationOutcome;
    try {
      outcome = await this.translator.translateChunk(chunk.content);
    } catch (err) {
      this.logger.error('Unexpected error while translating chunk', {
        chunkId: chunk.chunkId, error: errorMessage(err),
      });
      await this.sleep(this.options.failureCooldownMs);
      return { status: 'failed', reason: 'unexpected', attempts: 0 };
    }

    if (outcome.status === 'exhausted' || !outcome.text) {
      this.logger.warn('Chunk left untranslated', {
        chunkId: chunk.chunkId,
        attempts: outcome.attempts,
        lastFailure: outcome.status === 'exhausted' ? outcome.lastFailure : 'rejected',
      });
      await this.sleep(this.options.failureCooldownMs);
      return { status: 'failed', reason: 'exhausted', attempts: outcome.attempts };
    }

    const { attempts, fragments } = outcome;
    if (fragments && fragments.translated < fragments.total) {
      this.logger.warn('Chunk partially translated', {
        chunkId: chunk.chunkId, fragments: fragments.total, translatedFragments: fragments.translated,
      });
    }

    const written = this.write(chunk.chunkId, outcome.text);
    if (written === 'error') return { status: 'failed', reason: 'store-error', attempts, fragments };
    if (written === 'conflict') return { status: 'skipped', reason: 'conflict', attempts, fragments };
    return { status: 'translated', attempts, fragments };
  }

  /** 單列寫入；錯誤只記錄不拋出 */
  private write(chunkId: number, translation: string): WriteResult {
    try {
      if (this.store.updateTranslation(chunkId, translation)) return 'written';
      const existing = this.store.getChunk(chunkId);
      this.logger.warn(
        existing ? 'Chunk already has a translation, left unchanged' : 'Chunk no longer exists, translation dropped',
        { chunkId, existingChars: existing?.translation?.length ?? null },
      );
      return 'conflict';
    } catch (err) {
      this.logger.error('Failed to store translation', { chunkId, error: errorMessage(err) });
      return 'error';
    }
  }

  private verify(range: ChunkRange): VerificationReport | null {
    try {
      return this.verifier.verify(range);
    } catch (err) {
      this.logger.error('Verification query failed', { range: range.toString(), error: errorMessage(err) });
      return null;
    }
  }
}
