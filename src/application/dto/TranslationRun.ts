import type { SentinelKind } from '../../domain/value-objects/SentinelTranslation.js';
import type { ChunkPreview } from './ChunkPreview.js';
import type { VerificationReport } from './VerificationReport.js';

/** 執行前摘要 */
export interface TranslationPlan {
  range: string;
  totalInRange: number;
  pending: number;
  samples: ChunkPreview[];
  estimatedMs: number;
}

export type ChunkStatus = 'translated' | 'skipped' | 'failed';

export type ChunkReason = SentinelKind | 'exhausted' | 'store-error' | 'conflict' | 'unexpected';

/** 單一 chunk 的處理結果 */
export interface ChunkResult {
  chunkId: number;
  /** 在 worklist 中的序號（1 起算） */
  index: number;
  total: number;
  status: ChunkStatus;
  reason?: ChunkReason;
  attempts: number;
  durationMs: number;
  /** 逐句翻譯時的片段統計；translated < total 表示部分片段未譯出 */
  fragments?: { total: number; translated: number };
}

export interface ProgressSnapshot {
  completed: number;
  total: number;
  translated: number;
  skipped: number;
  failed: number;
  percentage: number;
  elapsedMs: number;
  averageMs: number;
  remainingMs: number;
}

/** 一次執行的結果；verification 為 null 表示執行結束時無法查詢儲存層 */
export interface TranslationRunReport {
  range: string;
  total: number;
  processed: number;
  translated: number;
  skipped: number;
  failed: number;
  interrupted: boolean;
  durationMs: number;
  averageMsPerTranslated: number;
  verification: VerificationReport | null;
}
