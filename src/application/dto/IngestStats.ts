import type { ChunkPreview } from './ChunkPreview.js';

/** 匯入操作統計 */
export interface IngestStats {
  sourcePath: string;
  format: string;
  chunksCreated: number;
  batchesWritten: number;
  firstChunkId: number | null;
  lastChunkId: number | null;
  sections: number;
  averageChars: number;
  largestChars: number;
  /** 單一段落即超過上限的 chunk 數 */
  oversizedChunks: number;
  dryRun: boolean;
  preview: ChunkPreview[];
  durationMs: number;
}
