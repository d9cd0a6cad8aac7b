import type { NewChunk, StoredChunk } from '../entities/Chunk.js';
import type { ChunkRange } from '../value-objects/ChunkRange.js';

export type TranslationFilter = 'any' | 'present' | 'missing';

export interface ChunkCountFilter {
  range?: ChunkRange;
  translation?: TranslationFilter;
}

/**
 * Chunk 儲存層抽象介面
 *
 * 所有失敗以 StoreError 拋出。翻譯寫入只觸及單一列；
 * 匯入的多個批次以 transaction() 包成一次提交。
 */
export interface ChunkStorePort {
  /** 批次寫入（單一交易，全有或全無） */
  insertChunks(chunks: NewChunk[]): void;

  /** 在單一交易中執行 work；work 拋出時整筆回滾 */
  transaction<T>(work: () => T): T;

  /** 取出範圍內 translation IS NULL 的 chunks，依 chunk_id 排序 */
  findUntranslated(range: ChunkRange, limit?: number): StoredChunk[];

  getChunk(chunkId: number): StoredChunk | undefined;

  /**
   * 寫入翻譯結果；只在 translation 仍為 NULL 時生效
   * @returns 是否實際更新了一列
   */
  updateTranslation(chunkId: number, translation: string): boolean;

  countChunks(filter?: ChunkCountFilter): number;

  /** 目前最大的 chunk_id，空表回傳 0 */
  maxChunkId(): number;
}
