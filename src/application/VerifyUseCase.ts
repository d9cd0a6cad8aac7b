import type { ChunkStorePort } from '../domain/ports/ChunkStorePort.js';
import type { ChunkRange } from '../domain/value-objects/ChunkRange.js';
import type { VerificationReport } from './dto/VerificationReport.js';

/**
 * 驗證用例：直接向儲存層查詢計數
 *
 * 不依賴任何記憶體中的計數器，程序中途崩潰後也能得到正確的完成度。
 */
export class VerifyUseCase {
  constructor(private readonly store: ChunkStorePort) {}

  verify(range: ChunkRange): VerificationReport {
    const total = this.store.countChunks({ range, translation: 'any' });
    const translated = this.store.countChunks({ range, translation: 'present' });
    const pending = this.store.countChunks({ range, translation: 'missing' });
    const percentage = total > 0 ? Math.round((translated / total) * 1000) / 10 : 0;

    return {
      range: range.toString(),
      total,
      translated,
      pending,
      percentage,
      complete: pending === 0,
    };
  }
}
