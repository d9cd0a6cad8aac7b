import type { ChunkStatus, ProgressSnapshot } from './dto/TranslationRun.js';

/**
 * 進度與剩餘時間估算
 * 剩餘時間 = 尚未處理數量 × 目前每個 chunk 的平均耗時
 */
export class ProgressTracker {
  private readonly startedAt: number;
  private readonly counts: Record<ChunkStatus, number> = { translated: 0, skipped: 0, failed: 0 };

  constructor(
    private readonly total: number,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  record(status: ChunkStatus): void {
    this.counts[status]++;
  }

  get completed(): number {
    return this.counts.translated + this.counts.skipped + this.counts.failed;
  }

  snapshot(): ProgressSnapshot {
    const completed = this.completed;
    const elapsedMs = this.now() - this.startedAt;
    const averageMs = completed > 0 ? elapsedMs / completed : 0;
    return {
      completed,
      total: this.total,
      ...this.counts,
      percentage: this.total > 0 ? Math.round((completed / this.total) * 1000) / 10 : 0,
      elapsedMs,
      averageMs: Math.round(averageMs),
      remainingMs: Math.round(Math.max(0, this.total - completed) * averageMs),
    };
  }
}
