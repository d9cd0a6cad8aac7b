import type { ChunkResult, ProgressSnapshot, TranslationPlan } from '../../application/dto/TranslationRun.js';

export type OutputFormat = 'json' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];

/** 毫秒 → 「1h 02m 05s」 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number): string => String(n).padStart(2, '0');

  if (hours > 0) return `${hours}h ${pad(minutes)}m ${pad(seconds)}s`;
  if (minutes > 0) return `${minutes}m ${pad(seconds)}s`;
  return `${seconds}s`;
}

/**
 * 指令輸出格式化器
 *
 * json 直接序列化；text 將物件平展為縮排的 key: value 行。
 * 進度與逐 chunk 訊息只有 text 模式會輸出。
 */
export class ReportFormatter {
  constructor(private readonly format: OutputFormat) {}

  formatObject(data: unknown): string {
    if (this.format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  formatPlan(plan: TranslationPlan): string {
    if (this.format === 'json') return this.formatObject(plan);

    const lines = [
      `Range: ${plan.range}`,
      `Chunks in range: ${plan.totalInRange}`,
      `Pending translation: ${plan.pending}`,
      `Estimated time: ${formatDuration(plan.estimatedMs)}`,
    ];
    for (const sample of plan.samples) {
      lines.push(`  #${sample.chunkId} [${sample.section}] ${sample.excerpt}`);
    }
    return lines.join('\n');
  }

  formatChunkLine(result: ChunkResult): string {
    const status = result.reason ? `${result.status} (${result.reason})` : result.status;
    return `[${result.index}/${result.total}] chunk ${result.chunkId}: ${status}`
      + (result.attempts > 0 ? `, ${result.attempts} attempt(s)` : '')
      + (result.fragments ? `, ${result.fragments.translated}/${result.fragments.total} fragments` : '');
  }

  formatProgress(snapshot: ProgressSnapshot): string {
    return `Progress: ${snapshot.completed}/${snapshot.total} (${snapshot.percentage}%)`
      + ` translated=${snapshot.translated} skipped=${snapshot.skipped} failed=${snapshot.failed}`
      + ` elapsed=${formatDuration(snapshot.elapsedMs)} remaining=${formatDuration(snapshot.remainingMs)}`;
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1).trimStart()}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val === undefined ? '' : String(val)}`;
      })
      .join('\n');
  }
}
