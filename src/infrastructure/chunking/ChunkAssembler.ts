import type { NewChunk } from '../../domain/entities/Chunk.js';
import type { DocumentEvent } from '../../domain/entities/DocumentEvent.js';

export const DEFAULT_SECTION = 'Introduction';

/** 連續空白收斂為單一空格並去頭尾 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * 依字元上限把段落串流組裝為 chunks
 *
 * - heading 只更新目前章節，不會觸發 flush
 * - 段落以 `\n` 串接；加入下一段會使長度超過 maxChars 時先封存目前緩衝區
 * - 章節標記取「封存當下」的章節：若 heading 之後的第一段觸發封存，
 *   被封存的 chunk 會標記為新章節
 * - 單一段落超過 maxChars 時自成一個 chunk，不截斷
 */
export class ChunkAssembler {
  constructor(
    readonly maxChars: number,
    readonly defaultSection: string = DEFAULT_SECTION,
  ) {
    if (!Number.isInteger(maxChars) || maxChars <= 0) {
      throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
    }
  }

  /**
   * @param events - 依閱讀順序排列的結構事件
   * @param startId - 第一個 chunk 的 chunk_id（續接既有資料時使用）
   */
  assemble(events: Iterable<DocumentEvent>, startId: number = 1): NewChunk[] {
    const chunks: NewChunk[] = [];
    let buffer = '';
    let section = this.defaultSection;
    let nextId = startId;

    const seal = (): void => {
      chunks.push({
        chunkId: nextId++,
        section,
        content: buffer,
        charCount: buffer.length,
      });
      buffer = '';
    };

    for (const event of events) {
      if (event.type === 'heading') {
        const title = normalizeWhitespace(event.text);
        if (title) section = title;
        continue;
      }

      const text = normalizeWhitespace(event.text);
      if (!text) continue;

      if (buffer && buffer.length + text.length + 1 > this.maxChars) {
        seal();
        buffer = text;
      } else {
        buffer = buffer ? `${buffer}\n${text}` : text;
      }
    }

    if (buffer) seal();
    return chunks;
  }
}
