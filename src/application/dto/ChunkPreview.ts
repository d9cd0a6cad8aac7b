import type { NewChunk } from '../../domain/entities/Chunk.js';

/** 指令輸出用的 chunk 摘要 */
export interface ChunkPreview {
  chunkId: number;
  section: string;
  excerpt: string;
}

export function toPreview(chunk: NewChunk, maxChars: number): ChunkPreview {
  const content = chunk.content;
  return {
    chunkId: chunk.chunkId,
    section: chunk.section,
    excerpt: content.length > maxChars ? `${content.slice(0, maxChars)}...` : content,
  };
}
