/** 組裝完成、尚未寫入儲存層的 chunk */
export interface NewChunk {
  chunkId: number;
  section: string;
  content: string;
  charCount: number;
}

/** 儲存層中的 chunk；translation 為 null 代表尚未處理 */
export interface StoredChunk extends NewChunk {
  translation: string | null;
  createdAt: number;
}
