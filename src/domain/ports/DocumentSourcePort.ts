import type { DocumentEvent } from '../entities/DocumentEvent.js';

export type SourceFormat = 'daisy-xml' | 'markdown';

export interface DocumentSourcePort {
  readonly format: SourceFormat;

  /**
   * 讀取文件並依閱讀順序產生結構事件
   * 檔案不存在或格式錯誤時拋出 SourceFormatError
   */
  read(filePath: string): Promise<DocumentEvent[]>;
}
