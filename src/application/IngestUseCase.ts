import type { NewChunk } from '../domain/entities/Chunk.js';
import type { ChunkStorePort } from '../domain/ports/ChunkStorePort.js';
import type { DocumentSourcePort } from '../domain/ports/DocumentSourcePort.js';
import { SourceFormatError, StoreError, errorMessage } from '../domain/errors/DomainErrors.js';
import type { ChunkAssembler } from '../infrastructure/chunking/ChunkAssembler.js';
import { Logger } from '../shared/Logger.js';
import { toPreview } from './dto/ChunkPreview.js';
import type { IngestStats } from './dto/IngestStats.js';

export interface IngestOptions {
  /** 接續既有資料，chunk_id 從目前最大值 + 1 開始 */
  append?: boolean;
  /** 只組裝不寫入 */
  dryRun?: boolean;
}

const PREVIEW_COUNT = 2;
const PREVIEW_CHARS = 150;

/**
 * 匯入用例：讀取文件 → 組裝 chunks → 分批寫入儲存層
 *
 * 所有批次在同一個交易中寫入。任一批次失敗即整筆回滾並拋出 StoreError，
 * 記錄該批次的第一列以便排查；儲存層維持匯入前的狀態，可直接重跑。
 */
export class IngestUseCase {
  private readonly logger = new Logger('IngestUseCase');

  constructor(
    private readonly source: DocumentSourcePort,
    private readonly assembler: ChunkAssembler,
    private readonly store: ChunkStorePort,
    private readonly batchSize: number = 100,
  ) {}

  async ingest(sourcePath: string, options: IngestOptions = {}): Promise<IngestStats> {
    const start = Date.now();
    const dryRun = options.dryRun ?? false;

    const startId = this.resolveStartId(options.append ?? false, dryRun);

    const events = await this.source.read(sourcePath);
    const chunks = this.assembler.assemble(events, startId);
    if (chunks.length === 0) {
      throw new SourceFormatError(`Source contains no non-empty paragraphs: ${sourcePath}`, sourcePath);
    }

    const batchesWritten = dryRun ? 0 : this.upload(chunks);

    const stats: IngestStats = {
      sourcePath,
      format: this.source.format,
      ...this.summarize(chunks),
      batchesWritten,
      dryRun,
      preview: chunks.slice(0, PREVIEW_COUNT).map((c) => toPreview(c, PREVIEW_CHARS)),
      durationMs: Date.now() - start,
    };

    this.logger.info('Ingest finished', {
      chunksCreated: stats.chunksCreated,
      batchesWritten,
      averageChars: stats.averageChars,
      dryRun,
    });
    return stats;
  }

  private resolveStartId(append: boolean, dryRun: boolean): number {
    const existing = this.store.countChunks();
    if (existing === 0) return 1;
    if (append) return this.store.maxChunkId() + 1;
    if (dryRun) return 1;
    throw new StoreError(
      `Store already holds ${existing} chunks. Use append to continue numbering after chunk ${this.store.maxChunkId()}.`,
    );
  }

  /** 依 batchSize 分批寫入，回傳成功的批次數 */
  private upload(chunks: NewChunk[]): number {
    return this.store.transaction(() => this.uploadBatches(chunks));
  }

  private uploadBatches(chunks: NewChunk[]): number {
    const totalBatches = Math.ceil(chunks.length / this.batchSize);
    let written = 0;

    for (let i = 0; i < chunks.length; i += this.batchSize) {
      const batch = chunks.slice(i, i + this.batchSize);
      const batchNum = written + 1;
      try {
        this.store.insertChunks(batch);
      } catch (err) {
        this.logger.error('Batch upload failed', {
          batch: batchNum,
          totalBatches,
          firstRow: toPreview(batch[0], PREVIEW_CHARS),
          error: errorMessage(err),
        });
        throw err;
      }
      written++;
      this.logger.debug('Batch uploaded', { batch: batchNum, totalBatches, rows: batch.length });
    }
    return written;
  }

  private summarize(chunks: NewChunk[]): Pick<IngestStats,
    'chunksCreated' | 'firstChunkId' | 'lastChunkId' | 'sections' | 'averageChars' | 'largestChars' | 'oversizedChunks'> {
    const totalChars = chunks.reduce((sum, c) => sum + c.charCount, 0);
    return {
      chunksCreated: chunks.length,
      firstChunkId: chunks[0]?.chunkId ?? null,
      lastChunkId: chunks[chunks.length - 1]?.chunkId ?? null,
      sections: new Set(chunks.map((c) => c.section)).size,
      averageChars: chunks.length > 0 ? Math.round(totalChars / chunks.length) : 0,
      largestChars: chunks.reduce((max, c) => Math.max(max, c.charCount), 0),
      oversizedChunks: chunks.filter((c) => c.charCount > this.assembler.maxChars).length,
    };
  }
}
