import type Database from 'better-sqlite3';
import type { NewChunk, StoredChunk } from '../../domain/entities/Chunk.js';
import type { ChunkCountFilter, ChunkStorePort } from '../../domain/ports/ChunkStorePort.js';
import type { ChunkRange } from '../../domain/value-objects/ChunkRange.js';
import { StoreError, errorMessage } from '../../domain/errors/DomainErrors.js';

interface ChunkRow {
  chunk_id: number;
  section: string;
  content: string;
  char_count: number;
  translation: string | null;
  created_at: number;
}

interface RangeParams {
  start: number;
  end: number | null;
}

const SELECT_COLUMNS = 'chunk_id, section, content, char_count, translation, created_at';
const RANGE_SQL = 'chunk_id >= @start AND (@end IS NULL OR chunk_id <= @end)';

function toChunk(row: ChunkRow): StoredChunk {
  return {
    chunkId: row.chunk_id,
    section: row.section,
    content: row.content,
    charCount: row.char_count,
    translation: row.translation,
    createdAt: row.created_at,
  };
}

function rangeParams(range?: ChunkRange): RangeParams {
  return { start: range?.start ?? 1, end: range?.end ?? null };
}

/**
 * better-sqlite3 實作的 ChunkStore
 *
 * 翻譯寫入只在 translation IS NULL 時生效，
 * 因此同一列最多被寫入一次，不同範圍的 orchestrator 可同時執行。
 */
export class SqliteChunkStore implements ChunkStorePort {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  insertChunks(chunks: NewChunk[]): void {
    if (chunks.length === 0) return;

    const stmt = this.db.prepare<[number, string, string, number, number]>(`
      INSERT INTO chunks(chunk_id, section, content, char_count, translation, created_at)
      VALUES(?, ?, ?, ?, NULL, ?)
    `);
    const insertAll = this.db.transaction((batch: NewChunk[]) => {
      const createdAt = this.now();
      for (const chunk of batch) {
        stmt.run(chunk.chunkId, chunk.section, chunk.content, chunk.charCount, createdAt);
      }
    });

    this.guard(`insert ${chunks.length} chunks starting at ${chunks[0].chunkId}`, () => insertAll(chunks), chunks[0].chunkId);
  }

  transaction<T>(work: () => T): T {
    // 內層 insertChunks 的交易會成為 savepoint
    return this.guard('run transaction', () => this.db.transaction(work)());
  }

  findUntranslated(range: ChunkRange, limit?: number): StoredChunk[] {
    const limitSql = limit !== undefined ? ' LIMIT @limit' : '';
    return this.guard('select untranslated chunks', () => {
      const rows = this.db.prepare<[RangeParams & { limit?: number }], ChunkRow>(`
        SELECT ${SELECT_COLUMNS} FROM chunks
        WHERE ${RANGE_SQL} AND translation IS NULL
        ORDER BY chunk_id${limitSql}
      `).all({ ...rangeParams(range), ...(limit !== undefined ? { limit } : {}) });
      return rows.map(toChunk);
    });
  }

  getChunk(chunkId: number): StoredChunk | undefined {
    return this.guard(`get chunk ${chunkId}`, () => {
      const row = this.db.prepare<[number], ChunkRow>(
        `SELECT ${SELECT_COLUMNS} FROM chunks WHERE chunk_id = ?`,
      ).get(chunkId);
      return row ? toChunk(row) : undefined;
    }, chunkId);
  }

  updateTranslation(chunkId: number, translation: string): boolean {
    return this.guard(`update chunk ${chunkId}`, () => {
      const result = this.db.prepare<[string, number]>(
        'UPDATE chunks SET translation = ? WHERE chunk_id = ? AND translation IS NULL',
      ).run(translation, chunkId);
      return result.changes > 0;
    }, chunkId);
  }

  countChunks(filter: ChunkCountFilter = {}): number {
    const translationSql = {
      any: '',
      present: ' AND translation IS NOT NULL',
      missing: ' AND translation IS NULL',
    }[filter.translation ?? 'any'];

    return this.guard('count chunks', () => {
      const row = this.db.prepare<[RangeParams], { cnt: number }>(
        `SELECT COUNT(*) AS cnt FROM chunks WHERE ${RANGE_SQL}${translationSql}`,
      ).get(rangeParams(filter.range));
      return row?.cnt ?? 0;
    });
  }

  maxChunkId(): number {
    return this.guard('read max chunk_id', () => {
      const row = this.db.prepare<[], { maxId: number | null }>(
        'SELECT MAX(chunk_id) AS maxId FROM chunks',
      ).get();
      return row?.maxId ?? 0;
    });
  }

  /** 將 SQLite 例外統一包裝為 StoreError */
  private guard<T>(operation: string, fn: () => T, chunkId?: number): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError(`Failed to ${operation}: ${errorMessage(err)}`, chunkId, { cause: err });
    }
  }
}
