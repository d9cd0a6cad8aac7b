import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteChunkStore } from '../../src/infrastructure/sqlite/SqliteChunkStore.js';
import { ChunkRange } from '../../src/domain/value-objects/ChunkRange.js';
import { StoreError } from '../../src/domain/errors/DomainErrors.js';
import type { NewChunk } from '../../src/domain/entities/Chunk.js';

function chunk(chunkId: number, content = `content ${chunkId}`, section = 'Canto 1'): NewChunk {
  return { chunkId, section, content, charCount: content.length };
}

/**
 * Feature: SQLite chunk 儲存層
 *
 * 作為翻譯流程，我需要依範圍取出尚未翻譯的 chunks，
 * 並保證每一列的譯文最多只被寫入一次。
 */
describe('SqliteChunkStore', () => {
  let dbMgr: DatabaseManager;
  let store: SqliteChunkStore;

  beforeEach(() => {
    dbMgr = new DatabaseManager(':memory:');
    store = new SqliteChunkStore(dbMgr.getDb(), () => 1_700_000_000_000);
    store.insertChunks([1, 2, 3, 4, 5].map((id) => chunk(id)));
  });

  afterEach(() => {
    dbMgr.close();
  });

  it('stores chunks with a NULL translation and a creation timestamp', () => {
    expect(store.getChunk(2)).toEqual({
      chunkId: 2,
      section: 'Canto 1',
      content: 'content 2',
      charCount: 9,
      translation: null,
      createdAt: 1_700_000_000_000,
    });
    expect(store.getChunk(99)).toBeUndefined();
  });

  it('inserts a batch atomically', () => {
    expect(() => store.insertChunks([chunk(6), chunk(3)])).toThrow(StoreError);
    expect(store.getChunk(6)).toBeUndefined();
    expect(store.countChunks()).toBe(5);
  });

  it('rolls back earlier batches when a later batch in the same transaction fails', () => {
    expect(() => store.transaction(() => {
      store.insertChunks([chunk(6), chunk(7)]);
      store.insertChunks([chunk(8), chunk(2)]);
    })).toThrow(StoreError);

    expect(store.getChunk(6)).toBeUndefined();
    expect(store.countChunks()).toBe(5);
  });

  it('commits every batch of a successful transaction and returns its result', () => {
    const written = store.transaction(() => {
      store.insertChunks([chunk(6)]);
      store.insertChunks([chunk(7)]);
      return 2;
    });

    expect(written).toBe(2);
    expect(store.maxChunkId()).toBe(7);
  });

  it('ignores an empty batch', () => {
    store.insertChunks([]);
    expect(store.countChunks()).toBe(5);
  });

  it('finds untranslated chunks in range order', () => {
    store.updateTranslation(3, 'done');

    expect(store.findUntranslated(ChunkRange.of(2, 4)).map((c) => c.chunkId)).toEqual([2, 4]);
    expect(store.findUntranslated(ChunkRange.all()).map((c) => c.chunkId)).toEqual([1, 2, 4, 5]);
    expect(store.findUntranslated(ChunkRange.of(1), 2).map((c) => c.chunkId)).toEqual([1, 2]);
  });

  /**
   * Scenario: 同一列不會被寫入兩次
   * Given chunk 1 已有譯文
   * When 再次寫入
   * Then 回傳 false，原譯文不變
   */
  it('writes a translation only while it is still NULL', () => {
    expect(store.updateTranslation(1, 'first')).toBe(true);
    expect(store.updateTranslation(1, 'second')).toBe(false);
    expect(store.getChunk(1)?.translation).toBe('first');
  });

  it('reports no update for an unknown chunk', () => {
    expect(store.updateTranslation(42, 'text')).toBe(false);
  });

  it('counts by range and translation state', () => {
    store.updateTranslation(1, 'a');
    store.updateTranslation(4, 'b');

    expect(store.countChunks()).toBe(5);
    expect(store.countChunks({ translation: 'present' })).toBe(2);
    expect(store.countChunks({ translation: 'missing' })).toBe(3);
    expect(store.countChunks({ range: ChunkRange.of(2, 4), translation: 'present' })).toBe(1);
    expect(store.countChunks({ range: ChunkRange.of(6) })).toBe(0);
  });

  it('reports the highest chunk id', () => {
    expect(store.maxChunkId()).toBe(5);
  });

  it('reports 0 as the highest id of an empty store', () => {
    const empty = new DatabaseManager(':memory:');
    expect(new SqliteChunkStore(empty.getDb()).maxChunkId()).toBe(0);
    empty.close();
  });

  it('wraps SQLite failures in StoreError carrying the chunk id', () => {
    dbMgr.getDb().exec('DROP TABLE chunks');

    try {
      store.updateTranslation(3, 'text');
      expect.unreachable('updateTranslation should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(StoreError);
      expect(err).toHaveProperty('chunkId', 3);
      expect(err).toHaveProperty('message', expect.stringContaining('Failed to update chunk 3'));
    }
  });
});
