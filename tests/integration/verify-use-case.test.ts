import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { VerifyUseCase } from '../../src/application/VerifyUseCase.js';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteChunkStore } from '../../src/infrastructure/sqlite/SqliteChunkStore.js';
import { ChunkRange } from '../../src/domain/value-objects/ChunkRange.js';

describe('VerifyUseCase', () => {
  let dbMgr: DatabaseManager;
  let store: SqliteChunkStore;

  beforeEach(() => {
    dbMgr = new DatabaseManager(':memory:');
    store = new SqliteChunkStore(dbMgr.getDb());
    store.insertChunks(Array.from({ length: 6 }, (_, i) => ({
      chunkId: i + 1, section: 'Canto 1', content: `verse ${i + 1}`, charCount: 7,
    })));
  });

  afterEach(() => {
    dbMgr.close();
  });

  it('reports completeness straight from the store', () => {
    store.updateTranslation(1, 'one');
    store.updateTranslation(2, '[numeric: 2]');

    expect(new VerifyUseCase(store).verify(ChunkRange.all())).toEqual({
      range: '1+',
      total: 6,
      translated: 2,
      pending: 4,
      percentage: 33.3,
      complete: false,
    });
  });

  it('limits the counts to the range', () => {
    store.updateTranslation(5, 'five');
    store.updateTranslation(6, 'six');

    expect(new VerifyUseCase(store).verify(ChunkRange.of(5, 6))).toMatchObject({
      total: 2, translated: 2, pending: 0, percentage: 100, complete: true,
    });
  });

  it('treats an empty range as complete with 0%', () => {
    expect(new VerifyUseCase(store).verify(ChunkRange.of(100))).toEqual({
      range: '100+',
      total: 0,
      translated: 0,
      pending: 0,
      percentage: 0,
      complete: true,
    });
  });
});
