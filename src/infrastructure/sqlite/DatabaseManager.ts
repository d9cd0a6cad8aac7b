import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { Logger } from '../../shared/Logger.js';
import { StoreError, errorMessage } from '../../domain/errors/DomainErrors.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：初始化 DB（必要時建立上層目錄）、套用 PRAGMA、執行 schema、
 * 檢查 schema 版本。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string) {
    this.logger = new Logger('DatabaseManager');

    this.db = DatabaseManager.open(dbPath);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.validateSchemaVersion();

    this.logger.debug('Database initialized', { dbPath });
  }

  private static open(dbPath: string): Database.Database {
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      return new Database(dbPath);
    } catch (err) {
      throw new StoreError(`Cannot open database ${dbPath}: ${errorMessage(err)}`, undefined, { cause: err });
    }
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  /** 首次使用時記錄版本；版本不符時拒絕開啟 */
  private validateSchemaVersion(): void {
    const row = this.db.prepare<[], { value: string }>(
      "SELECT value FROM schema_meta WHERE key = 'version'",
    ).get();

    if (!row) {
      this.db.prepare<[string]>(
        "INSERT INTO schema_meta(key, value) VALUES('version', ?)",
      ).run(SCHEMA_VERSION);
      return;
    }

    if (row.value !== SCHEMA_VERSION) {
      throw new StoreError(
        `Schema version mismatch: database has ${row.value}, expected ${SCHEMA_VERSION}`,
      );
    }
  }
}
