import path from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import { loadConfig, type AppConfig, type PartialConfig } from '../../config/ConfigLoader.js';
import { DatabaseManager } from '../../infrastructure/sqlite/DatabaseManager.js';
import { SqliteChunkStore } from '../../infrastructure/sqlite/SqliteChunkStore.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters/ReportFormatter.js';

/** 所有指令共用的全域選項 */
export type GlobalOptions = {
  config?: string;
};

/** commander option parser：正整數 chunk_id */
export function parseChunkId(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** commander option parser：輸出格式 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return format;
}

/**
 * 載入設定：--config 指定時以該檔所在目錄為基準，否則以 cwd 為基準。
 * 回傳的 baseDir 用來解析 source.path 與 store.dbPath 等相對路徑。
 */
export function loadCommandConfig(
  command: Command,
  overrides?: PartialConfig,
): { config: AppConfig; baseDir: string } {
  const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
  const cwd = process.cwd();

  if (configPath) {
    const resolved = path.resolve(cwd, configPath);
    return { config: loadConfig(path.dirname(resolved), overrides, resolved), baseDir: path.dirname(resolved) };
  }
  return { config: loadConfig(cwd, overrides), baseDir: cwd };
}

/** 開啟 chunk 儲存層；呼叫端負責 close() */
export function openStore(config: AppConfig, baseDir: string): { dbMgr: DatabaseManager; store: SqliteChunkStore } {
  const dbPath = config.store.dbPath === ':memory:'
    ? config.store.dbPath
    : path.resolve(baseDir, config.store.dbPath);
  const dbMgr = new DatabaseManager(dbPath);
  return { dbMgr, store: new SqliteChunkStore(dbMgr.getDb()) };
}
