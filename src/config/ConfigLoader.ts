import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG } from './defaults.js';
import { AppConfigSchema } from './types.js';
import type { AppConfig, PartialConfig } from './types.js';
import { ConfigurationError, errorMessage } from '../domain/errors/DomainErrors.js';

export type { AppConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.scripture.json';

const OPENAI_HOST = 'api.openai.com';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base，陣列整體取代 */
function deepMerge(
  base: Record<string, unknown>,
  partial: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    if (val === undefined) continue;
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else {
      result[key] = val;
    }
  }
  return result;
}

/** 讀取設定檔；檔案不存在回傳空物件 */
function readConfigFile(configPath: string, required: boolean): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Config file ${configPath} is not valid JSON: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * 環境變數覆蓋值：TRANSLATOR_BASE_URL / TRANSLATOR_API_KEY / SCRIPTURE_DB_PATH
 * 在驗證前合併，與檔案中的值走同一套 schema
 */
function envOverrides(): PartialConfig {
  return {
    translation: {
      baseUrl: process.env.TRANSLATOR_BASE_URL || undefined,
      apiKey: process.env.TRANSLATOR_API_KEY || undefined,
    },
    store: {
      dbPath: process.env.SCRIPTURE_DB_PATH || undefined,
    },
  };
}

/** openai provider 未設定 key 時退回 OPENAI_API_KEY */
function applyOpenAIKeyFallback(config: AppConfig): void {
  if (!config.translation.apiKey && config.translation.provider === 'openai') {
    config.translation.apiKey = process.env.OPENAI_API_KEY || undefined;
  }
}

/** 驗證合併後的設定值 */
function validate(merged: Record<string, unknown>): AppConfig {
  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`, { cause: result.error });
  }

  const config = result.data;
  if (config.translation.minContentLength > config.translation.splitThreshold) {
    throw new ConfigurationError('translation.minContentLength must not exceed translation.splitThreshold');
  }
  return config;
}

/**
 * 載入設定：讀取 .scripture.json（若存在）並合併到預設值上
 * @param cwd - 設定檔所在目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param configPath - 明確指定的設定檔路徑，不存在時視為錯誤
 */
export function loadConfig(
  cwd: string,
  overrides?: PartialConfig,
  configPath?: string,
): AppConfig {
  const fileConfig = readConfigFile(
    configPath ?? path.join(cwd, CONFIG_FILE_NAME),
    configPath !== undefined,
  );

  // 合併順序：defaults < file config < overrides < env
  let merged = deepMerge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, overrides);
  }
  merged = deepMerge(merged, envOverrides());

  const config = validate(merged);
  applyOpenAIKeyFallback(config);
  return config;
}

/**
 * 確認翻譯服務所需的憑證存在
 * 只有直連 OpenAI 官方 endpoint 時才強制要求 API key，
 * 自架的 OpenAI-compatible 服務或 LibreTranslate 可不需要
 */
export function assertTranslationCredentials(config: AppConfig): void {
  const { provider, baseUrl, apiKey } = config.translation;
  if (provider !== 'openai' || apiKey) return;

  let host: string;
  try {
    host = new URL(baseUrl).host;
  } catch (err) {
    throw new ConfigurationError(`translation.baseUrl is not a valid URL: ${baseUrl}`, { cause: err });
  }

  if (host === OPENAI_HOST) {
    throw new ConfigurationError(
      'Missing API key for the openai provider. Set TRANSLATOR_API_KEY or OPENAI_API_KEY, or translation.apiKey in the config file.',
    );
  }
}
