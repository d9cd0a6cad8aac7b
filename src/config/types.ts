import { z } from 'zod';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/** 文件來源設定 */
export const SourceConfigSchema = z.object({
  path: z.string().min(1),
  format: z.enum(['daisy-xml', 'markdown']),
  /** 視為章節標題的 heading 層級（h1 ~ h6） */
  headingLevels: z.array(z.number().int().min(1).max(6)).min(1),
});

/** SQLite 儲存設定 */
export const StoreConfigSchema = z.object({
  dbPath: z.string().min(1),
  /** 每批寫入列數 */
  batchSize: positiveInt,
});

/** Chunk 組裝設定 */
export const ChunkingConfigSchema = z.object({
  /** 每個 chunk 的字元上限，只影響合併決策，不截斷單一段落 */
  maxChars: positiveInt,
  /** 出現第一個 heading 前使用的章節名稱 */
  defaultSection: z.string().min(1),
});

/** 翻譯服務設定 */
export const TranslationConfigSchema = z.object({
  /** 'openai' 走 OpenAI-compatible chat completions，'http' 走 LibreTranslate-compatible API */
  provider: z.enum(['openai', 'http']),
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  model: z.string().min(1),
  sourceLang: z.string().min(1),
  targetLang: z.string().min(1),
  /** 超過此長度的 chunk 改為逐句翻譯 */
  splitThreshold: positiveInt,
  /** 低於此長度的內容寫入 [too short] */
  minContentLength: nonNegativeInt,
  /** 譯文最短長度，低於此值視為失敗 */
  minResultChars: nonNegativeInt,
  /** 單次請求逾時（毫秒） */
  timeoutMs: positiveInt,
});

/** 斷句設定 */
export const SplitterConfigSchema = z.object({
  /** 句末標記，每個元素為單一字元 */
  markers: z.array(z.string().length(1)).min(1),
  /** 累積長度超過此值才在標記處切分 */
  minFragmentChars: nonNegativeInt,
  /** 修剪後短於此值的片段直接丟棄（至少 1） */
  minKeepChars: positiveInt,
});

/** 重試與退避設定（毫秒） */
export const RetryConfigSchema = z.object({
  maxAttempts: positiveInt,
  baseDelayMs: nonNegativeInt,
  delayStepMs: nonNegativeInt,
  jitterMs: nonNegativeInt,
  rateLimitBaseMs: nonNegativeInt,
  rateLimitStepMs: nonNegativeInt,
  transientBaseMs: nonNegativeInt,
  transientStepMs: nonNegativeInt,
  otherCooldownMs: nonNegativeInt,
  /** chunk 最終失敗後的固定冷卻 */
  failureCooldownMs: nonNegativeInt,
});

/** 進度回報設定 */
export const ProgressConfigSchema = z.object({
  /** 每處理 N 個 chunk 回報一次 */
  reportEvery: positiveInt,
  /** 執行前預估時間用的每 chunk 秒數 */
  estimateSecondsPerChunk: z.number().nonnegative(),
});

export const AppConfigSchema = z.object({
  version: z.literal(1),
  source: SourceConfigSchema,
  store: StoreConfigSchema,
  chunking: ChunkingConfigSchema,
  translation: TranslationConfigSchema,
  splitter: SplitterConfigSchema,
  retry: RetryConfigSchema,
  progress: ProgressConfigSchema,
  /** 略過互動式確認 */
  autoConfirm: z.boolean(),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type TranslationConfig = z.infer<typeof TranslationConfigSchema>;
export type SplitterConfig = z.infer<typeof SplitterConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type ProgressConfig = z.infer<typeof ProgressConfigSchema>;

/** 完整設定 */
export type AppConfig = z.infer<typeof AppConfigSchema>;

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof AppConfig]?: AppConfig[K] extends unknown[]
    ? AppConfig[K]
    : AppConfig[K] extends object
      ? Partial<AppConfig[K]>
      : AppConfig[K];
};
