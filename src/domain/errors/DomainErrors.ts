export type ErrorClassification = 'fatal' | 'isolated' | 'retryable';

/** 翻譯失敗分類：決定 RetryingTranslator 採用哪一種冷卻時間 */
export type TranslationFailureKind = 'rate-limited' | 'transient' | 'other';

/** 所有 pipeline domain 錯誤的基底類別 */
export abstract class PipelineError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Fatal：啟動階段即中止，不做任何部分寫入 ---

export class ConfigurationError extends PipelineError {
  readonly classification = 'fatal' as const;
  readonly code = 'CONFIG_INVALID';
}

export class SourceFormatError extends PipelineError {
  readonly classification = 'fatal' as const;
  readonly code = 'SOURCE_FORMAT';

  constructor(
    message: string,
    public readonly sourcePath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Isolated：單一 chunk 失敗，計數後繼續 ---

export class StoreError extends PipelineError {
  readonly classification = 'isolated' as const;
  readonly code = 'STORE_IO';

  constructor(
    message: string,
    public readonly chunkId?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Retryable：交給重試策略處理 ---

export class TranslationError extends PipelineError {
  readonly classification = 'retryable' as const;
  readonly code: string;

  constructor(
    message: string,
    public readonly kind: TranslationFailureKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.code = `TRANSLATION_${kind.toUpperCase().replace('-', '_')}`;
  }
}

export class RateLimitedError extends TranslationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'rate-limited', options);
  }
}

export class TransientTranslationError extends TranslationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'transient', options);
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET', 'ECONNREFUSED', 'ECONNABORTED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET',
]);

function readProperty(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

/** 取得錯誤訊息，非 Error 物件則轉為字串 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * 將任意錯誤歸類為 TranslationFailureKind
 *
 * 判斷順序：既有的 TranslationError → HTTP status → 系統錯誤碼 → 訊息關鍵字
 */
export function classifyTranslationFailure(err: unknown): TranslationFailureKind {
  if (err instanceof TranslationError) return err.kind;

  const status = readProperty(err, 'status');
  if (typeof status === 'number') {
    if (status === 429) return 'rate-limited';
    if (status === 408 || status >= 500) return 'transient';
    return 'other';
  }

  const code = readProperty(err, 'code') ?? readProperty(readProperty(err, 'cause'), 'code');
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) return 'transient';

  const message = errorMessage(err).toLowerCase();
  if (message.includes('too many requests') || message.includes('rate limit')) {
    return 'rate-limited';
  }
  if (
    message.includes('connection') ||
    message.includes('timed out') ||
    message.includes('timeout') ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return 'transient';
  }
  return 'other';
}

/** 將 provider 拋出的任意錯誤轉為已分類的 TranslationError */
export function toTranslationError(err: unknown, context: string): TranslationError {
  if (err instanceof TranslationError) return err;
  const kind = classifyTranslationFailure(err);
  const message = `${context}: ${errorMessage(err)}`;
  switch (kind) {
    case 'rate-limited':
      return new RateLimitedError(message, { cause: err });
    case 'transient':
      return new TransientTranslationError(message, { cause: err });
    case 'other':
      return new TranslationError(message, 'other', { cause: err });
  }
}
