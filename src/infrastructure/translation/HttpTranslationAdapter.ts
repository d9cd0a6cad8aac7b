import { z } from 'zod';
import type { TranslationPort } from '../../domain/ports/TranslationPort.js';
import {
  RateLimitedError,
  TransientTranslationError,
  TranslationError,
  errorMessage,
} from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * LibreTranslate-compatible HTTP 翻譯 Adapter
 *
 * POST {baseUrl}/translate，body 為 { q, source, target, format, api_key }。
 * 自架的 LibreTranslate 以本地 seq2seq 模型提供服務，
 * 因此同一個 adapter 可切換遠端 API 或本地模型。
 */

export interface HttpTranslationConfig {
  baseUrl: string;
  apiKey?: string;
  sourceLang: string;
  targetLang: string;
  timeoutMs?: number;
}

const TranslateResponseSchema = z.object({
  translatedText: z.string(),
});

const ErrorResponseSchema = z.object({
  error: z.string(),
});

export class HttpTranslationAdapter implements TranslationPort {
  readonly providerId = 'libretranslate';
  readonly sourceLang: string;
  readonly targetLang: string;
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly logger = new Logger('HttpTranslationAdapter');

  constructor(config: HttpTranslationConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.sourceLang = config.sourceLang;
    this.targetLang = config.targetLang;
    this.timeoutMs = config.timeoutMs ?? 60000;
  }

  async translate(text: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/translate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          q: text,
          source: this.sourceLang,
          target: this.targetLang,
          format: 'text',
          ...(this.apiKey ? { api_key: this.apiKey } : {}),
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      // fetch 只在網路層失敗（DNS、連線、逾時）時 reject
      throw new TransientTranslationError(`Translation request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw await this.toHttpError(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new TranslationError(`Translation response is not JSON: ${errorMessage(err)}`, 'other', { cause: err });
    }

    const parsed = TranslateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TranslationError('Translation response is missing translatedText', 'other', { cause: parsed.error });
    }
    return parsed.data.translatedText.trim();
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/languages`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok;
    } catch (err) {
      this.logger.debug('Availability probe failed', { error: errorMessage(err) });
      return false;
    }
  }

  /** 依 HTTP status 分類：429 → rate-limited，408/5xx → transient，其餘 → other */
  private async toHttpError(response: Response): Promise<TranslationError> {
    const detail = await this.readErrorDetail(response);
    const message = `Translation service returned ${response.status}${detail ? `: ${detail}` : ''}`;

    if (response.status === 429) return new RateLimitedError(message);
    if (response.status === 408 || response.status >= 500) return new TransientTranslationError(message);
    return new TranslationError(message, 'other');
  }

  private async readErrorDetail(response: Response): Promise<string> {
    const raw = await response.text().catch(() => '');
    try {
      const parsed = ErrorResponseSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data.error;
    } catch {
      // 非 JSON 錯誤內容，直接使用原文
    }
    return raw.slice(0, 200);
  }
}
