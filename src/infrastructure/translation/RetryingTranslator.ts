import type { TranslationPort } from '../../domain/ports/TranslationPort.js';
import type { RetryConfig } from '../../config/types.js';
import {
  classifyTranslationFailure,
  errorMessage,
  type TranslationFailureKind,
} from '../../domain/errors/DomainErrors.js';
import { runAttempts, sleep as realSleep, type Sleep } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';
import type { SentenceSplitter } from '../chunking/SentenceSplitter.js';

export interface FragmentStats {
  total: number;
  translated: number;
}

export type TranslationOutcome =
  | {
    status: 'success';
    text: string;
    attempts: number;
    fragments?: FragmentStats;
  }
  | {
    status: 'exhausted';
    attempts: number;
    /** 最後一次失敗的原因；'rejected' 表示服務有回應但未通過品質檢查 */
    lastFailure: TranslationFailureKind | 'rejected' | null;
    fragments?: FragmentStats;
  };

export interface RetryingTranslatorOptions {
  retry: RetryConfig;
  splitter: SentenceSplitter;
  /** 超過此長度改為逐句翻譯 */
  splitThreshold: number;
  /** 譯文修剪後的最短長度 */
  minResultChars: number;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * 帶分類退避的翻譯重試策略
 *
 * 每次嘗試前先等待 base + step·attempt + jitter，即使一切順利也會節流。
 * 失敗依分類冷卻：
 * - rate-limited：rateLimitBase + rateLimitStep·attempt
 * - transient：transientBase + transientStep·attempt
 * - other：固定 otherCooldown
 * 最後一次嘗試失敗後不再冷卻，直接回傳 exhausted。
 */
export class RetryingTranslator {
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger = new Logger('RetryingTranslator');

  constructor(
    private readonly client: TranslationPort,
    private readonly options: RetryingTranslatorOptions,
  ) {
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
  }

  /** 單一文字單位走完整重試策略 */
  async translateWithPolicy(text: string): Promise<TranslationOutcome> {
    const { retry } = this.options;
    const input = text.trim();

    const result = await runAttempts((attempt) => {
      this.logger.debug('Translation attempt', { attempt: attempt + 1, chars: input.length });
      return this.client.translate(input);
    }, {
      maxAttempts: retry.maxAttempts,
      sleep: this.sleep,
      delayBefore: (attempt) =>
        retry.baseDelayMs + retry.delayStepMs * attempt + Math.round(this.random() * retry.jitterMs),
      accept: (value) => this.isAcceptable(input, value),
      cooldownAfter: (attempt, err) => this.cooldownFor(attempt, err),
      onFailure: (attempt, err, cooldownMs) => {
        const kind = classifyTranslationFailure(err);
        if (cooldownMs === null) {
          this.logger.error('All translation attempts failed', {
            attempts: attempt + 1, kind, error: errorMessage(err),
          });
        } else {
          this.logger.warn('Translation attempt failed', {
            attempt: attempt + 1, kind, cooldownMs, error: errorMessage(err),
          });
        }
      },
      onRejected: (attempt, value) => {
        this.logger.warn('Translation rejected by quality check', {
          attempt: attempt + 1, resultChars: value.trim().length, echoed: value.trim() === input,
        });
      },
    });

    if (result.ok) {
      return { status: 'success', text: result.value.trim(), attempts: result.attempts };
    }
    return {
      status: 'exhausted',
      attempts: result.attempts,
      lastFailure: result.rejected
        ? 'rejected'
        : result.lastError === undefined ? null : classifyTranslationFailure(result.lastError),
    };
  }

  /**
   * 翻譯一個 chunk 的內容
   *
   * 長度超過 splitThreshold 時逐句送出，每一句各自套用重試策略，
   * 成功的譯句以單一空格串接；沒有任何一句成功則整個 chunk 視為 exhausted。
   */
  async translateChunk(content: string): Promise<TranslationOutcome> {
    const text = content.trim();
    if (text.length <= this.options.splitThreshold) {
      return this.translateWithPolicy(text);
    }

    const translated: string[] = [];
    let total = 0;
    let attempts = 0;
    let lastFailure: TranslationFailureKind | 'rejected' | null = null;

    for (const fragment of this.options.splitter.split(text)) {
      total++;
      const outcome = await this.translateWithPolicy(fragment);
      attempts += outcome.attempts;
      if (outcome.status === 'success') {
        translated.push(outcome.text);
      } else {
        lastFailure = outcome.lastFailure;
        this.logger.warn('Fragment not translated', { fragment: total, chars: fragment.length });
      }
    }

    const fragments = { total, translated: translated.length };
    if (translated.length === 0) {
      return { status: 'exhausted', attempts, lastFailure, fragments };
    }
    return { status: 'success', text: translated.join(' '), attempts, fragments };
  }

  /** 品質檢查：非空、與原文不同、長度足夠 */
  private isAcceptable(input: string, value: string): boolean {
    const result = value.trim();
    return result.length >= this.options.minResultChars && result !== input;
  }

  private cooldownFor(attempt: number, err: unknown): number | null {
    const { retry } = this.options;
    if (attempt >= retry.maxAttempts - 1) return null;

    switch (classifyTranslationFailure(err)) {
      case 'rate-limited':
        return retry.rateLimitBaseMs + retry.rateLimitStepMs * attempt;
      case 'transient':
        return retry.transientBaseMs + retry.transientStepMs * attempt;
      case 'other':
        return retry.otherCooldownMs;
    }
  }
}
