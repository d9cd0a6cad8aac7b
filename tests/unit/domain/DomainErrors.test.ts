import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  SourceFormatError,
  StoreError,
  TranslationError,
  RateLimitedError,
  TransientTranslationError,
  PipelineError,
  classifyTranslationFailure,
  toTranslationError,
  errorMessage,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('ConfigurationError is fatal', () => {
    const err = new ConfigurationError('bad config');
    expect(err.classification).toBe('fatal');
    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.name).toBe('ConfigurationError');
    expect(err).toBeInstanceOf(PipelineError);
    expect(err).toBeInstanceOf(Error);
  });

  it('SourceFormatError is fatal and keeps the source path', () => {
    const err = new SourceFormatError('no paragraphs', 'data/book.xml');
    expect(err.classification).toBe('fatal');
    expect(err.code).toBe('SOURCE_FORMAT');
    expect(err.sourcePath).toBe('data/book.xml');
  });

  it('StoreError is isolated and keeps the chunk id', () => {
    const err = new StoreError('disk full', 42);
    expect(err.classification).toBe('isolated');
    expect(err.code).toBe('STORE_IO');
    expect(err.chunkId).toBe(42);
  });

  it('TranslationError subclasses are retryable with kind-specific codes', () => {
    const rate = new RateLimitedError('slow down');
    expect(rate.classification).toBe('retryable');
    expect(rate.kind).toBe('rate-limited');
    expect(rate.code).toBe('TRANSLATION_RATE_LIMITED');
    expect(rate).toBeInstanceOf(TranslationError);

    const transient = new TransientTranslationError('reset');
    expect(transient.kind).toBe('transient');
    expect(transient.code).toBe('TRANSLATION_TRANSIENT');

    expect(new TranslationError('bad', 'other').code).toBe('TRANSLATION_OTHER');
  });

  it('errorMessage stringifies non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(7)).toBe('7');
  });
});

/**
 * Feature: 翻譯失敗分類
 *
 * 重試策略依失敗種類決定冷卻時間，
 * 因此任何 provider 拋出的錯誤都必須能歸入三種之一。
 */
describe('classifyTranslationFailure', () => {
  it('keeps the kind of an existing TranslationError', () => {
    expect(classifyTranslationFailure(new RateLimitedError('x'))).toBe('rate-limited');
    expect(classifyTranslationFailure(new TranslationError('x', 'other'))).toBe('other');
  });

  /**
   * Scenario: 依 HTTP status 分類
   * Given 錯誤物件帶有 status 欄位
   * Then 429 為 rate-limited，408 與 5xx 為 transient，其餘為 other
   */
  it('classifies by HTTP status', () => {
    expect(classifyTranslationFailure({ status: 429, message: 'x' })).toBe('rate-limited');
    expect(classifyTranslationFailure({ status: 408 })).toBe('transient');
    expect(classifyTranslationFailure({ status: 503 })).toBe('transient');
    expect(classifyTranslationFailure({ status: 400, message: 'connection reset' })).toBe('other');
  });

  it('classifies system error codes as transient, including on the cause', () => {
    const direct = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(classifyTranslationFailure(direct)).toBe('transient');

    const wrapped = new Error('request failed', { cause: { code: 'ETIMEDOUT' } });
    expect(classifyTranslationFailure(wrapped)).toBe('transient');
  });

  it('falls back to message keywords', () => {
    expect(classifyTranslationFailure(new Error('429 Too Many Requests'))).toBe('rate-limited');
    expect(classifyTranslationFailure(new Error('Rate limit reached'))).toBe('rate-limited');
    expect(classifyTranslationFailure(new Error('Request timed out'))).toBe('transient');
    expect(classifyTranslationFailure(new Error('fetch failed'))).toBe('transient');
    expect(classifyTranslationFailure(new Error('Connection error.'))).toBe('transient');
    expect(classifyTranslationFailure(new Error('invalid model'))).toBe('other');
    expect(classifyTranslationFailure('weird')).toBe('other');
  });
});

describe('toTranslationError', () => {
  it('returns TranslationError instances unchanged', () => {
    const err = new TransientTranslationError('reset');
    expect(toTranslationError(err, 'ctx')).toBe(err);
  });

  it('wraps other errors in the matching subclass with context and cause', () => {
    const cause = Object.assign(new Error('Too many requests'), { status: 429 });
    const wrapped = toTranslationError(cause, 'Chat completion failed');

    expect(wrapped).toBeInstanceOf(RateLimitedError);
    expect(wrapped.message).toBe('Chat completion failed: Too many requests');
    expect(wrapped.cause).toBe(cause);

    const other = toTranslationError(new Error('bad request'), 'ctx');
    expect(other.kind).toBe('other');
    expect(other).not.toBeInstanceOf(RateLimitedError);
  });
});
