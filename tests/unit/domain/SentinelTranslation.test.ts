import { describe, it, expect } from 'vitest';
import { SentinelTranslation } from '../../../src/domain/value-objects/SentinelTranslation.js';

/**
 * Feature: 退化內容的哨兵翻譯
 *
 * 空白、純數字與過短的內容不應送往翻譯服務，
 * 而是直接寫入固定標記，讓之後的執行不再處理。
 */
describe('SentinelTranslation', () => {
  it('marks blank or missing content as [empty]', () => {
    expect(SentinelTranslation.classify('', 3)).toEqual({ kind: 'empty', marker: '[empty]' });
    expect(SentinelTranslation.classify('  \n\t ', 3)).toEqual({ kind: 'empty', marker: '[empty]' });
    expect(SentinelTranslation.classify(null, 3)).toEqual({ kind: 'empty', marker: '[empty]' });
  });

  /**
   * Scenario: 純數字內容
   * Given 內容 "42"（短於 minContentLength 也一樣）
   * When 分類
   * Then 標記為 [numeric: 42]，數字檢查優先於長度檢查
   */
  it('marks digit-only content as numeric before checking length', () => {
    expect(SentinelTranslation.classify('42', 3)).toEqual({ kind: 'numeric', marker: '[numeric: 42]' });
    expect(SentinelTranslation.classify(' 1.2.3 ', 3)).toEqual({ kind: 'numeric', marker: '[numeric: 1.2.3]' });
  });

  it('recognises non-Latin decimal digits', () => {
    expect(SentinelTranslation.classify('१२३ ।', 3)).toEqual({ kind: 'numeric', marker: '[numeric: १२३ ।]' });
  });

  it('does not treat punctuation without digits as numeric', () => {
    expect(SentinelTranslation.classify('...', 5)).toEqual({ kind: 'too-short', marker: '[too short]' });
  });

  it('marks content shorter than the minimum as [too short]', () => {
    expect(SentinelTranslation.classify('ab', 3)).toEqual({ kind: 'too-short', marker: '[too short]' });
  });

  it('returns null for content that needs translation', () => {
    expect(SentinelTranslation.classify('abc', 3)).toBeNull();
    expect(SentinelTranslation.classify('Chapter 12', 3)).toBeNull();
  });
});
