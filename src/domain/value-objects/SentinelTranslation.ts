/**
 * 退化內容的哨兵翻譯
 *
 * 空白、純數字／標點、過短的內容不送往翻譯服務，
 * 直接寫入固定標記。標記寫入後即為終態，之後的執行不會再處理。
 */

export type SentinelKind = 'empty' | 'numeric' | 'too-short';

export interface SentinelResult {
  kind: SentinelKind;
  /** 要寫入 translation 欄位的標記值 */
  marker: string;
}

/** 至少一個數字，其餘僅允許數字、標點與空白 */
const NUMERIC_RE = /^[\p{Nd}\p{P}\s]+$/u;
const HAS_DIGIT_RE = /\p{Nd}/u;

export class SentinelTranslation {
  static readonly EMPTY = '[empty]';
  static readonly TOO_SHORT = '[too short]';

  /**
   * 判斷內容是否為退化內容
   *
   * 檢查順序：空白 → 數字 → 過短。數字優先於長度，
   * 因此 "42" 會標記為 `[numeric: 42]` 而非 `[too short]`。
   *
   * @returns 需要翻譯時回傳 null
   */
  static classify(content: string | null, minContentLength: number): SentinelResult | null {
    const trimmed = (content ?? '').trim();

    if (!trimmed) {
      return { kind: 'empty', marker: SentinelTranslation.EMPTY };
    }
    if (NUMERIC_RE.test(trimmed) && HAS_DIGIT_RE.test(trimmed)) {
      return { kind: 'numeric', marker: `[numeric: ${trimmed}]` };
    }
    if (trimmed.length < minContentLength) {
      return { kind: 'too-short', marker: SentinelTranslation.TOO_SHORT };
    }
    return null;
  }
}
