/**
 * 翻譯服務抽象介面
 *
 * 單次盡力呼叫，不含任何重試邏輯；重試與退避由 RetryingTranslator 負責。
 * 失敗時拋出 TranslationError（kind: rate-limited | transient | other）。
 * 語言代碼在建構時固定。
 */
export interface TranslationPort {
  readonly providerId: string;
  readonly sourceLang: string;
  readonly targetLang: string;

  /**
   * @param text - 非空的原文
   * @returns 譯文（可能為空字串或與原文相同，由呼叫端判斷品質）
   */
  translate(text: string): Promise<string>;

  isAvailable(): Promise<boolean>;
}
