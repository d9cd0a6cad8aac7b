import type { TranslationConfig } from '../../config/types.js';
import type { TranslationPort } from '../../domain/ports/TranslationPort.js';
import { HttpTranslationAdapter } from './HttpTranslationAdapter.js';
import { OpenAITranslationAdapter } from './OpenAITranslationAdapter.js';

/** 依 translation.provider 建立翻譯 client；程序生命週期內只建立一次 */
export function createTranslationClient(config: TranslationConfig): TranslationPort {
  switch (config.provider) {
    case 'openai':
      return new OpenAITranslationAdapter({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        model: config.model,
        sourceLang: config.sourceLang,
        targetLang: config.targetLang,
        timeoutMs: config.timeoutMs,
      });
    case 'http':
      return new HttpTranslationAdapter({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        sourceLang: config.sourceLang,
        targetLang: config.targetLang,
        timeoutMs: config.timeoutMs,
      });
  }
}
