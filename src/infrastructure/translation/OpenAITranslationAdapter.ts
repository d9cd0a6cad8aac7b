import OpenAI from 'openai';
import type { TranslationPort } from '../../domain/ports/TranslationPort.js';
import { errorMessage, toTranslationError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { languageName } from './languageName.js';

/**
 * OpenAI-compatible 翻譯 Adapter
 *
 * 透過 chat completions 請模型只回傳譯文。支援任何 OpenAI-compatible endpoint
 * （OpenAI、Ollama、vLLM、LiteLLM 等）。SDK 內建重試關閉，退避完全由
 * RetryingTranslator 控制。
 */

export interface OpenAITranslationConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  sourceLang: string;
  targetLang: string;
  /** 單次請求逾時（毫秒），預設 60 秒 */
  timeoutMs?: number;
}

export class OpenAITranslationAdapter implements TranslationPort {
  readonly providerId = 'openai-compatible';
  readonly sourceLang: string;
  readonly targetLang: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly logger = new Logger('OpenAITranslationAdapter');

  constructor(config: OpenAITranslationConfig) {
    this.model = config.model;
    this.sourceLang = config.sourceLang;
    this.targetLang = config.targetLang;
    this.systemPrompt =
      `You are a translator of religious and classical texts. Translate the user's text from ` +
      `${languageName(config.sourceLang)} to ${languageName(config.targetLang)}. ` +
      `Preserve verse numbering and proper names. Return ONLY the translation, no commentary.`;

    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 60000,
    });
  }

  async translate(text: string): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: text },
        ],
        temperature: 0,
      });
      return response.choices[0]?.message?.content?.trim() ?? '';
    } catch (err) {
      throw toTranslationError(err, 'OpenAI translation failed');
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: 'ping' }],
        max_tokens: 1,
      });
      return true;
    } catch (err) {
      this.logger.debug('Availability probe failed', { error: errorMessage(err) });
      return false;
    }
  }
}
