import type { AppConfig } from './types.js';

export const DEFAULT_CONFIG: AppConfig = {
  version: 1,
  source: {
    path: 'data/source.xml',
    format: 'daisy-xml',
    headingLevels: [1, 2, 3],
  },
  store: {
    dbPath: 'data/chunks.db',
    batchSize: 100,
  },
  chunking: {
    maxChars: 1000,
    defaultSection: 'Introduction',
  },
  translation: {
    provider: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    sourceLang: 'sa',
    targetLang: 'en',
    splitThreshold: 800,
    minContentLength: 3,
    minResultChars: 3,
    timeoutMs: 60000,
  },
  splitter: {
    markers: ['।', '॥', '\n'],
    minFragmentChars: 100,
    minKeepChars: 3,
  },
  retry: {
    maxAttempts: 5,
    baseDelayMs: 3000,
    delayStepMs: 2000,
    jitterMs: 2000,
    rateLimitBaseMs: 20000,
    rateLimitStepMs: 10000,
    transientBaseMs: 10000,
    transientStepMs: 5000,
    otherCooldownMs: 5000,
    failureCooldownMs: 10000,
  },
  progress: {
    reportEvery: 20,
    estimateSecondsPerChunk: 5,
  },
  autoConfirm: false,
};
