export * from './types.js';
export {
  type ApiKeyProvider,
  EnvApiKeyProvider,
  StoreApiKeyProvider,
  createApiKeyProvider,
} from './api-key.js';
export { ExchangeRateCache, ExchangeRateService } from './exchange-rates.js';
export { standardizeDate } from './dates.js';
export { buildExtractionPrompt, MAX_USER_SAMPLES } from './prompt.js';
export {
  LlmTransactionExtractor,
  cleanEmailBody,
  detectCurrency,
  parseModelFields,
  unknownTransaction,
} from './extractor.js';
