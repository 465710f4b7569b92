/**
 * @fileoverview Where the extractor gets its LLM API key.
 *
 * The source is chosen once, when the extractor is built: either the
 * process environment, or the global_configuration table shared with the
 * admin UI (decrypting the value when it is stored encrypted).
 */

import type { ApiKeySource } from '../../config.js';
import type { Decryptor } from '../encryption/index.js';
import type { GlobalConfigStore } from '../global-config/types.js';
import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'api-key' });

export interface ApiKeyProvider {
  /** Null when no usable key is available. */
  getApiKey(): Promise<string | null>;
}

export class EnvApiKeyProvider implements ApiKeyProvider {
  constructor(private readonly apiKey: string | undefined) {}

  async getApiKey(): Promise<string | null> {
    return this.apiKey || null;
  }
}

export class StoreApiKeyProvider implements ApiKeyProvider {
  constructor(
    private readonly store: GlobalConfigStore,
    private readonly settingKey: string,
    private readonly decrypt: Decryptor
  ) {}

  async getApiKey(): Promise<string | null> {
    const setting = await this.store.get(this.settingKey);
    if (!setting || !setting.value) {
      logger.warn('api_key_setting_missing', { setting: this.settingKey });
      return null;
    }
    if (!setting.isEncrypted) {
      return setting.value;
    }
    const decrypted = this.decrypt(setting.value);
    if (!decrypted) {
      logger.error('api_key_decrypt_failed', { setting: this.settingKey });
      return null;
    }
    return decrypted;
  }
}

export interface ApiKeyProviderDeps {
  envApiKey: string | undefined;
  store: GlobalConfigStore;
  settingKey: string;
  decrypt: Decryptor;
}

export function createApiKeyProvider(source: ApiKeySource, deps: ApiKeyProviderDeps): ApiKeyProvider {
  switch (source) {
    case 'env':
      return new EnvApiKeyProvider(deps.envApiKey);
    case 'database':
      return new StoreApiKeyProvider(deps.store, deps.settingKey, deps.decrypt);
  }
}
