/**
 * Provider registry — factory that creates the correct provider from config.
 *
 * New providers are added by:
 * 1. Create the adapter file in src/providers/
 * 2. Register it in the PROVIDER_FACTORIES map below
 * 3. Add the name to LLMProviderName type in types.ts
 *
 * Dependency direction: registry.ts → types.ts, gemini.ts, ollama.ts, errors.ts
 * Used by: CLI run and doctor commands
 */

import type { LLMProvider, LLMProviderName } from './types.js';
import { GeminiProvider } from './gemini.js';
import { OllamaProvider } from './ollama.js';
import type { ProviderConfig } from '../core/config/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Factory functions for each provider.
 * Add new providers here — this is the ONLY place that needs to change.
 */
const PROVIDER_FACTORIES: Record<LLMProviderName, (config: ProviderConfig) => LLMProvider> = {
  gemini: (config: ProviderConfig) => {
    const apiKey = config.gemini?.apiKey;
    if (!apiKey) {
      throw new ProviderError(
        'Gemini provider is not configured. Set GOOGLE_API_KEY or run "docflow init".',
        { provider: 'gemini' },
      );
    }
    return new GeminiProvider({ apiKey, baseUrl: config.gemini?.baseUrl });
  },

  ollama: (config: ProviderConfig) => new OllamaProvider(config.ollama),
};

/** Cache of created provider instances (one per provider name). */
const providerCache = new Map<LLMProviderName, LLMProvider>();

function isProviderName(name: string): name is LLMProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDER_FACTORIES, name);
}

/**
 * Create (or return cached) a provider instance by name.
 *
 * @throws {ProviderError} if the provider name is unknown or config is missing
 */
export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  if (!isProviderName(name)) {
    throw new ProviderError(
      `Unknown provider: "${name}". Available: ${getSupportedProviders().join(', ')}`,
      { provider: name, available: getSupportedProviders() },
    );
  }

  const cached = providerCache.get(name);
  if (cached) return cached;

  logger.debug(`Creating provider: ${name}`);
  const provider = PROVIDER_FACTORIES[name](config);
  providerCache.set(name, provider);
  return provider;
}

/**
 * Clear the provider cache (useful for testing or config changes).
 */
export function clearProviderCache(): void {
  providerCache.clear();
}

/**
 * Get all supported provider names.
 */
export function getSupportedProviders(): LLMProviderName[] {
  return Object.keys(PROVIDER_FACTORIES).filter(isProviderName);
}
