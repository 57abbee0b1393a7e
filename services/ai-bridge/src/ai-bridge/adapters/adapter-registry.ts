import { AIBridgeConfig } from '../../config/ai-bridge.config';
import { ProviderName } from '../types';
import { GoogleGeminiAdapter } from './google-gemini.adapter';
import { OpenAIAdapter } from './openai.adapter';
import { ProviderAdapter } from './provider-adapter.interface';

/**
 * Builds an adapter from the bridge configuration.
 * May throw InvalidArgumentError / ConfigurationError for unusable credentials.
 */
export type AdapterFactory = (config: AIBridgeConfig) => ProviderAdapter;

export type AdapterRegistry = Readonly<Record<ProviderName, AdapterFactory>>;

const SECONDS = 1000;

/**
 * Default provider table: one factory per supported vendor
 */
export const DEFAULT_ADAPTER_REGISTRY: AdapterRegistry = Object.freeze({
  openai: (config: AIBridgeConfig) =>
    new OpenAIAdapter(config.openaiApiKey, {
      timeout: config.defaultTimeout * SECONDS,
    }),
  google_gemini: (config: AIBridgeConfig) =>
    new GoogleGeminiAdapter(config.googleGeminiApiKey, {
      timeout: config.defaultTimeout * SECONDS,
    }),
});
