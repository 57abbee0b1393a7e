import { registerAs } from '@nestjs/config';
import { BridgeLogLevel, isBridgeLogLevel } from './log-level';

/**
 * AI Bridge Configuration
 *
 * Built once from the environment, then overridden programmatically through
 * `AIBridgeModule.forRoot()`. The resulting value is frozen and injected under
 * the AI_BRIDGE_CONFIG token; nothing mutates it afterwards.
 */

export const AI_BRIDGE_CONFIG_NAMESPACE = 'aiBridge';

export const DEFAULT_PROVIDER = 'openai';

/**
 * Vendor call timeout in seconds
 */
export const DEFAULT_TIMEOUT_SECONDS = 60;

export const DEFAULT_LOG_LEVEL: BridgeLogLevel = 'info';

export interface AIBridgeConfig {
  /**
   * Default provider, used when a call carries no `provider` override.
   * Kept as a string: an unknown name is reported per call, not at boot.
   */
  provider: string;
  openaiApiKey?: string;
  googleGeminiApiKey?: string;
  logLevel: BridgeLogLevel;
  /**
   * Seconds
   */
  defaultTimeout: number;
}

export type AIBridgeConfigOverrides = Partial<AIBridgeConfig>;

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

function parseTimeout(value: string | undefined): number {
  if (value === undefined || value.trim().length === 0) {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  const seconds = Number(value);
  return Number.isInteger(seconds) && seconds > 0 ? seconds : DEFAULT_TIMEOUT_SECONDS;
}

/**
 * Build the configuration from an environment map, then apply overrides.
 *
 * Environment:
 * - AI_BRIDGE_PROVIDER (default "openai")
 * - OPENAI_API_KEY
 * - GOOGLE_GEMINI_API_KEY
 * - AI_BRIDGE_LOG_LEVEL (debug | info | warn | error, default "info")
 * - AI_BRIDGE_TIMEOUT (seconds, default 60)
 */
export function loadAIBridgeConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: AIBridgeConfigOverrides = {},
): AIBridgeConfig {
  const logLevel = env.AI_BRIDGE_LOG_LEVEL;

  return Object.freeze({
    provider: overrides.provider ?? nonBlank(env.AI_BRIDGE_PROVIDER) ?? DEFAULT_PROVIDER,
    openaiApiKey: overrides.openaiApiKey ?? nonBlank(env.OPENAI_API_KEY),
    googleGeminiApiKey: overrides.googleGeminiApiKey ?? nonBlank(env.GOOGLE_GEMINI_API_KEY),
    logLevel:
      overrides.logLevel ??
      (logLevel !== undefined && isBridgeLogLevel(logLevel) ? logLevel : DEFAULT_LOG_LEVEL),
    defaultTimeout: overrides.defaultTimeout ?? parseTimeout(env.AI_BRIDGE_TIMEOUT),
  });
}

/**
 * Boot-time warning for a default provider that cannot serve calls, if any
 */
export function describeMissingCredential(config: AIBridgeConfig): string | undefined {
  switch (config.provider) {
    case 'openai':
      return config.openaiApiKey === undefined
        ? 'OpenAI provider is selected, but OPENAI_API_KEY is not configured. Calls to it will fail.'
        : undefined;
    case 'google_gemini':
      return config.googleGeminiApiKey === undefined
        ? 'Google Gemini provider is selected, but GOOGLE_GEMINI_API_KEY is not configured. Calls to it will fail.'
        : undefined;
    default:
      return `AI provider "${config.provider}" is not supported. Calls without a provider override will fail.`;
  }
}

/**
 * Config namespace registered with ConfigModule (`configService.get('aiBridge')`)
 */
export const aiBridgeConfig = registerAs(AI_BRIDGE_CONFIG_NAMESPACE, () => loadAIBridgeConfig());
