/**
 * AI Bridge Contracts
 *
 * These interfaces define the contract boundary between callers and the
 * provider adapters. Nothing vendor-specific crosses this boundary.
 */

/**
 * Supported provider identifiers
 */
export const PROVIDER_NAMES = ['openai', 'google_gemini'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * ChatMessage
 *
 * A message carries either `content` (OpenAI style) or `parts`
 * (Gemini style). Each adapter normalises to its own vendor shape.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'model';
  content?: string;
  parts?: Array<{ text: string }>;
}

/**
 * ProviderOptions
 *
 * Recognised keys are typed; anything else is forwarded to the vendor verbatim.
 */
export interface ProviderOptions {
  model?: string;
  max_tokens?: number;
  temperature?: number;
  [key: string]: unknown;
}

/**
 * BridgeOptions
 * Facade options: provider options plus an optional per-call provider override
 */
export interface BridgeOptions extends ProviderOptions {
  provider?: string;
}

/**
 * TokenUsage
 * Canonical token accounting shape; a count is null when the vendor did not report it.
 */
export interface TokenUsage {
  promptTokens: number | null;
  completionTokens: number | null;
  totalTokens: number | null;
}

/**
 * FailureKind
 *
 * - configuration: unsupported provider or unusable credentials at resolution time
 * - invalid_argument: adapter constructed without a usable API key
 * - vendor: the vendor API returned a structured error
 * - malformed_response: payload is neither a success nor an error shape
 * - unhandled: any other exception during the call
 * - not_implemented: capability not offered by the adapter
 */
export type FailureKind =
  | 'configuration'
  | 'invalid_argument'
  | 'vendor'
  | 'malformed_response'
  | 'unhandled'
  | 'not_implemented';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
