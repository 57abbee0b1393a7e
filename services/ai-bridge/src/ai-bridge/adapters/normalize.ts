import { ChatMessage, TokenUsage } from '../types';

/**
 * Shape helpers shared by the vendor adapters.
 * Vendor payloads are treated as untrusted JSON: nothing here throws.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(source: Record<string, unknown>, key: string): number | null {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export interface UsageKeys {
  prompt: string | null;
  completion: string | null;
  total: string | null;
}

/**
 * Re-key a vendor usage block into the canonical TokenUsage shape.
 * A key of null marks a dimension the vendor does not have for this call.
 */
export function toTokenUsage(usage: unknown, keys: UsageKeys): TokenUsage {
  const source = isRecord(usage) ? usage : {};
  return {
    promptTokens: keys.prompt ? count(source, keys.prompt) : null,
    completionTokens: keys.completion ? count(source, keys.completion) : null,
    totalTokens: keys.total ? count(source, keys.total) : null,
  };
}

export const OPENAI_USAGE_KEYS: UsageKeys = {
  prompt: 'prompt_tokens',
  completion: 'completion_tokens',
  total: 'total_tokens',
};

export const OPENAI_EMBEDDING_USAGE_KEYS: UsageKeys = {
  prompt: 'prompt_tokens',
  completion: null,
  total: 'total_tokens',
};

export const GEMINI_USAGE_KEYS: UsageKeys = {
  prompt: 'promptTokenCount',
  completion: 'candidatesTokenCount',
  total: 'totalTokenCount',
};

/**
 * First element of `payload[key]` when it is a non-empty array
 */
export function firstOf(payload: unknown, key: string): unknown {
  if (!isRecord(payload)) {
    return undefined;
  }
  const list = payload[key];
  return Array.isArray(list) && list.length > 0 ? list[0] : undefined;
}

/**
 * `payload.error.message` when the vendor returned a structured error body
 */
export function vendorErrorMessage(payload: unknown): string | undefined {
  if (!isRecord(payload) || !isRecord(payload.error)) {
    return undefined;
  }
  const message = payload.error.message;
  return typeof message === 'string' ? message : undefined;
}

/**
 * Text of a message, whichever of `content` / `parts` it carries
 */
export function messageText(message: ChatMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return (message.parts ?? []).map((part) => part.text).join('');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
