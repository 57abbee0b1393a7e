import { AIResponse } from '../ai-response';
import { ChatMessage, ProviderName, ProviderOptions } from '../types';

/**
 * ProviderAdapter
 *
 * Capability contract every vendor adapter implements.
 *
 * Contract:
 * - Every method resolves to an AIResponse, success or failure
 * - No exception raised by the vendor call escapes an adapter
 * - No conversation state is held between calls
 */
export interface ProviderAdapter {
  readonly provider: ProviderName;

  chat(messages: ChatMessage[], options?: ProviderOptions): Promise<AIResponse>;

  generateText(prompt: string, options?: ProviderOptions): Promise<AIResponse>;

  embed(text: string, options?: ProviderOptions): Promise<AIResponse>;

  /**
   * Not offered by any adapter yet; resolves to a `not_implemented` failure.
   */
  generateImage(prompt: string, options?: ProviderOptions): Promise<AIResponse>;
}

export const ADAPTER_CAPABILITIES = ['chat', 'generateText', 'embed', 'generateImage'] as const;
