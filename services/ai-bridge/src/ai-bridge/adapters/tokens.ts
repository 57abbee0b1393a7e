/**
 * Dependency Injection Tokens
 */

/**
 * AI_BRIDGE_CONFIG
 *
 * Injection token for the frozen AIBridgeConfig value.
 *
 * Usage:
 * @Inject(AI_BRIDGE_CONFIG) private readonly config: AIBridgeConfig
 */
export const AI_BRIDGE_CONFIG = 'AI_BRIDGE_CONFIG';

/**
 * ADAPTER_REGISTRY
 *
 * Injection token for the provider name -> adapter factory table.
 * Tests override it to hand out adapters backed by fake vendor clients.
 */
export const ADAPTER_REGISTRY = 'ADAPTER_REGISTRY';
