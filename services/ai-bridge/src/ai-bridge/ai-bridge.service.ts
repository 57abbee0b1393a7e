import { Inject, Injectable, Logger } from '@nestjs/common';
import { AIBridgeConfig } from '../config/ai-bridge.config';
import { ConfigurationError, InvalidArgumentError } from '../errors';
import { AdapterRegistry } from './adapters/adapter-registry';
import { describeError } from './adapters/normalize';
import { ProviderAdapter } from './adapters/provider-adapter.interface';
import { ADAPTER_REGISTRY, AI_BRIDGE_CONFIG } from './adapters/tokens';
import { AIResponse } from './ai-response';
import {
  BridgeOptions,
  ChatMessage,
  ProviderOptions,
  Result,
  err,
  isProviderName,
  ok,
} from './types';

type Operation = 'chat' | 'generateText' | 'embed' | 'generateImage';

/**
 * AIBridgeService
 *
 * Facade over the provider adapters. Each call:
 * 1. takes the optional `provider` override out of its options
 * 2. resolves an adapter (override, else configured default)
 * 3. forwards the remaining options to the adapter
 *
 * Resolution problems come back as `configuration` failures. Anything thrown
 * while resolving or delegating is converted into an `unhandled` failure, so
 * these operations never reject for ordinary failure modes.
 */
@Injectable()
export class AIBridgeService {
  private readonly logger = new Logger(AIBridgeService.name);

  constructor(
    @Inject(AI_BRIDGE_CONFIG) private readonly config: AIBridgeConfig,
    @Inject(ADAPTER_REGISTRY) private readonly registry: AdapterRegistry,
  ) {}

  /**
   * Resolve the adapter for `requested`, or for the configured default provider.
   *
   * Construction-time argument errors (missing credentials) are translated
   * into ConfigurationError; other exceptions propagate.
   */
  resolveProvider(requested?: string): Result<ProviderAdapter, ConfigurationError> {
    const name = requested ?? this.config.provider;

    if (!isProviderName(name)) {
      return err(
        new ConfigurationError(`Unsupported AI provider: ${name}`, { provider: name }),
      );
    }

    try {
      return ok(this.registry[name](this.config));
    } catch (error) {
      if (error instanceof InvalidArgumentError || error instanceof ConfigurationError) {
        return err(
          new ConfigurationError(error.message, { provider: name, cause: error.name }),
        );
      }
      throw error;
    }
  }

  async chat(messages: ChatMessage[], options: BridgeOptions = {}): Promise<AIResponse> {
    return this.dispatch('chat', options, (adapter, rest) => adapter.chat(messages, rest));
  }

  async generateText(prompt: string, options: BridgeOptions = {}): Promise<AIResponse> {
    return this.dispatch('generateText', options, (adapter, rest) =>
      adapter.generateText(prompt, rest),
    );
  }

  async embed(text: string, options: BridgeOptions = {}): Promise<AIResponse> {
    return this.dispatch('embed', options, (adapter, rest) => adapter.embed(text, rest));
  }

  async generateImage(prompt: string, options: BridgeOptions = {}): Promise<AIResponse> {
    return this.dispatch('generateImage', options, (adapter, rest) =>
      adapter.generateImage(prompt, rest),
    );
  }

  private async dispatch(
    operation: Operation,
    options: BridgeOptions,
    call: (adapter: ProviderAdapter, options: ProviderOptions) => Promise<AIResponse>,
  ): Promise<AIResponse> {
    const { provider, ...rest } = options;

    try {
      const resolved = this.resolveProvider(provider);

      if (!resolved.ok) {
        this.logger.warn(`AIBridge.${operation} could not resolve provider: ${resolved.error.message}`);
        return AIResponse.failure({
          errorMessage: resolved.error.message,
          errorKind: 'configuration',
          model: rest.model ?? null,
        });
      }

      this.logger.debug(`AIBridge.${operation} via ${resolved.value.provider}`);
      return await call(resolved.value, rest);
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`AIBridge.${operation} failed: ${message}`);
      return AIResponse.failure({
        errorMessage: `AIBridge.${operation} failed: ${message}`,
        errorKind: 'unhandled',
        rawResponse: error,
        model: rest.model ?? null,
      });
    }
  }
}
