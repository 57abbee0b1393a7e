import { FailureKind, ProviderName, TokenUsage } from './types';

interface SuccessInit {
  content: string | readonly number[];
  tokenUsage?: TokenUsage | null;
  rawResponse?: unknown;
  model?: string | null;
  provider?: ProviderName | null;
}

interface FailureInit {
  errorMessage: string;
  errorKind: FailureKind;
  rawResponse?: unknown;
  model?: string | null;
  provider?: ProviderName | null;
}

/**
 * AIResponse
 *
 * Standardized result of every bridge operation, success or failure.
 * Instances, their token usage and any embedding vector are frozen at
 * construction. Only built via `success()` / `failure()`.
 */
export class AIResponse {
  readonly success: boolean;
  readonly content: string | readonly number[] | null;
  readonly errorMessage: string | null;
  readonly errorKind: FailureKind | null;
  readonly tokenUsage: TokenUsage | null;
  readonly rawResponse: unknown;
  readonly model: string | null;
  readonly provider: ProviderName | null;

  private constructor(fields: {
    success: boolean;
    content: string | readonly number[] | null;
    errorMessage: string | null;
    errorKind: FailureKind | null;
    tokenUsage: TokenUsage | null;
    rawResponse: unknown;
    model: string | null;
    provider: ProviderName | null;
  }) {
    this.success = fields.success;
    // own frozen copy; never shares the caller's array or the raw payload
    this.content =
      typeof fields.content === 'string' || fields.content === null
        ? fields.content
        : Object.freeze([...fields.content]);
    this.errorMessage = fields.errorMessage;
    this.errorKind = fields.errorKind;
    this.tokenUsage = fields.tokenUsage ? Object.freeze({ ...fields.tokenUsage }) : null;
    this.rawResponse = fields.rawResponse;
    this.model = fields.model;
    this.provider = fields.provider;
    Object.freeze(this);
  }

  static success(init: SuccessInit): AIResponse {
    return new AIResponse({
      success: true,
      content: init.content,
      errorMessage: null,
      errorKind: null,
      tokenUsage: init.tokenUsage ?? null,
      rawResponse: init.rawResponse ?? null,
      model: init.model ?? null,
      provider: init.provider ?? null,
    });
  }

  static failure(init: FailureInit): AIResponse {
    const errorMessage =
      init.errorMessage.trim().length > 0 ? init.errorMessage : 'Unknown error';

    return new AIResponse({
      success: false,
      content: null,
      errorMessage,
      errorKind: init.errorKind,
      tokenUsage: null,
      rawResponse: init.rawResponse ?? null,
      model: init.model ?? null,
      provider: init.provider ?? null,
    });
  }

  isSuccess(): boolean {
    return this.success;
  }

  isFailure(): boolean {
    return !this.success;
  }

  /**
   * Plain representation for logging and serialization.
   * The raw vendor payload is left out.
   */
  toJSON(): Record<string, unknown> {
    return {
      success: this.success,
      content: this.content,
      errorMessage: this.errorMessage,
      errorKind: this.errorKind,
      tokenUsage: this.tokenUsage,
      model: this.model,
      provider: this.provider,
    };
  }
}
