import { Logger } from '@nestjs/common';
import OpenAI, { APIError } from 'openai';
import { InvalidArgumentError } from '../../errors';
import { AIResponse } from '../ai-response';
import { ChatMessage, ProviderOptions } from '../types';
import {
  OPENAI_EMBEDDING_USAGE_KEYS,
  OPENAI_USAGE_KEYS,
  describeError,
  firstOf,
  isRecord,
  messageText,
  toTokenUsage,
  vendorErrorMessage,
} from './normalize';
import { ProviderAdapter } from './provider-adapter.interface';

export const OPENAI_DEFAULT_CHAT_MODEL = 'gpt-3.5-turbo';
export const OPENAI_DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const OPENAI_DEFAULT_MAX_TOKENS = 150;

/**
 * Model families served by the Chat Completions endpoint.
 * Everything else goes through the legacy Completions endpoint.
 */
const CHAT_MODEL_PREFIXES = ['gpt-4', 'gpt-5', 'gpt-3.5-turbo', 'o1', 'o3', 'o4', 'chatgpt-'];

/**
 * `gpt-3.5-turbo-instruct` shares the chat prefix but is completions-only
 */
const COMPLETION_MODEL_PREFIXES = ['gpt-3.5-turbo-instruct'];

/**
 * Reasoning-era models reject `max_tokens` and take `max_completion_tokens`
 */
const COMPLETION_TOKEN_LIMIT_PREFIXES = ['gpt-5', 'o1', 'o3', 'o4'];

export function isChatModel(model: string): boolean {
  if (COMPLETION_MODEL_PREFIXES.some((prefix) => model.startsWith(prefix))) {
    return false;
  }
  return CHAT_MODEL_PREFIXES.some((prefix) => model.startsWith(prefix));
}

export function usesCompletionTokenLimit(model: string): boolean {
  return COMPLETION_TOKEN_LIMIT_PREFIXES.some((prefix) => model.startsWith(prefix));
}

interface ChatTokenLimit {
  max_tokens?: number;
  max_completion_tokens?: number;
}

function chatTokenLimit(model: string, maxTokens: number | undefined): ChatTokenLimit {
  if (maxTokens === undefined) {
    return {};
  }
  return usesCompletionTokenLimit(model)
    ? { max_completion_tokens: maxTokens }
    : { max_tokens: maxTokens };
}

export interface OpenAIAdapterOptions {
  /**
   * Request timeout in milliseconds
   */
  timeout?: number;
  baseURL?: string;
  organization?: string;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  const content = messageText(message);
  switch (message.role) {
    case 'system':
      return { role: 'system', content };
    case 'assistant':
    case 'model':
      return { role: 'assistant', content };
    case 'user':
      return { role: 'user', content };
  }
}

/**
 * OpenAIAdapter
 *
 * Translates bridge calls into OpenAI Chat Completions, Completions and
 * Embeddings requests, and normalises the payloads into AIResponse.
 *
 * Payload parsing is three-way:
 * - recognised success shape → success response with re-keyed token usage
 * - `error` object in the body → `vendor` failure carrying its message
 * - anything else → `malformed_response` failure
 *
 * SDK APIError → `vendor` failure; any other exception → `unhandled` failure.
 */
export class OpenAIAdapter implements ProviderAdapter {
  private readonly logger = new Logger(OpenAIAdapter.name);
  private readonly client: OpenAI;

  readonly provider = 'openai';

  /**
   * @throws InvalidArgumentError if the API key is missing or blank (no client is created)
   */
  constructor(apiKey: string | undefined, options: OpenAIAdapterOptions = {}) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new InvalidArgumentError('OpenAI API key is required.', 'apiKey');
    }

    this.client = new OpenAI({
      apiKey,
      timeout: options.timeout,
      baseURL: options.baseURL,
      organization: options.organization,
    });

    this.logger.log('OpenAIAdapter initialized');
  }

  /**
   * Send a conversation to Chat Completions
   *
   * `max_tokens` is sent as `max_completion_tokens` for o-series and gpt-5
   * models. Streaming is not supported; a `stream` option is dropped.
   *
   * @param messages - Conversation; `parts` are flattened into `content`
   * @param options - Model, generation settings and vendor passthrough keys
   * @returns Success with the first choice's content, or a failure response
   */
  async chat(messages: ChatMessage[], options: ProviderOptions = {}): Promise<AIResponse> {
    const {
      model = OPENAI_DEFAULT_CHAT_MODEL,
      max_tokens,
      stream: _stream,
      ...passthrough
    } = options;

    return this.run('chat', model, async () => {
      const raw = await this.client.chat.completions.create({
        ...passthrough,
        ...chatTokenLimit(model, max_tokens),
        model,
        messages: messages.map(toOpenAIMessage),
      });

      const choice = firstOf(raw, 'choices');
      const content =
        isRecord(choice) && isRecord(choice.message) ? choice.message.content : undefined;

      if (typeof content === 'string') {
        return AIResponse.success({
          content,
          tokenUsage: toTokenUsage(isRecord(raw) ? raw.usage : undefined, OPENAI_USAGE_KEYS),
          rawResponse: raw,
          model,
          provider: this.provider,
        });
      }

      return this.failureFromPayload(raw, model, 'no content in chat response');
    });
  }

  /**
   * Chat-class models are sent through `chat()` as a single user message;
   * other models use the legacy Completions endpoint.
   * `max_tokens` defaults to 150 unless the caller set it.
   *
   * @param prompt - Text prompt
   * @param options - Model, generation settings and vendor passthrough keys
   * @returns Success with the generated text, or a failure response
   */
  async generateText(prompt: string, options: ProviderOptions = {}): Promise<AIResponse> {
    const {
      model = OPENAI_DEFAULT_CHAT_MODEL,
      max_tokens = OPENAI_DEFAULT_MAX_TOKENS,
      stream: _stream,
      ...passthrough
    } = options;

    if (isChatModel(model)) {
      return this.chat([{ role: 'user', content: prompt }], {
        ...passthrough,
        model,
        max_tokens,
      });
    }

    return this.run('generateText', model, async () => {
      const raw = await this.client.completions.create({
        ...passthrough,
        model,
        prompt,
        max_tokens,
      });

      const choice = firstOf(raw, 'choices');
      const text = isRecord(choice) ? choice.text : undefined;

      if (typeof text === 'string') {
        return AIResponse.success({
          content: text.trim(),
          tokenUsage: toTokenUsage(isRecord(raw) ? raw.usage : undefined, OPENAI_USAGE_KEYS),
          rawResponse: raw,
          model,
          provider: this.provider,
        });
      }

      return this.failureFromPayload(raw, model, 'no content in completions response');
    });
  }

  /**
   * Embed one text with the Embeddings endpoint
   *
   * @param text - Input text
   * @param options - Model and vendor passthrough keys such as `dimensions`
   * @returns Success with the first embedding vector, or a failure response
   */
  async embed(text: string, options: ProviderOptions = {}): Promise<AIResponse> {
    // temperature and max_tokens have no meaning for embeddings
    const {
      model = OPENAI_DEFAULT_EMBEDDING_MODEL,
      temperature: _temperature,
      max_tokens: _maxTokens,
      ...passthrough
    } = options;

    return this.run('embed', model, async () => {
      const raw = await this.client.embeddings.create({
        ...passthrough,
        model,
        input: text,
      });

      const first = firstOf(raw, 'data');
      const embedding = isRecord(first) ? first.embedding : undefined;

      if (Array.isArray(embedding) && embedding.every((value) => typeof value === 'number')) {
        return AIResponse.success({
          content: embedding,
          tokenUsage: toTokenUsage(
            isRecord(raw) ? raw.usage : undefined,
            OPENAI_EMBEDDING_USAGE_KEYS,
          ),
          rawResponse: raw,
          model,
          provider: this.provider,
        });
      }

      return this.failureFromPayload(raw, model, 'no embedding in response');
    });
  }

  async generateImage(_prompt: string, options: ProviderOptions = {}): Promise<AIResponse> {
    return AIResponse.failure({
      errorMessage: 'OpenAIAdapter does not implement generateImage',
      errorKind: 'not_implemented',
      model: options.model ?? null,
      provider: this.provider,
    });
  }

  /**
   * A payload without a success shape is either a vendor error body or malformed
   */
  private failureFromPayload(raw: unknown, model: string, missing: string): AIResponse {
    const vendorMessage = vendorErrorMessage(raw);

    if (vendorMessage !== undefined) {
      this.logger.warn(`OpenAI returned an error body: ${vendorMessage}`);
      return AIResponse.failure({
        errorMessage: `OpenAI API Error: ${vendorMessage}`,
        errorKind: 'vendor',
        rawResponse: raw,
        model,
        provider: this.provider,
      });
    }

    this.logger.error(`Malformed OpenAI response: ${missing}`);
    return AIResponse.failure({
      errorMessage: `Malformed OpenAI response: ${missing}`,
      errorKind: 'malformed_response',
      rawResponse: raw,
      model,
      provider: this.provider,
    });
  }

  /**
   * Run one vendor call; every exception becomes a failure response
   */
  private async run(
    operation: string,
    model: string,
    call: () => Promise<AIResponse>,
  ): Promise<AIResponse> {
    this.logger.debug(`Executing OpenAI ${operation} request (model=${model})`);

    try {
      return await call();
    } catch (error) {
      if (error instanceof APIError) {
        this.logger.error(`OpenAI API error during ${operation}: ${error.message}`);
        return AIResponse.failure({
          errorMessage: `OpenAI API Error: ${error.message}`,
          errorKind: 'vendor',
          rawResponse: error.error ?? null,
          model,
          provider: this.provider,
        });
      }

      const message = describeError(error);
      this.logger.error(`Client error during OpenAI ${operation}: ${message}`);
      return AIResponse.failure({
        errorMessage: `Client error during OpenAI ${operation}: ${message}`,
        errorKind: 'unhandled',
        rawResponse: error,
        model,
        provider: this.provider,
      });
    }
  }
}
