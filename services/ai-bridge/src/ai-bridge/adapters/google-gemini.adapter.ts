import { Logger } from '@nestjs/common';
import { ApiError, Content, GenerateContentConfig, GoogleGenAI } from '@google/genai';
import { ConfigurationError, InvalidArgumentError } from '../../errors';
import { AIResponse } from '../ai-response';
import { ChatMessage, ProviderOptions } from '../types';
import {
  GEMINI_USAGE_KEYS,
  describeError,
  firstOf,
  isRecord,
  messageText,
  toTokenUsage,
} from './normalize';
import { ProviderAdapter } from './provider-adapter.interface';

export const GEMINI_DEFAULT_CHAT_MODEL = 'gemini-2.0-flash';
export const GEMINI_DEFAULT_EMBEDDING_MODEL = 'text-embedding-004';
export const GEMINI_DEFAULT_TEMPERATURE = 0.7;

export interface GoogleGeminiAdapterOptions {
  /**
   * Request timeout in milliseconds
   */
  timeout?: number;
  chatModel?: string;
  embeddingModel?: string;
}

function toGeminiContent(message: ChatMessage): Content {
  const parts = message.parts
    ? message.parts.map((part) => ({ text: part.text }))
    : [{ text: message.content ?? '' }];

  return {
    role: message.role === 'assistant' ? 'model' : message.role,
    parts,
  };
}

/**
 * GoogleGeminiAdapter
 *
 * Translates bridge calls into Gemini `generateContent` / `embedContent`
 * requests. The model is a per-call parameter of a single SDK client, so
 * embeddings need no second client.
 *
 * System messages are lifted into `systemInstruction`; assistant turns are
 * sent with the Gemini role `model`.
 */
export class GoogleGeminiAdapter implements ProviderAdapter {
  private readonly logger = new Logger(GoogleGeminiAdapter.name);
  private readonly client: GoogleGenAI;
  private readonly chatModel: string;
  private readonly embeddingModel: string;

  readonly provider = 'google_gemini';

  /**
   * @throws InvalidArgumentError if the API key is missing or blank
   * @throws ConfigurationError if the SDK client cannot be initialised
   */
  constructor(apiKey: string | undefined, options: GoogleGeminiAdapterOptions = {}) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new InvalidArgumentError('Google Gemini API key is required.', 'apiKey');
    }

    this.chatModel = options.chatModel ?? GEMINI_DEFAULT_CHAT_MODEL;
    this.embeddingModel = options.embeddingModel ?? GEMINI_DEFAULT_EMBEDDING_MODEL;

    try {
      this.client = new GoogleGenAI({
        apiKey,
        httpOptions: options.timeout !== undefined ? { timeout: options.timeout } : undefined,
      });
    } catch (error) {
      throw new ConfigurationError(
        `Failed to initialize Google Gemini client: ${describeError(error)}`,
        { provider: this.provider, cause: describeError(error) },
      );
    }

    this.logger.log(`GoogleGeminiAdapter initialized with chat model: ${this.chatModel}`);
  }

  /**
   * Send a conversation to `generateContent`
   *
   * System messages become `config.systemInstruction`; `assistant` turns are
   * sent with the `model` role. `max_tokens` maps to `maxOutputTokens`.
   *
   * @param messages - Conversation in either `content` or `parts` form
   * @param options - Model, generation settings and GenerateContentConfig passthrough keys
   * @returns Success with the first candidate's text, or a failure response
   */
  async chat(messages: ChatMessage[], options: ProviderOptions = {}): Promise<AIResponse> {
    const {
      model = this.chatModel,
      temperature = GEMINI_DEFAULT_TEMPERATURE,
      max_tokens,
      ...passthrough
    } = options;

    const systemInstruction = messages
      .filter((message) => message.role === 'system')
      .map(messageText)
      .join('\n');

    const contents = messages
      .filter((message) => message.role !== 'system')
      .map(toGeminiContent);

    const config: GenerateContentConfig = {
      ...passthrough,
      temperature,
      ...(max_tokens !== undefined ? { maxOutputTokens: max_tokens } : {}),
      ...(systemInstruction.length > 0 ? { systemInstruction } : {}),
    };

    return this.run('chat', model, async () => {
      const raw = await this.client.models.generateContent({ model, contents, config });

      const candidate = firstOf(raw, 'candidates');
      if (candidate === undefined) {
        const blockReason =
          isRecord(raw) && isRecord(raw.promptFeedback) ? raw.promptFeedback.blockReason : undefined;
        return this.malformed(
          raw,
          model,
          typeof blockReason === 'string'
            ? `Gemini blocked the prompt: ${blockReason}`
            : 'Malformed Gemini response: no candidates',
        );
      }

      const parts =
        isRecord(candidate) && isRecord(candidate.content) && Array.isArray(candidate.content.parts)
          ? candidate.content.parts
          : [];
      const texts = parts
        .map((part) => (isRecord(part) && typeof part.text === 'string' ? part.text : undefined))
        .filter((text): text is string => text !== undefined);

      if (texts.length === 0) {
        const finishReason = isRecord(candidate) ? candidate.finishReason : undefined;
        return this.malformed(
          raw,
          model,
          `Malformed Gemini response: candidate has no text parts (finishReason=${String(finishReason)})`,
        );
      }

      return AIResponse.success({
        content: texts.join(''),
        tokenUsage: toTokenUsage(isRecord(raw) ? raw.usageMetadata : undefined, GEMINI_USAGE_KEYS),
        rawResponse: raw,
        model,
        provider: this.provider,
      });
    });
  }

  /**
   * Single-turn chat with one user text part
   */
  async generateText(prompt: string, options: ProviderOptions = {}): Promise<AIResponse> {
    return this.chat([{ role: 'user', parts: [{ text: prompt }] }], options);
  }

  /**
   * Embed one text with `embedContent`; the model is chosen per call
   *
   * @param text - Input text
   * @param options - Model and EmbedContentConfig passthrough keys such as `outputDimensionality`
   * @returns Success with the first embedding's values and null tokenUsage
   *   (Gemini reports no usage for embeddings), or a failure response
   */
  async embed(text: string, options: ProviderOptions = {}): Promise<AIResponse> {
    // temperature and max_tokens have no meaning for embeddings
    const {
      model = this.embeddingModel,
      temperature: _temperature,
      max_tokens: _maxTokens,
      ...passthrough
    } = options;

    return this.run('embed', model, async () => {
      const raw = await this.client.models.embedContent({
        model,
        contents: text,
        config: { ...passthrough },
      });

      const embedding = firstOf(raw, 'embeddings');
      const values = isRecord(embedding) ? embedding.values : undefined;

      if (Array.isArray(values) && values.every((value) => typeof value === 'number')) {
        return AIResponse.success({
          content: values,
          tokenUsage: null,
          rawResponse: raw,
          model,
          provider: this.provider,
        });
      }

      return this.malformed(raw, model, 'Malformed Gemini response: no embedding values');
    });
  }

  async generateImage(_prompt: string, options: ProviderOptions = {}): Promise<AIResponse> {
    return AIResponse.failure({
      errorMessage: 'GoogleGeminiAdapter does not implement generateImage',
      errorKind: 'not_implemented',
      model: options.model ?? null,
      provider: this.provider,
    });
  }

  private malformed(raw: unknown, model: string, message: string): AIResponse {
    this.logger.error(message);
    return AIResponse.failure({
      errorMessage: message,
      errorKind: 'malformed_response',
      rawResponse: raw,
      model,
      provider: this.provider,
    });
  }

  private async run(
    operation: string,
    model: string,
    call: () => Promise<AIResponse>,
  ): Promise<AIResponse> {
    this.logger.debug(`Executing Google Gemini ${operation} request (model=${model})`);

    try {
      return await call();
    } catch (error) {
      if (error instanceof ApiError) {
        this.logger.error(`Google Gemini API error during ${operation}: ${error.message}`);
        return AIResponse.failure({
          errorMessage: `Google Gemini API Error: ${error.message}`,
          errorKind: 'vendor',
          rawResponse: { status: error.status, message: error.message },
          model,
          provider: this.provider,
        });
      }

      const message = describeError(error);
      this.logger.error(`Client error during Google Gemini ${operation}: ${message}`);
      return AIResponse.failure({
        errorMessage: `Client error during Google Gemini ${operation}: ${message}`,
        errorKind: 'unhandled',
        rawResponse: error,
        model,
        provider: this.provider,
      });
    }
  }
}
