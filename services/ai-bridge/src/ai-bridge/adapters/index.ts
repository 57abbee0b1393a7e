/**
 * Adapter exports:
 * - Adapter interface
 * - DI tokens
 * - OpenAI and Google Gemini adapters
 * - Default provider registry
 */

export * from './provider-adapter.interface';
export * from './tokens';
export * from './openai.adapter';
export * from './google-gemini.adapter';
export * from './adapter-registry';
