/**
 * Types shared by the generation client and the provider adapters.
 */

import { generationProviderError, TypedError } from '../domain/errors';

/** Supported generation providers. */
export type LLMProvider = 'gemini' | 'openai';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['gemini', 'openai'];

/** A single chat message. */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Token accounting as reported by the provider. */
export interface LLMUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

/** Response from a raw provider call. */
export interface LLMRawResponse {
  content: string;
  finishReason?: string;
  usage?: LLMUsage;
}

/** Options for the underlying provider call (used by adapters). */
export interface LLMCallOptions {
  provider: LLMProvider;
  model: string;
  messages: ChatMessage[];
  systemPrompt?: string;
  apiKey: string;
  baseUrl?: string;
  /** Upper bound on generated tokens. */
  maxOutputTokens?: number;
  /** Sampling temperature (0-2). */
  temperature?: number;
}

/**
 * Adapter function type for calling a provider.
 * Implementations handle the HTTP call to the specific provider API and
 * throw LLMProviderError on failure.
 */
export type LLMAdapter = (options: LLMCallOptions) => Promise<LLMRawResponse>;

/** Error thrown by adapters when the provider call fails. */
export class LLMProviderError extends Error {
  public readonly typedError: TypedError;
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'LLMProviderError';
    this.statusCode = statusCode;
    this.typedError = generationProviderError(message, statusCode);
  }
}
