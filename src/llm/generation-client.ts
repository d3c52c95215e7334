/**
 * Generation client. One prompt in, one text completion (or typed
 * failure) out.
 *
 * The client never rejects: provider failures are converted to a
 * GENERATION.* TypedError at this boundary, so callers branch on the
 * result instead of catching.
 */

import { describeError, TypedError, unexpectedGenerationError } from '../domain/errors';
import { failure, Result, success } from '../domain/result';
import { Logger } from '../logger';
import { LLMAdapter, LLMProvider, LLMProviderError, LLMUsage } from './types';

/** Settings the client sends with every request. */
export interface GenerationClientOptions {
  adapter: LLMAdapter;
  provider: LLMProvider;
  model: string;
  apiKey: string;
  baseUrl?: string;
  /** Upper bound on generated tokens per request. */
  maxOutputTokens: number;
  temperature: number;
  logger: Logger;
}

/** A prompt with its two numeric knobs. Built fresh for each artifact. */
export interface GenerationRequest {
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
}

export interface GenerationOutput {
  text: string;
  finishReason?: string;
  usage?: LLMUsage;
}

export type GenerationResult = Result<GenerationOutput>;

/** Anything that turns a prompt into generated text. */
export interface TextGenerator {
  generate(prompt: string): Promise<GenerationResult>;
}

export class GenerationClient implements TextGenerator {
  private readonly options: GenerationClientOptions;
  private readonly logger: Logger;

  constructor(options: GenerationClientOptions) {
    this.options = options;
    this.logger = options.logger.child({ provider: options.provider, model: options.model });
  }

  /** Build the request the next generate() call would send. */
  createRequest(prompt: string): GenerationRequest {
    return {
      prompt,
      maxOutputTokens: this.options.maxOutputTokens,
      temperature: this.options.temperature,
    };
  }

  async generate(prompt: string): Promise<GenerationResult> {
    const request = this.createRequest(prompt);
    this.logger.debug('Sending generation request', {
      promptChars: request.prompt.length,
      maxOutputTokens: request.maxOutputTokens,
      temperature: request.temperature,
    });

    try {
      const response = await this.options.adapter({
        provider: this.options.provider,
        model: this.options.model,
        messages: [{ role: 'user', content: request.prompt }],
        apiKey: this.options.apiKey,
        baseUrl: this.options.baseUrl,
        maxOutputTokens: request.maxOutputTokens,
        temperature: request.temperature,
      });

      this.logger.info('Generation completed', {
        responseChars: response.content.length,
        finishReason: response.finishReason,
        totalTokens: response.usage?.totalTokens,
      });
      if (response.content.trim() === '') {
        this.logger.warn('Generation returned empty text', { finishReason: response.finishReason });
      }

      return success({
        text: response.content,
        finishReason: response.finishReason,
        usage: response.usage,
      });
    } catch (err) {
      const error = toTypedError(err);
      this.logger.error('Generation call failed', { code: error.code, error: error.message });
      return failure(error);
    }
  }
}

function toTypedError(err: unknown): TypedError {
  if (err instanceof LLMProviderError) return err.typedError;
  return unexpectedGenerationError(`Generation call failed: ${describeError(err)}`);
}
