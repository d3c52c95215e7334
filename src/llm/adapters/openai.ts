/**
 * OpenAI-compatible adapter. POSTs to `/v1/chat/completions`.
 *
 * Works against api.openai.com and any server exposing the same endpoint
 * (set `baseUrl`).
 */

import { describeError } from '../../domain/errors';
import { LLMAdapter, LLMCallOptions, LLMProviderError, LLMRawResponse } from '../types';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com';

/** OpenAI chat completion request. */
interface OpenAIChatRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  max_tokens?: number;
  temperature?: number;
}

/** The parts of an OpenAI chat completion response this adapter reads. */
interface OpenAIChatResponse {
  choices: Array<{
    message?: { role?: string; content?: string | null };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

function isChatResponse(value: unknown): value is OpenAIChatResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    Array.isArray(Reflect.get(value, 'choices'))
  );
}

export function createOpenAIAdapter(): LLMAdapter {
  return async function openaiAdapter(options: LLMCallOptions): Promise<LLMRawResponse> {
    const baseUrl = (options.baseUrl || OPENAI_DEFAULT_BASE_URL).replace(/\/+$/, '');
    const url = `${baseUrl}/v1/chat/completions`;

    const messages: Array<{ role: string; content: string }> = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of options.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    const body: OpenAIChatRequest = {
      model: options.model,
      messages,
      max_tokens: options.maxOutputTokens,
      temperature: options.temperature,
    };

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new LLMProviderError(`OpenAI connection failed (${baseUrl}): ${describeError(err)}`);
    }

    const text = await res.text().catch(() => '');
    if (!res.ok) {
      throw new LLMProviderError(
        `OpenAI returned HTTP ${res.status}: ${text.slice(0, 200)}`,
        res.status,
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      data = undefined;
    }
    if (!isChatResponse(data)) {
      throw new LLMProviderError(
        `OpenAI returned an unexpected response (HTTP ${res.status}): ${text.slice(0, 200)}`,
        res.status,
      );
    }

    const choice = data.choices[0];
    return {
      content: choice?.message?.content ?? '',
      finishReason: choice?.finish_reason ?? 'stop',
      usage: data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined,
    };
  };
}
