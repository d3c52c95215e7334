/**
 * Gemini adapter. Calls Google's Generative Language API through
 * @google/generative-ai.
 *
 * System messages (and `systemPrompt`) become the model's system
 * instruction; assistant turns are sent with the `model` role.
 */

import {
  Content,
  GenerateContentResult,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from '@google/generative-ai';
import { describeError } from '../../domain/errors';
import { LLMAdapter, LLMCallOptions, LLMProviderError, LLMRawResponse } from '../types';

export function createGeminiAdapter(): LLMAdapter {
  return async function geminiAdapter(options: LLMCallOptions): Promise<LLMRawResponse> {
    const systemParts = options.messages.filter((m) => m.role === 'system').map((m) => m.content);
    if (options.systemPrompt) systemParts.unshift(options.systemPrompt);

    const client = new GoogleGenerativeAI(options.apiKey);
    const model = client.getGenerativeModel({
      model: options.model,
      ...(systemParts.length > 0 ? { systemInstruction: systemParts.join('\n\n') } : {}),
    });

    const contents: Content[] = options.messages
      .filter((m) => m.role !== 'system')
      .map((m) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));

    let result: GenerateContentResult;
    try {
      result = await model.generateContent({
        contents,
        generationConfig: {
          maxOutputTokens: options.maxOutputTokens,
          temperature: options.temperature,
        },
      });
    } catch (err) {
      const status = err instanceof GoogleGenerativeAIFetchError ? err.status : undefined;
      throw new LLMProviderError(`Gemini request failed: ${describeError(err)}`, status);
    }

    const response = result.response;
    let content: string;
    try {
      // text() throws when the candidate was blocked
      content = response.text();
    } catch (err) {
      throw new LLMProviderError(`Gemini returned no usable text: ${describeError(err)}`);
    }

    const usage = response.usageMetadata;
    return {
      content,
      finishReason: response.candidates?.[0]?.finishReason,
      usage: usage
        ? {
            promptTokens: usage.promptTokenCount,
            completionTokens: usage.candidatesTokenCount,
            totalTokens: usage.totalTokenCount,
          }
        : undefined,
    };
  };
}
