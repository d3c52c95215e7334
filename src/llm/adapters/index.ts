/**
 * Provider adapters.
 *
 * Each adapter translates LLMCallOptions into one provider's native API
 * and maps the reply back to an LLMRawResponse.
 */

import { LLMAdapter, LLMProvider } from '../types';
import { createGeminiAdapter } from './gemini';
import { createOpenAIAdapter } from './openai';

export { createGeminiAdapter } from './gemini';
export { createOpenAIAdapter, OPENAI_DEFAULT_BASE_URL } from './openai';

/** Build the adapter for a provider. */
export function createAdapter(provider: LLMProvider): LLMAdapter {
  switch (provider) {
    case 'gemini':
      return createGeminiAdapter();
    case 'openai':
      return createOpenAIAdapter();
  }
}
