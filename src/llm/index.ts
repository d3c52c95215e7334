/**
 * LLM Integration Module: provider adapters and the generation client.
 */

export {
  LLMProvider,
  LLM_PROVIDERS,
  ChatMessage,
  LLMUsage,
  LLMRawResponse,
  LLMCallOptions,
  LLMAdapter,
  LLMProviderError,
} from './types';

export {
  GenerationClient,
  GenerationClientOptions,
  GenerationRequest,
  GenerationOutput,
  GenerationResult,
  TextGenerator,
} from './generation-client';

export {
  createAdapter,
  createGeminiAdapter,
  createOpenAIAdapter,
  OPENAI_DEFAULT_BASE_URL,
} from './adapters';
