// Server-side LLM dispatch

import { OpenAIProvider } from "./providers/openai";
import { AnthropicProvider } from "./providers/anthropic";
import { GeminiProvider } from "./providers/gemini";
import type { LLMProvider, LLMRequest, LLMResponse, Provider } from "./providers/types";

const providers: Record<Provider, LLMProvider> = {
  openai: new OpenAIProvider(),
  anthropic: new AnthropicProvider(),
  gemini: new GeminiProvider(),
};

export async function completeWithProvider(
  request: LLMRequest,
  apiKey: string,
  registry: Record<Provider, LLMProvider> = providers
): Promise<LLMResponse> {
  const provider = registry[request.provider];
  if (!provider) {
    throw new Error(`Unknown provider: ${request.provider}`);
  }

  const started = Date.now();
  // timeout_ms goes to the SDK client; the caller bounds the whole call
  const response = await provider.complete(request, apiKey);
  console.log(
    `[LLM] ${request.provider}/${request.model} answered in ${Date.now() - started}ms (${response.usage.total_tokens} tokens)`
  );
  return response;
}
