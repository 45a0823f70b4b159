// LLM provider abstraction interface

export type Provider = "openai" | "anthropic" | "gemini";

export const DEFAULT_MODELS: Record<Provider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-20241022",
  gemini: "gemini-1.5-flash",
};

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMRequest {
  provider: Provider;
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  max_tokens?: number;
  json?: boolean; // ask for a bare JSON object where the provider supports it
  timeout_ms?: number;
}

export interface LLMResponse {
  text: string;
  usage: {
    input_tokens: number;
    output_tokens: number;
    total_tokens: number;
  };
  provider_metadata?: Record<string, string | number | null>;
}

export interface LLMProvider {
  complete(request: LLMRequest, apiKey: string): Promise<LLMResponse>;
}
