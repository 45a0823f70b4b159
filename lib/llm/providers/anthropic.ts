import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMRequest, LLMResponse } from "./types";

export class AnthropicProvider implements LLMProvider {
  async complete(request: LLMRequest, apiKey: string): Promise<LLMResponse> {
    const client = new Anthropic({ apiKey, timeout: request.timeout_ms, maxRetries: 0 });

    // Anthropic takes the system prompt separately from the turns
    const systemMessage = request.messages.find(m => m.role === "system");
    const turns: Anthropic.MessageParam[] = request.messages
      .filter(m => m.role !== "system")
      .map((m): Anthropic.MessageParam => ({
        role: m.role === "assistant" ? "assistant" : "user",
        content: m.content,
      }));

    const response = await client.messages.create({
      model: request.model,
      max_tokens: request.max_tokens || 1024,
      temperature: request.temperature ?? 0.1,
      system: systemMessage?.content,
      messages: turns,
    });

    const text = response.content.flatMap(block => (block.type === "text" ? [block.text] : [])).join("");

    return {
      text,
      usage: {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
        total_tokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      provider_metadata: {
        stop_reason: response.stop_reason,
        model: response.model,
      },
    };
  }
}
