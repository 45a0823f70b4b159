import OpenAI from "openai";
import type { LLMMessage, LLMProvider, LLMRequest, LLMResponse } from "./types";

function toChatMessage(message: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

export class OpenAIProvider implements LLMProvider {
  async complete(request: LLMRequest, apiKey: string): Promise<LLMResponse> {
    const client = new OpenAI({ apiKey, timeout: request.timeout_ms, maxRetries: 0 });

    const response = await client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toChatMessage),
      temperature: request.temperature ?? 0.1,
      max_tokens: request.max_tokens,
      response_format: request.json ? { type: "json_object" } : undefined,
    });

    const choice = response.choices[0];
    if (!choice || !choice.message) {
      throw new Error("No response from OpenAI");
    }

    return {
      text: choice.message.content || "",
      usage: {
        input_tokens: response.usage?.prompt_tokens || 0,
        output_tokens: response.usage?.completion_tokens || 0,
        total_tokens: response.usage?.total_tokens || 0,
      },
      provider_metadata: {
        finish_reason: choice.finish_reason,
        model: response.model,
      },
    };
  }
}
