import { GoogleGenerativeAI } from "@google/generative-ai";
import type { LLMProvider, LLMRequest, LLMResponse } from "./types";

export class GeminiProvider implements LLMProvider {
  async complete(request: LLMRequest, apiKey: string): Promise<LLMResponse> {
    const genAI = new GoogleGenerativeAI(apiKey);
    const systemMessage = request.messages.find(m => m.role === "system");
    const model = genAI.getGenerativeModel(
      { model: request.model, systemInstruction: systemMessage?.content },
      { timeout: request.timeout_ms }
    );

    // Gemini has a single user turn here; earlier turns are folded into it
    let prompt = "";
    for (const msg of request.messages) {
      if (msg.role === "user") {
        prompt += `${msg.content}\n`;
      } else if (msg.role === "assistant") {
        prompt += `Assistant: ${msg.content}\n`;
      }
    }

    const result = await model.generateContent({
      contents: [{ role: "user", parts: [{ text: prompt.trim() }] }],
      generationConfig: {
        temperature: request.temperature ?? 0.1,
        maxOutputTokens: request.max_tokens,
        responseMimeType: request.json ? "application/json" : undefined,
      },
    });

    const response = result.response;
    const text = response.text();
    const usage = response.usageMetadata;

    return {
      text,
      usage: {
        input_tokens: usage?.promptTokenCount ?? 0,
        output_tokens: usage?.candidatesTokenCount ?? 0,
        total_tokens: usage?.totalTokenCount ?? 0,
      },
      provider_metadata: {
        finish_reason: response.candidates?.[0]?.finishReason ?? null,
        model: request.model,
      },
    };
  }
}
