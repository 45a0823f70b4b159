import { completeWithProvider } from "@/lib/llm/proxy";
import type { AppConfig } from "@/lib/config";
import type { IntentModel } from "./llm-extractor";

/** Bind the configured provider as an intent model, or null when no API key is set. */
export function createIntentModel(llm: AppConfig["llm"]): IntentModel | null {
  const { apiKey, provider, model } = llm;
  if (!apiKey) {
    return null;
  }

  return async (system, user, timeoutMs) => {
    const response = await completeWithProvider(
      {
        provider,
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        temperature: 0.1,
        max_tokens: 400,
        json: true,
        timeout_ms: timeoutMs,
      },
      apiKey
    );
    return response.text;
  };
}
