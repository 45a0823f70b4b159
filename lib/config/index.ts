import { z } from "zod";
import type { ResolverPolicy } from "@/lib/cypher/resolver";
import { ConfigError } from "@/lib/errors";
import { DEFAULT_MODELS } from "@/lib/llm/providers/types";
import type { Provider } from "@/lib/llm/providers/types";
import { LOCALES } from "@/types";
import type { Locale } from "@/types";

export interface AppConfig {
  falkordb: {
    host: string;
    port: number;
    graph: string;
    password?: string;
  };
  locale: Locale;
  llm: {
    provider: Provider;
    model: string;
    apiKey?: string;
    timeoutMs: number;
  };
  queryTimeoutMs: number;
  resolverPolicy: ResolverPolicy;
  maxLimit: number;
  port: number;
}

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  FALKORDB_HOST: z.string().min(1).default("localhost"),
  FALKORDB_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  FALKORDB_GRAPH: z.string().min(1).default("energy_graph"),
  FALKORDB_PASSWORD: optionalString,
  KG_LOCALE: z.enum(LOCALES).default("no"),
  KG_LLM_PROVIDER: z.enum(["openai", "anthropic", "gemini"]).default("openai"),
  KG_LLM_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  KG_LLM_TIMEOUT_MS: positiveInt(15000),
  KG_QUERY_TIMEOUT_MS: positiveInt(25000),
  KG_RESOLVER_POLICY: z.enum(["fallback", "error"]).default("fallback"),
  KG_MAX_LIMIT: positiveInt(1000),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
});

type Env = z.infer<typeof EnvSchema>;

function apiKeyFor(provider: Provider, env: Env): string | undefined {
  switch (provider) {
    case "openai":
      return env.OPENAI_API_KEY;
    case "anthropic":
      return env.ANTHROPIC_API_KEY;
    case "gemini":
      return env.GEMINI_API_KEY;
  }
}

/**
 * Read configuration from environment variables. Empty strings count as unset
 * so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }

  const values = parsed.data;
  const provider: Provider = values.KG_LLM_PROVIDER;

  return {
    falkordb: {
      host: values.FALKORDB_HOST,
      port: values.FALKORDB_PORT,
      graph: values.FALKORDB_GRAPH,
      password: values.FALKORDB_PASSWORD,
    },
    locale: values.KG_LOCALE,
    llm: {
      provider,
      model: values.KG_LLM_MODEL ?? DEFAULT_MODELS[provider],
      apiKey: apiKeyFor(provider, values),
      timeoutMs: values.KG_LLM_TIMEOUT_MS,
    },
    queryTimeoutMs: values.KG_QUERY_TIMEOUT_MS,
    resolverPolicy: values.KG_RESOLVER_POLICY,
    maxLimit: values.KG_MAX_LIMIT,
    port: values.PORT,
  };
}
