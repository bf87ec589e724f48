import { z } from "zod";
import { InvalidConfigError } from "./errors.js";

export const PROVIDERS = ["ollama", "openrouter", "anthropic", "gemini"] as const;
export type Provider = (typeof PROVIDERS)[number];

export type Env = Record<string, string | undefined>;

export type RewriteConfig = {
  provider: Provider;
  model: string;
  endpointUrl?: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  tone?: string;
  formality?: string;
  systemPrompt?: string;
  promptFile?: string;
  useChatApi: boolean;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type HumanizeConfig = {
  rewrite: RewriteConfig;
  batchTokens: number;
  preserveFormatting: boolean;
};

export type ConfigOverrides = Partial<RewriteConfig> & {
  batchTokens?: number;
  preserveFormatting?: boolean;
};

const DEFAULT_ENDPOINTS: Record<Provider, string | undefined> = {
  ollama: "http://localhost:11434",
  openrouter: "https://openrouter.ai/api/v1",
  anthropic: undefined,
  gemini: undefined
};

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const booleanFlag = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => ["true", "false", "1", "0", "yes", "no"].includes(value), {
      message: "Expected a boolean."
    })
    .transform((value) => value === "true" || value === "1" || value === "yes")
]);

const configSchema = z.object({
  provider: z.enum(PROVIDERS),
  model: z.string().trim().min(1),
  endpointUrl: z.string().trim().url().optional(),
  apiKey: optionalText,
  temperature: z.coerce.number().min(0).max(1),
  maxTokens: z.coerce.number().int().positive(),
  batchTokens: z.coerce.number().int().positive().optional(),
  tone: optionalText,
  formality: optionalText,
  systemPrompt: optionalText,
  promptFile: optionalText,
  useChatApi: booleanFlag,
  timeoutMs: z.coerce.number().int().positive(),
  maxAttempts: z.coerce.number().int().min(1).max(10),
  backoffBaseMs: z.coerce.number().int().min(0),
  backoffMaxMs: z.coerce.number().int().min(0),
  preserveFormatting: booleanFlag
});

export function resolveDefaultModel(provider: Provider, env: Env = process.env): string {
  return provider === "ollama"
    ? env.OLLAMA_MODEL || "cogito-2.1:671b-cloud"
    : provider === "anthropic"
      ? env.CLAUDE_MODEL || "claude-3-5-sonnet-latest"
      : provider === "gemini"
        ? env.GEMINI_MODEL || "gemini-1.5-pro"
        : env.OPENROUTER_MODEL || "openai/gpt-4o-mini";
}

export function resolveApiKey(provider: Provider, env: Env = process.env): string | undefined {
  const fromEnv =
    provider === "anthropic"
      ? env.ANTHROPIC_API_KEY
      : provider === "gemini"
        ? env.GEMINI_API_KEY
        : provider === "openrouter"
          ? env.OPENROUTER_API_KEY
          : undefined;
  return env.HUMANIZE_API_KEY?.trim() || fromEnv?.trim() || undefined;
}

function parseProvider(value: string | undefined): Provider {
  const provider = (value || "ollama").trim().toLowerCase();
  const match = PROVIDERS.find((candidate) => candidate === provider);
  if (!match) {
    throw new InvalidConfigError(
      `Unknown provider "${provider}". Expected one of: ${PROVIDERS.join(", ")}.`
    );
  }
  return match;
}

export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): HumanizeConfig {
  const provider = overrides.provider ?? parseProvider(env.HUMANIZE_PROVIDER);

  const raw = {
    provider,
    model: overrides.model ?? env.HUMANIZE_MODEL ?? resolveDefaultModel(provider, env),
    endpointUrl: overrides.endpointUrl ?? env.HUMANIZE_ENDPOINT_URL ?? DEFAULT_ENDPOINTS[provider],
    apiKey: overrides.apiKey ?? resolveApiKey(provider, env),
    temperature: overrides.temperature ?? env.HUMANIZE_TEMPERATURE ?? 0.7,
    maxTokens: overrides.maxTokens ?? env.HUMANIZE_MAX_TOKENS ?? 2000,
    batchTokens: overrides.batchTokens ?? env.HUMANIZE_BATCH_TOKENS,
    tone: overrides.tone ?? env.HUMANIZE_TONE,
    formality: overrides.formality ?? env.HUMANIZE_FORMALITY,
    systemPrompt: overrides.systemPrompt,
    promptFile: overrides.promptFile ?? env.HUMANIZE_PROMPT_FILE,
    useChatApi: overrides.useChatApi ?? env.HUMANIZE_USE_CHAT_API ?? true,
    timeoutMs: overrides.timeoutMs ?? env.HUMANIZE_TIMEOUT_MS ?? 120_000,
    maxAttempts: overrides.maxAttempts ?? env.HUMANIZE_MAX_ATTEMPTS ?? 3,
    backoffBaseMs: overrides.backoffBaseMs ?? env.HUMANIZE_BACKOFF_BASE_MS ?? 1_000,
    backoffMaxMs: overrides.backoffMaxMs ?? env.HUMANIZE_BACKOFF_MAX_MS ?? 30_000,
    preserveFormatting: overrides.preserveFormatting ?? env.HUMANIZE_PRESERVE_FORMATTING ?? true
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid configuration. ${fields}`);
  }

  const { batchTokens, preserveFormatting, ...rewrite } = parsed.data;
  return {
    rewrite,
    batchTokens: batchTokens ?? rewrite.maxTokens,
    preserveFormatting
  };
}
