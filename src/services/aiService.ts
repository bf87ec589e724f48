import Anthropic from "@anthropic-ai/sdk";
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError
} from "@google/generative-ai";
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { Provider, RewriteConfig } from "../config.js";
import {
  HumanizeError,
  InvalidConfigError,
  InvalidResponseError,
  RateLimitedError,
  UnreachableError,
  isRetryable
} from "../errors.js";
import { PromptMessages, buildPromptMessages, flattenPrompt, loadBasePrompt } from "./promptService.js";

export type FetchLike = typeof fetch;
export type Sleep = (ms: number) => Promise<void>;
export type ChunkListener = (chunk: string) => void;

export type RefineOptions = {
  paragraphCount?: number;
  basePrompt?: string;
  onChunk?: ChunkListener;
  fetch?: FetchLike;
  sleep?: Sleep;
};

export type RefineRequest = {
  paragraphCount: number;
  batchIndex: number;
};

export type RefineFn = (text: string, request: RefineRequest) => Promise<string>;

type CompletionRequest = {
  config: RewriteConfig;
  messages: PromptMessages;
  onChunk?: ChunkListener;
  fetch: FetchLike;
};

type ListedModel = {
  id: string;
  label?: string;
};

const ollamaChatSchema = z.object({
  message: z.object({ content: z.string() })
});

const ollamaGenerateSchema = z.object({
  response: z.string()
});

const chatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1)
});

const ollamaStreamLineSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  response: z.string().optional(),
  error: z.string().optional(),
  done: z.boolean().optional()
});

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function requireEndpoint(config: RewriteConfig): string {
  if (!config.endpointUrl) {
    throw new InvalidConfigError(`Provider "${config.provider}" needs an endpoint URL.`);
  }
  return trimTrailingSlash(config.endpointUrl);
}

function requireApiKey(config: Pick<RewriteConfig, "provider" | "apiKey">): string {
  const apiKey = config.apiKey?.trim();
  if (!apiKey) {
    throw new InvalidConfigError(`Missing API key for provider "${config.provider}".`);
  }
  return apiKey;
}

export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value?.trim()) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

export function backoffDelay(attempt: number, config: Pick<RewriteConfig, "backoffBaseMs" | "backoffMaxMs">): number {
  return Math.min(config.backoffMaxMs, config.backoffBaseMs * 2 ** (attempt - 1));
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "TimeoutError" ? "request timed out" : error.message;
  }
  return String(error);
}

async function ensureOk(response: Response, label: string): Promise<void> {
  if (response.ok) {
    return;
  }
  const body = await response.text();
  const detail = `${label} request failed: ${response.status} ${body}`.trim();
  if (response.status === 429) {
    throw new RateLimitedError(detail, parseRetryAfter(response.headers.get("retry-after")));
  }
  if (response.status === 408 || response.status >= 500) {
    throw new UnreachableError(detail);
  }
  throw new InvalidResponseError(detail);
}

async function readJson(response: Response, label: string): Promise<unknown> {
  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new UnreachableError(`${label} response was interrupted: ${describeCause(error)}`, error);
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new InvalidResponseError(`${label} returned malformed JSON.`, error);
  }
}

async function postJson(
  request: CompletionRequest,
  url: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  try {
    return await request.fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(request.config.timeoutMs)
    });
  } catch (error) {
    throw new UnreachableError(`Could not reach ${url}: ${describeCause(error)}`, error);
  }
}

function extractOllamaText(payload: unknown): string {
  const chat = ollamaChatSchema.safeParse(payload);
  if (chat.success) {
    return chat.data.message.content;
  }
  const generate = ollamaGenerateSchema.safeParse(payload);
  if (generate.success) {
    return generate.data.response;
  }
  throw new InvalidResponseError("Ollama response did not contain generated text.");
}

function parseStreamLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

async function readOllamaStream(response: Response, onChunk: ChunkListener): Promise<string> {
  if (!response.body) {
    throw new InvalidResponseError("Ollama returned an empty stream.");
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";
  let full = "";

  const consume = (line: string): boolean => {
    if (!line.trim()) {
      return false;
    }
    // Keep-alive and partial lines are not JSON.
    const parsed = ollamaStreamLineSchema.safeParse(parseStreamLine(line));
    if (!parsed.success) {
      return false;
    }
    if (parsed.data.error) {
      throw new InvalidResponseError(`Ollama stream error: ${parsed.data.error}`);
    }
    const piece = parsed.data.message?.content ?? parsed.data.response ?? "";
    if (piece) {
      full += piece;
      onChunk(piece);
    }
    return parsed.data.done === true;
  };

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      buffered += decoder.decode(value, { stream: true });
      const lines = buffered.split("\n");
      buffered = lines.pop() ?? "";
      if (lines.some(consume)) {
        await reader.cancel();
        return full;
      }
    }
    buffered += decoder.decode();
    consume(buffered);
  } catch (error) {
    if (error instanceof HumanizeError) {
      throw error;
    }
    throw new UnreachableError(`Ollama stream was interrupted: ${describeCause(error)}`, error);
  }
  return full;
}

async function completeWithOllama(request: CompletionRequest): Promise<string> {
  const { config, messages, onChunk } = request;
  const endpoint = requireEndpoint(config);
  const stream = Boolean(onChunk);
  const options = {
    temperature: config.temperature,
    num_predict: config.maxTokens
  };

  const response = config.useChatApi
    ? await postJson(request, `${endpoint}/api/chat`, {
        model: config.model,
        messages: [
          { role: "system", content: messages.system },
          { role: "user", content: messages.user }
        ],
        stream,
        options
      })
    : await postJson(request, `${endpoint}/api/generate`, {
        model: config.model,
        prompt: flattenPrompt(messages),
        stream,
        options
      });

  await ensureOk(response, "Ollama");
  if (onChunk) {
    return readOllamaStream(response, onChunk);
  }
  return extractOllamaText(await readJson(response, "Ollama"));
}

async function completeWithOpenRouter(request: CompletionRequest): Promise<string> {
  const { config, messages } = request;
  const endpoint = requireEndpoint(config);
  const apiKey = requireApiKey(config);

  const response = await postJson(
    request,
    `${endpoint}/chat/completions`,
    {
      model: config.model,
      temperature: config.temperature,
      max_tokens: config.maxTokens,
      messages: [
        { role: "system", content: messages.system },
        { role: "user", content: messages.user }
      ]
    },
    { Authorization: `Bearer ${apiKey}` }
  );

  await ensureOk(response, "OpenRouter");
  const parsed = chatCompletionSchema.safeParse(await readJson(response, "OpenRouter"));
  if (!parsed.success) {
    throw new InvalidResponseError("OpenRouter response did not contain a completion.");
  }
  return parsed.data.choices[0].message.content ?? "";
}

function classifyAnthropicError(error: unknown): unknown {
  if (error instanceof Anthropic.APIConnectionError) {
    return new UnreachableError(`Anthropic request failed: ${error.message}`, error);
  }
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (status === 429) {
      return new RateLimitedError(error.message, parseRetryAfter(error.headers?.["retry-after"]));
    }
    if (status === undefined || status === 408 || status >= 500) {
      return new UnreachableError(`Anthropic request failed: ${error.message}`, error);
    }
    return new InvalidResponseError(`Anthropic request failed: ${error.message}`, error);
  }
  return error;
}

async function completeWithAnthropic(request: CompletionRequest): Promise<string> {
  const { config, messages } = request;
  const client = new Anthropic({
    apiKey: requireApiKey(config),
    baseURL: config.endpointUrl,
    timeout: config.timeoutMs,
    maxRetries: 0
  });

  try {
    const response = await client.messages.create({
      model: config.model,
      max_tokens: config.maxTokens,
      temperature: config.temperature,
      system: messages.system,
      messages: [
        {
          role: "user",
          content: messages.user
        }
      ]
    });
    return response.content.flatMap((item) => (item.type === "text" ? [item.text] : [])).join("\n");
  } catch (error) {
    throw classifyAnthropicError(error);
  }
}

function classifyGeminiError(error: unknown): unknown {
  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status;
    if (status === 429) {
      return new RateLimitedError(error.message);
    }
    if (status === undefined || status === 408 || status >= 500) {
      return new UnreachableError(`Gemini request failed: ${error.message}`, error);
    }
    return new InvalidResponseError(`Gemini request failed: ${error.message}`, error);
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new InvalidResponseError(`Gemini response was unusable: ${error.message}`, error);
  }
  if (error instanceof HumanizeError) {
    return error;
  }
  return new UnreachableError(`Gemini request failed: ${describeCause(error)}`, error);
}

async function completeWithGemini(request: CompletionRequest): Promise<string> {
  const { config, messages } = request;
  const client = new GoogleGenerativeAI(requireApiKey(config));
  const modelApi = client.getGenerativeModel(
    {
      model: config.model,
      systemInstruction: messages.system,
      generationConfig: {
        temperature: config.temperature,
        maxOutputTokens: config.maxTokens
      }
    },
    {
      timeout: config.timeoutMs,
      baseUrl: config.endpointUrl
    }
  );

  try {
    const response = await modelApi.generateContent(messages.user);
    return response.response.text();
  } catch (error) {
    throw classifyGeminiError(error);
  }
}

const COMPLETIONS: Record<Provider, (request: CompletionRequest) => Promise<string>> = {
  ollama: completeWithOllama,
  openrouter: completeWithOpenRouter,
  anthropic: completeWithAnthropic,
  gemini: completeWithGemini
};

export function cleanRefinedText(raw: string): string {
  let text = raw.trim();
  const fence = text.match(/^```[\w-]*\s*\n([\s\S]*?)\n?```$/);
  if (fence) {
    text = fence[1].trim();
  }
  return text.replace(/^(?:here is the rewritten text|rewritten text)\s*:\s*/i, "").trim();
}

function toHumanizeError(error: unknown): unknown {
  if (error instanceof HumanizeError) {
    return error;
  }
  return new UnreachableError(`Rewrite request failed: ${describeCause(error)}`, error);
}

/**
 * Sends one piece of text to the configured provider and returns the
 * rewritten text. Connection failures and rate limits are retried up to
 * `maxAttempts`; malformed or empty responses fail at once, and so does a
 * stream that breaks after chunks were delivered.
 */
export async function refineText(text: string, config: RewriteConfig, options: RefineOptions = {}): Promise<string> {
  const basePrompt = options.basePrompt ?? (await loadBasePrompt(config));
  const messages = buildPromptMessages({
    basePrompt,
    config,
    text,
    paragraphCount: options.paragraphCount
  });
  const complete = COMPLETIONS[config.provider];
  const sleep = options.sleep ?? defaultSleep;
  const fetchImpl = options.fetch ?? fetch;
  const listener = options.onChunk;
  let streamed = false;
  const onChunk: ChunkListener | undefined = listener
    ? (chunk) => {
        streamed = true;
        listener(chunk);
      }
    : undefined;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const raw = await complete({ config, messages, onChunk, fetch: fetchImpl });
      const refined = cleanRefinedText(raw);
      if (!refined) {
        throw new InvalidResponseError(`${config.provider} returned an empty response.`);
      }
      if (options.onChunk && config.provider !== "ollama") {
        options.onChunk(refined);
      }
      return refined;
    } catch (error) {
      const failure = toHumanizeError(error);
      // Listeners cannot take back text they were already given.
      if (!isRetryable(failure) || attempt >= config.maxAttempts || streamed) {
        throw failure;
      }
      const waitMs =
        failure instanceof RateLimitedError && failure.retryAfterMs !== undefined
          ? failure.retryAfterMs
          : backoffDelay(attempt, config);
      await sleep(waitMs);
    }
  }
}

/**
 * Binds a configuration to a reusable refine function. The base prompt is
 * read once per refiner.
 */
export function createRefiner(
  config: RewriteConfig,
  options: Omit<RefineOptions, "paragraphCount" | "basePrompt"> = {}
): RefineFn {
  let basePrompt: Promise<string> | undefined;
  return async (text, request) => {
    basePrompt ??= loadBasePrompt(config);
    return refineText(text, config, {
      ...options,
      basePrompt: await basePrompt,
      paragraphCount: request.paragraphCount
    });
  };
}

const ollamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([])
});

const idListSchema = z.object({
  data: z
    .array(
      z.object({
        id: z.string().optional(),
        name: z.string().optional(),
        display_name: z.string().optional()
      })
    )
    .default([])
});

const geminiModelsSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string().optional(),
        displayName: z.string().optional(),
        supportedGenerationMethods: z.array(z.string()).optional()
      })
    )
    .default([])
});

async function getJson(
  fetchImpl: FetchLike,
  url: string,
  label: string,
  timeoutMs: number,
  headers: Record<string, string> = {}
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchImpl(url, { headers, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new UnreachableError(`Could not reach ${label}: ${describeCause(error)}`, error);
  }
  await ensureOk(response, `${label} models`);
  return readJson(response, label);
}

function parseListing<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidResponseError(`${label} returned an unexpected model listing.`);
  }
  return parsed.data;
}

async function listRawModels(config: RewriteConfig, fetchImpl: FetchLike): Promise<ListedModel[]> {
  const timeoutMs = Math.min(config.timeoutMs, 15_000);

  if (config.provider === "ollama") {
    const payload = await getJson(fetchImpl, `${requireEndpoint(config)}/api/tags`, "Ollama", timeoutMs);
    return parseListing(ollamaTagsSchema, payload, "Ollama").models.map((model) => ({ id: model.name }));
  }

  if (config.provider === "openrouter") {
    const payload = await getJson(fetchImpl, `${requireEndpoint(config)}/models`, "OpenRouter", timeoutMs, {
      Authorization: `Bearer ${requireApiKey(config)}`
    });
    return parseListing(idListSchema, payload, "OpenRouter").data.map((model) => ({
      id: model.id ?? "",
      label: model.name
    }));
  }

  if (config.provider === "anthropic") {
    const base = trimTrailingSlash(config.endpointUrl ?? "https://api.anthropic.com");
    const payload = await getJson(fetchImpl, `${base}/v1/models`, "Anthropic", timeoutMs, {
      "x-api-key": requireApiKey(config),
      "anthropic-version": "2023-06-01"
    });
    return parseListing(idListSchema, payload, "Anthropic").data.map((model) => ({
      id: model.id ?? "",
      label: model.display_name
    }));
  }

  const base = trimTrailingSlash(config.endpointUrl ?? "https://generativelanguage.googleapis.com");
  const payload = await getJson(
    fetchImpl,
    `${base}/v1beta/models?key=${encodeURIComponent(requireApiKey(config))}`,
    "Gemini",
    timeoutMs
  );
  return parseListing(geminiModelsSchema, payload, "Gemini")
    .models.filter((model) =>
      (model.supportedGenerationMethods ?? []).some(
        (method) => method === "generateContent" || method === "streamGenerateContent"
      )
    )
    .map((model) => ({
      id: (model.name ?? "").replace(/^models\//, ""),
      label: model.displayName
    }));
}

export async function listModels(
  config: RewriteConfig,
  options: { fetch?: FetchLike } = {}
): Promise<{ provider: Provider; models: ListedModel[]; defaultModel: string }> {
  const rawModels = await listRawModels(config, options.fetch ?? fetch);

  const deduped = new Map<string, ListedModel>();
  for (const model of rawModels) {
    if (model.id.length > 0 && !deduped.has(model.id)) {
      deduped.set(model.id, model);
    }
  }

  const models = Array.from(deduped.values()).sort((left, right) => left.id.localeCompare(right.id));
  return {
    provider: config.provider,
    models,
    defaultModel: config.model
  };
}

export async function checkConnection(
  config: RewriteConfig,
  options: { fetch?: FetchLike } = {}
): Promise<{ reachable: boolean; modelAvailable: boolean; error?: string }> {
  try {
    const listing = await listModels(config, options);
    return {
      reachable: true,
      modelAvailable: listing.models.some((model) => model.id === config.model)
    };
  } catch (error) {
    return {
      reachable: false,
      modelAvailable: false,
      error: error instanceof Error ? error.message : String(error)
    };
  }
}
