import { z } from "zod";
import type { IGenerationService, IEmbeddingService, GenerateOptions } from "./base.js";
import { calculateTimeout } from "./base.js";
import type { RetryPolicy } from "./retry.js";
import { withRetry } from "./retry.js";
import { httpRequest, httpStreamLines, parseJson } from "./http.js";
import type { GenerationConfig, EmbeddingConfig } from "../config.js";
import { resolveApiKey } from "../config.js";
import { ProviderError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai-compat");

interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

const ChatChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z.object({ content: z.string().nullable().optional() }).optional(),
    })
  ),
});

const EmbeddingsSchema = z.object({
  data: z.array(z.object({ index: z.number().int().optional(), embedding: z.array(z.number()) })),
});

function trimEndpoint(endpoint: string): string {
  return endpoint.replace(/\/+$/, "");
}

/**
 * Text generation against any OpenAI-compatible chat completions API.
 *
 * Works with: LM Studio, Ollama (/v1), vLLM, llama.cpp, LocalAI,
 * Groq, Mistral, Deepseek, Together AI, OpenAI.
 *
 * POST /v1/chat/completions, with `stream: true` (SSE) for generateStreaming.
 */
export class OpenAICompatGenerator implements IGenerationService {
  readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly model: string;

  constructor(config: GenerationConfig, private readonly retry: RetryPolicy) {
    this.name = `openai-compat:${config.model}`;
    this.endpoint = trimEndpoint(config.endpoint);
    this.apiKey = resolveApiKey(config);
    this.model = config.model;
  }

  private buildBody(options: GenerateOptions, stream: boolean): object {
    const messages: ChatMessage[] = [
      { role: "system", content: options.systemPrompt },
      { role: "user", content: options.userPrompt },
    ];
    return {
      model: this.model,
      messages,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      stream,
    };
  }

  private timeoutFor(options: GenerateOptions): number {
    return options.timeoutMs ?? calculateTimeout(options.systemPrompt.length + options.userPrompt.length);
  }

  async generate(options: GenerateOptions): Promise<string> {
    const url = `${this.endpoint}/v1/chat/completions`;
    const start = Date.now();
    log.debug(this.name, "generate start, prompt length:", options.userPrompt.length);

    const raw = await withRetry(this.name, this.retry, () =>
      httpRequest({
        method: "POST",
        url,
        body: this.buildBody(options, false),
        timeoutMs: this.timeoutFor(options),
        apiKey: this.apiKey,
        label: this.name,
        signal: options.signal,
      }),
      options.signal
    );

    const parsed = ChatCompletionSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success || parsed.data.choices.length === 0) {
      throw new ProviderError(`${this.name}: empty response from ${url}`);
    }

    const text = parsed.data.choices[0].message.content ?? "";
    const usage = parsed.data.usage;
    log.info(this.name, "generate complete:", `${Date.now() - start}ms` +
      (usage ? `, ${(usage.prompt_tokens ?? 0) + (usage.completion_tokens ?? 0)} tokens` : ""));
    return text.trim();
  }

  async *generateStreaming(options: GenerateOptions): AsyncGenerator<string> {
    const lines = httpStreamLines({
      method: "POST",
      url: `${this.endpoint}/v1/chat/completions`,
      body: this.buildBody(options, true),
      timeoutMs: this.timeoutFor(options),
      apiKey: this.apiKey,
      label: this.name,
      signal: options.signal,
    });

    for await (const line of lines) {
      if (!line.startsWith("data:")) continue;
      const data = line.slice(5).trim();
      if (data === "[DONE]") return;
      const chunk = ChatChunkSchema.safeParse(parseJson(data, this.name));
      if (!chunk.success) {
        log.debug(this.name, "skipping unrecognized stream event:", data.slice(0, 120));
        continue;
      }
      const token = chunk.data.choices[0]?.delta?.content;
      if (token) yield token;
    }
  }
}

/** Embeddings via POST /v1/embeddings. */
export class OpenAICompatEmbedder implements IEmbeddingService {
  readonly name: string;
  readonly dimension: number;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly model: string;

  constructor(
    config: EmbeddingConfig,
    private readonly retry: RetryPolicy,
    private readonly timeoutMs = 30_000
  ) {
    this.name = `openai-compat:${config.model}`;
    this.dimension = config.dimension;
    this.endpoint = trimEndpoint(config.endpoint);
    this.apiKey = resolveApiKey(config);
    this.model = config.model;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], signal);
    return vector;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const raw = await withRetry(this.name, this.retry, () =>
      httpRequest({
        method: "POST",
        url: `${this.endpoint}/v1/embeddings`,
        body: { model: this.model, input: texts },
        timeoutMs: this.timeoutMs,
        apiKey: this.apiKey,
        label: this.name,
        signal,
      }),
      signal
    );

    const parsed = EmbeddingsSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new ProviderError(`${this.name}: expected ${texts.length} embeddings in response`);
    }
    const ordered = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return ordered.map((d) => checkDimension(d.embedding, this.dimension, this.name));
  }
}

export function checkDimension(vector: number[], dimension: number, label: string): number[] {
  if (vector.length !== dimension) {
    throw new ProviderError(`${label}: embedding has ${vector.length} dimensions, expected ${dimension}`);
  }
  return vector;
}
