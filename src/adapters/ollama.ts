import { z } from "zod";
import type { IGenerationService, IEmbeddingService, GenerateOptions } from "./base.js";
import { calculateTimeout } from "./base.js";
import type { RetryPolicy } from "./retry.js";
import { withRetry } from "./retry.js";
import { httpRequest, httpStreamLines, parseJson } from "./http.js";
import { checkDimension } from "./openai-compat.js";
import type { GenerationConfig, EmbeddingConfig } from "../config.js";
import { ProviderError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("ollama");

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Generation through Ollama's native API.
 * Calls POST /api/generate; streaming responses arrive as NDJSON, one object per line.
 * System prompts go in Ollama's "system" field.
 */
export class OllamaGenerator implements IGenerationService {
  readonly name: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: GenerationConfig, private readonly retry: RetryPolicy) {
    this.name = `ollama:${config.model}`;
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
  }

  private buildBody(options: GenerateOptions, stream: boolean): object {
    return {
      model: this.model,
      prompt: options.userPrompt,
      system: options.systemPrompt,
      stream,
      options: {
        num_predict: options.maxTokens,
        temperature: options.temperature,
      },
    };
  }

  private timeoutFor(options: GenerateOptions): number {
    return options.timeoutMs ?? calculateTimeout(options.systemPrompt.length + options.userPrompt.length);
  }

  async generate(options: GenerateOptions): Promise<string> {
    const start = Date.now();
    log.debug(this.name, "generate start, prompt length:", options.userPrompt.length);

    const raw = await withRetry(this.name, this.retry, () =>
      httpRequest({
        method: "POST",
        url: `${this.endpoint}/api/generate`,
        body: this.buildBody(options, false),
        timeoutMs: this.timeoutFor(options),
        label: this.name,
        signal: options.signal,
      }),
      options.signal
    );

    const parsed = GenerateResponseSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success) {
      throw new ProviderError(`${this.name}: unexpected /api/generate response: ${raw.slice(0, 200)}`);
    }

    // Ollama reports token counts directly
    const tokens = (parsed.data.prompt_eval_count ?? 0) + (parsed.data.eval_count ?? 0);
    log.info(this.name, "generate complete:", `${Date.now() - start}ms, ${tokens} tokens`);
    return parsed.data.response.trim();
  }

  async *generateStreaming(options: GenerateOptions): AsyncGenerator<string> {
    const lines = httpStreamLines({
      method: "POST",
      url: `${this.endpoint}/api/generate`,
      body: this.buildBody(options, true),
      timeoutMs: this.timeoutFor(options),
      label: this.name,
      signal: options.signal,
    });

    for await (const line of lines) {
      const event = GenerateResponseSchema.safeParse(parseJson(line, this.name));
      if (!event.success) {
        log.debug(this.name, "skipping unrecognized stream line:", line.slice(0, 120));
        continue;
      }
      if (event.data.response) yield event.data.response;
      if (event.data.done) return;
    }
  }
}

/** Embeddings via POST /api/embed (batched `input`). */
export class OllamaEmbedder implements IEmbeddingService {
  readonly name: string;
  readonly dimension: number;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(
    config: EmbeddingConfig,
    private readonly retry: RetryPolicy,
    private readonly timeoutMs = 30_000
  ) {
    this.name = `ollama:${config.model}`;
    this.dimension = config.dimension;
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
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
        url: `${this.endpoint}/api/embed`,
        body: { model: this.model, input: texts },
        timeoutMs: this.timeoutMs,
        label: this.name,
        signal,
      }),
      signal
    );

    const parsed = EmbedResponseSchema.safeParse(parseJson(raw, this.name));
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new ProviderError(`${this.name}: expected ${texts.length} embeddings in response`);
    }
    return parsed.data.embeddings.map((v) => checkDimension(v, this.dimension, this.name));
  }
}
