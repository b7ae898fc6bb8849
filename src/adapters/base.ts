/**
 * Collaborator contracts for the remote backends.
 *
 * Embedding and generation vendors are picked from config at startup
 * (see createGenerationService / createEmbeddingService); the core only
 * ever talks to these two interfaces.
 */

export interface GenerateOptions {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
  /** Per-request HTTP timeout. Defaults to calculateTimeout(prompt length). */
  timeoutMs?: number;
  /** Aborting cancels the in-flight request and any pending retry. */
  signal?: AbortSignal;
}

export interface IGenerationService {
  /** Label for logs (e.g. "ollama:llama3") */
  readonly name: string;

  /** Generate a complete response. */
  generate(options: GenerateOptions): Promise<string>;

  /** Generate token by token. The sequence is finite. */
  generateStreaming(options: GenerateOptions): AsyncIterable<string>;
}

export interface IEmbeddingService {
  readonly name: string;
  /** Length of every vector this service returns. */
  readonly dimension: number;

  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Dynamic HTTP timeout based on prompt size: base 15s + 15ms per estimated
 * token, capped at 10 minutes.
 */
export function calculateTimeout(promptLength: number): number {
  const estimatedTokens = Math.ceil(promptLength / 4);
  return Math.min(15_000 + estimatedTokens * 15, 600_000);
}

/** Drain a token stream into one string (non-streaming flows). */
export async function collectStream(tokens: AsyncIterable<string>): Promise<string> {
  let text = "";
  for await (const token of tokens) {
    text += token;
  }
  return text;
}
