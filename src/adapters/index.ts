import type { IGenerationService, IEmbeddingService } from "./base.js";
import type { RetryPolicy } from "./retry.js";
import type { GenerationConfig, EmbeddingConfig } from "../config.js";
import { OllamaGenerator, OllamaEmbedder } from "./ollama.js";
import { OpenAICompatGenerator, OpenAICompatEmbedder } from "./openai-compat.js";
import { createLogger } from "../logger.js";

const log = createLogger("adapters");

/** Pick the generation backend named by `config.type`. */
export function createGenerationService(config: GenerationConfig, retry: RetryPolicy): IGenerationService {
  switch (config.type) {
    case "openai-compat":
      log.debug("creating OpenAICompatGenerator, model=" + config.model);
      return new OpenAICompatGenerator(config, retry);
    case "ollama":
      log.debug("creating OllamaGenerator, model=" + config.model);
      return new OllamaGenerator(config, retry);
  }
}

/** Pick the embedding backend named by `config.type`. */
export function createEmbeddingService(
  config: EmbeddingConfig,
  retry: RetryPolicy,
  timeoutMs?: number
): IEmbeddingService {
  switch (config.type) {
    case "openai-compat":
      log.debug("creating OpenAICompatEmbedder, model=" + config.model);
      return new OpenAICompatEmbedder(config, retry, timeoutMs);
    case "ollama":
      log.debug("creating OllamaEmbedder, model=" + config.model);
      return new OllamaEmbedder(config, retry, timeoutMs);
  }
}

export { OllamaGenerator, OllamaEmbedder } from "./ollama.js";
export { OpenAICompatGenerator, OpenAICompatEmbedder } from "./openai-compat.js";
export { retryDelay, withRetry } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { calculateTimeout, collectStream } from "./base.js";
export type { IGenerationService, IEmbeddingService, GenerateOptions } from "./base.js";
