/**
 * Colloquy public API.
 *
 * Re-exports the panel, its components and the backend implementations for
 * use as a library. Most hosts only need loadConfig() and DebatePanel.create().
 */

// --- Panel ---
export { DebatePanel } from "./panel.js";
export type { PanelDeps, DebateOptions, CreatePanelOptions } from "./panel.js";

// --- Data model ---
export { roundTypeFor, toChunkRef } from "./types.js";
export type {
  Vector,
  Author,
  Query,
  SelectionMethod,
  AuthorSelectionResult,
  ChunkMetadata,
  TextChunk,
  ScoredChunk,
  ChunkRef,
  AuthorResponse,
  RoundType,
  DebateRound,
  DebateMode,
  DebateSession,
  ToolName,
  KnowledgeBaseStats,
} from "./types.js";
export { createQuery, QueryInputSchema } from "./query.js";
export type { QueryInput, QueryDefaults } from "./query.js";
export { loadAuthors, createAuthor, resolveAuthors, buildAuthorSystemPrompt } from "./authors.js";
export type { AuthorRegistry } from "./authors.js";

// --- Components ---
export { SemanticRouter, cosineSimilarity } from "./routing/index.js";
export type { AuthorRanking, RouterSettings } from "./routing/index.js";
export { RagResponder, buildContext, buildRagPrompt, buildDebatePrompt, NO_CONTEXT } from "./rag/index.js";
export type { RagSettings } from "./rag/index.js";
export {
  aggregate, formatAsMarkdown, formatAsPlainText, createComparisonTable,
} from "./aggregator.js";
export { DebateOrchestrator } from "./orchestrator.js";
export type { DebateRunOptions, GenerationSettings } from "./orchestrator.js";
export { AgenticDebateOrchestrator } from "./agentic-orchestrator.js";
export type { AgenticRunOptions, AgenticOrchestratorDeps } from "./agentic-orchestrator.js";
export { DebateAgent } from "./agent/index.js";
export type { AgentSettings, TurnOptions } from "./agent/index.js";
export { SharedDebateKnowledgeBase, Mutex } from "./memory/index.js";
export type { IDebateKnowledgeBase, KnowledgeRecord } from "./memory/index.js";
export { ResponseCache } from "./cache/index.js";
export type { CacheStats } from "./cache/index.js";

// --- Backends ---
export {
  createGenerationService,
  createEmbeddingService,
  OllamaGenerator,
  OllamaEmbedder,
  OpenAICompatGenerator,
  OpenAICompatEmbedder,
  retryDelay,
  withRetry,
} from "./adapters/index.js";
export type { IGenerationService, IEmbeddingService, GenerateOptions, RetryPolicy } from "./adapters/index.js";
export { InMemoryVectorStore, SqliteVectorStore } from "./store/index.js";
export type { IVectorStore } from "./store/index.js";

// --- Errors ---
export {
  PanelError,
  ValidationError,
  RetrievalError,
  TimeoutError,
  ProviderError,
  NoRelevantAuthorsError,
  GenerationFailedError,
} from "./errors.js";
export type { PanelErrorCode } from "./errors.js";

// --- Config & logging ---
export { loadConfig, getUserDataDir, ConfigSchema } from "./config.js";
export type { Config, AuthorConfig, GenerationConfig, EmbeddingConfig } from "./config.js";
export { createLogger, setLogLevel, initFileLogging } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
