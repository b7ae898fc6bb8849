import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { homedir } from "node:os";

// --- Schemas ---

export const VoiceSchema = z.object({
  tone: z.string().describe("Overall tone (e.g. 'analytical, critical')"),
  vocabulary: z.string().describe("Characteristic vocabulary"),
  perspective: z.string().describe("Philosophical or analytical stance"),
  styleNotes: z.string().optional(),
});

export const AuthorConfigSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/, "author id must be lowercase alphanumeric, '_' or '-'"),
  name: z.string().min(1),
  expertiseDomains: z.array(z.string()).default([]),
  voice: VoiceSchema,
  /** Full system prompt. Composed from name + voice when omitted. */
  systemPrompt: z.string().optional(),
  bio: z.string().optional(),
  works: z.array(z.string()).default([]),
});

const ProviderBase = {
  model: z.string(),
  endpoint: z.string().url(),
  /** Literal API key. Prefer apiKeyEnv so secrets stay out of the config file. */
  apiKey: z.string().optional(),
  /** Name of the environment variable holding the API key. */
  apiKeyEnv: z.string().optional(),
};

export const GenerationConfigSchema = z.object({
  type: z.enum(["openai-compat", "ollama"]).default("ollama"),
  ...ProviderBase,
  model: ProviderBase.model.default("llama3"),
  endpoint: ProviderBase.endpoint.default("http://localhost:11434"),
});

export const EmbeddingConfigSchema = z.object({
  type: z.enum(["openai-compat", "ollama"]).default("ollama"),
  ...ProviderBase,
  model: ProviderBase.model.default("nomic-embed-text"),
  endpoint: ProviderBase.endpoint.default("http://localhost:11434"),
  dimension: z.number().int().min(1).default(768),
});

const RoundSettingsSchema = z.object({
  maxTokens: z.number().int().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export const ConfigSchema = z.object({
  /** User identifier. Determines the data directory: data/<user>/. */
  user: z.string().default("default"),

  router: z
    .object({
      relevanceThreshold: z.number().min(0).max(1).default(0.7),
      minAuthors: z.number().int().min(1).max(10).default(2),
      maxAuthors: z.number().int().min(1).max(10).default(5),
      /** Take the top-scoring authors when too few clear the threshold. */
      fallbackToTopAuthors: z.boolean().default(true),
    })
    .default({})
    .refine((r) => r.minAuthors <= r.maxAuthors, { message: "router.minAuthors must be <= router.maxAuthors" }),

  rag: z
    .object({
      topKChunks: z.number().int().min(1).max(20).default(5),
      maxResponseTokens: z.number().int().min(50).max(1000).default(300),
      temperature: z.number().min(0).max(2).default(0.7),
    })
    .default({}),

  debate: z
    .object({
      defaultRounds: z.number().int().min(1).default(2),
      /** Upper bound accepted by DebatePanel.debate(). */
      maxRounds: z.number().int().min(1).max(10).default(5),
      roundOverrides: z
        .object({
          rebuttal: RoundSettingsSchema.default({}),
          response: RoundSettingsSchema.default({}),
        })
        .default({}),
      agentic: z
        .object({
          maxResponseTokens: z.number().int().min(50).max(2000).default(400),
          analysisMaxTokens: z.number().int().min(20).max(1000).default(200),
        })
        .default({}),
    })
    .default({}),

  timeouts: z
    .object({
      embeddingMs: z.number().int().min(1).default(10_000),
      searchMs: z.number().int().min(1).default(10_000),
      generationMs: z.number().int().min(1).default(30_000),
    })
    .default({}),

  retry: z
    .object({
      maxRetries: z.number().int().min(0).max(10).default(3),
      baseDelayMs: z.number().int().min(0).default(2000),
    })
    .default({}),

  generation: GenerationConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),

  vectorStore: z
    .object({
      path: z.string().default("./data/colloquy.db"),
    })
    .default({}),

  authors: z.array(AuthorConfigSchema).default([]),

  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttlSeconds: z.number().int().min(0).max(86_400).default(3600),
      similarityThreshold: z.number().min(0).max(1).default(0.95),
      maxEntries: z.number().int().min(1).default(1000),
    })
    .default({}),

  logging: z
    .object({
      info: z.object({
        purge: z.enum(["date", "size"]).default("date"),
        maxDays: z.number().int().min(1).default(30),
        maxBytes: z.number().int().min(0).default(50 * 1024 * 1024),
      }).default({}),
      sessions: z.object({
        purge: z.enum(["count", "date", "size"]).default("count"),
        maxFiles: z.number().int().min(1).default(50),
        maxDays: z.number().int().min(1).default(14),
        maxBytes: z.number().int().min(0).default(100 * 1024 * 1024),
      }).default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AuthorConfig = z.infer<typeof AuthorConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type RetryConfig = Config["retry"];
export type TimeoutConfig = Config["timeouts"];

/** Resolve the API key for a provider: literal value first, then the named env var. */
export function resolveApiKey(provider: { apiKey?: string; apiKeyEnv?: string }): string | undefined {
  if (provider.apiKey) return provider.apiKey;
  if (provider.apiKeyEnv) return process.env[provider.apiKeyEnv] || undefined;
  return undefined;
}

/** Directory where the loaded config file was found (null if defaults used). */
let loadedConfigDir: string | null = null;

/** Reset loadedConfigDir to null. Exported for testing only. */
export function resetLoadedConfigDir(): void {
  loadedConfigDir = null;
}

/**
 * Base data directory for a user.
 * - If a config file was loaded: <configDir>/data/<user>/
 * - Otherwise: XDG_DATA_HOME/colloquy/<user> (fallback ~/.local/share/colloquy/<user>)
 */
export function getUserDataDir(config: Config): string {
  if (loadedConfigDir) {
    return resolve(loadedConfigDir, "data", config.user);
  }
  const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
  return resolve(xdg, "colloquy", config.user);
}

// --- Loader ---

const CONFIG_FILENAMES = ["colloquy.config.json", ".colloquyrc.json"];

function parseFile(path: string): Config {
  loadedConfigDir = dirname(resolve(path));
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return ConfigSchema.parse(raw);
}

export function loadConfig(explicitPath?: string): Config {
  if (explicitPath) {
    return parseFile(explicitPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const fullPath = resolve(process.cwd(), filename);
    if (existsSync(fullPath)) {
      return parseFile(fullPath);
    }
  }

  // No config file found: defaults (XDG path via getUserDataDir)
  loadedConfigDir = null;
  return ConfigSchema.parse({});
}
