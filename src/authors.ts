import type { AuthorConfig, Config } from "./config.js";
import type { Author } from "./types.js";
import { createLogger } from "./logger.js";

const log = createLogger("authors");

/** Immutable id → Author map, built once at startup and shared read-only. */
export type AuthorRegistry = ReadonlyMap<string, Author>;

export function describeVoice(voice: AuthorConfig["voice"]): string {
  const parts = [`tone: ${voice.tone}`, `vocabulary: ${voice.vocabulary}`, `perspective: ${voice.perspective}`];
  if (voice.styleNotes) parts.push(`style: ${voice.styleNotes}`);
  return parts.join("; ");
}

/**
 * Compose a system prompt from the author's identity and voice.
 * Used when the config does not carry an explicit systemPrompt.
 */
export function buildAuthorSystemPrompt(config: AuthorConfig): string {
  const lines = [
    `You are ${config.name}. Answer in the first person, as ${config.name} would have written.`,
    `Voice: ${describeVoice(config.voice)}.`,
  ];
  if (config.expertiseDomains.length > 0) {
    lines.push(`Your areas of expertise: ${config.expertiseDomains.join(", ")}.`);
  }
  if (config.works.length > 0) {
    lines.push(`Your major works include: ${config.works.join(", ")}.`);
  }
  if (config.bio) {
    lines.push(`Background: ${config.bio}`);
  }
  lines.push(
    "Stay within the ideas and knowledge available to you in your lifetime. " +
    "Do not mention that you are an AI or a simulation."
  );
  return lines.join("\n");
}

export function createAuthor(config: AuthorConfig, expertiseVector?: readonly number[]): Author {
  return Object.freeze({
    id: config.id,
    displayName: config.name,
    expertiseDomains: new Set(config.expertiseDomains),
    voiceDescriptor: describeVoice(config.voice),
    systemPrompt: config.systemPrompt ?? buildAuthorSystemPrompt(config),
    expertiseVector: expertiseVector ? Object.freeze([...expertiseVector]) : undefined,
  });
}

/**
 * Build the author registry from config. Duplicate ids keep the first definition.
 */
export function loadAuthors(config: Pick<Config, "authors">): AuthorRegistry {
  const registry = new Map<string, Author>();
  for (const entry of config.authors) {
    if (registry.has(entry.id)) {
      log.warn(`duplicate author id "${entry.id}" ignored`);
      continue;
    }
    registry.set(entry.id, createAuthor(entry));
  }
  log.info("loaded", registry.size, "authors");
  return registry;
}

/**
 * Resolve ids to Author objects, preserving order.
 * Unknown ids are returned separately so the caller decides whether that is fatal.
 */
export function resolveAuthors(
  ids: readonly string[],
  registry: AuthorRegistry
): { authors: Author[]; missing: string[] } {
  const authors: Author[] = [];
  const missing: string[] = [];
  for (const id of ids) {
    const author = registry.get(id);
    if (author) {
      authors.push(author);
    } else {
      missing.push(id);
    }
  }
  return { authors, missing };
}
