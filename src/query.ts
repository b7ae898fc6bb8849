import { z } from "zod";
import type { Config } from "./config.js";
import type { Query } from "./types.js";
import { ValidationError } from "./errors.js";

/** Caller-facing query input; anything omitted comes from config.router. */
export const QueryInputSchema = z.object({
  text: z.string(),
  explicitAuthors: z.array(z.string().min(1)).optional(),
  minAuthors: z.number().int().min(1).max(10).optional(),
  maxAuthors: z.number().int().min(1).max(10).optional(),
  relevanceThreshold: z.number().min(0).max(1).optional(),
});

export type QueryInput = z.input<typeof QueryInputSchema>;

export type QueryDefaults = Pick<Config["router"], "minAuthors" | "maxAuthors" | "relevanceThreshold">;

/**
 * Validate a query and fill in router defaults.
 * Throws ValidationError for empty text, min > max, or more explicit authors than maxAuthors.
 */
export function createQuery(input: QueryInput, defaults: QueryDefaults): Query {
  const parsed = QueryInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid query: ${issue.path.join(".") || "input"}: ${issue.message}`);
  }

  const text = parsed.data.text.trim();
  if (!text) {
    throw new ValidationError("Query text cannot be empty");
  }

  const minAuthors = parsed.data.minAuthors ?? defaults.minAuthors;
  const maxAuthors = parsed.data.maxAuthors ?? defaults.maxAuthors;
  if (minAuthors > maxAuthors) {
    throw new ValidationError(`minAuthors (${minAuthors}) must be <= maxAuthors (${maxAuthors})`);
  }

  let explicitAuthors: string[] | undefined;
  if (parsed.data.explicitAuthors && parsed.data.explicitAuthors.length > 0) {
    explicitAuthors = [...new Set(parsed.data.explicitAuthors)];
    if (explicitAuthors.length > maxAuthors) {
      throw new ValidationError(
        `${explicitAuthors.length} authors requested but maxAuthors is ${maxAuthors}`
      );
    }
  }

  return Object.freeze({
    text,
    explicitAuthors,
    minAuthors,
    maxAuthors,
    relevanceThreshold: parsed.data.relevanceThreshold ?? defaults.relevanceThreshold,
  });
}
