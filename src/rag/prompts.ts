/**
 * Prompt templates for grounded answers, debate rounds and agent tools.
 *
 * Every user-facing template restates the three-paragraph limit; the
 * author's system prompt carries the voice.
 */

import type { AuthorResponse, ScoredChunk } from "../types.js";

export const NO_CONTEXT = "No relevant context found.";

export const LENGTH_CONSTRAINT = "Limit your response to a maximum of 3 paragraphs.";

/** Source label for a chunk: metadata.book, else metadata.source. */
function sourceLabel(chunk: ScoredChunk["chunk"]): string | undefined {
  const label = chunk.metadata["book"] ?? chunk.metadata["source"];
  return label === undefined ? undefined : String(label);
}

/**
 * Numbered excerpt block: `[1] (from <book>): text`, separated by blank lines.
 * Returns NO_CONTEXT when nothing was retrieved.
 */
export function buildContext(chunks: readonly ScoredChunk[]): string {
  if (chunks.length === 0) return NO_CONTEXT;
  return chunks
    .map(({ chunk }, i) => {
      const label = sourceLabel(chunk);
      return `[${i + 1}]${label ? ` (from ${label})` : ""}: ${chunk.text}`;
    })
    .join("\n\n");
}

export function buildRagPrompt(queryText: string, context: string): string {
  return [
    "Based on the following excerpts from your works, please respond to the user's query.",
    "",
    "RELEVANT EXCERPTS:",
    context,
    "",
    "USER QUERY:",
    queryText,
    "",
    `Please provide a response in your characteristic voice and style. ${LENGTH_CONSTRAINT} ` +
      "Focus on directly addressing the query while drawing from the provided context.",
  ].join("\n");
}

function otherPerspectives(others: readonly AuthorResponse[], heading: string): string[] {
  if (others.length === 0) {
    return ["No other thinker responded in the previous round.", ""];
  }
  const lines = [heading, ""];
  others.forEach((r, i) => {
    lines.push(`${i + 1}. ${r.authorName} said:`);
    lines.push(`"${r.responseText}"`);
    lines.push("");
  });
  return lines;
}

const RESPONSE_OPTIONS = [
  "- Critique or challenge their arguments",
  "- Build upon their ideas",
  "- Highlight where you agree or disagree",
  "- Offer your own distinct perspective",
];

/**
 * Round k >= 2 prompt. `others` must already exclude the addressed author's
 * own previous response.
 */
export function buildDebatePrompt(queryText: string, others: readonly AuthorResponse[]): string {
  return [
    `The original question was: ${queryText}`,
    "",
    ...otherPerspectives(others, "Other thinkers have provided the following perspectives:"),
    others.length > 0
      ? "Now, please respond to these perspectives. You may:"
      : "Now, please develop your position further. You may:",
    ...RESPONSE_OPTIONS,
    "",
    `Respond in your characteristic voice and style. ${LENGTH_CONSTRAINT} ` +
      "Be direct and substantive in engaging with the other viewpoints.",
  ].join("\n");
}

export function buildAnalysisPrompt(argumentText: string, authorName: string): string {
  return [
    `Analyze this argument from ${authorName}:`,
    "",
    `"${argumentText}"`,
    "",
    "Provide a brief analysis identifying:",
    "1. The main claim",
    "2. Key supporting points",
    "3. Potential weaknesses or areas for critique",
    "4. Points of agreement with your own perspective",
    "",
    "Keep your analysis to 2-3 sentences.",
  ].join("\n");
}

export interface AgenticPromptInput {
  queryText: string;
  roundNumber: number;
  others: readonly AuthorResponse[];
  reasoningChain: readonly string[];
  passages: readonly ScoredChunk[];
}

/** Final prompt of an agent's turn: passages, reasoning chain, then the other voices. */
export function buildAgenticPrompt(input: AgenticPromptInput): string {
  const { queryText, roundNumber, others, reasoningChain, passages } = input;
  const lines = [`The original question was: ${queryText}`, ""];

  lines.push("Passages from your works:", buildContext(passages), "");

  if (reasoningChain.length > 0) {
    lines.push("Your internal reasoning process:");
    reasoningChain.forEach((step, i) => lines.push(`  ${i + 1}. ${step}`));
    lines.push("");
  }

  if (roundNumber <= 1) {
    lines.push(
      "Provide your initial perspective on this question.",
      "Draw from your works and philosophy.",
      LENGTH_CONSTRAINT,
    );
    return lines.join("\n");
  }

  lines.push(...otherPerspectives(others, "Other thinkers have provided these perspectives:"));
  lines.push(
    others.length > 0 ? "Now respond to these perspectives. You may:" : "Now develop your position further. You may:",
    ...RESPONSE_OPTIONS,
    "",
    "Use your characteristic voice and style.",
    LENGTH_CONSTRAINT,
    "Be direct and substantive in engaging with the other viewpoints.",
  );
  return lines.join("\n");
}
