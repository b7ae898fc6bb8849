/**
 * Response aggregation and formatting.
 *
 * aggregate() wraps one round of responses into a DebateSession; the
 * formatters render any session (single round or full debate) for display.
 */

import { randomUUID } from "node:crypto";
import type { AuthorResponse, DebateSession, Query, SelectionMethod } from "./types.js";
import { createLogger } from "./logger.js";

const log = createLogger("aggregator");

/** Sort by relevance, highest first. Ties keep input order. */
export function sortByRelevance(responses: readonly AuthorResponse[]): AuthorResponse[] {
  return [...responses].sort((a, b) => b.relevanceScore - a.relevanceScore);
}

export function aggregate(
  query: Query,
  responses: readonly AuthorResponse[],
  totalTimeMs: number,
  method: SelectionMethod
): DebateSession {
  const sorted = sortByRelevance(responses);
  log.info(`aggregated ${sorted.length} responses (total_time=${Math.round(totalTimeMs)}ms)`);
  return Object.freeze({
    id: randomUUID(),
    query,
    rounds: [Object.freeze({ roundNumber: 1, roundType: "initial" as const, responses: sorted })],
    totalTimeMs,
    selectionMethod: method,
    mode: "single" as const,
  });
}

function authorCount(session: DebateSession): number {
  const ids = new Set<string>();
  for (const round of session.rounds) {
    for (const r of round.responses) ids.add(r.authorId);
  }
  return ids.size;
}

function panelLine(session: DebateSession): string {
  const mode = session.mode === "agentic" ? ", agentic" : "";
  return `${authorCount(session)} authors (${session.selectionMethod} selection${mode})`;
}

export function formatAsMarkdown(session: DebateSession): string {
  const multiRound = session.rounds.length > 1;
  const lines = [
    "# Debate Panel",
    "",
    `**Query:** ${session.query.text}`,
    "",
    `**Panel:** ${panelLine(session)}`,
    "",
    "---",
    "",
  ];

  for (const round of session.rounds) {
    if (multiRound) {
      lines.push(`## Round ${round.roundNumber}: ${round.roundType}`, "");
    }
    const heading = multiRound ? "###" : "##";
    round.responses.forEach((r, i) => {
      lines.push(`${heading} ${i + 1}. ${r.authorName}`);
      lines.push(`*Relevance: ${r.relevanceScore.toFixed(2)}*`, "");
      lines.push(r.responseText, "", "---", "");
    });
  }

  lines.push(`*Generated in ${Math.round(session.totalTimeMs)}ms*`);
  return lines.join("\n");
}

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);

export function formatAsPlainText(session: DebateSession): string {
  const multiRound = session.rounds.length > 1;
  const lines = [RULE, "DEBATE PANEL", RULE, "", `Query: ${session.query.text}`, `Panel: ${panelLine(session)}`, THIN_RULE];

  for (const round of session.rounds) {
    if (multiRound) {
      lines.push("", `ROUND ${round.roundNumber} (${round.roundType.toUpperCase()})`, THIN_RULE);
    }
    round.responses.forEach((r, i) => {
      lines.push("", `[${i + 1}] ${r.authorName.toUpperCase()}`);
      lines.push(`Relevance: ${r.relevanceScore.toFixed(2)}`, "");
      lines.push(r.responseText, "", THIN_RULE);
    });
  }

  lines.push("", `Generated in ${Math.round(session.totalTimeMs)}ms`, RULE);
  return lines.join("\n");
}

const MAX_POSITION_LENGTH = 80;

/** First sentence of a response, cut to 80 characters. */
export function keyPosition(text: string): string {
  const first = text.split(".")[0].replace(/\s+/g, " ").trim();
  if (first.length <= MAX_POSITION_LENGTH) return first;
  return first.slice(0, MAX_POSITION_LENGTH - 3) + "...";
}

/** Markdown table of each author's opening position (round 1). */
export function createComparisonTable(session: DebateSession): string {
  const lines = [
    "## Author Comparison",
    "",
    "| Author | Relevance | Key Position |",
    "|--------|-----------|--------------|",
  ];
  for (const r of session.rounds[0]?.responses ?? []) {
    const position = keyPosition(r.responseText).replace(/\|/g, "\\|");
    lines.push(`| ${r.authorName} | ${r.relevanceScore.toFixed(2)} | ${position} |`);
  }
  return lines.join("\n");
}
