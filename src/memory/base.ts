/**
 * Shared debate knowledge base interface.
 *
 * One instance per agentic debate session, written concurrently by every
 * author's agent. Records are keyed by round number; tool calls are counted
 * per tool as they happen.
 */

import type { KnowledgeBaseStats, ToolName } from "../types.js";

export interface KnowledgeRecord {
  readonly authorId: string;
  readonly authorName: string;
  readonly responseText: string;
  /** Tool calls the agent made during this turn. */
  readonly toolUses: number;
  readonly reasoningSteps: number;
  /** ISO timestamp. */
  readonly recordedAt: string;
}

export interface ToolUseRecord {
  readonly authorId: string;
  readonly tool: ToolName;
  readonly recordedAt: string;
}

export interface IDebateKnowledgeBase {
  recordResponse(
    round: number,
    authorId: string,
    authorName: string,
    responseText: string,
    toolUses: number,
    reasoningSteps: number
  ): Promise<void>;

  recordToolUse(round: number, authorId: string, tool: ToolName): Promise<void>;

  /** Records for a round, in write order; undefined when nothing was recorded. */
  getRound(round: number): Promise<readonly KnowledgeRecord[] | undefined>;

  getStats(): Promise<KnowledgeBaseStats>;
}
