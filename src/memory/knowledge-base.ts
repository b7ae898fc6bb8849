import type { IDebateKnowledgeBase, KnowledgeRecord, ToolUseRecord } from "./base.js";
import type { KnowledgeBaseStats, ToolName } from "../types.js";
import { Mutex } from "./mutex.js";
import { createLogger } from "../logger.js";

const log = createLogger("knowledge");

function emptyToolStats(): Record<ToolName, number> {
  return { search_own_works: 0, search_other_works: 0, recall_previous_round: 0, analyze_argument: 0 };
}

/**
 * In-memory knowledge base for one agentic debate.
 *
 * Every operation, reads included, runs inside the same Mutex, so a reader
 * never sees a round half-written and counters never race.
 */
export class SharedDebateKnowledgeBase implements IDebateKnowledgeBase {
  private readonly rounds = new Map<number, KnowledgeRecord[]>();
  private readonly toolUses = new Map<number, ToolUseRecord[]>();
  private readonly toolStats = emptyToolStats();
  private readonly lock = new Mutex();

  recordResponse(
    round: number,
    authorId: string,
    authorName: string,
    responseText: string,
    toolUses: number,
    reasoningSteps: number
  ): Promise<void> {
    return this.lock.runExclusive(() => {
      const records = this.rounds.get(round) ?? [];
      records.push(Object.freeze({
        authorId,
        authorName,
        responseText,
        toolUses,
        reasoningSteps,
        recordedAt: new Date().toISOString(),
      }));
      this.rounds.set(round, records);
      log.debug(`recorded response from ${authorName} in round ${round}`);
    });
  }

  recordToolUse(round: number, authorId: string, tool: ToolName): Promise<void> {
    return this.lock.runExclusive(() => {
      const uses = this.toolUses.get(round) ?? [];
      uses.push(Object.freeze({ authorId, tool, recordedAt: new Date().toISOString() }));
      this.toolUses.set(round, uses);
      this.toolStats[tool]++;
    });
  }

  getRound(round: number): Promise<readonly KnowledgeRecord[] | undefined> {
    return this.lock.runExclusive(() => {
      const records = this.rounds.get(round);
      return records ? [...records] : undefined;
    });
  }

  /** Tool calls logged for a round, in call order. */
  getToolUses(round: number): Promise<readonly ToolUseRecord[]> {
    return this.lock.runExclusive(() => [...(this.toolUses.get(round) ?? [])]);
  }

  getStats(): Promise<KnowledgeBaseStats> {
    return this.lock.runExclusive(() => {
      let totalResponses = 0;
      let totalToolUses = 0;
      for (const records of this.rounds.values()) {
        totalResponses += records.length;
        for (const r of records) totalToolUses += r.toolUses;
      }
      return {
        totalRounds: this.rounds.size,
        totalResponses,
        totalToolUses,
        toolStats: { ...this.toolStats },
      };
    });
  }
}
