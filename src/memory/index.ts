export type { IDebateKnowledgeBase, KnowledgeRecord, ToolUseRecord } from "./base.js";
export { SharedDebateKnowledgeBase } from "./knowledge-base.js";
export { Mutex } from "./mutex.js";
