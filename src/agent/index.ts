export { DebateAgent } from "./debate-agent.js";
export type { AgentSettings, DebateAgentOptions, TurnOptions } from "./debate-agent.js";
