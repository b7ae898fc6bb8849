export { ResponseCache, normalizeQueryText } from "./response-cache.js";
export type { CacheSettings, CacheStats } from "./response-cache.js";
