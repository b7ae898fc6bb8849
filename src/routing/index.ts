export { SemanticRouter } from "./semantic-router.js";
export type { AuthorRanking, RouterSettings } from "./semantic-router.js";
export { cosineSimilarity, rankByScore } from "./similarity.js";
