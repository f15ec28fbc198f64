export { createListCommand } from "./list.js";
export { createPrioritizeCommand } from "./prioritize.js";
export { createRecommendCommand } from "./recommend.js";
export { createAssignedCommand } from "./assigned.js";
export { createAnalyzeCommand } from "./analyze.js";
export { createCommentCommand } from "./comment.js";
export { createRateLimitCommand } from "./rate-limit.js";
