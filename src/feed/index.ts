// feed：RSS → EssayPost[]

export { fetchFeed, parsePosts, slugFromLink } from "./rss.js";
export { formatDisplayDate } from "./date.js";
export type { EssayPost } from "./types.js";
