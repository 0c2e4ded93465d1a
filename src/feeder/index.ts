// Feeder：essays 管线入口，与 CLI 解耦

export { buildRegions, runEssaysPipeline } from "./feeder.js";
export type { EssaysResult } from "./types.js";
