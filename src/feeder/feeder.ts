// Feeder：拉 feed → 解析精选 → 逐篇抓配图 → 渲染卡片 → 一次性替换目标文件中的标记区

import { resolveFromCwd } from "../config/index.js";
import type { EssaysConfig } from "../config/index.js";
import { resolveImages } from "../extractor/index.js";
import { fetchFeed } from "../feed/index.js";
import type { EssayPost } from "../feed/index.js";
import { logger } from "../logger/index.js";
import { resolveSelection } from "../selection/index.js";
import { createPacer } from "../utils/pace.js";
import type { Pacer } from "../utils/pace.js";
import { ESSAYS_MARKERS, SELECTED_MARKERS, renderEssayCards, updateMarkedFile } from "../writer/index.js";
import type { MarkerRegion } from "../writer/index.js";
import type { EssaysResult } from "./types.js";


/** 两区模式：SELECTED 在前、ESSAYS 在后；singleRegion 时只有 ESSAYS */
export function buildRegions(posts: readonly EssayPost[], selected: readonly EssayPost[], singleRegion: boolean): MarkerRegion[] {
  const essays: MarkerRegion = { ...ESSAYS_MARKERS, body: renderEssayCards(posts) };
  if (singleRegion) return [essays];
  return [{ ...SELECTED_MARKERS, body: renderEssayCards(selected) }, essays];
}


/** 执行 essays 管线；feed 拉取失败直接抛出，单篇配图或精选回源失败只记 warn */
export async function runEssaysPipeline(config: EssaysConfig, pacer: Pacer = createPacer(config.politeDelayMs)): Promise<EssaysResult> {
  logger.info("feed", "拉取 RSS feed", { url: config.feedUrl });
  const posts = await fetchFeed(config);
  logger.info("feed", `解析到 ${posts.length} 篇文章`);

  const selected = config.singleRegion ? [] : await resolveSelection(posts, config, pacer);
  if (!config.singleRegion) {
    logger.info("selection", `精选 ${selected.length}/${config.selectedSlugs.length} 篇`);
  }

  logger.info("image", "逐篇抓取 og:image");
  await resolveImages(posts, config, pacer);

  const path = resolveFromCwd(config.targetPath);
  logger.info("writer", `更新 ${path}`);
  const result = await updateMarkedFile(path, buildRegions(posts, selected, config.singleRegion), config.indent);
  return {
    posts,
    selected,
    written: result.ok,
    missing: result.ok ? [] : result.missing,
  };
}
