#!/usr/bin/env node
// essays CLI：拉 RSS，重新生成 essays.html 中的精选区与全量列表区

import "dotenv/config";
import { loadSiteConfig } from "../config/index.js";
import { runEssaysPipeline } from "../feeder/index.js";
import { errMessage, logger } from "../logger/index.js";


async function main(): Promise<void> {
  const config = await loadSiteConfig();
  const result = await runEssaysPipeline(config.essays);
  if (result.written) {
    logger.info("app", "完成", { posts: result.posts.length, selected: result.selected.length });
    return;
  }
  logger.error("app", `更新失败，请检查 ${config.essays.targetPath} 中的标记`, { missing: result.missing });
  process.exitCode = 1;
}


main().catch((err: unknown) => {
  logger.error("app", "运行失败", { err: errMessage(err) });
  process.exitCode = 1;
});
