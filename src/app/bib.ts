#!/usr/bin/env node
// bib CLI：把 .bib 渲染成 publications HTML 打到 stdout；日志一律走 stderr

import "dotenv/config";
import { formatBibOutput, runBibPipeline } from "../bib/index.js";
import { loadSiteConfig } from "../config/index.js";
import { InputNotFoundError } from "../errors/index.js";
import { errMessage, forceStderr, logger } from "../logger/index.js";


forceStderr();


async function main(): Promise<void> {
  const config = await loadSiteConfig();
  const result = await runBibPipeline(config.bib);
  process.stdout.write(formatBibOutput(result));
}


main().catch((err: unknown) => {
  if (err instanceof InputNotFoundError) {
    logger.error("app", `Error: ${err.path} not found`);
  } else {
    logger.error("app", "生成失败", { err: errMessage(err) });
  }
  process.exitCode = 1;
});
