// 站点配置加载：读取 site.config.json（可缺省），环境变量覆盖，zod 校验并补默认值

import { readFile } from "node:fs/promises";
import { ConfigError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { siteConfigPath } from "./paths.js";
import { SiteConfigSchema } from "./types.js";
import type { SiteConfig } from "./types.js";

export { resolveFromCwd, siteConfigPath } from "./paths.js";
export type { BibConfig, EssaysConfig, HighlightAuthor, SiteConfig } from "./types.js";


/** 读 JSON 配置文件；文件不存在返回 {}，其余读取或解析错误抛 ConfigError */
async function readConfigFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.debug("config", "未找到配置文件，使用默认值", { path });
      return {};
    }
    throw new ConfigError(`读取配置失败 ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`配置不是合法 JSON ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}


function isRecord(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v);
}


/** 环境变量覆盖：BIB_PATH / ESSAYS_FILE / FEED_URL / SELECTED_SLUGS（逗号分隔） */
export function applyEnvOverrides(input: unknown, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const root = isRecord(input) ? { ...input } : {};
  const bib = isRecord(root.bib) ? { ...root.bib } : {};
  const essays = isRecord(root.essays) ? { ...root.essays } : {};
  if (env.BIB_PATH) bib.path = env.BIB_PATH;
  if (env.ESSAYS_FILE) essays.targetPath = env.ESSAYS_FILE;
  if (env.FEED_URL) essays.feedUrl = env.FEED_URL;
  if (env.SELECTED_SLUGS) {
    essays.selectedSlugs = env.SELECTED_SLUGS.split(",").map((s) => s.trim()).filter(Boolean);
  }
  return { ...root, bib, essays };
}


/** 校验原始配置对象；错误信息带上出错字段路径 */
export function parseSiteConfig(input: unknown, source = "<inline>"): SiteConfig {
  const result = SiteConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`配置校验失败 ${source}: ${detail}`);
  }
  return result.data;
}


/** 加载最终配置：文件 → 环境变量覆盖 → 校验 */
export async function loadSiteConfig(path: string = siteConfigPath()): Promise<SiteConfig> {
  const fromFile = await readConfigFile(path);
  return parseSiteConfig(applyEnvOverrides(fromFile), path);
}
