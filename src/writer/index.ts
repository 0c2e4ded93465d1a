// 写文件：读取目标 HTML，标记全部找到后才写回；缺标记时原文件不动

import { readFile, writeFile } from "node:fs/promises";
import { InputNotFoundError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { spliceRegions } from "./splice.js";
import type { MarkerRegion, SpliceResult } from "./types.js";

export { spliceRegion, spliceRegions } from "./splice.js";
export { renderEssayCard, renderEssayCards } from "./cards.js";
export { ESSAYS_MARKERS, SELECTED_MARKERS } from "./types.js";
export type { MarkerPair, MarkerRegion, SpliceResult } from "./types.js";


/** 替换文件中的标记区域；目标文件不存在抛 InputNotFoundError */
export async function updateMarkedFile(path: string, regions: readonly MarkerRegion[], indent: string): Promise<SpliceResult> {
  let doc: string;
  try {
    doc = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") throw new InputNotFoundError(path);
    throw err;
  }
  const result = spliceRegions(doc, regions, indent);
  if (!result.ok) {
    logger.error("writer", `未找到标记，未写入 ${path}`, { missing: result.missing });
    return result;
  }
  await writeFile(path, result.content, "utf-8");
  logger.debug("writer", "已写入", { path, regions: regions.length });
  return result;
}
