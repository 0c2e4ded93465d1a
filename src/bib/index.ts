// 文献管线：读 .bib → 解析 → 按年份排序 → 渲染 HTML

import { readFile } from "node:fs/promises";
import { resolveFromCwd } from "../config/index.js";
import type { BibConfig } from "../config/index.js";
import { InputNotFoundError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { parseBibtex, sortByYearDesc } from "./parser.js";
import { renderPublications } from "./render.js";
import type { BibResult } from "./types.js";

export { parseBibtex, parseEntry, readField, readFields, sortByYearDesc } from "./parser.js";
export { highlightAuthor, publicationLink, renderPublication, renderPublications, venueLine } from "./render.js";
export { cleanLatex, unescapeLatex, LATEX_ESCAPES } from "./latex.js";
export type { BibResult, Publication } from "./types.js";


async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new InputNotFoundError(path);
    }
    throw err;
  }
}


/** 由 .bib 文本生成结果，不读文件 */
export function buildBibResult(source: string, config: BibConfig): BibResult {
  const publications = sortByYearDesc(parseBibtex(source));
  const html = renderPublications(publications, config.highlightAuthor);
  return { html, count: publications.length, publications };
}


/** 读取配置中的 .bib 文件并渲染；文件缺失抛 InputNotFoundError */
export async function runBibPipeline(config: BibConfig): Promise<BibResult> {
  const path = resolveFromCwd(config.path);
  const source = await readSource(path);
  const result = buildBibResult(source, config);
  logger.debug("bib", "文献解析完成", { path, count: result.count });
  return result;
}


/** CLI 输出：HTML 后空两行，再附条目数注释 */
export function formatBibOutput(result: BibResult): string {
  return `${result.html}\n\n\n<!-- Generated ${result.count} publications -->\n`;
}
