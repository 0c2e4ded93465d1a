// RSS 拉取与解析：fetchText 取原文，rss-parser 解析 <item>，按 feed 顺序转为 EssayPost

import Parser from "rss-parser";
import type { EssaysConfig } from "../config/index.js";
import { fetchText } from "../fetcher/index.js";
import { logger } from "../logger/index.js";
import { decodeEntities, htmlToText } from "../utils/html.js";
import { formatDisplayDate } from "./date.js";
import type { EssayPost } from "./types.js";


const parser = new Parser<Record<string, unknown>, Record<string, unknown>>();


/** 从文章链接取 /p/ 后的路径段作为 slug；没有则 null */
export function slugFromLink(link: string): string | null {
  const m = /\/p\/([^/?#]+)/.exec(link);
  return m ? m[1] : null;
}


function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}


/** 解析 RSS 文本；缺失字段取空串，description 去标签并解码实体，日期解析失败留空 */
export async function parsePosts(xml: string): Promise<EssayPost[]> {
  const feed = await parser.parseString(xml);
  return (feed.items ?? []).map((item) => {
    const pubDate = str(item.pubDate);
    const date = formatDisplayDate(pubDate);
    if (pubDate && !date) {
      logger.debug("feed", "无法解析发布日期", { url: str(item.link), pubDate });
    }
    return {
      title: decodeEntities(str(item.title).trim()),
      link: str(item.link).trim(),
      description: htmlToText(str(item.content)),
      date,
      image: "",
    } satisfies EssayPost;
  });
}


/** 拉取并解析配置中的 feed；失败直接抛出，由入口决定退出码 */
export async function fetchFeed(config: EssaysConfig): Promise<EssayPost[]> {
  const xml = await fetchText(config.feedUrl, {
    userAgent: config.userAgent,
    timeoutMs: config.feedTimeoutMs,
    headers: { Accept: "application/rss+xml,application/xml,text/xml,*/*" },
  });
  return parsePosts(xml);
}
