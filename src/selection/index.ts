// 精选文章：按配置的 slug 顺序挑出文章；feed 中缺失的 slug 直接抓文章页，用 og:title/og:description 兜底

import type { EssaysConfig } from "../config/index.js";
import { extractOpenGraph } from "../extractor/index.js";
import { slugFromLink } from "../feed/index.js";
import type { EssayPost } from "../feed/index.js";
import { fetchText } from "../fetcher/index.js";
import { errMessage, logger } from "../logger/index.js";
import type { Pacer } from "../utils/pace.js";


export type SelectionConfig = Pick<EssaysConfig, "selectedSlugs" | "postUrlBase" | "pageTimeoutMs" | "userAgent">;


/** slug → post；slug 重复时后者覆盖前者，取不到 slug 的文章不进索引 */
export function indexBySlug(posts: readonly EssayPost[]): Map<string, EssayPost> {
  const map = new Map<string, EssayPost>();
  for (const post of posts) {
    const slug = slugFromLink(post.link);
    if (slug) map.set(slug, post);
  }
  return map;
}


export function postUrlForSlug(slug: string, postUrlBase: string): string {
  return `${postUrlBase}${encodeURIComponent(slug)}`;
}


/** 直接抓文章页合成 EssayPost（date 为空）；失败返回 null */
export async function fetchPostBySlug(slug: string, config: SelectionConfig): Promise<EssayPost | null> {
  const link = postUrlForSlug(slug, config.postUrlBase);
  try {
    const html = await fetchText(link, { userAgent: config.userAgent, timeoutMs: config.pageTimeoutMs });
    const og = extractOpenGraph(html);
    return {
      title: og.title ?? slug,
      link,
      description: og.description ?? "",
      date: "",
      image: "",
    };
  } catch (err) {
    logger.warn("selection", "精选文章回源失败，跳过", { slug, url: link, err: errMessage(err) });
    return null;
  }
}


/**
 * 解析精选列表。
 * feed 中没有的 slug 会回源抓取，抓到的文章追加到 posts 末尾（之后同样参与配图与全量列表）。
 * 返回值严格按 selectedSlugs 顺序，仍未解析到的 slug 直接省略。
 */
export async function resolveSelection(posts: EssayPost[], config: SelectionConfig, pacer: Pacer): Promise<EssayPost[]> {
  const bySlug = indexBySlug(posts);
  const attempted = new Set<string>();
  for (const slug of config.selectedSlugs) {
    if (bySlug.has(slug) || attempted.has(slug)) continue;
    attempted.add(slug);
    logger.info("selection", `feed 中缺少精选文章，回源抓取: ${slug}`);
    await pacer.wait();
    const post = await fetchPostBySlug(slug, config);
    if (post) {
      posts.push(post);
      bySlug.set(slug, post);
    }
  }
  return config.selectedSlugs.flatMap((slug) => {
    const post = bySlug.get(slug);
    return post ? [post] : [];
  });
}
