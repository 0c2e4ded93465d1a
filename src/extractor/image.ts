// 配图解析：抓文章页 og:image，从中找出原图存储 URL，拼上 CDN 缩放前缀

import type { EssaysConfig } from "../config/index.js";
import type { EssayPost } from "../feed/index.js";
import { fetchText } from "../fetcher/index.js";
import { errMessage, logger } from "../logger/index.js";
import { escapeRegExp } from "../utils/html.js";
import type { Pacer } from "../utils/pace.js";
import { extractOpenGraph } from "./og.js";


export type ImageConfig = Pick<EssaysConfig, "cdnPrefix" | "imageBucketPrefix" | "pageTimeoutMs" | "userAgent">;


/** 宽松 URL 解码：逐段解码 %XX 序列，非法序列原样保留 */
export function lenientDecodeUri(s: string): string {
  return s.replace(/(?:%[0-9a-f]{2})+/gi, (seq) => {
    try {
      return decodeURIComponent(seq);
    } catch {
      return seq;
    }
  });
}


/** og:image → CDN 缩略图 URL；og:image 中找不到存储 URL 时返回空串，不回退到原始 URL */
export function toCdnImageUrl(ogImage: string, config: Pick<EssaysConfig, "cdnPrefix" | "imageBucketPrefix">): string {
  const decoded = lenientDecodeUri(ogImage);
  const re = new RegExp(`${escapeRegExp(config.imageBucketPrefix)}[^\\s"&]+`);
  const m = re.exec(decoded);
  return m ? config.cdnPrefix + m[0] : "";
}


/** 抓单篇文章的配图；任何失败只打 warn 并返回空串 */
export async function resolveImage(link: string, config: ImageConfig): Promise<string> {
  try {
    const html = await fetchText(link, { userAgent: config.userAgent, timeoutMs: config.pageTimeoutMs });
    const { image } = extractOpenGraph(html);
    if (!image) return "";
    return toCdnImageUrl(image, config);
  } catch (err) {
    logger.warn("image", "无法获取 og:image", { url: link, err: errMessage(err) });
    return "";
  }
}


/** 按顺序为每篇文章补 image，相邻请求之间由 pacer 控制间隔 */
export async function resolveImages(posts: EssayPost[], config: ImageConfig, pacer: Pacer): Promise<void> {
  for (const post of posts) {
    logger.info("image", `抓取配图: ${post.title}`);
    await pacer.wait();
    post.image = await resolveImage(post.link, config);
  }
}
