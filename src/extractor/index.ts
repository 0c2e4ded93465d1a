// 文章页元信息提取：og:* 与 CDN 配图

export { extractOpenGraph } from "./og.js";
export type { OpenGraphMeta } from "./og.js";
export { lenientDecodeUri, resolveImage, resolveImages, toCdnImageUrl } from "./image.js";
export type { ImageConfig } from "./image.js";
