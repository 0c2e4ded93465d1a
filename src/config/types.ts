// 站点配置结构：site.config.json 经 zod 校验后的形状

import { z } from "zod";


const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";


export const HighlightAuthorSchema = z.object({
  surname: z.string().min(1),
  givenName: z.string().min(1),
  /** 替换后显示的缩写 */
  initials: z.string().min(1),
});


export const BibConfigSchema = z.object({
  /** BibTeX 源文件，相对 cwd */
  path: z.string().min(1).default("_bibliography/papers.bib"),
  highlightAuthor: HighlightAuthorSchema.default({
    surname: "Folkestad",
    givenName: "Åsmund",
    initials: "Å.F.",
  }),
});


export const EssaysConfigSchema = z.object({
  feedUrl: z.string().url().default("https://extramediumplease.substack.com/feed"),
  /** 精选回源时拼接 slug 的前缀 */
  postUrlBase: z.string().url().default("https://extramediumplease.substack.com/p/"),
  /** 要改写的 HTML 文件，相对 cwd */
  targetPath: z.string().min(1).default("essays.html"),
  cdnPrefix: z
    .string()
    .url()
    .default("https://substackcdn.com/image/fetch/w_320,h_213,c_fill,f_auto,q_auto:good,fl_progressive:steep,g_center/"),
  /** og:image 中要找的原图存储前缀，找不到则不出图 */
  imageBucketPrefix: z.string().url().default("https://substack-post-media.s3.amazonaws.com/public/images/"),
  /** 精选文章 slug，按此顺序输出 */
  selectedSlugs: z.array(z.string().min(1)).default([]),
  /** 旧版页面只有 ESSAYS 一对标记 */
  singleRegion: z.boolean().default(false),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  feedTimeoutMs: z.number().int().positive().default(30_000),
  pageTimeoutMs: z.number().int().positive().default(10_000),
  politeDelayMs: z.number().int().nonnegative().default(300),
  /** 结束标记前补回的缩进 */
  indent: z.string().default(" ".repeat(12)),
});


export const SiteConfigSchema = z.object({
  bib: BibConfigSchema.default({}),
  essays: EssaysConfigSchema.default({}),
});


export type HighlightAuthor = z.infer<typeof HighlightAuthorSchema>;
export type BibConfig = z.infer<typeof BibConfigSchema>;
export type EssaysConfig = z.infer<typeof EssaysConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
