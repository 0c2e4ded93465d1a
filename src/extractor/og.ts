// Open Graph 元信息：用 node-html-parser 读取 <meta property="og:*" content="...">

import { parse } from "node-html-parser";
import type { HTMLElement } from "node-html-parser";


export interface OpenGraphMeta {
  title?: string;
  description?: string;
  image?: string;
}


function metaContent(root: HTMLElement, property: string): string | undefined {
  const el = root.querySelector(`meta[property="${property}"]`);
  const content = el?.getAttribute("content")?.trim();
  return content ? content : undefined;
}


/** 提取页面的 og:title / og:description / og:image；缺失字段为 undefined */
export function extractOpenGraph(html: string): OpenGraphMeta {
  const root = parse(html);
  return {
    title: metaContent(root, "og:title"),
    description: metaContent(root, "og:description"),
    image: metaContent(root, "og:image"),
  };
}
