// HTML 文本工具：转义、去标签、实体解码

import { decode } from "html-entities";


/** 转义要插入 HTML 文本或属性值的字符串 */
export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}


/** 去掉所有尖括号片段（宽松，不解析 DOM） */
export function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, "");
}


/** 解码 HTML 实体（&amp;、&#8217; 等） */
export function decodeEntities(s: string): string {
  return decode(s);
}


/** 纯文本化：去标签 → trim → 解码实体 */
export function htmlToText(html: string): string {
  return decodeEntities(stripTags(html).trim());
}


export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
