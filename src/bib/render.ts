// 文献 HTML 渲染：标题链接（arXiv 优先于 DOI）、作者高亮、期刊/年份行

import type { HighlightAuthor } from "../config/index.js";
import { escapeHtml, escapeRegExp } from "../utils/html.js";
import type { Publication } from "./types.js";


const INDENT = "    ";


/** 标题链接：有 arXiv 用 arXiv，否则 DOI，都没有返回 null */
export function publicationLink(pub: Publication): string | null {
  if (pub.arxiv) return `https://arxiv.org/abs/${pub.arxiv}`;
  if (pub.doi) return `https://doi.org/${pub.doi}`;
  return null;
}


/** 把指定作者（"姓, 名" 或 "名 姓" 两种写法）替换为高亮缩写 */
export function highlightAuthor(authors: string, author: HighlightAuthor): string {
  const span = `<span class="highlight-author">${escapeHtml(author.initials)}</span>`;
  const surname = escapeRegExp(escapeHtml(author.surname));
  const given = escapeRegExp(escapeHtml(author.givenName));
  return authors
    .replace(new RegExp(`${surname},\\s*${given}`, "g"), () => span)
    .replace(new RegExp(`${given}\\s+${surname}`, "g"), () => span);
}


/** 期刊 [卷][, 页码]，无期刊时退回 arXiv:id，再接 (年份)；都没有返回 null */
export function venueLine(pub: Publication): string | null {
  const parts: string[] = [];
  if (pub.journal) {
    let venue = pub.journal;
    if (pub.volume) venue += ` ${pub.volume}`;
    if (pub.pages) venue += `, ${pub.pages}`;
    parts.push(venue);
  } else if (pub.arxiv) {
    parts.push(`arXiv:${pub.arxiv}`);
  }
  if (pub.year) parts.push(`(${pub.year})`);
  return parts.length > 0 ? parts.join(" ") : null;
}


export function renderPublication(pub: Publication, author: HighlightAuthor): string {
  const lines: string[] = [];
  const title = escapeHtml(pub.title ?? "Untitled");
  const link = publicationLink(pub);
  if (link) {
    lines.push(`<a href="${escapeHtml(link)}" target="_blank" class="paper-title">${title}</a>`);
  } else {
    lines.push(`<span class="paper-title">${title}</span>`);
  }
  if (pub.authors) {
    lines.push(`<div class="paper-authors">${highlightAuthor(escapeHtml(pub.authors), author)}</div>`);
  }
  const venue = venueLine(pub);
  if (venue) {
    lines.push(`<div class="paper-venue">${escapeHtml(venue)}</div>`);
  }
  return `<div class="paper-entry">\n${INDENT}${lines.join(`\n${INDENT}`)}\n</div>`;
}


/** 渲染整份列表；调用方负责排序 */
export function renderPublications(pubs: readonly Publication[], author: HighlightAuthor): string {
  const parts = ['<div class="publications-list">', ...pubs.map((p) => renderPublication(p, author)), "</div>"];
  return parts.join("\n\n");
}
