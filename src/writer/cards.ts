// 文章卡片 HTML：缩进与 essays.html 中的列表容器对齐

import type { EssayPost } from "../feed/index.js";
import { escapeHtml } from "../utils/html.js";


const PAD = " ".repeat(12);


export function renderEssayCard(post: EssayPost): string {
  const title = escapeHtml(post.title);
  const lines = [`${PAD}<a href="${escapeHtml(post.link)}" target="_blank" class="essay-card">`];
  if (post.image) {
    lines.push(`${PAD}    <img src="${escapeHtml(post.image)}" alt="${title}">`);
  }
  lines.push(`${PAD}    <div class="essay-card-text">`);
  lines.push(`${PAD}        <h3>${title}</h3>`);
  if (post.date) {
    lines.push(`${PAD}        <span class="essay-date">${escapeHtml(post.date)}</span>`);
  }
  lines.push(`${PAD}        <p>${escapeHtml(post.description)}</p>`);
  lines.push(`${PAD}    </div>`);
  lines.push(`${PAD}</a>`);
  return lines.join("\n");
}


export function renderEssayCards(posts: readonly EssayPost[]): string {
  return posts.map(renderEssayCard).join("\n");
}
