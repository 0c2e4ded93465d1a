// 发布日期：RFC 2822（RSS pubDate）→ "Mar 4, 2024"，按 UTC 取日期


const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];


/** 解析失败或为空时返回空串，不抛错 */
export function formatDisplayDate(pubDate: string): string {
  if (!pubDate.trim()) return "";
  const d = new Date(pubDate);
  if (Number.isNaN(d.getTime())) return "";
  return `${MONTHS[d.getUTCMonth()]} ${d.getUTCDate()}, ${d.getUTCFullYear()}`;
}
