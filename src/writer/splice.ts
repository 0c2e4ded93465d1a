// 标记区替换：start 标记之后到 end 标记之前整体替换为 "\n" + body + "\n" + indent

import type { MarkerPair, MarkerRegion, SpliceResult } from "./types.js";


interface Span {
  /** 紧随 start 标记之后 */
  from: number;
  /** end 标记起点 */
  to: number;
}


/** end 标记只在 start 标记之后查找 */
function locate(doc: string, pair: MarkerPair): Span | null {
  const s = doc.indexOf(pair.start);
  if (s === -1) return null;
  const from = s + pair.start.length;
  const to = doc.indexOf(pair.end, from);
  if (to === -1) return null;
  return { from, to };
}


function missingMarkers(doc: string, pair: MarkerPair): string[] {
  const s = doc.indexOf(pair.start);
  if (s === -1) return doc.includes(pair.end) ? [pair.start] : [pair.start, pair.end];
  return doc.indexOf(pair.end, s + pair.start.length) === -1 ? [pair.end] : [];
}


/** 替换单个区域；标记缺失返回 null */
export function spliceRegion(doc: string, region: MarkerRegion, indent: string): string | null {
  const span = locate(doc, region);
  if (!span) return null;
  return doc.slice(0, span.from) + "\n" + region.body + "\n" + indent + doc.slice(span.to);
}


/** 先确认所有区域的标记都在，再依次替换；任一缺失则整体失败 */
export function spliceRegions(doc: string, regions: readonly MarkerRegion[], indent: string): SpliceResult {
  const missing = regions.flatMap((r) => missingMarkers(doc, r));
  if (missing.length > 0) return { ok: false, missing };
  let content = doc;
  for (const region of regions) {
    const next = spliceRegion(content, region, indent);
    if (next === null) return { ok: false, missing: [region.start, region.end] };
    content = next;
  }
  return { ok: true, content };
}
