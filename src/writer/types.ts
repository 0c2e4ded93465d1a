// 标记区替换的输入与结果


/** 一对注释标记及要填入其间的内容 */
export interface MarkerRegion {
  start: string;
  end: string;
  body: string;
}


export type MarkerPair = Pick<MarkerRegion, "start" | "end">;


/** 替换结果：失败时列出缺失的标记，文档不做任何修改 */
export type SpliceResult =
  | { ok: true; content: string }
  | { ok: false; missing: string[] };


export const SELECTED_MARKERS: MarkerPair = {
  start: "<!-- SELECTED_START -->",
  end: "<!-- SELECTED_END -->",
};


export const ESSAYS_MARKERS: MarkerPair = {
  start: "<!-- ESSAYS_START -->",
  end: "<!-- ESSAYS_END -->",
};
