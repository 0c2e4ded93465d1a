// LaTeX 转义表：有序、逐条字面替换；新增条目时注意与已有模式的重叠


export const LATEX_ESCAPES: ReadonlyArray<readonly [string, string]> = [
  ["\\r{A}", "Å"],
  ["\\AA{}", "Å"],
  ["\\'e", "é"],
  ["\\v{s}", "š"],
];


/** 按表顺序把已知 LaTeX 转义替换为 Unicode */
export function unescapeLatex(text: string): string {
  let out = text;
  for (const [from, to] of LATEX_ESCAPES) {
    out = out.replaceAll(from, to);
  }
  return out;
}


/** 字段值清理：转义替换后去掉所有花括号 */
export function cleanLatex(text: string): string {
  return unescapeLatex(text).replace(/[{}]/g, "");
}
