// 文献条目：每个 BibTeX 块解析一次，之后只读

export interface Publication {
  title?: string;
  /** 原始作者串，"A and B and C" */
  authors?: string;
  /** 四位年份 */
  year?: string;
  journal?: string;
  volume?: string;
  pages?: string;
  /** arXiv eprint id，如 2101.00001 */
  arxiv?: string;
  doi?: string;
}

export type PublicationField = keyof Publication;


export interface BibResult {
  /** 完整 publications-list HTML */
  html: string;
  /** 已渲染条目数 */
  count: number;
  /** 按年份降序排好的条目 */
  publications: Publication[];
}
