// Feeder 返回类型

import type { EssayPost } from "../feed/index.js";


export interface EssaysResult {
  /** 全量列表：feed 顺序，回源补到的精选文章排在末尾 */
  posts: EssayPost[];
  /** 精选列表，按配置顺序 */
  selected: EssayPost[];
  /** 是否已写回目标文件 */
  written: boolean;
  /** 写入失败时缺失的标记 */
  missing: string[];
}
