// 文章卡片数据：由 RSS <item> 或精选回源页面生成，之后只补一次 image

export interface EssayPost {
  title: string;
  /** 文章 URL，/p/<slug> 形式 */
  link: string;
  /** 纯文本摘要（已去标签、解码实体） */
  description: string;
  /** 展示用日期，如 "Mar 4, 2024"；未知为空串 */
  date: string;
  /** CDN 缩略图 URL；未解析或无图为空串 */
  image: string;
}
