// 日志类型与结构化条目
// 设计原则：控制台由 LOG_LEVEL 过滤（默认 info）；bib 管线的 stdout 只留给 HTML，日志改走 stderr。

/** 日志级别：debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按管线阶段筛选 */
export type LogCategory =
  | "bib"       // 文献解析与渲染
  | "feed"      // RSS 拉取与解析
  | "image"     // og:image 抓取与 CDN 改写
  | "selection" // 精选文章回源
  | "writer"    // 标记区替换与写文件
  | "config"    // 配置加载
  | "app";      // CLI 入口

/** payload 常用字段约定（非强制） */
export interface LogPayloadConvention {
  /** 错误对象 message，避免序列化整个 Error */
  err?: string;
  /** 条目 URL */
  url?: string;
  [k: string]: unknown;
}

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、url 等） */
  payload?: Record<string, unknown>;
}

/** 从环境读取的日志配置 */
export interface LogConfig {
  /** 控制台输出最低级别，低于此级别不打印 */
  consoleLevel: LogLevel;
  /** 为 true 时所有级别都写 stderr */
  stderrOnly: boolean;
}
