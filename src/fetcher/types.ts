// fetcher 请求配置：对 fetch RequestInit 的封装与扩展


export interface RequestConfig {
  headers?: Record<string, string>;
  /** 浏览器风格 UA，避免被源站拦截 */
  userAgent?: string;
  /** 超时毫秒，内部用 AbortSignal.timeout 实现；不设则不限时 */
  timeoutMs?: number;
}

