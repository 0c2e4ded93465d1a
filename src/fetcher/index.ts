// 文本拉取：全局 fetch + 超时 + UA，非 2xx 与网络错误统一抛 FetchError

import { FetchError } from "../errors/index.js";
import type { RequestConfig } from "./types.js";

export type { RequestConfig } from "./types.js";


const DEFAULT_ACCEPT = "text/html,application/xhtml+xml,application/rss+xml,application/xml;q=0.9,*/*;q=0.8";


function buildHeaders(config: RequestConfig): Record<string, string> {
  const headers: Record<string, string> = { Accept: DEFAULT_ACCEPT, ...config.headers };
  if (config.userAgent) headers["User-Agent"] = config.userAgent;
  return headers;
}


/** GET 一个 URL 并以文本返回；超时、网络错误、非 2xx 都抛 FetchError */
export async function fetchText(url: string, config: RequestConfig = {}): Promise<string> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "GET",
      headers: buildHeaders(config),
      redirect: "follow",
      signal: config.timeoutMs != null ? AbortSignal.timeout(config.timeoutMs) : undefined,
    });
  } catch (err) {
    const reason = err instanceof Error && err.name === "TimeoutError"
      ? `超时 ${config.timeoutMs}ms`
      : err instanceof Error ? err.message : String(err);
    throw new FetchError(url, `请求失败 ${url}: ${reason}`);
  }
  if (!res.ok) {
    throw new FetchError(url, `HTTP ${res.status} ${url}`, res.status);
  }
  try {
    return await res.text();
  } catch (err) {
    throw new FetchError(url, `读取响应失败 ${url}: ${err instanceof Error ? err.message : String(err)}`, res.status);
  }
}
