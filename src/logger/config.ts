// 日志配置：从环境变量读取，不依赖 site.config.json 以尽早可用

import type { LogConfig, LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((l) => l === s);
}

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

let stderrForced = false;

/** 当前控制台最低输出级别（默认 info） */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

/** 是否所有级别都写 stderr：LOG_STDERR=1 或调用过 forceStderr() */
export function getStderrOnly(): boolean {
  if (stderrForced) return true;
  const v = process.env.LOG_STDERR;
  return v === "1" || v === "true";
}

/** stdout 被结果占用的 CLI（bib）启动时调用 */
export function forceStderr(on = true): void {
  stderrForced = on;
}

export function getLogConfig(): LogConfig {
  return { consoleLevel: getConsoleLevel(), stderrOnly: getStderrOnly() };
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** 是否应输出到控制台 */
export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}
