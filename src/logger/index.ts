// 统一日志：按级别输出到控制台，格式 [category] message {payload}

import { forceStderr, getLogConfig, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogPayloadConvention } from "./types.js";

export { forceStderr };
export type { LogCategory, LogEntry, LogLevel } from "./types.js";


export function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${tag} ${entry.message}${payloadStr}`;
}


function writeConsole(entry: LogEntry, stderrOnly: boolean): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else if (stderrOnly) {
    console.error(line);
  } else {
    console.log(line);
  }
}


function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogPayloadConvention): void {
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
  };
  const { consoleLevel, stderrOnly } = getLogConfig();
  if (shouldLogToConsole(consoleLevel, level)) {
    writeConsole(entry, stderrOnly);
  }
}


/** 把 unknown 错误收敛为 message，供 payload.err 使用 */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


/** 统一 logger：控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("debug", category, message, meta);
  },
};
