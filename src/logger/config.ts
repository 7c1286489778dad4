// 日志配置：直接读环境变量，不依赖 config 模块以尽早可用

import type { LogLevel } from "./types.js";

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.trim().toLowerCase();
  return LEVEL_ORDER.find((l) => l === v) ?? fallback;
}

/** 当前控制台最低输出级别（默认 info，生产可设为 warn） */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** 是否应输出到控制台 */
export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}
