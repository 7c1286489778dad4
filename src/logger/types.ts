// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info），不把一切打满控制台

/** 日志级别：debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "app"     // HTTP 服务、启动
  | "config"  // 配置加载
  | "feeder"  // 订阅生成
  | "source"  // SoundCloud 元数据拉取
  | "store";  // 首见时间缓存

/** meta 常用字段约定（非强制） */
export interface LogMeta {
  /** 错误 message，避免序列化整个 Error */
  err?: string;
  /** 缓存 key */
  key?: string;
  /** 订阅路径，如 alice/likes */
  feed?: string;
  [k: string]: unknown;
}

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  payload?: Record<string, unknown>;
  created_at: string;
}
