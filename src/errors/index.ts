// 错误分类：router 捕获后映射为状态码；缓存层错误不走异常，见 cacher/types.ts


/** 用户、歌单或曲目不存在 → 404 */
export class NotFoundError extends Error {
  constructor(message = "未找到") {
    super(message);
    this.name = "NotFoundError";
  }
}


/** 无法识别的订阅路径 → 404，不重试 */
export class ClassificationError extends NotFoundError {
  readonly segments: readonly string[];

  constructor(segments: readonly string[]) {
    super(`无法识别的订阅路径: /${segments.join("/")}`);
    this.name = "ClassificationError";
    this.segments = segments;
  }
}


/** SoundCloud 请求失败（网络、超时、非 2xx、响应结构不符）→ 502，单次请求内不重试 */
export class MetadataFetchError extends Error {
  /** 上游 HTTP 状态码（有响应时） */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "MetadataFetchError";
    this.status = options.status;
  }
}


/** 启动配置无效 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}


/** 错误对象转 message，避免序列化整个 Error */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
