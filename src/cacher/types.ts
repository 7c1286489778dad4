// 首见时间缓存的契约：查询结果用判别联合表达「未命中 / 不可用」，不靠异常兜底


export type Lookup =
  | { status: "found"; value: Date }
  | { status: "missing" }
  | { status: "unavailable"; reason: string };


/** 首见时间存储：get/set 都不会 reject，后端故障体现在返回值里 */
export interface TimestampStore {
  /** kv=已配置后端；none=无后端模式 */
  readonly mode: "kv" | "none";
  get(key: string): Promise<Lookup>;
  /** set-if-absent；后端确认写入时为 true，出错、超时或 key 已存在时为 false */
  set(key: string, value: Date): Promise<boolean>;
}


/** KV 后端的最小接口，值以 ISO 8601 字符串存储 */
export interface KvClient {
  get(key: string): Promise<string | null>;
  /** 仅当 key 不存在时写入，返回是否写入 */
  setIfAbsent(key: string, value: string): Promise<boolean>;
}
