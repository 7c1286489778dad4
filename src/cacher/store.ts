// 首见时间存储：KV 后端（Upstash Redis REST）或无后端 no-op，调用方无法也无需区分二者

import { Redis } from "@upstash/redis";
import type { KvConfig } from "../config/index.js";
import { errorMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { withTimeout } from "../utils/timeout.js";
import type { KvClient, Lookup, TimestampStore } from "./types.js";


const NO_BACKEND_REASON = "未配置 KV 后端";


/** 无后端模式：不发起任何网络请求 */
export const noBackendStore: TimestampStore = {
  mode: "none",
  async get(): Promise<Lookup> {
    return { status: "unavailable", reason: NO_BACKEND_REASON };
  },
  async set(): Promise<boolean> {
    return false;
  },
};


function parseInstant(raw: string): Date | null {
  const d = new Date(raw);
  return Number.isNaN(d.getTime()) ? null : d;
}


/** 包装 KvClient：每次调用有超时上限，任何错误只记日志并转为返回值 */
export function createKvTimestampStore(client: KvClient, options: { timeoutMs: number }): TimestampStore {
  const { timeoutMs } = options;
  return {
    mode: "kv",
    async get(key: string): Promise<Lookup> {
      let raw: string | null;
      try {
        raw = await withTimeout(client.get(key), timeoutMs, "KV get");
      } catch (err) {
        const reason = errorMessage(err);
        logger.warn("store", "读取首见时间失败，按不可用处理", { key, err: reason });
        return { status: "unavailable", reason };
      }
      if (raw == null) return { status: "missing" };
      const value = parseInstant(raw);
      if (value == null) {
        logger.warn("store", "首见时间格式无效，按未命中处理", { key, raw });
        return { status: "missing" };
      }
      return { status: "found", value };
    },
    async set(key: string, value: Date): Promise<boolean> {
      try {
        return await withTimeout(client.setIfAbsent(key, value.toISOString()), timeoutMs, "KV set");
      } catch (err) {
        logger.warn("store", "写入首见时间失败", { key, err: errorMessage(err) });
        return false;
      }
    },
  };
}


/** Upstash Redis 适配为 KvClient：SET NX 保证已落地的首见时间不被覆盖 */
export function upstashKvClient(redis: Redis): KvClient {
  return {
    async get(key) {
      const raw = await redis.get<string>(key);
      return raw == null ? null : String(raw);
    },
    async setIfAbsent(key, value) {
      const result = await redis.set(key, value, { nx: true });
      return result === "OK";
    },
  };
}


/** url/token 缺失（kv 为 undefined）时进入无后端模式 */
export function createTimestampStore(kv: KvConfig | undefined): TimestampStore {
  if (!kv) return noBackendStore;
  const redis = new Redis({
    url: kv.url,
    token: kv.token,
    retry: false,
    automaticDeserialization: false,
  });
  return createKvTimestampStore(upstashKvClient(redis), { timeoutMs: kv.timeoutMs });
}
