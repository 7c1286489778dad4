// 运行配置：从环境变量读取（.env 由入口经 dotenv 载入），zod 校验

import { z } from "zod";
import { ConfigError } from "../errors/index.js";


const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SOUNDCLOUD_CLIENT_ID: z.string().optional(),
  SOUNDCLOUD_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FEED_LIMIT: z.coerce.number().int().min(1).max(200).default(50),
  KV_REST_API_URL: z.string().url().optional(),
  KV_REST_API_TOKEN: z.string().optional(),
  KV_TIMEOUT_MS: z.coerce.number().int().positive().default(1500),
  PUBLIC_BASE_URL: z.string().url().optional(),
});


/** KV 后端连接配置；url 与 token 任一缺失即为 undefined（无后端模式） */
export interface KvConfig {
  url: string;
  token: string;
  timeoutMs: number;
}


export interface SoundCloudConfig {
  /** api-v2 的公开 client_id；缺失时每次拉取都会失败 */
  clientId?: string;
  timeoutMs: number;
  /** 每个订阅最多输出的曲目数 */
  limit: number;
}


export interface AppConfig {
  port: number;
  soundcloud: SoundCloudConfig;
  kv?: KvConfig;
  /** enclosure 绝对地址的前缀；未设置时取请求的 origin */
  publicBaseUrl?: string;
}


/** 空字符串视为未设置，便于在 .env 中留空占位 */
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v != null && v.trim() !== "") out[k] = v.trim();
  }
  return out;
}


export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`配置无效 - ${detail}`);
  }
  const e = parsed.data;
  const kv =
    e.KV_REST_API_URL && e.KV_REST_API_TOKEN
      ? { url: e.KV_REST_API_URL, token: e.KV_REST_API_TOKEN, timeoutMs: e.KV_TIMEOUT_MS }
      : undefined;
  return {
    port: e.PORT,
    soundcloud: {
      clientId: e.SOUNDCLOUD_CLIENT_ID,
      timeoutMs: e.SOUNDCLOUD_TIMEOUT_MS,
      limit: e.FEED_LIMIT,
    },
    kv,
    publicBaseUrl: e.PUBLIC_BASE_URL,
  };
}
