// 首见时间缓存：key 格式化 + 存储

export { cacheKey } from "./key.js";
export { createTimestampStore, createKvTimestampStore, noBackendStore, upstashKvClient } from "./store.js";
export type { KvClient, Lookup, TimestampStore } from "./types.js";
