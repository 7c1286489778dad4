// Timestamp Resolver：决定每条曲目在某个订阅里报告的发布时间
//
// tracks 订阅用原始发布时间；likes / reposts / playlist 用「首见时间」：
// 缓存命中即返回，否则取当前时刻并尝试写入（写入成败不影响本次返回值）。

import { cacheKey } from "../cacher/index.js";
import type { TimestampStore } from "../cacher/index.js";
import { logger } from "../logger/index.js";
import type { FeedContext } from "../types/feedContext.js";
import type { TrackRecord } from "../types/track.js";


export type Clock = () => Date;

export type ResolveTimestamp = (context: FeedContext, track: TrackRecord) => Promise<Date>;


export interface TimestampResolverOptions {
  store: TimestampStore;
  /** 测试注入时钟 */
  now?: Clock;
}


export function createTimestampResolver({ store, now = () => new Date() }: TimestampResolverOptions): ResolveTimestamp {
  return async (context, track) => {
    if (context.feedType === "tracks") return track.publishedAt;
    const key = cacheKey(context, track.id);
    const lookup = await store.get(key);
    if (lookup.status === "found") return lookup.value;
    const seenAt = now();
    const written = await store.set(key, seenAt);
    logger.debug("store", written ? "已记录首见时间" : "首见时间未写入，本次使用当前时刻", {
      key,
      lookup: lookup.status,
    });
    return seenAt;
  };
}
