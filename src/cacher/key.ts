// 缓存 key：纯格式化函数，只由 feedType、username、playlistSlug、trackId 决定，无进程或时间盐

import type { FeedContext } from "../types/feedContext.js";


const KEY_PREFIX = "first-seen";


/**
 * first-seen:<feedType>:<username>[:<slug>]:<trackId>
 *
 * 可变部分经 encodeURIComponent，`:` 不会造成不同组合撞 key；
 * SoundCloud permalink 不区分大小写，username 与 slug 统一小写。
 */
export function cacheKey(context: FeedContext, trackId: string): string {
  const parts: string[] = [context.feedType, context.username.toLowerCase()];
  if (context.feedType === "playlist") parts.push(context.playlistSlug.toLowerCase());
  parts.push(trackId);
  return [KEY_PREFIX, ...parts.map(encodeURIComponent)].join(":");
}
