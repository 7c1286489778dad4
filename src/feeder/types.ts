// Feeder 依赖与返回类型

import type { Clock, ResolveTimestamp } from "../resolver/index.js";
import type { FeedChannel, MetadataSource } from "../sources/index.js";
import type { FeedContext } from "../types/feedContext.js";
import type { AnnotatedTrack } from "../types/track.js";


export interface FeederDeps {
  source: MetadataSource;
  resolve: ResolveTimestamp;
  /** 覆盖请求 origin，作为 enclosure 地址前缀（部署在反向代理后时用） */
  publicBaseUrl?: string;
  /** lastBuildDate 用，测试注入 */
  now?: Clock;
}


export interface GetFeedOptions {
  /** 请求 origin，如 http://127.0.0.1:3000 */
  baseUrl: string;
  /** 请求中止时取消上游拉取 */
  signal?: AbortSignal;
}


export interface FeederResult {
  /** RSS 2.0 XML 字符串 */
  xml: string;
  channel: FeedChannel;
  /** 已带 effectiveAt 的条目，与 XML 中 item 顺序一致 */
  items: AnnotatedTrack[];
}


export interface Feeder {
  getFeed(context: FeedContext, options: GetFeedOptions): Promise<FeederResult>;
}
