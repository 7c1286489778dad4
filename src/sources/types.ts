// Metadata Source 抽象：给定订阅上下文，产出频道信息 + 曲目列表

import type { FeedContext } from "../types/feedContext.js";
import type { TrackRecord } from "../types/track.js";


/** 频道元数据（用户主页或歌单） */
export interface FeedChannel {
  title: string;
  link: string;
  description?: string;
  author?: string;
  imageUrl?: string;
}


export interface FeedSource {
  channel: FeedChannel;
  tracks: TrackRecord[];
}


export interface MetadataSource {
  /** 找不到用户/歌单抛 NotFoundError，其余上游失败抛 MetadataFetchError */
  fetchFeed(context: FeedContext, signal?: AbortSignal): Promise<FeedSource>;
  /** 解析曲目当前可用的 MP3 直链（签名 URL 会过期，因此每次现取） */
  resolveStreamUrl(trackId: string, signal?: AbortSignal): Promise<string>;
}
