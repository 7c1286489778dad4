// Feeder：订阅上下文 → 拉取曲目 → 解析有效时间 → 生成 RSS，与 router 解耦

import { contextPath } from "../classifier/index.js";
import { buildRssXml } from "../feed/index.js";
import type { RssChannel, RssEntry } from "../feed/index.js";
import { logger } from "../logger/index.js";
import type { FeedChannel } from "../sources/index.js";
import type { AnnotatedTrack } from "../types/track.js";
import { assembleFeed } from "./assemble.js";
import type { Feeder, FeederDeps } from "./types.js";


function toRssChannel(channel: FeedChannel): RssChannel {
  return {
    title: channel.title,
    link: channel.link,
    description: channel.description,
    author: channel.author,
    imageUrl: channel.imageUrl,
  };
}


/** enclosure 指向本服务的 /stream/:id，由它现取签名 MP3 地址后 302 */
function toRssEntry(item: AnnotatedTrack, baseUrl: string): RssEntry {
  return {
    title: item.title,
    link: item.link,
    description: item.description ?? "",
    guid: `soundcloud:track:${item.id}`,
    published: item.effectiveAt,
    author: item.author,
    durationSec: item.durationSec,
    enclosureUrl: item.hasProgressiveStream ? `${baseUrl}/stream/${encodeURIComponent(item.id)}` : undefined,
    imageUrl: item.artworkUrl,
  };
}


export function createFeeder({ source, resolve, publicBaseUrl, now = () => new Date() }: FeederDeps): Feeder {
  return {
    async getFeed(context, { baseUrl, signal }) {
      const { channel, tracks } = await source.fetchFeed(context, signal);
      const items = await assembleFeed(context, tracks, resolve);
      const base = (publicBaseUrl ?? baseUrl).replace(/\/+$/, "");
      const xml = buildRssXml(
        toRssChannel(channel),
        items.map((item) => toRssEntry(item, base)),
        { lastBuildDate: now() },
      );
      logger.info("feeder", "已生成订阅", { feed: contextPath(context), count: items.length });
      return { xml, channel, items };
    },
  };
}
