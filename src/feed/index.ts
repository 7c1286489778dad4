// RSS Serializer

export { buildRssXml, escapeXml } from "./rss.js";
export type { BuildOptions, RssChannel, RssEntry } from "./types.js";
