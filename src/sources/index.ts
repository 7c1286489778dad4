// 信源入口：目前只有 SoundCloud

export { createSoundCloudSource } from "./soundcloud/index.js";
export type { FetchFn, SoundCloudSourceOptions } from "./soundcloud/index.js";
export type { FeedChannel, FeedSource, MetadataSource } from "./types.js";
