// 订阅上下文：由 classifier 每个请求派生一次，请求内不可变

export const FEED_TYPES = ["tracks", "likes", "reposts", "playlist"] as const;

export type FeedType = (typeof FEED_TYPES)[number];


/** playlistSlug 仅在 playlist 类型下存在 */
export type FeedContext =
  | Readonly<{ username: string; feedType: Exclude<FeedType, "playlist"> }>
  | Readonly<{ username: string; feedType: "playlist"; playlistSlug: string }>;
