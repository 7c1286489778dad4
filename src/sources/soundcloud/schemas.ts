// SoundCloud api-v2 响应结构（只声明用到的字段，其余透传忽略）

import { z } from "zod";


const instant = z.string().refine((s) => !Number.isNaN(Date.parse(s)), { message: "无效时间" });


export const transcodingSchema = z.object({
  url: z.string().url(),
  preset: z.string().optional(),
  format: z.object({
    protocol: z.string(),
    mime_type: z.string(),
  }),
});


export const trackSchema = z.object({
  kind: z.literal("track"),
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullish(),
  created_at: instant,
  /** 毫秒 */
  duration: z.number().nonnegative(),
  permalink_url: z.string(),
  artwork_url: z.string().nullish(),
  user: z.object({ username: z.string() }),
  media: z.object({ transcodings: z.array(transcodingSchema) }).nullish(),
  /** 取转码直链时需回传 */
  track_authorization: z.string().nullish(),
});


export const userSchema = z.object({
  kind: z.literal("user"),
  id: z.number().int(),
  /** 显示名 */
  username: z.string(),
  permalink_url: z.string(),
  avatar_url: z.string().nullish(),
  description: z.string().nullish(),
});


/** 歌单内只有前几条是完整曲目，其余仅有 id，需要再用 /tracks?ids= 补全 */
export const playlistSchema = z.object({
  kind: z.literal("playlist"),
  id: z.number().int(),
  title: z.string(),
  permalink_url: z.string(),
  description: z.string().nullish(),
  artwork_url: z.string().nullish(),
  user: z.object({ username: z.string() }),
  tracks: z.array(z.object({ id: z.number().int() }).passthrough()),
});


export const resolvedSchema = z.object({ kind: z.string() }).passthrough();


export function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    collection: z.array(item),
    next_href: z.string().nullish(),
  });
}


/** likes 里可能是曲目也可能是歌单，只取曲目 */
export const likeSchema = z.object({
  track: trackSchema.nullish(),
});


export const repostSchema = z.object({
  type: z.string(),
  track: trackSchema.nullish(),
});


export const streamSchema = z.object({ url: z.string().url() });


export type ScTrack = z.infer<typeof trackSchema>;
export type ScTranscoding = z.infer<typeof transcodingSchema>;
export type ScUser = z.infer<typeof userSchema>;
export type ScPlaylist = z.infer<typeof playlistSchema>;
