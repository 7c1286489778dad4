// SoundCloudSource：消费 api-v2，把用户的 tracks / likes / reposts 或歌单转换为 TrackRecord[]
// 认证只用公开 client_id（SOUNDCLOUD_CLIENT_ID），不登录

import type { z } from "zod";
import type { SoundCloudConfig } from "../../config/index.js";
import { MetadataFetchError, NotFoundError, errorMessage } from "../../errors/index.js";
import { logger } from "../../logger/index.js";
import type { FeedContext } from "../../types/feedContext.js";
import type { TrackRecord } from "../../types/track.js";
import type { FeedChannel, FeedSource, MetadataSource } from "../types.js";
import {
  likeSchema,
  pageOf,
  playlistSchema,
  repostSchema,
  resolvedSchema,
  streamSchema,
  trackSchema,
  userSchema,
} from "./schemas.js";
import type { ScPlaylist, ScTrack, ScTranscoding, ScUser } from "./schemas.js";


const API_BASE = "https://api-v2.soundcloud.com";
const WEB_BASE = "https://soundcloud.com";
const HYDRATE_CHUNK = 50;
const DEFAULT_DESCRIPTION = "SoundCloud podcast feed";


export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;


export interface SoundCloudSourceOptions extends SoundCloudConfig {
  /** 测试注入；默认全局 fetch */
  fetch?: FetchFn;
}


/** 封面默认是 100x100 的 -large，换成 500x500 */
function upscaleArtwork(url: string | null | undefined): string | undefined {
  if (!url) return undefined;
  return url.replace("-large.", "-t500x500.");
}


function isProgressive(t: ScTranscoding): boolean {
  return t.format.protocol === "progressive";
}


/** 优先 audio/mpeg 的 progressive 转码 */
function pickProgressive(transcodings: ScTranscoding[]): ScTranscoding | undefined {
  const progressive = transcodings.filter(isProgressive);
  return progressive.find((t) => t.format.mime_type.startsWith("audio/mpeg")) ?? progressive[0];
}


function toTrackRecord(track: ScTrack): TrackRecord {
  return {
    id: String(track.id),
    publishedAt: new Date(track.created_at),
    title: track.title,
    author: track.user.username,
    description: track.description ?? undefined,
    link: track.permalink_url,
    artworkUrl: upscaleArtwork(track.artwork_url),
    durationSec: Math.floor(track.duration / 1000),
    hasProgressiveStream: (track.media?.transcodings ?? []).some(isProgressive),
  };
}


function userChannel(user: ScUser, feedType: Exclude<FeedContext["feedType"], "playlist">): FeedChannel {
  const base = {
    description: user.description || DEFAULT_DESCRIPTION,
    author: user.username,
    imageUrl: upscaleArtwork(user.avatar_url),
  };
  if (feedType === "likes") return { ...base, title: `${user.username} - Likes`, link: `${user.permalink_url}/likes` };
  if (feedType === "reposts") return { ...base, title: `${user.username} - Reposts`, link: `${user.permalink_url}/reposts` };
  return { ...base, title: user.username, link: user.permalink_url };
}


function playlistChannel(playlist: ScPlaylist): FeedChannel {
  return {
    title: playlist.title,
    link: playlist.permalink_url,
    description: playlist.description || DEFAULT_DESCRIPTION,
    author: playlist.user.username,
    imageUrl: upscaleArtwork(playlist.artwork_url),
  };
}


function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "";
    throw new MetadataFetchError(`SoundCloud ${what} 响应结构不符 ${where}`.trim());
  }
  return parsed.data;
}


export function createSoundCloudSource(options: SoundCloudSourceOptions): MetadataSource {
  const { clientId, timeoutMs, limit } = options;
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));

  function apiUrl(path: string, params: Record<string, string> = {}): URL {
    const url = new URL(path, API_BASE);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    return url;
  }

  /** GET JSON：带 client_id、超时与调用方取消；404 → NotFoundError，其余失败 → MetadataFetchError */
  async function getJson<T>(
    url: URL,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    what: string,
    signal?: AbortSignal,
  ): Promise<T> {
    if (!clientId) throw new MetadataFetchError("未配置 SOUNDCLOUD_CLIENT_ID");
    url.searchParams.set("client_id", clientId);
    const timeout = AbortSignal.timeout(timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    let res: Response;
    try {
      res = await fetchFn(url.toString(), { headers: { Accept: "application/json" }, signal: combined });
    } catch (err) {
      throw new MetadataFetchError(`请求 SoundCloud ${what} 失败: ${errorMessage(err)}`, { cause: err });
    }
    if (res.status === 404) throw new NotFoundError(`SoundCloud 上不存在: ${what}`);
    if (!res.ok) throw new MetadataFetchError(`SoundCloud ${what} 返回 HTTP ${res.status}`, { status: res.status });
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new MetadataFetchError(`SoundCloud ${what} 返回了无效 JSON`, { cause: err });
    }
    return parseBody(schema, body, what);
  }

  /** /resolve 把网页地址换成 API 对象；kind 不符视为不存在 */
  async function resolve(path: string, signal?: AbortSignal): Promise<{ kind: string }> {
    const url = apiUrl("/resolve", { url: `${WEB_BASE}/${path}` });
    return getJson(url, resolvedSchema, path, signal);
  }

  async function resolveUser(username: string, signal?: AbortSignal): Promise<ScUser> {
    const resolved = await resolve(encodeURIComponent(username), signal);
    if (resolved.kind !== "user") throw new NotFoundError(`${username} 不是 SoundCloud 用户`);
    return parseBody(userSchema, resolved, username);
  }

  async function listUserTracks(
    user: ScUser,
    feedType: Exclude<FeedContext["feedType"], "playlist">,
    signal?: AbortSignal,
  ): Promise<ScTrack[]> {
    const params = { limit: String(limit), linked_partitioning: "1" };
    if (feedType === "likes") {
      const page = await getJson(apiUrl(`/users/${user.id}/likes`, params), pageOf(likeSchema), "likes", signal);
      return page.collection.flatMap((like) => (like.track ? [like.track] : []));
    }
    if (feedType === "reposts") {
      const page = await getJson(apiUrl(`/stream/users/${user.id}/reposts`, params), pageOf(repostSchema), "reposts", signal);
      return page.collection.flatMap((r) => (r.type === "track-repost" && r.track ? [r.track] : []));
    }
    const page = await getJson(apiUrl(`/users/${user.id}/tracks`, params), pageOf(trackSchema), "tracks", signal);
    return page.collection;
  }

  /** 歌单曲目按原顺序补全；API 未返回的 id（已删除、地区限制）直接丢弃 */
  async function playlistTracks(playlist: ScPlaylist, signal?: AbortSignal): Promise<ScTrack[]> {
    const entries = playlist.tracks.slice(0, limit);
    const known = new Map<number, ScTrack>();
    const missing: number[] = [];
    for (const entry of entries) {
      const full = trackSchema.safeParse(entry);
      if (full.success) known.set(entry.id, full.data);
      else missing.push(entry.id);
    }
    for (let i = 0; i < missing.length; i += HYDRATE_CHUNK) {
      const ids = missing.slice(i, i + HYDRATE_CHUNK).join(",");
      const hydrated = await getJson(apiUrl("/tracks", { ids }), trackSchema.array(), "tracks", signal);
      for (const track of hydrated) known.set(track.id, track);
    }
    return entries.flatMap((entry) => {
      const track = known.get(entry.id);
      return track ? [track] : [];
    });
  }

  return {
    async fetchFeed(context: FeedContext, signal?: AbortSignal): Promise<FeedSource> {
      if (context.feedType === "playlist") {
        const path = `${encodeURIComponent(context.username)}/sets/${encodeURIComponent(context.playlistSlug)}`;
        const resolved = await resolve(path, signal);
        if (resolved.kind !== "playlist") throw new NotFoundError(`${path} 不是 SoundCloud 歌单`);
        const playlist = parseBody(playlistSchema, resolved, path);
        const tracks = await playlistTracks(playlist, signal);
        logger.debug("source", "已拉取歌单", { feed: path, count: tracks.length });
        return { channel: playlistChannel(playlist), tracks: tracks.map(toTrackRecord) };
      }
      const user = await resolveUser(context.username, signal);
      const tracks = await listUserTracks(user, context.feedType, signal);
      logger.debug("source", "已拉取用户曲目", { feed: `${context.username}/${context.feedType}`, count: tracks.length });
      return { channel: userChannel(user, context.feedType), tracks: tracks.slice(0, limit).map(toTrackRecord) };
    },

    async resolveStreamUrl(trackId: string, signal?: AbortSignal): Promise<string> {
      const track = await getJson(apiUrl(`/tracks/${encodeURIComponent(trackId)}`), trackSchema, `track ${trackId}`, signal);
      const transcoding = pickProgressive(track.media?.transcodings ?? []);
      if (!transcoding) throw new NotFoundError(`曲目 ${trackId} 没有可直接播放的 MP3`);
      const streamUrl = new URL(transcoding.url);
      if (track.track_authorization) streamUrl.searchParams.set("track_authorization", track.track_authorization);
      const stream = await getJson(streamUrl, streamSchema, `stream ${trackId}`, signal);
      return stream.url;
    },
  };
}
