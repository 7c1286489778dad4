// Feed Classifier：请求路径 → 订阅上下文；纯函数，无副作用

import { ClassificationError } from "../errors/index.js";
import type { FeedContext } from "../types/feedContext.js";


/** URL pathname → 解码后的非空路径段；任一段解码失败则整体无法识别 */
export function splitPath(pathname: string): string[] {
  const raw = pathname.split("/").filter((s) => s !== "");
  try {
    return raw.map((s) => decodeURIComponent(s));
  } catch {
    throw new ClassificationError(raw);
  }
}


function freeze(context: FeedContext): FeedContext {
  return Object.freeze(context);
}


/**
 * 识别的形状：
 * - [username] / [username, "tracks"] → tracks
 * - [username, "likes"] → likes
 * - [username, "reposts"] → reposts
 * - [username, "sets", slug] → playlist
 * 其余一律 ClassificationError
 */
export function classify(segments: readonly string[]): FeedContext {
  const [username, kind, slug] = segments;
  if (username == null || username === "") throw new ClassificationError(segments);
  if (segments.length === 1) return freeze({ username, feedType: "tracks" });
  if (segments.length === 2) {
    if (kind === "tracks" || kind === "likes" || kind === "reposts") {
      return freeze({ username, feedType: kind });
    }
  }
  if (segments.length === 3 && kind === "sets" && slug != null && slug !== "") {
    return freeze({ username, feedType: "playlist", playlistSlug: slug });
  }
  throw new ClassificationError(segments);
}


/** classify 的逆：用于日志与自检，如 alice/likes、alice/sets/road-trip */
export function contextPath(context: FeedContext): string {
  if (context.feedType === "playlist") return `${context.username}/sets/${context.playlistSlug}`;
  return `${context.username}/${context.feedType}`;
}
