// Feed Assembler：逐条套用 Timestamp Resolver，保持输入顺序

import type { ResolveTimestamp } from "../resolver/index.js";
import type { FeedContext } from "../types/feedContext.js";
import type { AnnotatedTrack, TrackRecord } from "../types/track.js";


/** 各曲目互不相关，并发解析；Promise.all 保证输出顺序与输入一致 */
export async function assembleFeed(
  context: FeedContext,
  tracks: readonly TrackRecord[],
  resolve: ResolveTimestamp,
): Promise<AnnotatedTrack[]> {
  return Promise.all(
    tracks.map(async (track) => ({ ...track, effectiveAt: await resolve(context, track) })),
  );
}
