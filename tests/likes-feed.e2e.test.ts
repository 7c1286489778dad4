import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "../src/app/router.js";
import { createKvTimestampStore, noBackendStore } from "../src/cacher/index.js";
import type { TimestampStore } from "../src/cacher/index.js";
import { createFeeder } from "../src/feeder/index.js";
import type { Feeder, FeederResult } from "../src/feeder/index.js";
import { createTimestampResolver } from "../src/resolver/index.js";
import { MemoryKv } from "./fakes/kv.js";
import { FakeSource, track } from "./fakes/source.js";


/** 响应 XML 中所有条目的 pubDate */
function pubDates(xml: string): string[] {
  return [...xml.matchAll(/<pubDate>([^<]*)<\/pubDate>/g)].map((m) => m[1] ?? "");
}


/** 以真实时钟为基准，可额外偏移，模拟「10 秒后再次请求」 */
function setup(store: TimestampStore) {
  let offsetMs = 0;
  const source = new FakeSource().setFeed("alice/likes", [track("t1", "2020-01-01T00:00:00Z")]);
  const inner = createFeeder({
    source,
    resolve: createTimestampResolver({ store, now: () => new Date(Date.now() + offsetMs) }),
  });
  const results: FeederResult[] = [];
  const feeder: Feeder = {
    async getFeed(context, options) {
      const result = await inner.getFeed(context, options);
      results.push(result);
      return result;
    },
  };
  const app = createApp({ feeder, source, storeMode: store.mode });
  async function requestLikes(): Promise<FeederResult & { body: string }> {
    const res = await app.request("/alice/likes");
    expect(res.status).toBe(200);
    const body = await res.text();
    const result = results.at(-1);
    if (!result) throw new Error("feeder 未被调用");
    return { ...result, body };
  }
  return {
    requestLikes,
    advance(ms: number) {
      offsetMs += ms;
    },
  };
}


beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});


describe("e2e - /alice/likes", () => {
  it("空缓存首次请求得到当前时刻，10 秒后再次请求得到同一时刻", async () => {
    const kv = new MemoryKv();
    const { requestLikes, advance } = setup(createKvTimestampStore(kv, { timeoutMs: 1000 }));
    const startedAt = Date.now();
    const first = await requestLikes();
    const firstAt = first.items[0]?.effectiveAt;
    expect(firstAt).toBeInstanceOf(Date);
    expect(Math.abs((firstAt?.getTime() ?? 0) - startedAt)).toBeLessThan(5000);
    expect(firstAt?.getTime()).not.toBe(Date.parse("2020-01-01T00:00:00Z"));

    advance(10_000);
    const second = await requestLikes();
    expect(second.items[0]?.effectiveAt.getTime()).toBe(firstAt?.getTime());
    expect(kv.data.get("first-seen:likes:alice:t1")).toBe(firstAt?.toISOString());

    expect(pubDates(first.body)).toEqual([firstAt?.toUTCString()]);
    expect(pubDates(second.body)).toEqual(pubDates(first.body));
  });

  it("无后端模式下两次请求的时间不同", async () => {
    const { requestLikes, advance } = setup(noBackendStore);
    const first = await requestLikes();
    advance(10_000);
    const second = await requestLikes();
    const a = first.items[0]?.effectiveAt.getTime() ?? 0;
    const b = second.items[0]?.effectiveAt.getTime() ?? 0;
    expect(b - a).toBeGreaterThanOrEqual(10_000);
    expect(pubDates(second.body)).not.toEqual(pubDates(first.body));
  });
});
