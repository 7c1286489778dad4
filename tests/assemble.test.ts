import { describe, it, expect } from "vitest";
import { assembleFeed } from "../src/feeder/index.js";
import type { ResolveTimestamp } from "../src/resolver/index.js";
import { track } from "./fakes/source.js";


describe("assembleFeed", () => {
  it("输出与输入一一对应且保持顺序，即使解析完成顺序相反", async () => {
    const tracks = [
      track("a", "2020-01-01T00:00:00Z"),
      track("b", "2020-01-02T00:00:00Z"),
      track("c", "2020-01-03T00:00:00Z"),
    ];
    const delays: Record<string, number> = { a: 30, b: 15, c: 0 };
    const finished: string[] = [];
    const resolve: ResolveTimestamp = async (_context, t) => {
      await new Promise((r) => setTimeout(r, delays[t.id]));
      finished.push(t.id);
      return new Date(t.publishedAt.getTime() + 1000);
    };
    const out = await assembleFeed({ username: "alice", feedType: "likes" }, tracks, resolve);
    expect(finished).toEqual(["c", "b", "a"]);
    expect(out.map((t) => t.id)).toEqual(["a", "b", "c"]);
    expect(out.map((t) => t.effectiveAt.toISOString())).toEqual([
      "2020-01-01T00:00:01.000Z",
      "2020-01-02T00:00:01.000Z",
      "2020-01-03T00:00:01.000Z",
    ]);
  });

  it("透传展示字段，不修改输入", async () => {
    const input = track("a", "2020-01-01T00:00:00Z", { title: "Night Drive" });
    const resolve: ResolveTimestamp = async () => new Date("2024-06-01T08:00:00Z");
    const [out] = await assembleFeed({ username: "alice", feedType: "likes" }, [input], resolve);
    expect(out).toEqual({ ...input, effectiveAt: new Date("2024-06-01T08:00:00Z") });
    expect(input).not.toHaveProperty("effectiveAt");
  });

  it("空输入得到空输出", async () => {
    const resolve: ResolveTimestamp = async () => new Date();
    expect(await assembleFeed({ username: "alice", feedType: "tracks" }, [], resolve)).toEqual([]);
  });

  it("每条曲目都以同一上下文调用 resolver", async () => {
    const seen: string[] = [];
    const context = { username: "alice", feedType: "playlist", playlistSlug: "road-trip" } as const;
    const resolve: ResolveTimestamp = async (ctx, t) => {
      seen.push(`${ctx.feedType}:${t.id}`);
      return t.publishedAt;
    };
    await assembleFeed(context, [track("a", "2020-01-01T00:00:00Z"), track("b", "2020-01-01T00:00:00Z")], resolve);
    expect(seen.sort()).toEqual(["playlist:a", "playlist:b"]);
  });
});
