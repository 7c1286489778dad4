import { describe, it, expect } from "vitest";
import { cacheKey } from "../src/cacher/index.js";


describe("cacheKey", () => {
  it("按 feedType、username、trackId 格式化", () => {
    expect(cacheKey({ username: "alice", feedType: "likes" }, "t1")).toBe("first-seen:likes:alice:t1");
    expect(cacheKey({ username: "alice", feedType: "reposts" }, "t1")).toBe("first-seen:reposts:alice:t1");
  });

  it("歌单 key 带 slug", () => {
    expect(cacheKey({ username: "alice", feedType: "playlist", playlistSlug: "road-trip" }, "t1")).toBe(
      "first-seen:playlist:alice:road-trip:t1",
    );
  });

  it("同一组合多次调用得到相同 key", () => {
    const a = cacheKey({ username: "alice", feedType: "likes" }, "t1");
    const b = cacheKey({ username: "alice", feedType: "likes" }, "t1");
    expect(a).toBe(b);
  });

  it("用户名、类型、slug 任一不同 key 都不同", () => {
    const keys = new Set([
      cacheKey({ username: "alice", feedType: "likes" }, "t1"),
      cacheKey({ username: "bob", feedType: "likes" }, "t1"),
      cacheKey({ username: "alice", feedType: "reposts" }, "t1"),
      cacheKey({ username: "alice", feedType: "playlist", playlistSlug: "a" }, "t1"),
      cacheKey({ username: "alice", feedType: "playlist", playlistSlug: "b" }, "t1"),
      cacheKey({ username: "alice", feedType: "likes" }, "t2"),
    ]);
    expect(keys.size).toBe(6);
  });

  it("组件中的冒号被编码，不会撞 key", () => {
    const a = cacheKey({ username: "a:b", feedType: "likes" }, "c");
    const b = cacheKey({ username: "a", feedType: "likes" }, "b:c");
    expect(a).toBe("first-seen:likes:a%3Ab:c");
    expect(b).toBe("first-seen:likes:a:b%3Ac");
  });

  it("用户名不区分大小写", () => {
    expect(cacheKey({ username: "Alice", feedType: "likes" }, "t1")).toBe("first-seen:likes:alice:t1");
  });

  it("歌单 slug 不区分大小写", () => {
    const upper = cacheKey({ username: "Alice", feedType: "playlist", playlistSlug: "Road-Trip" }, "1");
    const lower = cacheKey({ username: "alice", feedType: "playlist", playlistSlug: "road-trip" }, "1");
    expect(upper).toBe("first-seen:playlist:alice:road-trip:1");
    expect(upper).toBe(lower);
  });
});
