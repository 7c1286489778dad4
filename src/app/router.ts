// Router：Hono 实现，只负责 HTTP 层；feeder / source 通过参数注入便于测试

import { Hono } from "hono";
import type { Context } from "hono";
import type { TimestampStore } from "../cacher/index.js";
import { classify, splitPath } from "../classifier/index.js";
import { MetadataFetchError, NotFoundError, errorMessage } from "../errors/index.js";
import type { Feeder } from "../feeder/index.js";
import { logger } from "../logger/index.js";
import type { MetadataSource } from "../sources/index.js";


export interface AppDeps {
  feeder: Feeder;
  source: MetadataSource;
  storeMode: TimestampStore["mode"];
}


/** 错误 → 状态码：未识别路径/不存在 404，上游失败 502，其余 500；缓存故障不会走到这里 */
function errorResponse(c: Context, err: unknown, path: string): Response {
  if (err instanceof NotFoundError) {
    logger.info("app", "未找到", { path, err: err.message });
    return c.text(err.message, 404);
  }
  if (err instanceof MetadataFetchError) {
    logger.warn("app", "拉取 SoundCloud 失败", { path, err: err.message, status: err.status });
    return c.text(`获取 SoundCloud 数据失败: ${err.message}`, 502);
  }
  logger.error("app", "请求处理异常", { path, err: errorMessage(err) });
  return c.text("服务器内部错误", 500);
}


export function createApp({ feeder, source, storeMode }: AppDeps) {
  const app = new Hono();
  app.get("/healthz", (c) => c.json({ ok: true, timestampStore: storeMode }));
  // enclosure 目标：签名 MP3 地址会过期，每次现取后 302；数字 id 不会与任何订阅路径冲突
  app.get("/stream/:trackId{[0-9]+}", async (c) => {
    const trackId = c.req.param("trackId");
    try {
      const url = await source.resolveStreamUrl(trackId, c.req.raw.signal);
      return c.redirect(url, 302);
    } catch (err) {
      return errorResponse(c, err, `/stream/${trackId}`);
    }
  });
  // 订阅：/{username}[/tracks|/likes|/reposts] 与 /{username}/sets/{slug}
  app.get("*", async (c) => {
    const url = new URL(c.req.url);
    try {
      const context = classify(splitPath(url.pathname));
      const { xml } = await feeder.getFeed(context, { baseUrl: url.origin, signal: c.req.raw.signal });
      return c.body(xml, 200, {
        "Content-Type": "application/rss+xml; charset=utf-8",
      });
    } catch (err) {
      return errorResponse(c, err, url.pathname);
    }
  });
  return app;
}
