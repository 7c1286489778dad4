// App 入口：组装 store / source / resolver / feeder，启动 Hono 服务

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createTimestampStore } from "../cacher/index.js";
import { loadConfig } from "../config/index.js";
import { errorMessage } from "../errors/index.js";
import { createFeeder } from "../feeder/index.js";
import { logger } from "../logger/index.js";
import { createTimestampResolver } from "../resolver/index.js";
import { createSoundCloudSource } from "../sources/index.js";
import { createApp } from "./router.js";


function main(): void {
  const config = loadConfig();
  const store = createTimestampStore(config.kv);
  if (store.mode === "none") {
    logger.warn("config", "未配置 KV_REST_API_URL / KV_REST_API_TOKEN，首见时间不会持久化");
  }
  if (!config.soundcloud.clientId) {
    logger.warn("config", "未配置 SOUNDCLOUD_CLIENT_ID，订阅请求将返回 502");
  }
  const source = createSoundCloudSource(config.soundcloud);
  const feeder = createFeeder({
    source,
    resolve: createTimestampResolver({ store }),
    publicBaseUrl: config.publicBaseUrl,
  });
  const app = createApp({ feeder, source, storeMode: store.mode });
  serve({ fetch: app.fetch, port: config.port });
  logger.info("app", `服务已启动: http://127.0.0.1:${config.port}/`, { timestampStore: store.mode });
}


try {
  main();
} catch (err) {
  logger.error("app", "启动失败", { err: errorMessage(err) });
  process.exit(1);
}
