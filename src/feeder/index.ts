// Feeder：根据订阅上下文生成 RSS，与 router 解耦

export { createFeeder } from "./feeder.js";
export { assembleFeed } from "./assemble.js";
export type { Feeder, FeederDeps, FeederResult, GetFeedOptions } from "./types.js";
