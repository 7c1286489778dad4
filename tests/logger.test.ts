import { afterEach, describe, it, expect, vi } from "vitest";
import { formatConsole, logger } from "../src/logger/index.js";
import { parseLevel } from "../src/logger/config.js";


afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});


describe("logger", () => {
  it("格式为 [category] message {payload}", () => {
    expect(
      formatConsole({ level: "warn", category: "store", message: "写入失败", payload: { key: "k1" }, created_at: "" }),
    ).toBe(`[store] 写入失败 {"key":"k1"}`);
    expect(formatConsole({ level: "info", category: "app", message: "已启动", created_at: "" })).toBe("[app] 已启动");
  });

  it("按级别分流到 console", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.debug("store", "d");
    logger.info("feeder", "i", { feed: "alice/likes" });
    logger.warn("source", "w");
    logger.error("app", "e", { err: "boom" });
    expect(log.mock.calls).toEqual([["[store] d"], [`[feeder] i {"feed":"alice/likes"}`]]);
    expect(warn.mock.calls).toEqual([["[source] w"]]);
    expect(error.mock.calls).toEqual([[`[app] e {"err":"boom"}`]]);
  });

  it("低于 LOG_LEVEL 的日志不输出", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.info("app", "hidden");
    logger.warn("app", "shown");
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[app] shown");
  });

  it("LOG_LEVEL 无效时回退默认值", () => {
    expect(parseLevel("verbose", "info")).toBe("info");
    expect(parseLevel(" WARN ", "info")).toBe("warn");
    expect(parseLevel(undefined, "error")).toBe("error");
  });
});
