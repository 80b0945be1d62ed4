import { describe, expect, it } from "vitest";

import { captureLogger } from "./helpers/logs";

describe("Logger", () => {
  it("writes structured JSON records", () => {
    const { logger, records } = captureLogger("info");
    logger.info("Key stored", { key: "a" });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: "info",
      message: "Key stored",
      data: { key: "a" },
    });
    expect(records[0]?.context).toBeUndefined();
    expect(typeof records[0]?.time).toBe("string");
  });

  it("drops records below the configured level", () => {
    const { logger, records } = captureLogger("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    expect(records.map((record) => record.level)).toEqual(["warn", "error"]);
  });

  it("merges child context", () => {
    const { logger, records } = captureLogger();
    logger.child({ component: "cache" }).child({ tier: "local" }).debug("hello");

    expect(records[0]?.context).toEqual({ component: "cache", tier: "local" });
  });

  it("serialises errors", () => {
    const { logger, records } = captureLogger();
    logger.error("failed", new TypeError("bad value"));

    expect(records[0]?.data).toEqual({ name: "TypeError", message: "bad value" });
  });
});
