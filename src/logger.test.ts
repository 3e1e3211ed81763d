import { describe, expect, it } from "vitest";

import { createLogger } from "./logger";

describe("createLogger", () => {
  function capture(level?: "debug" | "info" | "warn" | "error" | "silent") {
    const lines: string[] = [];
    const logger = createLogger({ level, write: (_level, line) => lines.push(line) });
    return { lines, logger };
  }

  it("writes warn and above by default", () => {
    const { lines, logger } = capture();
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(lines).toEqual(["[web3-storage] WARN w", "[web3-storage] ERROR e"]);
  });

  it("appends metadata as JSON", () => {
    const { lines, logger } = capture("info");
    logger.info("Uploaded a.txt", { cid: "bafy1", size: 3 });
    expect(lines).toEqual(['[web3-storage] INFO Uploaded a.txt {"cid":"bafy1","size":3}']);
  });

  it("writes nothing when silent", () => {
    const { lines, logger } = capture("silent");
    logger.error("e");
    expect(lines).toEqual([]);
  });

  it("uses a custom prefix", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "debug", prefix: "[w3s]", write: (_level, line) => lines.push(line) });
    logger.debug("GET /user/uploads");
    expect(lines).toEqual(["[w3s] DEBUG GET /user/uploads"]);
  });
});
