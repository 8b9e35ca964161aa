import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

describe("structured logger", () => {
  it("writes one JSON line per entry", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ write: (line) => lines.push(line) });

    logger.info("xds_watch_opened", { key: "node", resource_names: new Set(["a", "b"]) });

    expect(lines).to.have.length(1);
    expect(lines[0]?.endsWith("\n")).to.equal(true);
    const parsed: unknown = JSON.parse(lines[0] ?? "");
    expect(parsed).to.include({ level: "info", message: "xds_watch_opened" });
    expect(parsed).to.have.deep.property("payload", { key: "node", resource_names: ["a", "b"] });
  });

  it("drops entries below the configured level", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ level: "warn", write: () => undefined, onEntry: (entry) => entries.push(entry) });

    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("kept");
    logger.error("kept too");

    expect(entries.map((entry) => entry.level)).to.deep.equal(["warn", "error"]);
  });

  it("redacts key material from payloads", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ write: () => undefined, onEntry: (entry) => entries.push(entry) });

    logger.info("xds_secret_pushed", { resources: [{ name: "ca", private_key: "test-secret" }], Token: "abc" });

    expect(entries[0]?.payload).to.deep.equal({
      resources: [{ name: "ca", private_key: "[REDACTED]" }],
      Token: "[REDACTED]",
    });
  });

  it("keeps payloads intact when redaction is disabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      redactionEnabled: false,
      write: () => undefined,
      onEntry: (entry) => entries.push(entry),
    });

    logger.info("xds_secret_pushed", { private_key: "test-secret" });

    expect(entries[0]?.payload).to.deep.equal({ private_key: "test-secret" });
  });

  describe("file mirror", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), "xds-logger-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("appends entries in order", async () => {
      const logFile = join(directory, "nested", "cache.log");
      const logger = new StructuredLogger({ logFile, write: () => undefined });

      logger.info("first");
      logger.error("second", { key: "node" });
      await logger.flush();

      const content = await readFile(logFile, "utf8");
      const messages = content
        .trim()
        .split("\n")
        .map((line): unknown => JSON.parse(line));
      expect(messages).to.have.length(2);
      expect(messages[0]).to.include({ level: "info", message: "first" });
      expect(messages[1]).to.include({ level: "error", message: "second" });
      expect(messages[1]).to.have.deep.property("payload", { key: "node" });
    });
  });
});
