import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { JsonLogger } from "./json-logger.service.js";

describe("JsonLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "json-logger-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes one JSON line per entry into a per-run file", async () => {
    const logger = new JsonLogger(join(dir, "logs"), "ingest.jsonl", false);
    logger.init("RUN-1");
    logger.log({ level: "info", event: "pass.start", message: "Connecting" });
    logger.log({
      level: "error",
      event: "entity.failed",
      message: "boom",
      entity: "101",
      error: "boom",
    });
    await logger.close();

    const lines: Array<Record<string, unknown>> = readFileSync(join(dir, "logs", "ingest_RUN-1.jsonl"), "utf-8")
      .trim()
      .split("\n")
      .map((l) => JSON.parse(l));

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: "info", event: "pass.start", runId: "RUN-1" });
    expect(lines[1]).toMatchObject({ event: "entity.failed", entity: "101", runId: "RUN-1" });
    expect(typeof lines[0].timestamp).toBe("string");
  });
});
