import { describe, it, expect } from "vitest";
import { JsonCheckpointRepository } from "../database/json-checkpoint.repository.js";
import { SqliteCheckpointRepository } from "../database/sqlite-checkpoint.repository.js";
import { openStateDb } from "../database/sqlite.utils.js";
import { AwsS3SourceService } from "./aws-s3-source.service.js";
import { createCheckpointRepository, createSource, newRunId } from "./ingest-runner.service.js";
import { LocalSourceService } from "./local-source.service.js";
import { SftpSourceService } from "./sftp-source.service.js";

describe("ingest runner wiring", () => {
  it("builds the source for the configured driver", () => {
    expect(createSource({ driver: "local", root: "./exports", excludeEntities: [] })).toBeInstanceOf(
      LocalSourceService,
    );
    const s3 = createSource({
      driver: "s3",
      bucket: "pos-exports",
      prefix: "daily/",
      region: "us-east-1",
      excludeEntities: [],
    });
    expect(s3).toBeInstanceOf(AwsS3SourceService);
    expect(s3.describe()).toBe("s3://pos-exports/daily/");
    expect(
      createSource({
        driver: "sftp",
        host: "sftp.test.local",
        port: 22,
        username: "ingest",
        privateKeyPath: "/keys/id_test",
        readyTimeoutMs: 20000,
        excludeEntities: [],
      }),
    ).toBeInstanceOf(SftpSourceService);
  });

  it("keys the checkpoint record by scope and driver", () => {
    const db = openStateDb(":memory:");
    try {
      const json = createCheckpointRepository(
        { dir: "./state", checkpointDriver: "json" },
        { kind: "single", date: "20250102" },
        db,
      );
      expect(json).toBeInstanceOf(JsonCheckpointRepository);
      if (json instanceof JsonCheckpointRepository) {
        expect(json.path.endsWith("processed_stores_20250102.json")).toBe(true);
      }

      const sqlite = createCheckpointRepository(
        { dir: "./state", checkpointDriver: "sqlite" },
        { kind: "range", start: "20250101", end: "20250131" },
        db,
      );
      expect(sqlite).toBeInstanceOf(SqliteCheckpointRepository);
    } finally {
      db.close();
    }
  });

  it("stamps run ids with the local start time", () => {
    expect(newRunId(new Date(2025, 0, 3, 6, 5, 9))).toBe("RUN-20250103-060509");
    expect(newRunId(new Date(2025, 0, 3, 6, 5, 9), "SEED")).toBe("SEED-20250103-060509");
  });
});
