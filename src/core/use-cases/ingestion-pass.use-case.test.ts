import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { SourceConnectionError } from "../domain/errors.js";
import type {
  IRemoteSession,
  IRemoteSource,
} from "../domain/services/remote-source.service.js";
import { CsvReportTransformService } from "../../infrastructure/services/csv-report-transform.service.js";
import { LocalSourceService } from "../../infrastructure/services/local-source.service.js";
import {
  DateRangeResolver,
  SingleDateResolver,
  type DateScopeResolver,
} from "../domain/services/date-scope.service.js";
import { IngestionPassUseCase } from "./ingestion-pass.use-case.js";
import {
  FakeRemoteSource,
  ITEM_FILE,
  MemoryCheckpointRepository,
  MODIFIER_FILE,
  MemoryLogger,
  readyFolder,
  RecordingSink,
  StubTransform,
  type RemoteTree,
} from "./test-doubles.js";

function setup(tree: RemoteTree, resolver: DateScopeResolver = new SingleDateResolver("20250102")) {
  const source = new FakeRemoteSource(tree);
  const sink = new RecordingSink();
  const repo = new MemoryCheckpointRepository();
  const logger = new MemoryLogger();
  const pass = new IngestionPassUseCase(
    source,
    resolver,
    new StubTransform(),
    sink,
    repo,
    logger,
    { excludeEntities: ["217184"] },
  );
  return { source, sink, repo, logger, pass };
}

/** Local folder tree whose modifier export is deleted right after each listing. */
class VanishingModifierSource implements IRemoteSource {
  private readonly inner: LocalSourceService;

  constructor(private readonly root: string) {
    this.inner = new LocalSourceService(root);
  }

  describe(): string {
    return this.inner.describe();
  }

  async connect(): Promise<IRemoteSession> {
    const session = await this.inner.connect();
    return {
      listEntities: () => session.listEntities(),
      listSubfolders: (entity) => session.listSubfolders(entity),
      listFiles: async (entity, folder) => {
        const listing = await session.listFiles(entity, folder);
        rmSync(join(this.root, entity, folder, MODIFIER_FILE));
        return listing;
      },
      openFile: (entity, folder, filename) => session.openFile(entity, folder, filename),
      close: () => session.close(),
    };
  }
}

describe("IngestionPassUseCase", () => {
  it("processes ready entities and skips excluded and already checkpointed ones", async () => {
    const { pass, sink, repo, source } = setup({
      "30": { "20250102": readyFolder("Loc30") },
      "10": { "20250102": readyFolder("Loc10") },
      "217184": { "20250102": readyFolder("Ignored") },
      "20": { "20250102": { [ITEM_FILE]: "Loc20" } },
    });
    const checkpoints = new Set(["30"]);

    const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints });

    expect(result).toEqual({
      seen: ["10", "20", "30"],
      processed: ["10"],
      notReady: [{ entity: "20", reason: "missing-artifacts" }],
      failed: [],
    });
    expect(sink.upserts).toEqual([{ date: "2025-01-02", location: "Loc10" }]);
    expect([...checkpoints].sort()).toEqual(["10", "30"]);
    expect(repo.stored).toEqual(["10", "30"]);
    expect(source.closes).toBe(1);
  });

  it("treats a missing date folder as not ready", async () => {
    const { pass, logger } = setup({ "10": { "20250101": readyFolder("Old") } });

    const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints: new Set() });

    expect(result.notReady).toEqual([{ entity: "10", reason: "no-date-folder" }]);
    expect(logger.events()).toContain("folder.missing");
  });

  it("isolates per-entity failures and keeps going", async () => {
    const { pass, sink, source } = setup({
      "10": { "20250102": readyFolder("BAD") },
      "20": { "20250102": readyFolder("EMPTY") },
      "30": { "20250102": readyFolder("Loc30") },
      "40": { "20250102": readyFolder("Loc40") },
    });
    source.listFileErrors.set("40/20250102", new Error("permission denied"));

    const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints: new Set() });

    expect(result.processed).toEqual(["30"]);
    expect(result.notReady).toEqual([{ entity: "20", reason: "empty-report" }]);
    expect(result.failed).toEqual([
      { entity: "10", folder: "20250102", error: "unreadable export" },
      { entity: "40", folder: "20250102", error: "permission denied" },
    ]);
    expect(sink.upserts).toEqual([{ date: "2025-01-02", location: "Loc30" }]);
  });

  it("keeps a processed entity in memory when the checkpoint save fails", async () => {
    const { pass, repo, logger } = setup({ "10": { "20250102": readyFolder("Loc10") } });
    repo.failSaves = true;
    const checkpoints = new Set<string>();

    const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints });

    expect(result.failed).toEqual([{ entity: "10", folder: "20250102", error: "disk full" }]);
    expect(checkpoints.has("10")).toBe(true);
    expect(logger.events()).toContain("entity.failed");
  });

  it("stops at the earliest complete folder in a range", async () => {
    const { pass, sink } = setup(
      {
        "10": {
          "20250105": readyFolder("Day5"),
          "20250102": readyFolder("Day2"),
          "20250101": readyFolder("BeforeRange"),
        },
        "20": {
          "20250103": { [ITEM_FILE]: "Partial" },
          "20250104": readyFolder("Day4"),
        },
      },
      new DateRangeResolver("20250102", "20250106"),
    );

    const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints: new Set() });

    expect(result.processed).toEqual(["10", "20"]);
    expect(sink.upserts.map((u) => u.location)).toEqual(["Day2", "Day4"]);
  });

  it("reports an entity with no folders in range as not ready", async () => {
    const { pass } = setup(
      { "10": { "20241231": readyFolder("Old") } },
      new DateRangeResolver("20250101", "20250131"),
    );

    const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints: new Set() });

    expect(result.notReady).toEqual([{ entity: "10", reason: "no-date-folder" }]);
  });

  it("lets connection failures escape", async () => {
    const { pass, source } = setup({ "10": { "20250102": readyFolder("Loc10") } });
    source.failConnects = 1;

    await expect(
      pass.execute({ runId: "RUN-1", attempt: 1, checkpoints: new Set() }),
    ).rejects.toBeInstanceOf(SourceConnectionError);
    expect(source.closes).toBe(0);
  });

  describe("against files on disk", () => {
    let root: string;

    beforeEach(() => {
      root = mkdtempSync(join(tmpdir(), "ingestion-pass-"));
      const folder = join(root, "10", "20250102");
      mkdirSync(folder, { recursive: true });
      const rows = Array.from(
        { length: 5000 },
        (_, i) => `Airport,A${i},1/2/25 9:10 AM,1,4.50,false`,
      );
      writeFileSync(
        join(folder, ITEM_FILE),
        ["Location,Order Id,Order Date,Qty,Net Price,Void?", ...rows].join("\n"),
      );
      writeFileSync(join(folder, MODIFIER_FILE), "Order Date,Qty,Net Price\n");
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it("fails only the entity when an export disappears between listing and opening", async () => {
      const sink = new RecordingSink();
      const checkpoints = new Set<string>();
      const pass = new IngestionPassUseCase(
        new VanishingModifierSource(root),
        new SingleDateResolver("20250102"),
        new CsvReportTransformService(30),
        sink,
        new MemoryCheckpointRepository(),
        new MemoryLogger(),
      );

      const result = await pass.execute({ runId: "RUN-1", attempt: 1, checkpoints });

      expect(result.processed).toEqual([]);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0]).toMatchObject({ entity: "10", folder: "20250102" });
      expect(result.failed[0].error).toMatch(/^ENOENT/);
      expect(sink.upserts).toEqual([]);
      expect(checkpoints.size).toBe(0);
    });
  });
});
