import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MetadataPersistError } from "../../src/core/errors";
import { createEmptyMetadata, MetadataStore } from "../../src/core/metadata-store";
import { makeTempDir, removeDir } from "../helpers/tmp";

describe("MetadataStore", () => {
  let dir: string;
  let store: MetadataStore;

  beforeEach(() => {
    dir = makeTempDir();
    store = new MetadataStore(path.join(dir, "metadata"));
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("returns null before anything was saved", () => {
    expect(store.load("p1")).toBeNull();
  });

  it("round-trips a partition", () => {
    const metadata = createEmptyMetadata("p1", { chunkSize: 1000, chunkOverlap: 200, model: "m" });
    metadata.lastSyncAt = "2026-02-03T04:05:06.000Z";
    metadata.files["src/a.py"] = {
      fingerprint: "abc",
      chunkIds: ["c0", "c1"],
      mtimeMs: 42,
      size: 7,
      lastSyncAt: "2026-02-03T04:05:06.000Z"
    };

    store.save(metadata);

    expect(store.load("p1")).toEqual(metadata);
    expect(fs.readdirSync(path.join(dir, "metadata"))).toEqual(["p1.json"]);
  });

  it("round-trips the last pass and drops a malformed one", () => {
    const metadata = createEmptyMetadata("p1", { chunkSize: 1000, chunkOverlap: 200, model: "m" });
    metadata.lastPass = {
      outcome: "failed",
      finishedAt: "2026-02-03T04:05:06.000Z",
      error: "store unavailable",
      report: {
        added: 1,
        modified: 0,
        deleted: 0,
        deferred: 1,
        unchanged: 2,
        deferredPaths: ["b.py"],
        chunksUpserted: 3,
        chunksDeleted: 0,
        orphansPruned: 0,
        enumerationErrors: 0,
        rootMissing: false,
        startedAt: "2026-02-03T04:05:00.000Z",
        finishedAt: "2026-02-03T04:05:01.000Z",
        durationMs: 1000
      },
      pendingPaths: ["b.py"]
    };
    store.save(metadata);
    expect(store.load("p1")).toEqual(metadata);

    fs.writeFileSync(
      store.filePath("p1"),
      JSON.stringify({ ...metadata, lastPass: { outcome: "exploded", finishedAt: "t", pendingPaths: [] } })
    );
    expect(store.load("p1")?.lastPass).toBeNull();
  });

  it("keeps partitions separate per project", () => {
    store.save(createEmptyMetadata("p1", { chunkSize: 10, chunkOverlap: 1, model: "a" }));
    store.save(createEmptyMetadata("p2", { chunkSize: 20, chunkOverlap: 2, model: "b" }));

    store.drop("p1");

    expect(store.load("p1")).toBeNull();
    expect(store.load("p2")?.chunkSize).toBe(20);
  });

  it("treats a corrupt partition as empty", () => {
    fs.mkdirSync(path.join(dir, "metadata"));
    fs.writeFileSync(store.filePath("p1"), "{ not json");

    expect(store.load("p1")).toBeNull();
  });

  it("drops malformed file entries and keeps the rest", () => {
    fs.mkdirSync(path.join(dir, "metadata"));
    fs.writeFileSync(
      store.filePath("p1"),
      JSON.stringify({
        version: 1,
        chunkSize: 100,
        chunkOverlap: 10,
        model: "m",
        lastSyncAt: null,
        files: {
          "good.py": { fingerprint: "f", chunkIds: ["a"], mtimeMs: 1, size: 2, lastSyncAt: "t" },
          "bad.py": { fingerprint: 3, chunkIds: [] }
        }
      })
    );

    expect(Object.keys(store.load("p1")?.files ?? {})).toEqual(["good.py"]);
  });

  it("wraps write failures in MetadataPersistError", () => {
    const blocker = path.join(dir, "file");
    fs.writeFileSync(blocker, "");
    const broken = new MetadataStore(path.join(blocker, "metadata"));

    expect(() => broken.save(createEmptyMetadata("p1", { chunkSize: 10, chunkOverlap: 1, model: "m" }))).toThrow(
      MetadataPersistError
    );
  });
});
