import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverProjects } from "../../src/core/discovery";
import { ConfigError, ProjectNotFoundError } from "../../src/core/errors";
import {
  defaultRules,
  effectiveRules,
  mergeRules,
  projectIdForPath,
  readProjectOverrides,
  validateRules,
  type Project
} from "../../src/core/project";
import { ProjectRegistry } from "../../src/core/registry";
import { DEFAULT_SETTINGS } from "../../src/core/settings";
import { sha256Hex } from "../../src/utils/hash";
import { makeTempDir, removeDir, writeFiles } from "../helpers/tmp";

const baseRules = defaultRules(DEFAULT_SETTINGS);

describe("project rules", () => {
  it("derives a readable, path-unique id", () => {
    expect(projectIdForPath("/work/my project")).toBe(`my_project-${sha256Hex("/work/my project").slice(0, 8)}`);
    expect(projectIdForPath("/a/app")).not.toBe(projectIdForPath("/b/app"));
  });

  it("normalizes extensions and exclusions", () => {
    const rules = validateRules({ ...baseRules, extensions: ["PY", ".py", " ts "], excludeDirs: [" out ", "", "out"] });
    expect(rules.extensions).toEqual([".py", ".ts"]);
    expect(rules.excludeDirs).toEqual(["out"]);
  });

  it("rejects rules that cannot be chunked or match nothing", () => {
    expect(() => mergeRules(baseRules, { chunkSize: 300, chunkOverlap: 300 })).toThrow(ConfigError);
    expect(() => mergeRules(baseRules, { extensions: [] })).toThrow("at least one file extension is required");
    expect(() => mergeRules(baseRules, { maxFileBytes: 0 })).toThrow(ConfigError);
  });

  it("merges only the given overrides", () => {
    const rules = mergeRules(baseRules, { chunkSize: 300, chunkOverlap: 30 });
    expect(rules).toEqual({ ...baseRules, chunkSize: 300, chunkOverlap: 30 });
  });
});

describe("project-local overrides", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it("means no overrides when the file is absent", () => {
    expect(readProjectOverrides(root)).toEqual({});
  });

  it("applies the file on top of the registered rules", () => {
    writeFiles(root, { ".vecsync.json": JSON.stringify({ chunkSize: 300, chunkOverlap: 30, extensions: ["md"] }) });
    const project: Project = { id: "p", root, rules: baseRules, registeredAt: "2026-01-01T00:00:00.000Z" };

    const rules = effectiveRules(project);

    expect(rules.chunkSize).toBe(300);
    expect(rules.chunkOverlap).toBe(30);
    expect(rules.extensions).toEqual([".md"]);
  });

  it("rejects unknown keys and wrong types", () => {
    writeFiles(root, { ".vecsync.json": JSON.stringify({ chunkSize: "big" }) });
    expect(() => readProjectOverrides(root)).toThrow(".vecsync.json: chunkSize must be a number");
    writeFiles(root, { ".vecsync.json": JSON.stringify({ model: "x" }) });
    expect(() => readProjectOverrides(root)).toThrow("Unknown .vecsync.json key: model");
  });
});

describe("ProjectRegistry", () => {
  let dir: string;
  let registryFile: string;

  beforeEach(() => {
    dir = makeTempDir();
    registryFile = path.join(dir, "projects.json");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("persists projects and finds them by id or path", () => {
    const registry = new ProjectRegistry(registryFile);
    const root = path.join(dir, "alpha");
    const project = registry.upsert(root, baseRules, new Date("2026-03-01T00:00:00.000Z"));

    const reloaded = new ProjectRegistry(registryFile);
    expect(reloaded.get(project.id)).toEqual(project);
    expect(reloaded.find(root)?.id).toBe(project.id);
    expect(reloaded.require(project.id).registeredAt).toBe("2026-03-01T00:00:00.000Z");
  });

  it("keeps the registration time when rules are updated", () => {
    const registry = new ProjectRegistry(registryFile);
    const root = path.join(dir, "alpha");
    registry.upsert(root, baseRules, new Date("2026-03-01T00:00:00.000Z"));

    const updated = registry.upsert(root, { ...baseRules, chunkSize: 500 }, new Date("2026-04-01T00:00:00.000Z"));

    expect(updated.registeredAt).toBe("2026-03-01T00:00:00.000Z");
    expect(updated.rules.chunkSize).toBe(500);
    expect(registry.list()).toHaveLength(1);
  });

  it("lists by root and forgets removed projects", () => {
    const registry = new ProjectRegistry(registryFile);
    const b = registry.upsert(path.join(dir, "b"), baseRules);
    const a = registry.upsert(path.join(dir, "a"), baseRules);
    expect(registry.list().map((project) => project.id)).toEqual([a.id, b.id]);

    expect(registry.remove(a.id)).toBe(true);
    expect(registry.remove(a.id)).toBe(false);
    expect(() => new ProjectRegistry(registryFile).require(a.id)).toThrow(ProjectNotFoundError);
  });

  it("skips malformed entries in the file", () => {
    fs.writeFileSync(registryFile, JSON.stringify({ version: 1, projects: { broken: { root: 3 } } }));
    expect(new ProjectRegistry(registryFile).list()).toEqual([]);
  });

  it("sees registrations made through another instance after a refresh", () => {
    const watcher = new ProjectRegistry(registryFile);
    const other = new ProjectRegistry(registryFile);
    const a = other.upsert(path.join(dir, "a"), baseRules);
    expect(watcher.list()).toHaveLength(1);

    const b = other.upsert(path.join(dir, "b"), baseRules);
    expect(watcher.get(b.id)).toBeUndefined();
    watcher.refresh();
    expect(watcher.get(b.id)?.root).toBe(path.join(dir, "b"));

    // Writes start from the file, not from a stale cache.
    other.remove(a.id);
    watcher.upsert(path.join(dir, "c"), baseRules);
    expect(new ProjectRegistry(registryFile).list().map((project) => project.root)).toEqual([
      path.join(dir, "b"),
      path.join(dir, "c")
    ]);
  });
});

describe("discoverProjects", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("finds outermost roots by marker within the depth limit", async () => {
    fs.mkdirSync(path.join(dir, "a", ".git"), { recursive: true });
    writeFiles(dir, {
      "a/sub/package.json": "{}",
      "b/c/pyproject.toml": "",
      "node_modules/x/package.json": "{}",
      ".hidden/package.json": "{}",
      "deep/1/2/3/package.json": "{}",
      "plain/readme.txt": "no marker"
    });

    const found = await discoverProjects(dir, { maxDepth: 3, excludeDirs: ["node_modules"] });

    expect(found).toEqual([path.join(dir, "a"), path.join(dir, "b", "c")]);
  });

  it("returns the directory itself when it is a project", async () => {
    writeFiles(dir, { "go.mod": "module x\n" });
    expect(await discoverProjects(dir)).toEqual([dir]);
  });
});
