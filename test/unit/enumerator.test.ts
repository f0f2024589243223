import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EnumerationError } from "../../src/core/errors";
import { enumerateProjectFiles, isBinarySample } from "../../src/core/enumerator";
import { defaultRules, type ProjectRules } from "../../src/core/project";
import { DEFAULT_SETTINGS } from "../../src/core/settings";
import { makeTempDir, removeDir, writeFiles } from "../helpers/tmp";

describe("isBinarySample", () => {
  it("flags NUL bytes and control-heavy samples", () => {
    expect(isBinarySample(Buffer.from("hello\n"))).toBe(false);
    expect(isBinarySample(Buffer.from("a\tb\x1b[0m\r\n"))).toBe(false);
    expect(isBinarySample(Buffer.from([0x41, 0x00]))).toBe(true);
    expect(isBinarySample(Buffer.from([1, 2, 3, 65]))).toBe(true);
    expect(isBinarySample(Buffer.alloc(0))).toBe(false);
  });
});

describe("enumerateProjectFiles", () => {
  let root: string;
  let rules: ProjectRules;

  beforeEach(() => {
    root = makeTempDir();
    rules = { ...defaultRules(DEFAULT_SETTINGS), maxFileBytes: 50 };
  });

  afterEach(() => {
    removeDir(root);
  });

  it("applies extension, exclusion, ignore, size and binary filters", async () => {
    writeFiles(root, {
      "src/a.py": "print('a')\n",
      "src/b.txt": "notes\n",
      "README.md": "# hi\n",
      "image.png": "not really a png",
      "node_modules/x/index.js": "module.exports = 1;\n",
      "build/out.js": "compiled\n",
      ".gitignore": "*.log\nsecret/\n",
      "secret/key.py": "KEY = 'test-secret'\n",
      "debug.log": "log line\n",
      ".vecsyncignore": "# local rules\ndocs/*.md\n",
      "docs/guide.md": "guide\n",
      "big.py": "x".repeat(100),
      "blob.py": Buffer.from([0x00, 0x01, 0x02, 0x03])
    });

    const { files, errors } = await enumerateProjectFiles(root, rules);

    expect(errors).toEqual([]);
    expect(files.map((file) => file.relPath)).toEqual(["README.md", "src/a.py", "src/b.txt"]);
    const first = files[0];
    expect(first?.absPath).toBe(path.join(root, "README.md"));
    expect(first?.size).toBe(5);
  });

  it("walks directories whose names are only dots", async () => {
    writeFiles(root, { ".../x.py": "x = 1\n", "..a/y.py": "y = 2\n" });

    const { files, errors } = await enumerateProjectFiles(root, rules);

    expect(errors).toEqual([]);
    expect(files.map((file) => file.relPath)).toEqual([".../x.py", "..a/y.py"]);
  });

  it("ignores .gitignore when told to", async () => {
    writeFiles(root, { ".gitignore": "skip.py\n", "skip.py": "x = 1\n" });

    const respected = await enumerateProjectFiles(root, rules);
    const disregarded = await enumerateProjectFiles(root, { ...rules, respectGitignore: false });

    expect(respected.files.map((file) => file.relPath)).toEqual([]);
    expect(disregarded.files.map((file) => file.relPath)).toEqual(["skip.py"]);
  });

  it("only excludes directories by name, not files", async () => {
    writeFiles(root, { "dist/x.py": "x\n", "lib/dist.py": "y\n" });

    const { files } = await enumerateProjectFiles(root, rules);

    expect(files.map((file) => file.relPath)).toEqual(["lib/dist.py"]);
  });

  it("follows symlinks and enters each directory once", async () => {
    writeFiles(root, { "src/a.py": "a\n" });
    fs.symlinkSync(root, path.join(root, "src", "loop"), "dir");
    fs.symlinkSync(path.join(root, "src", "a.py"), path.join(root, "link.py"), "file");

    const { files, errors } = await enumerateProjectFiles(root, rules);

    expect(errors).toEqual([]);
    expect(files.map((file) => file.relPath)).toEqual(["link.py", "src/a.py"]);
  });

  it("reports a dangling symlink and keeps walking", async () => {
    writeFiles(root, { "ok.py": "ok\n" });
    fs.symlinkSync(path.join(root, "missing.py"), path.join(root, "dangling.py"));

    const { files, errors } = await enumerateProjectFiles(root, rules);

    expect(files.map((file) => file.relPath)).toEqual(["ok.py"]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(EnumerationError);
    expect(errors[0]?.path).toBe(path.join(root, "dangling.py"));
  });

  it("reports a missing root as an error with no files", async () => {
    const missing = path.join(root, "nope");

    const { files, errors } = await enumerateProjectFiles(missing, rules);

    expect(files).toEqual([]);
    expect(errors.map((error) => error.path)).toEqual([missing]);
  });
});
