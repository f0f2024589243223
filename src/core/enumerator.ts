import fs from "fs";
import path from "path";
import ignore from "ignore";
import { EnumerationError } from "./errors";
import { logger } from "./logger";
import type { ProjectRules } from "./project";
import { toPosixPath } from "../utils/fs";

export type EnumeratedFile = {
  absPath: string;
  /** POSIX path relative to the project root; the Metadata Store key. */
  relPath: string;
  size: number;
  mtimeMs: number;
};

export type EnumerationResult = {
  files: EnumeratedFile[];
  errors: EnumerationError[];
};

type IgnoreMatcher = ReturnType<typeof ignore>;

const SNIFF_BYTES = 1024;
const NON_TEXT_RATIO = 0.3;
const TEXT_CONTROL_BYTES = new Set([7, 8, 9, 10, 12, 13, 27]);

function readPatternFile(filePath: string): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch {
    return [];
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Excluded directory names are anchored to directories (trailing slash) so a
 * file called `build` is still indexed; ignore-file patterns keep their
 * gitignore meaning.
 */
export function buildIgnoreMatcher(root: string, rules: ProjectRules): IgnoreMatcher {
  const ig = ignore({ allowRelativePaths: true });
  ig.add(rules.excludeDirs.map((pattern) => (pattern.endsWith("/") ? pattern : `${pattern}/`)));
  if (rules.respectGitignore) {
    ig.add(readPatternFile(path.join(root, ".gitignore")));
  }
  const local = readPatternFile(path.join(root, rules.ignoreFile));
  if (local.length > 0) {
    logger.debug(`Loaded ${local.length} ignore patterns from ${rules.ignoreFile}`, { root });
    ig.add(local);
  }
  return ig;
}

export function isBinarySample(sample: Buffer): boolean {
  if (sample.length === 0) return false;
  let nonText = 0;
  for (const byte of sample) {
    if (byte === 0) return true;
    if (byte < 0x20 && !TEXT_CONTROL_BYTES.has(byte)) nonText += 1;
  }
  return nonText / sample.length > NON_TEXT_RATIO;
}

async function looksBinary(filePath: string): Promise<boolean> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return isBinarySample(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

/**
 * Walks a project root and returns the candidate files, ordered by relative
 * path. Unreadable subtrees are reported in `errors` and skipped. Each
 * directory's canonical path is entered at most once per walk, which keeps
 * symlink cycles finite.
 */
export async function enumerateProjectFiles(root: string, rules: ProjectRules): Promise<EnumerationResult> {
  const absRoot = path.resolve(root);
  const ig = buildIgnoreMatcher(absRoot, rules);
  const extensions = new Set(rules.extensions.map((ext) => ext.toLowerCase()));
  const visited = new Set<string>();
  const files: EnumeratedFile[] = [];
  const errors: EnumerationError[] = [];

  const fail = (target: string, err: unknown) => {
    const error = new EnumerationError(target, err);
    errors.push(error);
    logger.warn(error.message);
  };

  // A path the matcher rejects is reported and left out, like any other unreadable entry.
  const isIgnored = (absPath: string, relPath: string): boolean => {
    try {
      return ig.ignores(relPath);
    } catch (err) {
      fail(absPath, err);
      return true;
    }
  };

  const visitFile = async (absPath: string, relPath: string) => {
    if (!extensions.has(path.extname(relPath).toLowerCase())) return;
    if (isIgnored(absPath, relPath)) return;
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(absPath);
    } catch (err) {
      fail(absPath, err);
      return;
    }
    if (stat.size > rules.maxFileBytes) {
      logger.debug(`Skipping ${relPath}: ${stat.size} bytes exceeds ${rules.maxFileBytes}`);
      return;
    }
    try {
      if (await looksBinary(absPath)) {
        logger.debug(`Skipping binary file ${relPath}`);
        return;
      }
    } catch (err) {
      fail(absPath, err);
      return;
    }
    files.push({ absPath, relPath, size: stat.size, mtimeMs: Math.floor(stat.mtimeMs) });
  };

  const walk = async (dir: string, relDir: string): Promise<void> => {
    let real: string;
    try {
      real = await fs.promises.realpath(dir);
    } catch (err) {
      fail(dir, err);
      return;
    }
    if (visited.has(real)) {
      logger.debug(`Skipping already visited directory ${dir}`);
      return;
    }
    visited.add(real);

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      fail(dir, err);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const absPath = path.join(dir, entry.name);
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

      let isDir = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        try {
          const target = await fs.promises.stat(absPath);
          isDir = target.isDirectory();
          isFile = target.isFile();
        } catch (err) {
          fail(absPath, err);
          continue;
        }
      }

      if (isDir) {
        if (isIgnored(absPath, `${relPath}/`)) continue;
        await walk(absPath, relPath);
      } else if (isFile) {
        await visitFile(absPath, toPosixPath(relPath));
      }
    }
  };

  await walk(absRoot, "");
  files.sort((a, b) => (a.relPath < b.relPath ? -1 : a.relPath > b.relPath ? 1 : 0));
  return { files, errors };
}
