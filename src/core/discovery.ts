import fs from "fs";
import path from "path";
import { formatErrorMessage } from "./errors";
import { logger } from "./logger";

export const PROJECT_MARKERS = [
  ".git",
  "package.json",
  "pyproject.toml",
  "setup.py",
  "Cargo.toml",
  "go.mod",
  "pom.xml",
  "build.gradle",
  "composer.json",
  "Gemfile"
];

export type DiscoveryOptions = {
  maxDepth?: number;
  excludeDirs?: string[];
};

/**
 * Finds project roots under `dir` by marker files. A directory that is a
 * project is not searched further, so nested packages of a monorepo collapse
 * into their outermost root.
 */
export async function discoverProjects(dir: string, options: DiscoveryOptions = {}): Promise<string[]> {
  const maxDepth = Math.max(0, options.maxDepth ?? 3);
  const excluded = new Set(options.excludeDirs ?? []);
  const visited = new Set<string>();
  const found: string[] = [];

  const walk = async (current: string, depth: number): Promise<void> => {
    let real: string;
    try {
      real = await fs.promises.realpath(current);
    } catch (err) {
      logger.warn(`Cannot resolve ${current}: ${formatErrorMessage(err)}`);
      return;
    }
    if (visited.has(real)) return;
    visited.add(real);

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(current, { withFileTypes: true });
    } catch (err) {
      logger.warn(`Cannot read ${current}: ${formatErrorMessage(err)}`);
      return;
    }

    const names = new Set(entries.map((entry) => entry.name));
    if (PROJECT_MARKERS.some((marker) => names.has(marker))) {
      found.push(path.resolve(current));
      return;
    }
    if (depth >= maxDepth) return;

    for (const entry of entries) {
      if (!entry.isDirectory() || excluded.has(entry.name) || entry.name.startsWith(".")) continue;
      await walk(path.join(current, entry.name), depth + 1);
    }
  };

  await walk(path.resolve(dir), 0);
  return found.sort();
}
