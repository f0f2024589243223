import fs from "fs";
import path from "path";
import { sha256Hex } from "../utils/hash";
import { ConfigError, formatErrorMessage } from "./errors";
import { PROJECT_CONFIG_FILENAME } from "./layout";
import { assertValidChunking, type Settings } from "./settings";

export type ProjectRules = {
  extensions: string[];
  excludeDirs: string[];
  maxFileBytes: number;
  ignoreFile: string;
  respectGitignore: boolean;
  chunkSize: number;
  chunkOverlap: number;
};

export type Project = {
  id: string;
  root: string;
  rules: ProjectRules;
  registeredAt: string;
};

const PROJECT_ID_HASH_LENGTH = 8;

/**
 * Stable collection id for a root: readable base name plus a short digest of
 * the absolute path, so two checkouts named alike never share a collection.
 */
export function projectIdForPath(root: string): string {
  const absolute = path.resolve(root);
  const base = path.basename(absolute).replace(/[^a-zA-Z0-9_-]/g, "_") || "root";
  return `${base}-${sha256Hex(absolute).slice(0, PROJECT_ID_HASH_LENGTH)}`;
}

export function defaultRules(settings: Settings): ProjectRules {
  return {
    extensions: [...settings.files.extensions],
    excludeDirs: [...settings.files.excludeDirs],
    maxFileBytes: settings.files.maxFileBytes,
    ignoreFile: settings.files.ignoreFile,
    respectGitignore: settings.files.respectGitignore,
    chunkSize: settings.chunking.size,
    chunkOverlap: settings.chunking.overlap
  };
}

function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  if (!trimmed) return trimmed;
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function validateRules(rules: ProjectRules, source = "project rules"): ProjectRules {
  assertValidChunking(rules.chunkSize, rules.chunkOverlap, source);
  if (!Number.isFinite(rules.maxFileBytes) || rules.maxFileBytes <= 0) {
    throw new ConfigError(`${source}: maxFileBytes must be positive (got ${rules.maxFileBytes})`);
  }
  const extensions = Array.from(new Set(rules.extensions.map(normalizeExtension).filter(Boolean)));
  if (extensions.length === 0) {
    throw new ConfigError(`${source}: at least one file extension is required`);
  }
  return {
    ...rules,
    extensions,
    excludeDirs: Array.from(new Set(rules.excludeDirs.map((d) => d.trim()).filter(Boolean)))
  };
}

export function mergeRules(base: ProjectRules, overrides: Partial<ProjectRules>, source?: string): ProjectRules {
  const merged: ProjectRules = { ...base };
  if (overrides.extensions !== undefined) merged.extensions = overrides.extensions;
  if (overrides.excludeDirs !== undefined) merged.excludeDirs = overrides.excludeDirs;
  if (overrides.maxFileBytes !== undefined) merged.maxFileBytes = overrides.maxFileBytes;
  if (overrides.ignoreFile !== undefined) merged.ignoreFile = overrides.ignoreFile;
  if (overrides.respectGitignore !== undefined) merged.respectGitignore = overrides.respectGitignore;
  if (overrides.chunkSize !== undefined) merged.chunkSize = overrides.chunkSize;
  if (overrides.chunkOverlap !== undefined) merged.chunkOverlap = overrides.chunkOverlap;
  return validateRules(merged, source);
}

export function rulesEqual(a: ProjectRules, b: ProjectRules): boolean {
  return (
    a.extensions.join("\n") === b.extensions.join("\n") &&
    a.excludeDirs.join("\n") === b.excludeDirs.join("\n") &&
    a.maxFileBytes === b.maxFileBytes &&
    a.ignoreFile === b.ignoreFile &&
    a.respectGitignore === b.respectGitignore &&
    a.chunkSize === b.chunkSize &&
    a.chunkOverlap === b.chunkOverlap
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

const OVERRIDE_KEYS = ["extensions", "excludeDirs", "maxFileBytes", "chunkSize", "chunkOverlap"];

/** Reads `<root>/.vecsync.json`; a missing file means no overrides. */
export function readProjectOverrides(root: string): Partial<ProjectRules> {
  const filePath = path.join(root, PROJECT_CONFIG_FILENAME);
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Invalid ${PROJECT_CONFIG_FILENAME} at ${filePath}: ${formatErrorMessage(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }

  const out: Partial<ProjectRules> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!OVERRIDE_KEYS.includes(key)) {
      throw new ConfigError(`Unknown ${PROJECT_CONFIG_FILENAME} key: ${key}`);
    }
    if (key === "extensions" || key === "excludeDirs") {
      if (!isStringArray(value)) throw new ConfigError(`${PROJECT_CONFIG_FILENAME}: ${key} must be an array of strings`);
      out[key] = value;
      continue;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConfigError(`${PROJECT_CONFIG_FILENAME}: ${key} must be a number`);
    }
    if (key === "maxFileBytes") out.maxFileBytes = value;
    else if (key === "chunkSize") out.chunkSize = value;
    else if (key === "chunkOverlap") out.chunkOverlap = value;
  }
  return out;
}

/** Registered rules with the project-local overrides applied, as a pass sees them. */
export function effectiveRules(project: Project): ProjectRules {
  const overrides = readProjectOverrides(project.root);
  if (Object.keys(overrides).length === 0) return project.rules;
  return mergeRules(project.rules, overrides, path.join(project.root, PROJECT_CONFIG_FILENAME));
}
