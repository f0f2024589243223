import fs from "fs";
import path from "path";
import { APP_DIRNAME, DEFAULT_IGNORE_FILENAME, getRootDir, settingsFilePath } from "./layout";
import { ConfigError, formatErrorMessage } from "./errors";
import { isLogLevel, logger, type LogLevel } from "./logger";
import { writeJsonAtomic } from "../utils/fs";

const DEFAULT_EMBEDDING_MODEL =
  "hf:nomic-ai/nomic-embed-text-v1.5-GGUF/nomic-embed-text-v1.5.Q8_0.gguf";
const DEFAULT_EMBEDDING_CACHE_DIR = `~/${APP_DIRNAME}/model-cache`;

export const CHUNK_SIZE_ENV = "VECSYNC_CHUNK_SIZE";
export const CHUNK_OVERLAP_ENV = "VECSYNC_CHUNK_OVERLAP";

export type Settings = {
  version: 1;
  chunking: {
    size: number;
    overlap: number;
  };
  files: {
    extensions: string[];
    excludeDirs: string[];
    maxFileBytes: number;
    ignoreFile: string;
    respectGitignore: boolean;
  };
  embeddings: {
    modelPath: string;
    cacheDir: string;
    batchSize: number;
    timeoutMs: number;
    retries: number;
    retryBaseDelayMs: number;
  };
  sync: {
    intervalSeconds: number;
    concurrency: number;
  };
  search: {
    limit: number;
    similarityThreshold: number;
  };
  debug: {
    logLevel: LogLevel;
  };
};

export const DEFAULT_SETTINGS: Settings = {
  version: 1,
  chunking: { size: 1000, overlap: 200 },
  files: {
    extensions: [
      ".py", ".js", ".jsx", ".ts", ".tsx",
      ".java", ".cpp", ".c", ".h", ".hpp",
      ".cs", ".go", ".rs", ".php", ".rb",
      ".swift", ".kt", ".scala", ".sh",
      ".md", ".txt", ".json", ".yaml", ".yml"
    ],
    excludeDirs: [
      ".git", "node_modules", "__pycache__",
      ".venv", "venv", "env", ".env",
      "dist", "build", ".next", "target",
      ".pytest_cache", ".mypy_cache"
    ],
    maxFileBytes: 1024 * 1024,
    ignoreFile: DEFAULT_IGNORE_FILENAME,
    respectGitignore: true
  },
  embeddings: {
    modelPath: DEFAULT_EMBEDDING_MODEL,
    cacheDir: DEFAULT_EMBEDDING_CACHE_DIR,
    batchSize: 32,
    timeoutMs: 120_000,
    retries: 3,
    retryBaseDelayMs: 500
  },
  sync: {
    intervalSeconds: 300,
    concurrency: 4
  },
  search: {
    limit: 10,
    similarityThreshold: 0
  },
  debug: {
    logLevel: "info"
  }
};

function cloneDefaults(): Settings {
  return structuredClone(DEFAULT_SETTINGS);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertNoUnknownKeys(obj: Record<string, unknown>, allowed: string[], prefix: string): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) {
      throw new ConfigError(`Unknown ${prefix} key: ${key}`);
    }
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim().length > 0) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }
  return null;
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "y", "on"].includes(normalized)) return true;
    if (["0", "false", "no", "n", "off"].includes(normalized)) return false;
  }
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
  }
  return null;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}

type FieldResult<T> = { value: T; changed: boolean };

function readInt(
  section: Record<string, unknown>,
  key: string,
  prefix: string,
  fallback: number,
  min: number,
  max: number
): FieldResult<number> {
  const raw = section[key];
  if (raw === undefined) return { value: fallback, changed: true };
  const num = toNumber(raw);
  if (num === null) {
    throw new ConfigError(`${prefix}.${key} must be a number`);
  }
  const value = clampInt(num, min, max);
  return { value, changed: value !== raw };
}

function readFloat(
  section: Record<string, unknown>,
  key: string,
  prefix: string,
  fallback: number,
  min: number,
  max: number
): FieldResult<number> {
  const raw = section[key];
  if (raw === undefined) return { value: fallback, changed: true };
  const num = toNumber(raw);
  if (num === null) {
    throw new ConfigError(`${prefix}.${key} must be a number`);
  }
  const value = Math.min(max, Math.max(min, num));
  return { value, changed: value !== raw };
}

function readString(
  section: Record<string, unknown>,
  key: string,
  prefix: string,
  fallback: string
): FieldResult<string> {
  const raw = section[key];
  if (raw === undefined) return { value: fallback, changed: true };
  if (typeof raw !== "string") {
    throw new ConfigError(`${prefix}.${key} must be a string`);
  }
  return { value: raw, changed: false };
}

function readBoolean(
  section: Record<string, unknown>,
  key: string,
  prefix: string,
  fallback: boolean
): FieldResult<boolean> {
  const raw = section[key];
  if (raw === undefined) return { value: fallback, changed: true };
  const value = toBoolean(raw);
  if (value === null) {
    throw new ConfigError(`${prefix}.${key} must be a boolean`);
  }
  return { value, changed: value !== raw };
}

function readStringList(
  section: Record<string, unknown>,
  key: string,
  prefix: string,
  fallback: string[]
): FieldResult<string[]> {
  const raw = section[key];
  if (raw === undefined) return { value: [...fallback], changed: true };
  if (!Array.isArray(raw) || raw.some((entry) => typeof entry !== "string")) {
    throw new ConfigError(`${prefix}.${key} must be an array of strings`);
  }
  return { value: raw.filter((entry): entry is string => typeof entry === "string"), changed: false };
}

function readSection(
  raw: Record<string, unknown>,
  key: string,
  allowed: string[]
): Record<string, unknown> | undefined {
  const section = raw[key];
  if (section === undefined) return undefined;
  if (!isObject(section)) {
    throw new ConfigError(`settings.${key} must be an object`);
  }
  assertNoUnknownKeys(section, allowed, `settings.${key}`);
  return section;
}

/** Rejects chunking that cannot advance: size must be positive and overlap in [0, size). */
export function assertValidChunking(size: number, overlap: number, source = "chunking"): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`${source}: chunk size must be a positive integer (got ${size})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new ConfigError(
      `${source}: chunk overlap must satisfy 0 <= overlap < size (got overlap=${overlap}, size=${size})`
    );
  }
}

export function normalizeSettings(raw: unknown): { settings: Settings; changed: boolean } {
  const out = cloneDefaults();
  let changed = false;

  if (!isObject(raw)) {
    return { settings: out, changed: true };
  }

  assertNoUnknownKeys(raw, ["version", "chunking", "files", "embeddings", "sync", "search", "debug"], "settings");

  if (raw.version === undefined) {
    changed = true;
  } else if (raw.version !== 1) {
    throw new ConfigError(`Unsupported settings.version: ${String(raw.version)}`);
  }

  const track = <T>(result: FieldResult<T>): T => {
    if (result.changed) changed = true;
    return result.value;
  };

  const chunking = readSection(raw, "chunking", ["size", "overlap"]);
  if (!chunking) {
    changed = true;
  } else {
    out.chunking.size = track(readInt(chunking, "size", "settings.chunking", out.chunking.size, 1, 1_000_000));
    // Overlap is not clamped: an overlap that swallows the chunk is a configuration mistake.
    const overlap = chunking.overlap;
    if (overlap === undefined) {
      changed = true;
    } else {
      const num = toNumber(overlap);
      if (num === null) throw new ConfigError("settings.chunking.overlap must be a number");
      out.chunking.overlap = num;
      if (num !== overlap) changed = true;
    }
  }
  assertValidChunking(out.chunking.size, out.chunking.overlap, "settings.chunking");

  const files = readSection(raw, "files", [
    "extensions",
    "excludeDirs",
    "maxFileBytes",
    "ignoreFile",
    "respectGitignore"
  ]);
  if (!files) {
    changed = true;
  } else {
    out.files.extensions = track(readStringList(files, "extensions", "settings.files", out.files.extensions));
    out.files.excludeDirs = track(readStringList(files, "excludeDirs", "settings.files", out.files.excludeDirs));
    out.files.maxFileBytes = track(
      readInt(files, "maxFileBytes", "settings.files", out.files.maxFileBytes, 1, 1024 * 1024 * 1024)
    );
    out.files.ignoreFile = track(readString(files, "ignoreFile", "settings.files", out.files.ignoreFile));
    out.files.respectGitignore = track(
      readBoolean(files, "respectGitignore", "settings.files", out.files.respectGitignore)
    );
  }

  const embeddings = readSection(raw, "embeddings", [
    "modelPath",
    "cacheDir",
    "batchSize",
    "timeoutMs",
    "retries",
    "retryBaseDelayMs"
  ]);
  if (!embeddings) {
    changed = true;
  } else {
    const prefix = "settings.embeddings";
    out.embeddings.modelPath = track(readString(embeddings, "modelPath", prefix, out.embeddings.modelPath));
    out.embeddings.cacheDir = track(readString(embeddings, "cacheDir", prefix, out.embeddings.cacheDir));
    out.embeddings.batchSize = track(readInt(embeddings, "batchSize", prefix, out.embeddings.batchSize, 1, 4096));
    out.embeddings.timeoutMs = track(
      readInt(embeddings, "timeoutMs", prefix, out.embeddings.timeoutMs, 0, 60 * 60 * 1000)
    );
    out.embeddings.retries = track(readInt(embeddings, "retries", prefix, out.embeddings.retries, 0, 10));
    out.embeddings.retryBaseDelayMs = track(
      readInt(embeddings, "retryBaseDelayMs", prefix, out.embeddings.retryBaseDelayMs, 0, 60_000)
    );
  }

  const sync = readSection(raw, "sync", ["intervalSeconds", "concurrency"]);
  if (!sync) {
    changed = true;
  } else {
    out.sync.intervalSeconds = track(
      readInt(sync, "intervalSeconds", "settings.sync", out.sync.intervalSeconds, 0, 7 * 24 * 3600)
    );
    out.sync.concurrency = track(readInt(sync, "concurrency", "settings.sync", out.sync.concurrency, 1, 64));
  }

  const search = readSection(raw, "search", ["limit", "similarityThreshold"]);
  if (!search) {
    changed = true;
  } else {
    out.search.limit = track(readInt(search, "limit", "settings.search", out.search.limit, 1, 200));
    out.search.similarityThreshold = track(
      readFloat(search, "similarityThreshold", "settings.search", out.search.similarityThreshold, -1, 1)
    );
  }

  const debug = readSection(raw, "debug", ["logLevel"]);
  if (!debug) {
    changed = true;
  } else if (debug.logLevel === undefined) {
    changed = true;
  } else if (isLogLevel(debug.logLevel)) {
    out.debug.logLevel = debug.logLevel;
  } else {
    throw new ConfigError(`settings.debug.logLevel must be one of debug, info, warn, error, silent`);
  }

  if (!out.embeddings.modelPath.trim()) {
    throw new ConfigError("settings.embeddings.modelPath is required");
  }

  return { settings: out, changed };
}

function readIntEnv(name: string): number | undefined {
  const raw = process.env[name]?.trim();
  if (!raw) return undefined;
  const num = Number(raw);
  if (!Number.isInteger(num)) {
    logger.warn(`Ignoring invalid ${name}: ${raw}`);
    return undefined;
  }
  return num;
}

/** Environment values win over the file but are never written back to it. */
export function applyEnvOverrides(settings: Settings): Settings {
  const size = readIntEnv(CHUNK_SIZE_ENV);
  const overlap = readIntEnv(CHUNK_OVERLAP_ENV);
  if (size === undefined && overlap === undefined) return settings;
  const next: Settings = { ...settings, chunking: { ...settings.chunking } };
  if (size !== undefined) next.chunking.size = size;
  if (overlap !== undefined) next.chunking.overlap = overlap;
  assertValidChunking(next.chunking.size, next.chunking.overlap, "environment");
  return next;
}

export function ensureSettings(): Settings {
  const rootDir = getRootDir();
  const filePath = settingsFilePath();
  if (!fs.existsSync(rootDir)) {
    fs.mkdirSync(rootDir, { recursive: true });
  }

  if (!fs.existsSync(filePath)) {
    writeJsonAtomic(filePath, DEFAULT_SETTINGS);
    return applyEnvOverrides(cloneDefaults());
  }

  const rawText = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText);
  } catch (err) {
    throw new ConfigError(`Invalid settings.json at ${filePath}\n${formatErrorMessage(err)}`);
  }

  const normalized = normalizeSettings(parsed);
  if (normalized.changed) {
    writeJsonAtomic(filePath, normalized.settings);
  }
  return applyEnvOverrides(normalized.settings);
}

export function resolveUserPath(raw: string, baseDir: string): string {
  if (!raw) return raw;
  if (raw.startsWith("~")) {
    return path.join(process.env.HOME || "", raw.slice(1));
  }
  if (path.isAbsolute(raw)) return raw;
  return path.resolve(baseDir, raw);
}
