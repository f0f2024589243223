import fs from "fs";
import path from "path";
import { MetadataPersistError, formatErrorMessage } from "./errors";
import { logger } from "./logger";
import { writeJsonAtomic } from "../utils/fs";

export type FileRecord = {
  fingerprint: string;
  /** Chunk ids in ordinal order. */
  chunkIds: string[];
  mtimeMs: number;
  size: number;
  lastSyncAt: string;
};

export type SyncReport = {
  added: number;
  modified: number;
  deleted: number;
  deferred: number;
  unchanged: number;
  deferredPaths: string[];
  chunksUpserted: number;
  chunksDeleted: number;
  orphansPruned: number;
  enumerationErrors: number;
  rootMissing: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
};

/** How the most recent pass ended, kept so other processes can report it. */
export type LastPass = {
  outcome: "completed" | "cancelled" | "failed";
  finishedAt: string;
  error: string | null;
  report: SyncReport | null;
  /** Paths left for the next pass: deferred files, or everything uncommitted when cancelled. */
  pendingPaths: string[];
};

export type ProjectMetadata = {
  version: 1;
  projectId: string;
  chunkSize: number;
  chunkOverlap: number;
  model: string;
  lastSyncAt: string | null;
  lastPass: LastPass | null;
  files: Record<string, FileRecord>;
};

export function createEmptyMetadata(
  projectId: string,
  params: { chunkSize: number; chunkOverlap: number; model: string }
): ProjectMetadata {
  return {
    version: 1,
    projectId,
    chunkSize: params.chunkSize,
    chunkOverlap: params.chunkOverlap,
    model: params.model,
    lastSyncAt: null,
    lastPass: null,
    files: {}
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function parseFileRecord(raw: unknown): FileRecord | null {
  if (!isObject(raw)) return null;
  const { fingerprint, chunkIds, mtimeMs, size, lastSyncAt } = raw;
  if (typeof fingerprint !== "string") return null;
  if (!isStringArray(chunkIds)) return null;
  return {
    fingerprint,
    chunkIds,
    mtimeMs: typeof mtimeMs === "number" ? mtimeMs : 0,
    size: typeof size === "number" ? size : 0,
    lastSyncAt: typeof lastSyncAt === "string" ? lastSyncAt : new Date(0).toISOString()
  };
}

const REPORT_COUNTERS = [
  "added",
  "modified",
  "deleted",
  "deferred",
  "unchanged",
  "chunksUpserted",
  "chunksDeleted",
  "orphansPruned",
  "enumerationErrors",
  "durationMs"
] as const;

function parseReport(raw: unknown): SyncReport | null {
  if (!isObject(raw)) return null;
  const counters: Record<(typeof REPORT_COUNTERS)[number], number> = {
    added: 0,
    modified: 0,
    deleted: 0,
    deferred: 0,
    unchanged: 0,
    chunksUpserted: 0,
    chunksDeleted: 0,
    orphansPruned: 0,
    enumerationErrors: 0,
    durationMs: 0
  };
  for (const key of REPORT_COUNTERS) {
    const value = raw[key];
    if (typeof value !== "number") return null;
    counters[key] = value;
  }
  const { deferredPaths, rootMissing, startedAt, finishedAt } = raw;
  if (!isStringArray(deferredPaths) || typeof rootMissing !== "boolean") return null;
  if (typeof startedAt !== "string" || typeof finishedAt !== "string") return null;
  return { ...counters, deferredPaths, rootMissing, startedAt, finishedAt };
}

function parseLastPass(raw: unknown): LastPass | null {
  if (!isObject(raw)) return null;
  const { outcome, finishedAt, error, pendingPaths } = raw;
  if (outcome !== "completed" && outcome !== "cancelled" && outcome !== "failed") return null;
  if (typeof finishedAt !== "string" || !isStringArray(pendingPaths)) return null;
  return {
    outcome,
    finishedAt,
    error: typeof error === "string" ? error : null,
    report: parseReport(raw.report),
    pendingPaths
  };
}

function parseMetadata(projectId: string, raw: unknown): ProjectMetadata | null {
  if (!isObject(raw) || raw.version !== 1 || !isObject(raw.files)) return null;
  const files: Record<string, FileRecord> = {};
  for (const [relPath, entry] of Object.entries(raw.files)) {
    const record = parseFileRecord(entry);
    if (!record) {
      logger.warn(`Dropping malformed metadata entry ${relPath}`, { projectId });
      continue;
    }
    files[relPath] = record;
  }
  return {
    version: 1,
    projectId,
    chunkSize: typeof raw.chunkSize === "number" ? raw.chunkSize : 0,
    chunkOverlap: typeof raw.chunkOverlap === "number" ? raw.chunkOverlap : 0,
    model: typeof raw.model === "string" ? raw.model : "",
    lastSyncAt: typeof raw.lastSyncAt === "string" ? raw.lastSyncAt : null,
    lastPass: parseLastPass(raw.lastPass),
    files
  };
}

/**
 * One JSON partition per project under the metadata directory. Only the
 * project's own coordinator writes its partition.
 */
export class MetadataStore {
  constructor(private readonly dir: string) {}

  filePath(projectId: string): string {
    return path.join(this.dir, `${projectId}.json`);
  }

  /** Returns null when nothing was persisted yet or the partition is unreadable. */
  load(projectId: string): ProjectMetadata | null {
    const filePath = this.filePath(projectId);
    if (!fs.existsSync(filePath)) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      logger.warn(`Ignoring unreadable metadata ${filePath}: ${formatErrorMessage(err)}`);
      return null;
    }
    const metadata = parseMetadata(projectId, parsed);
    if (!metadata) {
      logger.warn(`Ignoring metadata with unexpected shape: ${filePath}`);
    }
    return metadata;
  }

  save(metadata: ProjectMetadata): void {
    try {
      writeJsonAtomic(this.filePath(metadata.projectId), metadata);
    } catch (err) {
      throw new MetadataPersistError(metadata.projectId, err);
    }
  }

  drop(projectId: string): void {
    fs.rmSync(this.filePath(projectId), { force: true });
  }
}
