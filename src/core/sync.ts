import fs from "fs";
import pLimit from "p-limit";
import { detectChanges, type FileChange } from "./changes";
import { buildChunkId, chunkText } from "./chunker";
import { embedInBatches, type EmbeddingProvider, type RetryPolicy } from "./embeddings";
import { enumerateProjectFiles, type EnumeratedFile } from "./enumerator";
import { FingerprintError, ProviderError, StoreError, formatErrorMessage } from "./errors";
import { tryAcquireFileLock, type FileLockHandle } from "./lock";
import { logger } from "./logger";
import {
  createEmptyMetadata,
  type FileRecord,
  type LastPass,
  type MetadataStore,
  type ProjectMetadata,
  type SyncReport
} from "./metadata-store";
import { effectiveRules, type Project, type ProjectRules } from "./project";
import type { VectorEntry, VectorStore } from "./vector-store";
import { isDirectory } from "../utils/fs";
import { sha256Hex } from "../utils/hash";

export type SyncState = "idle" | "scanning" | "diffing" | "embedding" | "committing" | "failed";

export type { SyncReport } from "./metadata-store";

export type SyncResult =
  | { status: "completed"; report: SyncReport }
  | { status: "cancelled"; report: SyncReport }
  | { status: "already-running" }
  /** The project left the registry, possibly from another process; nothing was touched. */
  | { status: "unregistered" }
  | { status: "failed"; error: Error };

export type SyncSnapshot = {
  projectId: string;
  root: string;
  state: SyncState;
  lastSyncAt: string | null;
  fileCount: number;
  pendingCount: number;
  deferredPaths: string[];
  rootMissing: boolean;
  lastError: string | null;
  lastReport: SyncReport | null;
  lastOutcome: LastPass["outcome"] | null;
};

export type SyncOptions = {
  /** Re-embed every file regardless of its fingerprint. */
  force?: boolean;
};

export type SyncCoordinatorOptions = {
  project: Project;
  store: VectorStore;
  metadata: MetadataStore;
  provider: EmbeddingProvider;
  batchSize: number;
  concurrency: number;
  retry: RetryPolicy;
  /** Cross-process guard; omitted means only the in-process gate applies. */
  lockPath?: string;
  /** Checked once the lock is held; a pass for a project no longer registered is skipped. */
  isRegistered?: () => boolean;
  now?: () => Date;
};

type EmbedWork = Extract<FileChange, { kind: "added" | "modified" }>;

type PreparedFile = {
  change: EmbedWork;
  file: EnumeratedFile;
  fingerprint: string;
  entries: VectorEntry[];
};

type EmbedOutcome =
  | { kind: "prepared"; relPath: string; prepared: PreparedFile }
  | { kind: "deferred"; relPath: string; error: Error }
  | { kind: "unreadable"; relPath: string; error: FingerprintError }
  | { kind: "skipped"; relPath: string };

class PassCancelled extends Error {
  constructor() {
    super("Sync pass cancelled");
    this.name = "PassCancelled";
  }
}

function settingsDiffer(metadata: ProjectMetadata, rules: ProjectRules, model: string): boolean {
  return (
    metadata.chunkSize !== rules.chunkSize || metadata.chunkOverlap !== rules.chunkOverlap || metadata.model !== model
  );
}

/**
 * Runs reconciliation passes for one project:
 * idle -> scanning -> diffing -> embedding -> committing -> idle, with
 * failed -> idle on an aborted pass. At most one pass runs at a time; a
 * second request while one is in flight returns "already-running" and
 * touches nothing.
 */
export class SyncCoordinator {
  readonly project: Project;
  private readonly store: VectorStore;
  private readonly metadataStore: MetadataStore;
  private readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly retry: RetryPolicy;
  private readonly lockPath?: string;
  private readonly isRegistered?: () => boolean;
  private readonly now: () => Date;

  private state: SyncState = "idle";
  private current: Promise<SyncResult> | null = null;
  private controller: AbortController | null = null;
  private metadata: ProjectMetadata | null = null;
  private pending = new Set<string>();
  private lastPass: LastPass | null = null;
  private needsOrphanPrune = true;

  constructor(options: SyncCoordinatorOptions) {
    this.project = options.project;
    this.store = options.store;
    this.metadataStore = options.metadata;
    this.provider = options.provider;
    this.batchSize = options.batchSize;
    this.concurrency = Math.max(1, options.concurrency);
    this.retry = options.retry;
    this.lockPath = options.lockPath;
    this.isRegistered = options.isRegistered;
    this.now = options.now ?? (() => new Date());
  }

  get projectId(): string {
    return this.project.id;
  }

  getState(): SyncState {
    return this.state;
  }

  isRunning(): boolean {
    return this.current !== null;
  }

  sync(options: SyncOptions = {}): Promise<SyncResult> {
    if (this.current || this.state !== "idle") {
      logger.debug(`Sync already running for ${this.project.id}`);
      return Promise.resolve({ status: "already-running" });
    }
    let lock: FileLockHandle | null = null;
    if (this.lockPath) {
      try {
        lock = tryAcquireFileLock(this.lockPath);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        logger.error(`Cannot take the sync lock for ${this.project.id}: ${error.message}`);
        return Promise.resolve({ status: "failed", error });
      }
      if (!lock) {
        logger.info(`Sync for ${this.project.id} is running in another process`);
        return Promise.resolve({ status: "already-running" });
      }
    }
    if (this.isRegistered && !this.isRegistered()) {
      lock?.release();
      logger.info(`${this.project.id} is no longer registered; skipping the pass`);
      return Promise.resolve({ status: "unregistered" });
    }
    const controller = new AbortController();
    this.controller = controller;
    const heldLock = lock;
    const run = this.runPass(options, controller.signal).finally(() => {
      heldLock?.release();
      this.controller = null;
      this.current = null;
    });
    this.current = run;
    return run;
  }

  /** Stops the running pass at the next file boundary; committed files stay committed. */
  cancel(): void {
    this.controller?.abort();
  }

  /** Resolves once no pass is in flight. */
  async whenIdle(): Promise<void> {
    while (this.current) {
      await this.current;
    }
  }

  snapshot(): SyncSnapshot {
    const metadata = this.metadata ?? this.metadataStore.load(this.project.id);
    // A coordinator that has not run yet reports what the last pass, in any process, persisted.
    const lastPass = this.lastPass ?? metadata?.lastPass ?? null;
    const pendingPaths = lastPass?.pendingPaths ?? [];
    return {
      projectId: this.project.id,
      root: this.project.root,
      state: this.state,
      lastSyncAt: metadata?.lastSyncAt ?? null,
      fileCount: metadata ? Object.keys(metadata.files).length : 0,
      pendingCount: this.current ? this.pending.size : pendingPaths.length,
      deferredPaths: [...pendingPaths],
      rootMissing: lastPass?.report?.rootMissing ?? false,
      lastError: lastPass?.error ?? null,
      lastReport: lastPass?.report ?? null,
      lastOutcome: lastPass?.outcome ?? null
    };
  }

  private transition(next: SyncState): void {
    logger.debug(`${this.project.id}: ${this.state} -> ${next}`);
    this.state = next;
  }

  private async runPass(options: SyncOptions, signal: AbortSignal): Promise<SyncResult> {
    const startedAt = this.now();
    try {
      const outcome = await this.reconcile(options, signal, startedAt);
      this.transition("idle");
      return outcome;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.transition("failed");
      this.recordFailure(error);
      this.needsOrphanPrune = true;
      // Drop the cached view; the last flushed partition is the recovery point.
      this.metadata = null;
      this.pending.clear();
      logger.error(`Sync failed for ${this.project.id}: ${error.message}`);
      this.transition("idle");
      return { status: "failed", error };
    }
  }

  private async reconcile(options: SyncOptions, signal: AbortSignal, startedAt: Date): Promise<SyncResult> {
    this.transition("scanning");
    const rules = effectiveRules(this.project);
    const model = this.provider.modelId;
    const loaded = this.metadataStore.load(this.project.id);
    const metadata: ProjectMetadata =
      loaded ?? createEmptyMetadata(this.project.id, { chunkSize: rules.chunkSize, chunkOverlap: rules.chunkOverlap, model });

    const rootMissing = !(await isDirectory(this.project.root));
    let candidates: EnumeratedFile[] = [];
    let enumerationErrors = 0;
    if (rootMissing) {
      logger.warn(`Project root is missing: ${this.project.root}`, { projectId: this.project.id });
    } else {
      const enumerated = await enumerateProjectFiles(this.project.root, rules);
      candidates = enumerated.files;
      enumerationErrors = enumerated.errors.length;
    }

    this.transition("diffing");
    const recorded = Object.keys(metadata.files).length > 0;
    const reconfigured = recorded && settingsDiffer(metadata, rules, model);
    if (reconfigured) {
      logger.info(`Chunking or model changed for ${this.project.id}; re-embedding every file`);
    }
    const { changes, counts } = await detectChanges(candidates, metadata.files, {
      forceAll: options.force === true || reconfigured,
      concurrency: this.concurrency
    });
    logger.debug(`Classified ${changes.length} paths for ${this.project.id}`, counts);
    const orphansPruned = await this.pruneOrphans(metadata);

    const work = changes.filter((change): change is EmbedWork => change.kind === "added" || change.kind === "modified");
    this.pending = new Set(changes.filter((change) => change.kind !== "unchanged").map((change) => change.relPath));

    this.transition("embedding");
    const outcomes = await this.embedAll(work, rules, signal);

    this.transition("committing");
    const report: SyncReport = {
      added: 0,
      modified: 0,
      deleted: 0,
      deferred: 0,
      unchanged: counts.unchanged,
      deferredPaths: [],
      chunksUpserted: 0,
      chunksDeleted: 0,
      orphansPruned,
      enumerationErrors,
      rootMissing,
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      durationMs: 0
    };
    const syncedAt = this.now().toISOString();
    const prepared = new Map<string, EmbedOutcome>(outcomes.map((outcome) => [outcome.relPath, outcome]));

    let cancelled = false;
    try {
      for (const change of changes) {
        if (change.kind === "unchanged") {
          this.refreshStat(metadata, change.file, change.record);
          continue;
        }
        if (signal.aborted) throw new PassCancelled();
        if (change.kind === "deleted") {
          await this.commitDeletion(metadata, change.relPath, change.record, report);
          continue;
        }
        const outcome = prepared.get(change.relPath);
        if (!outcome || outcome.kind === "skipped") throw new PassCancelled();
        if (outcome.kind === "deferred") {
          this.defer(report, outcome.relPath, outcome.error);
          continue;
        }
        if (outcome.kind === "unreadable") {
          const record = change.kind === "modified" ? change.record : undefined;
          await this.commitDeletion(metadata, change.relPath, record, report);
          continue;
        }
        await this.commitFile(metadata, outcome.prepared, syncedAt, report);
      }
    } catch (err) {
      if (!(err instanceof PassCancelled)) throw err;
      cancelled = true;
      logger.info(`Sync for ${this.project.id} cancelled; keeping files committed so far`);
    }

    if (!cancelled && report.deferred === 0) {
      metadata.chunkSize = rules.chunkSize;
      metadata.chunkOverlap = rules.chunkOverlap;
      metadata.model = model;
    }
    metadata.lastSyncAt = syncedAt;
    const finishedAt = this.now();
    report.finishedAt = finishedAt.toISOString();
    report.durationMs = Math.max(0, finishedAt.getTime() - startedAt.getTime());
    const lastPass: LastPass = {
      outcome: cancelled ? "cancelled" : "completed",
      finishedAt: report.finishedAt,
      error: null,
      report,
      pendingPaths: cancelled ? Array.from(this.pending).sort() : [...report.deferredPaths]
    };
    metadata.lastPass = lastPass;
    // Failure here is fatal for the pass; the atomic write leaves the previous partition intact.
    this.metadataStore.save(metadata);
    this.metadata = metadata;
    this.lastPass = lastPass;
    this.pending.clear();

    logger.info(
      `Synced ${this.project.id}: +${report.added} ~${report.modified} -${report.deleted}` +
        (report.deferred > 0 ? ` (${report.deferred} deferred)` : ""),
      { durationMs: report.durationMs }
    );
    return cancelled ? { status: "cancelled", report } : { status: "completed", report };
  }

  /**
   * Keeps the previous report and pending paths, sets the error, and writes
   * that onto the last flushed partition when it can.
   */
  private recordFailure(error: Error): void {
    const stored = this.metadataStore.load(this.project.id);
    const previous = this.lastPass ?? stored?.lastPass ?? null;
    const lastPass: LastPass = {
      outcome: "failed",
      finishedAt: this.now().toISOString(),
      error: error.message,
      report: previous?.report ?? null,
      pendingPaths: previous?.pendingPaths ?? []
    };
    this.lastPass = lastPass;
    const partition =
      stored ??
      createEmptyMetadata(this.project.id, {
        chunkSize: this.project.rules.chunkSize,
        chunkOverlap: this.project.rules.chunkOverlap,
        model: this.provider.modelId
      });
    partition.lastPass = lastPass;
    try {
      this.metadataStore.save(partition);
    } catch (err) {
      logger.warn(`Cannot record the failure for ${this.project.id}: ${formatErrorMessage(err)}`);
    }
  }

  private async embedAll(work: EmbedWork[], rules: ProjectRules, signal: AbortSignal): Promise<EmbedOutcome[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(
      work.map((change) =>
        limit(async (): Promise<EmbedOutcome> => {
          if (signal.aborted) return { kind: "skipped", relPath: change.relPath };
          return this.embedFile(change, rules);
        })
      )
    );
  }

  private async embedFile(change: EmbedWork, rules: ProjectRules): Promise<EmbedOutcome> {
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(change.file.absPath);
    } catch (err) {
      const error = new FingerprintError(change.relPath, err);
      logger.warn(error.message);
      return { kind: "unreadable", relPath: change.relPath, error };
    }
    const chunks = Array.from(
      chunkText(bytes.toString("utf8"), { chunkSize: rules.chunkSize, chunkOverlap: rules.chunkOverlap })
    );

    let vectors: number[][];
    try {
      vectors = await embedInBatches(
        this.provider,
        chunks.map((chunk) => chunk.text),
        this.batchSize,
        this.retry
      );
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      return { kind: "deferred", relPath: change.relPath, error: err };
    }

    const entries: VectorEntry[] = [];
    chunks.forEach((chunk, index) => {
      const vector = vectors[index];
      if (!vector) return;
      entries.push({
        id: buildChunkId(change.relPath, chunk.ordinal),
        vector,
        metadata: {
          projectId: this.project.id,
          filePath: change.relPath,
          ordinal: chunk.ordinal,
          start: chunk.start,
          end: chunk.end,
          startLine: chunk.startLine,
          endLine: chunk.endLine,
          text: chunk.text
        }
      });
    });
    // Record what was embedded, even if the file moved on since it was hashed.
    return {
      kind: "prepared",
      relPath: change.relPath,
      prepared: { change, file: change.file, fingerprint: sha256Hex(bytes), entries }
    };
  }

  private defer(report: SyncReport, relPath: string, error: Error): void {
    report.deferred += 1;
    report.deferredPaths.push(relPath);
    logger.warn(`Deferred ${relPath}: ${error.message}`, { projectId: this.project.id });
  }

  /** Old ids that the new chunk set does not overwrite go first, then the upsert, then the record. */
  private async commitFile(
    metadata: ProjectMetadata,
    prepared: PreparedFile,
    syncedAt: string,
    report: SyncReport
  ): Promise<void> {
    const { change, entries } = prepared;
    const nextIds = entries.map((entry) => entry.id);
    const nextSet = new Set(nextIds);
    const previous = change.kind === "modified" ? change.record.chunkIds : [];
    const stale = previous.filter((id) => !nextSet.has(id));
    try {
      await this.store.delete(this.project.id, stale);
      await this.store.upsert(this.project.id, entries);
    } catch (err) {
      if (!(err instanceof StoreError)) throw err;
      this.defer(report, change.relPath, err);
      return;
    }
    metadata.files[change.relPath] = {
      fingerprint: prepared.fingerprint,
      chunkIds: nextIds,
      mtimeMs: prepared.file.mtimeMs,
      size: prepared.file.size,
      lastSyncAt: syncedAt
    };
    this.pending.delete(change.relPath);
    report.chunksDeleted += stale.length;
    report.chunksUpserted += entries.length;
    if (change.kind === "added") report.added += 1;
    else report.modified += 1;
  }

  private async commitDeletion(
    metadata: ProjectMetadata,
    relPath: string,
    record: FileRecord | undefined,
    report: SyncReport
  ): Promise<void> {
    if (!record) {
      this.pending.delete(relPath);
      return;
    }
    try {
      await this.store.delete(this.project.id, record.chunkIds);
    } catch (err) {
      if (!(err instanceof StoreError)) throw err;
      this.defer(report, relPath, err);
      return;
    }
    delete metadata.files[relPath];
    this.pending.delete(relPath);
    report.chunksDeleted += record.chunkIds.length;
    report.deleted += 1;
  }

  private refreshStat(metadata: ProjectMetadata, file: EnumeratedFile, record: FileRecord): void {
    if (record.mtimeMs === file.mtimeMs && record.size === file.size) return;
    metadata.files[file.relPath] = { ...record, mtimeMs: file.mtimeMs, size: file.size };
  }

  /** Removes collection entries no FileRecord accounts for, such as those left by an interrupted pass. */
  private async pruneOrphans(metadata: ProjectMetadata): Promise<number> {
    if (!this.needsOrphanPrune) return 0;
    const known = new Set<string>();
    for (const record of Object.values(metadata.files)) {
      for (const id of record.chunkIds) known.add(id);
    }
    try {
      const orphans = (await this.store.listIds(this.project.id)).filter((id) => !known.has(id));
      await this.store.delete(this.project.id, orphans);
      this.needsOrphanPrune = false;
      if (orphans.length > 0) {
        logger.info(`Pruned ${orphans.length} orphaned vectors from ${this.project.id}`);
      }
      return orphans.length;
    } catch (err) {
      if (!(err instanceof StoreError)) throw err;
      logger.warn(`Orphan pruning failed for ${this.project.id}: ${formatErrorMessage(err)}`);
      return 0;
    }
  }
}
