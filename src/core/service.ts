import fs from "fs";
import path from "path";
import { createEmbeddingProvider, retryPolicyFromSettings, type EmbeddingProvider } from "./embeddings";
import { ConfigError, FileNotFoundError, formatErrorMessage } from "./errors";
import { readFileContext, type FileContext } from "./file-context";
import { acquireFileLock, tryAcquireFileLock } from "./lock";
import { locksDirPath, metadataDirPath, registryPath, vectorDbPath } from "./layout";
import { logger } from "./logger";
import { MetadataStore } from "./metadata-store";
import { defaultRules, mergeRules, projectIdForPath, rulesEqual, type Project, type ProjectRules } from "./project";
import { ProjectRegistry } from "./registry";
import { ReindexScheduler } from "./scheduler";
import { findSimilarFiles, searchProjects, type SearchResult, type SimilarFile } from "./search";
import { SqliteVectorStore } from "./sqlite-store";
import type { Settings } from "./settings";
import { SyncCoordinator, type SyncOptions, type SyncResult, type SyncSnapshot } from "./sync";
import type { VectorStore } from "./vector-store";
import { isDirectory, isFile, toPosixPath } from "../utils/fs";

export type ProjectStatus = SyncSnapshot & {
  /** Entries in the project's collection; null when the store could not be read. */
  chunkCount: number | null;
};

export type SearchOptions = {
  /** Project ids or roots; all registered projects when omitted. */
  projects?: string[];
  limit?: number;
  filePath?: string;
};

export type FileContextOptions = {
  /** 1-based line to center on; the head of the file when omitted. */
  line?: number;
  contextLines?: number;
};

export type SimilarOptions = {
  /** Project ids or roots; all registered projects when omitted. */
  projects?: string[];
  limit?: number;
};

const DEFAULT_SIMILAR_LIMIT = 5;

export type SchedulerStartOptions = {
  intervalSeconds?: number;
  runOnStart?: boolean;
  /** How often the registry file is re-read for projects added or removed elsewhere; 0 disables it. */
  registryPollMs?: number;
};

const DEFAULT_REGISTRY_POLL_MS = 5000;

export type IndexServiceOptions = {
  settings: Settings;
  registry: ProjectRegistry;
  metadata: MetadataStore;
  store: VectorStore;
  /** Called once, on first use. */
  provider: () => EmbeddingProvider;
  /** Directory for per-project pass locks; omitted disables the cross-process guard. */
  locksDir?: string;
  now?: () => Date;
};

/**
 * The operations the command layer calls: project registration, passes,
 * status, search and the background scheduler.
 */
export class IndexService {
  private readonly settings: Settings;
  private readonly registry: ProjectRegistry;
  private readonly metadata: MetadataStore;
  private readonly store: VectorStore;
  private readonly providerFactory: () => EmbeddingProvider;
  private readonly locksDir?: string;
  private readonly now?: () => Date;

  private provider: EmbeddingProvider | null = null;
  private readonly coordinators = new Map<string, SyncCoordinator>();
  private scheduler: ReindexScheduler | null = null;
  private registryTimer: NodeJS.Timeout | null = null;

  constructor(options: IndexServiceOptions) {
    this.settings = options.settings;
    this.registry = options.registry;
    this.metadata = options.metadata;
    this.store = options.store;
    this.providerFactory = options.provider;
    this.locksDir = options.locksDir;
    this.now = options.now;
  }

  private getProvider(): EmbeddingProvider {
    if (!this.provider) this.provider = this.providerFactory();
    return this.provider;
  }

  private lockPathFor(projectId: string): string | undefined {
    return this.locksDir ? path.join(this.locksDir, `${projectId}.lock`) : undefined;
  }

  /** Reads the registry file again, so a project unregistered by another process is seen. */
  private isStillRegistered(projectId: string): boolean {
    this.registry.refresh();
    return this.registry.get(projectId) !== undefined;
  }

  private coordinatorFor(project: Project): SyncCoordinator {
    const existing = this.coordinators.get(project.id);
    if (existing) return existing;
    const coordinator = new SyncCoordinator({
      project,
      store: this.store,
      metadata: this.metadata,
      provider: this.getProvider(),
      batchSize: this.settings.embeddings.batchSize,
      concurrency: this.settings.sync.concurrency,
      retry: retryPolicyFromSettings(this.settings),
      lockPath: this.lockPathFor(project.id),
      isRegistered: () => this.isStillRegistered(project.id),
      now: this.now
    });
    this.coordinators.set(project.id, coordinator);
    return coordinator;
  }

  listProjects(): Project[] {
    return this.registry.list();
  }

  findProject(ref: string): Project | undefined {
    return this.registry.find(ref);
  }

  /**
   * Adds a root, or updates the rules of one already registered; options
   * given again override the registered rules and the rest are kept. Rules
   * are validated here so a bad chunking setup never reaches a running pass.
   */
  async registerProject(root: string, overrides: Partial<ProjectRules> = {}): Promise<Project> {
    const absolute = path.resolve(root);
    if (!(await isDirectory(absolute))) {
      throw new ConfigError(`Project root is not a directory: ${absolute}`);
    }
    this.registry.refresh();
    const base = this.registry.get(projectIdForPath(absolute))?.rules ?? defaultRules(this.settings);
    const rules = mergeRules(base, overrides, `rules for ${absolute}`);
    const project = this.registry.upsert(absolute, rules, this.now?.());

    const previous = this.coordinators.get(project.id);
    if (previous) {
      await previous.whenIdle();
      this.coordinators.delete(project.id);
    }
    if (this.scheduler) {
      this.scheduler.register(this.coordinatorFor(project));
    }
    logger.info(`Registered ${project.id} at ${project.root}`);
    return project;
  }

  /**
   * Stops scheduling the project, cancels its running pass at the next file
   * boundary and waits for it. A pass running in another process is waited
   * for through the project's lock, which stays held while the collection,
   * the metadata and the registry entry are dropped.
   */
  async unregisterProject(ref: string): Promise<Project> {
    this.registry.refresh();
    const project = this.registry.require(ref);
    this.scheduler?.unregister(project.id);
    const coordinator = this.coordinators.get(project.id);
    if (coordinator) {
      coordinator.cancel();
      await coordinator.whenIdle();
      this.coordinators.delete(project.id);
    }

    const lockPath = this.lockPathFor(project.id);
    let lock = lockPath ? tryAcquireFileLock(lockPath) : null;
    if (lockPath && !lock) {
      logger.info(`Waiting for the running pass over ${project.id} in another process`);
      lock = await acquireFileLock(lockPath);
    }
    try {
      this.registry.remove(project.id);
      await this.store.dropCollection(project.id);
      this.metadata.drop(project.id);
    } finally {
      lock?.release();
    }
    logger.info(`Unregistered ${project.id}`);
    return project;
  }

  async syncNow(ref: string, options: SyncOptions = {}): Promise<SyncResult> {
    const project = this.registry.require(ref);
    const scheduled = this.scheduler?.triggerNow(project.id, options);
    const result = await (scheduled ?? this.coordinatorFor(project).sync(options));
    if (result.status === "unregistered") this.coordinators.delete(project.id);
    return result;
  }

  async status(ref: string): Promise<ProjectStatus> {
    const project = this.registry.require(ref);
    const snapshot = this.coordinatorFor(project).snapshot();
    let chunkCount: number | null = null;
    try {
      chunkCount = await this.store.count(project.id);
    } catch (err) {
      logger.warn(`Cannot count vectors for ${project.id}: ${formatErrorMessage(err)}`);
    }
    return { ...snapshot, chunkCount };
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const projects = options.projects?.length
      ? options.projects.map((ref) => this.registry.require(ref))
      : this.registry.list();
    return searchProjects({
      store: this.store,
      provider: this.getProvider(),
      projects,
      query,
      limit: options.limit ?? this.settings.search.limit,
      similarityThreshold: this.settings.search.similarityThreshold,
      filePath: options.filePath,
      timeoutMs: this.settings.embeddings.timeoutMs
    });
  }

  /** The registered project whose root holds `absPath`; the deepest root wins. */
  private ownerOf(absPath: string): { project: Project; relPath: string } | undefined {
    let owner: { project: Project; relPath: string } | undefined;
    for (const project of this.registry.list()) {
      const rel = path.relative(project.root, absPath);
      if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) continue;
      if (!owner || project.root.length > owner.project.root.length) {
        owner = { project, relPath: toPosixPath(rel) };
      }
    }
    return owner;
  }

  /** Lines around a file's head or one of its lines, with the indexed chunks covering them. */
  async fileContext(file: string, options: FileContextOptions = {}): Promise<FileContext> {
    const absPath = path.resolve(file);
    const owner = this.ownerOf(absPath);
    return readFileContext({
      absPath,
      store: this.store,
      owner: owner ? { projectId: owner.project.id, relPath: owner.relPath } : undefined,
      line: options.line,
      contextLines: options.contextLines
    });
  }

  /** Indexed files whose chunks lie closest to the head of `file`, the file itself excluded. */
  async findSimilar(file: string, options: SimilarOptions = {}): Promise<SimilarFile[]> {
    const absPath = path.resolve(file);
    if (!(await isFile(absPath))) throw new FileNotFoundError(absPath);
    const projects = options.projects?.length
      ? options.projects.map((ref) => this.registry.require(ref))
      : this.registry.list();
    const owner = this.ownerOf(absPath);
    return findSimilarFiles({
      store: this.store,
      provider: this.getProvider(),
      projects,
      content: await fs.promises.readFile(absPath, "utf8"),
      limit: options.limit ?? DEFAULT_SIMILAR_LIMIT,
      exclude: owner ? { projectId: owner.project.id, filePath: owner.relPath } : undefined,
      timeoutMs: this.settings.embeddings.timeoutMs
    });
  }

  /**
   * Schedules every registered project. Registrations made through this
   * service join at once; those made by other processes join on the next
   * registry poll.
   */
  startScheduler(options: SchedulerStartOptions = {}): ReindexScheduler {
    if (this.scheduler) return this.scheduler;
    const intervalSeconds = options.intervalSeconds ?? this.settings.sync.intervalSeconds;
    const scheduler = new ReindexScheduler({ intervalMs: intervalSeconds * 1000, runOnStart: options.runOnStart });
    this.registry.refresh();
    for (const project of this.registry.list()) {
      scheduler.register(this.coordinatorFor(project));
    }
    scheduler.start();
    this.scheduler = scheduler;

    const pollMs = options.registryPollMs ?? DEFAULT_REGISTRY_POLL_MS;
    if (pollMs > 0) {
      this.registryTimer = setInterval(() => {
        try {
          this.refreshProjects();
        } catch (err) {
          logger.warn(`Cannot refresh the project registry: ${formatErrorMessage(err)}`);
        }
      }, pollMs);
    }
    return scheduler;
  }

  /**
   * Re-reads the registry and brings the schedule in line with it: new
   * projects are scheduled, removed ones dropped, and an idle project whose
   * rules changed gets a fresh coordinator.
   */
  refreshProjects(): void {
    const scheduler = this.scheduler;
    if (!scheduler) return;
    this.registry.refresh();
    const registered = new Map(this.registry.list().map((project): [string, Project] => [project.id, project]));

    for (const projectId of scheduler.projectIds()) {
      if (registered.has(projectId)) continue;
      scheduler.unregister(projectId);
      if (!this.coordinators.get(projectId)?.isRunning()) this.coordinators.delete(projectId);
      logger.info(`Stopped watching ${projectId}; it was unregistered`);
    }

    for (const project of registered.values()) {
      const current = this.coordinators.get(project.id);
      if (current && (current.project.root !== project.root || !rulesEqual(current.project.rules, project.rules))) {
        if (current.isRunning()) continue;
        this.coordinators.delete(project.id);
        scheduler.register(this.coordinatorFor(project));
      } else if (!scheduler.has(project.id)) {
        scheduler.register(this.coordinatorFor(project));
        logger.info(`Watching ${project.id} at ${project.root}`);
      }
    }
  }

  async stopScheduler(): Promise<void> {
    if (this.registryTimer) clearInterval(this.registryTimer);
    this.registryTimer = null;
    const scheduler = this.scheduler;
    this.scheduler = null;
    if (scheduler) await scheduler.stop();
  }

  /** Waits for running passes, then releases the provider and the store. */
  async close(): Promise<void> {
    await this.stopScheduler();
    for (const coordinator of this.coordinators.values()) {
      await coordinator.whenIdle();
    }
    await this.provider?.dispose?.();
    this.provider = null;
    await this.store.close();
  }
}

/** Wires the service onto the on-disk layout under the application root. */
export async function openIndexService(settings: Settings): Promise<IndexService> {
  const store = await SqliteVectorStore.open(vectorDbPath());
  return new IndexService({
    settings,
    registry: new ProjectRegistry(registryPath()),
    metadata: new MetadataStore(metadataDirPath()),
    store,
    provider: () => createEmbeddingProvider(settings),
    locksDir: locksDirPath()
  });
}
