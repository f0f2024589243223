import { logger } from "./logger";
import type { SyncOptions, SyncResult } from "./sync";

/** What the scheduler drives; a SyncCoordinator in practice. */
export type SyncTarget = {
  readonly projectId: string;
  sync(options?: SyncOptions): Promise<SyncResult>;
};

type ScheduleEntry = {
  target: SyncTarget;
  timer: NodeJS.Timeout | null;
  running: number;
  inFlight: Set<Promise<SyncResult>>;
};

export type SchedulerOptions = {
  intervalMs: number;
  /** Fire every project once as soon as the scheduler starts. */
  runOnStart?: boolean;
};

/**
 * One timer per project. The next pass is scheduled when the previous one
 * ends, so a slow pass delays the following one instead of overlapping it.
 * An interval of 0 disables timers; manual triggers still work.
 */
export class ReindexScheduler {
  private readonly entries = new Map<string, ScheduleEntry>();
  private readonly intervalMs: number;
  private readonly runOnStart: boolean;
  private started = false;

  constructor(options: SchedulerOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.runOnStart = options.runOnStart ?? false;
  }

  isStarted(): boolean {
    return this.started;
  }

  has(projectId: string): boolean {
    return this.entries.has(projectId);
  }

  projectIds(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  register(target: SyncTarget): void {
    const existing = this.entries.get(target.projectId);
    if (existing?.timer) clearTimeout(existing.timer);
    const entry: ScheduleEntry = { target, timer: null, running: 0, inFlight: new Set() };
    this.entries.set(target.projectId, entry);
    if (!this.started) return;
    if (this.runOnStart) void this.fire(entry);
    else this.schedule(entry);
  }

  /** Stops the project's timer. A pass already running is left to finish. */
  unregister(projectId: string): boolean {
    const entry = this.entries.get(projectId);
    if (!entry) return false;
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = null;
    this.entries.delete(projectId);
    return true;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    logger.debug(`Scheduler started for ${this.entries.size} projects`, { intervalMs: this.intervalMs });
    for (const entry of this.entries.values()) {
      if (this.runOnStart) void this.fire(entry);
      else this.schedule(entry);
    }
  }

  /** Clears every timer and waits for passes the scheduler started. */
  async stop(): Promise<void> {
    this.started = false;
    const inFlight: Promise<SyncResult>[] = [];
    for (const entry of this.entries.values()) {
      if (entry.timer) clearTimeout(entry.timer);
      entry.timer = null;
      inFlight.push(...entry.inFlight);
    }
    await Promise.all(inFlight);
  }

  /** Runs a pass now; it still goes through the target's own idle gate. */
  triggerNow(projectId: string, options?: SyncOptions): Promise<SyncResult> | null {
    const entry = this.entries.get(projectId);
    if (!entry) return null;
    return this.fire(entry, options);
  }

  private schedule(entry: ScheduleEntry): void {
    if (!this.started || this.intervalMs <= 0) return;
    if (entry.timer || entry.running > 0) return;
    if (this.entries.get(entry.target.projectId) !== entry) return;
    entry.timer = setTimeout(() => {
      entry.timer = null;
      void this.fire(entry);
    }, this.intervalMs);
  }

  private fire(entry: ScheduleEntry, options?: SyncOptions): Promise<SyncResult> {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    entry.running += 1;
    const run = entry.target
      .sync(options)
      .catch((err: unknown): SyncResult => {
        const error = err instanceof Error ? err : new Error(String(err));
        logger.error(`Scheduled sync for ${entry.target.projectId} threw: ${error.message}`);
        return { status: "failed", error };
      })
      .then((result) => {
        if (result.status === "unregistered" && this.entries.get(entry.target.projectId) === entry) {
          logger.info(`Dropping ${entry.target.projectId} from the schedule; it is no longer registered`);
          this.unregister(entry.target.projectId);
        }
        return result;
      })
      .finally(() => {
        entry.running -= 1;
        entry.inFlight.delete(run);
        this.schedule(entry);
      });
    entry.inFlight.add(run);
    return run;
  }
}
