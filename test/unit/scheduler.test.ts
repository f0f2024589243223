import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ReindexScheduler, type SyncTarget } from "../../src/core/scheduler";
import type { SyncResult } from "../../src/core/sync";

type FakeTarget = SyncTarget & { calls: number };

function fakeTarget(projectId: string, run: () => Promise<SyncResult> = async () => ({ status: "already-running" })): FakeTarget {
  const target: FakeTarget = {
    projectId,
    calls: 0,
    sync: () => {
      target.calls += 1;
      return run();
    }
  };
  return target;
}

function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe("ReindexScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs each project once per interval", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 1000 });
    const a = fakeTarget("a");
    const b = fakeTarget("b");
    scheduler.register(a);
    scheduler.register(b);
    scheduler.start();
    expect(a.calls).toBe(0);

    await vi.advanceTimersByTimeAsync(1000);
    expect([a.calls, b.calls]).toEqual([1, 1]);

    await vi.advanceTimersByTimeAsync(1000);
    expect([a.calls, b.calls]).toEqual([2, 2]);
    await scheduler.stop();
  });

  it("drops a project whose pass reports it unregistered", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 1000 });
    const gone = fakeTarget("gone", async () => ({ status: "unregistered" }));
    const kept = fakeTarget("kept");
    scheduler.register(gone);
    scheduler.register(kept);
    scheduler.start();

    await vi.advanceTimersByTimeAsync(1000);
    expect(scheduler.projectIds()).toEqual(["kept"]);

    await vi.advanceTimersByTimeAsync(3000);
    expect([gone.calls, kept.calls]).toEqual([1, 4]);
    await scheduler.stop();
  });

  it("fires immediately on start when asked to", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 1000, runOnStart: true });
    const a = fakeTarget("a");
    scheduler.register(a);
    scheduler.start();
    expect(a.calls).toBe(1);
    await scheduler.stop();
  });

  it("does not arm timers for an interval of zero", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 0 });
    const a = fakeTarget("a");
    scheduler.register(a);
    scheduler.start();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(a.calls).toBe(0);

    await scheduler.triggerNow("a");
    expect(a.calls).toBe(1);
    await scheduler.stop();
  });

  it("waits for a slow pass before scheduling the next one", async () => {
    const pass = gate();
    const scheduler = new ReindexScheduler({ intervalMs: 1000 });
    const a = fakeTarget("a", async () => {
      await pass.wait;
      return { status: "already-running" };
    });
    scheduler.register(a);
    scheduler.start();

    await vi.advanceTimersByTimeAsync(1000);
    expect(a.calls).toBe(1);
    await vi.advanceTimersByTimeAsync(5000);
    expect(a.calls).toBe(1);

    pass.open();
    await vi.advanceTimersByTimeAsync(1000);
    expect(a.calls).toBe(2);
    await scheduler.stop();
  });

  it("stops scheduling a project once unregistered", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 1000 });
    const a = fakeTarget("a");
    scheduler.register(a);
    scheduler.start();

    expect(scheduler.unregister("a")).toBe(true);
    expect(scheduler.unregister("a")).toBe(false);
    await vi.advanceTimersByTimeAsync(5000);
    expect(a.calls).toBe(0);
    expect(scheduler.triggerNow("a")).toBeNull();
  });

  it("schedules projects registered after start", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 1000 });
    scheduler.start();
    const late = fakeTarget("late");
    scheduler.register(late);
    expect(scheduler.projectIds()).toEqual(["late"]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(late.calls).toBe(1);
    await scheduler.stop();
  });

  it("waits for in-flight passes when stopped", async () => {
    const pass = gate();
    const scheduler = new ReindexScheduler({ intervalMs: 1000 });
    scheduler.register(
      fakeTarget("a", async () => {
        await pass.wait;
        return { status: "already-running" };
      })
    );
    scheduler.start();
    const manual = scheduler.triggerNow("a");
    expect(manual).not.toBeNull();

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    pass.open();
    await stopping;
    expect(stopped).toBe(true);
    expect(scheduler.isStarted()).toBe(false);
  });

  it("reports a throwing target as a failed pass", async () => {
    const scheduler = new ReindexScheduler({ intervalMs: 0 });
    scheduler.register(
      fakeTarget("a", async () => {
        throw new Error("boom");
      })
    );

    const result = await scheduler.triggerNow("a");

    expect(result).toMatchObject({ status: "failed" });
    if (result?.status === "failed") expect(result.error.message).toBe("boom");
  });
});
