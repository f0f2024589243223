import fs from "fs";
import path from "path";
import { formatErrorMessage } from "./errors";
import { logger } from "./logger";

export type FileLockHandle = { release: () => void };

type LockInfo = { pid: number; createdAt: number };

const CORRUPT_LOCK_GRACE_MS = 2000;

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function parseLockInfo(raw: string): LockInfo | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null) return null;
    if (!("pid" in parsed) || !("createdAt" in parsed)) return null;
    const { pid, createdAt } = parsed;
    if (typeof pid !== "number" || typeof createdAt !== "number") return null;
    return { pid, createdAt };
  } catch {
    return null;
  }
}

function readLockInfo(lockPath: string): LockInfo | null {
  try {
    return parseLockInfo(fs.readFileSync(lockPath, "utf8"));
  } catch {
    return null;
  }
}

function fileAgeMs(filePath: string): number | null {
  try {
    return Math.max(0, Date.now() - fs.statSync(filePath).mtimeMs);
  } catch {
    return null;
  }
}

export function isPidAlive(pid: number): boolean {
  if (!Number.isFinite(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // ESRCH: no such process. EPERM: process exists but we lack permission.
    return errorCode(err) !== "ESRCH";
  }
}

/** A lock left by a dead process, or one whose contents stayed unreadable past the grace period. */
export function isStaleLock(lockPath: string): boolean {
  const info = readLockInfo(lockPath);
  if (!info) {
    const ageMs = fileAgeMs(lockPath);
    return ageMs !== null && ageMs > CORRUPT_LOCK_GRACE_MS;
  }
  return !isPidAlive(info.pid);
}

/**
 * Creates `lockPath` exclusively. Returns null when another live process
 * holds it; a stale lock is removed and the creation retried once.
 */
export function tryAcquireFileLock(lockPath: string): FileLockHandle | null {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });
  for (let attempt = 0; attempt < 2; attempt += 1) {
    let fd: number;
    try {
      fd = fs.openSync(lockPath, "wx");
    } catch (err) {
      if (errorCode(err) !== "EEXIST") throw err;
      if (!isStaleLock(lockPath)) return null;
      logger.debug(`Removing stale lock ${lockPath}`);
      fs.rmSync(lockPath, { force: true });
      continue;
    }

    try {
      const info: LockInfo = { pid: process.pid, createdAt: Date.now() };
      fs.writeFileSync(fd, JSON.stringify(info), "utf8");
    } catch (err) {
      fs.closeSync(fd);
      fs.rmSync(lockPath, { force: true });
      throw new Error(`Failed to write lock metadata ${lockPath}: ${formatErrorMessage(err)}`);
    }

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        fs.closeSync(fd);
        fs.rmSync(lockPath, { force: true });
      }
    };
  }
  return null;
}

export type LockWaitOptions = { timeoutMs?: number; pollIntervalMs?: number };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls until the lock can be taken. Stale locks are taken over by
 * `tryAcquireFileLock`; a live holder past `timeoutMs` is an error.
 */
export async function acquireFileLock(lockPath: string, options: LockWaitOptions = {}): Promise<FileLockHandle> {
  const timeoutMs = options.timeoutMs ?? 10 * 60 * 1000;
  const pollIntervalMs = options.pollIntervalMs ?? 50;
  const start = Date.now();
  let attempts = 0;
  while (true) {
    const handle = tryAcquireFileLock(lockPath);
    if (handle) return handle;
    if (Date.now() - start > timeoutMs) {
      throw new Error(`Timed out waiting for lock: ${lockPath}`);
    }
    attempts += 1;
    await sleep(Math.min(250, pollIntervalMs * Math.min(attempts, 5)));
  }
}
