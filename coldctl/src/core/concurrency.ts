import { open, readFile, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { ArchiveError } from "./errors.js";

export const STALE_LOCK_AGE_MS = 300000; // 5 minutes

/**
 * Map over items with at most `limit` calls in flight.
 * Results keep the order of `items` regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export type LockRelease = () => Promise<void>;

/**
 * Directory lock: only one archive operation per directory at a time.
 * The lock file holds "<pid>\n<timestamp>". A lock whose owner has exited is
 * taken over; one without a readable owner pid only once older than
 * STALE_LOCK_AGE_MS. A live owner keeps its lock however long it runs.
 */
export async function acquireDirectoryLock(dir: string, lockFileName: string): Promise<LockRelease> {
  const lockPath = path.join(dir, lockFileName);
  const pid = process.pid;

  await clearAbandonedLock(lockPath, pid);

  try {
    const fh = await open(lockPath, "wx");
    try {
      await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
      await fh.sync();
    } finally {
      await fh.close();
    }
  } catch (e: unknown) {
    if (isErrnoCode(e, "EEXIST")) {
      const owner = (await readFile(lockPath, "utf8").catch(() => "")).split("\n")[0];
      throw new ArchiveError("LockHeld", `Another archive operation holds ${lockPath} (pid: ${owner || "unknown"})`, {
        subject: dir,
      });
    }
    throw e;
  }

  return async () => {
    const content = await readIfExists(lockPath);
    if (content === null) {
      console.warn(`[coldctl] Lock was removed while held: ${lockPath}`);
      return;
    }
    const [lockPid] = content.split("\n");
    if (lockPid === String(pid)) {
      await unlinkIfExists(lockPath);
    } else {
      console.warn(`[coldctl] Lock was taken by another process (current: ${lockPid}, ours: ${pid}): ${lockPath}`);
    }
  };
}

async function clearAbandonedLock(lockPath: string, pid: number): Promise<void> {
  const content = await readIfExists(lockPath);
  if (content === null) return;

  const lockPid = Number.parseInt(content.split("\n")[0], 10);
  if (Number.isInteger(lockPid) && lockPid > 0) {
    if (lockPid === pid || processAlive(lockPid)) return;
    console.warn(`[coldctl] Removing orphaned lock (pid: ${lockPid}): ${lockPath}`);
    await unlinkIfExists(lockPath);
    return;
  }

  const info = await stat(lockPath).catch((e: unknown) => {
    if (isErrnoCode(e, "ENOENT")) return null;
    throw e;
  });
  if (!info) return;
  const age = Date.now() - info.mtimeMs;
  if (age > STALE_LOCK_AGE_MS) {
    console.warn(`[coldctl] Removing stale lock without an owner (age: ${Math.round(age / 1000)}s): ${lockPath}`);
    await unlinkIfExists(lockPath);
  }
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (e: unknown) {
    if (isErrnoCode(e, "ENOENT")) return null;
    throw e;
  }
}

async function unlinkIfExists(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (e: unknown) {
    if (!isErrnoCode(e, "ENOENT")) throw e;
  }
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence
    return true;
  } catch (e: unknown) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoCode(e, "EPERM");
  }
}

export function isErrnoCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}
