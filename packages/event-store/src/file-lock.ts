/**
 * @lanekeeper/event-store — Advisory file lock.
 *
 * Serializes writers to one feature's log across processes. The lock is a
 * sibling file created exclusively ("wx") holding the owner's pid, host and
 * acquisition time.
 *
 * A lock is stale, and is broken, when:
 * - it is older than `staleAfterMs`, or
 * - it was taken on this host by a process that no longer exists, or
 * - its content cannot be parsed
 *
 * Acquisition retries with a fixed delay and gives up with LOCK_TIMEOUT.
 */

import { closeSync, openSync, readFileSync, unlinkSync, writeSync } from "node:fs";
import { hostname } from "node:os";
import { AppendError } from "./types.js";

export interface FileLockOptions {
  /** Age after which a lock is considered abandoned (default 5 minutes) */
  readonly staleAfterMs?: number;
  /** Delay between acquisition attempts (default 50ms) */
  readonly retryDelayMs?: number;
  /** Attempts before giving up (default 100) */
  readonly maxRetries?: number;
}

export interface LockInfo {
  readonly pid: number;
  readonly hostname: string;
  /** Milliseconds since epoch */
  readonly acquiredAt: number;
}

export const DEFAULT_LOCK_OPTIONS = {
  staleAfterMs: 5 * 60 * 1000,
  retryDelayMs: 50,
  maxRetries: 100,
} as const;

/** Extract a Node errno code from an unknown thrown value. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function parseLockInfo(content: string): LockInfo | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return undefined;
  }
  if (raw === null || typeof raw !== "object") return undefined;
  const v = raw as Record<string, unknown>;
  if (
    typeof v.pid !== "number" ||
    typeof v.hostname !== "string" ||
    typeof v.acquiredAt !== "number"
  ) {
    return undefined;
  }
  return { pid: v.pid, hostname: v.hostname, acquiredAt: v.acquiredAt };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) === "EPERM";
  }
}

export class FileLock {
  private readonly _lockPath: string;
  private readonly _staleAfterMs: number;
  private readonly _retryDelayMs: number;
  private readonly _maxRetries: number;
  private _held = false;

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this._lockPath = lockPath;
    this._staleAfterMs = options.staleAfterMs ?? DEFAULT_LOCK_OPTIONS.staleAfterMs;
    this._retryDelayMs = options.retryDelayMs ?? DEFAULT_LOCK_OPTIONS.retryDelayMs;
    this._maxRetries = options.maxRetries ?? DEFAULT_LOCK_OPTIONS.maxRetries;
  }

  get path(): string {
    return this._lockPath;
  }

  get held(): boolean {
    return this._held;
  }

  /**
   * Acquire the lock, breaking it if stale.
   *
   * @throws AppendError LOCK_TIMEOUT when retries are exhausted
   * @throws AppendError IO_ERROR on any other filesystem failure
   */
  acquire(): void {
    if (this._held) return;

    for (let attempt = 0; attempt <= this._maxRetries; attempt++) {
      if (this._tryCreate()) {
        this._held = true;
        return;
      }
      if (this._breakIfStale()) {
        continue;
      }
      if (attempt < this._maxRetries) {
        sleepSync(this._retryDelayMs);
      }
    }

    throw new AppendError(
      "LOCK_TIMEOUT",
      `Could not acquire ${this._lockPath} after ${this._maxRetries} retries`,
    );
  }

  release(): void {
    if (!this._held) return;
    this._held = false;
    try {
      unlinkSync(this._lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw new AppendError("IO_ERROR", `Failed to release ${this._lockPath}`, undefined, {
          cause: err,
        });
      }
    }
  }

  /** Run `fn` while holding the lock. The lock is released even if it throws. */
  withLock<T>(fn: () => T): T {
    this.acquire();
    try {
      return fn();
    } finally {
      this.release();
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private _tryCreate(): boolean {
    let fd: number;
    try {
      fd = openSync(this._lockPath, "wx");
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return false;
      throw new AppendError("IO_ERROR", `Failed to create ${this._lockPath}`, undefined, {
        cause: err,
      });
    }
    try {
      const info: LockInfo = {
        pid: process.pid,
        hostname: hostname(),
        acquiredAt: Date.now(),
      };
      writeSync(fd, JSON.stringify(info));
    } finally {
      closeSync(fd);
    }
    return true;
  }

  /** True when a stale lock was found and removed. */
  private _breakIfStale(): boolean {
    let content: string;
    try {
      content = readFileSync(this._lockPath, "utf-8");
    } catch (err) {
      // Released between our open and read: just retry
      if (errnoCode(err) === "ENOENT") return true;
      throw new AppendError("IO_ERROR", `Failed to read ${this._lockPath}`, undefined, {
        cause: err,
      });
    }

    // An empty file is a lock still being written
    if (content.length === 0) return false;

    const info = parseLockInfo(content);
    const stale =
      info === undefined ||
      Date.now() - info.acquiredAt > this._staleAfterMs ||
      (info.hostname === hostname() && !isProcessAlive(info.pid));
    if (!stale) return false;

    try {
      unlinkSync(this._lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw new AppendError("IO_ERROR", `Failed to break stale lock ${this._lockPath}`, undefined, {
          cause: err,
        });
      }
    }
    return true;
  }
}
