import { randomUUID } from "node:crypto";
import { link, mkdir, open, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { KeyedMutex } from "./lib/keyedMutex";
import type { HistoryEntry, Session } from "./types";

export function sessionKey(repository: string, pullRequestId: number): string {
  return `${repository}#${pullRequestId}`;
}

export function parseSessionKey(key: string): { repository: string; pullRequestId: number } {
  const hash = key.lastIndexOf("#");
  const pullRequestId = Number(key.slice(hash + 1));
  if (hash <= 0 || !Number.isInteger(pullRequestId) || pullRequestId <= 0) {
    throw new Error(`Invalid session key: ${key}`);
  }
  return { repository: key.slice(0, hash), pullRequestId };
}

export function createEmptySession(key: string, now: Date): Session {
  const { repository, pullRequestId } = parseSessionKey(key);
  return {
    key,
    repository,
    pullRequestId,
    history: [],
    approvalState: "none",
    closed: false,
    createdAt: now.toISOString(),
    updatedAt: now.toISOString(),
  };
}

const historyEntrySchema = z.object({
  id: z.number().int().positive(),
  kind: z.enum(["apply", "revert"]),
  filePath: z.string(),
  previousContent: z.string(),
  newContent: z.string(),
  commitSha: z.string(),
  author: z.string(),
  appliedAt: z.string(),
  revertsEntryId: z.number().int().positive().optional(),
});

const sessionSchema = z.object({
  key: z.string(),
  repository: z.string(),
  pullRequestId: z.number().int().positive(),
  pendingChange: z
    .object({
      filePath: z.string(),
      content: z.string(),
      baseContent: z.string(),
      actionKind: z.enum(["update", "clarify", "add_example", "expand", "fix", "freeform"]),
      target: z.string(),
      requestedBy: z.string(),
      createdAt: z.string(),
    })
    .optional(),
  history: z.array(historyEntrySchema),
  approvalState: z.enum(["none", "awaiting_approval", "applied", "discarded"]),
  closed: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export interface SessionStore {
  /** Returns the stored session, or a fresh unsaved one. */
  get(key: string): Promise<Session>;
  save(session: Session): Promise<void>;
  appendHistory(key: string, entry: HistoryEntry): Promise<Session>;
  markClosed(key: string): Promise<void>;
  /**
   * Runs `task` while holding the session's lock. The other methods do not
   * lock on their own, so read-modify-write sequences belong inside here.
   */
  withLock<T>(key: string, task: () => Promise<T>): Promise<T>;
}

export interface SessionStoreOptions {
  now?: () => Date;
}

abstract class BaseSessionStore implements SessionStore {
  protected readonly mutex = new KeyedMutex();
  protected readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  protected abstract read(key: string): Promise<Session | undefined>;
  protected abstract write(session: Session): Promise<void>;

  async get(key: string): Promise<Session> {
    return (await this.read(key)) ?? createEmptySession(key, this.now());
  }

  async save(session: Session): Promise<void> {
    if (session.pendingChange && session.approvalState !== "awaiting_approval") {
      throw new Error(`Session ${session.key} has a pending change but is ${session.approvalState}`);
    }
    await this.write({ ...session, updatedAt: this.now().toISOString() });
  }

  async appendHistory(key: string, entry: HistoryEntry): Promise<Session> {
    const session = await this.get(key);
    const lastId = session.history.at(-1)?.id ?? 0;
    if (entry.id !== lastId + 1) {
      throw new Error(`History entry ${entry.id} out of order for ${key} (last is ${lastId})`);
    }

    const updated: Session = { ...session, history: [...session.history, Object.freeze({ ...entry })] };
    await this.save(updated);
    return updated;
  }

  async markClosed(key: string): Promise<void> {
    await this.withLock(key, async () => {
      const session = await this.get(key);
      await this.save({ ...session, closed: true });
    });
  }

  withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, task);
  }
}

export class InMemorySessionStore extends BaseSessionStore {
  private readonly sessions = new Map<string, Session>();

  protected async read(key: string): Promise<Session | undefined> {
    const session = this.sessions.get(key);
    return session ? structuredClone(session) : undefined;
  }

  protected async write(session: Session): Promise<void> {
    this.sessions.set(session.key, structuredClone(session));
  }
}

export interface FileSessionStoreOptions extends SessionStoreOptions {
  directory: string;
  lockStaleMs?: number;
  lockPollMs?: number;
}

const isErrno = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * One JSON file per session. Writes go to a temp file that is renamed over
 * the old one, and `withLock` also takes a lock file so that separate
 * process activations handling the same pull request run one at a time.
 */
export class FileSessionStore extends BaseSessionStore {
  private readonly directory: string;
  private readonly lockStaleMs: number;
  private readonly lockPollMs: number;

  constructor(options: FileSessionStoreOptions) {
    super(options);
    this.directory = options.directory;
    this.lockStaleMs = options.lockStaleMs ?? 300_000;
    this.lockPollMs = options.lockPollMs ?? 50;
  }

  filePath(key: string): string {
    return path.join(this.directory, `${encodeURIComponent(key)}.json`);
  }

  protected async read(key: string): Promise<Session | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(key), "utf-8");
    } catch (error) {
      if (isErrno(error, "ENOENT")) return undefined;
      throw error;
    }

    const parsed = sessionSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Corrupt session file for ${key}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  protected async write(session: Session): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.filePath(session.key);
    const temp = `${target}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(session, null, 2), "utf-8");
    await rename(temp, target);
  }

  override async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(key, async () => {
      const lockPath = `${this.filePath(key)}.lock`;
      const token = await this.acquireFileLock(lockPath);
      try {
        return await task();
      } finally {
        await this.releaseFileLock(lockPath, token);
      }
    });
  }

  private async acquireFileLock(lockPath: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    for (;;) {
      const token = JSON.stringify({ pid: process.pid, at: this.now().toISOString(), id: randomUUID() });
      try {
        const handle = await open(lockPath, "wx");
        await handle.writeFile(token);
        await handle.close();
        return token;
      } catch (error) {
        if (!isErrno(error, "EEXIST")) throw error;
      }

      // A lock older than lockStaleMs belongs to a process that died. The
      // contents are read before the age so that a lock replaced in between
      // never matches
      try {
        const observed = await readFile(lockPath, "utf-8");
        const { mtimeMs } = await stat(lockPath);
        if (Date.now() - mtimeMs > this.lockStaleMs) {
          await removeStaleLock(lockPath, observed);
          continue;
        }
      } catch (error) {
        if (isErrno(error, "ENOENT")) continue;
        throw error;
      }
      await sleep(this.lockPollMs);
    }
  }

  private async releaseFileLock(lockPath: string, token: string): Promise<void> {
    let held: string;
    try {
      held = await readFile(lockPath, "utf-8");
    } catch (error) {
      if (isErrno(error, "ENOENT")) return;
      throw error;
    }
    // Taken over as stale while the task ran; the lock is someone else's now
    if (held !== token) return;
    await unlink(lockPath).catch((error: unknown) => {
      if (!isErrno(error, "ENOENT")) throw error;
    });
  }
}

/**
 * Deletes the lock file at `lockPath` if it still holds `observed`. The lock
 * is first renamed to a private name, so a competing process that replaced
 * it in the meantime gets its lock put back instead of losing it.
 */
export async function removeStaleLock(lockPath: string, observed: string): Promise<boolean> {
  const moved = `${lockPath}.${randomUUID()}.stale`;
  try {
    await rename(lockPath, moved);
  } catch (error) {
    if (isErrno(error, "ENOENT")) return false;
    throw error;
  }

  const taken = await readFile(moved, "utf-8");
  if (taken !== observed) {
    await link(moved, lockPath).catch((error: unknown) => {
      if (!isErrno(error, "EEXIST")) throw error;
    });
    await unlink(moved);
    return false;
  }

  await unlink(moved);
  return true;
}
