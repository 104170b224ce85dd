import * as fs from 'fs/promises';
import * as path from 'path';
import { DocumentSyncStore, emptyDocument } from '../document_sync_store';
import type { DocumentSyncStoreOptions } from '../document_sync_store';
import { SyncStoreError } from '../sync_store.errors';
import type { SyncStoreDocument } from '../sync_store.types';

export const STATE_FILENAME = 'syncs.json';
const LOCK_FILENAME = 'syncs.lock';

/**
 * Options for FsSyncStore
 */
export type FsSyncStoreOptions = DocumentSyncStoreOptions & {
  /** Directory holding syncs.json (created if missing) */
  stateDir: string;
  /** How long to wait for another process's lock (default: 10000) */
  lockTimeoutMs?: number;
  /** Delay between lock attempts (default: 50) */
  lockRetryMs?: number;
  /** Age after which a lock is taken over even if its owner looks alive (default: 600000) */
  staleLockMs?: number;
};

/** Lock file content */
type LockOwner = {
  pid: number;
  acquiredAt: number;
};

/**
 * Reads `code` off a thrown value. fs errors are not always `instanceof
 * Error` (Jest runs tests in a separate realm), so only the shape is checked.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function parseLockOwner(content: string): LockOwner | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed['pid'] !== 'number' || typeof parsed['acquiredAt'] !== 'number') {
    return null;
  }
  return { pid: parsed['pid'], acquiredAt: parsed['acquiredAt'] };
}

/** Signal 0 only checks existence; EPERM means the process exists under another user */
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSyncStoreDocument(value: unknown): value is SyncStoreDocument {
  return isRecord(value)
    && value['version'] === 1
    && typeof value['nextRepositoryId'] === 'number'
    && typeof value['nextSyncId'] === 'number'
    && Array.isArray(value['repositories'])
    && Array.isArray(value['syncs']);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * FsSyncStore - ISyncStore persisted as one JSON document on disk.
 *
 * Commits write a temp file and rename it over syncs.json, so readers see
 * either the previous or the new state. A lock file naming the owning pid
 * excludes other processes for the length of a transaction. A lock left by
 * a process that is gone, or older than `staleLockMs`, is taken over.
 *
 * @example
 * const store = new FsSyncStore({ stateDir: '/var/lib/wpt-sync' });
 * const syncs = await store.transaction((tx) => tx.listSyncs());
 */
export class FsSyncStore extends DocumentSyncStore {
  private readonly stateDir: string;
  private readonly filePath: string;
  private readonly lockPath: string;
  private readonly lockTimeoutMs: number;
  private readonly lockRetryMs: number;
  private readonly staleLockMs: number;

  constructor(options: FsSyncStoreOptions) {
    super(options);
    this.stateDir = options.stateDir;
    this.filePath = path.join(options.stateDir, STATE_FILENAME);
    this.lockPath = path.join(options.stateDir, LOCK_FILENAME);
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10000;
    this.lockRetryMs = options.lockRetryMs ?? 50;
    this.staleLockMs = options.staleLockMs ?? 600000;
  }

  protected async load(): Promise<SyncStoreDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return emptyDocument();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SyncStoreError(
        `State file ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isSyncStoreDocument(parsed)) {
      throw new SyncStoreError(`State file ${this.filePath} has an unsupported format`);
    }
    return parsed;
  }

  protected async save(document: SyncStoreDocument): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }

  protected override async exclusive<T>(run: () => Promise<T>): Promise<T> {
    await fs.mkdir(this.stateDir, { recursive: true });
    await this.acquireLock();
    try {
      return await run();
    } finally {
      await fs.rm(this.lockPath, { force: true });
    }
  }

  /**
   * Creates the lock by hard-linking a fully written temp file, so the lock
   * never exists without its owner.
   */
  private async acquireLock(): Promise<void> {
    const owner: LockOwner = { pid: process.pid, acquiredAt: Date.now() };
    const tempPath = `${this.lockPath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(owner), 'utf-8');

    const deadline = Date.now() + this.lockTimeoutMs;
    try {
      for (;;) {
        try {
          await fs.link(tempPath, this.lockPath);
          return;
        } catch (error) {
          if (errorCode(error) !== 'EEXIST') {
            throw error;
          }
        }
        if (await this.removeStaleLock()) {
          continue;
        }
        if (Date.now() >= deadline) {
          throw new SyncStoreError(
            `Timed out after ${this.lockTimeoutMs}ms waiting for ${this.lockPath}`
          );
        }
        await sleep(this.lockRetryMs);
      }
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  /** Returns true when a stale lock was removed */
  private async removeStaleLock(): Promise<boolean> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return true;
      }
      throw error;
    }

    const owner = parseLockOwner(content);
    const stale = owner === null
      || !isProcessAlive(owner.pid)
      || Date.now() - owner.acquiredAt > this.staleLockMs;
    if (!stale) {
      return false;
    }
    await fs.rm(this.lockPath, { force: true });
    return true;
  }
}
